export * from './cleanup-trap.js';
export * from './plan.js';
export * from './provision-runner.js';
export * from './run-provisioning.js';
