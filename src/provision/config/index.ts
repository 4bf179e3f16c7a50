export * from './provision-config.js';
