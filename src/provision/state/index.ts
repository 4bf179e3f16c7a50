export * from './provision-state.js';
