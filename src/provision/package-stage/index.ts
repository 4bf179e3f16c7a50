export * from './package-stage.js';
