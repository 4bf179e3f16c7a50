export * from './python-deps.js';
