export * from './command-runner.js';
export * from './target-root.js';
