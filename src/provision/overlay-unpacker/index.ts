export * from './overlay-unpacker.js';
