/**
 * Camera-trap image provisioning
 *
 * Public entry point: configuration loading, plan building and the
 * fail-fast provisioning runner.
 */

export * from './types/index.js';

export * from './errors/index.js';
export * from './config/index.js';
export * from './system/index.js';
export * from './state/index.js';
export * from './overlay-unpacker/index.js';
export * from './package-stage/index.js';
export * from './python-deps/index.js';
export * from './service-installer/index.js';
export * from './runner/index.js';
