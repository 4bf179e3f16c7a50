/**
 * Provisioning - Type Definitions
 */

export * from './overlay.js';
export * from './provisioning-step.js';
export * from './provision-configuration.js';
