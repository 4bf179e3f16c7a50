export * from './service-installer.js';
