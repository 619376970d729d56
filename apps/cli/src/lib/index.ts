/**
 * Library exports
 */

export * from './environment.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './context.js';
export { CLI_VERSION } from './version.js';
