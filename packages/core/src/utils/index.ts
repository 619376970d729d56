/**
 * Core Utilities Module
 */

export * from './errors.js';
export * from './logger.js';
