/**
 * CLI Version - injected at build time by tsup
 *
 * @module lib/version
 */

// Build-time constants injected by tsup
declare const __CLI_VERSION__: string;

/**
 * Falls back to the workspace version when running from source
 */
export const CLI_VERSION = typeof __CLI_VERSION__ !== 'undefined' ? __CLI_VERSION__ : '0.4.0';
