/**
 * Environment detection for CI/TTY and graceful degradation
 */

import ci from 'ci-info';

/** Environment information */
export interface Environment {
  /** Running in debug mode */
  isDebug: boolean;
  colors: boolean;
  unicode: boolean;
}

/** Symbol sets for different terminal capabilities */
export interface SymbolSet {
  tick: string;
  cross: string;
  warning: string;
  info: string;
  arrow: string;
  bullet: string;
  pointerSmall: string;
}

const UNICODE_SYMBOLS: SymbolSet = {
  tick: '✓',
  cross: '✖',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→',
  bullet: '•',
  pointerSmall: '›',
};

const ASCII_SYMBOLS: SymbolSet = {
  tick: '√',
  cross: 'x',
  warning: '!',
  info: 'i',
  arrow: '->',
  bullet: '*',
  pointerSmall: '>',
};

// Cache for environment detection
let envCache: Environment | null = null;

function detectUnicodeSupport(): boolean {
  if (process.env['RETRACE_NO_UNICODE'] === '1') {
    return false;
  }

  if (process.platform === 'win32') {
    return Boolean(process.env['WT_SESSION']) || process.env['TERM_PROGRAM'] === 'vscode';
  }

  return true;
}

function detectColorSupport(): boolean {
  if (process.env['NO_COLOR'] !== undefined || process.env['RETRACE_NO_COLOR'] === '1') {
    return false;
  }

  const forceColor = process.env['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!process.stdout.isTTY) {
    // GitHub Actions renders ANSI colors in its logs
    return ci.isCI && Boolean(process.env['GITHUB_ACTIONS']);
  }

  return true;
}

function buildEnvironment(): Environment {
  return {
    isDebug: process.env['DEBUG'] === '1' || process.env['RETRACE_DEBUG'] === '1',
    colors: detectColorSupport(),
    unicode: detectUnicodeSupport(),
  };
}

/**
 * Get current environment (cached)
 */
export function getEnvironment(): Environment {
  if (!envCache) {
    envCache = buildEnvironment();
  }
  return envCache;
}

export function getSymbols(): SymbolSet {
  return getEnvironment().unicode ? UNICODE_SYMBOLS : ASCII_SYMBOLS;
}

export function shouldUseColors(): boolean {
  return getEnvironment().colors;
}

/**
 * Check if running in verbose mode (via env or debug)
 */
export function isVerbose(): boolean {
  return process.env['RETRACE_VERBOSE'] === '1' || getEnvironment().isDebug;
}

export function isQuiet(): boolean {
  return process.env['RETRACE_QUIET'] === '1';
}
