/**
 * Run identifiers
 *
 * Format: `YYYYMMDD-HHMMSS-mmm-NNNN-xxxx` (UTC timestamp, milliseconds,
 * process-local sequence, random suffix). Ids from one process sort in
 * creation order.
 */

import * as crypto from 'crypto';

export const RUN_ID_PATTERN = /^\d{8}-\d{6}-\d{3}-\d{4}-[0-9a-f]{4}$/;

let sequence = 0;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function generateRunId(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
  const time = `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}`;
  sequence = (sequence + 1) % 10000;
  const suffix = crypto.randomBytes(2).toString('hex');

  return `${date}-${time}-${pad(now.getUTCMilliseconds(), 3)}-${pad(sequence, 4)}-${suffix}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}
