import { describe, it, expect } from 'vitest';
import { generateRunId, isRunId } from '../run-id.js';

describe('generateRunId', () => {
  it('encodes the UTC timestamp with millisecond precision', () => {
    const runId = generateRunId(new Date(Date.UTC(2024, 1, 29, 23, 5, 9, 42)));

    expect(runId.startsWith('20240229-230509-042-')).toBe(true);
    expect(isRunId(runId)).toBe(true);
  });

  it('stays unique and ordered within the same millisecond', () => {
    const now = new Date(Date.UTC(2024, 0, 1));
    const ids = Array.from({ length: 500 }, () => generateRunId(now));

    expect(new Set(ids).size).toBe(500);
    expect([...ids].sort()).toEqual(ids);
  });

  it('rejects strings that are not run ids', () => {
    expect(isRunId('20240101-000000')).toBe(false);
    expect(isRunId('latest')).toBe(false);
  });
});
