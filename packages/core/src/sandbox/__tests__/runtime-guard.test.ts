/**
 * Tests for the runtime guard module and its environment
 */

import * as path from 'path';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_MAX_STEPS,
  guardEnvironment,
  guardTemplatePath,
  loadRuntimeGuard,
  type RuntimeGuardModule,
} from '../runtime-guard.js';
import { SandboxError } from '../../utils/errors.js';
import { cleanupTempDirs, makeTempDir, writeFiles } from '../../__tests__/fixtures.js';

describe('runtime guard', () => {
  let guardModule: RuntimeGuardModule;

  beforeAll(async () => {
    guardModule = await loadRuntimeGuard(guardTemplatePath());
  });

  afterEach(async () => {
    await cleanupTempDirs();
  });

  function counter(): { step: (lr: number) => number; calls: () => number } {
    let calls = 0;
    return {
      step: (lr: number) => {
        calls += 1;
        return lr * calls;
      },
      calls: () => calls,
    };
  }

  it('is inactive without the safe profile and returns functions unchanged', () => {
    const exit = vi.fn();
    const guard = guardModule.createRuntimeGuard({ env: { RETRACE_MAX_STEPS: '1' }, exit });
    const { step } = counter();

    expect(guard.state).toBe('inactive');
    expect(guard.wrapStep(step)).toBe(step);
    step(1);
    step(1);
    expect(exit).not.toHaveBeenCalled();
  });

  it('exits once the step limit is reached and ignores later steps', () => {
    const exit = vi.fn();
    const write = vi.fn();
    const guard = guardModule.createRuntimeGuard({
      env: { RETRACE_SAFE_PROFILE: 'yes', RETRACE_MAX_STEPS: '5' },
      exit,
      write,
    });
    const inner = counter();
    const step = guard.wrapStep(inner.step);

    expect(guard.state).toBe('active-counting');
    const results = Array.from({ length: 8 }, () => step(2));

    expect(inner.calls()).toBe(5);
    expect(results.slice(0, 5)).toEqual([2, 4, 6, 8, 10]);
    expect(results.slice(5)).toEqual([undefined, undefined, undefined]);
    expect(guard.steps).toBe(5);
    expect(guard.state).toBe('tripped');
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[retrace-guard] Reached RETRACE_MAX_STEPS=5. Exiting.');
  });

  it('falls back to the default limit for invalid values', () => {
    expect(guardModule.parseMaxSteps(undefined)).toBe(DEFAULT_MAX_STEPS);
    expect(guardModule.parseMaxSteps('abc')).toBe(100);
    expect(guardModule.parseMaxSteps('0')).toBe(100);
    expect(guardModule.parseMaxSteps('-3')).toBe(100);
    expect(guardModule.parseMaxSteps(' 7 ')).toBe(7);
  });

  it('accepts the usual truthy spellings', () => {
    for (const value of ['1', 'true', 'YES', 'y', ' On ']) {
      expect(guardModule.isTruthy(value)).toBe(true);
    }
    for (const value of [undefined, '', '0', 'false', 'enabled']) {
      expect(guardModule.isTruthy(value)).toBe(false);
    }
  });

  it('turns saves into no-ops and warns once', () => {
    const write = vi.fn();
    const guard = guardModule.createRuntimeGuard({
      env: { RETRACE_SAFE_PROFILE: '1', RETRACE_DISABLE_SAVING: 'true' },
      exit: vi.fn(),
      write,
    });
    const saved: string[] = [];
    const save = guard.wrapSave((file: string) => {
      saved.push(file);
    }, 'saveCheckpoint');

    save('a.ckpt');
    save('b.ckpt');

    expect(guard.savingDisabled).toBe(true);
    expect(saved).toEqual([]);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[retrace-guard] saveCheckpoint disabled (RETRACE_DISABLE_SAVING=1).');
  });

  it('keeps saves when the profile is off', () => {
    const guard = guardModule.createRuntimeGuard({ env: { RETRACE_DISABLE_SAVING: '1' } });
    const save = (file: string) => file;

    expect(guard.savingDisabled).toBe(false);
    expect(guard.wrapSave(save)).toBe(save);
  });

  it('builds the environment that activates the guard', () => {
    expect(guardEnvironment()).toEqual({
      RETRACE_SAFE_PROFILE: '1',
      RETRACE_MAX_STEPS: '100',
    });
    expect(guardEnvironment({ maxSteps: 12, disableSaving: true })).toEqual({
      RETRACE_SAFE_PROFILE: '1',
      RETRACE_MAX_STEPS: '12',
      RETRACE_DISABLE_SAVING: '1',
    });
  });

  it('refuses modules that do not look like the guard', async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, { 'other.mjs': 'export const value = 1;\n' });

    await expect(loadRuntimeGuard(path.join(dir, 'other.mjs'))).rejects.toBeInstanceOf(SandboxError);
  });
});
