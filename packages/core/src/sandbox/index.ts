export * from './types.js';
export { SandboxPreparer, prepareSandbox } from './sandbox-preparer.js';
export {
  GUARD_ENV,
  GUARD_MODULE_FILENAME,
  DEFAULT_MAX_STEPS,
  guardEnvironment,
  guardTemplatePath,
  readGuardTemplate,
  loadRuntimeGuard,
} from './runtime-guard.js';
export type {
  RuntimeGuard,
  RuntimeGuardModule,
  RuntimeGuardOptions,
  RuntimeGuardState,
  GuardSettings,
} from './runtime-guard.js';
