export * from './types.js';
export { runMutator } from './mutator.js';
export { assertMutationAllowed, planMutation, runGuardedMutation } from './guarded-mutation.js';
