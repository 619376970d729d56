export * from './types.js';
export { UndoEngine, undo } from './undo-engine.js';
