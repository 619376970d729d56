/**
 * Commands exports
 */

export { historyCommand } from './history.js';
export { undoCommand } from './undo.js';
export { sandboxCommand } from './sandbox.js';
export { mutateCommand } from './mutate.js';
