/**
 * Utility exports.
 */

export { runDeferred } from './defer.js';
export { isErrnoException, isNotFoundError, errorMessage } from './errors.js';
export { renderTree } from './tree-view.js';
