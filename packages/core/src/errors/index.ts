/**
 * Centralized error handling for Treeline
 */

// Base error class
export { TreelineError } from './base.js';

// Tree errors
export {
  TreeError,
  UnsupportedTreeOperationError,
  TreeStructureError,
  InvalidTraversalOrderError,
} from './tree.js';

// Sequence errors
export { SequenceArgumentError } from './sequence.js';
