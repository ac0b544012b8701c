/**
 * Treeline Core - lazy prime sieve and binary tree traversals
 */

// Binary tree
export { TreeNode } from './entities/TreeNode.js';
export { BinaryTree, type BinaryTreeOptions } from './entities/BinaryTree.js';

// Traversals
export {
  inOrder,
  preOrder,
  postOrder,
  levelOrder,
  threadedInOrder,
  traverse,
  parseTraversalOrder,
  type NodeSequence,
} from './entities/traversal.js';
export { TRAVERSAL_ORDERS, traversalOrderSchema, type TraversalOrder } from './schemas/traversal.js';

// Structure validation
export {
  validateBinaryTree,
  assertValidBinaryTree,
  captureShape,
  repairThreads,
  type ChildSide,
  type TreeShape,
  type TreeStructureIssue,
  type TreeStructureWarning,
  type TreeValidationOptions,
  type TreeValidationResult,
} from './entities/BinaryTreeValidation.js';

// Primes
export { PrimeSieve, primes, primesBelow, nthPrime } from './math/sieve.js';

// Iterable helpers
export { take, takeWhile, collect } from './utils/iterables.js';

// Errors
export * from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export { createModuleLogger, LoggerFactory, logError } from './utils/logger.js';
