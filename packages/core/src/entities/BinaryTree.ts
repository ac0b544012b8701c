import { TreeStructureError, UnsupportedTreeOperationError } from '../errors/tree.js';
import type { TraversalOrder } from '../schemas/traversal.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, logError } from '../utils/logger.js';
import {
  type TreeShape,
  type TreeValidationOptions,
  type TreeValidationResult,
  assertValidBinaryTree,
  captureShape,
  repairThreads,
  validateBinaryTree,
} from './BinaryTreeValidation.js';
import type { TreeNode } from './TreeNode.js';
import {
  type NodeSequence,
  inOrder,
  levelOrder,
  postOrder,
  preOrder,
  threadedInOrder,
  traverse,
} from './traversal.js';

const log = createModuleLogger('binaryTree');

export interface BinaryTreeOptions {
  /**
   * Check for cycles and shared nodes before every traversal and throw
   * TreeStructureError instead of looping. Defaults to TREE_VALIDATE_STRUCTURE.
   */
  validateStructure?: boolean;
}

/**
 * Handle on an externally built binary tree
 *
 * The tree holds a reference to its root and nothing else; nodes are built and
 * linked by the caller. Traversals read the structure without changing it,
 * except for the threaded traversal, which mutates it temporarily and restores
 * it before it finishes or is closed.
 */
export class BinaryTree<T> implements Iterable<TreeNode<T>> {
  root: TreeNode<T> | null;
  private readonly validateStructure: boolean;

  constructor(root: TreeNode<T> | null = null, options: BinaryTreeOptions = {}) {
    this.root = root;
    this.validateStructure = options.validateStructure ?? cfg.TREE_VALIDATE_STRUCTURE;
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  /**
   * Insertion needs an ordering or balancing policy, which this tree does not
   * define. Link nodes directly instead.
   */
  insert(node: TreeNode<T>): never {
    throw new UnsupportedTreeOperationError('insert', { value: node.value });
  }

  inOrder(): NodeSequence<T> {
    return inOrder(this.checkedRoot());
  }

  preOrder(): NodeSequence<T> {
    return preOrder(this.checkedRoot());
  }

  postOrder(): NodeSequence<T> {
    return postOrder(this.checkedRoot());
  }

  levelOrder(): NodeSequence<T> {
    return levelOrder(this.checkedRoot());
  }

  /**
   * In-order traversal in O(1) extra space.
   * Only one threaded traversal of a tree may be live at a time.
   */
  threadedInOrder(): NodeSequence<T> {
    return threadedInOrder(this.checkedRoot());
  }

  traverse(order: TraversalOrder): NodeSequence<T> {
    return traverse(this.checkedRoot(), order);
  }

  [Symbol.iterator](): Iterator<TreeNode<T>> {
    return this.inOrder();
  }

  /**
   * Payloads in the given order
   */
  values(order: TraversalOrder = 'in-order'): T[] {
    return Array.from(this.traverse(order), (node) => node.value);
  }

  size(): number {
    let count = 0;
    for (const _node of this.preOrder()) {
      count++;
    }
    return count;
  }

  shape(): TreeShape<T> {
    return captureShape(this.root);
  }

  validate(options: TreeValidationOptions = {}): TreeValidationResult {
    return validateBinaryTree(this.root, options);
  }

  /**
   * Cut threads left by a threaded traversal that was dropped without being closed
   *
   * @returns Number of links that were cut
   */
  repairThreads(): number {
    return repairThreads(this.root);
  }

  private checkedRoot(): TreeNode<T> | null {
    if (!this.validateStructure) return this.root;

    try {
      assertValidBinaryTree(this.root);
    } catch (error) {
      if (error instanceof TreeStructureError) {
        logError(log, error, { issueCount: error.issues.length });
      }
      throw error;
    }
    return this.root;
  }
}
