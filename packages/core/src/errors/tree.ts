/**
 * Tree-specific error classes
 *
 * Errors related to binary tree structure and traversal requests
 */

import { TreelineError } from './base.js';
import type { TreeStructureIssue } from '../entities/BinaryTreeValidation.js';

/**
 * Base class for tree-related errors
 */
export abstract class TreeError extends TreelineError {
  constructor(
    message: string,
    area: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `tree.${area}`, operation, context);
  }
}

/**
 * Thrown by operations the tree deliberately does not provide, such as insertion
 */
export class UnsupportedTreeOperationError extends TreeError {
  constructor(operation: string, context?: Record<string, unknown>) {
    super(
      `BinaryTree does not support ${operation}: no ordering or balancing policy is defined`,
      'binaryTree',
      operation,
      context
    );
  }
}

/**
 * Thrown when a node graph is not a finite binary tree (cycle or shared node)
 */
export class TreeStructureError extends TreeError {
  constructor(
    message: string,
    public readonly issues: TreeStructureIssue[],
    context?: Record<string, unknown>
  ) {
    super(message, 'validation', 'structure', { ...context, issues });
  }
}

/**
 * Thrown when a traversal is requested by a name that is not a known order
 */
export class InvalidTraversalOrderError extends TreeError {
  constructor(
    public readonly received: unknown,
    public readonly validationErrors: Array<{ field: string; message: string; code: string }>,
    context?: Record<string, unknown>
  ) {
    super(
      `Unknown traversal order: ${String(received)}`,
      'traversal',
      'traverse',
      { ...context, received, validationErrors }
    );
  }
}
