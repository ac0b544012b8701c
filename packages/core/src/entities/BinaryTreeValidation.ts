import { TreeStructureError } from '../errors/tree.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import type { TreeNode } from './TreeNode.js';

/**
 * BinaryTreeValidation - Utilities for checking and restoring node graph structure
 *
 * Provides:
 * - Cycle and shared-node detection
 * - Structural snapshots for before/after comparison
 * - Removal of threads left behind by an unclosed threaded traversal
 *
 * Every function here tolerates cyclic input; none of them loops.
 */

const log = createModuleLogger('validation');

export type ChildSide = 'left' | 'right';

export interface TreeStructureIssue {
  type: 'cycle' | 'shared_node';
  value: unknown;
  message: string;
  details?: Record<string, unknown>;
}

export interface TreeStructureWarning {
  type: 'deep_nesting';
  value: unknown;
  message: string;
  details?: Record<string, unknown>;
}

export interface TreeValidationResult {
  isValid: boolean;
  errors: TreeStructureIssue[];
  warnings: TreeStructureWarning[];
}

export interface TreeValidationOptions {
  /** Depth (root = 0) past which a deep_nesting warning is reported */
  maxDepth?: number;
}

/**
 * One entry per reachable node, in pre-order discovery order.
 * Children are referenced by their index in the snapshot.
 */
export type TreeShape<T> = Array<{
  value: T;
  left: number | null;
  right: number | null;
}>;

interface ValidationFrame<T> {
  node: TreeNode<T>;
  depth: number;
  exiting: boolean;
}

/**
 * Validates that the graph under `root` is a finite binary tree
 *
 * Uses an explicit stack so deep trees cannot exhaust the call stack:
 * - `onPath` holds the ancestors of the node being expanded; a link to one of them is a cycle
 * - `seen` holds every node entered so far; reaching one again by another route is a shared node
 *
 * @complexity O(n) time and space
 */
export function validateBinaryTree<T>(
  root: TreeNode<T> | null,
  options: TreeValidationOptions = {}
): TreeValidationResult {
  const maxDepth = options.maxDepth ?? cfg.TREE_MAX_DEPTH;
  const errors: TreeStructureIssue[] = [];
  const warnings: TreeStructureWarning[] = [];

  if (!root) {
    return { isValid: true, errors, warnings };
  }

  const seen = new Set<TreeNode<T>>();
  const onPath = new Set<TreeNode<T>>();
  const stack: ValidationFrame<T>[] = [{ node: root, depth: 0, exiting: false }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, depth } = frame;

    if (frame.exiting) {
      onPath.delete(node);
      continue;
    }

    if (seen.has(node)) {
      errors.push({
        type: 'shared_node',
        value: node.value,
        message: `Node "${String(node.value)}" is reachable through more than one parent`,
        details: { depth },
      });
      continue;
    }

    seen.add(node);
    onPath.add(node);
    stack.push({ node, depth, exiting: true });

    if (depth > maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        value: node.value,
        message: `Node exceeds maximum depth of ${maxDepth} (current: ${depth})`,
        details: { maxDepth, currentDepth: depth },
      });
    }

    // Right first so the left subtree is expanded first
    const children: Array<[ChildSide, TreeNode<T> | null]> = [
      ['right', node.right],
      ['left', node.left],
    ];
    for (const [side, child] of children) {
      if (!child) continue;

      if (onPath.has(child)) {
        errors.push({
          type: 'cycle',
          value: node.value,
          message: `Cycle detected: ${side} link of "${String(node.value)}" points back to ancestor "${String(child.value)}"`,
          details: { side, ancestor: child.value, depth },
        });
        continue;
      }

      stack.push({ node: child, depth: depth + 1, exiting: false });
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throws TreeStructureError unless the graph under `root` is a finite binary tree
 */
export function assertValidBinaryTree<T>(
  root: TreeNode<T> | null,
  options: TreeValidationOptions = {}
): void {
  const result = validateBinaryTree(root, options);
  if (!result.isValid) {
    throw new TreeStructureError(
      `Binary tree structure is invalid: ${result.errors.length} issue(s) found`,
      result.errors
    );
  }
}

/**
 * Snapshot of the link structure under `root`
 *
 * Two snapshots are equal exactly when the reachable link structure and the
 * values are the same, so comparing one taken before an operation with one
 * taken after shows whether the operation left the shape untouched.
 * A link back to an earlier node shows up as its index rather than recursing.
 */
export function captureShape<T>(root: TreeNode<T> | null): TreeShape<T> {
  const indices = new Map<TreeNode<T>, number>();
  const nodes: TreeNode<T>[] = [];
  const stack: TreeNode<T>[] = root ? [root] : [];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || indices.has(node)) continue;

    indices.set(node, nodes.length);
    nodes.push(node);

    if (node.right) stack.push(node.right);
    if (node.left) stack.push(node.left);
  }

  const indexOf = (node: TreeNode<T> | null): number | null =>
    node ? (indices.get(node) ?? null) : null;

  return nodes.map((node) => ({
    value: node.value,
    left: indexOf(node.left),
    right: indexOf(node.right),
  }));
}

/**
 * Removes threads left behind by a threaded traversal that was never closed
 *
 * A thread is a right link from an in-order predecessor back to one of its
 * ancestors, so in a left-first depth-first walk it always points at a node
 * that has already been entered. Such links are reset to null.
 *
 * @returns Number of links that were cut
 */
export function repairThreads<T>(root: TreeNode<T> | null): number {
  const visited = new Set<TreeNode<T>>();
  const stack: TreeNode<T>[] = root ? [root] : [];
  let cut = 0;

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || visited.has(node)) continue;
    visited.add(node);

    if (node.right && visited.has(node.right)) {
      node.right = null;
      cut++;
    }

    if (node.right) stack.push(node.right);
    if (node.left && !visited.has(node.left)) stack.push(node.left);
  }

  if (cut > 0) {
    log.warn({ cut }, 'Removed residual traversal threads from binary tree');
  }

  return cut;
}
