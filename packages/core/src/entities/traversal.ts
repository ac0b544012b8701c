import { InvalidTraversalOrderError } from '../errors/tree.js';
import { type TraversalOrder, traversalOrderSchema } from '../schemas/traversal.js';
import { createModuleLogger } from '../utils/logger.js';
import type { TreeNode } from './TreeNode.js';

/**
 * Traversal algorithms over a node graph rooted at a TreeNode
 *
 * Every traversal is a lazy generator of node references: consuming one
 * element resumes exactly where the previous one left off. A null root
 * produces an empty sequence. The graph must be a finite binary tree;
 * a cycle makes the stack-based walks loop forever.
 */

const log = createModuleLogger('traversal');

export type NodeSequence<T> = Generator<TreeNode<T>, void, undefined>;

/**
 * In-order traversal: left subtree, node, right subtree
 *
 * @complexity O(n) time, O(h) space for the explicit stack
 *
 * @algorithm Descend left pushing every node; when there is nowhere left to go,
 * pop, emit, and continue from the popped node's right child.
 */
export function* inOrder<T>(root: TreeNode<T> | null): NodeSequence<T> {
  const stack: TreeNode<T>[] = [];
  let current = root;

  while (current || stack.length > 0) {
    if (current) {
      stack.push(current);
      current = current.left;
      continue;
    }

    const node = stack.pop();
    if (!node) break;
    yield node;
    current = node.right;
  }
}

/**
 * Pre-order traversal: node, left subtree, right subtree
 *
 * The right child is pushed before the left so the left is popped first.
 */
export function* preOrder<T>(root: TreeNode<T> | null): NodeSequence<T> {
  if (!root) return;

  const stack: TreeNode<T>[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;

    if (node.right) stack.push(node.right);
    if (node.left) stack.push(node.left);
  }
}

/**
 * Post-order traversal: left subtree, right subtree, node
 *
 * A node stays on the stack until its right subtree is done. `lastVisited`
 * tells a first arrival from the parent (descend right) apart from a return
 * out of the right subtree (emit).
 */
export function* postOrder<T>(root: TreeNode<T> | null): NodeSequence<T> {
  const stack: TreeNode<T>[] = [];
  let current = root;
  let lastVisited: TreeNode<T> | null = null;

  while (current || stack.length > 0) {
    if (current) {
      stack.push(current);
      current = current.left;
      continue;
    }

    const top = stack.at(-1);
    if (!top) break;

    if (top.right && top.right !== lastVisited) {
      current = top.right;
    } else {
      stack.pop();
      lastVisited = top;
      yield top;
    }
  }
}

/**
 * Level-order (breadth-first) traversal
 *
 * Every node at depth d is emitted before any node at depth d + 1,
 * left to right within a level.
 *
 * @space O(n): visited nodes stay in the queue array until the walk ends
 */
export function* levelOrder<T>(root: TreeNode<T> | null): NodeSequence<T> {
  if (!root) return;

  // Dequeue by advancing `head` instead of shifting the array
  const queue: TreeNode<T>[] = [root];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (!node) break;
    yield node;

    if (node.left) queue.push(node.left);
    if (node.right) queue.push(node.right);
  }
}

interface ThreadedStep<T> {
  /** Node the walk continues from, null once the walk is over */
  next: TreeNode<T> | null;
  /** Node to emit for this step, if any */
  visit: TreeNode<T> | null;
  /** +1 when a thread was installed, -1 when one was removed */
  threadDelta: -1 | 0 | 1;
}

/**
 * Rightmost node of `current`'s left subtree, stopping early at a thread
 * that already points back to `current`.
 */
function findPredecessor<T>(current: TreeNode<T>, left: TreeNode<T>): TreeNode<T> {
  let predecessor = left;
  while (predecessor.right && predecessor.right !== current) {
    predecessor = predecessor.right;
  }
  return predecessor;
}

/**
 * One transition of the threaded walk.
 *
 * The thread is removed before the node is handed out, so the tree only
 * carries threads for ancestors whose left subtree is still in progress.
 */
function threadedStep<T>(current: TreeNode<T>): ThreadedStep<T> {
  const left = current.left;
  if (!left) {
    return { next: current.right, visit: current, threadDelta: 0 };
  }

  const predecessor = findPredecessor(current, left);
  if (predecessor.right === null) {
    predecessor.right = current;
    return { next: left, visit: null, threadDelta: 1 };
  }

  predecessor.right = null;
  return { next: current.right, visit: current, threadDelta: -1 };
}

/**
 * Run the threaded walk to completion without emitting anything.
 *
 * @returns Number of threads that were installed before the walk resumed
 */
function finishThreadedWalk<T>(start: TreeNode<T> | null): number {
  let current = start;
  let pending = 0;

  while (current) {
    const step = threadedStep(current);
    pending -= step.threadDelta;
    current = step.next;
  }

  return pending;
}

/**
 * Threaded (Morris) in-order traversal
 *
 * Emits nodes in exactly the same order as {@link inOrder} using O(1) extra
 * space: instead of a stack, each node's in-order predecessor temporarily
 * points its right link back at the node. The thread is found again after the
 * left subtree is finished, removed, and the node emitted.
 *
 * The tree is mutated while the traversal is live. If the consumer stops early
 * (break, return() or throw() on the generator), the remaining walk is finished
 * silently so no thread is left behind. A generator that is dropped without
 * being closed cannot be intercepted; use `repairThreads` for that case.
 * Two threaded traversals of one tree must never be live at the same time.
 *
 * @complexity O(n) time, O(1) extra space
 */
export function* threadedInOrder<T>(root: TreeNode<T> | null): NodeSequence<T> {
  let current = root;

  try {
    while (current) {
      const step = threadedStep(current);
      current = step.next;
      if (step.visit) yield step.visit;
    }
  } finally {
    if (current) {
      const repaired = finishThreadedWalk(current);
      if (repaired > 0) {
        log.debug({ repaired }, 'Threaded traversal closed early, removed remaining threads');
      }
    }
  }
}

/**
 * Validate a traversal order name coming from outside the type system
 */
export function parseTraversalOrder(input: unknown): TraversalOrder {
  const result = traversalOrderSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidTraversalOrderError(
      input,
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || 'order',
        message: issue.message,
        code: issue.code,
      }))
    );
  }
  return result.data;
}

/**
 * Run the traversal named by `order`
 */
export function traverse<T>(root: TreeNode<T> | null, order: TraversalOrder): NodeSequence<T> {
  switch (parseTraversalOrder(order)) {
    case 'in-order':
      return inOrder(root);
    case 'pre-order':
      return preOrder(root);
    case 'post-order':
      return postOrder(root);
    case 'level-order':
      return levelOrder(root);
    case 'threaded-in-order':
      return threadedInOrder(root);
  }
}
