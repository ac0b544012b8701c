#!/usr/bin/env tsx

import { BinaryTree } from '../src/entities/BinaryTree.js';
import { TreeNode } from '../src/entities/TreeNode.js';
import { primes } from '../src/math/sieve.js';
import { TRAVERSAL_ORDERS } from '../src/schemas/traversal.js';
import { collect, take } from '../src/utils/iterables.js';
import { createModuleLogger, logError } from '../src/utils/logger.js';

const log = createModuleLogger('demo');

//          a
//        /   \
//       b     c
//      / \   / \
//     d   e f   g
const a = new TreeNode('a');
const b = new TreeNode('b');
const c = new TreeNode('c');
const d = new TreeNode('d');
const e = new TreeNode('e');
const f = new TreeNode('f');
const g = new TreeNode('g');

b.left = d;
b.right = e;
c.left = f;
c.right = g;
a.left = b;
a.right = c;

const tree = new BinaryTree(a);

console.log('Tree:', a.describe());
for (const order of TRAVERSAL_ORDERS) {
  console.log(`${order}:`.padEnd(20), tree.values(order).join(', '));
}

console.log('First 10 primes:'.padEnd(20), collect(take(primes(), 10)).join(', '));

try {
  tree.insert(new TreeNode('h'));
} catch (error) {
  if (!(error instanceof Error)) throw error;
  logError(log, error, { demo: 'insert' });
}
