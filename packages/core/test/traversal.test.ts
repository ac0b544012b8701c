import { describe, expect, it } from 'vitest';
import {
  inOrder,
  levelOrder,
  parseTraversalOrder,
  postOrder,
  preOrder,
  threadedInOrder,
  traverse,
} from '../src/entities/traversal.js';
import { TreeNode } from '../src/entities/TreeNode.js';
import { InvalidTraversalOrderError } from '../src/errors/tree.js';
import { TRAVERSAL_ORDERS } from '../src/schemas/traversal.js';
import {
  buildTree,
  createSampleTree,
  createSkewedTree,
  nextValue,
  range,
  valuesOf,
} from './testUtils.js';

describe('traversals', () => {
  describe('on the seven-node sample tree', () => {
    it('visits in-order', () => {
      const { tree } = createSampleTree();
      expect(valuesOf(inOrder(tree.root))).toEqual(['d', 'b', 'e', 'a', 'f', 'c', 'g']);
    });

    it('visits pre-order', () => {
      const { tree } = createSampleTree();
      expect(valuesOf(preOrder(tree.root))).toEqual(['a', 'b', 'd', 'e', 'c', 'f', 'g']);
    });

    it('visits post-order', () => {
      const { tree } = createSampleTree();
      expect(valuesOf(postOrder(tree.root))).toEqual(['d', 'e', 'b', 'f', 'g', 'c', 'a']);
    });

    it('visits level-order', () => {
      const { tree } = createSampleTree();
      expect(valuesOf(levelOrder(tree.root))).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
    });

    it('visits threaded in-order', () => {
      const { tree } = createSampleTree();
      expect(valuesOf(threadedInOrder(tree.root))).toEqual(['d', 'b', 'e', 'a', 'f', 'c', 'g']);
    });

    it('yields the node references themselves', () => {
      const { tree, nodes } = createSampleTree();
      expect(Array.from(preOrder(tree.root))).toEqual([
        nodes.a,
        nodes.b,
        nodes.d,
        nodes.e,
        nodes.c,
        nodes.f,
        nodes.g,
      ]);
      expect(levelOrder(tree.root).next().value).toBe(nodes.a);
    });
  });

  describe('on an empty tree', () => {
    it('produces an empty sequence for every traversal', () => {
      for (const traversal of [inOrder, preOrder, postOrder, levelOrder, threadedInOrder]) {
        expect(Array.from(traversal<string>(null))).toEqual([]);
      }
    });
  });

  describe('on a single node', () => {
    it('yields that node for every traversal', () => {
      const root = new TreeNode('x');
      for (const traversal of [inOrder, preOrder, postOrder, levelOrder, threadedInOrder]) {
        expect(valuesOf(traversal(root))).toEqual(['x']);
      }
    });
  });

  describe('on skewed trees', () => {
    it('walks a left-leaning chain', () => {
      const { root } = createSkewedTree(5, 'left');
      expect(valuesOf(inOrder(root))).toEqual([5, 4, 3, 2, 1]);
      expect(valuesOf(preOrder(root))).toEqual([1, 2, 3, 4, 5]);
      expect(valuesOf(postOrder(root))).toEqual([5, 4, 3, 2, 1]);
      expect(valuesOf(levelOrder(root))).toEqual([1, 2, 3, 4, 5]);
      expect(valuesOf(threadedInOrder(root))).toEqual([5, 4, 3, 2, 1]);
    });

    it('walks a right-leaning chain', () => {
      const { root } = createSkewedTree(5, 'right');
      expect(valuesOf(inOrder(root))).toEqual([1, 2, 3, 4, 5]);
      expect(valuesOf(preOrder(root))).toEqual([1, 2, 3, 4, 5]);
      expect(valuesOf(postOrder(root))).toEqual([5, 4, 3, 2, 1]);
      expect(valuesOf(levelOrder(root))).toEqual([1, 2, 3, 4, 5]);
      expect(valuesOf(threadedInOrder(root))).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('on an irregular tree', () => {
    //      1
    //     / \
    //    2   3
    //     \  /
    //     4 5
    const { root } = buildTree([1, 2, 3, null, 4, 5]);

    it('orders nodes with one child correctly', () => {
      expect(valuesOf(inOrder(root))).toEqual([2, 4, 1, 5, 3]);
      expect(valuesOf(preOrder(root))).toEqual([1, 2, 4, 3, 5]);
      expect(valuesOf(postOrder(root))).toEqual([4, 2, 5, 3, 1]);
      expect(valuesOf(levelOrder(root))).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('visit counts', () => {
    it('visits every node of a 31-node tree exactly once', () => {
      const { root } = buildTree(range(1, 32));

      for (const traversal of [inOrder, preOrder, postOrder, levelOrder, threadedInOrder]) {
        const visited = Array.from(traversal(root));
        expect(visited).toHaveLength(31);
        expect(new Set(visited).size).toBe(31);
      }
    });

    it('emits level-order as ascending heap indices', () => {
      const { root } = buildTree(range(1, 32));
      expect(valuesOf(levelOrder(root))).toEqual(range(1, 32));
    });

    it('walks a wide tree level by level', () => {
      const { root } = buildTree(range(1, 65_536));
      expect(valuesOf(levelOrder(root))).toEqual(range(1, 65_536));
    });
  });

  describe('laziness', () => {
    it('resumes where the previous element left off', () => {
      const { tree } = createSampleTree();
      const sequence = postOrder(tree.root);

      expect(nextValue(sequence)).toBe('d');
      expect(nextValue(sequence)).toBe('e');
      expect(valuesOf(sequence)).toEqual(['b', 'f', 'g', 'c', 'a']);
      expect(sequence.next().done).toBe(true);
    });
  });

  describe('traverse', () => {
    it('dispatches on every known order', () => {
      const { tree } = createSampleTree();
      const expected = {
        'in-order': ['d', 'b', 'e', 'a', 'f', 'c', 'g'],
        'pre-order': ['a', 'b', 'd', 'e', 'c', 'f', 'g'],
        'post-order': ['d', 'e', 'b', 'f', 'g', 'c', 'a'],
        'level-order': ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
        'threaded-in-order': ['d', 'b', 'e', 'a', 'f', 'c', 'g'],
      };

      for (const order of TRAVERSAL_ORDERS) {
        expect(valuesOf(traverse(tree.root, order))).toEqual(expected[order]);
      }
    });
  });

  describe('parseTraversalOrder', () => {
    it('accepts a known order name', () => {
      expect(parseTraversalOrder('level-order')).toBe('level-order');
    });

    it('rejects an unknown order name', () => {
      let caught: unknown;
      try {
        parseTraversalOrder('sideways');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidTraversalOrderError);
      if (!(caught instanceof InvalidTraversalOrderError)) return;
      expect(caught.message).toBe('Unknown traversal order: sideways');
      expect(caught.received).toBe('sideways');
      expect(caught.module).toBe('tree.traversal');
      expect(caught.validationErrors).toHaveLength(1);
      expect(caught.validationErrors[0]?.field).toBe('order');
      expect(caught.validationErrors[0]?.code).toBe('invalid_enum_value');
    });

    it('rejects values that are not strings', () => {
      expect(() => parseTraversalOrder(42)).toThrow(InvalidTraversalOrderError);
    });
  });
});
