/**
 * A node in a binary tree
 *
 * Nodes are plain mutable records: callers build the shape by passing
 * children to the constructor or assigning `left` and `right` directly.
 * Traversals read these links and never create or destroy nodes.
 */
export class TreeNode<T> {
  value: T;
  left: TreeNode<T> | null;
  right: TreeNode<T> | null;

  constructor(value: T, left: TreeNode<T> | null = null, right: TreeNode<T> | null = null) {
    this.value = value;
    this.left = left;
    this.right = right;
  }

  isLeaf(): boolean {
    return this.left === null && this.right === null;
  }

  /**
   * Representation from which the subtree could be rebuilt,
   * e.g. `TreeNode(a, TreeNode(b, null, null), null)`.
   *
   * Built with an explicit work stack, so chains of any depth are fine.
   * The subtree must be acyclic; a node carrying a traversal thread never finishes.
   */
  describe(): string {
    const parts: string[] = [];
    const work: Array<TreeNode<T> | string | null> = [this];

    while (work.length > 0) {
      const item = work.pop();
      if (item === undefined) break;

      if (item === null) {
        parts.push('null');
      } else if (typeof item === 'string') {
        parts.push(item);
      } else {
        parts.push(`TreeNode(${String(item.value)}, `);
        // Popped in reverse: left subtree, separator, right subtree, close
        work.push(')', item.right, ', ', item.left);
      }
    }

    return parts.join('');
  }

  toString(): string {
    return String(this.value);
  }
}
