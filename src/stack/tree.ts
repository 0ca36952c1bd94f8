/**
 * Selection Tree - draws selected paths as a directory tree.
 * Works from the path list alone; the filesystem is not walked again.
 */

import { comparePaths } from '../selection/engine.js';

interface TreeNode {
  children: Map<string, TreeNode>;
  isFile: boolean;
}

function newNode(isFile: boolean): TreeNode {
  return { children: new Map(), isFile };
}

function buildTree(paths: readonly string[]): TreeNode {
  const root = newNode(false);

  for (const path of paths) {
    const parts = path.split('/').filter(Boolean);
    let node = root;
    parts.forEach((part, i) => {
      const isFile = i === parts.length - 1;
      let child = node.children.get(part);
      if (!child) {
        child = newNode(isFile);
        node.children.set(part, child);
      }
      node = child;
    });
  }

  return root;
}

/**
 * Render paths as a tree. Directories first, then files, each group in path order.
 */
export function renderSelectionTree(paths: readonly string[], rootLabel = '.'): string {
  const lines = [`${rootLabel}/`, ...treeHelper(buildTree(paths), '')];
  return lines.join('\n');
}

function* treeHelper(node: TreeNode, prefix: string): Generator<string> {
  const sorted = [...node.children.entries()].sort(([aName, a], [bName, b]) => {
    if (!a.isFile && b.isFile) return -1;
    if (a.isFile && !b.isFile) return 1;
    return comparePaths(aName, bName);
  });

  for (let i = 0; i < sorted.length; i++) {
    const [name, child] = sorted[i];
    const isLast = i === sorted.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    yield `${prefix}${connector}${name}`;

    if (!child.isFile) {
      yield* treeHelper(child, `${prefix}${childPrefix}`);
    }
  }
}
