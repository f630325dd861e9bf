import type { DataTree, DataValue } from '../types/data-tree.js';

type Branch = DataTree | DataValue[];

function isBranch(value: DataValue): value is Branch {
  if (typeof value !== 'object' || value === null) return false;
  return Array.isArray(value) ? value.length > 0 : Object.keys(value).length > 0;
}

function entriesOf(branch: Branch): [string, DataValue][] {
  if (Array.isArray(branch)) {
    return branch.map((item, index): [string, DataValue] => [`[${String(index)}]`, item]);
  }
  return Object.entries(branch);
}

function renderBranch(branch: Branch, prefix: string): string[] {
  const lines: string[] = [];
  const entries = entriesOf(branch);

  entries.forEach(([label, child], index) => {
    const isLast = index === entries.length - 1;
    const connector = isLast ? '└── ' : '├── ';

    if (isBranch(child)) {
      lines.push(`${prefix}${connector}${label}`);
      lines.push(...renderBranch(child, prefix + (isLast ? '    ' : '│   ')));
    } else {
      lines.push(`${prefix}${connector}${label}: ${JSON.stringify(child)}`);
    }
  });

  return lines;
}

/**
 * Render a data tree as box-drawing lines, one per key.
 * Leaves (and empty containers) are printed as JSON after the key.
 */
export function renderTree(tree: DataTree): string[] {
  const lines = renderBranch(tree, '');
  return lines.length > 0 ? lines : ['(empty)'];
}
