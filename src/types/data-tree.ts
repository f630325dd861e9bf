/**
 * Values a plugin may keep in its persisted data tree.
 */
export type DataValue = string | number | boolean | null | DataValue[] | DataTree;

/**
 * Root of a plugin's persisted key/value tree.
 */
export interface DataTree {
  [key: string]: DataValue;
}

/**
 * Narrow an unknown parsed value to a data tree (plain object at the root).
 */
export function isDataTree(value: unknown): value is DataTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
