import type { DataTree } from '../types/data-tree.js';

/**
 * Encodes and decodes a data tree for one on-disk format.
 */
export interface DataCodec {
  /** Parse file content. May throw; the store wraps failures. */
  decode(content: string): unknown;
  /** Serialize a tree. May throw; the store wraps failures. */
  encode(tree: DataTree): string;
}

/**
 * Pretty-printed JSON, the default save format.
 */
export const jsonCodec: DataCodec = {
  decode: (content) => JSON.parse(content) as unknown,
  encode: (tree) => JSON.stringify(tree, null, 2),
};

/**
 * Codecs every FileDataStore knows, keyed by format name.
 */
export const BUILTIN_CODECS: Readonly<Record<string, DataCodec>> = {
  json: jsonCodec,
};
