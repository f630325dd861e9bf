/**
 * Persistence Port
 *
 * Reads and writes a plugin's data tree. Implementations raise the
 * PersistenceError subclasses from storage/errors.ts so callers can tell
 * a missing or malformed file from an unknown format or a failed write.
 */

import type { DataTree } from '../types/data-tree.js';

export interface PersistenceEngine {
  /** Whether a codec is registered for this format name */
  supportsFormat(format: string): boolean;

  /**
   * @throws UnknownFormatError, DataFileMissingError, DataLoadError
   */
  load(path: string, format: string): Promise<DataTree>;

  /**
   * @throws UnknownFormatError, DataSaveError
   */
  save(tree: DataTree, path: string, format: string): Promise<void>;
}
