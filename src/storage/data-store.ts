import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { PersistenceEngine } from '../ports/persistence.js';
import type { DataTree } from '../types/data-tree.js';
import { isDataTree } from '../types/data-tree.js';
import type { Logger } from '../types/logger.js';
import { isNotFoundError } from '../utils/errors.js';
import { BUILTIN_CODECS, type DataCodec } from './codecs.js';
import {
  DataFileMissingError,
  DataLoadError,
  DataSaveError,
  UnknownFormatError,
} from './errors.js';

/**
 * Configuration for FileDataStore.
 */
export interface FileDataStoreConfig {
  /** Extra codecs by format name; override built-ins of the same name */
  codecs?: Record<string, DataCodec>;
  /** Logger for debug output (optional) */
  logger?: Logger;
}

/**
 * File-based persistence engine.
 *
 * Features:
 * - Pluggable codecs keyed by format name (json built in)
 * - Atomic writes (temp file + rename)
 * - Automatic parent directory creation on save
 * - Distinct errors for unknown format, missing file, bad content, failed write
 */
export class FileDataStore implements PersistenceEngine {
  private readonly codecs = new Map<string, DataCodec>();
  private readonly logger: Logger | undefined;

  constructor(config: FileDataStoreConfig = {}) {
    for (const [format, codec] of Object.entries({ ...BUILTIN_CODECS, ...config.codecs })) {
      this.codecs.set(format, codec);
    }
    this.logger = config.logger?.child({ component: 'file-data-store' });
  }

  /**
   * Register (or replace) a codec.
   */
  registerCodec(format: string, codec: DataCodec): void {
    this.codecs.set(format, codec);
  }

  supportsFormat(format: string): boolean {
    return this.codecs.has(format);
  }

  async load(path: string, format: string): Promise<DataTree> {
    const codec = this.getCodec(path, format);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new DataFileMissingError(path);
      }
      throw new DataLoadError(path, error);
    }

    let parsed: unknown;
    try {
      parsed = codec.decode(content);
    } catch (error) {
      throw new DataLoadError(path, error);
    }

    if (!isDataTree(parsed)) {
      throw new DataLoadError(path, new Error('root value is not an object'));
    }

    this.logger?.trace({ path, format, keys: Object.keys(parsed).length }, 'Data loaded');
    return parsed;
  }

  async save(tree: DataTree, path: string, format: string): Promise<void> {
    const codec = this.getCodec(path, format);

    let content: string;
    try {
      content = codec.encode(tree);
    } catch (error) {
      throw new DataSaveError(path, error);
    }

    // Write to temp file first, then rename over the target
    const tempPath = `${path}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      throw new DataSaveError(path, error);
    }

    this.logger?.trace({ path, format, bytes: content.length }, 'Data saved');
  }

  private getCodec(path: string, format: string): DataCodec {
    const codec = this.codecs.get(format);
    if (!codec) {
      throw new UnknownFormatError(path, format);
    }
    return codec;
  }
}

/**
 * Factory function for creating a file data store.
 */
export function createFileDataStore(config?: FileDataStoreConfig): FileDataStore {
  return new FileDataStore(config);
}
