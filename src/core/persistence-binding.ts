/**
 * Persistence Binding
 *
 * Owns a plugin's in-memory data tree and moves it to and from disk through
 * the host's persistence engine. A missing, malformed or unknown-format
 * store is reset to an empty one on load, except in debug mode.
 */

import { writeFile } from 'node:fs/promises';
import type { PersistenceEngine } from '../ports/persistence.js';
import type { DataTree } from '../types/data-tree.js';
import type { Logger } from '../types/logger.js';
import { DataSaveError, isRecoverableLoadError } from '../storage/errors.js';

export interface PersistenceBindingOptions {
  pluginName: string;
  dataFile: string;
  format: string;
  debug: boolean;
  engine: PersistenceEngine;
  logger: Logger;
}

export class PersistenceBinding {
  private readonly dataFile: string;
  private readonly format: string;
  private readonly debug: boolean;
  private readonly engine: PersistenceEngine;
  private readonly logger: Logger;

  /** Same object for the binding's whole life; load() replaces its contents */
  private readonly tree: DataTree = {};

  constructor(options: PersistenceBindingOptions) {
    this.dataFile = options.dataFile;
    this.format = options.format;
    this.debug = options.debug;
    this.engine = options.engine;
    this.logger = options.logger.child({
      component: 'persistence-binding',
      plugin: options.pluginName,
    });
  }

  /**
   * The mutable data tree.
   */
  get data(): DataTree {
    return this.tree;
  }

  /**
   * Load the persisted tree into memory.
   *
   * Outside debug mode a recoverable failure truncates the file, saves the
   * current in-memory tree and loads again. A failure during that recovery
   * propagates. In debug mode the failure is logged and memory is left as is.
   */
  async load(): Promise<void> {
    try {
      this.replaceTree(await this.engine.load(this.dataFile, this.format));
      return;
    } catch (error) {
      if (!isRecoverableLoadError(error)) {
        throw error;
      }

      if (this.debug) {
        this.logger.warn(
          { dataFile: this.dataFile, code: error.code },
          'Persisted data unreadable; debug mode keeps in-memory data and skips recovery'
        );
        return;
      }

      this.logger.warn(
        { dataFile: this.dataFile, code: error.code, error: error.message },
        'Persisted data unreadable; resetting store'
      );
    }

    try {
      await writeFile(this.dataFile, '', 'utf-8');
    } catch (error) {
      throw new DataSaveError(this.dataFile, error);
    }
    await this.save();
    this.replaceTree(await this.engine.load(this.dataFile, this.format));
  }

  /**
   * Write the in-memory tree to disk.
   */
  async save(): Promise<void> {
    await this.engine.save(this.tree, this.dataFile, this.format);
    this.logger.debug({ dataFile: this.dataFile }, 'Persisted data saved');
  }

  private replaceTree(next: DataTree): void {
    if (next === this.tree) return;
    for (const key of Object.keys(this.tree)) {
      delete this.tree[key];
    }
    Object.assign(this.tree, next);
  }
}
