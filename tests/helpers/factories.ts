/**
 * Test factories and in-process stand-ins for host collaborators.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { EventRegistrar } from '../../src/ports/event-registrar.js';
import type { PersistenceEngine } from '../../src/ports/persistence.js';
import type {
  ScheduledTask,
  ScheduleOptions,
  ScheduleSpec,
  Scheduler,
  TaskHandle,
  TaskTag,
} from '../../src/ports/scheduler.js';
import { DataFileMissingError } from '../../src/storage/errors.js';
import { isDataTree, type DataTree } from '../../src/types/data-tree.js';
import type { Logger } from '../../src/types/logger.js';
import { PermissionGroup, type IncomingMessage } from '../../src/types/message.js';
import type { Func, PluginDefinition, PluginHooks } from '../../src/types/plugin.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export type MockLogger = Logger & {
  calls: Record<LogLevel, unknown[][]>;
  reset: () => void;
};

/**
 * Create a mock logger that captures all log calls (children included).
 */
export function createMockLogger(): MockLogger {
  const calls: Record<LogLevel, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
    fatal: [],
  };

  const logger: MockLogger = {
    trace: vi.fn((...args: unknown[]) => calls.trace.push(args)),
    debug: vi.fn((...args: unknown[]) => calls.debug.push(args)),
    info: vi.fn((...args: unknown[]) => calls.info.push(args)),
    warn: vi.fn((...args: unknown[]) => calls.warn.push(args)),
    error: vi.fn((...args: unknown[]) => calls.error.push(args)),
    fatal: vi.fn((...args: unknown[]) => calls.fatal.push(args)),
    child: () => logger,
    calls,
    reset: () => {
      for (const level of LEVELS) {
        calls[level] = [];
      }
      vi.clearAllMocks();
    },
  };

  return logger;
}

/**
 * Messages logged at a level (the string argument of each call).
 */
export function loggedMessages(logger: MockLogger, level: LogLevel): string[] {
  return logger.calls[level].map((args) => {
    const message = args.find((arg) => typeof arg === 'string');
    return typeof message === 'string' ? message : '';
  });
}

/**
 * Create a fresh temp directory.
 */
export async function createTempDir(prefix = 'plugin-core-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Build a plugin definition whose source lives in `<root>/src/<dirName>/`.
 */
export function createTestDefinition(
  root: string,
  overrides: {
    name?: string;
    version?: string;
    dirName?: string;
    dependencies?: Record<string, string>;
    saveFormat?: string;
    hooks?: PluginHooks;
  } = {}
): PluginDefinition {
  const dirName = overrides.dirName ?? 'sample';
  return {
    identity: {
      name: overrides.name ?? 'Sample',
      version: overrides.version ?? '1.0.0',
      dependencies: overrides.dependencies,
      saveFormat: overrides.saveFormat,
    },
    sourceFile: join(root, 'src', dirName, 'main.js'),
    hooks: overrides.hooks,
  };
}

export function createTestMessage(
  rawMessage: string,
  permission: PermissionGroup = PermissionGroup.USER,
  senderId = 'user-1'
): IncomingMessage {
  return { rawMessage, sender: { id: senderId, permission } };
}

/**
 * EventRegistrar that only records what it was given.
 */
export class RecordingRegistrar implements EventRegistrar {
  readonly registered: Func[] = [];
  readonly unregistered: Func[] = [];

  register(func: Func): void {
    this.registered.push(func);
  }

  unregister(func: Func): boolean {
    this.unregistered.push(func);
    return true;
  }

  get active(): Func[] {
    return this.registered.filter((func) => !this.unregistered.includes(func));
  }
}

interface FakeTask {
  handle: TaskHandle;
  task: ScheduledTask;
  spec: ScheduleSpec;
  options: ScheduleOptions;
}

/**
 * Scheduler that never fires on its own; tests call fire().
 */
export class FakeScheduler implements Scheduler {
  readonly pending = new Map<string, FakeTask>();
  readonly cancelled: TaskHandle[] = [];
  private nextId = 1;

  schedule(
    task: ScheduledTask,
    spec: ScheduleSpec,
    tag: TaskTag,
    options: ScheduleOptions = {}
  ): TaskHandle {
    const handle: TaskHandle = { id: `fake_${String(this.nextId++)}`, ...tag };
    this.pending.set(handle.id, { handle, task, spec, options });
    return handle;
  }

  cancel(handle: TaskHandle): boolean {
    this.cancelled.push(handle);
    return this.pending.delete(handle.id);
  }

  /**
   * Run the pending task with this name. One-shot specs are removed first
   * and reported finished after the run.
   */
  async fire(name: string): Promise<void> {
    const entry = this.find(name);
    const oneShot = 'delayMs' in entry.spec || 'at' in entry.spec;
    if (oneShot) {
      this.pending.delete(entry.handle.id);
    }
    await entry.task();
    if (oneShot) {
      entry.options.onFinished?.(entry.handle);
    }
  }

  /**
   * Drop a repeating task as if its last run had completed.
   */
  finish(name: string): void {
    const entry = this.find(name);
    this.pending.delete(entry.handle.id);
    entry.options.onFinished?.(entry.handle);
  }

  private find(name: string): FakeTask {
    const entry = [...this.pending.values()].find((e) => e.handle.name === name);
    if (!entry) {
      throw new Error(`No pending task named ${name}`);
    }
    return entry;
  }

  names(): string[] {
    return [...this.pending.values()].map((e) => e.handle.name);
  }
}

/**
 * Persistence engine over a Map; stores deep copies.
 */
export class MemoryEngine implements PersistenceEngine {
  readonly files = new Map<string, string>();
  readonly formats = new Set(['json']);
  loadError: Error | null = null;
  saveError: Error | null = null;
  readonly loads: string[] = [];
  readonly saves: string[] = [];

  supportsFormat(format: string): boolean {
    return this.formats.has(format);
  }

  load(path: string, _format: string): Promise<DataTree> {
    this.loads.push(path);
    if (this.loadError) {
      const error = this.loadError;
      this.loadError = null;
      return Promise.reject(error);
    }
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(new DataFileMissingError(path));
    }
    const parsed: unknown = JSON.parse(content);
    return isDataTree(parsed)
      ? Promise.resolve(parsed)
      : Promise.reject(new Error(`Stored value at ${path} is not a tree`));
  }

  save(tree: DataTree, path: string, _format: string): Promise<void> {
    this.saves.push(path);
    if (this.saveError) {
      return Promise.reject(this.saveError);
    }
    this.files.set(path, JSON.stringify(tree));
    return Promise.resolve();
  }
}
