import type { DataTree } from './data-tree.js';
import type { Logger } from './logger.js';
import type { IncomingMessage, PermissionGroup } from './message.js';
import type { BotApi } from '../ports/bot-api.js';
import type { ScheduleSpec, ScheduledTask, TaskHandle } from '../ports/scheduler.js';
import type { AsyncLock } from '../core/async-lock.js';

/**
 * Identity fields a plugin declares. `name` and `version` are required at
 * construction; everything else falls back to a default.
 */
export interface PluginIdentityInput {
  name?: string;
  version?: string;
  author?: string;
  description?: string;
  /** Plugin name -> semver range */
  dependencies?: Record<string, string>;
  /** Codec name used for the persisted data file (default "json") */
  saveFormat?: string;
}

/**
 * Resolved, immutable plugin identity.
 */
export interface PluginIdentity {
  readonly name: string;
  readonly version: string;
  readonly author: string;
  readonly description: string;
  readonly dependencies: Readonly<Record<string, string>>;
  readonly saveFormat: string;
}

/**
 * Locations derived from the plugin's source file and the persistent root.
 */
export interface PluginPaths {
  /** Absolute path of the plugin's main module */
  readonly sourceFile: string;
  /** Directory containing the main module */
  readonly sourceDir: string;
  /** Basename of sourceDir; names the work dir and the data file */
  readonly dirName: string;
  /** {persistentRoot}/{dirName} */
  readonly workDir: string;
  /** {workDir}/{dirName}.{saveFormat} */
  readonly dataFile: string;
}

/**
 * Lifecycle states of a plugin instance.
 * `loading` and `unloading` are transient; `failed` is terminal.
 */
export type LifecycleState =
  | 'uninitialized'
  | 'loading'
  | 'loaded'
  | 'unloading'
  | 'unloaded'
  | 'failed';

export type FuncHandler = (message: IncomingMessage) => void | Promise<void>;
export type FuncFilter = (message: IncomingMessage) => boolean;

/** Regex source (string) or pattern matched against the start of the raw text */
export type RawMessageFilter = string | RegExp;

/**
 * Reserved name of the fallback func.
 */
export const DEFAULT_FUNC_NAME = 'default';

/**
 * A registered, permission-scoped, filter-gated callable.
 */
export interface Func {
  readonly name: string;
  readonly pluginName: string;
  readonly handler: FuncHandler;
  readonly filter: FuncFilter | null;
  readonly rawMessageFilter: RawMessageFilter | null;
  readonly permission: PermissionGroup;
  /** Surface a permission failure as an error instead of skipping silently */
  readonly permissionRaise: boolean;
}

/**
 * Optional gating for user/admin funcs.
 */
export interface FuncOptions {
  filter?: FuncFilter;
  rawMessageFilter?: RawMessageFilter;
  permissionRaise?: boolean;
}

/**
 * Input of the registration primitive.
 */
export interface FuncSpec extends FuncOptions {
  name: string;
  handler: FuncHandler;
  permission: PermissionGroup;
}

export type ConfigConverter<T = unknown> = (raw: string) => T;

/**
 * A declared configuration key.
 */
export interface Conf<T = unknown> {
  readonly pluginName: string;
  readonly key: string;
  readonly defaultValue: T;
  readonly converter: ConfigConverter<T> | null;
}

/**
 * Statically declared extra attributes a host may hand to a plugin.
 * Unknown keys are rejected at construction.
 */
export interface PluginExtras {
  /** Free-form metadata from the plugin's packaging */
  metaData?: Record<string, unknown>;
  /** Client used to act on the outside world */
  api?: BotApi;
}

/**
 * Capabilities handed to plugin hooks.
 *
 * This is the whole surface a plugin author sees; the lifecycle entry
 * points (load/unload) are not part of it.
 */
export interface PluginContext {
  readonly identity: PluginIdentity;
  readonly paths: PluginPaths;
  readonly firstLoad: boolean;
  readonly debug: boolean;
  readonly logger: Logger;
  readonly extras: Readonly<PluginExtras>;
  /** Guards the data tree and registries against concurrent dispatches */
  readonly lock: AsyncLock;
  /** Persisted tree; mutate freely between load and unload */
  readonly data: DataTree;
  /** Config values resolved from the host; filled in after init returns */
  readonly config: Readonly<Record<string, unknown>>;

  registerUserFunc(name: string, handler: FuncHandler, options?: FuncOptions): void;
  registerAdminFunc(name: string, handler: FuncHandler, options?: FuncOptions): void;
  registerDefaultFunc(handler: FuncHandler, permission?: PermissionGroup): void;
  registerConfig<T>(key: string, defaultValue: T, converter?: ConfigConverter<T>): void;

  addScheduledTask(name: string, task: ScheduledTask, spec: ScheduleSpec): TaskHandle;
  removeScheduledTask(name: string): boolean;

  /** Resolve a path inside the plugin's work dir */
  workPath(...segments: string[]): string;
  /** Resolve a path inside the plugin's source dir */
  sourcePath(...segments: string[]): string;
}

/**
 * Hooks a plugin may implement. All optional.
 *
 * Sync hooks are deferred off the caller's stack and awaited; async hooks
 * run after their sync counterpart completes.
 */
export interface PluginHooks {
  init?(ctx: PluginContext): void;
  onLoad?(ctx: PluginContext): Promise<void>;
  close?(ctx: PluginContext, ...args: unknown[]): void;
  onClose?(ctx: PluginContext, ...args: unknown[]): Promise<void>;
}

/**
 * What a plugin module exports.
 */
export interface PluginDefinition {
  identity: PluginIdentityInput;
  /** Absolute path of the plugin's main module (e.g. fileURLToPath(import.meta.url)) */
  sourceFile: string;
  hooks?: PluginHooks;
}
