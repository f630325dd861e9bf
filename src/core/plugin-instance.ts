/**
 * Plugin Instance
 *
 * Lifecycle controller for one plugin: construction resolves identity and
 * workspace, load() brings the data tree in, runs init, resolves the
 * config keys init declared and runs onLoad; unload() tears down
 * registrations, runs the close hooks and saves.
 *
 * Each transition runs at most once. Plugin authors never see this class;
 * their hooks receive a PluginContext instead.
 */

import { join } from 'node:path';
import { z } from 'zod';
import type { BotApi } from '../ports/bot-api.js';
import type { EventRegistrar } from '../ports/event-registrar.js';
import type { PersistenceEngine } from '../ports/persistence.js';
import type { Scheduler } from '../ports/scheduler.js';
import type { DataTree } from '../types/data-tree.js';
import type { Logger } from '../types/logger.js';
import { createNoOpLogger } from '../types/logger.js';
import type {
  Conf,
  Func,
  LifecycleState,
  PluginContext,
  PluginDefinition,
  PluginExtras,
  PluginHooks,
  PluginIdentity,
  PluginPaths,
} from '../types/plugin.js';
import { runDeferred } from '../utils/defer.js';
import { errorMessage } from '../utils/errors.js';
import { renderTree } from '../utils/tree-view.js';
import { AsyncLock } from './async-lock.js';
import { ConfigRegistry, type RawConfigValues } from './config-registry.js';
import { FunctionRegistry } from './function-registry.js';
import { prepareWorkspace, resolveIdentity, resolvePaths } from './identity.js';
import { PersistenceBinding } from './persistence-binding.js';
import { LifecycleError, TeardownError, ValidationError } from './plugin-errors.js';
import { SchedulerBinding } from './scheduler-binding.js';

/**
 * Shared host services an instance references but does not own.
 */
export interface PluginCollaborators {
  eventBus: EventRegistrar;
  scheduler: Scheduler;
  persistence: PersistenceEngine;
}

/**
 * Construction options.
 */
export interface PluginInstanceOptions {
  /** Root under which each plugin gets its work dir */
  persistentRoot: string;
  /** Skip saving on unload and recovery on load (default: false) */
  debug?: boolean;
  extras?: PluginExtras;
  /** Raw values for the config keys the plugin declares */
  config?: RawConfigValues;
  logger?: Logger;
}

function isBotApi(value: unknown): value is BotApi {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sendMessage' in value &&
    typeof value.sendMessage === 'function'
  );
}

const extrasSchema = z
  .object({
    metaData: z.record(z.string(), z.unknown()).optional(),
    api: z.custom<BotApi>(isBotApi, { message: 'api must implement sendMessage()' }).optional(),
  })
  .strict();

export class PluginInstance {
  readonly identity: PluginIdentity;
  readonly paths: PluginPaths;
  readonly firstLoad: boolean;
  readonly extras: Readonly<PluginExtras>;
  readonly lock = new AsyncLock();

  private readonly debugMode: boolean;
  private readonly hooks: PluginHooks;
  private readonly logger: Logger;
  private readonly persistence: PersistenceBinding;
  private readonly functions: FunctionRegistry;
  private readonly configRegistry: ConfigRegistry;
  private readonly tasks: SchedulerBinding;
  private readonly rawConfig: RawConfigValues;
  /** Filled in once init has declared its keys */
  private readonly configValues: Record<string, unknown> = {};
  private readonly context: PluginContext;
  private lifecycleState: LifecycleState = 'uninitialized';

  /**
   * @throws IdentityError if name or version is missing
   * @throws ValidationError if identity fields or extras are malformed, or
   *   the engine has no codec for the save format
   * @throws WorkspaceError if the work dir path is not a directory
   */
  constructor(
    definition: PluginDefinition,
    collaborators: PluginCollaborators,
    options: PluginInstanceOptions
  ) {
    this.identity = resolveIdentity(definition.identity);
    const name = this.identity.name;

    if (!collaborators.persistence.supportsFormat(this.identity.saveFormat)) {
      throw new ValidationError(
        name,
        `no codec for save format "${this.identity.saveFormat}"`
      );
    }

    const parsedExtras = extrasSchema.safeParse(options.extras ?? {});
    if (!parsedExtras.success) {
      const detail = parsedExtras.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(name, `invalid extras (${detail})`);
    }
    this.extras = Object.freeze(parsedExtras.data);

    this.debugMode = options.debug ?? false;
    this.rawConfig = options.config ?? {};
    this.hooks = definition.hooks ?? {};
    this.logger = (options.logger ?? createNoOpLogger()).child({ plugin: name });

    this.paths = resolvePaths(this.identity, definition.sourceFile, options.persistentRoot);
    this.firstLoad = prepareWorkspace(this.paths, name);

    this.persistence = new PersistenceBinding({
      pluginName: name,
      dataFile: this.paths.dataFile,
      format: this.identity.saveFormat,
      debug: this.debugMode,
      engine: collaborators.persistence,
      logger: this.logger,
    });
    this.functions = new FunctionRegistry({
      pluginName: name,
      registrar: collaborators.eventBus,
      logger: this.logger,
    });
    this.configRegistry = new ConfigRegistry(name, this.logger);
    this.tasks = new SchedulerBinding(name, collaborators.scheduler, this.logger);
    this.context = this.createContext();

    this.logger.debug(
      { version: this.identity.version, workDir: this.paths.workDir, firstLoad: this.firstLoad },
      'Plugin constructed'
    );
  }

  get name(): string {
    return this.identity.name;
  }

  get debug(): boolean {
    return this.debugMode;
  }

  get state(): LifecycleState {
    return this.lifecycleState;
  }

  get data(): DataTree {
    return this.persistence.data;
  }

  get funcs(): readonly Func[] {
    return this.functions.list();
  }

  get configs(): readonly Conf[] {
    return this.configRegistry.list();
  }

  /**
   * Resolved config values; empty until init has run.
   */
  get config(): Readonly<Record<string, unknown>> {
    return this.configValues;
  }

  /**
   * Typed config values from raw strings (see ConfigRegistry.resolve).
   */
  resolveConfig(raw?: Readonly<Record<string, string | undefined>>): Record<string, unknown> {
    return this.configRegistry.resolve(raw);
  }

  /**
   * Load persisted data, run init, resolve config values, then run onLoad.
   *
   * @throws LifecycleError unless the instance is uninitialized
   * @throws PersistenceError if the store cannot be loaded or reset
   * @throws ValidationError if a raw config value cannot be converted
   */
  async load(): Promise<void> {
    this.beginTransition('load', 'uninitialized', 'loading');

    try {
      await this.lock.runExclusive(() => this.persistence.load());
      const { init, onLoad } = this.hooks;
      if (init) {
        await runDeferred(() => init.call(this.hooks, this.context));
      }
      Object.assign(this.configValues, this.configRegistry.resolve(this.rawConfig));
      if (onLoad) {
        await onLoad.call(this.hooks, this.context);
      }
    } catch (error) {
      this.lifecycleState = 'failed';
      // Registrations made before the failure must not stay dispatchable
      this.functions.unregisterAll();
      this.tasks.cancelAll();
      this.logger.error(
        { error: errorMessage(error) },
        'Plugin load failed'
      );
      throw error;
    }

    this.lifecycleState = 'loaded';
    this.logger.info(
      { version: this.identity.version, funcs: this.functions.size },
      'Plugin loaded'
    );
  }

  /**
   * Unregister funcs and tasks, run close and onClose with `args`, then
   * save (or, in debug mode, log the data tree instead).
   *
   * @throws LifecycleError unless the instance is loaded
   * @throws TeardownError if saving fails
   */
  async unload(...args: unknown[]): Promise<void> {
    this.beginTransition('unload', 'loaded', 'unloading');

    try {
      this.functions.unregisterAll();
      this.tasks.cancelAll();

      const { close, onClose } = this.hooks;
      if (close) {
        await runDeferred(() => close.call(this.hooks, this.context, ...args));
      }
      if (onClose) {
        await onClose.call(this.hooks, this.context, ...args);
      }

      if (this.debugMode) {
        this.logger.warn('Debug mode: persisted data not saved on unload');
        this.logger.info(
          { dataFile: this.paths.dataFile },
          [this.identity.name, ...renderTree(this.data)].join('\n')
        );
      } else {
        try {
          await this.lock.runExclusive(() => this.persistence.save());
        } catch (error) {
          throw new TeardownError(this.identity.name, error);
        }
      }
    } catch (error) {
      this.lifecycleState = 'failed';
      throw error;
    }

    this.lifecycleState = 'unloaded';
    this.logger.info('Plugin unloaded');
  }

  private beginTransition(
    operation: 'load' | 'unload',
    from: LifecycleState,
    to: LifecycleState
  ): void {
    if (this.lifecycleState !== from) {
      throw new LifecycleError(this.identity.name, operation, this.lifecycleState);
    }
    this.lifecycleState = to;
  }

  private createContext(): PluginContext {
    const { paths } = this;
    return {
      identity: this.identity,
      paths,
      firstLoad: this.firstLoad,
      debug: this.debugMode,
      logger: this.logger,
      extras: this.extras,
      lock: this.lock,
      data: this.persistence.data,
      config: this.configValues,
      registerUserFunc: (name, handler, options) => {
        this.functions.registerUserFunc(name, handler, options);
      },
      registerAdminFunc: (name, handler, options) => {
        this.functions.registerAdminFunc(name, handler, options);
      },
      registerDefaultFunc: (handler, permission) => {
        this.functions.registerDefaultFunc(handler, permission);
      },
      registerConfig: (key, defaultValue, converter) => {
        this.configRegistry.registerConfig(key, defaultValue, converter);
      },
      addScheduledTask: (name, task, spec) => this.tasks.addScheduledTask(name, task, spec),
      removeScheduledTask: (name) => this.tasks.removeScheduledTask(name),
      workPath: (...segments) => join(paths.workDir, ...segments),
      sourcePath: (...segments) => join(paths.sourceDir, ...segments),
    };
  }
}

/**
 * Construct a plugin instance (not yet loaded).
 */
export function createPluginInstance(
  definition: PluginDefinition,
  collaborators: PluginCollaborators,
  options: PluginInstanceOptions
): PluginInstance {
  return new PluginInstance(definition, collaborators, options);
}
