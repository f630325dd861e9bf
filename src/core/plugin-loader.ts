/**
 * Plugin Loader
 *
 * Host-side controller for many plugin instances: constructs and loads
 * them against the shared event bus, scheduler and persistence engine,
 * checks inter-plugin dependencies, resolves per-plugin config values and
 * tears plugins down in reverse load order.
 */

import * as semver from 'semver';
import type { Logger } from '../types/logger.js';
import type { PluginDefinition, PluginExtras, PluginIdentity } from '../types/plugin.js';
import { errorMessage } from '../utils/errors.js';
import { resolveIdentity } from './identity.js';
import {
  createPluginInstance,
  type PluginCollaborators,
  type PluginInstance,
} from './plugin-instance.js';
import { AlreadyLoadedError, DependencyError, NotLoadedError } from './plugin-errors.js';
import type { RawConfigValues } from './config-registry.js';

/**
 * Plugin loader configuration.
 */
export interface PluginLoaderConfig {
  /** Root under which each plugin gets its work dir */
  persistentRoot: string;
  /** Debug mode for every instance (default: false) */
  debug?: boolean;
  /** Raw config values keyed by plugin name */
  pluginConfigs?: Record<string, RawConfigValues>;
}

/**
 * Per-load options.
 */
export interface LoadOptions {
  extras?: PluginExtras;
}

/**
 * Summary of a loaded plugin.
 */
export interface LoadedPluginInfo {
  name: string;
  version: string;
  loadedAt: Date;
  funcs: number;
}

interface LoadedPluginState {
  instance: PluginInstance;
  loadedAt: Date;
}

export class PluginLoader {
  private readonly logger: Logger;
  private readonly collaborators: PluginCollaborators;
  private readonly config: PluginLoaderConfig;

  /** Insertion order is load order */
  private readonly plugins = new Map<string, LoadedPluginState>();
  /** Names reserved by loads still in flight */
  private readonly loading = new Set<string>();

  constructor(collaborators: PluginCollaborators, config: PluginLoaderConfig, logger: Logger) {
    this.collaborators = collaborators;
    this.config = config;
    this.logger = logger.child({ component: 'plugin-loader' });
  }

  /**
   * Construct and load a plugin with its host config values.
   *
   * @throws AlreadyLoadedError if a plugin with the same name is loaded or loading
   * @throws DependencyError if a declared dependency is absent or out of range
   */
  async load(definition: PluginDefinition, options: LoadOptions = {}): Promise<PluginInstance> {
    const identity = resolveIdentity(definition.identity);
    const { name } = identity;

    if (this.plugins.has(name) || this.loading.has(name)) {
      throw new AlreadyLoadedError(name);
    }
    this.checkDependencies(identity);

    this.loading.add(name);
    try {
      const instance = createPluginInstance(definition, this.collaborators, {
        persistentRoot: this.config.persistentRoot,
        debug: this.config.debug ?? false,
        extras: options.extras,
        config: this.config.pluginConfigs?.[name],
        logger: this.logger,
      });

      await instance.load();

      this.plugins.set(name, { instance, loadedAt: new Date() });
      this.logger.info(
        { plugin: name, version: identity.version, configKeys: Object.keys(instance.config) },
        'Plugin registered with host'
      );
      return instance;
    } finally {
      this.loading.delete(name);
    }
  }

  /**
   * Unload one plugin. It is forgotten even if teardown fails.
   *
   * @throws NotLoadedError if no such plugin is loaded
   */
  async unload(name: string, ...args: unknown[]): Promise<void> {
    const state = this.plugins.get(name);
    if (!state) {
      throw new NotLoadedError(name, 'unload');
    }

    const dependents = this.findDependents(name);
    if (dependents.length > 0) {
      this.logger.warn({ plugin: name, dependents }, 'Unloading a plugin other plugins depend on');
    }

    try {
      await state.instance.unload(...args);
    } finally {
      this.plugins.delete(name);
    }
  }

  /**
   * Unload every plugin in reverse load order. Failures are logged and the
   * remaining plugins are still unloaded.
   *
   * @throws AggregateError carrying every teardown failure
   */
  async unloadAll(...args: unknown[]): Promise<void> {
    const names = [...this.plugins.keys()].reverse();
    const errors: unknown[] = [];

    for (const name of names) {
      try {
        await this.unload(name, ...args);
      } catch (error) {
        errors.push(error);
        this.logger.error(
          { plugin: name, error: errorMessage(error) },
          'Plugin unload failed'
        );
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to unload ${String(errors.length)} plugin(s)`);
    }
  }

  get(name: string): PluginInstance | undefined {
    return this.plugins.get(name)?.instance;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  list(): LoadedPluginInfo[] {
    return [...this.plugins.values()].map(({ instance, loadedAt }) => ({
      name: instance.name,
      version: instance.identity.version,
      loadedAt,
      funcs: instance.funcs.length,
    }));
  }

  /**
   * Resolved config values of a loaded plugin.
   *
   * @throws NotLoadedError if no such plugin is loaded
   */
  getConfig(name: string): Readonly<Record<string, unknown>> {
    const state = this.plugins.get(name);
    if (!state) {
      throw new NotLoadedError(name, 'read config');
    }
    return state.instance.config;
  }

  private checkDependencies(identity: PluginIdentity): void {
    for (const [dependency, range] of Object.entries(identity.dependencies)) {
      const loaded = this.plugins.get(dependency);
      if (!loaded) {
        throw new DependencyError(identity.name, dependency);
      }

      if (semver.validRange(range) === null) {
        throw new DependencyError(
          identity.name,
          dependency,
          `invalid version range "${range}" for dependency ${dependency}`
        );
      }

      // Versions such as "1.0" are compared as 1.0.0
      const loadedVersion = loaded.instance.identity.version;
      const comparable = semver.coerce(loadedVersion);
      if (!comparable || !semver.satisfies(comparable, range)) {
        throw new DependencyError(
          identity.name,
          dependency,
          `requires ${dependency}@${range}, found ${loadedVersion}`
        );
      }
    }
  }

  private findDependents(name: string): string[] {
    return [...this.plugins.values()]
      .map(({ instance }) => instance.identity)
      .filter((identity) => name in identity.dependencies)
      .map((identity) => identity.name);
  }
}

/**
 * Factory function for creating a plugin loader.
 */
export function createPluginLoader(
  collaborators: PluginCollaborators,
  config: PluginLoaderConfig,
  logger: Logger
): PluginLoader {
  return new PluginLoader(collaborators, config, logger);
}
