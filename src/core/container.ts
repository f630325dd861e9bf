import type { MergedConfig } from '../config/config-schema.js';
import { loadConfig, type ConfigLoaderOptions } from '../config/config-loader.js';
import type { PersistenceEngine } from '../ports/persistence.js';
import { createFileDataStore } from '../storage/data-store.js';
import type { Logger } from '../types/logger.js';
import { createEventBus, type FuncEventBus } from './event-bus.js';
import { createLogger } from './logger.js';
import { createPluginLoader, type PluginLoader } from './plugin-loader.js';
import { createTaskScheduler, type TaskScheduler } from './task-scheduler.js';

/**
 * Replacements for the default collaborators (tests, embedding hosts).
 */
export interface ContainerOverrides {
  logger?: Logger;
  persistence?: PersistenceEngine;
}

/**
 * Container holding the host's shared services.
 */
export interface Container {
  /** Application logger */
  logger: Logger;
  /** Loaded configuration */
  config: MergedConfig;
  /** Func dispatch index shared by all plugins */
  eventBus: FuncEventBus;
  /** Timer service shared by all plugins */
  scheduler: TaskScheduler;
  /** Persistence engine for plugin data files */
  persistence: PersistenceEngine;
  /** Plugin loader */
  pluginLoader: PluginLoader;
  /** Unload all plugins, then stop timers and clear the bus */
  shutdown: () => Promise<void>;
}

/**
 * Create the host container with all dependencies wired up.
 *
 * This is the composition root - shared services are created here and
 * passed to plugin instances via the loader.
 */
export function createContainer(
  config: MergedConfig,
  overrides: ContainerOverrides = {}
): Container {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      pretty: config.logging.pretty,
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
    });

  const eventBus = createEventBus(logger);
  const scheduler = createTaskScheduler(logger);
  const persistence = overrides.persistence ?? createFileDataStore({ logger });

  const pluginLoader = createPluginLoader(
    { eventBus, scheduler, persistence },
    {
      persistentRoot: config.paths.persistentRoot,
      debug: config.debug,
      pluginConfigs: config.plugins.configs,
    },
    logger
  );

  if (config.debug) {
    logger.warn('Debug mode enabled: plugin data will not be saved on unload');
  }

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    try {
      await pluginLoader.unloadAll();
    } finally {
      scheduler.stop();
      eventBus.clear();
    }
  };

  return {
    logger,
    config,
    eventBus,
    scheduler,
    persistence,
    pluginLoader,
    shutdown,
  };
}

/**
 * Load configuration from file and environment, then build the container.
 */
export async function createContainerAsync(
  configPath?: string,
  options: ConfigLoaderOptions & ContainerOverrides = {}
): Promise<Container> {
  const config = await loadConfig(configPath, { env: options.env, logger: options.logger });
  return createContainer(config, options);
}
