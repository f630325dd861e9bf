/**
 * Plugin lifecycle and registration core for a chat bot host.
 */

export * from './types/index.js';
export * from './ports/index.js';
export * from './storage/index.js';
export * from './config/index.js';

export * from './core/plugin-errors.js';
export { AsyncLock } from './core/async-lock.js';
export {
  DEFAULT_AUTHOR,
  DEFAULT_DESCRIPTION,
  DEFAULT_SAVE_FORMAT,
  resolveIdentity,
  resolvePaths,
  prepareWorkspace,
} from './core/identity.js';
export { PersistenceBinding, type PersistenceBindingOptions } from './core/persistence-binding.js';
export { FunctionRegistry, type FunctionRegistryOptions } from './core/function-registry.js';
export { ConfigRegistry, type RawConfigValues } from './core/config-registry.js';
export { SchedulerBinding } from './core/scheduler-binding.js';
export {
  PluginInstance,
  createPluginInstance,
  type PluginCollaborators,
  type PluginInstanceOptions,
} from './core/plugin-instance.js';
export { FuncEventBus, createEventBus, type DispatchResult } from './core/event-bus.js';
export {
  TaskScheduler,
  createTaskScheduler,
  type ScheduledTaskInfo,
} from './core/task-scheduler.js';
export {
  PluginLoader,
  createPluginLoader,
  type LoadOptions,
  type LoadedPluginInfo,
  type PluginLoaderConfig,
} from './core/plugin-loader.js';
export { createLogger, type LoggerConfig } from './core/logger.js';
export {
  createContainer,
  createContainerAsync,
  type Container,
  type ContainerOverrides,
} from './core/container.js';
export { renderTree, runDeferred } from './utils/index.js';
export { echoPlugin } from './plugins/echo/index.js';
