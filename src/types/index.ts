/**
 * Type exports.
 */

export type { DataTree, DataValue } from './data-tree.js';
export { isDataTree } from './data-tree.js';
export type { Logger } from './logger.js';
export { createNoOpLogger } from './logger.js';
export type { IncomingMessage, MessageSender } from './message.js';
export { PermissionGroup, hasPermission } from './message.js';
export type {
  Conf,
  ConfigConverter,
  Func,
  FuncFilter,
  FuncHandler,
  FuncOptions,
  FuncSpec,
  LifecycleState,
  PluginContext,
  PluginDefinition,
  PluginExtras,
  PluginHooks,
  PluginIdentity,
  PluginIdentityInput,
  PluginPaths,
  RawMessageFilter,
} from './plugin.js';
export { DEFAULT_FUNC_NAME } from './plugin.js';
