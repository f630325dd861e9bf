/**
 * Plugin Error Types
 *
 * Typed error classes for plugin construction, registration and lifecycle.
 * Callers classify with instanceof or the `code` field.
 */

/**
 * Plugin error codes for classification.
 */
export type PluginErrorCode =
  | 'IDENTITY_INVALID'
  | 'WORKSPACE_INVALID'
  | 'DUPLICATE_NAME'
  | 'VALIDATION_FAILED'
  | 'LIFECYCLE_VIOLATION'
  | 'TEARDOWN_FAILED'
  | 'PERMISSION_DENIED'
  | 'DEPENDENCY_MISSING'
  | 'ALREADY_LOADED'
  | 'NOT_LOADED';

/**
 * Base plugin error class.
 */
export class PluginError extends Error {
  constructor(
    public readonly pluginId: string,
    message: string,
    public readonly code: PluginErrorCode,
    options?: { cause?: unknown }
  ) {
    super(`Plugin ${pluginId}: ${message}`, options);
    this.name = 'PluginError';
  }
}

/**
 * Required identity field (name or version) missing or empty.
 * Fatal at construction.
 */
export class IdentityError extends PluginError {
  constructor(
    pluginId: string,
    public readonly field: string
  ) {
    super(pluginId, `missing required identity field "${field}"`, 'IDENTITY_INVALID');
    this.name = 'IdentityError';
  }
}

/**
 * Work directory path exists but is not a directory.
 * Fatal at construction.
 */
export class WorkspaceError extends PluginError {
  constructor(
    pluginId: string,
    public readonly workDir: string
  ) {
    super(pluginId, `${workDir} is not a directory`, 'WORKSPACE_INVALID');
    this.name = 'WorkspaceError';
  }
}

/**
 * A func or scheduled task name is already taken within the plugin.
 * Retry with a different name.
 */
export class DuplicateNameError extends PluginError {
  constructor(
    pluginId: string,
    public readonly duplicateName: string,
    kind = 'function'
  ) {
    super(pluginId, `${kind} "${duplicateName}" already exists`, 'DUPLICATE_NAME');
    this.name = 'DuplicateNameError';
  }
}

/**
 * Registration or construction input rejected.
 */
export class ValidationError extends PluginError {
  constructor(pluginId: string, message: string) {
    super(pluginId, message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

/**
 * load()/unload() called in a state that does not allow it.
 */
export class LifecycleError extends PluginError {
  constructor(
    pluginId: string,
    public readonly operation: 'load' | 'unload',
    public readonly state: string
  ) {
    super(pluginId, `cannot ${operation} from state "${state}"`, 'LIFECYCLE_VIOLATION');
    this.name = 'LifecycleError';
  }
}

/**
 * Persisting data during unload failed. The cause is the persistence error.
 */
export class TeardownError extends PluginError {
  constructor(pluginId: string, cause: unknown) {
    super(
      pluginId,
      `failed to save persisted data: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TEARDOWN_FAILED',
      { cause }
    );
    this.name = 'TeardownError';
  }
}

/**
 * Sender lacks the permission a func requires, and the func asked for
 * the failure to be raised.
 */
export class PermissionDeniedError extends PluginError {
  constructor(
    pluginId: string,
    public readonly funcName: string,
    public readonly senderId: string
  ) {
    super(pluginId, `sender ${senderId} may not call "${funcName}"`, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Plugin dependency not loaded or version out of range.
 * Load dependencies first.
 */
export class DependencyError extends PluginError {
  constructor(
    pluginId: string,
    public readonly missingDependency: string,
    message?: string
  ) {
    super(
      pluginId,
      message ?? `requires ${missingDependency} which is not loaded`,
      'DEPENDENCY_MISSING'
    );
    this.name = 'DependencyError';
  }
}

/**
 * A plugin with the same name is already loaded.
 */
export class AlreadyLoadedError extends PluginError {
  constructor(pluginId: string) {
    super(pluginId, 'already loaded', 'ALREADY_LOADED');
    this.name = 'AlreadyLoadedError';
  }
}

/**
 * Plugin is not loaded.
 */
export class NotLoadedError extends PluginError {
  constructor(pluginId: string, operation: string) {
    super(pluginId, `not loaded, cannot ${operation}`, 'NOT_LOADED');
    this.name = 'NotLoadedError';
  }
}
