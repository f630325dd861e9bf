/**
 * Function Registry
 *
 * Per-plugin table of funcs. Every registration path goes through
 * registerFunc(), which enforces unique names and mirrors the entry into
 * the host's event bus.
 */

import type { EventRegistrar } from '../ports/event-registrar.js';
import type { Logger } from '../types/logger.js';
import { PermissionGroup } from '../types/message.js';
import {
  DEFAULT_FUNC_NAME,
  type Func,
  type FuncHandler,
  type FuncOptions,
  type FuncSpec,
} from '../types/plugin.js';
import { DuplicateNameError, ValidationError } from './plugin-errors.js';

export interface FunctionRegistryOptions {
  pluginName: string;
  registrar: EventRegistrar;
  logger: Logger;
}

export class FunctionRegistry {
  private readonly pluginName: string;
  private readonly registrar: EventRegistrar;
  private readonly logger: Logger;
  private funcs: Func[] = [];

  constructor(options: FunctionRegistryOptions) {
    this.pluginName = options.pluginName;
    this.registrar = options.registrar;
    this.logger = options.logger.child({ component: 'function-registry', plugin: options.pluginName });
  }

  get size(): number {
    return this.funcs.length;
  }

  /**
   * Register a func any sender may trigger.
   *
   * @throws ValidationError if neither filter nor rawMessageFilter is given
   * @throws DuplicateNameError if the name is taken
   */
  registerUserFunc(name: string, handler: FuncHandler, options: FuncOptions = {}): Func {
    this.requireFilter(name, options);
    return this.registerFunc({ ...options, name, handler, permission: PermissionGroup.USER });
  }

  /**
   * Register a func only admin senders may trigger.
   *
   * @throws ValidationError if neither filter nor rawMessageFilter is given
   * @throws DuplicateNameError if the name is taken
   */
  registerAdminFunc(name: string, handler: FuncHandler, options: FuncOptions = {}): Func {
    this.requireFilter(name, options);
    return this.registerFunc({ ...options, name, handler, permission: PermissionGroup.ADMIN });
  }

  /**
   * Register the fallback func, run when none of the plugin's other funcs
   * match a message.
   */
  registerDefaultFunc(
    handler: FuncHandler,
    permission: PermissionGroup = PermissionGroup.USER
  ): Func {
    return this.registerFunc({ name: DEFAULT_FUNC_NAME, handler, permission, permissionRaise: false });
  }

  /**
   * Registration primitive.
   *
   * @throws DuplicateNameError if the name is taken
   * @throws ValidationError if the name is blank or rawMessageFilter is not a valid pattern
   */
  registerFunc(spec: FuncSpec): Func {
    if (spec.name.trim() === '') {
      throw new ValidationError(this.pluginName, 'function name must not be empty');
    }
    if (this.has(spec.name)) {
      throw new DuplicateNameError(this.pluginName, spec.name);
    }
    if (typeof spec.rawMessageFilter === 'string') {
      this.assertValidPattern(spec.name, spec.rawMessageFilter);
    }

    const func: Func = Object.freeze({
      name: spec.name,
      pluginName: this.pluginName,
      handler: spec.handler,
      filter: spec.filter ?? null,
      rawMessageFilter: spec.rawMessageFilter ?? null,
      permission: spec.permission,
      permissionRaise: spec.permissionRaise ?? false,
    });

    this.registrar.register(func);
    this.funcs.push(func);

    this.logger.debug({ func: func.name, permission: func.permission }, 'Function registered');
    return func;
  }

  /**
   * Remove every func from this table and from the event bus.
   *
   * @returns Number of funcs removed
   */
  unregisterAll(): number {
    if (this.funcs.length === 0) {
      return 0;
    }

    const removed = this.funcs;
    this.funcs = [];
    for (const func of removed) {
      this.registrar.unregister(func);
    }

    this.logger.debug({ count: removed.length }, 'All functions unregistered');
    return removed.length;
  }

  has(name: string): boolean {
    return this.funcs.some((func) => func.name === name);
  }

  get(name: string): Func | undefined {
    return this.funcs.find((func) => func.name === name);
  }

  list(): readonly Func[] {
    return [...this.funcs];
  }

  private requireFilter(name: string, options: FuncOptions): void {
    if (options.filter === undefined && options.rawMessageFilter === undefined) {
      throw new ValidationError(
        this.pluginName,
        `function "${name}": a non-default function needs at least one filter`
      );
    }
  }

  private assertValidPattern(name: string, pattern: string): void {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ValidationError(
        this.pluginName,
        `function "${name}": invalid rawMessageFilter (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }
}
