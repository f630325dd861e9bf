import type { EventRegistrar } from '../ports/event-registrar.js';
import type { Logger } from '../types/logger.js';
import { hasPermission, type IncomingMessage } from '../types/message.js';
import { DEFAULT_FUNC_NAME, type Func, type RawMessageFilter } from '../types/plugin.js';
import { errorMessage } from '../utils/errors.js';
import { PermissionDeniedError } from './plugin-errors.js';

/**
 * Outcome of dispatching one message.
 */
export interface DispatchResult {
  /** `plugin.func` keys whose handlers ran */
  invoked: string[];
  /** `plugin.func` keys that matched but were skipped for lack of permission */
  denied: string[];
  /** `plugin.func` keys whose handlers threw or rejected */
  failed: string[];
}

/**
 * Internal registration record.
 */
interface Registration {
  func: Func;
  /** Sticky pattern compiled from rawMessageFilter, matched at index 0 */
  pattern: RegExp | null;
}

function compilePattern(filter: RawMessageFilter | null): RegExp | null {
  if (filter === null) return null;
  if (typeof filter === 'string') return new RegExp(filter, 'y');
  return new RegExp(filter.source, filter.flags.replace(/[gy]/g, '') + 'y');
}

function funcKey(func: Func): string {
  return `${func.pluginName}.${func.name}`;
}

/**
 * FuncEventBus - in-process dispatch index for plugin funcs.
 *
 * A func matches a message when its raw-message pattern matches at the
 * start of the raw text and its filter predicate (if any) returns true.
 * Matching funcs run only if the sender's permission covers theirs; a
 * denied func with permissionRaise set aborts the dispatch with
 * PermissionDeniedError before any handler runs.
 *
 * A plugin's "default" func runs when none of that plugin's other funcs
 * matched the message.
 */
export class FuncEventBus implements EventRegistrar {
  private registrations: Registration[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'event-bus' });
  }

  register(func: Func): void {
    this.registrations.push({ func, pattern: compilePattern(func.rawMessageFilter) });
    this.logger.debug({ func: funcKey(func) }, 'Function registered with bus');
  }

  unregister(func: Func): boolean {
    const index = this.registrations.findIndex((r) => r.func === func);
    if (index < 0) {
      return false;
    }
    this.registrations.splice(index, 1);
    this.logger.debug({ func: funcKey(func) }, 'Function removed from bus');
    return true;
  }

  /**
   * Deliver a message to every matching, permitted func.
   *
   * @throws PermissionDeniedError if a matching func with permissionRaise denies the sender
   */
  async dispatch(message: IncomingMessage): Promise<DispatchResult> {
    const result: DispatchResult = { invoked: [], denied: [], failed: [] };
    const toRun: Func[] = [];
    const matchedPlugins = new Set<string>();

    for (const registration of this.registrations) {
      const { func } = registration;
      if (func.name === DEFAULT_FUNC_NAME || !this.matches(registration, message)) {
        continue;
      }
      matchedPlugins.add(func.pluginName);

      if (!hasPermission(message.sender.permission, func.permission)) {
        if (func.permissionRaise) {
          throw new PermissionDeniedError(func.pluginName, func.name, message.sender.id);
        }
        result.denied.push(funcKey(func));
        continue;
      }
      toRun.push(func);
    }

    for (const { func } of this.registrations) {
      if (func.name !== DEFAULT_FUNC_NAME || matchedPlugins.has(func.pluginName)) {
        continue;
      }
      if (hasPermission(message.sender.permission, func.permission)) {
        toRun.push(func);
      } else {
        result.denied.push(funcKey(func));
      }
    }

    if (result.denied.length > 0) {
      this.logger.debug(
        { sender: message.sender.id, denied: result.denied },
        'Functions skipped for insufficient permission'
      );
    }

    // Wrap in Promise.resolve to handle both sync and async handlers
    const outcomes = await Promise.allSettled(
      toRun.map((func) => Promise.resolve().then(() => func.handler(message)))
    );

    outcomes.forEach((outcome, index) => {
      const func = toRun[index];
      if (!func) return;
      if (outcome.status === 'fulfilled') {
        result.invoked.push(funcKey(func));
      } else {
        result.failed.push(funcKey(func));
        this.logger.error(
          {
            func: funcKey(func),
            error: errorMessage(outcome.reason),
          },
          'Function handler failed'
        );
      }
    });

    return result;
  }

  /**
   * Registered funcs, optionally only those of one plugin.
   */
  list(pluginName?: string): Func[] {
    return this.registrations
      .map((r) => r.func)
      .filter((func) => pluginName === undefined || func.pluginName === pluginName);
  }

  get size(): number {
    return this.registrations.length;
  }

  clear(): void {
    this.registrations = [];
    this.logger.debug('All functions cleared from bus');
  }

  private matches(registration: Registration, message: IncomingMessage): boolean {
    const { func, pattern } = registration;

    if (pattern) {
      pattern.lastIndex = 0;
      if (!pattern.test(message.rawMessage)) {
        return false;
      }
    }

    if (func.filter) {
      try {
        return func.filter(message);
      } catch (error) {
        this.logger.error(
          { func: funcKey(func), error: errorMessage(error) },
          'Function filter threw; treating as no match'
        );
        return false;
      }
    }

    return true;
  }
}

/**
 * Factory function for creating an event bus.
 */
export function createEventBus(logger: Logger): FuncEventBus {
  return new FuncEventBus(logger);
}
