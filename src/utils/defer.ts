import { setImmediate } from 'node:timers/promises';

/**
 * Run a synchronous function on a later turn of the event loop and await it.
 *
 * Used for plugin sync hooks so they never execute inside the caller's
 * stack; a throw becomes a rejection of the returned promise.
 */
export async function runDeferred<T>(fn: () => T): Promise<T> {
  await setImmediate();
  return fn();
}
