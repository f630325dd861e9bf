/**
 * Event Registrar Port
 *
 * The part of the host's event bus a plugin needs: adding and removing its
 * funcs from the dispatch index. Dispatch itself belongs to the bus.
 */

import type { Func } from '../types/plugin.js';

export interface EventRegistrar {
  register(func: Func): void;

  /**
   * Remove a func from the dispatch index.
   * Returns true if it was registered.
   */
  unregister(func: Func): boolean;
}
