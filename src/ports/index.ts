/**
 * Ports - the narrow interfaces the plugin core consumes from its host.
 */

export type { BotApi } from './bot-api.js';
export type { EventRegistrar } from './event-registrar.js';
export type { PersistenceEngine } from './persistence.js';
export type {
  Scheduler,
  ScheduledTask,
  ScheduleOptions,
  ScheduleSpec,
  TaskHandle,
  TaskTag,
} from './scheduler.js';
