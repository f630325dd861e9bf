/**
 * Scheduler Port
 *
 * Timed callbacks shared by all plugins. Every registration carries a tag
 * naming its owner so a plugin's tasks can be cancelled in bulk.
 */

/**
 * Callback fired by the scheduler.
 */
export type ScheduledTask = () => void | Promise<void>;

/**
 * When a task fires.
 */
export type ScheduleSpec =
  /** Once, after a delay */
  | { delayMs: number }
  /** Once, at an absolute time */
  | { at: Date }
  /** Repeatedly, every intervalMs (first fire after one interval) */
  | { intervalMs: number; maxRuns?: number }
  /** On a cron expression, optionally in an IANA timezone */
  | { cron: string; timezone?: string; maxRuns?: number };

/**
 * Identifies who registered a task.
 */
export interface TaskTag {
  /** Owning plugin name */
  owner: string;
  /** Task name, unique per owner */
  name: string;
}

/**
 * Opaque handle returned by schedule().
 */
export interface TaskHandle extends TaskTag {
  readonly id: string;
}

/**
 * Per-registration callbacks.
 */
export interface ScheduleOptions {
  /** Called once the task has run for the last time (not on cancel) */
  onFinished?: (handle: TaskHandle) => void;
}

export interface Scheduler {
  schedule(
    task: ScheduledTask,
    spec: ScheduleSpec,
    tag: TaskTag,
    options?: ScheduleOptions
  ): TaskHandle;

  /**
   * Cancel a task.
   * Returns true if it was still pending.
   */
  cancel(handle: TaskHandle): boolean;
}
