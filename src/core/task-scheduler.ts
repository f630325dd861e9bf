/**
 * Task Scheduler
 *
 * In-process implementation of the Scheduler port shared by all plugins.
 * Supports one-shot (delay or absolute time), fixed-interval and cron
 * tasks; cron tasks are timezone-aware.
 */

import { CronExpressionParser } from 'cron-parser';
import { DateTime, IANAZone } from 'luxon';
import type {
  ScheduledTask,
  ScheduleOptions,
  ScheduleSpec,
  Scheduler,
  TaskHandle,
  TaskTag,
} from '../ports/scheduler.js';
import type { Logger } from '../types/logger.js';
import { errorMessage } from '../utils/errors.js';

/** Longest delay setTimeout accepts */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

interface TaskEntry {
  handle: TaskHandle;
  task: ScheduledTask;
  spec: ScheduleSpec;
  runs: number;
  nextRunAt: Date | null;
  timer: NodeJS.Timeout | null;
  onFinished: ScheduleOptions['onFinished'];
}

/**
 * Snapshot of a pending task.
 */
export interface ScheduledTaskInfo {
  handle: TaskHandle;
  nextRunAt: Date | null;
  runs: number;
}

export class TaskScheduler implements Scheduler {
  private readonly logger: Logger;
  private readonly tasks = new Map<string, TaskEntry>();
  private nextId = 1;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'task-scheduler' });
  }

  /**
   * Validate a spec. Throws if invalid.
   */
  static validateSpec(spec: ScheduleSpec): void {
    if ('delayMs' in spec) {
      if (!Number.isFinite(spec.delayMs) || spec.delayMs < 0) {
        throw new Error(`Invalid delayMs: ${String(spec.delayMs)}`);
      }
    } else if ('at' in spec) {
      if (Number.isNaN(spec.at.getTime())) {
        throw new Error('Invalid at: not a valid date');
      }
    } else if ('intervalMs' in spec) {
      if (!Number.isFinite(spec.intervalMs) || spec.intervalMs <= 0) {
        throw new Error(`Invalid intervalMs: ${String(spec.intervalMs)}`);
      }
    } else {
      if (spec.timezone !== undefined && !IANAZone.isValidZone(spec.timezone)) {
        throw new Error(`Invalid timezone: ${spec.timezone}`);
      }
      const fields = spec.cron.trim().split(/\s+/);
      if (fields.length < 5 || fields.length > 6) {
        throw new Error(`Invalid cron expression: expected 5-6 fields, got ${String(fields.length)}`);
      }
      // Let cron-parser validate the actual syntax
      CronExpressionParser.parse(spec.cron);
    }

    if ('maxRuns' in spec && spec.maxRuns !== undefined) {
      if (!Number.isInteger(spec.maxRuns) || spec.maxRuns < 1) {
        throw new Error(`Invalid maxRuns: ${String(spec.maxRuns)}`);
      }
    }
  }

  schedule(
    task: ScheduledTask,
    spec: ScheduleSpec,
    tag: TaskTag,
    options: ScheduleOptions = {}
  ): TaskHandle {
    TaskScheduler.validateSpec(spec);

    const handle: TaskHandle = Object.freeze({
      id: `task_${String(this.nextId++)}`,
      owner: tag.owner,
      name: tag.name,
    });
    const entry: TaskEntry = {
      handle,
      task,
      spec,
      runs: 0,
      nextRunAt: null,
      timer: null,
      onFinished: options.onFinished,
    };

    this.tasks.set(handle.id, entry);
    this.arm(entry);

    this.logger.debug(
      {
        taskId: handle.id,
        owner: handle.owner,
        task: handle.name,
        nextRunAt: entry.nextRunAt?.toISOString(),
      },
      'Task scheduled'
    );
    return handle;
  }

  cancel(handle: TaskHandle): boolean {
    const entry = this.tasks.get(handle.id);
    if (!entry) {
      return false;
    }
    this.disarm(entry);
    this.tasks.delete(handle.id);
    this.logger.debug({ taskId: handle.id, owner: handle.owner, task: handle.name }, 'Task cancelled');
    return true;
  }

  /**
   * Cancel every task registered by one owner.
   *
   * @returns Number of tasks cancelled
   */
  cancelByOwner(owner: string): number {
    let count = 0;
    for (const entry of [...this.tasks.values()]) {
      if (entry.handle.owner === owner && this.cancel(entry.handle)) {
        count++;
      }
    }
    return count;
  }

  list(owner?: string): ScheduledTaskInfo[] {
    return [...this.tasks.values()]
      .filter((entry) => owner === undefined || entry.handle.owner === owner)
      .map((entry) => ({ handle: entry.handle, nextRunAt: entry.nextRunAt, runs: entry.runs }));
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Cancel everything. The scheduler stays usable.
   */
  stop(): void {
    for (const entry of this.tasks.values()) {
      this.disarm(entry);
    }
    const count = this.tasks.size;
    this.tasks.clear();
    this.logger.debug({ count }, 'Scheduler stopped');
  }

  private arm(entry: TaskEntry): void {
    const next = this.calculateNextRun(entry, new Date());
    if (!next) {
      this.tasks.delete(entry.handle.id);
      this.logger.debug({ taskId: entry.handle.id }, 'Task finished');
      this.notifyFinished(entry);
      return;
    }
    entry.nextRunAt = next;
    this.startTimer(entry);
  }

  private startTimer(entry: TaskEntry): void {
    const target = entry.nextRunAt;
    if (!target) return;

    const delay = Math.max(0, target.getTime() - Date.now());
    entry.timer = setTimeout(() => {
      entry.timer = null;
      if (Date.now() < target.getTime()) {
        // Woke early because the delay was clamped
        this.startTimer(entry);
        return;
      }
      void this.fire(entry);
    }, Math.min(delay, MAX_TIMER_DELAY_MS));
  }

  private notifyFinished(entry: TaskEntry): void {
    try {
      entry.onFinished?.(entry.handle);
    } catch (error) {
      this.logger.error(
        { taskId: entry.handle.id, error: errorMessage(error) },
        'Task finish callback failed'
      );
    }
  }

  private disarm(entry: TaskEntry): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }

  private async fire(entry: TaskEntry): Promise<void> {
    entry.runs++;
    try {
      await entry.task();
    } catch (error) {
      this.logger.error(
        {
          taskId: entry.handle.id,
          owner: entry.handle.owner,
          task: entry.handle.name,
          error: errorMessage(error),
        },
        'Scheduled task failed'
      );
    }

    // Cancelled while running
    if (!this.tasks.has(entry.handle.id)) {
      return;
    }
    this.arm(entry);
  }

  /**
   * Next run time, or null when the task is done.
   */
  private calculateNextRun(entry: TaskEntry, now: Date): Date | null {
    const { spec, runs } = entry;

    if ('delayMs' in spec) {
      return runs === 0 ? new Date(now.getTime() + spec.delayMs) : null;
    }
    if ('at' in spec) {
      return runs === 0 ? spec.at : null;
    }
    if (spec.maxRuns !== undefined && runs >= spec.maxRuns) {
      return null;
    }
    if ('intervalMs' in spec) {
      return new Date(now.getTime() + spec.intervalMs);
    }

    const timezone = spec.timezone ?? 'UTC';
    const cron = CronExpressionParser.parse(spec.cron, { currentDate: now, tz: timezone });
    const next = cron.next().toDate();
    this.logger.trace(
      {
        taskId: entry.handle.id,
        nextLocal: DateTime.fromJSDate(next, { zone: timezone }).toISO(),
      },
      'Cron task advanced'
    );
    return next;
  }
}

/**
 * Factory function for creating a task scheduler.
 */
export function createTaskScheduler(logger: Logger): TaskScheduler {
  return new TaskScheduler(logger);
}
