/**
 * Scheduler Binding
 *
 * Registers a plugin's timed tasks with the shared scheduler, tagged with
 * the plugin name, and keeps their handles so unload can cancel them all.
 * A task's name is freed when the scheduler reports its last run.
 */

import type {
  ScheduledTask,
  ScheduleSpec,
  Scheduler,
  TaskHandle,
} from '../ports/scheduler.js';
import type { Logger } from '../types/logger.js';
import { DuplicateNameError } from './plugin-errors.js';

function isOneShot(spec: ScheduleSpec): boolean {
  return 'delayMs' in spec || 'at' in spec;
}

export class SchedulerBinding {
  private readonly pluginName: string;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly handles = new Map<string, TaskHandle>();

  constructor(pluginName: string, scheduler: Scheduler, logger: Logger) {
    this.pluginName = pluginName;
    this.scheduler = scheduler;
    this.logger = logger.child({ component: 'scheduler-binding', plugin: pluginName });
  }

  /**
   * Schedule a task under a name unique within this plugin.
   * One-shot tasks free their name as they fire, so the task may schedule
   * itself again; others free it after their final run.
   *
   * @throws DuplicateNameError if a task with this name is still tracked
   */
  addScheduledTask(name: string, task: ScheduledTask, spec: ScheduleSpec): TaskHandle {
    if (this.handles.has(name)) {
      throw new DuplicateNameError(this.pluginName, name, 'scheduled task');
    }

    const oneShot = isOneShot(spec);
    const release = (): void => {
      if (this.handles.get(name) === handle) {
        this.handles.delete(name);
      }
    };
    const run: ScheduledTask = () => {
      if (oneShot) release();
      return task();
    };

    const handle = this.scheduler.schedule(
      run,
      spec,
      { owner: this.pluginName, name },
      {
        onFinished: () => {
          release();
          this.logger.debug({ task: name }, 'Scheduled task finished');
        },
      }
    );
    this.handles.set(name, handle);

    this.logger.debug({ task: name, handleId: handle.id }, 'Scheduled task added');
    return handle;
  }

  /**
   * Cancel a task by name.
   *
   * @returns true if a task with this name was tracked
   */
  removeScheduledTask(name: string): boolean {
    const handle = this.handles.get(name);
    if (!handle) {
      return false;
    }
    this.handles.delete(name);
    this.scheduler.cancel(handle);
    this.logger.debug({ task: name }, 'Scheduled task removed');
    return true;
  }

  /**
   * Cancel every tracked task.
   *
   * @returns Number of tasks cancelled
   */
  cancelAll(): number {
    const handles = [...this.handles.values()];
    this.handles.clear();
    for (const handle of handles) {
      this.scheduler.cancel(handle);
    }
    if (handles.length > 0) {
      this.logger.debug({ count: handles.length }, 'All scheduled tasks cancelled');
    }
    return handles.length;
  }

  list(): readonly TaskHandle[] {
    return [...this.handles.values()];
  }
}
