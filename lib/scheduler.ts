import logger from './logger';

const schedulerLogger = logger.child({ component: 'scheduler' });

type TaskFn = () => void | Promise<void>;

type Task = {
  id: string;
  fn: TaskFn;
  scheduledTime: number;
  /** Set for recurring tasks */
  intervalMs: number | null;
  timeout: NodeJS.Timeout;
};

export interface ScheduledTask {
  id: string;
  scheduledTime: number;
  recurring: boolean;
}

/**
 * Keyed timers. Scheduling an id that already exists replaces it.
 */
export default class TaskScheduler {
  private tasks: Map<string, Task> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  private run(id: string, fn: TaskFn): void {
    Promise.resolve()
      .then(fn)
      .catch((error: unknown) => schedulerLogger.error({ err: error, taskId: id }, 'Scheduled task failed'));
  }

  schedule(id: string, fn: TaskFn, delayMinutes: number): void {
    this.cancel(id);
    const delayMs = delayMinutes * 60 * 1000;

    const timeout = setTimeout(() => {
      this.tasks.delete(id);
      this.run(id, fn);
    }, delayMs);

    this.tasks.set(id, { id, fn, scheduledTime: this.now() + delayMs, intervalMs: null, timeout });
  }

  /**
   * Run `fn` every `intervalMinutes` until cancelled. The first run happens one
   * interval from now.
   */
  every(id: string, fn: TaskFn, intervalMinutes: number): void {
    this.cancel(id);
    const intervalMs = intervalMinutes * 60 * 1000;

    const arm = () => {
      const timeout = setTimeout(() => {
        arm();
        this.run(id, fn);
      }, intervalMs);
      this.tasks.set(id, { id, fn, scheduledTime: this.now() + intervalMs, intervalMs, timeout });
    };
    arm();
  }

  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (task) {
      clearTimeout(task.timeout);
      this.tasks.delete(id);
      return true;
    }
    return false;
  }

  cancelAll(): void {
    for (const id of Array.from(this.tasks.keys())) {
      this.cancel(id);
    }
  }

  getTimeRemaining(id: string): number | null {
    const task = this.tasks.get(id);
    if (task) {
      return Math.max(0, task.scheduledTime - this.now());
    }
    return null;
  }

  getAllTasks(): ScheduledTask[] {
    return Array.from(this.tasks.values()).map(({ id, scheduledTime, intervalMs }) => ({
      id,
      scheduledTime,
      recurring: intervalMs !== null,
    }));
  }
}
