import { logger } from '../utils/logger';
import { errorMessage } from '../utils/formatError';

export type ScheduledTask = () => Promise<void> | void;

export interface TaskScheduler {
  register(name: string, intervalMs: number, task: ScheduledTask): void;
  start(): void;
  stop(): Promise<void>;
}

interface Registration {
  name: string;
  intervalMs: number;
  task: ScheduledTask;
  timer: NodeJS.Timeout | null;
  running: boolean;
}

/**
 * Runs named callbacks on fixed intervals. A run still in flight when the
 * next interval fires is skipped rather than overlapped.
 */
export class IntervalTaskScheduler implements TaskScheduler {
  private readonly tasks = new Map<string, Registration>();
  private started = false;

  register(name: string, intervalMs: number, task: ScheduledTask) {
    if (this.tasks.has(name)) {
      throw new Error(`task_already_registered:${name}`);
    }
    const registration: Registration = { name, intervalMs, task, timer: null, running: false };
    this.tasks.set(name, registration);
    if (this.started) this.schedule(registration);
  }

  start() {
    if (this.started) return;
    this.started = true;
    for (const registration of this.tasks.values()) {
      this.schedule(registration);
    }
  }

  async stop() {
    this.started = false;
    for (const registration of this.tasks.values()) {
      if (registration.timer) {
        clearInterval(registration.timer);
        registration.timer = null;
      }
    }
  }

  /** Runs one task immediately; used by tests and operator tooling. */
  async runNow(name: string) {
    const registration = this.tasks.get(name);
    if (!registration) {
      throw new Error(`task_not_found:${name}`);
    }
    await this.execute(registration);
  }

  private schedule(registration: Registration) {
    registration.timer = setInterval(() => {
      void this.execute(registration);
    }, registration.intervalMs);
  }

  private async execute(registration: Registration) {
    if (registration.running) {
      logger.warn('scheduled_task_overlap_skipped', { event: 'scheduled_task_overlap_skipped', task: registration.name });
      return;
    }
    registration.running = true;
    const startedAt = Date.now();
    try {
      await registration.task();
      logger.debug('scheduled_task_completed', {
        event: 'scheduled_task_completed',
        task: registration.name,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      logger.error('scheduled_task_failed', {
        event: 'scheduled_task_failed',
        task: registration.name,
        error: errorMessage(error),
      });
    } finally {
      registration.running = false;
    }
  }
}
