import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IntervalTaskScheduler } from '../../src/jobs/taskScheduler';

describe('IntervalTaskScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs registered tasks on their interval until stopped', async () => {
    const scheduler = new IntervalTaskScheduler();
    const summary = vi.fn();
    const prune = vi.fn();
    scheduler.register('summary', 1_000, summary);
    scheduler.register('prune', 5_000, prune);

    await vi.advanceTimersByTimeAsync(3_000);
    expect(summary).not.toHaveBeenCalled();

    scheduler.start();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(summary).toHaveBeenCalledTimes(5);
    expect(prune).toHaveBeenCalledTimes(1);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(summary).toHaveBeenCalledTimes(5);
  });

  it('schedules tasks registered after start', async () => {
    const scheduler = new IntervalTaskScheduler();
    scheduler.start();
    const task = vi.fn();
    scheduler.register('late', 1_000, task);

    await vi.advanceTimersByTimeAsync(1_000);

    expect(task).toHaveBeenCalledTimes(1);
    await scheduler.stop();
  });

  it('skips a run while the previous one is still in flight', async () => {
    const scheduler = new IntervalTaskScheduler();
    let calls = 0;
    scheduler.register('slow', 1_000, async () => {
      calls += 1;
      await new Promise<void>((resolve) => setTimeout(resolve, 2_500));
    });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(3_000);
    expect(calls).toBe(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(calls).toBe(2);
    await scheduler.stop();
  });

  it('keeps scheduling after a task throws', async () => {
    const scheduler = new IntervalTaskScheduler();
    const task = vi.fn<[], Promise<void>>().mockRejectedValueOnce(new Error('db_down')).mockResolvedValue(undefined);
    scheduler.register('flaky', 1_000, task);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(2_000);

    expect(task).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });

  it('rejects duplicate names and unknown tasks', async () => {
    const scheduler = new IntervalTaskScheduler();
    scheduler.register('summary', 1_000, () => undefined);

    expect(() => scheduler.register('summary', 1_000, () => undefined)).toThrow('task_already_registered:summary');
    await expect(scheduler.runNow('missing')).rejects.toThrow('task_not_found:missing');
  });
});
