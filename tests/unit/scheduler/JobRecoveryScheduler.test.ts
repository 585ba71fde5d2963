import { beforeEach, describe, expect, it, vi } from 'vitest';
import { JobRecoveryScheduler } from '../../../src/scheduler/JobRecoveryScheduler.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const cronMock = vi.hoisted(() => {
  const task = { stop: vi.fn() };
  return {
    task,
    schedule: vi.fn((_expression: string, _callback: () => Promise<void>) => task),
  };
});

vi.mock('node-cron', () => ({ default: { schedule: cronMock.schedule } }));

describe('JobRecoveryScheduler', () => {
  const resumeStaleJobs = vi.fn(async (_staleMinutes: number) => ['job-1']);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sweeps on a minute interval with the configured staleness', async () => {
    const scheduler = new JobRecoveryScheduler(
      { intervalMinutes: 5, staleMinutes: 10 },
      { resumeStaleJobs }
    );

    scheduler.start();

    expect(cronMock.schedule).toHaveBeenCalledOnce();
    const [expression, callback] = cronMock.schedule.mock.calls[0];
    expect(expression).toBe('*/5 * * * *');

    await callback();
    expect(resumeStaleJobs).toHaveBeenCalledWith(10);
  });

  it('logs a failed sweep instead of throwing', async () => {
    resumeStaleJobs.mockRejectedValueOnce(new Error('database is locked'));
    const scheduler = new JobRecoveryScheduler(
      { intervalMinutes: 5, staleMinutes: 10 },
      { resumeStaleJobs }
    );

    await scheduler.sweep();

    expect(loggerMock.logger.error).toHaveBeenCalledWith('Recovery sweep failed', {
      error: 'database is locked',
    });
  });

  it('stops the cron task once', () => {
    const scheduler = new JobRecoveryScheduler(
      { intervalMinutes: 1, staleMinutes: 1 },
      { resumeStaleJobs }
    );
    scheduler.start();

    scheduler.stop();
    scheduler.stop();

    expect(cronMock.task.stop).toHaveBeenCalledOnce();
  });
});
