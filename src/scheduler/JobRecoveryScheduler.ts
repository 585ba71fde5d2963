import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { JobRecoveryService } from '../services/JobRecoveryService.js';
import { errorMessage } from '../domain/errors.js';

type RecoverySweep = Pick<JobRecoveryService, 'resumeStaleJobs'>;

export interface RecoverySchedule {
  intervalMinutes: number;
  staleMinutes: number;
}

/**
 * JobRecoveryScheduler - periodic sweep for jobs left behind mid-pipeline
 */
export class JobRecoveryScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private schedule: RecoverySchedule,
    private recoveryService: RecoverySweep
  ) {}

  start(): void {
    const { intervalMinutes, staleMinutes } = this.schedule;
    const cronExpression = `*/${intervalMinutes} * * * *`;

    this.task = cron.schedule(cronExpression, async () => {
      await this.sweep();
    });

    logger.info('JobRecoveryScheduler started', { intervalMinutes, staleMinutes, cronExpression });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('JobRecoveryScheduler stopped');
    }
  }

  async sweep(): Promise<void> {
    try {
      await this.recoveryService.resumeStaleJobs(this.schedule.staleMinutes);
    } catch (error) {
      logger.error('Recovery sweep failed', { error: errorMessage(error) });
    }
  }
}

export function startRecoveryScheduler(
  schedule: RecoverySchedule,
  recoveryService: RecoverySweep
): JobRecoveryScheduler {
  const scheduler = new JobRecoveryScheduler(schedule, recoveryService);
  scheduler.start();
  return scheduler;
}
