import { EventEmitter } from 'node:events';
import type { Job, JobStatus } from '../domain/entities/Job.js';
import { errorMessage } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export type JobEventPayload = {
  job: Job;
  status: JobStatus;
  event: 'created' | 'status';
  timestamp: string;
};

type JobListener = (payload: JobEventPayload) => void;

/**
 * In-process fan-out of committed job transitions
 */
export class JobEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  onJob(listener: JobListener): void {
    this.emitter.on('job', listener);
  }

  offJob(listener: JobListener): void {
    this.emitter.off('job', listener);
  }

  /**
   * Deliver to every listener; a listener that throws is logged and skipped
   */
  publish(job: Job, event: JobEventPayload['event']): void {
    const payload: JobEventPayload = {
      job,
      status: job.status,
      event,
      timestamp: new Date().toISOString(),
    };

    for (const listener of this.emitter.listeners('job')) {
      try {
        listener(payload);
      } catch (error) {
        logger.warn('Job event listener failed', {
          jobId: job.id,
          status: job.status,
          error: errorMessage(error),
        });
      }
    }
  }
}
