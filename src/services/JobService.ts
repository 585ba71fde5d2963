import { randomUUID } from 'node:crypto';
import type { Job, JobStatus } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { canTransition, createJob } from '../domain/entities/Job.js';
import { InvalidTransitionError, NotFoundError } from '../domain/errors.js';
import type {
  JobListQuery,
  JobStatusUpdate,
  PersistenceGateway,
} from '../infra/persistence/PersistenceGateway.js';
import { logger } from '../infra/logger.js';
import type { JobEventBus } from './JobEventBus.js';

/**
 * JobService - job records and their status transitions
 * Orchestration lives in JobOrchestrator; this only guards and commits moves.
 */
export class JobService {
  constructor(
    private gateway: PersistenceGateway,
    private eventBus: JobEventBus
  ) {}

  async createJob(params: {
    companyIdentifier: string;
    campaignGoal?: string | null;
    notifyEmail?: string | null;
    parentJobId?: string | null;
  }): Promise<Job> {
    const job = createJob({
      id: randomUUID(),
      companyIdentifier: params.companyIdentifier,
      campaignGoal: params.campaignGoal,
      notifyEmail: params.notifyEmail,
      parentJobId: params.parentJobId,
    });

    await this.gateway.createJob(job);
    logger.info('Job created', {
      jobId: job.id,
      company: job.companyIdentifier,
      parentJobId: job.parentJobId,
    });
    this.eventBus.publish(job, 'created');
    return job;
  }

  async getJob(jobId: string): Promise<Job> {
    const job = await this.gateway.getJob(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  async listJobs(query: JobListQuery): Promise<Job[]> {
    return this.gateway.listJobs(query);
  }

  async listJobEvents(jobId: string): Promise<JobEvent[]> {
    await this.getJob(jobId);
    return this.gateway.listJobEvents(jobId);
  }

  /**
   * Move a job to `to`, checking the state graph against the stored status
   */
  async transition(jobId: string, to: JobStatus, update: JobStatusUpdate = {}): Promise<Job> {
    const current = await this.getJob(jobId);
    this.assertTransition(current.status, to);

    const job = await this.gateway.updateJobStatus(jobId, to, update);
    logger.info('Job status changed', {
      jobId,
      from: current.status,
      to,
      ...(update.error ? { classification: update.error.classification } : {}),
    });
    this.eventBus.publish(job, 'status');
    return job;
  }

  /**
   * Flag a job for cancellation; false when it already finished
   */
  async requestCancellation(jobId: string): Promise<boolean> {
    await this.getJob(jobId);
    const flagged = await this.gateway.requestCancellation(jobId);
    if (flagged) {
      logger.info('Job cancellation requested', { jobId });
    }
    return flagged;
  }

  private assertTransition(from: JobStatus, to: JobStatus): void {
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }
  }
}
