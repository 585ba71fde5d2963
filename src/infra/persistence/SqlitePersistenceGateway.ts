import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Job, JobStatus } from '../../domain/entities/Job.js';
import type { JobEvent } from '../../domain/entities/JobEvent.js';
import type { CompanyProfile } from '../../domain/entities/CompanyProfile.js';
import type { SuggestionDraft, SuggestionSet } from '../../domain/entities/SuggestionSet.js';
import { isTerminalStatus } from '../../domain/entities/Job.js';
import { createSuggestionSet } from '../../domain/entities/SuggestionSet.js';
import { PersistenceError } from '../../domain/errors.js';
import { JobRepository } from '../repositories/JobRepository.js';
import { JobEventRepository } from '../repositories/JobEventRepository.js';
import { CompanyProfileRepository } from '../repositories/CompanyProfileRepository.js';
import { SuggestionSetRepository } from '../repositories/SuggestionSetRepository.js';
import type { JobListQuery, JobStatusUpdate, PersistenceGateway } from './PersistenceGateway.js';

/**
 * SQLite-backed persistence gateway
 * Statements run synchronously inside better-sqlite3 transactions; the async
 * signatures let other stores sit behind the same interface.
 */
export class SqlitePersistenceGateway implements PersistenceGateway {
  private jobRepo: JobRepository;
  private eventRepo: JobEventRepository;
  private profileRepo: CompanyProfileRepository;
  private suggestionRepo: SuggestionSetRepository;

  constructor(private db: DatabaseAdapter) {
    this.jobRepo = new JobRepository(db);
    this.eventRepo = new JobEventRepository(db);
    this.profileRepo = new CompanyProfileRepository(db);
    this.suggestionRepo = new SuggestionSetRepository(db);
  }

  async createJob(job: Job): Promise<void> {
    this.db.transaction(() => {
      this.jobRepo.create(job);
      this.eventRepo.record({
        id: randomUUID(),
        jobId: job.id,
        status: job.status,
        message: 'Job created',
      });
    });
  }

  async getJob(jobId: string): Promise<Job | null> {
    return this.jobRepo.getById(jobId);
  }

  async listJobs(query: JobListQuery): Promise<Job[]> {
    return this.jobRepo.list(query);
  }

  async listActiveJobs(updatedBefore: Date): Promise<Job[]> {
    return this.jobRepo.listActiveUpdatedBefore(updatedBefore);
  }

  async listJobEvents(jobId: string): Promise<JobEvent[]> {
    return this.eventRepo.listByJob(jobId);
  }

  async saveProfile(jobId: string, profile: CompanyProfile): Promise<string> {
    return this.db.transaction(() => {
      const job = this.requireJob(jobId);
      if (job.profileId) {
        throw new PersistenceError(`Job ${jobId} already has a profile`, {
          jobId,
          profileId: job.profileId,
        });
      }
      this.profileRepo.create({ ...profile, jobId });
      this.jobRepo.linkProfile(jobId, profile.id, new Date());
      return profile.id;
    });
  }

  async getProfile(profileId: string): Promise<CompanyProfile | null> {
    return this.profileRepo.getById(profileId);
  }

  async saveSuggestions(jobId: string, draft: SuggestionDraft): Promise<string> {
    return this.db.transaction(() => {
      this.requireJob(jobId);
      const set = createSuggestionSet({
        id: randomUUID(),
        jobId,
        version: this.suggestionRepo.nextVersion(jobId),
        draft,
      });
      this.suggestionRepo.create(set);
      return set.id;
    });
  }

  async getSuggestionSet(suggestionSetId: string): Promise<SuggestionSet | null> {
    return this.suggestionRepo.getById(suggestionSetId);
  }

  async findLatestSuggestionSetForJob(jobId: string): Promise<SuggestionSet | null> {
    return this.suggestionRepo.findLatestForJob(jobId);
  }

  async findLatestCompletedSuggestionSet(companyDomain: string): Promise<SuggestionSet | null> {
    return this.suggestionRepo.findLatestCompletedForDomain(companyDomain);
  }

  async updateJobStatus(
    jobId: string,
    status: JobStatus,
    update: JobStatusUpdate = {}
  ): Promise<Job> {
    return this.db.transaction(() => {
      const current = this.requireJob(jobId);
      if (isTerminalStatus(current.status)) {
        throw new PersistenceError(`Job ${jobId} is already ${current.status}`, {
          jobId,
          status: current.status,
          requested: status,
        });
      }

      const now = new Date();
      this.jobRepo.updateStatus({
        jobId,
        status,
        updatedAt: now,
        completedAt: isTerminalStatus(status) ? now : null,
        errorClassification: update.error?.classification ?? null,
        errorMessage: update.error?.message ?? null,
        suggestionSetId: update.resultRef ?? null,
      });
      this.eventRepo.record({
        id: randomUUID(),
        jobId,
        status,
        message: update.message ?? update.error?.message ?? null,
      });

      return this.requireJob(jobId);
    });
  }

  async requestCancellation(jobId: string): Promise<boolean> {
    return this.db.transaction(() => {
      this.requireJob(jobId);
      return this.jobRepo.markCancelRequested(jobId);
    });
  }

  private requireJob(jobId: string): Job {
    const job = this.jobRepo.getById(jobId);
    if (!job) {
      throw new PersistenceError(`Job ${jobId} not found`, { jobId });
    }
    return job;
  }
}
