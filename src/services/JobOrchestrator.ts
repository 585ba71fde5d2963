import type { Env } from '../infra/env.js';
import type { CompanyProfile } from '../domain/entities/CompanyProfile.js';
import type { Job, JobStage, JobStatus } from '../domain/entities/Job.js';
import { isTerminalStatus } from '../domain/entities/Job.js';
import type { SuggestionDraft } from '../domain/entities/SuggestionSet.js';
import {
  CancelledError,
  DependencyError,
  GenerationUnavailableError,
  NotFoundError,
  NotifyError,
  PersistenceError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../domain/errors.js';
import type { PipelineError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { NotificationOutcome, Notifier } from '../infra/notify/Notifier.js';
import type { JobStatusUpdate, PersistenceGateway } from '../infra/persistence/PersistenceGateway.js';
import { sleep as defaultSleep, withTimeout } from '../infra/withTimeout.js';
import type { JobService } from './JobService.js';
import type { ProfileExtractor } from './ProfileExtractor.js';
import type { SuggestionGenerator } from './SuggestionGenerator.js';

/** Per-run bookkeeping shared between the stage loop and failure handling */
type RunState = { successNotified: boolean };

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
}

export interface OrchestratorConfig {
  readonly retry: RetryPolicy;
  readonly notifyTimeoutMs: number;
  readonly persistenceTimeoutMs: number;
}

export function createOrchestratorConfig(env: Env): OrchestratorConfig {
  return Object.freeze({
    retry: Object.freeze({
      maxAttempts: env.GENERATION_MAX_ATTEMPTS,
      backoffBaseMs: env.GENERATION_BACKOFF_BASE_MS,
      backoffMaxMs: env.GENERATION_BACKOFF_MAX_MS,
    }),
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    persistenceTimeoutMs: env.PERSISTENCE_TIMEOUT_MS,
  });
}

/**
 * Delay before retry number `attempt` (1-based): base, 2*base, 4*base... capped
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffBaseMs * 2 ** (attempt - 1), policy.backoffMaxMs);
}

export interface SubmitJobParams {
  companyIdentifier: string;
  campaignGoal?: string | null;
  notifyEmail?: string | null;
}

type ProfileSource = Pick<ProfileExtractor, 'validate' | 'extract'>;
type SuggestionSource = Pick<SuggestionGenerator, 'generate'>;

/**
 * JobOrchestrator - drives a job through
 * queued -> extracting -> generating -> persisting -> notifying -> completed,
 * or to failed with a classification.
 *
 * Each stage's output is stored before the status moves past it, so a job
 * picked up again resumes from its stored status. Runs of the same job are
 * chained and never overlap.
 */
export class JobOrchestrator {
  private inFlight = new Map<string, Promise<void>>();

  constructor(
    private jobService: JobService,
    private gateway: PersistenceGateway,
    private extractor: ProfileSource,
    private generator: SuggestionSource,
    private notifier: Notifier,
    private config: OrchestratorConfig,
    private sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  /**
   * Create a queued job and start it in the background
   */
  async submit(params: SubmitJobParams): Promise<Job> {
    return this.enqueue({ ...params, parentJobId: null });
  }

  /**
   * Start a new job with the input of a failed one
   */
  async retry(jobId: string): Promise<Job> {
    const job = await this.jobService.getJob(jobId);
    if (job.status !== 'failed') {
      throw new ValidationError(`Only failed jobs can be retried; job is ${job.status}`, {
        jobId,
        status: job.status,
      });
    }

    return this.enqueue({
      companyIdentifier: job.companyIdentifier,
      campaignGoal: job.campaignGoal,
      notifyEmail: job.notifyEmail,
      parentJobId: job.id,
    });
  }

  /**
   * Ask a job to stop; it fails as Cancelled at its next stage boundary
   */
  async cancel(jobId: string): Promise<Job> {
    const flagged = await this.jobService.requestCancellation(jobId);
    if (flagged && !this.isRunning(jobId)) {
      this.schedule(jobId);
    }
    return this.jobService.getJob(jobId);
  }

  isRunning(jobId: string): boolean {
    return this.inFlight.has(jobId);
  }

  /**
   * Drive a job to a terminal status. Terminal jobs are returned untouched.
   */
  run(jobId: string): Promise<Job> {
    const previous = this.inFlight.get(jobId) ?? Promise.resolve();
    const next = previous.then(() => this.execute(jobId));
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.set(jobId, settled);
    void settled.then(() => {
      if (this.inFlight.get(jobId) === settled) {
        this.inFlight.delete(jobId);
      }
    });
    return next;
  }

  /**
   * Start a job outside the caller's request
   */
  schedule(jobId: string): void {
    setImmediate(() => {
      this.run(jobId).catch((error: unknown) => {
        logger.error('Job run aborted', { jobId, error: errorMessage(error) });
      });
    });
  }

  private async enqueue(params: SubmitJobParams & { parentJobId: string | null }): Promise<Job> {
    const job = await this.persist('create job', () => this.jobService.createJob(params));
    this.schedule(job.id);
    return job;
  }

  private async execute(jobId: string): Promise<Job> {
    const job = await this.persist('load job', () => this.gateway.getJob(jobId));
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }

    if (isTerminalStatus(job.status)) {
      logger.debug('Job already finished, nothing to do', { jobId, status: job.status });
      return job;
    }

    if (job.status !== 'queued') {
      logger.info('Resuming job', { jobId, status: job.status });
    }

    const run: RunState = { successNotified: false };
    try {
      const finished = await this.drive(job, run);
      logger.info('Job completed', { jobId, suggestionSetId: finished.suggestionSetId });
      return finished;
    } catch (error) {
      const failure = classifyError(
        error,
        (message, cause) => new PersistenceError(message, { error: cause })
      );
      return this.fail(job, failure, { notify: !run.successNotified });
    }
  }

  private async drive(job: Job, run: RunState): Promise<Job> {
    let current = job;
    let profile: CompanyProfile | null = null;
    let draft: SuggestionDraft | null = null;

    while (!isTerminalStatus(current.status)) {
      switch (current.status) {
        case 'queued':
          await this.checkCancellation(current.id);
          this.extractor.validate(current.companyIdentifier);
          current = await this.advance(current.id, 'extracting');
          break;

        case 'extracting':
          await this.checkCancellation(current.id);
          profile = await this.obtainProfile(current);
          current = await this.advance(current.id, 'generating');
          break;

        case 'generating':
          await this.checkCancellation(current.id);
          profile = profile ?? (await this.loadProfile(current));
          draft = await this.generate(current, profile);
          current = await this.advance(current.id, 'persisting');
          break;

        case 'persisting': {
          await this.checkCancellation(current.id);
          const suggestionSetId = await this.storeSuggestions(current, profile, draft);
          current = await this.advance(current.id, 'notifying', { resultRef: suggestionSetId });
          break;
        }

        case 'notifying':
          await this.checkCancellation(current.id);
          await this.deliver(current.id, () => this.successOutcome(current));
          run.successNotified = true;
          current = await this.advance(current.id, 'completed');
          break;
      }
    }

    return current;
  }

  private async obtainProfile(job: Job): Promise<CompanyProfile> {
    if (job.profileId) {
      return this.loadProfile(job);
    }

    const profile = await this.withRetry(
      job.id,
      'extracting',
      () => this.extractor.extract(job.id, job.companyIdentifier),
      (message, cause) => new DependencyError(message, { error: cause })
    );

    await this.persist('save profile', () => this.gateway.saveProfile(job.id, profile));
    return profile;
  }

  private async loadProfile(job: Job): Promise<CompanyProfile> {
    const { profileId } = job;
    if (!profileId) {
      throw new PersistenceError('Job has no stored profile', { jobId: job.id });
    }

    const profile = await this.persist('load profile', () => this.gateway.getProfile(profileId));
    if (!profile) {
      throw new PersistenceError(`Profile ${profileId} not found`, { jobId: job.id });
    }
    return profile;
  }

  private async generate(job: Job, profile: CompanyProfile): Promise<SuggestionDraft> {
    return this.withRetry(
      job.id,
      'generating',
      () => this.generator.generate(profile, job.campaignGoal),
      (message, cause) => new GenerationUnavailableError(message, { error: cause })
    );
  }

  /**
   * Store the draft, or on resume reuse the set already stored for this job
   */
  private async storeSuggestions(
    job: Job,
    profile: CompanyProfile | null,
    draft: SuggestionDraft | null
  ): Promise<string> {
    if (!draft) {
      const existing = await this.persist('load suggestions', () =>
        this.gateway.findLatestSuggestionSetForJob(job.id)
      );
      if (existing) {
        logger.info('Reusing stored suggestion set', { jobId: job.id, suggestionSetId: existing.id });
        return existing.id;
      }

      logger.info('No stored suggestions for job, generating again', { jobId: job.id });
      draft = await this.generate(job, profile ?? (await this.loadProfile(job)));
    }

    const pending = draft;
    return this.persist('save suggestions', () => this.gateway.saveSuggestions(job.id, pending));
  }

  /**
   * Run `attempt` until it succeeds, fails with a non-retriable error, or the
   * policy's attempts are used up; the last error is rethrown.
   * Unclassified errors take the stage's `fallback` classification.
   */
  private async withRetry<T>(
    jobId: string,
    stage: JobStage,
    attempt: () => Promise<T>,
    fallback: (message: string, cause: unknown) => PipelineError
  ): Promise<T> {
    const policy = this.config.retry;

    for (let attemptNumber = 1; ; attemptNumber += 1) {
      try {
        return await attempt();
      } catch (error) {
        const failure = classifyError(error, fallback);
        if (!failure.retriable || attemptNumber >= policy.maxAttempts) {
          throw failure;
        }

        const delayMs = backoffDelay(policy, attemptNumber);
        logger.warn('Stage attempt failed, retrying', {
          jobId,
          stage,
          attempt: attemptNumber,
          maxAttempts: policy.maxAttempts,
          delayMs,
          classification: failure.classification,
          error: failure.message,
        });
        await this.sleep(delayMs);
      }
    }
  }

  private async checkCancellation(jobId: string): Promise<void> {
    const job = await this.persist('check cancellation', () => this.gateway.getJob(jobId));
    if (job?.cancelRequested) {
      throw new CancelledError();
    }
  }

  private async advance(jobId: string, to: JobStatus, update: JobStatusUpdate = {}): Promise<Job> {
    return this.persist(`update status to ${to}`, () =>
      this.jobService.transition(jobId, to, update)
    );
  }

  private async fail(
    job: Job,
    failure: PipelineError,
    options: { notify: boolean }
  ): Promise<Job> {
    logger.warn('Job failed', {
      jobId: job.id,
      classification: failure.classification,
      error: failure.message,
    });

    let failed: Job;
    try {
      failed = await this.advance(job.id, 'failed', {
        error: { classification: failure.classification, message: failure.message },
        message: failure.message,
      });
    } catch (writeError) {
      logger.error('Could not record job failure; stored job state is stale', {
        alert: true,
        jobId: job.id,
        classification: failure.classification,
        cause: failure.message,
        error: errorMessage(writeError),
      });
      throw writeError;
    }

    if (
      options.notify &&
      failure.classification !== 'ValidationError' &&
      failure.classification !== 'Cancelled'
    ) {
      await this.deliver(failed.id, () => this.failureOutcome(failed, failure));
    }
    return failed;
  }

  /**
   * Send a notification; nothing that goes wrong here reaches the job
   */
  private async deliver(jobId: string, outcome: () => Promise<NotificationOutcome>): Promise<void> {
    try {
      const payload = await outcome();
      await withTimeout(
        this.notifier.notify(jobId, payload),
        this.config.notifyTimeoutMs,
        () => new NotifyError(`Notification timed out after ${this.config.notifyTimeoutMs}ms`)
      );
    } catch (error) {
      logger.warn('Notification failed', { jobId, error: errorMessage(error) });
    }
  }

  private async successOutcome(job: Job): Promise<NotificationOutcome> {
    const { suggestionSetId } = job;
    if (!suggestionSetId) {
      throw new NotifyError('Job has no suggestion set to report', { jobId: job.id });
    }

    const suggestionSet = await this.persist('load suggestions', () =>
      this.gateway.getSuggestionSet(suggestionSetId)
    );

    return {
      kind: 'success',
      companyIdentifier: job.companyIdentifier,
      companyName: await this.companyName(job),
      recipient: job.notifyEmail,
      suggestionSetId,
      suggestionCount: suggestionSet?.suggestions.length ?? 0,
    };
  }

  private async failureOutcome(job: Job, failure: PipelineError): Promise<NotificationOutcome> {
    return {
      kind: 'failure',
      companyIdentifier: job.companyIdentifier,
      companyName: await this.companyName(job),
      recipient: job.notifyEmail,
      classification: failure.classification,
      message: failure.message,
    };
  }

  private async companyName(job: Job): Promise<string | null> {
    const { profileId } = job;
    if (!profileId) return null;
    const profile = await this.persist('load profile', () => this.gateway.getProfile(profileId));
    return profile?.name ?? null;
  }

  /**
   * Bound a storage call; anything it throws becomes a PersistenceError
   */
  private async persist<T>(label: string, task: () => Promise<T>): Promise<T> {
    const timeoutMs = this.config.persistenceTimeoutMs;
    try {
      return await withTimeout(
        task(),
        timeoutMs,
        () => new PersistenceError(`Storage call "${label}" timed out after ${timeoutMs}ms`)
      );
    } catch (error) {
      throw classifyError(error, (message, cause) => new PersistenceError(message, { error: cause }));
    }
  }
}
