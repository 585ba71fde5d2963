import { describe, expect, it } from 'vitest';
import {
  canTransition,
  createJob,
  isMonotonicSequence,
  isTerminalStatus,
} from '../../../src/domain/entities/Job.js';

describe('Job entity', () => {
  it('creates queued jobs with empty result fields', () => {
    const job = createJob({ id: 'job-1', companyIdentifier: 'acme.com' });

    expect(job.status).toBe('queued');
    expect(job.campaignGoal).toBeNull();
    expect(job.notifyEmail).toBeNull();
    expect(job.completedAt).toBeNull();
    expect(job.errorClassification).toBeNull();
    expect(job.suggestionSetId).toBeNull();
    expect(job.cancelRequested).toBe(false);
    expect(job.parentJobId).toBeNull();
    expect(job.createdAt).toEqual(job.updatedAt);
  });

  it('stores the normalized domain beside the raw identifier', () => {
    const job = createJob({ id: 'job-1', companyIdentifier: 'https://www.Acme.com/about' });

    expect(job).toMatchObject({
      companyIdentifier: 'https://www.Acme.com/about',
      companyDomain: 'acme.com',
    });
    expect(createJob({ id: 'job-2', companyIdentifier: 'not a domain' }).companyDomain).toBeNull();
    expect(createJob({ id: 'job-3', companyIdentifier: '' }).companyDomain).toBeNull();
  });

  it('allows only forward moves along the pipeline', () => {
    expect(canTransition('queued', 'extracting')).toBe(true);
    expect(canTransition('extracting', 'generating')).toBe(true);
    expect(canTransition('notifying', 'completed')).toBe(true);

    expect(canTransition('queued', 'generating')).toBe(false);
    expect(canTransition('persisting', 'extracting')).toBe(false);
    expect(canTransition('generating', 'generating')).toBe(false);
  });

  it('reaches failed from every non-terminal status', () => {
    for (const status of ['queued', 'extracting', 'generating', 'persisting', 'notifying'] as const) {
      expect(canTransition(status, 'failed')).toBe(true);
    }
  });

  it('never leaves a terminal status', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('notifying')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('failed', 'queued')).toBe(false);
  });

  it('checks whole status sequences', () => {
    expect(
      isMonotonicSequence([
        'queued',
        'extracting',
        'generating',
        'persisting',
        'notifying',
        'completed',
      ])
    ).toBe(true);
    expect(isMonotonicSequence(['queued', 'extracting', 'failed'])).toBe(true);
    expect(isMonotonicSequence(['queued', 'extracting', 'queued'])).toBe(false);
    expect(isMonotonicSequence(['completed', 'notifying'])).toBe(false);
  });
});
