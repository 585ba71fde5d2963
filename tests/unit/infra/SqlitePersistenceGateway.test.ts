import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { SqlitePersistenceGateway } from '../../../src/infra/persistence/SqlitePersistenceGateway.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import { createCompanyProfile } from '../../../src/domain/entities/CompanyProfile.js';
import type { SuggestionDraft } from '../../../src/domain/entities/SuggestionSet.js';
import { PersistenceError } from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

function profileFor(jobId: string, id = `profile-${jobId}`) {
  return createCompanyProfile({
    id,
    jobId,
    sourceIdentifier: 'acme.com',
    name: 'Acme',
    domain: 'acme.com',
    industry: 'Industrial supplies',
    recentCampaignMetrics: { ctr: 0.03 },
  });
}

function draftFor(profileId: string, titles: string[]): SuggestionDraft {
  return {
    profileId,
    companyDomain: 'acme.com',
    suggestions: titles.map((title) => ({ title, rationale: `Why ${title}`, channel: 'email' })),
  };
}

describe('SqlitePersistenceGateway', () => {
  let db: DatabaseAdapter;
  let gateway: SqlitePersistenceGateway;

  beforeEach(async () => {
    db = new DatabaseAdapter({ filename: ':memory:', busyTimeoutMs: 1000 });
    gateway = new SqlitePersistenceGateway(db);
    await gateway.createJob(createJob({ id: 'job-1', companyIdentifier: 'acme.com' }));
  });

  afterEach(() => {
    db.close();
  });

  it('stores new jobs with a creation event', async () => {
    const job = await gateway.getJob('job-1');
    const events = await gateway.listJobEvents('job-1');

    expect(job?.status).toBe('queued');
    expect(events.map((event) => [event.status, event.message])).toEqual([
      ['queued', 'Job created'],
    ]);
  });

  it('saves a profile and links it to the job', async () => {
    const profileId = await gateway.saveProfile('job-1', profileFor('job-1'));

    const job = await gateway.getJob('job-1');
    const profile = await gateway.getProfile(profileId);

    expect(job?.profileId).toBe('profile-job-1');
    expect(profile?.name).toBe('Acme');
    expect(profile?.recentCampaignMetrics).toEqual({ ctr: 0.03 });
  });

  it('keeps one profile per job', async () => {
    await gateway.saveProfile('job-1', profileFor('job-1'));

    await expect(gateway.saveProfile('job-1', profileFor('job-1', 'other'))).rejects.toThrow(
      'Job job-1 already has a profile'
    );
    expect(await gateway.getProfile('other')).toBeNull();
  });

  it('versions suggestion sets per job and keeps their order', async () => {
    await gateway.saveProfile('job-1', profileFor('job-1'));

    const firstId = await gateway.saveSuggestions(
      'job-1',
      draftFor('profile-job-1', ['Webinar', 'Newsletter', 'Trade show'])
    );
    const secondId = await gateway.saveSuggestions('job-1', draftFor('profile-job-1', ['Podcast']));

    const first = await gateway.getSuggestionSet(firstId);
    const latest = await gateway.findLatestSuggestionSetForJob('job-1');

    expect(first?.version).toBe(1);
    expect(first?.suggestions.map((s) => s.title)).toEqual(['Webinar', 'Newsletter', 'Trade show']);
    expect(latest?.id).toBe(secondId);
    expect(latest?.version).toBe(2);
  });

  it('writes status, result and event together', async () => {
    await gateway.saveProfile('job-1', profileFor('job-1'));
    const setId = await gateway.saveSuggestions('job-1', draftFor('profile-job-1', ['Webinar']));

    const notifying = await gateway.updateJobStatus('job-1', 'notifying', { resultRef: setId });
    const completed = await gateway.updateJobStatus('job-1', 'completed');

    expect(notifying.suggestionSetId).toBe(setId);
    expect(notifying.completedAt).toBeNull();
    expect(completed.status).toBe('completed');
    expect(completed.suggestionSetId).toBe(setId);
    expect(completed.completedAt).toBeInstanceOf(Date);

    const events = await gateway.listJobEvents('job-1');
    expect(events.map((event) => event.status)).toEqual(['queued', 'notifying', 'completed']);
  });

  it('records failure details', async () => {
    const failed = await gateway.updateJobStatus('job-1', 'failed', {
      error: { classification: 'GenerationParseError', message: 'Empty suggestion list' },
    });

    expect(failed.errorClassification).toBe('GenerationParseError');
    expect(failed.errorMessage).toBe('Empty suggestion list');
    const events = await gateway.listJobEvents('job-1');
    expect(events[1].message).toBe('Empty suggestion list');
  });

  it('refuses to move a terminal job', async () => {
    await gateway.updateJobStatus('job-1', 'failed', {
      error: { classification: 'Cancelled', message: 'Job was cancelled' },
    });

    await expect(gateway.updateJobStatus('job-1', 'extracting')).rejects.toBeInstanceOf(
      PersistenceError
    );
    expect((await gateway.getJob('job-1'))?.status).toBe('failed');
  });

  it('fails loudly for unknown jobs', async () => {
    await expect(gateway.updateJobStatus('missing', 'extracting')).rejects.toThrow(
      'Job missing not found'
    );
  });

  it('returns the latest set of a completed job for a company', async () => {
    await gateway.saveProfile('job-1', profileFor('job-1'));
    const setId = await gateway.saveSuggestions('job-1', draftFor('profile-job-1', ['Webinar']));

    expect(await gateway.findLatestCompletedSuggestionSet('acme.com')).toBeNull();

    await gateway.updateJobStatus('job-1', 'notifying', { resultRef: setId });
    await gateway.updateJobStatus('job-1', 'completed');

    const latest = await gateway.findLatestCompletedSuggestionSet('acme.com');
    expect(latest?.id).toBe(setId);
    expect(await gateway.findLatestCompletedSuggestionSet('other.com')).toBeNull();
  });

  it('flags only unfinished jobs for cancellation', async () => {
    await gateway.createJob(createJob({ id: 'job-2', companyIdentifier: 'acme.com' }));
    await gateway.updateJobStatus('job-2', 'failed', {
      error: { classification: 'ValidationError', message: 'bad' },
    });

    expect(await gateway.requestCancellation('job-1')).toBe(true);
    expect(await gateway.requestCancellation('job-2')).toBe(false);
    expect((await gateway.getJob('job-1'))?.cancelRequested).toBe(true);
  });

  it('lists jobs by company and status and finds idle active jobs', async () => {
    await gateway.createJob(createJob({ id: 'job-2', companyIdentifier: 'other.com' }));
    await gateway.updateJobStatus('job-2', 'extracting');
    await gateway.createJob(
      createJob({ id: 'job-3', companyIdentifier: 'https://www.Acme.com/about' })
    );

    const forAcme = await gateway.listJobs({ companyDomain: 'acme.com' });
    const extracting = await gateway.listJobs({ status: 'extracting' });
    const active = await gateway.listActiveJobs(new Date(Date.now() + 60_000));
    const idle = await gateway.listActiveJobs(new Date(0));

    expect(forAcme.map((job) => job.id)).toEqual(['job-3', 'job-1']);
    expect(extracting.map((job) => job.id)).toEqual(['job-2']);
    expect(active.map((job) => job.id).sort()).toEqual(['job-1', 'job-2', 'job-3']);
    expect(idle).toEqual([]);
  });
});
