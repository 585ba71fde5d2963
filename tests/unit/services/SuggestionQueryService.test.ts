import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SuggestionQueryService } from '../../../src/services/SuggestionQueryService.js';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { SqlitePersistenceGateway } from '../../../src/infra/persistence/SqlitePersistenceGateway.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import { createCompanyProfile } from '../../../src/domain/entities/CompanyProfile.js';
import { NotFoundError, ValidationError } from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

describe('SuggestionQueryService', () => {
  let db: DatabaseAdapter;
  let gateway: SqlitePersistenceGateway;
  let queries: SuggestionQueryService;

  async function storeSet(jobId: string, titles: string[], complete: boolean): Promise<string> {
    await gateway.createJob(createJob({ id: jobId, companyIdentifier: 'acme.com' }));
    await gateway.updateJobStatus(jobId, 'extracting');
    const profileId = await gateway.saveProfile(
      jobId,
      createCompanyProfile({
        id: `profile-${jobId}`,
        jobId,
        sourceIdentifier: 'acme.com',
        name: 'Acme',
        domain: 'acme.com',
      })
    );
    await gateway.updateJobStatus(jobId, 'generating');
    await gateway.updateJobStatus(jobId, 'persisting');
    const suggestionSetId = await gateway.saveSuggestions(jobId, {
      profileId,
      companyDomain: 'acme.com',
      suggestions: titles.map((title) => ({ title, rationale: `Why ${title}`, channel: 'social' })),
    });
    await gateway.updateJobStatus(jobId, 'notifying', { resultRef: suggestionSetId });
    if (complete) {
      await gateway.updateJobStatus(jobId, 'completed');
    }
    return suggestionSetId;
  }

  beforeEach(() => {
    db = new DatabaseAdapter({ filename: ':memory:', busyTimeoutMs: 1000 });
    gateway = new SqlitePersistenceGateway(db);
    queries = new SuggestionQueryService(gateway);
  });

  afterEach(() => {
    db.close();
  });

  it('finds the latest completed set for any spelling of the company', async () => {
    const suggestionSetId = await storeSet('job-1', ['Spring sale', 'Loyalty push'], true);

    const found = await queries.getLatestForCompany('https://www.Acme.com/about');

    expect(found.id).toBe(suggestionSetId);
    expect(found.suggestions.map((suggestion) => suggestion.title)).toEqual([
      'Spring sale',
      'Loyalty push',
    ]);
  });

  it('ignores sets whose job has not completed', async () => {
    await storeSet('job-1', ['Spring sale'], false);

    await expect(queries.getLatestForCompany('acme.com')).rejects.toThrow(
      'Completed suggestion set for company with id acme.com not found'
    );
  });

  it('rejects identifiers that are not domains', async () => {
    await expect(queries.getLatestForCompany('not a domain')).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('loads a set by id', async () => {
    const suggestionSetId = await storeSet('job-1', ['Spring sale'], false);

    const found = await queries.getById(suggestionSetId);

    expect(found).toMatchObject({ id: suggestionSetId, jobId: 'job-1', version: 1 });
  });

  it('reports unknown set ids as not found', async () => {
    await expect(queries.getById('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});
