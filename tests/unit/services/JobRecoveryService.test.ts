import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobRecoveryService } from '../../../src/services/JobRecoveryService.js';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { SqlitePersistenceGateway } from '../../../src/infra/persistence/SqlitePersistenceGateway.js';
import { createJob } from '../../../src/domain/entities/Job.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

describe('JobRecoveryService', () => {
  let db: DatabaseAdapter;
  let gateway: SqlitePersistenceGateway;
  const orchestrator = {
    isRunning: vi.fn((jobId: string) => jobId === 'job-busy'),
    schedule: vi.fn((_jobId: string) => undefined),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    db = new DatabaseAdapter({ filename: ':memory:', busyTimeoutMs: 1000 });
    gateway = new SqlitePersistenceGateway(db);

    for (const id of ['job-queued', 'job-midway', 'job-busy', 'job-done']) {
      await gateway.createJob(createJob({ id, companyIdentifier: 'acme.com' }));
    }
    await gateway.updateJobStatus('job-midway', 'extracting');
    await gateway.updateJobStatus('job-done', 'failed', {
      error: { classification: 'ValidationError', message: 'Company identifier is required' },
    });
  });

  afterEach(() => {
    db.close();
  });

  it('schedules unfinished jobs nobody is driving', async () => {
    const service = new JobRecoveryService(gateway, orchestrator);

    const resumed = await service.resumeStaleJobs(0);

    expect([...resumed].sort()).toEqual(['job-midway', 'job-queued']);
    expect(orchestrator.schedule).toHaveBeenCalledTimes(2);
    expect(orchestrator.schedule).toHaveBeenCalledWith('job-queued');
    expect(orchestrator.schedule).toHaveBeenCalledWith('job-midway');
  });

  it('leaves recently updated jobs alone', async () => {
    const service = new JobRecoveryService(gateway, orchestrator);

    const resumed = await service.resumeStaleJobs(10);

    expect(resumed).toEqual([]);
    expect(orchestrator.schedule).not.toHaveBeenCalled();
  });
});
