import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { CompanyDirectoryRepository } from '../../../src/infra/repositories/CompanyDirectoryRepository.js';
import { seedCompanyDirectory } from '../../../src/infra/db/seedCompanyDirectory.js';
import { SqliteCompanyDirectory } from '../../../src/infra/directory/CompanyDirectory.js';
import { DependencyError } from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

describe('company directory', () => {
  let db: DatabaseAdapter;
  let directoryRepo: CompanyDirectoryRepository;
  let workDir: string;

  beforeEach(() => {
    db = new DatabaseAdapter({ filename: ':memory:', busyTimeoutMs: 1000 });
    directoryRepo = new CompanyDirectoryRepository(db);
    workDir = mkdtempSync(join(tmpdir(), 'directory-seed-'));
  });

  afterEach(() => {
    db.close();
    rmSync(workDir, { recursive: true, force: true });
  });

  it('loads the bundled fixture once', () => {
    const added = seedCompanyDirectory(directoryRepo);

    expect(added).toBe(6);
    expect(seedCompanyDirectory(directoryRepo)).toBe(0);
    expect(directoryRepo.findByDomain('acme.com')?.name).toBe('Acme');
  });

  it('normalizes domains and leaves existing rows untouched', () => {
    directoryRepo.insertIfMissing({
      domain: 'acme.com',
      name: 'Acme Original',
      industry: null,
      description: null,
      brandVoice: null,
      targetAudience: null,
      styleGuide: null,
      recentCampaignMetrics: null,
    });
    const seedPath = join(workDir, 'companies.json');
    writeFileSync(
      seedPath,
      JSON.stringify([
        { domain: 'https://www.Acme.com', name: 'Acme Replacement' },
        { domain: 'Quiet-Meadow.org', name: 'Quiet Meadow', recentCampaignMetrics: { ctr: 0.02 } },
      ])
    );

    expect(seedCompanyDirectory(directoryRepo, seedPath)).toBe(1);
    expect(directoryRepo.findByDomain('acme.com')?.name).toBe('Acme Original');
    expect(directoryRepo.findByDomain('quiet-meadow.org')).toEqual({
      domain: 'quiet-meadow.org',
      name: 'Quiet Meadow',
      industry: null,
      description: null,
      brandVoice: null,
      targetAudience: null,
      styleGuide: null,
      recentCampaignMetrics: { ctr: 0.02 },
    });
  });

  it('rejects malformed fixtures', () => {
    const seedPath = join(workDir, 'broken.json');
    writeFileSync(seedPath, JSON.stringify([{ domain: 'acme.com' }]));

    expect(() => seedCompanyDirectory(directoryRepo, seedPath)).toThrow();
  });

  it('reports lookup failures as dependency errors', async () => {
    const directory = new SqliteCompanyDirectory(directoryRepo);
    seedCompanyDirectory(directoryRepo);

    expect((await directory.lookup('northwind-coffee.com'))?.name).toBe('Northwind Coffee');
    expect(await directory.lookup('unknown.com')).toBeNull();

    db.close();
    await expect(directory.lookup('acme.com')).rejects.toBeInstanceOf(DependencyError);
    db = new DatabaseAdapter({ filename: ':memory:', busyTimeoutMs: 1000 });
  });
});
