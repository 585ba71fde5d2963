import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { normalizeCompanyIdentifier } from '../../domain/entities/CompanyProfile.js';
import type { CompanyDirectoryRepository } from '../repositories/CompanyDirectoryRepository.js';
import { logger } from '../logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_SEED_PATH = join(__dirname, 'seed', 'companies.json');

const seedEntrySchema = z.object({
  domain: z.string().min(1),
  name: z.string().min(1),
  industry: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  brandVoice: z.string().nullable().default(null),
  targetAudience: z.string().nullable().default(null),
  styleGuide: z.string().nullable().default(null),
  recentCampaignMetrics: z.record(z.unknown()).nullable().default(null),
});

const seedFileSchema = z.array(seedEntrySchema);

/**
 * Load the company directory fixture; entries already present are left untouched
 * Returns the number of entries added
 */
export function seedCompanyDirectory(
  directoryRepo: CompanyDirectoryRepository,
  seedPath: string = DEFAULT_SEED_PATH
): number {
  const raw: unknown = JSON.parse(readFileSync(seedPath, 'utf-8'));
  const entries = seedFileSchema.parse(raw);

  let added = 0;
  for (const entry of entries) {
    const inserted = directoryRepo.insertIfMissing({
      ...entry,
      domain: normalizeCompanyIdentifier(entry.domain),
    });
    if (inserted) {
      added += 1;
    } else {
      logger.debug('Company already in directory, skipping', { domain: entry.domain });
    }
  }

  logger.info('Company directory seeded', { added, total: entries.length });
  return added;
}
