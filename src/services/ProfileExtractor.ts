import { randomUUID } from 'node:crypto';
import type { CompanyProfile } from '../domain/entities/CompanyProfile.js';
import {
  createCompanyProfile,
  deriveCompanyName,
  normalizeCompanyIdentifier,
} from '../domain/entities/CompanyProfile.js';
import { classifyError, DependencyError } from '../domain/errors.js';
import type { CompanyDirectory } from '../infra/directory/CompanyDirectory.js';
import { logger } from '../infra/logger.js';
import type { CompanyDirectoryEntry } from '../infra/repositories/CompanyDirectoryRepository.js';

/**
 * ProfileExtractor - turns a raw company identifier into a CompanyProfile
 * Performs at most one read-only directory lookup per call.
 */
export class ProfileExtractor {
  constructor(private directory: CompanyDirectory) {}

  /**
   * Syntactic check only; returns the normalized domain
   */
  validate(identifier: string): string {
    return normalizeCompanyIdentifier(identifier);
  }

  async extract(jobId: string, identifier: string): Promise<CompanyProfile> {
    const domain = this.validate(identifier);

    let entry: CompanyDirectoryEntry | null;
    try {
      entry = await this.directory.lookup(domain);
    } catch (error) {
      throw classifyError(
        error,
        (message, cause) => new DependencyError(message, { domain, error: cause })
      );
    }

    if (!entry) {
      logger.debug('Company not found in directory, deriving profile from domain', {
        jobId,
        domain,
      });
      return createCompanyProfile({
        id: randomUUID(),
        jobId,
        sourceIdentifier: identifier,
        name: deriveCompanyName(domain),
        domain,
      });
    }

    return createCompanyProfile({
      id: randomUUID(),
      jobId,
      sourceIdentifier: identifier,
      name: entry.name,
      domain,
      industry: entry.industry,
      description: entry.description,
      brandVoice: entry.brandVoice,
      targetAudience: entry.targetAudience,
      styleGuide: entry.styleGuide,
      recentCampaignMetrics: entry.recentCampaignMetrics,
    });
  }
}
