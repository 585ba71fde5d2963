import { DependencyError } from '../../domain/errors.js';
import type {
  CompanyDirectoryEntry,
  CompanyDirectoryRepository,
} from '../repositories/CompanyDirectoryRepository.js';

/**
 * Read-only lookup of reference data about a company, keyed by normalized domain
 * Lookup failures are reported as DependencyError; a miss is `null`.
 */
export interface CompanyDirectory {
  lookup(domain: string): Promise<CompanyDirectoryEntry | null>;
}

export class SqliteCompanyDirectory implements CompanyDirectory {
  constructor(private directoryRepo: CompanyDirectoryRepository) {}

  async lookup(domain: string): Promise<CompanyDirectoryEntry | null> {
    try {
      return this.directoryRepo.findByDomain(domain);
    } catch (error) {
      throw new DependencyError('Company directory lookup failed', { domain, error });
    }
  }
}
