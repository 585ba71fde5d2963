import { normalizeCompanyIdentifier } from '../domain/entities/CompanyProfile.js';
import type { SuggestionSet } from '../domain/entities/SuggestionSet.js';
import { NotFoundError } from '../domain/errors.js';
import type { PersistenceGateway } from '../infra/persistence/PersistenceGateway.js';

/**
 * Read side for stored suggestion sets
 */
export class SuggestionQueryService {
  constructor(private gateway: PersistenceGateway) {}

  /**
   * Most recent set of a completed job for the company
   */
  async getLatestForCompany(identifier: string): Promise<SuggestionSet> {
    const domain = normalizeCompanyIdentifier(identifier);
    const suggestionSet = await this.gateway.findLatestCompletedSuggestionSet(domain);
    if (!suggestionSet) {
      throw new NotFoundError('Completed suggestion set for company', domain);
    }
    return suggestionSet;
  }

  async getById(suggestionSetId: string): Promise<SuggestionSet> {
    const suggestionSet = await this.gateway.getSuggestionSet(suggestionSetId);
    if (!suggestionSet) {
      throw new NotFoundError('SuggestionSet', suggestionSetId);
    }
    return suggestionSet;
  }
}
