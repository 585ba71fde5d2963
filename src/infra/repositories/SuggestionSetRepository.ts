import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { CampaignSuggestion, SuggestionSet } from '../../domain/entities/SuggestionSet.js';
import { logger } from '../logger.js';

type SuggestionSetRow = {
  id: string;
  job_id: string;
  profile_id: string;
  company_domain: string;
  version: number;
  created_at: string;
};

type CampaignSuggestionRow = {
  position: number;
  title: string;
  rationale: string;
  channel: string;
};

/**
 * Repository for suggestion sets and their ordered suggestions
 * Callers wrap `create` in a transaction so a set is never visible without its items
 */
export class SuggestionSetRepository {
  constructor(private db: DatabaseAdapter) {}

  nextVersion(jobId: string): number {
    const row = this.db.queryOne<{ latest: number | null }>(
      'SELECT MAX(version) AS latest FROM suggestion_sets WHERE job_id = ?',
      [jobId]
    );
    return (row?.latest ?? 0) + 1;
  }

  create(set: SuggestionSet): void {
    this.db.execute(
      `
      INSERT INTO suggestion_sets (id, job_id, profile_id, company_domain, version, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
      `,
      [set.id, set.jobId, set.profileId, set.companyDomain, set.version, set.createdAt.toISOString()]
    );

    set.suggestions.forEach((suggestion, index) => {
      this.db.execute(
        `
        INSERT INTO campaign_suggestions (suggestion_set_id, position, title, rationale, channel)
        VALUES (?, ?, ?, ?, ?)
        `,
        [set.id, index, suggestion.title, suggestion.rationale, suggestion.channel]
      );
    });

    logger.debug('Suggestion set saved', {
      suggestionSetId: set.id,
      jobId: set.jobId,
      version: set.version,
      count: set.suggestions.length,
    });
  }

  getById(id: string): SuggestionSet | null {
    const row = this.db.queryOne<SuggestionSetRow>('SELECT * FROM suggestion_sets WHERE id = ?', [
      id,
    ]);
    return row ? this.hydrate(row) : null;
  }

  findLatestForJob(jobId: string): SuggestionSet | null {
    const row = this.db.queryOne<SuggestionSetRow>(
      `
      SELECT * FROM suggestion_sets
      WHERE job_id = ?
      ORDER BY version DESC
      LIMIT 1
      `,
      [jobId]
    );
    return row ? this.hydrate(row) : null;
  }

  /**
   * Most recent set that a completed job points at
   */
  findLatestCompletedForDomain(domain: string): SuggestionSet | null {
    const row = this.db.queryOne<SuggestionSetRow>(
      `
      SELECT s.* FROM suggestion_sets s
      JOIN jobs j ON j.suggestion_set_id = s.id
      WHERE s.company_domain = ? AND j.status = 'completed'
      ORDER BY j.completed_at DESC, s.created_at DESC
      LIMIT 1
      `,
      [domain]
    );
    return row ? this.hydrate(row) : null;
  }

  private hydrate(row: SuggestionSetRow): SuggestionSet {
    const items = this.db.query<CampaignSuggestionRow>(
      `
      SELECT position, title, rationale, channel FROM campaign_suggestions
      WHERE suggestion_set_id = ?
      ORDER BY position ASC
      `,
      [row.id]
    );

    const suggestions: CampaignSuggestion[] = items.map((item) => ({
      title: item.title,
      rationale: item.rationale,
      channel: item.channel,
    }));

    return {
      id: row.id,
      jobId: row.job_id,
      profileId: row.profile_id,
      companyDomain: row.company_domain,
      version: row.version,
      suggestions,
      createdAt: new Date(row.created_at),
    };
  }
}
