import type { DatabaseAdapter } from '../DatabaseAdapter.js';

export interface CompanyDirectoryEntry {
  domain: string;
  name: string;
  industry: string | null;
  description: string | null;
  brandVoice: string | null;
  targetAudience: string | null;
  styleGuide: string | null;
  recentCampaignMetrics: Record<string, unknown> | null;
}

type CompanyDirectoryRow = {
  domain: string;
  name: string;
  industry: string | null;
  description: string | null;
  brand_voice: string | null;
  target_audience: string | null;
  style_guide: string | null;
  recent_campaign_metrics: string | null;
};

/**
 * Read-mostly reference data about known companies
 */
export class CompanyDirectoryRepository {
  constructor(private db: DatabaseAdapter) {}

  findByDomain(domain: string): CompanyDirectoryEntry | null {
    const row = this.db.queryOne<CompanyDirectoryRow>(
      'SELECT * FROM company_directory WHERE domain = ?',
      [domain]
    );
    return row ? this.mapRowToEntry(row) : null;
  }

  /**
   * Insert an entry unless the domain is already present
   * Returns true when a row was added
   */
  insertIfMissing(entry: CompanyDirectoryEntry): boolean {
    const changes = this.db.execute(
      `
      INSERT OR IGNORE INTO company_directory (
        domain, name, industry, description, brand_voice, target_audience, style_guide,
        recent_campaign_metrics
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        entry.domain,
        entry.name,
        entry.industry,
        entry.description,
        entry.brandVoice,
        entry.targetAudience,
        entry.styleGuide,
        entry.recentCampaignMetrics ? JSON.stringify(entry.recentCampaignMetrics) : null,
      ]
    );
    return changes > 0;
  }

  private mapRowToEntry(row: CompanyDirectoryRow): CompanyDirectoryEntry {
    return {
      domain: row.domain,
      name: row.name,
      industry: row.industry,
      description: row.description,
      brandVoice: row.brand_voice,
      targetAudience: row.target_audience,
      styleGuide: row.style_guide,
      recentCampaignMetrics: row.recent_campaign_metrics
        ? (JSON.parse(row.recent_campaign_metrics) as Record<string, unknown>)
        : null,
    };
  }
}
