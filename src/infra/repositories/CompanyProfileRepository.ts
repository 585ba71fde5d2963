import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { CompanyProfile } from '../../domain/entities/CompanyProfile.js';
import { logger } from '../logger.js';

type CompanyProfileRow = {
  id: string;
  job_id: string;
  source_identifier: string;
  name: string;
  domain: string;
  industry: string | null;
  description: string | null;
  brand_voice: string | null;
  target_audience: string | null;
  style_guide: string | null;
  recent_campaign_metrics: string | null;
  created_at: string;
};

export class CompanyProfileRepository {
  constructor(private db: DatabaseAdapter) {}

  create(profile: CompanyProfile): void {
    const sql = `
      INSERT INTO company_profiles (
        id, job_id, source_identifier, name, domain, industry, description,
        brand_voice, target_audience, style_guide, recent_campaign_metrics, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      profile.id,
      profile.jobId,
      profile.sourceIdentifier,
      profile.name,
      profile.domain,
      profile.industry,
      profile.description,
      profile.brandVoice,
      profile.targetAudience,
      profile.styleGuide,
      profile.recentCampaignMetrics ? JSON.stringify(profile.recentCampaignMetrics) : null,
      profile.createdAt.toISOString(),
    ]);

    logger.debug('Company profile saved', { profileId: profile.id, domain: profile.domain });
  }

  getById(profileId: string): CompanyProfile | null {
    const row = this.db.queryOne<CompanyProfileRow>('SELECT * FROM company_profiles WHERE id = ?', [
      profileId,
    ]);
    return row ? this.mapRowToProfile(row) : null;
  }

  private mapRowToProfile(row: CompanyProfileRow): CompanyProfile {
    return {
      id: row.id,
      jobId: row.job_id,
      sourceIdentifier: row.source_identifier,
      name: row.name,
      domain: row.domain,
      industry: row.industry,
      description: row.description,
      brandVoice: row.brand_voice,
      targetAudience: row.target_audience,
      styleGuide: row.style_guide,
      recentCampaignMetrics: row.recent_campaign_metrics
        ? (JSON.parse(row.recent_campaign_metrics) as Record<string, unknown>)
        : null,
      createdAt: new Date(row.created_at),
    };
  }
}
