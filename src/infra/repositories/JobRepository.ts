import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Job, JobStatus } from '../../domain/entities/Job.js';
import type { ErrorClassification } from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  company_identifier: string;
  company_domain: string | null;
  campaign_goal: string | null;
  notify_email: string | null;
  status: JobStatus;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  error_classification: ErrorClassification | null;
  error_message: string | null;
  profile_id: string | null;
  suggestion_set_id: string | null;
  cancel_requested: number;
  parent_job_id: string | null;
};

export class JobRepository {
  constructor(private db: DatabaseAdapter) {}

  create(job: Job): void {
    const sql = `
      INSERT INTO jobs (
        id, company_identifier, company_domain, campaign_goal, notify_email, status, created_at,
        updated_at, completed_at, error_classification, error_message, profile_id,
        suggestion_set_id, cancel_requested, parent_job_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      job.companyIdentifier,
      job.companyDomain,
      job.campaignGoal,
      job.notifyEmail,
      job.status,
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
      job.completedAt ? job.completedAt.toISOString() : null,
      job.errorClassification,
      job.errorMessage,
      job.profileId,
      job.suggestionSetId,
      job.cancelRequested ? 1 : 0,
      job.parentJobId,
    ]);

    logger.debug('Job created', { jobId: job.id, status: job.status });
  }

  /**
   * Write a status change; fields left undefined keep their stored value
   * Returns the number of rows changed
   */
  updateStatus(params: {
    jobId: string;
    status: JobStatus;
    updatedAt: Date;
    completedAt?: Date | null;
    errorClassification?: ErrorClassification | null;
    errorMessage?: string | null;
    suggestionSetId?: string | null;
  }): number {
    const sql = `
      UPDATE jobs
      SET status = ?,
          updated_at = ?,
          completed_at = COALESCE(?, completed_at),
          error_classification = COALESCE(?, error_classification),
          error_message = COALESCE(?, error_message),
          suggestion_set_id = COALESCE(?, suggestion_set_id)
      WHERE id = ?
    `;

    const changes = this.db.execute(sql, [
      params.status,
      params.updatedAt.toISOString(),
      params.completedAt ? params.completedAt.toISOString() : null,
      params.errorClassification ?? null,
      params.errorMessage ?? null,
      params.suggestionSetId ?? null,
      params.jobId,
    ]);

    logger.debug('Job status updated', { jobId: params.jobId, status: params.status });
    return changes;
  }

  linkProfile(jobId: string, profileId: string, updatedAt: Date): number {
    const sql = `
      UPDATE jobs
      SET profile_id = ?, updated_at = ?
      WHERE id = ?
    `;
    return this.db.execute(sql, [profileId, updatedAt.toISOString(), jobId]);
  }

  /**
   * Flag a non-terminal job for cancellation; returns false for terminal or unknown jobs
   */
  markCancelRequested(jobId: string): boolean {
    const sql = `
      UPDATE jobs
      SET cancel_requested = 1
      WHERE id = ? AND status NOT IN ('completed', 'failed')
    `;
    return this.db.execute(sql, [jobId]) > 0;
  }

  getById(jobId: string): Job | null {
    const sql = `
      SELECT * FROM jobs
      WHERE id = ?
    `;

    const row = this.db.queryOne<JobRow>(sql, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  list(params: { companyDomain?: string; status?: JobStatus; limit?: number }): Job[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (params.companyDomain) {
      conditions.push('company_domain = ?');
      values.push(params.companyDomain);
    }

    if (params.status) {
      conditions.push('status = ?');
      values.push(params.status);
    }

    const limit = Math.min(params.limit ?? 20, 100);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const sql = `
      SELECT * FROM jobs
      ${where}
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `;

    const rows = this.db.query<JobRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  /**
   * Non-terminal jobs whose last update is older than the cutoff
   */
  listActiveUpdatedBefore(cutoff: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE status NOT IN ('completed', 'failed')
        AND updated_at <= ?
      ORDER BY created_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [cutoff.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      companyIdentifier: row.company_identifier,
      companyDomain: row.company_domain,
      campaignGoal: row.campaign_goal,
      notifyEmail: row.notify_email,
      status: row.status,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      errorClassification: row.error_classification,
      errorMessage: row.error_message,
      profileId: row.profile_id,
      suggestionSetId: row.suggestion_set_id,
      cancelRequested: row.cancel_requested === 1,
      parentJobId: row.parent_job_id,
    };
  }
}
