import type { Job, JobStatus } from '../../domain/entities/Job.js';
import type { JobEvent } from '../../domain/entities/JobEvent.js';
import type { CompanyProfile } from '../../domain/entities/CompanyProfile.js';
import type { SuggestionDraft, SuggestionSet } from '../../domain/entities/SuggestionSet.js';
import type { ErrorClassification } from '../../domain/errors.js';

export interface JobStatusUpdate {
  error?: { classification: ErrorClassification; message: string };
  /** SuggestionSet the job now points at */
  resultRef?: string;
  /** Recorded on the job event */
  message?: string;
}

export interface JobListQuery {
  /** Normalized domain, as stored on the job */
  companyDomain?: string;
  status?: JobStatus;
  limit?: number;
}

/**
 * Transactional store for jobs, profiles and suggestion sets
 * Every write is atomic; failures surface as PersistenceError.
 */
export interface PersistenceGateway {
  createJob(job: Job): Promise<void>;
  getJob(jobId: string): Promise<Job | null>;
  listJobs(query: JobListQuery): Promise<Job[]>;
  /** Non-terminal jobs not updated since `updatedBefore` */
  listActiveJobs(updatedBefore: Date): Promise<Job[]>;
  listJobEvents(jobId: string): Promise<JobEvent[]>;

  /** Store the profile and link it to its job */
  saveProfile(jobId: string, profile: CompanyProfile): Promise<string>;
  getProfile(profileId: string): Promise<CompanyProfile | null>;

  /** Store a new version of the job's suggestion set */
  saveSuggestions(jobId: string, draft: SuggestionDraft): Promise<string>;
  getSuggestionSet(suggestionSetId: string): Promise<SuggestionSet | null>;
  findLatestSuggestionSetForJob(jobId: string): Promise<SuggestionSet | null>;
  findLatestCompletedSuggestionSet(companyDomain: string): Promise<SuggestionSet | null>;

  /** The only way a job's status changes */
  updateJobStatus(jobId: string, status: JobStatus, update?: JobStatusUpdate): Promise<Job>;
  requestCancellation(jobId: string): Promise<boolean>;
}
