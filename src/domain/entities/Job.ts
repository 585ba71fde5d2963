/**
 * Job entity - one end-to-end orchestration attempt for a single company identifier
 * Status moves forward along the pipeline; `failed` is reachable from any non-terminal status.
 */
import type { ErrorClassification } from '../errors.js';
import { companyDomainOf } from './CompanyProfile.js';

export type JobStatus =
  | 'queued'
  | 'extracting'
  | 'generating'
  | 'persisting'
  | 'notifying'
  | 'completed'
  | 'failed';

export type JobStage = 'extracting' | 'generating' | 'persisting' | 'notifying';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

const jobTransitions: Record<JobStatus, JobStatus[]> = {
  queued: ['extracting', 'failed'],
  extracting: ['generating', 'failed'],
  generating: ['persisting', 'failed'],
  persisting: ['notifying', 'failed'],
  notifying: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface Job {
  id: string;
  companyIdentifier: string;
  /** Normalized domain of `companyIdentifier`; null when it is not a valid domain */
  companyDomain: string | null;
  campaignGoal: string | null;
  notifyEmail: string | null;
  status: JobStatus;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  errorClassification: ErrorClassification | null;
  errorMessage: string | null;
  profileId: string | null;
  suggestionSetId: string | null;
  cancelRequested: boolean;
  parentJobId: string | null;
}

export function createJob(params: {
  id: string;
  companyIdentifier: string;
  campaignGoal?: string | null;
  notifyEmail?: string | null;
  parentJobId?: string | null;
}): Job {
  const now = new Date();
  return {
    id: params.id,
    companyIdentifier: params.companyIdentifier,
    companyDomain: companyDomainOf(params.companyIdentifier),
    campaignGoal: params.campaignGoal ?? null,
    notifyEmail: params.notifyEmail ?? null,
    status: 'queued',
    createdAt: now,
    updatedAt: now,
    completedAt: null,
    errorClassification: null,
    errorMessage: null,
    profileId: null,
    suggestionSetId: null,
    cancelRequested: false,
    parentJobId: params.parentJobId ?? null,
  };
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

/**
 * True when `statuses` never steps backwards along the state graph
 */
export function isMonotonicSequence(statuses: readonly JobStatus[]): boolean {
  for (let i = 1; i < statuses.length; i += 1) {
    if (!canTransition(statuses[i - 1], statuses[i])) {
      return false;
    }
  }
  return true;
}

