import type { Job } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import type { SuggestionSet } from '../domain/entities/SuggestionSet.js';

export function mapJobToResponse(job: Job) {
  return {
    id: job.id,
    companyIdentifier: job.companyIdentifier,
    campaignGoal: job.campaignGoal,
    status: job.status,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    completedAt: job.completedAt,
    error: job.errorClassification
      ? { classification: job.errorClassification, message: job.errorMessage }
      : null,
    resultRef: job.suggestionSetId,
    cancelRequested: job.cancelRequested,
    parentJobId: job.parentJobId,
  };
}

export function mapJobEventToResponse(event: JobEvent) {
  return {
    id: event.id,
    status: event.status,
    message: event.message,
    createdAt: event.createdAt,
  };
}

export function mapSuggestionSetToResponse(suggestionSet: SuggestionSet) {
  return {
    id: suggestionSet.id,
    jobId: suggestionSet.jobId,
    profileId: suggestionSet.profileId,
    companyDomain: suggestionSet.companyDomain,
    version: suggestionSet.version,
    createdAt: suggestionSet.createdAt,
    suggestions: suggestionSet.suggestions,
  };
}
