/**
 * SuggestionSet entity - ordered campaign suggestions tied to one profile and job
 * Immutable once persisted; regenerating for a job stores a new version.
 */

export interface CampaignSuggestion {
  title: string;
  rationale: string;
  channel: string;
}

/**
 * Generated suggestions not yet persisted
 */
export interface SuggestionDraft {
  profileId: string;
  companyDomain: string;
  suggestions: CampaignSuggestion[];
}

export interface SuggestionSet extends SuggestionDraft {
  id: string;
  jobId: string;
  version: number;
  createdAt: Date;
}

export function createSuggestionSet(params: {
  id: string;
  jobId: string;
  version: number;
  draft: SuggestionDraft;
}): SuggestionSet {
  return {
    id: params.id,
    jobId: params.jobId,
    version: params.version,
    profileId: params.draft.profileId,
    companyDomain: params.draft.companyDomain,
    suggestions: params.draft.suggestions.map((suggestion) => ({ ...suggestion })),
    createdAt: new Date(),
  };
}
