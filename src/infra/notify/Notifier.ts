import type { ErrorClassification } from '../../domain/errors.js';

interface OutcomeContext {
  companyIdentifier: string;
  companyName: string | null;
  recipient: string | null;
}

export interface SuccessOutcome extends OutcomeContext {
  kind: 'success';
  suggestionSetId: string;
  suggestionCount: number;
}

export interface FailureOutcome extends OutcomeContext {
  kind: 'failure';
  classification: ErrorClassification;
  message: string;
}

export type NotificationOutcome = SuccessOutcome | FailureOutcome;

/**
 * Sends a completion or failure message for a job
 * Implementations throw NotifyError; callers never let that affect job status.
 */
export interface Notifier {
  notify(jobId: string, outcome: NotificationOutcome): Promise<void>;
}
