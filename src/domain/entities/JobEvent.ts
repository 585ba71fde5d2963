/**
 * JobEvent entity - immutable job status transition record
 */
import type { JobStatus } from './Job.js';

export interface JobEvent {
  id: string;
  jobId: string;
  status: JobStatus;
  message: string | null;
  createdAt: Date;
}

export function createJobEvent(params: {
  id: string;
  jobId: string;
  status: JobStatus;
  message?: string | null;
}): JobEvent {
  return {
    id: params.id,
    jobId: params.jobId,
    status: params.status,
    message: params.message ?? null,
    createdAt: new Date(),
  };
}
