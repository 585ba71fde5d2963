import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { normalizeCompanyIdentifier } from '../domain/entities/CompanyProfile.js';
import type { JobStatus } from '../domain/entities/Job.js';
import { ValidationError } from '../domain/errors.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { JobService } from '../services/JobService.js';
import { mapJobEventToResponse, mapJobToResponse } from './jobMapper.js';

const JOB_STATUSES = [
  'queued',
  'extracting',
  'generating',
  'persisting',
  'notifying',
  'completed',
  'failed',
] as const satisfies readonly JobStatus[];

const submitJobSchema = z.object({
  companyIdentifier: z.string(),
  campaignGoal: z.string().trim().min(1).max(500).optional(),
  notifyEmail: z.string().email().optional(),
});

const listJobsQuerySchema = z.object({
  company: z.string().optional(),
  status: z.enum(JOB_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Jobs route handler
 * The identifier's content is checked by the pipeline, not here.
 */
export function createJobRouter(
  jobService: JobService,
  jobOrchestrator: JobOrchestrator,
  submitLimiter: RequestHandler
): Router {
  const router = Router();

  /**
   * POST /api/jobs
   */
  router.post('/', submitLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseOrThrow(submitJobSchema, req.body, 'job submission');
      const job = await jobOrchestrator.submit(body);
      res.status(202).json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs?company=...&status=...&limit=...
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrThrow(listJobsQuerySchema, req.query, 'job query');
      const jobs = await jobService.listJobs({
        companyDomain: query.company ? normalizeCompanyIdentifier(query.company) : undefined,
        status: query.status,
        limit: query.limit,
      });
      res.json({ jobs: jobs.map(mapJobToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { jobId } = req.params;
      const job = await jobService.getJob(jobId);
      const events = await jobService.listJobEvents(jobId);
      res.json({ job: mapJobToResponse(job), events: events.map(mapJobEventToResponse) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs/:jobId/cancel
   */
  router.post('/:jobId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobOrchestrator.cancel(req.params.jobId);
      res.json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/jobs/:jobId/retry
   */
  router.post(
    '/:jobId/retry',
    submitLimiter,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const job = await jobOrchestrator.retry(req.params.jobId);
        res.status(202).json({ job: mapJobToResponse(job) });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
