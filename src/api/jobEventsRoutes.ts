import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { normalizeCompanyIdentifier } from '../domain/entities/CompanyProfile.js';
import type { JobEventBus, JobEventPayload } from '../services/JobEventBus.js';
import { mapJobToResponse } from './jobMapper.js';

const HEARTBEAT_MS = 30_000;

/**
 * GET /api/jobs/stream?company=... - Server-Sent Events of job transitions
 * Without `company` every job is streamed.
 */
export function createJobEventsRouter(jobEventBus: JobEventBus): Router {
  const router = Router();

  router.get('/stream', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { company } = req.query;
      const domain =
        typeof company === 'string' && company.length > 0
          ? normalizeCompanyIdentifier(company)
          : null;

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      res.write('event: ready\n');
      res.write('data: {}\n\n');

      const onJob = (payload: JobEventPayload) => {
        if (domain && payload.job.companyDomain !== domain) return;
        const data = {
          event: payload.event,
          status: payload.status,
          timestamp: payload.timestamp,
          job: mapJobToResponse(payload.job),
        };
        res.write('event: job\n');
        res.write(`data: ${JSON.stringify(data)}\n\n`);
      };

      const heartbeat = setInterval(() => {
        res.write(': keep-alive\n\n');
      }, HEARTBEAT_MS);

      jobEventBus.onJob(onJob);

      req.on('close', () => {
        clearInterval(heartbeat);
        jobEventBus.offJob(onJob);
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
