import { Router } from 'express';
import type { RequestHandler } from 'express';
import { createJobRouter } from './jobRoutes.js';
import { createJobEventsRouter } from './jobEventsRoutes.js';
import { createSuggestionRouter } from './suggestionRoutes.js';
import type { JobService } from '../services/JobService.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import type { JobEventBus } from '../services/JobEventBus.js';
import type { SuggestionQueryService } from '../services/SuggestionQueryService.js';

/**
 * Main API router - composes all route handlers
 */
export function createApiRouter(deps: {
  jobService: JobService;
  jobOrchestrator: JobOrchestrator;
  jobEventBus: JobEventBus;
  suggestionQueries: SuggestionQueryService;
  submitLimiter: RequestHandler;
}): Router {
  const router = Router();

  // Stream route first so "/stream" is not taken as a job id
  router.use('/jobs', createJobEventsRouter(deps.jobEventBus));
  router.use('/jobs', createJobRouter(deps.jobService, deps.jobOrchestrator, deps.submitLimiter));
  router.use('/suggestions', createSuggestionRouter(deps.suggestionQueries));

  return router;
}
