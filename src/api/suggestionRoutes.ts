import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../domain/errors.js';
import type { SuggestionQueryService } from '../services/SuggestionQueryService.js';
import { mapSuggestionSetToResponse } from './jobMapper.js';

/**
 * Suggestions route handler (read-only)
 */
export function createSuggestionRouter(suggestionQueries: SuggestionQueryService): Router {
  const router = Router();

  /**
   * GET /api/suggestions?company=acme.com - latest completed set for a company
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { company } = req.query;

      if (!company || typeof company !== 'string') {
        throw new ValidationError('company query parameter is required');
      }

      const suggestionSet = await suggestionQueries.getLatestForCompany(company);
      res.json({ suggestionSet: mapSuggestionSetToResponse(suggestionSet) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/suggestions/:suggestionSetId
   */
  router.get('/:suggestionSetId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const suggestionSet = await suggestionQueries.getById(req.params.suggestionSetId);
      res.json({ suggestionSet: mapSuggestionSetToResponse(suggestionSet) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
