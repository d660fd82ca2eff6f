import { Router } from 'express';
import { matchedData, query } from 'express-validator';
import { AnalyticsLog, DEFAULT_LOW_RATING_THRESHOLD } from '../../analytics';
import { asyncHandler, toInt, validateRequest } from '../middleware';

export const DEFAULT_VIEW_LIMIT = 20;
export const MAX_VIEW_LIMIT = 500;

const limitParam = () => query('limit')
  .optional()
  .isInt({ min: 1, max: MAX_VIEW_LIMIT })
  .withMessage(`limit must be an integer from 1 to ${MAX_VIEW_LIMIT}`);

/**
 * Read-only views over the analytics log
 */
export function createAnalyticsRoutes(analytics: AnalyticsLog): Router {
  const router = Router();

  router.get('/stats', asyncHandler(async (req, res) => {
    res.json(await analytics.getStats());
  }));

  router.get('/failed-queries',
    [limitParam()],
    validateRequest,
    asyncHandler(async (req, res) => {
      const limit = toInt(matchedData(req).limit, DEFAULT_VIEW_LIMIT);

      const [failed, backend] = await Promise.all([
        analytics.getFailedQueries(limit),
        analytics.getBackendFailures(limit)
      ]);

      res.json({ failed_queries: failed, backend_failures: backend });
    })
  );

  router.get('/low-satisfaction',
    [
      limitParam(),
      query('threshold')
        .optional()
        .isInt({ min: 1, max: 5 })
        .withMessage('threshold must be an integer from 1 to 5')
    ],
    validateRequest,
    asyncHandler(async (req, res) => {
      const data = matchedData(req);
      const entries = await analytics.getLowSatisfaction(
        toInt(data.threshold, DEFAULT_LOW_RATING_THRESHOLD),
        toInt(data.limit, DEFAULT_VIEW_LIMIT)
      );

      res.json({ low_satisfaction_queries: entries });
    })
  );

  return router;
}
