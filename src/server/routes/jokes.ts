import { Router } from 'express';
import { body, matchedData } from 'express-validator';
import { AnalyticsLog } from '../../analytics';
import { ChatService } from '../../core/chat-service';
import { JokeCatalog } from '../../core/joke-catalog';
import { asyncHandler, toInt, validateRequest } from '../middleware';

export interface JokeRouteDeps {
  catalog: JokeCatalog;
  chat: ChatService;
  analytics: AnalyticsLog;
}

export function createJokeRoutes(deps: JokeRouteDeps): Router {
  const router = Router();

  router.get('/joke', (req, res) => {
    const joke = deps.catalog.random();
    if (!joke) {
      res.status(404).json({ error: 'No jokes available' });
      return;
    }
    res.json(joke);
  });

  router.get('/jokes', (req, res) => {
    res.json({ jokes: deps.catalog.all(), count: deps.catalog.count() });
  });

  router.post('/ask', asyncHandler(async (req, res) => {
    const message: unknown = req.body?.message;
    if (typeof message !== 'string' || !message.trim()) {
      res.status(400).json({ error: 'No message provided' });
      return;
    }

    const result = await deps.chat.ask(message);
    res.json(result);
  }));

  router.post('/feedback',
    [
      body('rating')
        .exists({ values: 'null' }).withMessage('Rating is required').bail()
        .not().isArray().withMessage('Rating must be an integer from 1 to 5').bail()
        .isInt({ min: 1, max: 5 }).withMessage('Rating must be an integer from 1 to 5'),
      body('query_id')
        .optional({ values: 'null' })
        .not().isArray().withMessage('query_id must be an integer').bail()
        .isInt().withMessage('query_id must be an integer'),
      body('comment')
        .optional({ values: 'null' })
        .isString().withMessage('comment must be a string').bail()
        .isLength({ max: 1000 }).withMessage('comment must be at most 1000 characters')
    ],
    validateRequest,
    asyncHandler(async (req, res) => {
      const data = matchedData(req);
      const comment: unknown = data.comment;

      // Logging failures do not fail the submission
      await deps.analytics.tryRecord(() => deps.analytics.logFeedback({
        query_id: data.query_id === undefined || data.query_id === null ? null : toInt(data.query_id, 0),
        rating: toInt(data.rating, 0),
        ...(typeof comment === 'string' && comment !== '' && { comment })
      }));

      res.json({ success: true, message: 'Thank you for your feedback!' });
    })
  );

  return router;
}
