import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { Logger } from 'pino';
import { AnalyticsLog } from '../analytics';
import { ChatService } from '../core/chat-service';
import { JokeCatalog } from '../core/joke-catalog';
import { CatalogEmptyError, StoreCorruptError, errorMessage } from '../errors';
import { ServiceConfig } from '../types';
import { requestId } from './middleware';
import { createAnalyticsRoutes } from './routes/analytics';
import { createHealthRoutes } from './routes/health';
import { createJokeRoutes } from './routes/jokes';

export interface AppDeps {
  catalog: JokeCatalog;
  chat: ChatService;
  analytics: AnalyticsLog;
  logger: Logger;
  config: Pick<ServiceConfig, 'mode' | 'rateLimit'>;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * 4xx errors raised while reading the request body
 */
function bodyClientError(err: unknown): { status: number; type: string; message: string } | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err) || !('type' in err)) {
    return undefined;
  }
  const { status, type } = err;
  if (typeof status !== 'number' || status < 400 || status > 499 || typeof type !== 'string') {
    return undefined;
  }
  return { status, type, message: errorMessage(err) };
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger.child({ component: 'http' });
  const production = deps.config.mode === 'production';
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));
  app.use(requestId);
  app.use(morgan(production ? 'combined' : 'dev', {
    stream: { write: (line: string) => logger.info(line.trim()) }
  }));

  app.use('/api/', rateLimit({
    windowMs: deps.config.rateLimit.windowMs,
    limit: deps.config.rateLimit.max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' }
  }));

  app.use('/health', createHealthRoutes(deps.catalog));
  app.use('/api', createJokeRoutes(deps));
  app.use('/api/analytics', createAnalyticsRoutes(deps.analytics));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    const clientError = bodyClientError(err);
    if (clientError) {
      res.status(clientError.status).json({
        error: clientError.type === 'entity.too.large' ? 'Request body too large' : clientError.message
      });
      return;
    }

    logger.error(
      { error: errorMessage(err), requestId: res.locals.requestId, path: req.path },
      'Request failed'
    );

    if (err instanceof StoreCorruptError) {
      res.status(500).json({
        error: 'Analytics store is unreadable',
        ...(!production && { details: err.message })
      });
      return;
    }

    if (err instanceof CatalogEmptyError) {
      res.status(500).json({ error: err.message });
      return;
    }

    if (req.path === '/api/ask') {
      res.status(500).json({
        error: 'An unexpected error occurred. Please try again.',
        ...(!production && { details: errorMessage(err) })
      });
      return;
    }

    res.status(500).json({ error: production ? 'Internal server error' : errorMessage(err) });
  });

  return app;
}
