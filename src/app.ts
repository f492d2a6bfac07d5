import 'express-async-errors';
import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { env } from './config/env';
import { stream } from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestIdMiddleware, requestLogger } from './middleware/requestLogger';
import { createApiRouter } from './routes';
import { AgentRuntime } from './runtime';
import { responseUtils } from './utils/response';

export const createApp = (runtime: AgentRuntime): Application => {
  const app = express();

  app.use(
    helmet({
      contentSecurityPolicy: env.NODE_ENV === 'production',
      crossOriginEmbedderPolicy: env.NODE_ENV === 'production'
    })
  );

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id']
    })
  );

  app.use(express.json({ limit: '1mb' }));

  if (env.NODE_ENV !== 'test') {
    app.use(morgan('combined', { stream }));
  }

  app.use(requestIdMiddleware);
  app.use(requestLogger);

  app.use('/api', createApiRouter(runtime));

  app.get('/', (req: Request, res: Response) => {
    responseUtils.ok(req, res, {
      name: 'Agent Dispatch Core',
      status: 'running',
      activeSessions: runtime.sessions.size
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
