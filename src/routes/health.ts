import { Request, Response, Router } from 'express';
import { env } from '../config/env';
import { checkRecordStoreHealth } from '../db/recordStore';
import { AgentRuntime } from '../runtime';

export function createHealthRouter(runtime: AgentRuntime): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    const startTime = Date.now();
    const recordStoreHealthy = await checkRecordStoreHealth(runtime.store);
    const status = recordStoreHealthy ? 'healthy' : 'degraded';

    res.status(recordStoreHealthy ? 200 : 503).json({
      status,
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      uptime: process.uptime(),
      services: {
        recordStore: recordStoreHealthy ? 'healthy' : 'unreachable'
      },
      activeSessions: runtime.sessions.size,
      agents: runtime.availability.snapshot(),
      responseTime: `${Date.now() - startTime}ms`
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  return router;
}
