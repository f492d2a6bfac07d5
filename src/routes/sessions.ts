import { Request, Response, Router } from 'express';
import { AgentRuntime } from '../runtime';
import { responseUtils } from '../utils/response';

export function createSessionsRouter(runtime: AgentRuntime): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    responseUtils.ok(req, res, {
      activeCount: runtime.sessions.size,
      sessions: runtime.sessions.listSessions()
    });
  });

  /**
   * POST /api/sessions/:sessionId/end
   * Admin override; unknown ids answer 404
   */
  router.post('/:sessionId/end', (req: Request, res: Response) => {
    const summary = runtime.sessions.endSession(req.params.sessionId);
    responseUtils.ok(req, res, { status: 'ended', summary });
  });

  return router;
}
