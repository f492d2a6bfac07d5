import { Request, Response, Router } from 'express';
import { AgentRuntime } from '../runtime';
import { responseUtils } from '../utils/response';

export function createPromptsRouter(runtime: AgentRuntime): Router {
  const router = Router();
  const { prompts } = runtime;

  router.get('/', async (req: Request, res: Response) => {
    const stored = await prompts.getPrompts();
    responseUtils.ok(req, res, {
      storedPrompts: [...stored.keys()],
      builtInAgents: runtime.agents.list().map((agent) => agent.agentType),
      cacheAgeSeconds: prompts.cacheAgeSeconds(),
      cacheTtlSeconds: prompts.ttl
    });
  });

  router.post('/reload', async (req: Request, res: Response) => {
    const reloaded = await prompts.reload();
    responseUtils.ok(req, res, { promptsLoaded: [...reloaded.keys()], count: reloaded.size }, 'Prompts reloaded');
  });

  return router;
}
