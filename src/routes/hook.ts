import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { validate } from '../middleware/validation';
import { AgentRuntime } from '../runtime';
import { responseUtils } from '../utils/response';

export const hookSchema = z.object({
  session_id: z.string().min(1),
  tool_name: z.string().min(1),
  tool_input: z.record(z.unknown()).default({})
});

/**
 * Pre-tool hook for agent runtimes outside this process: the same access
 * check the conversation driver applies to its own tool calls
 */
export function createHookRouter(runtime: AgentRuntime): Router {
  const router = Router();

  router.post('/validate', validate(hookSchema), (req: Request, res: Response) => {
    const body = hookSchema.parse(req.body);
    const decision = runtime.validator.validate(body.session_id, body.tool_name, body.tool_input);
    responseUtils.ok(req, res, decision);
  });

  return router;
}
