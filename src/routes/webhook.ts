import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { ApiError } from '../middleware/errorHandler';
import { validate } from '../middleware/validation';
import { AgentRuntime } from '../runtime';
import { responseUtils } from '../utils/response';

export const webhookSchema = z.object({
  event: z.string().min(1),
  collection: z.string().min(1),
  key: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  keys: z.array(z.union([z.string().min(1), z.number()]).transform(String)).optional(),
  payload: z.record(z.unknown()).default({})
});

export function createWebhookRouter(runtime: AgentRuntime): Router {
  const router = Router();

  /**
   * POST /api/webhook
   * Record mutation from the upstream store; runs in the background
   */
  router.post('/', validate(webhookSchema), (req: Request, res: Response) => {
    const delivery = webhookSchema.parse(req.body);
    const acceptance = runtime.dispatcher.acceptWebhook(delivery);
    if (!acceptance.accepted) {
      throw new ApiError(400, acceptance.reason, { collection: delivery.collection }, 'NO_ITEM_ID');
    }

    responseUtils.accepted(
      req,
      res,
      {
        taskId: acceptance.taskId,
        agentType: acceptance.agentType,
        itemId: acceptance.itemId
      },
      `Task queued for ${acceptance.agentType} agent`
    );
  });

  return router;
}
