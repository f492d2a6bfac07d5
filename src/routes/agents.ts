import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { validate } from '../middleware/validation';
import { AgentRuntime } from '../runtime';
import { isAgentType, UnknownAgentTypeError } from '../types';
import { responseUtils } from '../utils/response';

export const triggerSchema = z.object({
  collection: z.string().min(1),
  item_id: z.string().min(1),
  trigger_event: z.string().min(1).default('manual_trigger'),
  context: z.record(z.unknown()).default({}),
  additional_ids: z.array(z.string().min(1)).default([])
});

type ToggleAction = 'enable' | 'disable' | 'toggle';

export function createAgentsRouter(runtime: AgentRuntime): Router {
  const router = Router();
  const { availability, dispatcher, agents } = runtime;

  router.get('/', (req: Request, res: Response) => {
    responseUtils.ok(req, res, agents.list());
  });

  router.get('/status', (req: Request, res: Response) => {
    responseUtils.ok(req, res, availability.snapshot());
  });

  router.post('/enable-all', (req: Request, res: Response) => {
    responseUtils.ok(req, res, availability.enableAll(), 'All agents enabled');
  });

  router.post('/disable-all', (req: Request, res: Response) => {
    responseUtils.ok(req, res, availability.disableAll(), 'All agents disabled');
  });

  const toggleRoute = (action: ToggleAction) => (req: Request, res: Response) => {
    const { agentType } = req.params;
    const flags = availability[action](agentType);
    responseUtils.ok(req, res, flags, `Agent ${agentType} ${availability.isEnabled(agentType) ? 'enabled' : 'disabled'}`);
  };

  router.post('/:agentType/enable', toggleRoute('enable'));
  router.post('/:agentType/disable', toggleRoute('disable'));
  router.post('/:agentType/toggle', toggleRoute('toggle'));

  /**
   * POST /api/agents/:agentType/trigger
   * Queue a task for one agent by hand
   */
  router.post('/:agentType/trigger', validate(triggerSchema), (req: Request, res: Response) => {
    const { agentType } = req.params;
    if (!isAgentType(agentType)) {
      throw new UnknownAgentTypeError(agentType);
    }
    const body = triggerSchema.parse(req.body);
    const taskId = dispatcher.enqueue({
      agentType,
      triggerEvent: body.trigger_event,
      collection: body.collection,
      itemId: body.item_id,
      context: body.context,
      additionalRecordIds: body.additional_ids
    });

    responseUtils.accepted(req, res, { taskId, agentType, itemId: body.item_id }, `Manual trigger queued for ${agentType} agent`);
  });

  return router;
}
