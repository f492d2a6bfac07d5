import { Router } from 'express';
import { AgentRuntime } from '../runtime';
import { createAgentsRouter } from './agents';
import { createApprovalRouter } from './approval';
import { createHealthRouter } from './health';
import { createHookRouter } from './hook';
import { createPromptsRouter } from './prompts';
import { createSessionsRouter } from './sessions';
import { createWebhookRouter } from './webhook';

export function createApiRouter(runtime: AgentRuntime): Router {
  const router = Router();
  router.use('/health', createHealthRouter(runtime));
  router.use('/webhook', createWebhookRouter(runtime));
  router.use('/agents', createAgentsRouter(runtime));
  router.use('/sessions', createSessionsRouter(runtime));
  router.use('/hook', createHookRouter(runtime));
  router.use('/approval', createApprovalRouter(runtime));
  router.use('/prompts', createPromptsRouter(runtime));
  return router;
}
