import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { ApiError } from '../middleware/errorHandler';
import { validate } from '../middleware/validation';
import { AgentRuntime } from '../runtime';
import { responseUtils } from '../utils/response';

export const approvalSchema = z.object({
  prompt_id: z.union([z.string().min(1), z.number()]).transform(String),
  response: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['approve', 'reject', 'edit'])),
  context: z.record(z.unknown()).optional()
});

export function createApprovalRouter(runtime: AgentRuntime): Router {
  const router = Router();

  /**
   * POST /api/approval
   * A person answered an approval request
   */
  router.post('/', validate(approvalSchema), async (req: Request, res: Response) => {
    const body = approvalSchema.parse(req.body);
    const outcome = await runtime.approvals.handleResponse({
      promptId: body.prompt_id,
      response: body.response,
      context: body.context
    });
    if (!outcome) {
      throw new ApiError(404, `Approval request ${body.prompt_id} not found`, undefined, 'NOT_FOUND');
    }
    responseUtils.ok(req, res, outcome);
  });

  return router;
}
