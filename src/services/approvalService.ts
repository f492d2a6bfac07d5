/**
 * Approval Service
 *
 * Writes approval requests to human_prompts and applies the responses. An
 * approval authorizes exactly the draft named in its context: the response
 * must echo the same draft_id, and only that draft is queued for execution.
 */

import { componentLogger } from '../config/logger';
import { RecordStore } from '../db/recordStore';
import {
  AgentError,
  AgentErrorCode,
  Classification,
  InboundEvent,
  isJsonObject,
  JsonObject
} from '../types';
import { AuditLog } from './auditLog';

const logger = componentLogger('approval-service');

export const APPROVALS_COLLECTION = 'human_prompts';
export const APPROVED_ACTIONS_COLLECTION = 'approved_actions';
export const DEFAULT_DEADLINE_HOURS = 24;

export type PromptType = 'approval_needed' | 'clarification_needed' | 'decision_required' | 'review_output';
export type ApprovalResponse = 'approve' | 'reject' | 'edit';
export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'edit_requested';

export interface ApprovalOption {
  value: ApprovalResponse;
  label: string;
}

export interface ApprovalRequestInput {
  promptType: PromptType;
  question: string;
  agentType: string;
  draftId: string;
  draftType: string;
  draft: JsonObject;
  context?: JsonObject;
  options?: ApprovalOption[];
  deadlineHours?: number;
}

export interface DraftApprovalInput {
  agentType: string;
  toolName: string;
  draft: JsonObject;
  collection: string;
  itemId: string;
}

export interface ApprovalResponseInput {
  promptId: string;
  response: ApprovalResponse;
  context?: JsonObject;
}

export interface ApprovalOutcome {
  promptId: string;
  status: Exclude<ApprovalStatus, 'pending'>;
  draftId: string;
  actionId?: string;
}

export const DEFAULT_OPTIONS: ApprovalOption[] = [
  { value: 'approve', label: 'Approve' },
  { value: 'edit', label: 'Edit before approving' },
  { value: 'reject', label: 'Reject' }
];

const STATUS_FOR_RESPONSE: Record<ApprovalResponse, Exclude<ApprovalStatus, 'pending'>> = {
  approve: 'approved',
  reject: 'rejected',
  edit: 'edit_requested'
};

function keyOf(item: JsonObject): string {
  const id = item.id;
  if (typeof id === 'string' || typeof id === 'number') {
    return String(id);
  }
  throw new Error('Record store returned an item without an id');
}

export class ApprovalService {
  constructor(
    private readonly store: RecordStore,
    private readonly audit: AuditLog,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createApprovalRequest(input: ApprovalRequestInput): Promise<string> {
    const deadlineHours = input.deadlineHours ?? DEFAULT_DEADLINE_HOURS;
    const deadline = new Date(this.now().getTime() + deadlineHours * 60 * 60 * 1000);

    const created = await this.store.createItem(APPROVALS_COLLECTION, {
      status: 'pending',
      prompt_type: input.promptType,
      question: input.question,
      context: {
        ...input.context,
        type: input.draftType,
        agent_type: input.agentType,
        draft_id: input.draftId,
        draft: input.draft
      },
      options: input.options ?? DEFAULT_OPTIONS,
      deadline: deadline.toISOString()
    });

    const promptId = keyOf(created);
    logger.info('Approval requested', { promptId, draftId: input.draftId, type: input.draftType });
    return promptId;
  }

  /**
   * Approval request for a draft produced by a sensitive tool
   */
  async requestDraftApproval(input: DraftApprovalInput): Promise<string> {
    const draftId = typeof input.draft.draft_id === 'string' ? input.draft.draft_id : `${input.toolName}_${input.itemId}`;
    const draftType = typeof input.draft.draft_type === 'string' ? input.draft.draft_type : input.toolName;

    return this.createApprovalRequest({
      promptType: 'approval_needed',
      question: `Please review the ${draftType.replace(/_/g, ' ')} drafted by the ${input.agentType} agent.`,
      agentType: input.agentType,
      draftId,
      draftType,
      draft: input.draft,
      context: {
        tool_name: input.toolName,
        collection: input.collection,
        item_id: input.itemId
      }
    });
  }

  /**
   * Approval request for an event the classifier held back from auto-dispatch
   */
  async requestDispatchApproval(
    event: InboundEvent,
    classification: Classification,
    draftId: string
  ): Promise<string> {
    return this.createApprovalRequest({
      promptType: 'decision_required',
      question:
        `A ${classification.priority} priority ${classification.department} task needs approval before an agent runs: ` +
        classification.summary,
      agentType: 'orchestrator',
      draftId,
      draftType: 'classified_event',
      draft: {
        event_type: event.eventType,
        source: event.source,
        collection: event.collection ?? null,
        item_id: event.itemId ?? null,
        payload: event.payload,
        classification: { ...classification }
      }
    });
  }

  /**
   * Apply a human response. Returns null when the prompt does not exist.
   */
  async handleResponse(input: ApprovalResponseInput): Promise<ApprovalOutcome | null> {
    const prompt = await this.store.readItem(APPROVALS_COLLECTION, input.promptId);
    if (!prompt) {
      return null;
    }

    const stored = isJsonObject(prompt.context) ? prompt.context : {};
    const draftId = typeof stored.draft_id === 'string' ? stored.draft_id : null;
    const agentType = typeof stored.agent_type === 'string' ? stored.agent_type : 'orchestrator';

    if (prompt.status !== 'pending') {
      throw new AgentError(
        AgentErrorCode.APPROVAL_MISMATCH,
        `Approval request ${input.promptId} is already ${String(prompt.status)}`,
        { promptId: input.promptId, status: prompt.status }
      );
    }

    const requestedDraft = input.context?.draft_id;
    if (!draftId || requestedDraft !== draftId) {
      logger.warn('Approval response does not match its draft', {
        promptId: input.promptId,
        expected: draftId,
        received: requestedDraft
      });
      throw new AgentError(
        AgentErrorCode.APPROVAL_MISMATCH,
        `Response does not reference the draft awaiting approval on ${input.promptId}`,
        { promptId: input.promptId }
      );
    }

    const status = STATUS_FOR_RESPONSE[input.response];
    const respondedAt = this.now().toISOString();
    const update: JsonObject = { status, response: input.response, responded_at: respondedAt };
    if (input.response === 'edit' && input.context?.edits !== undefined) {
      update.requested_edits = input.context.edits;
    }
    await this.store.updateItem(APPROVALS_COLLECTION, input.promptId, update);

    const outcome: ApprovalOutcome = { promptId: input.promptId, status, draftId };

    if (input.response === 'approve') {
      const action = await this.store.createItem(APPROVED_ACTIONS_COLLECTION, {
        prompt_id: input.promptId,
        draft_id: draftId,
        draft_type: typeof stored.type === 'string' ? stored.type : null,
        agent_type: agentType,
        payload: isJsonObject(stored.draft) ? stored.draft : {},
        status: 'queued',
        approved_at: respondedAt
      });
      outcome.actionId = keyOf(action);
    }

    await this.audit.record({
      agentType,
      triggerEvent: `approval_${status}`,
      collection: APPROVALS_COLLECTION,
      itemId: input.promptId,
      status: 'completed',
      result: outcome
    });

    logger.info('Approval response applied', { promptId: input.promptId, status, draftId });
    return outcome;
  }
}
