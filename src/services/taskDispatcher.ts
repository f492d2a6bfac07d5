/**
 * Task Dispatcher
 *
 * End-to-end flow for one unit of work: availability check, classification and
 * routing where needed, a session around the agent conversation, and approval
 * requests for the drafts the agent produced.
 */

import { v4 as uuidv4 } from 'uuid';
import { AgentDescriptor } from '../agents/baseAgent';
import { ConversationDriver, ConversationOutcome } from '../agents/conversationDriver';
import { AgentRegistry } from '../agents/registry';
import { TaskClassifier } from '../agents/taskClassifier';
import { TaskRouter } from '../agents/taskRouter';
import { componentLogger } from '../config/logger';
import { SessionRegistry, truncateId } from '../session/registry';
import {
  agentFailure,
  AgentErrorCode,
  AgentFailure,
  AgentTask,
  AgentType,
  Classification,
  describeError,
  DispatchAwaitingApproval,
  DispatchFailure,
  DispatchResult,
  DispatchSuccess,
  emptyUsage,
  InboundEvent,
  isAwaitingApproval,
  JsonObject,
  TaskContext,
  TokenUsage,
  UnknownSessionError
} from '../types';
import { ApprovalService } from './approvalService';
import { AuditLog } from './auditLog';
import { AvailabilityRegistry } from './availability';
import { PromptStore, substituteVariables } from './promptStore';

const logger = componentLogger('task-dispatcher');

export interface WebhookDelivery {
  event: string;
  collection: string;
  key?: string;
  keys?: string[];
  payload: JsonObject;
}

export type WebhookAcceptance =
  | { accepted: true; taskId: string; agentType: AgentType; itemId: string }
  | { accepted: false; reason: string };

export interface WorkflowStep {
  eventType: string;
  source: string;
  payload: JsonObject;
  collection?: string;
  itemId?: string;
}

export interface WorkflowOptions {
  stopOnFailure?: boolean;
}

export interface WorkflowResult {
  completed: boolean;
  awaitingApproval: boolean;
  stoppedAt: number | null;
  results: DispatchResult[];
}

export interface TaskDispatcherDeps {
  sessions: SessionRegistry;
  availability: AvailabilityRegistry;
  agents: AgentRegistry;
  classifier: TaskClassifier;
  router: TaskRouter;
  driver: ConversationDriver;
  prompts: PromptStore;
  approvals: ApprovalService;
  audit: AuditLog;
}

const WEBHOOK_ROUTES: Record<string, AgentType> = {
  emails: 'email',
  leads: 'lead',
  project_trackers: 'tracker',
  tasks: 'tracker',
  milestones: 'tracker'
};

export function agentTypeForCollection(collection: string): AgentType {
  return WEBHOOK_ROUTES[collection] ?? 'orchestrator';
}

function addUsage(total: TokenUsage, more: TokenUsage): TokenUsage {
  return {
    inputTokens: total.inputTokens + more.inputTokens,
    outputTokens: total.outputTokens + more.outputTokens
  };
}

export class TaskDispatcher {
  private inFlight: Set<Promise<void>> = new Set();

  constructor(private readonly deps: TaskDispatcherDeps) {}

  /**
   * Map a webhook delivery to a task and run it in the background
   */
  acceptWebhook(delivery: WebhookDelivery): WebhookAcceptance {
    const [first, ...rest] = delivery.key ? [delivery.key, ...(delivery.keys ?? [])] : delivery.keys ?? [];
    if (!first) {
      logger.warn('Webhook without item id rejected', { event: delivery.event, collection: delivery.collection });
      return { accepted: false, reason: 'Webhook carries no item id' };
    }

    const task: AgentTask = {
      taskId: uuidv4(),
      agentType: agentTypeForCollection(delivery.collection),
      triggerEvent: delivery.event,
      collection: delivery.collection,
      itemId: first,
      context: delivery.payload,
      additionalRecordIds: rest.filter((id) => id !== first)
    };

    const taskId = this.enqueue(task);
    return { accepted: true, taskId, agentType: task.agentType, itemId: first };
  }

  /**
   * Record receipt and run the task without waiting for it
   */
  enqueue(task: AgentTask): string {
    const taskId = task.taskId ?? uuidv4();
    const queued: AgentTask = { ...task, taskId };

    const run = this.deps.audit
      .record({
        agentType: queued.agentType,
        triggerEvent: queued.triggerEvent,
        collection: queued.collection,
        itemId: queued.itemId,
        status: 'received'
      })
      .then(() => this.runTask(queued))
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error('Background task failed', { taskId, error: describeError(error) });
        }
      );

    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
    return taskId;
  }

  /**
   * Resolves when every background task has settled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async runTask(task: AgentTask): Promise<DispatchResult> {
    const entry = {
      agentType: task.agentType,
      triggerEvent: task.triggerEvent,
      collection: task.collection,
      itemId: task.itemId
    };
    await this.deps.audit.record({ ...entry, status: 'processing' });

    let result: DispatchResult;
    try {
      result = await this.dispatchTask(task);
    } catch (error) {
      await this.deps.audit.record({ ...entry, status: 'failed', error: describeError(error) });
      throw error;
    }

    if (result.success) {
      await this.deps.audit.record({
        ...entry,
        status: 'completed',
        result: isAwaitingApproval(result)
          ? { awaiting_approval: result.approvalId }
          : { agent: result.agentName, output: result.output.slice(0, 2000), approvals: result.approvalIds }
      });
    } else {
      await this.deps.audit.record({
        ...entry,
        status: 'failed',
        error: `${result.error.code}: ${result.error.message}`
      });
    }
    return result;
  }

  async dispatchTask(task: AgentTask): Promise<DispatchResult> {
    const taskId = task.taskId ?? uuidv4();

    if (!this.deps.availability.isEnabled(task.agentType)) {
      return this.disabled(task.agentType, taskId);
    }

    if (task.agentType === 'orchestrator') {
      return this.classifyAndDispatch(
        {
          eventType: task.triggerEvent,
          source: task.collection,
          payload: task.context,
          collection: task.collection,
          itemId: task.itemId
        },
        { ...task, taskId }
      );
    }

    const descriptor = this.deps.agents.get(task.agentType);
    if (!descriptor) {
      return this.failed(
        task.agentType,
        taskId,
        agentFailure(AgentErrorCode.UNKNOWN_AGENT_TYPE, `No agent is registered for ${task.agentType}`),
        emptyUsage()
      );
    }

    return this.runAgent(task.agentType, descriptor, { ...task, taskId });
  }

  /**
   * Classify an event, stop for approval when required, otherwise dispatch
   * to the routed department agent
   */
  async classifyAndDispatch(event: InboundEvent, origin?: AgentTask): Promise<DispatchResult> {
    const taskId = origin?.taskId ?? uuidv4();

    if (!this.deps.availability.isEnabled('orchestrator')) {
      return this.disabled('orchestrator', taskId);
    }

    const classified = await this.deps.classifier.classify(event);
    if (!classified.ok) {
      return this.failed('orchestrator', taskId, classified.failure, classified.usage);
    }

    const { classification } = classified;
    const logs = classified.parseError ? [`classification fallback: ${classified.parseError.message}`] : [];
    const decision = this.deps.router.route(classification);

    if (decision.kind === 'approval') {
      const approvalId = await this.deps.approvals.requestDispatchApproval(
        event,
        classification,
        `classified_event_${taskId}`
      );
      const awaiting: DispatchAwaitingApproval = {
        success: true,
        awaitingApproval: true,
        agentType: 'orchestrator',
        taskId,
        approvalId,
        classification,
        usage: classified.usage,
        logs: [...logs, `awaiting approval ${approvalId}`]
      };
      return awaiting;
    }

    if (decision.kind === 'unroutable') {
      return this.failed('orchestrator', taskId, decision.failure, classified.usage, classification, logs);
    }

    if (!this.deps.availability.isEnabled(decision.agentType)) {
      return this.disabled(decision.agentType, taskId, classified.usage, classification);
    }

    const task: AgentTask & { taskId: string } = {
      taskId,
      agentType: decision.agentType,
      triggerEvent: event.eventType,
      collection: origin?.collection ?? event.collection ?? event.source,
      itemId: origin?.itemId ?? event.itemId ?? `task_${taskId}`,
      context: event.payload,
      additionalRecordIds: origin?.additionalRecordIds
    };

    const result = await this.runAgent(decision.agentType, decision.descriptor, task, classification);
    return this.withClassificationUsage(result, classified.usage, logs);
  }

  /**
   * Run events in order. Each step sees the outputs of earlier successful steps.
   */
  async executeWorkflow(steps: WorkflowStep[], options: WorkflowOptions = {}): Promise<WorkflowResult> {
    const stopOnFailure = options.stopOnFailure ?? true;
    const results: DispatchResult[] = [];
    const previous: JsonObject[] = [];

    for (const [index, step] of steps.entries()) {
      const result = await this.classifyAndDispatch({
        eventType: step.eventType,
        source: step.source,
        collection: step.collection,
        itemId: step.itemId,
        payload: previous.length > 0 ? { ...step.payload, previous_results: [...previous] } : step.payload
      });
      results.push(result);

      if (isAwaitingApproval(result)) {
        return { completed: false, awaitingApproval: true, stoppedAt: index, results };
      }
      if (!result.success) {
        if (stopOnFailure) {
          return { completed: false, awaitingApproval: false, stoppedAt: index, results };
        }
        continue;
      }
      previous.push({ step: index, agent_type: result.agentType, output: result.output });
    }

    return {
      completed: results.every((result) => result.success),
      awaitingApproval: false,
      stoppedAt: null,
      results
    };
  }

  /**
   * The admin surface may end a session while its conversation is still
   * running; the conversation outcome stands either way.
   */
  private closeSession(sessionId: string, logs: string[]): void {
    try {
      const summary = this.deps.sessions.endSession(sessionId);
      logs.push(
        `session ended after ${summary.durationSeconds.toFixed(1)}s with ${summary.violationCount} violation(s)`
      );
    } catch (error) {
      if (!(error instanceof UnknownSessionError)) {
        throw error;
      }
      logger.warn('Session was ended before its conversation finished', { sessionId: truncateId(sessionId) });
      logs.push('session was force-ended before the conversation finished');
    }
  }

  private async runAgent(
    agentType: AgentType,
    descriptor: AgentDescriptor,
    task: AgentTask & { taskId: string },
    classification?: Classification
  ): Promise<DispatchSuccess | DispatchFailure> {
    const { sessions, driver, prompts } = this.deps;
    const sessionId = sessions.createSession(agentType, task.itemId, task.collection, task.additionalRecordIds ?? []);
    const logs: string[] = [`session ${sessionId} opened for ${task.collection}/${task.itemId}`];

    const context: TaskContext = {
      sessionId,
      authorizedRecord: task.itemId,
      authorizedCollection: task.collection,
      triggerEvent: task.triggerEvent,
      classification,
      payload: task.context
    };

    let outcome: ConversationOutcome;
    try {
      const stored = await prompts.systemPromptFor(agentType);
      const systemPrompt = substituteVariables(stored ?? descriptor.systemPrompt, {
        agent_type: agentType,
        collection: task.collection,
        item_id: task.itemId,
        trigger_event: task.triggerEvent,
        payload: task.context,
        classification: classification ? { ...classification } : {}
      });

      outcome = await driver.run({
        systemPrompt,
        taskPrompt: descriptor.buildTaskPrompt(context),
        tools: { agent: descriptor, context }
      });
    } finally {
      this.closeSession(sessionId, logs);
    }

    logs.push(...outcome.toolCalls.map((call) => `${call.name}: ${call.verdict}`));

    if (!outcome.ok) {
      return this.failed(agentType, task.taskId, outcome.failure, outcome.usage, classification, logs);
    }

    const approvalIds: string[] = [];
    for (const call of outcome.toolCalls) {
      if (!call.sensitive || call.verdict !== 'executed') {
        continue;
      }
      try {
        approvalIds.push(
          await this.deps.approvals.requestDraftApproval({
            agentType,
            toolName: call.name,
            draft: call.result,
            collection: task.collection,
            itemId: task.itemId
          })
        );
      } catch (error) {
        logger.error('Could not create approval request', { tool: call.name, error: describeError(error) });
        logs.push(`approval request for ${call.name} failed: ${describeError(error)}`);
      }
    }

    return {
      success: true,
      agentType,
      taskId: task.taskId,
      agentName: descriptor.name,
      output: outcome.output,
      usage: outcome.usage,
      classification,
      approvalIds,
      logs
    };
  }

  private withClassificationUsage(
    result: DispatchSuccess | DispatchFailure,
    usage: TokenUsage,
    logs: string[]
  ): DispatchResult {
    return { ...result, usage: addUsage(usage, result.usage), logs: [...logs, ...result.logs] };
  }

  private disabled(
    agentType: AgentType,
    taskId: string,
    usage: TokenUsage = emptyUsage(),
    classification?: Classification
  ): DispatchFailure {
    logger.info('Agent disabled, task skipped', { agentType, taskId });
    return this.failed(
      agentType,
      taskId,
      agentFailure(AgentErrorCode.AGENT_DISABLED, `Agent ${agentType} is disabled`, { agentType }),
      usage,
      classification
    );
  }

  private failed(
    agentType: AgentType,
    taskId: string,
    error: AgentFailure,
    usage: TokenUsage,
    classification?: Classification,
    logs: string[] = []
  ): DispatchFailure {
    return { success: false, agentType, taskId, error, usage, classification, logs };
  }
}
