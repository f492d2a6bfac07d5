/**
 * Conversation Driver
 *
 * Runs the multi-turn tool loop against the LLM service:
 *
 *   sending -> awaiting_tool_results -> sending ... -> complete | error
 *
 * Every store_* call is checked by the access validator before its handler
 * runs. Denials, unknown tools and handler failures are fed back to the model
 * as error results; transport failures and an exhausted turn budget end the run.
 */

import { EventEmitter } from 'events';
import { componentLogger } from '../config/logger';
import { RecordStore } from '../db/recordStore';
import { AccessValidator, isDataTool } from '../safety/accessValidator';
import {
  agentFailure,
  AgentErrorCode,
  AgentFailure,
  ConversationMessage,
  describeError,
  emptyUsage,
  JsonObject,
  LlmConversationService,
  TaskContext,
  TokenUsage,
  ToolResultBlock,
  ToolUseBlock
} from '../types';
import { AgentDescriptor } from './baseAgent';

const logger = componentLogger('conversation-driver');

export const DEFAULT_MAX_TURNS = 10;

export type DriverState = 'sending' | 'awaiting_tool_results' | 'complete' | 'error';

export type ToolVerdict = 'executed' | 'denied' | 'unknown_tool' | 'failed' | 'rejected';

export interface ToolCallRecord {
  id: string;
  name: string;
  input: JsonObject;
  verdict: ToolVerdict;
  sensitive: boolean;
  result: JsonObject;
}

interface OutcomeBase {
  usage: TokenUsage;
  turns: number;
  toolCalls: ToolCallRecord[];
}

export interface ConversationSuccess extends OutcomeBase {
  ok: true;
  output: string;
}

export interface ConversationFailure extends OutcomeBase {
  ok: false;
  failure: AgentFailure;
}

export type ConversationOutcome = ConversationSuccess | ConversationFailure;

export interface ConversationRequest {
  systemPrompt: string;
  taskPrompt: string;
  /** Omitted for tool-less conversations such as classification */
  tools?: {
    agent: AgentDescriptor;
    context: TaskContext;
  };
}

export interface ConversationDriverOptions {
  maxTurns?: number;
}

export interface StateChange {
  sessionId: string | null;
  from: DriverState;
  to: DriverState;
  turn: number;
}

export class ConversationDriver extends EventEmitter {
  private readonly maxTurns: number;

  constructor(
    private readonly llm: LlmConversationService,
    private readonly validator: AccessValidator,
    private readonly store: RecordStore,
    options: ConversationDriverOptions = {}
  ) {
    super();
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  }

  async run(request: ConversationRequest): Promise<ConversationOutcome> {
    const sessionId = request.tools?.context.sessionId ?? null;
    const messages: ConversationMessage[] = [{ role: 'user', content: request.taskPrompt }];
    const catalog = request.tools ? request.tools.agent.toolCatalog() : [];
    const usage = emptyUsage();
    const toolCalls: ToolCallRecord[] = [];
    let state: DriverState = 'sending';
    let turns = 0;

    const transition = (to: DriverState): void => {
      const change: StateChange = { sessionId, from: state, to, turn: turns };
      state = to;
      this.emit('state', change);
    };

    const fail = (failure: AgentFailure): ConversationFailure => {
      transition('error');
      return { ok: false, failure, usage, turns, toolCalls };
    };

    while (turns < this.maxTurns) {
      turns += 1;
      const result = await this.llm.send({
        systemPrompt: request.systemPrompt,
        messages,
        tools: catalog
      });

      if (!result.ok) {
        logger.warn('Conversation ended by transport failure', {
          sessionId,
          turn: turns,
          code: result.failure.code
        });
        return fail(result.failure);
      }

      const { response } = result;
      usage.inputTokens += response.usage.inputTokens;
      usage.outputTokens += response.usage.outputTokens;
      messages.push({ role: 'assistant', content: response.content });

      const toolUses = response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');

      if (response.stopReason === 'end' || toolUses.length === 0) {
        const output = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .filter((text) => text.length > 0)
          .join('\n');
        transition('complete');
        return { ok: true, output, usage, turns, toolCalls };
      }

      transition('awaiting_tool_results');

      if (!request.tools) {
        return fail(agentFailure(AgentErrorCode.UNKNOWN_TOOL, 'Tools were requested in a conversation without tools'));
      }

      const results: ToolResultBlock[] = [];
      for (const toolUse of toolUses) {
        const record = await this.executeToolCall(toolUse, request.tools.agent, request.tools.context);
        toolCalls.push(record.call);
        results.push({
          type: 'tool_result',
          tool_use_id: toolUse.id,
          content: record.content,
          is_error: record.call.verdict !== 'executed'
        });

        if (record.terminate) {
          return fail(
            agentFailure(AgentErrorCode.UNAUTHORIZED_ACCESS, 'Session violation limit reached', {
              sessionId,
              toolName: toolUse.name
            })
          );
        }
      }

      messages.push({ role: 'user', content: results });
      transition('sending');
    }

    logger.warn('Turn budget exhausted', { sessionId, maxTurns: this.maxTurns });
    return fail(
      agentFailure(AgentErrorCode.TURN_BUDGET_EXCEEDED, `Conversation exceeded ${this.maxTurns} turns`, {
        maxTurns: this.maxTurns
      })
    );
  }

  private async executeToolCall(
    toolUse: ToolUseBlock,
    agent: AgentDescriptor,
    context: TaskContext
  ): Promise<{ call: ToolCallRecord; content: string; terminate: boolean }> {
    const base = { id: toolUse.id, name: toolUse.name, input: toolUse.input };
    const tool = agent.findTool(toolUse.name);

    if (!tool) {
      const result = { error: AgentErrorCode.UNKNOWN_TOOL, message: `Unknown tool: ${toolUse.name}` };
      return {
        call: { ...base, verdict: 'unknown_tool', sensitive: false, result },
        content: JSON.stringify(result),
        terminate: false
      };
    }

    if (isDataTool(toolUse.name)) {
      const decision = this.validator.validate(context.sessionId, toolUse.name, toolUse.input);
      if (!decision.allowed) {
        const result: JsonObject = { error: decision.code ?? AgentErrorCode.UNAUTHORIZED_ACCESS, message: decision.reason };
        return {
          call: { ...base, verdict: 'denied', sensitive: tool.sensitive, result },
          content: decision.reason,
          terminate: decision.terminate
        };
      }
    }

    let result: JsonObject;
    try {
      result = await agent.handleTool(toolUse.name, toolUse.input, { ...context, store: this.store });
    } catch (error) {
      const failure = { error: AgentErrorCode.TOOL_EXECUTION_ERROR, message: describeError(error) };
      logger.warn('Tool handler failed', { sessionId: context.sessionId, tool: toolUse.name, error: failure.message });
      return {
        call: { ...base, verdict: 'failed', sensitive: tool.sensitive, result: failure },
        content: JSON.stringify(failure),
        terminate: false
      };
    }

    if (tool.sensitive && result.requires_approval !== true) {
      const rejection = {
        error: AgentErrorCode.TOOL_EXECUTION_ERROR,
        message: `${toolUse.name} must return a draft that requires approval`
      };
      logger.error('Sensitive tool returned a non-draft result', {
        sessionId: context.sessionId,
        tool: toolUse.name
      });
      return {
        call: { ...base, verdict: 'rejected', sensitive: true, result: rejection },
        content: JSON.stringify(rejection),
        terminate: false
      };
    }

    return {
      call: { ...base, verdict: 'executed', sensitive: tool.sensitive, result },
      content: JSON.stringify(result),
      terminate: false
    };
  }
}
