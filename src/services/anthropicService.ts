import Anthropic, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  InternalServerError,
  RateLimitError
} from '@anthropic-ai/sdk';
import type { MessageParam, Tool } from '@anthropic-ai/sdk/resources/messages';
import { AnthropicConfig } from '../config/anthropic';
import { componentLogger } from '../config/logger';
import {
  agentFailure,
  AgentErrorCode,
  AgentFailure,
  AssistantBlock,
  ConversationMessage,
  describeError,
  isJsonObject,
  LlmConversationService,
  LlmRequest,
  LlmResult,
  ToolSchema
} from '../types';

const logger = componentLogger('anthropic-service');

/**
 * Classify an SDK failure. Order matters: the timeout error extends the
 * connection error.
 */
export function mapTransportError(error: unknown): AgentFailure {
  if (error instanceof APIConnectionTimeoutError) {
    return agentFailure(AgentErrorCode.TRANSPORT_TIMEOUT, error.message);
  }
  if (error instanceof RateLimitError) {
    return agentFailure(AgentErrorCode.TRANSPORT_RATE_LIMITED, error.message, { status: error.status });
  }
  if (error instanceof APIConnectionError) {
    return agentFailure(AgentErrorCode.TRANSPORT_CONNECTION_ERROR, error.message);
  }
  // 5xx, including 529 overloaded
  if (error instanceof InternalServerError || (error instanceof APIError && (error.status ?? 0) >= 500)) {
    return agentFailure(AgentErrorCode.TRANSPORT_SERVER_ERROR, error.message, { status: error.status });
  }
  if (error instanceof APIError) {
    return agentFailure(AgentErrorCode.TRANSPORT_REQUEST_REJECTED, error.message, { status: error.status });
  }
  return agentFailure(AgentErrorCode.TRANSPORT_REQUEST_REJECTED, describeError(error));
}

function toMessageParam(message: ConversationMessage): MessageParam {
  if (message.role === 'user') {
    if (typeof message.content === 'string') {
      return { role: 'user', content: message.content };
    }
    return {
      role: 'user',
      content: message.content.map((block) => ({
        type: 'tool_result' as const,
        tool_use_id: block.tool_use_id,
        content: block.content,
        is_error: block.is_error ?? false
      }))
    };
  }

  return {
    role: 'assistant',
    content: message.content.map((block) =>
      block.type === 'text'
        ? { type: 'text' as const, text: block.text }
        : { type: 'tool_use' as const, id: block.id, name: block.name, input: block.input }
    )
  };
}

function toTool(schema: ToolSchema): Tool {
  return {
    name: schema.name,
    description: schema.description,
    input_schema: {
      type: 'object',
      properties: schema.input_schema.properties,
      required: schema.input_schema.required ?? []
    }
  };
}

/**
 * LLM conversation service backed by the Anthropic Messages API
 */
export class AnthropicConversationService implements LlmConversationService {
  constructor(
    private readonly client: Anthropic,
    private readonly config: AnthropicConfig
  ) {}

  async send(request: LlmRequest): Promise<LlmResult> {
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: request.systemPrompt,
        messages: request.messages.map(toMessageParam),
        ...(request.tools.length > 0 ? { tools: request.tools.map(toTool) } : {})
      });

      const content: AssistantBlock[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          content.push({ type: 'text', text: block.text });
        } else if (block.type === 'tool_use') {
          content.push({
            type: 'tool_use',
            id: block.id,
            name: block.name,
            input: isJsonObject(block.input) ? block.input : {}
          });
        }
      }

      return {
        ok: true,
        response: {
          stopReason: response.stop_reason === 'tool_use' ? 'tool_request' : 'end',
          content,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens
          }
        }
      };
    } catch (error) {
      const failure = mapTransportError(error);
      logger.error('Anthropic request failed', { code: failure.code, error: failure.message });
      return { ok: false, failure };
    }
  }
}
