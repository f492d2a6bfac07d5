/**
 * Provider-neutral shapes for the LLM conversation protocol.
 *
 * The block shapes mirror the Messages API so the Anthropic service can pass
 * them through unchanged.
 */

import { AgentFailure } from './errors';

export type JsonObject = Record<string, unknown>;

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonObject>;
  required?: string[];
}

export interface ToolSchema {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: JsonObject;
}

export type AssistantBlock = TextBlock | ToolUseBlock;

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ConversationMessage =
  | { role: 'user'; content: string | ToolResultBlock[] }
  | { role: 'assistant'; content: AssistantBlock[] };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StopReason = 'end' | 'tool_request';

export interface LlmRequest {
  systemPrompt: string;
  messages: ConversationMessage[];
  tools: ToolSchema[];
}

export interface LlmResponse {
  stopReason: StopReason;
  content: AssistantBlock[];
  usage: TokenUsage;
}

export type LlmResult =
  | { ok: true; response: LlmResponse }
  | { ok: false; failure: AgentFailure };

/**
 * Anything that can answer one conversation turn. Transport failures are
 * returned, never thrown.
 */
export interface LlmConversationService {
  send(request: LlmRequest): Promise<LlmResult>;
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
