import Anthropic from '@anthropic-ai/sdk';
import { env } from './env';
import { componentLogger } from './logger';

const logger = componentLogger('anthropic');

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

const config: AnthropicConfig = {
  apiKey: env.ANTHROPIC_API_KEY,
  model: env.ANTHROPIC_MODEL,
  maxTokens: env.ANTHROPIC_MAX_TOKENS,
  temperature: env.ANTHROPIC_TEMPERATURE,
  timeoutMs: env.ANTHROPIC_TIMEOUT_MS
};

let anthropicClient: Anthropic | null = null;

export function initializeAnthropic(): Anthropic {
  if (anthropicClient) {
    return anthropicClient;
  }

  if (!config.apiKey) {
    throw new Error('ANTHROPIC_API_KEY is not configured');
  }

  logger.info('Initializing Anthropic client...');

  // No SDK-level retries: callers own the retry policy
  anthropicClient = new Anthropic({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0
  });

  logger.info('Anthropic client initialized successfully');

  return anthropicClient;
}

export function getAnthropicConfig(): AnthropicConfig {
  return { ...config };
}
