export { env } from './env';
export type { Env } from './env';
export { logger, componentLogger, stream } from './logger';
export { initializeAnthropic, getAnthropicConfig } from './anthropic';
export type { AnthropicConfig } from './anthropic';
