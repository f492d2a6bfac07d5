import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';
import { Department } from '../types';

// Load .env file
dotenv.config({ path: path.join(__dirname, '../../.env') });

const booleanFlag = (fallback: 'true' | 'false') =>
  z.string().transform(val => val === 'true').default(fallback);

// Define the environment schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('5002'),
  HOST: z.string().default('0.0.0.0'),

  // Anthropic
  ANTHROPIC_API_KEY: z.string().default(''),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-20250514'),
  ANTHROPIC_MAX_TOKENS: z.string().transform(Number).default('4096'),
  ANTHROPIC_TEMPERATURE: z.string().transform(Number).default('0.7'),
  ANTHROPIC_TIMEOUT_MS: z.string().transform(Number).default('120000'),

  // Record store
  RECORD_STORE_URL: z.string().url().default('http://localhost:8055'),
  RECORD_STORE_TOKEN: z.string().default(''),
  RECORD_STORE_TIMEOUT_MS: z.string().transform(Number).default('15000'),

  // Agent runtime
  AGENT_MAX_TURNS: z.string().transform(Number).default('10'),
  SESSION_VIOLATION_LIMIT: z.string().transform(Number).default('0'),
  PROMPT_CACHE_TTL_SECONDS: z.string().transform(Number).default('300'),

  // Classification fallback when the orchestrator reply cannot be decoded
  CLASSIFICATION_FALLBACK_ENABLED: booleanFlag('true'),
  CLASSIFICATION_FALLBACK_DEPARTMENT: z.nativeEnum(Department).default(Department.UNKNOWN),
  CLASSIFICATION_FALLBACK_REQUIRES_APPROVAL: booleanFlag('true'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('json'),

  // CORS
  CORS_ORIGIN: z.string().default('*'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:', error.flatten().fieldErrors);
      process.exit(1);
    }
    throw error;
  }
};

export const env = parseEnv();

// Type export for TypeScript
export type Env = z.infer<typeof envSchema>;
