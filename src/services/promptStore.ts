import { componentLogger } from '../config/logger';
import { RecordStore } from '../db/recordStore';
import { describeError, isJsonObject } from '../types';

const logger = componentLogger('prompt-store');

export const PROMPTS_COLLECTION = 'service_prompts';

export interface StoredPrompt {
  name: string;
  content: string;
  type: string | null;
  variables: string[];
}

const PLACEHOLDER = /\{\{(\w+(?:\.\w+)*)\}\}/g;

/**
 * Replace `{{name}}` and `{{a.b}}` with values from the context.
 * Unresolved names render as `{{MISSING:name}}`.
 */
export function substituteVariables(template: string, context: Record<string, unknown>): string {
  return template.replace(PLACEHOLDER, (_match, path: string) => {
    let value: unknown = context;
    for (const key of path.split('.')) {
      if (!isJsonObject(value) || !(key in value)) {
        return `{{MISSING:${path}}}`;
      }
      value = value[key];
    }
    if (value === null || value === undefined) {
      return String(value);
    }
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
  });
}

/**
 * Active system prompts from the record store, cached for `ttlSeconds`
 */
export class PromptStore {
  private cache: Map<string, StoredPrompt> = new Map();
  private loadedAt: number | null = null;

  constructor(
    private readonly store: RecordStore,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async getPrompts(): Promise<ReadonlyMap<string, StoredPrompt>> {
    if (this.loadedAt !== null && (this.now() - this.loadedAt) / 1000 < this.ttlSeconds) {
      return this.cache;
    }

    try {
      const rows = await this.store.readItems(PROMPTS_COLLECTION, {
        filter: { status: { _eq: 'active' } },
        fields: ['prompt_name', 'prompt_type', 'prompt_content', 'variables']
      });

      const prompts = new Map<string, StoredPrompt>();
      for (const row of rows) {
        const name = row.prompt_name;
        const content = row.prompt_content;
        if (typeof name !== 'string' || !name || typeof content !== 'string' || !content) {
          continue;
        }
        prompts.set(name, {
          name,
          content,
          type: typeof row.prompt_type === 'string' ? row.prompt_type : null,
          variables: Array.isArray(row.variables)
            ? row.variables.filter((v): v is string => typeof v === 'string')
            : []
        });
      }

      this.cache = prompts;
      this.loadedAt = this.now();
      logger.info(`Loaded ${prompts.size} prompts`);
      return prompts;
    } catch (error) {
      logger.error('Failed to fetch prompts, using built-in prompts', { error: describeError(error) });
      return new Map();
    }
  }

  /**
   * Stored override for an agent type, or null when none exists
   */
  async systemPromptFor(agentType: string): Promise<string | null> {
    const prompts = await this.getPrompts();
    const prompt = prompts.get(`${agentType}_agent_system`) ?? prompts.get(agentType);
    return prompt ? prompt.content : null;
  }

  async reload(): Promise<ReadonlyMap<string, StoredPrompt>> {
    this.cache = new Map();
    this.loadedAt = null;
    return this.getPrompts();
  }

  cacheAgeSeconds(): number | null {
    return this.loadedAt === null ? null : (this.now() - this.loadedAt) / 1000;
  }

  get ttl(): number {
    return this.ttlSeconds;
  }
}
