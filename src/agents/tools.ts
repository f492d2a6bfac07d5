import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { RecordStore } from '../db/recordStore';
import { ALWAYS_READABLE_COLLECTIONS } from '../safety/accessValidator';
import { JsonObject, TaskContext, ToolSchema } from '../types';

export interface ToolContext extends TaskContext {
  store: RecordStore;
}

export interface AgentTool {
  readonly schema: ToolSchema;
  /** Tool proposes an external effect; its result must be a draft */
  readonly sensitive: boolean;
  invoke(input: JsonObject, context: ToolContext): Promise<JsonObject>;
}

export class ToolInputError extends Error {
  constructor(toolName: string, readonly issues: string[]) {
    super(`Invalid input for ${toolName}: ${issues.join('; ')}`);
    this.name = 'ToolInputError';
  }
}

export interface ToolDefinition<Schema extends z.ZodTypeAny> {
  name: string;
  description: string;
  input: Schema;
  parameters: Record<string, JsonObject>;
  required?: string[];
  sensitive?: boolean;
  handle(input: z.infer<Schema>, context: ToolContext): JsonObject | Promise<JsonObject>;
}

/**
 * Bind a JSON-schema catalog entry to a zod decoder and a handler
 */
export function defineTool<Schema extends z.ZodTypeAny>(definition: ToolDefinition<Schema>): AgentTool {
  return {
    schema: {
      name: definition.name,
      description: definition.description,
      input_schema: {
        type: 'object',
        properties: definition.parameters,
        required: definition.required ?? []
      }
    },
    sensitive: definition.sensitive ?? false,
    async invoke(input, context) {
      const parsed = definition.input.safeParse(input);
      if (!parsed.success) {
        throw new ToolInputError(
          definition.name,
          parsed.error.errors.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        );
      }
      return definition.handle(parsed.data, context);
    }
  };
}

/**
 * Wrap a proposal in the draft envelope every department tool returns
 */
export function draft(kind: string, payload: JsonObject): JsonObject {
  return {
    draft_id: `${kind}_${uuidv4()}`,
    draft_type: kind,
    status: 'draft',
    requires_approval: true,
    ...payload
  };
}

export const PRIORITY_PARAM: JsonObject = {
  type: 'string',
  enum: ['critical', 'high', 'medium', 'low'],
  description: 'Priority level'
};

const keySchema = z.union([z.string().min(1), z.number()]);

const storeReadInput = z
  .object({
    collection: z.string().min(1),
    action: z.literal('read').default('read'),
    key: keySchema.optional(),
    keys: z.array(keySchema).min(1).optional(),
    filter: z.record(z.unknown()).optional(),
    fields: z.array(z.string()).optional(),
    limit: z.number().int().positive().max(100).optional()
  })
  .strict();

const storeWriteInput = z
  .object({
    collection: z.string().min(1),
    action: z.enum(['create', 'update']),
    key: keySchema.optional(),
    data: z.record(z.unknown())
  })
  .strict();

export const storeRead = defineTool({
  name: 'store_read',
  description:
    'Read records from the business record store. Provide `key` or `keys` for the records of this task; ' +
    'filtered reads are only available for operational collections.',
  input: storeReadInput,
  parameters: {
    collection: { type: 'string', description: 'Collection name' },
    action: { type: 'string', enum: ['read'], description: 'Always "read"' },
    key: { type: 'string', description: 'Single record id' },
    keys: { type: 'array', items: { type: 'string' }, description: 'Several record ids' },
    filter: { type: 'object', description: 'Filter object (operational collections only)' },
    fields: { type: 'array', items: { type: 'string' } },
    limit: { type: 'integer', minimum: 1, maximum: 100 }
  },
  required: ['collection', 'action'],
  async handle(input, context) {
    if (input.key !== undefined) {
      const item = await context.store.readItem(input.collection, input.key);
      return { collection: input.collection, item };
    }

    if (input.keys !== undefined) {
      const items = await context.store.readItems(input.collection, {
        filter: { id: { _in: input.keys } },
        fields: input.fields,
        limit: input.keys.length
      });
      return { collection: input.collection, items };
    }

    if (!ALWAYS_READABLE_COLLECTIONS.has(input.collection)) {
      throw new Error(`Reads from ${input.collection} must name the records by key`);
    }
    const items = await context.store.readItems(input.collection, {
      filter: input.filter,
      fields: input.fields,
      limit: input.limit ?? 25
    });
    return { collection: input.collection, items };
  }
});

export const storeWrite = defineTool({
  name: 'store_write',
  description: 'Create or update a record in the business record store. Updates require `key`.',
  input: storeWriteInput,
  parameters: {
    collection: { type: 'string', description: 'Collection name' },
    action: { type: 'string', enum: ['create', 'update'] },
    key: { type: 'string', description: 'Record id to update' },
    data: { type: 'object', description: 'Field values' }
  },
  required: ['collection', 'action', 'data'],
  async handle(input, context) {
    if (input.action === 'update') {
      if (input.key === undefined) {
        throw new Error('update requires key');
      }
      const item = await context.store.updateItem(input.collection, input.key, input.data);
      return { collection: input.collection, action: 'update', item };
    }
    const item = await context.store.createItem(input.collection, input.data);
    return { collection: input.collection, action: 'create', item };
  }
});

export const STORE_TOOLS: readonly AgentTool[] = [storeRead, storeWrite];
