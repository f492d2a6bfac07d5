import { z } from 'zod';
import { componentLogger } from '../config/logger';
import {
  agentFailure,
  AgentErrorCode,
  AgentFailure,
  Classification,
  COMPLEXITIES,
  Department,
  InboundEvent,
  PRIORITIES,
  TokenUsage
} from '../types';
import { ConversationDriver } from './conversationDriver';
import { CLASSIFIER_SYSTEM_PROMPT } from './prompts';

const logger = componentLogger('task-classifier');

const department = z.nativeEnum(Department);

/**
 * Wire shape the model is asked to produce
 */
export const classificationSchema = z.object({
  department,
  priority: z.enum(PRIORITIES),
  task_type: z.string().min(1),
  requires_human_approval: z.boolean(),
  estimated_complexity: z.enum(COMPLEXITIES),
  context_summary: z.string(),
  multi_department: z.array(department).nullish(),
  suggested_actions: z.array(z.string()).nullish(),
  notes: z.string().nullish()
});

export type ClassificationPayload = z.infer<typeof classificationSchema>;

export interface FallbackSettings {
  enabled: boolean;
  department: Department;
  requiresHumanApproval: boolean;
}

export type ClassificationResult =
  | {
      ok: true;
      classification: Classification;
      usage: TokenUsage;
      /** Set when the reply could not be decoded and the fallback applied */
      parseError?: AgentFailure;
    }
  | { ok: false; failure: AgentFailure; usage: TokenUsage };

/**
 * Scan for the first balanced `{...}` that parses as a JSON object.
 * Braces inside string literals are ignored.
 */
export function extractFirstJsonObject(text: string): unknown {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findClosingBrace(text, start);
    if (end === -1) {
      continue;
    }
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      continue;
    }
  }
  return null;
}

function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

export function toClassification(payload: ClassificationPayload): Classification {
  const classification: Classification = {
    department: payload.department,
    priority: payload.priority,
    taskType: payload.task_type,
    requiresHumanApproval: payload.requires_human_approval,
    complexity: payload.estimated_complexity,
    secondaryDepartments: [...(payload.multi_department ?? [])],
    summary: payload.context_summary
  };
  if (payload.suggested_actions) {
    classification.suggestedActions = [...payload.suggested_actions];
  }
  if (payload.notes) {
    classification.notes = payload.notes;
  }
  return freezeClassification(classification);
}

function freezeClassification(classification: Classification): Classification {
  Object.freeze(classification.secondaryDepartments);
  if (classification.suggestedActions) {
    Object.freeze(classification.suggestedActions);
  }
  return Object.freeze(classification);
}

/**
 * Decode a model reply. Returns null when no valid classification is present.
 */
export function parseClassification(reply: string): Classification | null {
  const candidate = extractFirstJsonObject(reply);
  const parsed = classificationSchema.safeParse(candidate);
  return parsed.success ? toClassification(parsed.data) : null;
}

export function buildClassificationPrompt(event: InboundEvent): string {
  return `Classify this incoming event.

## Event
- Type: ${event.eventType}
- Source: ${event.source}

## Payload
${JSON.stringify(event.payload, null, 2)}

Respond with JSON:
{
  "department": "finance|marketing|client_services|production|sales|operations",
  "priority": "critical|high|medium|low",
  "task_type": "short description of the task type",
  "requires_human_approval": true|false,
  "estimated_complexity": "simple|moderate|complex",
  "context_summary": "what needs to be done",
  "multi_department": ["other", "departments"] or null,
  "suggested_actions": ["action 1", "action 2"],
  "notes": "anything else"
}`;
}

export class TaskClassifier {
  constructor(
    private readonly driver: ConversationDriver,
    private readonly fallback: FallbackSettings
  ) {}

  async classify(event: InboundEvent): Promise<ClassificationResult> {
    const outcome = await this.driver.run({
      systemPrompt: CLASSIFIER_SYSTEM_PROMPT,
      taskPrompt: buildClassificationPrompt(event)
    });

    if (!outcome.ok) {
      return { ok: false, failure: outcome.failure, usage: outcome.usage };
    }

    const classification = parseClassification(outcome.output);
    if (classification) {
      logger.info('Event classified', {
        eventType: event.eventType,
        department: classification.department,
        priority: classification.priority,
        requiresHumanApproval: classification.requiresHumanApproval
      });
      return { ok: true, classification, usage: outcome.usage };
    }

    const parseError = agentFailure(
      AgentErrorCode.CLASSIFICATION_PARSE_ERROR,
      'Classifier reply did not contain a valid classification',
      { reply: outcome.output.slice(0, 500) }
    );

    if (!this.fallback.enabled) {
      logger.warn('Classification parse failed', { eventType: event.eventType });
      return { ok: false, failure: parseError, usage: outcome.usage };
    }

    logger.warn('Classification parse failed, using fallback', {
      eventType: event.eventType,
      department: this.fallback.department
    });
    return {
      ok: true,
      classification: this.fallbackClassification(),
      usage: outcome.usage,
      parseError
    };
  }

  fallbackClassification(): Classification {
    return freezeClassification({
      department: this.fallback.department,
      priority: 'medium',
      taskType: 'unclassified',
      requiresHumanApproval: this.fallback.requiresHumanApproval,
      complexity: 'moderate',
      secondaryDepartments: [],
      summary: 'Automatic classification failed; default routing applied'
    });
  }
}
