/**
 * Access Validator
 *
 * Checks every data-store tool call against the session it runs in. Synchronous:
 * the only side effects are the violation counter and the audit emission.
 */

import { componentLogger } from '../config/logger';
import { Session, SessionRegistry, truncateId } from '../session/registry';
import { AuditLog } from '../services/auditLog';
import { AgentErrorCode, isJsonObject, JsonObject } from '../types';

const logger = componentLogger('access-validator');

export const DATA_TOOL_PREFIX = 'store_';

/** Operational collections any agent may read for context */
export const ALWAYS_READABLE_COLLECTIONS: ReadonlySet<string> = new Set([
  'service_prompts',
  'agent_logs',
  'service_workflows'
]);

/** Collections the dispatch core itself writes; agents may never write to them */
export const CONTROL_COLLECTIONS: ReadonlySet<string> = new Set([
  'approved_actions',
  'human_prompts',
  'agent_logs',
  'agent_settings'
]);

const DENIED_PREVIEW_LIMIT = 3;

export interface AccessDecision {
  allowed: boolean;
  reason: string;
  code?: AgentErrorCode;
  violationCount?: number;
  terminate: boolean;
}

export interface AccessValidatorOptions {
  /** Violations after which the conversation is stopped; 0 disables */
  violationLimit?: number;
}

export function isDataTool(toolName: string): boolean {
  return toolName.startsWith(DATA_TOOL_PREFIX);
}

/**
 * Every record id a store call could touch: `key`, `keys[]`, `data.id` and `data[].id`
 */
export function extractRecordIds(toolInput: JsonObject): Set<string> {
  const ids = new Set<string>();
  const add = (value: unknown): void => {
    if (typeof value === 'string' && value.length > 0) {
      ids.add(value);
    } else if (typeof value === 'number') {
      ids.add(String(value));
    }
  };

  add(toolInput.key);

  if (Array.isArray(toolInput.keys)) {
    toolInput.keys.forEach(add);
  }

  const data = toolInput.data;
  if (isJsonObject(data)) {
    add(data.id);
  } else if (Array.isArray(data)) {
    for (const item of data) {
      if (isJsonObject(item)) {
        add(item.id);
      }
    }
  }

  return ids;
}

export class AccessValidator {
  private readonly violationLimit: number;

  constructor(
    private readonly sessions: SessionRegistry,
    private readonly audit: AuditLog,
    options: AccessValidatorOptions = {}
  ) {
    this.violationLimit = options.violationLimit ?? 0;
  }

  validate(sessionId: string, toolName: string, toolInput: JsonObject): AccessDecision {
    const session = this.sessions.lookup(sessionId);
    if (!session) {
      return {
        allowed: false,
        reason: `ACCESS DENIED: unknown or expired session ${truncateId(sessionId)}`,
        code: AgentErrorCode.UNKNOWN_SESSION,
        terminate: false
      };
    }

    if (!isDataTool(toolName)) {
      return { allowed: true, reason: 'Tool does not access the record store', terminate: false };
    }

    const collection = typeof toolInput.collection === 'string' ? toolInput.collection : '';
    if (ALWAYS_READABLE_COLLECTIONS.has(collection) && toolInput.action === 'read') {
      return { allowed: true, reason: `Read access to ${collection} is always permitted`, terminate: false };
    }

    if (CONTROL_COLLECTIONS.has(collection) && toolName !== 'store_read') {
      return this.deny(session, sessionId, toolName, toolInput, [`collection:${collection}`],
        `ACCESS DENIED: ${toolName} may not write to ${collection}; ` +
        'it is managed by the dispatch service and changes go through human approval.');
    }

    const requested = extractRecordIds(toolInput);
    const unauthorized = [...requested].filter((id) => !session.allowedRecordIds.has(id));

    if (unauthorized.length === 0) {
      return { allowed: true, reason: 'All requested records are within the session scope', terminate: false };
    }

    const preview = unauthorized.slice(0, DENIED_PREVIEW_LIMIT).join(', ');
    const more = unauthorized.length > DENIED_PREVIEW_LIMIT
      ? ` (+${unauthorized.length - DENIED_PREVIEW_LIMIT} more)`
      : '';
    return this.deny(session, sessionId, toolName, toolInput, unauthorized,
      `ACCESS DENIED: ${toolName} requested records outside this session's scope: ${preview}${more}. ` +
      `This task may only access record ${session.primaryRecordId}.`);
  }

  private deny(
    session: Session,
    sessionId: string,
    toolName: string,
    toolInput: JsonObject,
    unauthorized: string[],
    reason: string
  ): AccessDecision {
    session.violationCount += 1;

    logger.warn('Tool call denied', {
      sessionId: truncateId(sessionId),
      toolName,
      unauthorized: unauthorized.length,
      violationCount: session.violationCount
    });

    this.audit.emitSecurityViolation({
      sessionId,
      agentType: session.agentType,
      primaryRecordId: session.primaryRecordId,
      toolName,
      toolInput,
      unauthorizedIds: unauthorized,
      violationCount: session.violationCount
    });

    return {
      allowed: false,
      reason,
      code: AgentErrorCode.UNAUTHORIZED_ACCESS,
      violationCount: session.violationCount,
      terminate: this.violationLimit > 0 && session.violationCount >= this.violationLimit
    };
  }
}
