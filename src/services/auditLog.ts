import { componentLogger } from '../config/logger';
import { RecordStore } from '../db/recordStore';
import { AuditRecord, AuditStatus, describeError, JsonObject } from '../types';

const logger = componentLogger('audit-log');

export const AUDIT_COLLECTION = 'agent_logs';
const MAX_INPUT_PREVIEW = 500;

export interface AuditEntry {
  agentType: string;
  triggerEvent: string;
  collection: string;
  itemId: string;
  status: AuditStatus;
  result?: unknown;
  error?: string | null;
}

export interface SecurityViolation {
  sessionId: string;
  agentType: string;
  primaryRecordId: string;
  toolName: string;
  toolInput: JsonObject;
  unauthorizedIds: string[];
  violationCount: number;
}

/**
 * Append-only writer for the agent_logs collection. Failures are logged and
 * never reach the caller.
 */
export class AuditLog {
  private pending: Set<Promise<void>> = new Set();

  constructor(
    private readonly store: RecordStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(entry: AuditEntry): Promise<void> {
    const row: AuditRecord = {
      agent_type: entry.agentType,
      trigger_event: entry.triggerEvent,
      collection: entry.collection,
      item_id: entry.itemId,
      status: entry.status,
      result: serializeResult(entry.result),
      error: entry.error ?? null,
      timestamp: this.now().toISOString()
    };

    try {
      await this.store.createItem(AUDIT_COLLECTION, { ...row });
    } catch (error) {
      logger.error('Failed to write audit record', {
        agentType: entry.agentType,
        status: entry.status,
        error: describeError(error)
      });
    }
  }

  /**
   * Fire-and-forget. The write is tracked so `flush()` can await it.
   */
  emitSecurityViolation(violation: SecurityViolation): void {
    logger.warn('Security violation', {
      sessionId: violation.sessionId,
      agentType: violation.agentType,
      toolName: violation.toolName,
      unauthorizedIds: violation.unauthorizedIds,
      violationCount: violation.violationCount
    });

    this.track(
      this.record({
        agentType: violation.agentType,
        triggerEvent: 'security_violation',
        collection: 'security',
        itemId: violation.primaryRecordId,
        status: 'blocked',
        result: {
          session_id: violation.sessionId,
          tool_name: violation.toolName,
          tool_input: JSON.stringify(violation.toolInput).slice(0, MAX_INPUT_PREVIEW),
          unauthorized_ids: violation.unauthorizedIds,
          violation_count: violation.violationCount
        },
        error: `Unauthorized access attempt: ${violation.unauthorizedIds.join(', ')}`
      })
    );
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private track(write: Promise<void>): void {
    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }
}

function serializeResult(result: unknown): string | null {
  if (result === undefined || result === null) {
    return null;
  }
  return typeof result === 'string' ? result : JSON.stringify(result);
}
