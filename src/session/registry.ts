/**
 * Session Registry
 *
 * Issues and retires the time-boxed authorization scopes that bind one agent
 * task to the records it was dispatched for. Sessions live in process memory
 * only; a restart drops them.
 */

import { v4 as uuidv4 } from 'uuid';
import { componentLogger } from '../config/logger';
import { AgentType, UnknownSessionError } from '../types';

const logger = componentLogger('session-registry');

export interface Session {
  readonly sessionId: string;
  readonly agentType: AgentType;
  readonly primaryRecordId: string;
  readonly allowedRecordIds: Set<string>;
  readonly allowedCollections: Set<string>;
  readonly createdAt: Date;
  violationCount: number;
}

export interface SessionView {
  readonly sessionId: string;
  readonly agentType: AgentType;
  readonly primaryRecordId: string;
  readonly allowedRecordIds: readonly string[];
  readonly allowedCollections: readonly string[];
  readonly createdAt: Date;
  readonly violationCount: number;
}

export interface SessionSummary {
  readonly sessionId: string;
  readonly agentType: AgentType;
  readonly primaryRecordId: string;
  readonly durationSeconds: number;
  readonly violationCount: number;
}

export interface SessionSnapshot {
  sessionId: string;
  agentType: AgentType;
  primaryRecordId: string;
  allowedRecords: number;
  violations: number;
  ageSeconds: number;
}

export class SessionRegistry {
  private sessions: Map<string, Session> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Open a scope seeded with the primary record and any additional ids
   */
  createSession(
    agentType: AgentType,
    primaryRecordId: string,
    collection: string,
    additionalIds: Iterable<string> = []
  ): string {
    const sessionId = uuidv4();
    const allowedRecordIds = new Set<string>([primaryRecordId]);
    for (const id of additionalIds) {
      allowedRecordIds.add(id);
    }

    this.sessions.set(sessionId, {
      sessionId,
      agentType,
      primaryRecordId,
      allowedRecordIds,
      allowedCollections: new Set([collection]),
      createdAt: this.now(),
      violationCount: 0
    });

    logger.info('Session created', {
      sessionId: truncateId(sessionId),
      agentType,
      primaryRecordId,
      collection,
      allowedRecords: allowedRecordIds.size
    });

    return sessionId;
  }

  /**
   * Retire a session. Calling twice is a caller bug and throws.
   */
  endSession(sessionId: string): SessionSummary {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UnknownSessionError(sessionId);
    }
    this.sessions.delete(sessionId);

    const summary: SessionSummary = Object.freeze({
      sessionId,
      agentType: session.agentType,
      primaryRecordId: session.primaryRecordId,
      durationSeconds: (this.now().getTime() - session.createdAt.getTime()) / 1000,
      violationCount: session.violationCount
    });

    logger.info('Session ended', {
      sessionId: truncateId(sessionId),
      agentType: summary.agentType,
      durationSeconds: summary.durationSeconds,
      violations: summary.violationCount
    });

    return summary;
  }

  /**
   * Mutable handle for the access validator. Everything else should use getSession.
   */
  lookup(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  getSession(sessionId: string): SessionView | null {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    return Object.freeze({
      sessionId: session.sessionId,
      agentType: session.agentType,
      primaryRecordId: session.primaryRecordId,
      allowedRecordIds: [...session.allowedRecordIds],
      allowedCollections: [...session.allowedCollections],
      createdAt: new Date(session.createdAt.getTime()),
      violationCount: session.violationCount
    });
  }

  listSessions(): SessionSnapshot[] {
    const now = this.now().getTime();
    return [...this.sessions.values()].map((session) => ({
      sessionId: truncateId(session.sessionId),
      agentType: session.agentType,
      primaryRecordId: session.primaryRecordId,
      allowedRecords: session.allowedRecordIds.size,
      violations: session.violationCount,
      ageSeconds: Math.round((now - session.createdAt.getTime()) / 1000)
    }));
  }

  get size(): number {
    return this.sessions.size;
  }
}

export function truncateId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}
