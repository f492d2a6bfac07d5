/**
 * Domain types shared across the dispatch core
 */

import { AgentFailure } from './errors';
import { TokenUsage } from './llm';

export * from './errors';
export * from './llm';

export enum Department {
  FINANCE = 'finance',
  MARKETING = 'marketing',
  CLIENT_SERVICES = 'client_services',
  PRODUCTION = 'production',
  SALES = 'sales',
  OPERATIONS = 'operations',
  UNKNOWN = 'unknown'
}

export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const COMPLEXITIES = ['simple', 'moderate', 'complex'] as const;
export type Complexity = (typeof COMPLEXITIES)[number];

export const AGENT_TYPES = [
  'orchestrator',
  'email',
  'lead',
  'tracker',
  'finance',
  'marketing',
  'client_services'
] as const;
export type AgentType = (typeof AGENT_TYPES)[number];

export function isAgentType(value: string): value is AgentType {
  return (AGENT_TYPES as readonly string[]).includes(value);
}

export interface Classification {
  department: Department;
  priority: Priority;
  taskType: string;
  requiresHumanApproval: boolean;
  complexity: Complexity;
  secondaryDepartments: Department[];
  summary: string;
  suggestedActions?: string[];
  notes?: string;
}

/**
 * Event as it arrives from an upstream system, before classification
 */
export interface InboundEvent {
  eventType: string;
  source: string;
  payload: Record<string, unknown>;
  collection?: string;
  itemId?: string;
}

/**
 * Unit of work bound to one primary record
 */
export interface AgentTask {
  taskId?: string;
  agentType: AgentType;
  triggerEvent: string;
  collection: string;
  itemId: string;
  context: Record<string, unknown>;
  additionalRecordIds?: string[];
}

/**
 * Context handed to a department agent when it builds its task prompt
 */
export interface TaskContext {
  sessionId: string;
  authorizedRecord: string;
  authorizedCollection: string;
  triggerEvent: string;
  classification?: Classification;
  payload: Record<string, unknown>;
}

export const AUDIT_STATUSES = ['received', 'processing', 'completed', 'failed', 'blocked'] as const;
export type AuditStatus = (typeof AUDIT_STATUSES)[number];

export interface AuditRecord {
  agent_type: string;
  trigger_event: string;
  collection: string;
  item_id: string;
  status: AuditStatus;
  result: string | null;
  error: string | null;
  timestamp: string;
}

export interface DispatchSuccess {
  success: true;
  agentType: AgentType;
  taskId: string;
  agentName: string;
  output: string;
  usage: TokenUsage;
  classification?: Classification;
  approvalIds: string[];
  logs: string[];
}

export interface DispatchFailure {
  success: false;
  agentType: AgentType;
  taskId: string;
  error: AgentFailure;
  usage: TokenUsage;
  classification?: Classification;
  logs: string[];
}

export interface DispatchAwaitingApproval {
  success: true;
  agentType: AgentType;
  taskId: string;
  awaitingApproval: true;
  approvalId: string;
  classification: Classification;
  usage: TokenUsage;
  logs: string[];
}

export type DispatchResult = DispatchSuccess | DispatchFailure | DispatchAwaitingApproval;

export function isAwaitingApproval(result: DispatchResult): result is DispatchAwaitingApproval {
  return result.success && 'awaitingApproval' in result;
}
