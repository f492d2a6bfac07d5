/**
 * Failure taxonomy for the dispatch core.
 *
 * Failures travel as values (`AgentFailure`) through the driver, classifier and
 * dispatcher. `AgentError` wraps one for the few operations where a throw is
 * the contract, such as ending a session twice.
 */

export enum AgentErrorCode {
  UNKNOWN_SESSION = 'UnknownSession',
  UNAUTHORIZED_ACCESS = 'UnauthorizedAccess',
  CLASSIFICATION_PARSE_ERROR = 'ClassificationParseError',
  TOOL_EXECUTION_ERROR = 'ToolExecutionError',
  UNKNOWN_TOOL = 'UnknownTool',
  TRANSPORT_TIMEOUT = 'TransportTimeout',
  TRANSPORT_RATE_LIMITED = 'TransportRateLimited',
  TRANSPORT_CONNECTION_ERROR = 'TransportConnectionError',
  TRANSPORT_SERVER_ERROR = 'TransportServerError',
  TRANSPORT_REQUEST_REJECTED = 'TransportRequestRejected',
  AGENT_DISABLED = 'AgentDisabled',
  UNKNOWN_AGENT_TYPE = 'UnknownAgentType',
  NO_AGENT_FOR_DEPARTMENT = 'NoAgentForDepartment',
  TURN_BUDGET_EXCEEDED = 'TurnBudgetExceeded',
  APPROVAL_MISMATCH = 'ApprovalMismatch'
}

const RETRYABLE_CODES: ReadonlySet<AgentErrorCode> = new Set([
  AgentErrorCode.TRANSPORT_TIMEOUT,
  AgentErrorCode.TRANSPORT_RATE_LIMITED,
  AgentErrorCode.TRANSPORT_CONNECTION_ERROR,
  AgentErrorCode.TRANSPORT_SERVER_ERROR
]);

export interface AgentFailure {
  code: AgentErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export function isRetryable(code: AgentErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

export function agentFailure(
  code: AgentErrorCode,
  message: string,
  details?: Record<string, unknown>
): AgentFailure {
  const failure: AgentFailure = { code, message, retryable: isRetryable(code) };
  if (details) {
    failure.details = details;
  }
  return failure;
}

export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: AgentErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.retryable = isRetryable(code);
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toFailure(): AgentFailure {
    return agentFailure(this.code, this.message, this.details);
  }
}

export class UnknownSessionError extends AgentError {
  constructor(sessionId: string) {
    super(AgentErrorCode.UNKNOWN_SESSION, `Unknown session: ${sessionId}`, { sessionId });
    this.name = 'UnknownSessionError';
  }
}

export class UnknownAgentTypeError extends AgentError {
  constructor(agentType: string) {
    super(AgentErrorCode.UNKNOWN_AGENT_TYPE, `Unknown agent type: ${agentType}`, { agentType });
    this.name = 'UnknownAgentTypeError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
