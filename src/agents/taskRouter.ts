import { agentFailure, AgentErrorCode, AgentFailure, AgentType, Classification } from '../types';
import { AgentDescriptor } from './baseAgent';
import { agentTypeForDepartment, AgentRegistry } from './registry';

export type RouteDecision =
  | { kind: 'approval'; classification: Classification }
  | { kind: 'agent'; agentType: AgentType; descriptor: AgentDescriptor; classification: Classification }
  | { kind: 'unroutable'; failure: AgentFailure; classification: Classification };

/**
 * Turn a classification into the next step. Pure: no service calls.
 */
export class TaskRouter {
  constructor(private readonly agents: AgentRegistry) {}

  route(classification: Classification): RouteDecision {
    if (classification.requiresHumanApproval) {
      return { kind: 'approval', classification };
    }

    const agentType = agentTypeForDepartment(classification.department);
    const descriptor = agentType ? this.agents.get(agentType) : undefined;
    if (!agentType || !descriptor) {
      return {
        kind: 'unroutable',
        classification,
        failure: agentFailure(
          AgentErrorCode.NO_AGENT_FOR_DEPARTMENT,
          `No agent handles department ${classification.department}`,
          { department: classification.department }
        )
      };
    }

    return { kind: 'agent', agentType, descriptor, classification };
  }
}
