import { z } from 'zod';
import { TaskContext } from '../types';
import { BaseAgent, describeScope, section } from './baseAgent';
import { CLIENT_SERVICES_SYSTEM_PROMPT } from './prompts';
import { defineTool, draft, PRIORITY_PARAM } from './tools';

const priority = z.enum(['critical', 'high', 'medium', 'low']);

export const RESPONSE_TIMES = {
  critical: '2 hours',
  high: '4 hours',
  medium: '24 hours',
  low: '48 hours'
} as const;

export const HEALTH_WEIGHTS = {
  communication: 0.2,
  payment: 0.25,
  project: 0.25,
  support: 0.15,
  feedback: 0.15
} as const;

const draftClientCommunication = defineTool({
  name: 'draft_client_communication',
  description: 'Draft a message to a client for review',
  sensitive: true,
  input: z.object({
    client_id: z.string().min(1),
    contact_id: z.string().optional(),
    communication_type: z.enum(['email', 'phone_script', 'meeting_agenda', 'follow_up']),
    subject: z.string().min(1),
    content: z.string().min(1),
    purpose: z.enum(['update', 'request', 'response', 'introduction', 'follow_up', 'escalation']).optional(),
    priority: priority.default('medium')
  }),
  parameters: {
    client_id: { type: 'string' },
    contact_id: { type: 'string' },
    communication_type: { type: 'string', enum: ['email', 'phone_script', 'meeting_agenda', 'follow_up'] },
    subject: { type: 'string' },
    content: { type: 'string' },
    purpose: {
      type: 'string',
      enum: ['update', 'request', 'response', 'introduction', 'follow_up', 'escalation']
    },
    priority: PRIORITY_PARAM
  },
  required: ['client_id', 'communication_type', 'subject', 'content'],
  handle(input) {
    return draft('client_communication', { ...input });
  }
});

const createSupportTicket = defineTool({
  name: 'create_support_ticket',
  description: 'Prepare a support ticket with a target response time',
  input: z.object({
    client_id: z.string().min(1),
    title: z.string().min(1),
    description: z.string().min(1),
    category: z.enum(['bug', 'feature_request', 'question', 'complaint', 'billing', 'other']),
    priority: priority.default('medium'),
    project_id: z.string().optional()
  }),
  parameters: {
    client_id: { type: 'string' },
    title: { type: 'string' },
    description: { type: 'string' },
    category: { type: 'string', enum: ['bug', 'feature_request', 'question', 'complaint', 'billing', 'other'] },
    priority: PRIORITY_PARAM,
    project_id: { type: 'string' }
  },
  required: ['client_id', 'title', 'description', 'category'],
  handle(input) {
    return draft('support_ticket', {
      ...input,
      target_response_time: RESPONSE_TIMES[input.priority]
    });
  }
});

const score = z.number().min(0).max(100);

export function clientHealth(factors: Partial<Record<keyof typeof HEALTH_WEIGHTS, number>>): {
  overall: number;
  status: 'healthy' | 'needs_attention' | 'at_risk';
  scores: Record<keyof typeof HEALTH_WEIGHTS, number>;
} {
  const scores = {
    communication: factors.communication ?? 70,
    payment: factors.payment ?? 80,
    project: factors.project ?? 75,
    support: factors.support ?? 85,
    feedback: factors.feedback ?? 70
  };
  const weighted =
    scores.communication * HEALTH_WEIGHTS.communication +
    scores.payment * HEALTH_WEIGHTS.payment +
    scores.project * HEALTH_WEIGHTS.project +
    scores.support * HEALTH_WEIGHTS.support +
    scores.feedback * HEALTH_WEIGHTS.feedback;
  const overall = Math.round(weighted * 10) / 10;
  const status = overall >= 80 ? 'healthy' : overall >= 60 ? 'needs_attention' : 'at_risk';
  return { overall, status, scores };
}

const calculateClientHealth = defineTool({
  name: 'calculate_client_health',
  description: 'Compute a weighted client health score',
  input: z.object({
    client_id: z.string().min(1),
    factors: z
      .object({
        communication_score: score.optional(),
        payment_score: score.optional(),
        project_score: score.optional(),
        support_score: score.optional(),
        feedback_score: score.optional()
      })
      .default({})
  }),
  parameters: {
    client_id: { type: 'string' },
    factors: {
      type: 'object',
      properties: {
        communication_score: { type: 'number', minimum: 0, maximum: 100 },
        payment_score: { type: 'number', minimum: 0, maximum: 100 },
        project_score: { type: 'number', minimum: 0, maximum: 100 },
        support_score: { type: 'number', minimum: 0, maximum: 100 },
        feedback_score: { type: 'number', minimum: 0, maximum: 100 }
      }
    }
  },
  required: ['client_id'],
  handle(input) {
    const health = clientHealth({
      communication: input.factors.communication_score,
      payment: input.factors.payment_score,
      project: input.factors.project_score,
      support: input.factors.support_score,
      feedback: input.factors.feedback_score
    });
    return draft('client_health', {
      client_id: input.client_id,
      overall_score: health.overall,
      health_status: health.status,
      factors: health.scores,
      requires_escalation: health.status === 'at_risk'
    });
  }
});

const escalateToHuman = defineTool({
  name: 'escalate_to_human',
  description: 'Hand an issue to a team member',
  input: z.object({
    client_id: z.string().min(1),
    issue_summary: z.string().min(1),
    reason: z.enum(['client_dissatisfied', 'complex_issue', 'contract_risk', 'legal_concern', 'request_management']),
    urgency: z.enum(['immediate', 'today', 'this_week']).default('today')
  }),
  parameters: {
    client_id: { type: 'string' },
    issue_summary: { type: 'string' },
    reason: {
      type: 'string',
      enum: ['client_dissatisfied', 'complex_issue', 'contract_risk', 'legal_concern', 'request_management']
    },
    urgency: { type: 'string', enum: ['immediate', 'today', 'this_week'] }
  },
  required: ['client_id', 'issue_summary', 'reason'],
  handle(input) {
    return draft('escalation', {
      ...input,
      requires_immediate_attention: input.urgency === 'immediate'
    });
  }
});

const scheduleFollowUp = defineTool({
  name: 'schedule_follow_up',
  description: 'Propose a follow-up with a client',
  input: z.object({
    client_id: z.string().min(1),
    follow_up_type: z.enum(['call', 'email', 'meeting', 'check_in']),
    scheduled_date: z.string().min(1),
    purpose: z.string().min(1),
    notes: z.string().optional()
  }),
  parameters: {
    client_id: { type: 'string' },
    follow_up_type: { type: 'string', enum: ['call', 'email', 'meeting', 'check_in'] },
    scheduled_date: { type: 'string' },
    purpose: { type: 'string' },
    notes: { type: 'string' }
  },
  required: ['client_id', 'follow_up_type', 'scheduled_date', 'purpose'],
  handle(input) {
    return draft('follow_up', { ...input });
  }
});

export class ClientServicesAgent extends BaseAgent {
  constructor() {
    super('ClientServicesAgent', 'client_services', [
      draftClientCommunication,
      createSupportTicket,
      calculateClientHealth,
      escalateToHuman,
      scheduleFollowUp
    ]);
  }

  get systemPrompt(): string {
    return CLIENT_SERVICES_SYSTEM_PROMPT;
  }

  buildTaskPrompt(context: TaskContext): string {
    const header = [
      '## Client Services Task',
      `- Trigger: ${context.triggerEvent}`,
      `- Task type: ${context.classification?.taskType ?? 'general_client_services'}`
    ].join('\n');
    return [
      header,
      describeScope(context),
      section('Context', context.payload),
      '## Instructions\nAssess the client situation, prepare any communication as a draft, and say whether a person should step in.'
    ].join('\n\n');
  }
}
