import { z } from 'zod';
import { TaskContext } from '../types';
import { BaseAgent, describeScope, section } from './baseAgent';
import { MARKETING_SYSTEM_PROMPT } from './prompts';
import { defineTool, draft } from './tools';

const CAMPAIGN_TYPES = ['email', 'social', 'content', 'event', 'multi_channel'] as const;
const PLATFORMS = ['instagram', 'facebook', 'linkedin', 'twitter', 'tiktok'] as const;

const createCampaignDraft = defineTool({
  name: 'create_campaign_draft',
  description: 'Draft a marketing campaign plan',
  input: z.object({
    campaign_name: z.string().min(1),
    campaign_type: z.enum(CAMPAIGN_TYPES),
    target_audience: z.string().min(1),
    objectives: z.array(z.string()).default([]),
    budget_gbp: z.number().nonnegative().optional(),
    start_date: z.string().optional(),
    end_date: z.string().optional()
  }),
  parameters: {
    campaign_name: { type: 'string' },
    campaign_type: { type: 'string', enum: [...CAMPAIGN_TYPES] },
    target_audience: { type: 'string' },
    objectives: { type: 'array', items: { type: 'string' } },
    budget_gbp: { type: 'number' },
    start_date: { type: 'string' },
    end_date: { type: 'string' }
  },
  required: ['campaign_name', 'campaign_type', 'target_audience'],
  handle(input) {
    return draft('campaign', { ...input });
  }
});

const draftSocialPost = defineTool({
  name: 'draft_social_post',
  description: 'Draft a social media post for review',
  sensitive: true,
  input: z.object({
    platform: z.enum(PLATFORMS),
    content: z.string().min(1),
    hashtags: z.array(z.string()).default([]),
    call_to_action: z.string().optional(),
    scheduled_time: z.string().optional()
  }),
  parameters: {
    platform: { type: 'string', enum: [...PLATFORMS] },
    content: { type: 'string', description: 'Post caption' },
    hashtags: { type: 'array', items: { type: 'string' } },
    call_to_action: { type: 'string' },
    scheduled_time: { type: 'string' }
  },
  required: ['platform', 'content'],
  handle(input) {
    return draft('social_post', { ...input });
  }
});

const createEmailSequence = defineTool({
  name: 'create_email_sequence',
  description: 'Draft an email nurturing sequence',
  sensitive: true,
  input: z.object({
    sequence_name: z.string().min(1),
    trigger: z.string().min(1),
    emails: z
      .array(
        z.object({
          subject: z.string().min(1),
          body_summary: z.string().default(''),
          delay_days: z.number().int().nonnegative().default(0)
        })
      )
      .min(1),
    target_segment: z.string().optional()
  }),
  parameters: {
    sequence_name: { type: 'string' },
    trigger: { type: 'string', description: 'What starts the sequence' },
    emails: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          subject: { type: 'string' },
          body_summary: { type: 'string' },
          delay_days: { type: 'integer' }
        },
        required: ['subject']
      }
    },
    target_segment: { type: 'string' }
  },
  required: ['sequence_name', 'trigger', 'emails'],
  handle(input) {
    return draft('email_sequence', { ...input, email_count: input.emails.length });
  }
});

export function leadTemperature(interactionCount: number): { temperature: string; sequence: string } {
  if (interactionCount === 0) {
    return { temperature: 'cold', sequence: 'introduction' };
  }
  if (interactionCount < 3) {
    return { temperature: 'warm', sequence: 'engagement' };
  }
  return { temperature: 'hot', sequence: 'conversion' };
}

const analyzeLeadForNurturing = defineTool({
  name: 'analyze_lead_for_nurturing',
  description: 'Score a lead and recommend a nurturing sequence',
  input: z.object({
    lead_id: z.string().optional(),
    source: z.string().default('unknown'),
    interactions: z.array(z.record(z.unknown())).default([])
  }),
  parameters: {
    lead_id: { type: 'string' },
    source: { type: 'string', description: 'Where the lead came from' },
    interactions: { type: 'array', items: { type: 'object' } }
  },
  required: [],
  handle(input) {
    const count = input.interactions.length;
    const { temperature, sequence } = leadTemperature(count);
    return draft('lead_analysis', {
      lead_id: input.lead_id ?? null,
      lead_temperature: temperature,
      recommended_sequence: sequence,
      engagement_score: Math.min(100, count * 15 + 25),
      source_channel: input.source
    });
  }
});

export class MarketingAgent extends BaseAgent {
  constructor() {
    super('MarketingAgent', 'marketing', [
      createCampaignDraft,
      draftSocialPost,
      createEmailSequence,
      analyzeLeadForNurturing
    ]);
  }

  get systemPrompt(): string {
    return MARKETING_SYSTEM_PROMPT;
  }

  buildTaskPrompt(context: TaskContext): string {
    const header = [
      '## Marketing Task',
      `- Trigger: ${context.triggerEvent}`,
      `- Task type: ${context.classification?.taskType ?? 'general_marketing'}`
    ].join('\n');
    return [
      header,
      describeScope(context),
      section('Context', context.payload),
      '## Instructions\nDecide the marketing action, prepare the drafts, and note which need approval.'
    ].join('\n\n');
  }
}
