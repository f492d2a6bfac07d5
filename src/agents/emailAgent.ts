import { z } from 'zod';
import { TaskContext } from '../types';
import { BaseAgent, describeScope, section } from './baseAgent';
import { EMAIL_SYSTEM_PROMPT } from './prompts';
import { defineTool, draft } from './tools';

const draftEmailReply = defineTool({
  name: 'draft_email_reply',
  description: 'Draft a reply to the inbound email for approval',
  sensitive: true,
  input: z.object({
    email_id: z.string().min(1),
    response_type: z.enum(['inquiry', 'complaint', 'request', 'other']),
    subject: z.string().min(1),
    body: z.string().min(1),
    reasoning: z.string().optional()
  }),
  parameters: {
    email_id: { type: 'string', description: 'The email being answered' },
    response_type: { type: 'string', enum: ['inquiry', 'complaint', 'request', 'other'] },
    subject: { type: 'string' },
    body: { type: 'string' },
    reasoning: { type: 'string', description: 'Why this reply' }
  },
  required: ['email_id', 'response_type', 'subject', 'body'],
  handle(input) {
    return draft('email_reply', { ...input, workflow_type: 'email_response' });
  }
});

export class EmailAgent extends BaseAgent {
  constructor() {
    super('EmailAgent', 'email', [draftEmailReply]);
  }

  get systemPrompt(): string {
    return EMAIL_SYSTEM_PROMPT;
  }

  buildTaskPrompt(context: TaskContext): string {
    return [
      `## Email Processing Task\n- Event: ${context.triggerEvent}\n- Email ID: ${context.authorizedRecord}`,
      describeScope(context),
      section('Email Data', context.payload),
      `## Instructions\nRead the email with store_read (collection "emails", key "${context.authorizedRecord}"), ` +
        'decide the reply type and draft it with draft_email_reply. Spam needs no reply.'
    ].join('\n\n');
  }
}
