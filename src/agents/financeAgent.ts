import { z } from 'zod';
import { TaskContext } from '../types';
import { BaseAgent, describeScope, section } from './baseAgent';
import { FINANCE_SYSTEM_PROMPT } from './prompts';
import { defineTool, draft } from './tools';

export const APPROVAL_THRESHOLD_GBP = 1000;
export const VAT_RATE = 0.2;

export const COMMISSION_RATES = {
  standard: 0.15,
  retainer: 0.12,
  referral: 0.2
} as const;

const round2 = (value: number): number => Math.round(value * 100) / 100;

const lineItem = z.object({
  description: z.string().min(1),
  quantity: z.number().positive().default(1),
  unit_price_gbp: z.number().nonnegative(),
  vat_applicable: z.boolean().default(false)
});

const createInvoice = defineTool({
  name: 'create_invoice',
  description: 'Prepare an invoice draft with VAT and totals',
  sensitive: true,
  input: z.object({
    client_id: z.string().min(1),
    project_id: z.string().optional(),
    line_items: z.array(lineItem).min(1),
    due_days: z.number().int().positive().default(30),
    notes: z.string().optional()
  }),
  parameters: {
    client_id: { type: 'string', description: 'Client UUID' },
    project_id: { type: 'string', description: 'Project UUID' },
    line_items: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          description: { type: 'string' },
          quantity: { type: 'number' },
          unit_price_gbp: { type: 'number' },
          vat_applicable: { type: 'boolean' }
        },
        required: ['description', 'unit_price_gbp']
      }
    },
    due_days: { type: 'integer', description: 'Payment terms in days (default 30)' },
    notes: { type: 'string' }
  },
  required: ['client_id', 'line_items'],
  handle(input) {
    const subtotal = input.line_items.reduce((sum, item) => sum + item.quantity * item.unit_price_gbp, 0);
    const vat = input.line_items
      .filter((item) => item.vat_applicable)
      .reduce((sum, item) => sum + item.quantity * item.unit_price_gbp * VAT_RATE, 0);
    const total = round2(subtotal + vat);

    return draft('invoice', {
      client_id: input.client_id,
      project_id: input.project_id ?? null,
      line_items: input.line_items,
      subtotal_gbp: round2(subtotal),
      vat_gbp: round2(vat),
      total_gbp: total,
      due_days: input.due_days,
      exceeds_threshold: total > APPROVAL_THRESHOLD_GBP,
      notes: input.notes ?? null
    });
  }
});

const recordPayment = defineTool({
  name: 'record_payment',
  description: 'Prepare a payment record against an invoice',
  sensitive: true,
  input: z.object({
    invoice_id: z.string().min(1),
    amount_gbp: z.number().positive(),
    payment_method: z.enum(['bank_transfer', 'card', 'stripe', 'cash', 'other']),
    reference: z.string().optional()
  }),
  parameters: {
    invoice_id: { type: 'string', description: 'Invoice UUID' },
    amount_gbp: { type: 'number' },
    payment_method: { type: 'string', enum: ['bank_transfer', 'card', 'stripe', 'cash', 'other'] },
    reference: { type: 'string' }
  },
  required: ['invoice_id', 'amount_gbp', 'payment_method'],
  handle(input) {
    return draft('payment', {
      invoice_id: input.invoice_id,
      amount_gbp: input.amount_gbp,
      payment_method: input.payment_method,
      reference: input.reference ?? null,
      exceeds_threshold: input.amount_gbp > APPROVAL_THRESHOLD_GBP
    });
  }
});

const calculateCommission = defineTool({
  name: 'calculate_commission',
  description: 'Calculate commission for a gross amount',
  input: z.object({
    amount_gbp: z.number().nonnegative(),
    commission_type: z.enum(['standard', 'retainer', 'referral']).default('standard')
  }),
  parameters: {
    amount_gbp: { type: 'number' },
    commission_type: { type: 'string', enum: ['standard', 'retainer', 'referral'] }
  },
  required: ['amount_gbp'],
  handle(input) {
    const rate = COMMISSION_RATES[input.commission_type];
    const commission = round2(input.amount_gbp * rate);
    return draft('commission', {
      gross_amount_gbp: input.amount_gbp,
      commission_type: input.commission_type,
      commission_rate: rate,
      commission_gbp: commission,
      net_amount_gbp: round2(input.amount_gbp - commission)
    });
  }
});

export function reminderLevel(daysOverdue: number): { level: string; subject: string; urgency: string } {
  if (daysOverdue <= 7) {
    return { level: 'gentle', subject: 'Friendly Payment Reminder', urgency: 'low' };
  }
  if (daysOverdue <= 14) {
    return { level: 'gentle', subject: 'Payment Reminder - Invoice Overdue', urgency: 'medium' };
  }
  if (daysOverdue <= 21) {
    return { level: 'firm', subject: 'Payment Required - Invoice Overdue', urgency: 'high' };
  }
  return { level: 'final', subject: 'Final Notice - Immediate Payment Required', urgency: 'critical' };
}

const generatePaymentReminder = defineTool({
  name: 'generate_payment_reminder',
  description: 'Draft a payment reminder for an overdue invoice',
  sensitive: true,
  input: z.object({
    invoice_id: z.string().min(1),
    days_overdue: z.number().int().nonnegative(),
    body: z.string().optional()
  }),
  parameters: {
    invoice_id: { type: 'string' },
    days_overdue: { type: 'integer' },
    body: { type: 'string', description: 'Reminder text' }
  },
  required: ['invoice_id', 'days_overdue'],
  handle(input) {
    const { level, subject, urgency } = reminderLevel(input.days_overdue);
    return draft('payment_reminder', {
      invoice_id: input.invoice_id,
      days_overdue: input.days_overdue,
      reminder_level: level,
      subject,
      urgency,
      body: input.body ?? null,
      escalate_to_human: input.days_overdue >= 28,
      interest_applicable: input.days_overdue > 30
    });
  }
});

export class FinanceAgent extends BaseAgent {
  constructor() {
    super('FinanceAgent', 'finance', [createInvoice, recordPayment, calculateCommission, generatePaymentReminder]);
  }

  get systemPrompt(): string {
    return FINANCE_SYSTEM_PROMPT;
  }

  buildTaskPrompt(context: TaskContext): string {
    const parts = [
      '## Finance Task',
      `- Trigger: ${context.triggerEvent}`,
      `- Task type: ${context.classification?.taskType ?? 'general_finance'}`
    ];
    if (context.classification) {
      parts.push(`- Priority: ${context.classification.priority}`, `- Summary: ${context.classification.summary}`);
    }
    return [
      parts.join('\n'),
      describeScope(context),
      section('Context', context.payload),
      '## Instructions\nWork out the financial action, show the calculation, and list anything that needs approval.'
    ].join('\n\n');
  }
}
