/**
 * HTTP surface against an in-memory runtime
 */

import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';
import { textReply } from '../utils/scripted-llm';
import { createTestRuntime, TestRuntime } from '../utils/test-helpers';

describe('API', () => {
  let runtime: TestRuntime;
  let app: Application;

  beforeEach(() => {
    runtime = createTestRuntime([textReply('Done')], { repeatLast: true });
    app = createApp(runtime);
  });

  afterEach(async () => {
    await runtime.dispatcher.idle();
    await runtime.availability.flush();
    await runtime.audit.flush();
  });

  describe('GET /api/health', () => {
    it('should report healthy when the record store answers', async () => {
      const res = await request(app).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.services).toEqual({ recordStore: 'healthy' });
      expect(res.body.activeSessions).toBe(0);
    });

    it('should report degraded when the record store is unreachable', async () => {
      runtime.store.failOn('read');

      const res = await request(app).get('/api/health');

      expect(res.status).toBe(503);
      expect(res.body.status).toBe('degraded');
    });
  });

  describe('agents', () => {
    it('should list descriptors and their tools', async () => {
      const res = await request(app).get('/api/agents');

      expect(res.status).toBe(200);
      expect(res.body.data[0]).toMatchObject({ agentType: 'finance', name: 'FinanceAgent' });
      expect(res.body.data[0].tools).toContain('create_invoice');
    });

    it('should disable an agent immediately', async () => {
      const res = await request(app).post('/api/agents/finance/disable');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Agent finance disabled');
      expect(res.body.data.finance).toBe(false);
      expect(runtime.availability.isEnabled('finance')).toBe(false);
    });

    it('should toggle back and forth', async () => {
      await request(app).post('/api/agents/email/toggle');
      const res = await request(app).post('/api/agents/email/toggle');

      expect(res.body.data.email).toBe(true);
    });

    it('should answer 404 for an unknown agent type', async () => {
      const res = await request(app).post('/api/agents/legal/enable');

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({ code: 'UnknownAgentType', message: 'Unknown agent type: legal' });
    });

    it('should report every flag after disable-all', async () => {
      const res = await request(app).post('/api/agents/disable-all');
      const status = await request(app).get('/api/agents/status');

      expect(res.body.message).toBe('All agents disabled');
      expect(Object.values(status.body.data)).toEqual([false, false, false, false, false, false, false]);
    });

    it('should queue a manual trigger and run it in the background', async () => {
      const res = await request(app)
        .post('/api/agents/finance/trigger')
        .send({ collection: 'invoices', item_id: 'INV-1', context: { reason: 'month end' } });

      expect(res.status).toBe(202);
      expect(res.body.data).toMatchObject({ agentType: 'finance', itemId: 'INV-1' });
      expect(typeof res.body.data.taskId).toBe('string');

      await runtime.dispatcher.idle();
      expect(runtime.store.items('agent_logs').map((row) => row.trigger_event)).toEqual([
        'manual_trigger',
        'manual_trigger',
        'manual_trigger'
      ]);
    });

    it('should reject a trigger without an item id', async () => {
      const res = await request(app).post('/api/agents/finance/trigger').send({ collection: 'invoices' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details[0].field).toBe('item_id');
    });
  });

  describe('POST /api/webhook', () => {
    it('should accept a delivery and route by collection', async () => {
      const res = await request(app)
        .post('/api/webhook')
        .send({ event: 'items.create', collection: 'emails', keys: [42, 'E-2'] });

      expect(res.status).toBe(202);
      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({ agentType: 'email', itemId: '42' });
      expect(res.body.message).toBe('Task queued for email agent');
    });

    it('should refuse a delivery without ids', async () => {
      const res = await request(app).post('/api/webhook').send({ event: 'items.create', collection: 'emails' });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        code: 'NO_ITEM_ID',
        message: 'Webhook carries no item id',
        details: { collection: 'emails' }
      });
    });

    it('should answer 400 for malformed JSON', async () => {
      const res = await request(app).post('/api/webhook').set('Content-Type', 'application/json').send('{"event":');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_JSON');
    });
  });

  describe('sessions', () => {
    it('should list active sessions with truncated ids', async () => {
      const sessionId = runtime.sessions.createSession('finance', 'INV-1', 'invoices');

      const res = await request(app).get('/api/sessions');

      expect(res.body.data.activeCount).toBe(1);
      expect(res.body.data.sessions[0]).toMatchObject({
        sessionId: `${sessionId.slice(0, 8)}...`,
        agentType: 'finance',
        primaryRecordId: 'INV-1'
      });
    });

    it('should end a session once and answer 404 afterwards', async () => {
      const sessionId = runtime.sessions.createSession('finance', 'INV-1', 'invoices');

      const first = await request(app).post(`/api/sessions/${sessionId}/end`);
      const second = await request(app).post(`/api/sessions/${sessionId}/end`);

      expect(first.status).toBe(200);
      expect(first.body.data.summary).toMatchObject({ sessionId, agentType: 'finance', violationCount: 0 });
      expect(second.status).toBe(404);
      expect(second.body.error.code).toBe('UnknownSession');
    });
  });

  describe('POST /api/hook/validate', () => {
    it('should apply the session scope to external tool calls', async () => {
      const sessionId = runtime.sessions.createSession('finance', 'INV-1', 'invoices');

      const res = await request(app)
        .post('/api/hook/validate')
        .send({ session_id: sessionId, tool_name: 'store_read', tool_input: { collection: 'invoices', key: 'INV-2' } });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ allowed: false, code: 'UnauthorizedAccess', violationCount: 1 });
    });
  });

  describe('POST /api/approval', () => {
    const requestApproval = () =>
      runtime.approvals.requestDraftApproval({
        agentType: 'email',
        toolName: 'draft_email_reply',
        draft: { draft_id: 'email_reply_1', draft_type: 'email_reply', requires_approval: true },
        collection: 'emails',
        itemId: 'E-1'
      });

    it('should approve the named draft', async () => {
      const promptId = await requestApproval();

      const res = await request(app)
        .post('/api/approval')
        .send({ prompt_id: promptId, response: 'APPROVE', context: { draft_id: 'email_reply_1' } });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ promptId, status: 'approved', draftId: 'email_reply_1' });
    });

    it('should answer 409 when the draft does not match', async () => {
      const promptId = await requestApproval();

      const res = await request(app)
        .post('/api/approval')
        .send({ prompt_id: promptId, response: 'approve', context: { draft_id: 'email_reply_2' } });

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('ApprovalMismatch');
    });

    it('should answer 404 for an unknown prompt', async () => {
      const res = await request(app).post('/api/approval').send({ prompt_id: 'nope', response: 'reject' });

      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('Approval request nope not found');
    });

    it('should reject an unknown response', async () => {
      const res = await request(app).post('/api/approval').send({ prompt_id: 'p', response: 'maybe' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('prompts', () => {
    it('should list stored prompts and reload on demand', async () => {
      runtime.store.seed('service_prompts', [
        { id: 'P-1', prompt_name: 'email_agent_system', prompt_content: 'Reply kindly', status: 'active' }
      ]);

      const listed = await request(app).get('/api/prompts');
      const reloaded = await request(app).post('/api/prompts/reload');

      expect(listed.body.data.storedPrompts).toEqual(['email_agent_system']);
      expect(listed.body.data.cacheTtlSeconds).toBe(300);
      expect(reloaded.body.data).toEqual({ promptsLoaded: ['email_agent_system'], count: 1 });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nope');

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Cannot GET /api/nope' });
  });
});
