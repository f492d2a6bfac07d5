import { agentTypeForCollection } from '../taskDispatcher';
import { AgentRegistry } from '../../agents/registry';
import { agentFailure, AgentErrorCode, AgentTask, Department, isAwaitingApproval } from '../../types';
import { textReply, toolReply, transportFailure } from '../../../tests/utils/scripted-llm';
import { classificationReply, createTestRuntime } from '../../../tests/utils/test-helpers';

function task(overrides: Partial<AgentTask> = {}): AgentTask {
  return {
    taskId: 'task-1',
    agentType: 'finance',
    triggerEvent: 'invoice_request',
    collection: 'invoices',
    itemId: 'INV-1',
    context: { client: 'CLI-1' },
    ...overrides
  };
}

describe('TaskDispatcher', () => {
  describe('availability', () => {
    it('should skip a disabled agent without calling the model or opening a session', async () => {
      const runtime = createTestRuntime([textReply('unused')]);
      runtime.availability.disable('finance');

      const result = await runtime.dispatcher.dispatchTask(task());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(AgentErrorCode.AGENT_DISABLED);
        expect(result.error.message).toBe('Agent finance is disabled');
      }
      expect(runtime.llm.callCount).toBe(0);
      expect(runtime.sessions.size).toBe(0);
    });

    it('should skip classification when the orchestrator is disabled', async () => {
      const runtime = createTestRuntime([textReply(classificationReply())]);
      runtime.availability.disable('orchestrator');

      const result = await runtime.dispatcher.classifyAndDispatch({ eventType: 'x', source: 'inbox', payload: {} });

      expect(!result.success && result.error.code).toBe(AgentErrorCode.AGENT_DISABLED);
      expect(runtime.llm.callCount).toBe(0);
    });

    it('should skip a routed agent that is disabled after classifying', async () => {
      const runtime = createTestRuntime([textReply(classificationReply())]);
      runtime.availability.disable('finance');

      const result = await runtime.dispatcher.classifyAndDispatch({ eventType: 'x', source: 'inbox', payload: {} });

      expect(!result.success && result.error.code).toBe(AgentErrorCode.AGENT_DISABLED);
      expect(runtime.llm.callCount).toBe(1);
      expect(runtime.sessions.size).toBe(0);
    });
  });

  describe('direct dispatch', () => {
    it('should run the agent and request approval for each executed draft', async () => {
      const runtime = createTestRuntime([
        toolReply([
          { name: 'create_invoice', input: { client_id: 'CLI-1', line_items: [{ description: 'Shoot', unit_price_gbp: 800 }] } }
        ]),
        textReply('Invoice drafted')
      ]);

      const result = await runtime.dispatcher.dispatchTask(task());

      expect(result.success).toBe(true);
      if (result.success && !isAwaitingApproval(result)) {
        expect(result.agentName).toBe('FinanceAgent');
        expect(result.output).toBe('Invoice drafted');
        expect(result.approvalIds).toHaveLength(1);
        expect(result.usage).toEqual({ inputTokens: 30, outputTokens: 13 });
        expect(result.logs).toContain('create_invoice: executed');
      }
      const [prompt] = runtime.store.items('human_prompts');
      expect(prompt).toMatchObject({ status: 'pending', prompt_type: 'approval_needed' });
      expect(runtime.sessions.size).toBe(0);
    });

    it('should put additional ids in the session scope', async () => {
      const runtime = createTestRuntime([
        toolReply([
          { id: 'a', name: 'store_read', input: { collection: 'emails', action: 'read', key: 'E-2' } },
          { id: 'b', name: 'store_read', input: { collection: 'emails', action: 'read', key: 'E-3' } }
        ]),
        textReply('Read the thread')
      ]);

      const result = await runtime.dispatcher.dispatchTask(
        task({ agentType: 'email', collection: 'emails', itemId: 'E-1', additionalRecordIds: ['E-2'] })
      );

      expect(result.logs).toContain('store_read: executed');
      expect(result.logs).toContain('store_read: denied');
    });

    it('should use a stored system prompt with variables filled in', async () => {
      const runtime = createTestRuntime([textReply('ok')]);
      runtime.store.seed('service_prompts', [
        {
          id: 'P-1',
          prompt_name: 'finance_agent_system',
          prompt_content: 'Finance for {{item_id}} in {{collection}}',
          status: 'active'
        }
      ]);

      await runtime.dispatcher.dispatchTask(task());

      expect(runtime.llm.requests[0].systemPrompt).toBe('Finance for INV-1 in invoices');
    });

    it('should end the session when the conversation fails', async () => {
      const runtime = createTestRuntime([transportFailure(agentFailure(AgentErrorCode.TRANSPORT_CONNECTION_ERROR, 'down'))]);

      const result = await runtime.dispatcher.dispatchTask(task());

      expect(!result.success && result.error.code).toBe(AgentErrorCode.TRANSPORT_CONNECTION_ERROR);
      expect(runtime.sessions.size).toBe(0);
    });

    it('should end the session when the conversation throws', async () => {
      const runtime = createTestRuntime([]);

      await expect(runtime.dispatcher.dispatchTask(task())).rejects.toThrow('ScriptedLlm has no reply for call 1');
      expect(runtime.sessions.size).toBe(0);
    });

    it('should keep the outcome and request approvals when the session was ended mid-run', async () => {
      let sessionId = '';
      const runtime = createTestRuntime([
        toolReply([
          { name: 'create_invoice', input: { client_id: 'CLI-1', line_items: [{ description: 'Shoot', unit_price_gbp: 800 }] } }
        ]),
        () => {
          runtime.sessions.endSession(sessionId);
          return textReply('Invoice drafted');
        }
      ]);
      const open = runtime.sessions.createSession.bind(runtime.sessions);
      jest.spyOn(runtime.sessions, 'createSession').mockImplementation((...args) => {
        sessionId = open(...args);
        return sessionId;
      });

      const result = await runtime.dispatcher.dispatchTask(task());

      expect(result.success).toBe(true);
      if (result.success && !isAwaitingApproval(result)) {
        expect(result.output).toBe('Invoice drafted');
        expect(result.approvalIds).toHaveLength(1);
        expect(result.logs).toContain('session was force-ended before the conversation finished');
      }
      expect(runtime.store.items('human_prompts')).toHaveLength(1);
    });

    it('should not let an agent queue its own approved action', async () => {
      const runtime = createTestRuntime([
        toolReply([
          {
            name: 'store_write',
            input: {
              collection: 'approved_actions',
              action: 'create',
              data: { draft_id: 'payment_x', status: 'queued', payload: { amount_gbp: 99999 } }
            }
          }
        ]),
        textReply('Queued')
      ]);

      const result = await runtime.dispatcher.dispatchTask(task());
      await runtime.audit.flush();

      expect(result.logs).toContain('store_write: denied');
      expect(runtime.store.items('approved_actions')).toEqual([]);
      expect(runtime.store.items('agent_logs')).toContainEqual(
        expect.objectContaining({ trigger_event: 'security_violation', status: 'blocked' })
      );
    });

    it('should report UnknownAgentType when no descriptor is registered', async () => {
      const runtime = createTestRuntime([], { agents: new AgentRegistry([]) });

      const result = await runtime.dispatcher.dispatchTask(task({ agentType: 'lead' }));

      expect(!result.success && result.error.code).toBe(AgentErrorCode.UNKNOWN_AGENT_TYPE);
      expect(runtime.sessions.size).toBe(0);
    });
  });

  describe('classification', () => {
    it('should classify, route and add classification usage', async () => {
      const runtime = createTestRuntime([textReply(classificationReply()), textReply('Handled')]);

      const result = await runtime.dispatcher.classifyAndDispatch({
        eventType: 'email_received',
        source: 'inbox',
        payload: { subject: 'Invoice' },
        collection: 'emails',
        itemId: 'E-1'
      });

      expect(result.success).toBe(true);
      expect(result.agentType).toBe('finance');
      expect(result.usage).toEqual({ inputTokens: 20, outputTokens: 10 });
      expect(result.classification?.department).toBe(Department.FINANCE);
    });

    it('should hold approval-required events and run no agent', async () => {
      const runtime = createTestRuntime([textReply(classificationReply({ requires_human_approval: true }))]);

      const result = await runtime.dispatcher.dispatchTask(task({ taskId: 'task-9', agentType: 'orchestrator' }));

      expect(isAwaitingApproval(result)).toBe(true);
      expect(runtime.llm.callCount).toBe(1);
      expect(runtime.store.items('human_prompts')[0]).toMatchObject({
        prompt_type: 'decision_required',
        context: { draft_id: 'classified_event_task-9', type: 'classified_event' }
      });
    });

    it('should fail unroutable departments with NoAgentForDepartment', async () => {
      const runtime = createTestRuntime([textReply(classificationReply({ department: 'unknown' }))]);

      const result = await runtime.dispatcher.classifyAndDispatch({ eventType: 'x', source: 'inbox', payload: {} });

      expect(!result.success && result.error.code).toBe(AgentErrorCode.NO_AGENT_FOR_DEPARTMENT);
    });

    it('should fall back and hold the event for approval when the reply cannot be decoded', async () => {
      const runtime = createTestRuntime([textReply('no idea')]);

      const result = await runtime.dispatcher.classifyAndDispatch({ eventType: 'x', source: 'inbox', payload: {} });

      expect(isAwaitingApproval(result)).toBe(true);
      expect(result.logs[0]).toBe('classification fallback: Classifier reply did not contain a valid classification');
    });

    it('should use a synthetic primary id for events without an item id', async () => {
      const runtime = createTestRuntime([textReply(classificationReply()), textReply('done')]);

      const result = await runtime.dispatcher.classifyAndDispatch({ eventType: 'x', source: 'inbox', payload: {} });

      expect(runtime.llm.requests[1].messages[0]).toMatchObject({
        role: 'user',
        content: expect.stringContaining(`Authorized record: task_${result.taskId} (inbox)`)
      });
    });
  });

  describe('workflows', () => {
    it('should pass earlier outputs to later steps', async () => {
      const runtime = createTestRuntime([
        textReply(classificationReply()),
        textReply('Step one done'),
        textReply(classificationReply({ department: 'marketing' })),
        textReply('Step two done')
      ]);

      const workflow = await runtime.dispatcher.executeWorkflow([
        { eventType: 'invoice_paid', source: 'finance', payload: { invoice: 'INV-1' } },
        { eventType: 'thank_client', source: 'marketing', payload: {} }
      ]);

      expect(workflow).toMatchObject({ completed: true, awaitingApproval: false, stoppedAt: null });
      expect(workflow.results.map((result) => result.agentType)).toEqual(['finance', 'marketing']);
      expect(runtime.llm.requests[2].messages[0].content).toContain('"previous_results"');
      expect(runtime.llm.requests[2].messages[0].content).toContain('Step one done');
    });

    it('should stop at the first failure by default', async () => {
      const runtime = createTestRuntime([textReply(classificationReply({ department: 'unknown' }))]);

      const workflow = await runtime.dispatcher.executeWorkflow([
        { eventType: 'a', source: 'x', payload: {} },
        { eventType: 'b', source: 'x', payload: {} }
      ]);

      expect(workflow).toMatchObject({ completed: false, awaitingApproval: false, stoppedAt: 0 });
      expect(workflow.results).toHaveLength(1);
    });

    it('should stop at a step awaiting approval', async () => {
      const runtime = createTestRuntime([textReply(classificationReply({ requires_human_approval: true }))]);

      const workflow = await runtime.dispatcher.executeWorkflow([
        { eventType: 'a', source: 'x', payload: {} },
        { eventType: 'b', source: 'x', payload: {} }
      ]);

      expect(workflow).toMatchObject({ completed: false, awaitingApproval: true, stoppedAt: 0 });
    });
  });

  describe('webhooks', () => {
    it('should map collections to agent types', () => {
      expect(agentTypeForCollection('emails')).toBe('email');
      expect(agentTypeForCollection('leads')).toBe('lead');
      expect(agentTypeForCollection('milestones')).toBe('tracker');
      expect(agentTypeForCollection('invoices')).toBe('orchestrator');
    });

    it('should reject deliveries without an item id', () => {
      const runtime = createTestRuntime([]);

      expect(runtime.dispatcher.acceptWebhook({ event: 'items.create', collection: 'emails', payload: {} })).toEqual({
        accepted: false,
        reason: 'Webhook carries no item id'
      });
    });

    it('should run accepted deliveries in the background and audit each stage', async () => {
      const runtime = createTestRuntime([textReply('Replied')]);

      const acceptance = runtime.dispatcher.acceptWebhook({
        event: 'items.create',
        collection: 'emails',
        keys: ['E-1', 'E-2'],
        payload: { subject: 'Hello' }
      });
      await runtime.dispatcher.idle();

      expect(acceptance).toMatchObject({ accepted: true, agentType: 'email', itemId: 'E-1' });
      expect(runtime.store.items('agent_logs').map((row) => row.status)).toEqual(['received', 'processing', 'completed']);
    });

    it('should audit a failed background task', async () => {
      const runtime = createTestRuntime([transportFailure(agentFailure(AgentErrorCode.TRANSPORT_TIMEOUT, 'slow'))]);

      runtime.dispatcher.acceptWebhook({ event: 'items.create', collection: 'leads', key: 'L-1', payload: {} });
      await runtime.dispatcher.idle();

      const rows = runtime.store.items('agent_logs');
      expect(rows.map((row) => row.status)).toEqual(['received', 'processing', 'failed']);
      expect(rows[2].error).toBe('TransportTimeout: slow');
    });
  });
});
