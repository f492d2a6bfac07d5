import { z } from 'zod';
import { ConversationDriver, StateChange } from '../conversationDriver';
import { BaseAgent } from '../baseAgent';
import { FinanceAgent } from '../financeAgent';
import { defineTool } from '../tools';
import { AccessValidator } from '../../safety/accessValidator';
import { SessionRegistry } from '../../session/registry';
import { AuditLog } from '../../services/auditLog';
import { agentFailure, AgentErrorCode, ConversationMessage, TaskContext, ToolResultBlock } from '../../types';
import { InMemoryRecordStore } from '../../../tests/utils/in-memory-store';
import { ScriptedLlm, textReply, toolReply, transportFailure } from '../../../tests/utils/scripted-llm';

class LeakyAgent extends BaseAgent {
  constructor() {
    super('LeakyAgent', 'finance', [
      defineTool({
        name: 'send_now',
        description: 'Returns a non-draft result',
        sensitive: true,
        input: z.object({}),
        parameters: {},
        handle: () => ({ sent: true })
      })
    ]);
  }

  get systemPrompt(): string {
    return 'leaky';
  }

  buildTaskPrompt(): string {
    return 'leak';
  }
}

function toolResults(message: ConversationMessage | undefined): ToolResultBlock[] {
  if (!message || message.role !== 'user' || typeof message.content === 'string') {
    throw new Error('expected a tool result message');
  }
  return message.content;
}

describe('ConversationDriver', () => {
  let store: InMemoryRecordStore;
  let sessions: SessionRegistry;
  let validator: AccessValidator;
  let context: TaskContext;

  const driverFor = (llm: ScriptedLlm, options: { maxTurns?: number; violationLimit?: number } = {}) =>
    new ConversationDriver(
      llm,
      options.violationLimit === undefined
        ? validator
        : new AccessValidator(sessions, new AuditLog(store), { violationLimit: options.violationLimit }),
      store,
      { maxTurns: options.maxTurns }
    );

  beforeEach(() => {
    store = new InMemoryRecordStore().seed('invoices', [{ id: 'INV-1', total: 100 }]);
    sessions = new SessionRegistry();
    validator = new AccessValidator(sessions, new AuditLog(store));
    context = {
      sessionId: sessions.createSession('finance', 'INV-1', 'invoices'),
      authorizedRecord: 'INV-1',
      authorizedCollection: 'invoices',
      triggerEvent: 'invoice_request',
      payload: {}
    };
  });

  it('should complete on the first end reply', async () => {
    const llm = new ScriptedLlm([textReply('All done')]);

    const outcome = await driverFor(llm).run({ systemPrompt: 'sys', taskPrompt: 'task' });

    expect(outcome).toEqual({
      ok: true,
      output: 'All done',
      usage: { inputTokens: 10, outputTokens: 5 },
      turns: 1,
      toolCalls: []
    });
    expect(llm.requests[0].messages).toEqual([{ role: 'user', content: 'task' }]);
    expect(llm.requests[0].tools).toEqual([]);
  });

  it('should stop after exactly maxTurns sends when the model never finishes', async () => {
    const llm = new ScriptedLlm(
      [toolReply([{ name: 'store_read', input: { collection: 'invoices', action: 'read', key: 'INV-1' } }])],
      { repeatLast: true }
    );

    const outcome = await driverFor(llm, { maxTurns: 10 }).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.code).toBe(AgentErrorCode.TURN_BUDGET_EXCEEDED);
      expect(outcome.failure.message).toBe('Conversation exceeded 10 turns');
    }
    expect(outcome.turns).toBe(10);
    expect(llm.callCount).toBe(10);
    expect(outcome.usage).toEqual({ inputTokens: 200, outputTokens: 80 });
  });

  it('should return an allowed read to the model', async () => {
    const llm = new ScriptedLlm([
      toolReply([{ name: 'store_read', input: { collection: 'invoices', action: 'read', key: 'INV-1' } }]),
      textReply('Read it')
    ]);

    const outcome = await driverFor(llm).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    expect(outcome.ok).toBe(true);
    expect(toolResults(llm.requests[1].messages[2])).toEqual([
      {
        type: 'tool_result',
        tool_use_id: 'toolu_1',
        content: '{"collection":"invoices","item":{"id":"INV-1","total":100}}',
        is_error: false
      }
    ]);
  });

  it('should feed a denial back as an error result and keep going', async () => {
    const llm = new ScriptedLlm([
      toolReply([{ name: 'store_write', input: { collection: 'invoices', action: 'update', key: 'INV-2', data: {} } }]),
      textReply('Understood')
    ]);

    const outcome = await driverFor(llm).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    const [result] = toolResults(llm.requests[1].messages[2]);
    expect(result.is_error).toBe(true);
    expect(result.content).toMatch(/^ACCESS DENIED/);
    expect(outcome.ok).toBe(true);
    expect(outcome.toolCalls[0].verdict).toBe('denied');
    expect(sessions.lookup(context.sessionId)?.violationCount).toBe(1);
    expect(store.calls.filter((call) => call.operation === 'update')).toEqual([]);
  });

  it('should end the conversation once the violation limit is reached', async () => {
    const llm = new ScriptedLlm([
      toolReply([{ name: 'store_read', input: { collection: 'invoices', action: 'read', key: 'INV-9' } }]),
      textReply('never sent')
    ]);

    const outcome = await driverFor(llm, { violationLimit: 1 }).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.code).toBe(AgentErrorCode.UNAUTHORIZED_ACCESS);
      expect(outcome.failure.message).toBe('Session violation limit reached');
    }
    expect(llm.callCount).toBe(1);
  });

  it('should answer unknown tools with an UnknownTool error result', async () => {
    const llm = new ScriptedLlm([toolReply([{ name: 'delete_everything', input: {} }]), textReply('ok')]);

    await driverFor(llm).run({ systemPrompt: 'sys', taskPrompt: 'task', tools: { agent: new FinanceAgent(), context } });

    expect(toolResults(llm.requests[1].messages[2])).toEqual([
      {
        type: 'tool_result',
        tool_use_id: 'toolu_1',
        content: '{"error":"UnknownTool","message":"Unknown tool: delete_everything"}',
        is_error: true
      }
    ]);
  });

  it('should report handler failures as ToolExecutionError results', async () => {
    const llm = new ScriptedLlm([
      toolReply([{ name: 'store_write', input: { collection: 'clients', action: 'update', key: 'INV-1', data: { a: 1 } } }]),
      textReply('ok')
    ]);

    const outcome = await driverFor(llm).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    const [result] = toolResults(llm.requests[1].messages[2]);
    expect(result.content).toBe('{"error":"ToolExecutionError","message":"Item INV-1 not found"}');
    expect(result.is_error).toBe(true);
    expect(outcome.toolCalls[0].verdict).toBe('failed');
  });

  it('should mark sensitive tool results and keep their draft flag', async () => {
    const llm = new ScriptedLlm([
      toolReply([
        {
          name: 'create_invoice',
          input: { client_id: 'CLI-1', line_items: [{ description: 'Shoot', unit_price_gbp: 500 }] }
        }
      ]),
      textReply('Drafted')
    ]);

    const outcome = await driverFor(llm).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new FinanceAgent(), context }
    });

    const [call] = outcome.toolCalls;
    expect(call.sensitive).toBe(true);
    expect(call.verdict).toBe('executed');
    expect(call.result.requires_approval).toBe(true);
    expect(call.result.total_gbp).toBe(500);
  });

  it('should reject a sensitive tool that returns something other than a draft', async () => {
    const llm = new ScriptedLlm([toolReply([{ name: 'send_now', input: {} }]), textReply('ok')]);

    const outcome = await driverFor(llm).run({
      systemPrompt: 'sys',
      taskPrompt: 'task',
      tools: { agent: new LeakyAgent(), context }
    });

    expect(outcome.toolCalls[0].verdict).toBe('rejected');
    expect(toolResults(llm.requests[1].messages[2])[0].content).toBe(
      '{"error":"ToolExecutionError","message":"send_now must return a draft that requires approval"}'
    );
  });

  it('should end in the error state on a transport failure', async () => {
    const failure = agentFailure(AgentErrorCode.TRANSPORT_TIMEOUT, 'timed out');
    const llm = new ScriptedLlm([transportFailure(failure)]);
    const driver = driverFor(llm);
    const states: StateChange[] = [];
    driver.on('state', (change: StateChange) => states.push(change));

    const outcome = await driver.run({ systemPrompt: 'sys', taskPrompt: 'task' });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure).toEqual({ code: AgentErrorCode.TRANSPORT_TIMEOUT, message: 'timed out', retryable: true });
    }
    expect(states.map((change) => change.to)).toEqual(['error']);
  });

  it('should fail when a tool-less conversation requests tools', async () => {
    const llm = new ScriptedLlm([toolReply([{ name: 'store_read', input: {} }])]);

    const outcome = await driverFor(llm).run({ systemPrompt: 'sys', taskPrompt: 'task' });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.code).toBe(AgentErrorCode.UNKNOWN_TOOL);
    }
  });
});
