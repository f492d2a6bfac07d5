import { ConversationDriver } from './agents/conversationDriver';
import { AgentRegistry } from './agents/registry';
import { FallbackSettings, TaskClassifier } from './agents/taskClassifier';
import { TaskRouter } from './agents/taskRouter';
import { env, getAnthropicConfig, initializeAnthropic } from './config';
import { createRecordStore, RecordStore } from './db/recordStore';
import { AccessValidator } from './safety/accessValidator';
import { AnthropicConversationService } from './services/anthropicService';
import { ApprovalService } from './services/approvalService';
import { AuditLog } from './services/auditLog';
import { AvailabilityRegistry } from './services/availability';
import { PromptStore } from './services/promptStore';
import { TaskDispatcher } from './services/taskDispatcher';
import { SessionRegistry } from './session/registry';
import { LlmConversationService } from './types';

/**
 * Every stateful collaborator of the dispatch core, built once at start and
 * passed to whatever needs it
 */
export interface AgentRuntime {
  store: RecordStore;
  llm: LlmConversationService;
  sessions: SessionRegistry;
  availability: AvailabilityRegistry;
  audit: AuditLog;
  validator: AccessValidator;
  driver: ConversationDriver;
  agents: AgentRegistry;
  classifier: TaskClassifier;
  router: TaskRouter;
  prompts: PromptStore;
  approvals: ApprovalService;
  dispatcher: TaskDispatcher;
}

export interface RuntimeOptions {
  store?: RecordStore;
  llm?: LlmConversationService;
  agents?: AgentRegistry;
  maxTurns?: number;
  violationLimit?: number;
  promptCacheTtlSeconds?: number;
  fallback?: Partial<FallbackSettings>;
}

export function createRuntime(options: RuntimeOptions = {}): AgentRuntime {
  const store = options.store ?? createRecordStore();
  const llm = options.llm ?? new AnthropicConversationService(initializeAnthropic(), getAnthropicConfig());

  const sessions = new SessionRegistry();
  const audit = new AuditLog(store);
  const availability = new AvailabilityRegistry(store);
  const validator = new AccessValidator(sessions, audit, {
    violationLimit: options.violationLimit ?? env.SESSION_VIOLATION_LIMIT
  });
  const driver = new ConversationDriver(llm, validator, store, {
    maxTurns: options.maxTurns ?? env.AGENT_MAX_TURNS
  });
  const agents = options.agents ?? new AgentRegistry();
  const classifier = new TaskClassifier(driver, {
    enabled: options.fallback?.enabled ?? env.CLASSIFICATION_FALLBACK_ENABLED,
    department: options.fallback?.department ?? env.CLASSIFICATION_FALLBACK_DEPARTMENT,
    requiresHumanApproval:
      options.fallback?.requiresHumanApproval ?? env.CLASSIFICATION_FALLBACK_REQUIRES_APPROVAL
  });
  const router = new TaskRouter(agents);
  const prompts = new PromptStore(store, options.promptCacheTtlSeconds ?? env.PROMPT_CACHE_TTL_SECONDS);
  const approvals = new ApprovalService(store, audit);
  const dispatcher = new TaskDispatcher({
    sessions,
    availability,
    agents,
    classifier,
    router,
    driver,
    prompts,
    approvals,
    audit
  });

  return {
    store,
    llm,
    sessions,
    availability,
    audit,
    validator,
    driver,
    agents,
    classifier,
    router,
    prompts,
    approvals,
    dispatcher
  };
}
