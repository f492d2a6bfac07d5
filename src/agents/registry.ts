import { AgentType, Department } from '../types';
import { AgentDescriptor } from './baseAgent';
import { ClientServicesAgent } from './clientServicesAgent';
import { EmailAgent } from './emailAgent';
import { FinanceAgent } from './financeAgent';
import { MarketingAgent } from './marketingAgent';

/** Departments with their own descriptor */
export const DIRECT_ROUTES: Partial<Record<Department, AgentType>> = {
  [Department.FINANCE]: 'finance',
  [Department.MARKETING]: 'marketing',
  [Department.CLIENT_SERVICES]: 'client_services'
};

/** Departments handled by an adjacent department's descriptor */
export const COLLAPSE_ROUTES: Partial<Record<Department, AgentType>> = {
  [Department.SALES]: 'marketing',
  [Department.PRODUCTION]: 'client_services',
  [Department.OPERATIONS]: 'client_services'
};

export function agentTypeForDepartment(department: Department): AgentType | null {
  return DIRECT_ROUTES[department] ?? COLLAPSE_ROUTES[department] ?? null;
}

/**
 * Static descriptor table built once per runtime. `orchestrator` has no
 * descriptor: its tasks are classified and routed instead.
 */
export class AgentRegistry {
  private readonly descriptors: ReadonlyMap<AgentType, AgentDescriptor>;

  constructor(descriptors?: Iterable<[AgentType, AgentDescriptor]>) {
    if (descriptors) {
      this.descriptors = new Map(descriptors);
      return;
    }
    const finance = new FinanceAgent();
    const marketing = new MarketingAgent();
    const clientServices = new ClientServicesAgent();
    this.descriptors = new Map<AgentType, AgentDescriptor>([
      ['finance', finance],
      ['marketing', marketing],
      ['client_services', clientServices],
      ['email', new EmailAgent()],
      ['lead', marketing],
      ['tracker', clientServices]
    ]);
  }

  get(agentType: AgentType): AgentDescriptor | undefined {
    return this.descriptors.get(agentType);
  }

  forDepartment(department: Department): AgentDescriptor | undefined {
    const agentType = agentTypeForDepartment(department);
    return agentType ? this.descriptors.get(agentType) : undefined;
  }

  list(): Array<{ agentType: AgentType; name: string; tools: string[] }> {
    return [...this.descriptors.entries()].map(([agentType, descriptor]) => ({
      agentType,
      name: descriptor.name,
      tools: descriptor.toolCatalog().map((tool) => tool.name)
    }));
  }
}
