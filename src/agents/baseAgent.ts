import { AgentType, JsonObject, TaskContext, ToolSchema } from '../types';
import { AgentTool, STORE_TOOLS, ToolContext } from './tools';

/**
 * What the conversation driver needs from a department agent
 */
export interface AgentDescriptor {
  readonly name: string;
  readonly agentType: AgentType;
  readonly systemPrompt: string;
  buildTaskPrompt(context: TaskContext): string;
  toolCatalog(): ToolSchema[];
  findTool(name: string): AgentTool | undefined;
  handleTool(name: string, input: JsonObject, context: ToolContext): Promise<JsonObject>;
}

export abstract class BaseAgent implements AgentDescriptor {
  private readonly tools: ReadonlyMap<string, AgentTool>;

  constructor(
    readonly name: string,
    readonly agentType: AgentType,
    departmentTools: readonly AgentTool[]
  ) {
    const tools = new Map<string, AgentTool>();
    for (const tool of [...STORE_TOOLS, ...departmentTools]) {
      if (tools.has(tool.schema.name)) {
        throw new Error(`${name} registers tool ${tool.schema.name} twice`);
      }
      tools.set(tool.schema.name, tool);
    }
    this.tools = tools;
  }

  abstract get systemPrompt(): string;

  abstract buildTaskPrompt(context: TaskContext): string;

  toolCatalog(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema);
  }

  findTool(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  async handleTool(name: string, input: JsonObject, context: ToolContext): Promise<JsonObject> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`${this.name} has no tool named ${name}`);
    }
    return tool.invoke(input, context);
  }
}

/**
 * Shared section appended to every department's task prompt
 */
export function describeScope(context: TaskContext): string {
  return [
    '## Access Scope',
    `- Session: ${context.sessionId}`,
    `- Authorized record: ${context.authorizedRecord} (${context.authorizedCollection})`,
    '- Requests for any other record id will be denied.',
    '- Every outward action must be prepared as a draft for human approval.'
  ].join('\n');
}

export function section(title: string, value: unknown): string {
  return `## ${title}\n${JSON.stringify(value, null, 2)}`;
}
