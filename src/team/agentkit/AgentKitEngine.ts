/**
 * Execution engine on @inngest/agent-kit.
 *
 * Members become agent-kit agents. The delegator is a coordinator agent whose
 * only tool hands a task to a named member. Agents, models and tools are built
 * once per team; each run gets its own network with history bound to the
 * run's session, so concurrent sessions never share conversation state.
 */
import { createAgent, createNetwork, createTool, type Agent, type Tool } from '@inngest/agent-kit';
import { z } from 'zod';
import { logger } from '../../config';
import type { SessionService } from '../../services/SessionService';
import type { HierarchyKey } from '../../types/hierarchy';
import type {
  AgentRuntime,
  BuildAgentInput,
  BuildDelegatorInput,
  DelegatorRuntime,
  ExecutionEngine,
  ModelDescriptor,
  RunContext,
  RunResult,
  ToolDescriptor,
} from '../types';
import { resultText, toAgentResults, toTranscriptMessages, userMessage } from './history';
import type { AgentKitModel } from './registry';

type TeamState = Record<string, unknown>;

export const DELEGATE_TOOL_NAME = 'delegate_task_to_member';

export interface AgentKitMember extends AgentRuntime {
  readonly agent: Agent<TeamState>;
}

export interface AgentKitEngineOptions {
  /** Upper bound on agent calls in one network run */
  maxIter: number;
}

function describe({ provider, modelId }: ModelDescriptor): ModelDescriptor {
  return { provider, modelId };
}

function memberPrompt(name: string, role: string): string {
  const intro = `You are ${name}, a member of a specialist team.`;
  return role ? `${intro}\n\n${role}` : intro;
}

/**
 * Name each member is addressed by. Members sharing a name are told apart by id.
 */
function memberLabels(members: readonly AgentKitMember[]): Map<string, AgentKitMember> {
  const counts = new Map<string, number>();
  for (const member of members) {
    counts.set(member.name, (counts.get(member.name) ?? 0) + 1);
  }
  return new Map(
    members.map((member) => [counts.get(member.name) === 1 ? member.name : `${member.name} (${member.id})`, member])
  );
}

function coordinatorPrompt(instructions: string, roster: ReadonlyMap<string, AgentKitMember>): string {
  if (roster.size === 0) {
    return `${instructions}\n\nYou have no team members. Answer the user directly.`;
  }
  const lines = [...roster].map(([label, member]) => (member.role ? `- ${label}: ${member.role}` : `- ${label}`));
  return (
    `${instructions}\n\nTeam members:\n${lines.join('\n')}\n\n` +
    `Use the ${DELEGATE_TOOL_NAME} tool to hand a task to one member, ` +
    'then answer the user from the member response.'
  );
}

export class AgentKitDelegator implements DelegatorRuntime {
  readonly name: string;
  readonly model: ModelDescriptor;
  readonly members: readonly AgentKitMember[];
  readonly instructions: string;
  readonly historyEnabled: boolean;
  readonly coordinator: Agent<TeamState>;

  private readonly nativeModel: AgentKitModel;
  private readonly roster: ReadonlyMap<string, AgentKitMember>;

  constructor(
    input: BuildDelegatorInput<AgentKitModel, AgentKitMember>,
    private readonly sessions: SessionService,
    private readonly maxIter: number
  ) {
    this.name = input.name;
    this.model = describe(input.model);
    this.nativeModel = input.model.model;
    this.members = input.members;
    this.instructions = input.instructions;
    this.historyEnabled = input.historyEnabled;
    this.roster = memberLabels(input.members);
    if (this.roster.size !== new Set(input.members.map((member) => member.name)).size) {
      logger.warn(
        { delegator: input.name, members: [...this.roster.keys()] },
        'Team members share a name, addressing them by name and id'
      );
    }

    this.coordinator = createAgent<TeamState>({
      name: input.name,
      description: 'Routes each request to the most suitable team member',
      system: coordinatorPrompt(input.instructions, this.roster),
      model: input.model.model,
      tools: this.roster.size > 0 ? [this.createDelegateTool()] : [],
    });
  }

  async run(input: string, context: RunContext): Promise<RunResult> {
    const { sessionId } = context;
    const key: HierarchyKey = { tenantId: context.tenantId, instanceId: context.instanceId };
    const coordinator = this.coordinator;

    const network = createNetwork<TeamState>({
      name: this.name,
      agents: [coordinator],
      defaultModel: this.nativeModel,
      maxIter: this.maxIter,
      // First call delegates; a call that used a tool gets one more turn to answer
      router: ({ callCount, lastResult }) => {
        if (callCount === 0) return coordinator;
        return lastResult && lastResult.toolCalls.length > 0 ? coordinator : undefined;
      },
      history: this.historyEnabled
        ? {
            createThread: async () => ({ threadId: sessionId }),
            get: async () => toAgentResults(await this.sessions.getMessages(key, sessionId)),
            appendUserMessage: async ({ userMessage: message }) => {
              await this.sessions.appendMessages(key, sessionId, [userMessage(message.content, new Date())]);
            },
            appendResults: async ({ newResults }) => {
              await this.sessions.appendMessages(key, sessionId, toTranscriptMessages(newResults));
            },
          }
        : undefined,
    });

    const result = await network.run(input);
    const last = result.state.results.at(-1);
    return { content: last ? resultText(last) : '', sessionId };
  }

  private createDelegateTool(): Tool.Any {
    const roster = this.roster;
    const labels = [...roster.keys()];
    const [firstLabel = '', ...otherLabels] = labels;

    return createTool({
      name: DELEGATE_TOOL_NAME,
      description: 'Hand a task to one team member and return its answer.',
      parameters: z.object({
        member: z.enum([firstLabel, ...otherLabels]).describe('Name of the team member'),
        task: z.string().describe('Self-contained description of what the member should do'),
      }),
      handler: async ({ member, task }) => {
        const target = roster.get(member);
        if (!target) {
          return { error: `Unknown team member '${member}'`, available: labels };
        }

        logger.debug({ delegator: this.name, member, agentId: target.id }, 'Delegating task to member');
        const result = await target.agent.run(task);
        return {
          member,
          response: resultText(result),
          toolResults: result.toolCalls.map((call) => call.content),
        };
      },
    });
  }
}

export class AgentKitEngine implements ExecutionEngine<AgentKitModel, Tool.Any, AgentKitMember> {
  constructor(
    private readonly sessions: SessionService,
    private readonly options: AgentKitEngineOptions
  ) {}

  buildAgent({ spec, model, tools }: BuildAgentInput<AgentKitModel, Tool.Any>): AgentKitMember {
    const agent = createAgent<TeamState>({
      name: spec.name,
      description: spec.role,
      system: memberPrompt(spec.name, spec.role),
      model: model.model,
      tools: tools.flatMap((binding) => binding.tools),
    });

    const descriptors: ToolDescriptor[] = tools.map(({ kind, options }) => ({ kind, options }));
    return {
      id: spec.id,
      name: spec.name,
      role: spec.role,
      model: describe(model),
      tools: descriptors,
      agent,
    };
  }

  buildDelegator(input: BuildDelegatorInput<AgentKitModel, AgentKitMember>): AgentKitDelegator {
    return new AgentKitDelegator(input, this.sessions, this.options.maxIter);
  }
}
