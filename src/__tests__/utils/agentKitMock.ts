/**
 * In-process stand-in for @inngest/agent-kit.
 *
 * Agents answer deterministically. An agent holding the delegate tool calls it
 * on its first turn of a run (with the member named in `control.delegateTo`)
 * and relays the member response on the next turn. Networks drive the router
 * and the history hooks the way agent-kit does.
 */

export interface MockMessage {
  type: string;
  role?: string;
  content?: unknown;
}

export interface MockTool {
  name: string;
  description?: string;
  parameters?: unknown;
  handler(input: Record<string, unknown>, context: unknown): Promise<unknown>;
}

export interface MockAgentOptions {
  name: string;
  description?: string;
  system: string;
  model?: unknown;
  tools?: MockTool[];
}

export interface MockRunOptions {
  callCount: number;
}

export interface MockResult {
  agentName: string;
  output: MockMessage[];
  toolCalls: MockMessage[];
  createdAt: Date;
}

export interface MockAgent extends MockAgentOptions {
  run(input: string, options?: MockRunOptions): Promise<MockResult>;
}

export interface MockHistory {
  createThread(args: Record<string, unknown>): Promise<{ threadId: string }>;
  get(args: { threadId: string }): Promise<MockResult[]>;
  appendUserMessage(args: { threadId: string; userMessage: { content: string; role: 'user' } }): Promise<void>;
  appendResults(args: { threadId: string; newResults: MockResult[] }): Promise<void>;
}

export interface MockNetworkOptions {
  name: string;
  agents: MockAgent[];
  defaultModel?: unknown;
  maxIter?: number;
  router(args: { callCount: number; lastResult?: MockResult }): MockAgent | undefined;
  history?: MockHistory;
}

export interface MockControl {
  delegateTo: string;
  agents: MockAgent[];
  /** Agents in the order their run started */
  calls: MockAgent[];
  tools: MockTool[];
  networks: MockNetworkOptions[];
  historyLoads: MockResult[][];
}

export interface AgentKitMock {
  control: MockControl;
  AgentResult: new (agentName: string, output: MockMessage[], toolCalls: MockMessage[], createdAt: Date) => MockResult;
  createAgent(options: MockAgentOptions): MockAgent;
  createTool(options: MockTool): MockTool;
  createNetwork(options: MockNetworkOptions): { run(input: string): Promise<{ state: { results: MockResult[] } }> };
  openai(options: Record<string, unknown>): Record<string, unknown>;
  anthropic(options: Record<string, unknown>): Record<string, unknown>;
  gemini(options: Record<string, unknown>): Record<string, unknown>;
}

function relayText(output: unknown): string {
  if (typeof output !== 'object' || output === null) return String(output);
  if ('response' in output) return String(output.response);
  if ('error' in output) return `error: ${String(output.error)}`;
  return JSON.stringify(output);
}

export function createAgentKitMock(): AgentKitMock {
  const control: MockControl = {
    delegateTo: '',
    agents: [],
    calls: [],
    tools: [],
    networks: [],
    historyLoads: [],
  };

  class AgentResult implements MockResult {
    constructor(
      public agentName: string,
      public output: MockMessage[],
      public toolCalls: MockMessage[],
      public createdAt: Date
    ) {}
  }

  function text(name: string, content: string): MockResult {
    return new AgentResult(name, [{ type: 'text', role: 'assistant', content }], [], new Date());
  }

  function createAgent(options: MockAgentOptions): MockAgent {
    let lastDelegation: unknown;
    const agent: MockAgent = {
      ...options,
      run: async (input, runOptions) => {
        control.calls.push(agent);
        const delegate = options.tools?.find((tool) => tool.name === 'delegate_task_to_member');
        if (!delegate) {
          return text(options.name, `${options.name} answered: ${input}`);
        }
        if ((runOptions?.callCount ?? 0) === 0) {
          lastDelegation = await delegate.handler({ member: control.delegateTo, task: input }, {});
          return new AgentResult(
            options.name,
            [{ type: 'tool_call', role: 'assistant' }],
            [{ type: 'tool_result', role: 'tool_result', content: lastDelegation }],
            new Date()
          );
        }
        return text(options.name, `Coordinator relays: ${relayText(lastDelegation)}`);
      },
    };
    control.agents.push(agent);
    return agent;
  }

  function createTool(options: MockTool): MockTool {
    control.tools.push(options);
    return options;
  }

  function createNetwork(options: MockNetworkOptions) {
    control.networks.push(options);
    return {
      run: async (input: string) => {
        const { history } = options;
        const results: MockResult[] = [];
        let threadId = '';

        if (history) {
          threadId = (await history.createThread({})).threadId;
          const loaded = await history.get({ threadId });
          control.historyLoads.push(loaded);
          results.push(...loaded);
          await history.appendUserMessage({ threadId, userMessage: { content: input, role: 'user' } });
        }

        const newResults: MockResult[] = [];
        let lastResult: MockResult | undefined;
        for (let callCount = 0; callCount < (options.maxIter ?? 10); callCount++) {
          const agent = options.router({ callCount, lastResult });
          if (!agent) break;
          lastResult = await agent.run(input, { callCount });
          newResults.push(lastResult);
          results.push(lastResult);
        }

        if (history) {
          await history.appendResults({ threadId, newResults });
        }
        return { state: { results } };
      },
    };
  }

  return {
    control,
    AgentResult,
    createAgent,
    createTool,
    createNetwork,
    openai: (options) => ({ adapter: 'openai', ...options }),
    anthropic: (options) => ({ adapter: 'anthropic', ...options }),
    gemini: (options) => ({ adapter: 'gemini', ...options }),
  };
}
