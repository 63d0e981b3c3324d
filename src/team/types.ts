/**
 * Runtime team contracts.
 *
 * The assembler resolves bindings through the registry and hands them to an
 * ExecutionEngine, which owns the native agent objects. Everything above the
 * engine (cache, chat service, routes) only sees the engine-neutral shapes
 * declared here.
 */
import type {
  AgentSpec,
  HierarchyConfig,
  HierarchyKey,
  ModelProvider,
  ToolKind,
  ToolOptions,
} from '../types/hierarchy';

export interface ModelDescriptor {
  provider: ModelProvider;
  modelId: string;
}

export interface ToolDescriptor {
  kind: ToolKind;
  /** Effective options: kind defaults overlaid with the caller's values */
  options: ToolOptions;
}

/** A model resolved through the registry, carrying the engine's native model. */
export interface ModelBinding<M> extends ModelDescriptor {
  model: M;
}

/** A tool kind resolved through the registry; one kind may expand to several native tools. */
export interface ToolBinding<T> extends ToolDescriptor {
  tools: T[];
}

export interface AgentRuntime {
  readonly id: string;
  readonly name: string;
  readonly role: string;
  readonly model: ModelDescriptor;
  readonly tools: readonly ToolDescriptor[];
}

export interface RunContext extends HierarchyKey {
  sessionId: string;
}

export interface RunResult {
  content: string;
  sessionId: string;
}

export interface DelegatorRuntime {
  readonly name: string;
  readonly model: ModelDescriptor;
  readonly members: readonly AgentRuntime[];
  readonly instructions: string;
  readonly historyEnabled: boolean;

  /**
   * Run one user turn. Session identity travels with the call, so one
   * cached delegator can serve concurrent sessions.
   */
  run(input: string, context: RunContext): Promise<RunResult>;
}

export interface BuildAgentInput<M, T> {
  spec: AgentSpec;
  model: ModelBinding<M>;
  tools: ToolBinding<T>[];
}

export interface BuildDelegatorInput<M, A extends AgentRuntime> {
  name: string;
  model: ModelBinding<M>;
  members: A[];
  instructions: string;
  historyEnabled: boolean;
}

export interface ExecutionEngine<M, T, A extends AgentRuntime> {
  buildAgent(input: BuildAgentInput<M, T>): A;
  buildDelegator(input: BuildDelegatorInput<M, A>): DelegatorRuntime;
}

/**
 * The assembled, reusable team for one (tenant, instance).
 */
export interface RuntimeTeam extends HierarchyKey {
  readonly delegator: DelegatorRuntime;
  readonly members: readonly AgentRuntime[];
  /** updatedAt of the configuration snapshot this team was built from */
  readonly configUpdatedAt: Date;
  readonly assembledAt: Date;
}

export interface TeamBuilder {
  assemble(hierarchy: HierarchyConfig): Promise<RuntimeTeam>;
}
