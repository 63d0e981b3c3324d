import { logger } from '../config';
import { AssemblyError } from '../errors';
import type { AgentSpec, HierarchyConfig } from '../types/hierarchy';
import type { BindingRegistry } from './registry';
import type {
  AgentRuntime,
  DelegatorRuntime,
  ExecutionEngine,
  ModelDescriptor,
  RuntimeTeam,
  TeamBuilder,
} from './types';

export interface TeamAssemblerOptions {
  /** Model the delegator routes with, independent of member models */
  delegatorModel: ModelDescriptor;
  historyEnabled?: boolean;
}

/**
 * Builds a RuntimeTeam from a hierarchy snapshot.
 *
 * Same snapshot, same structure: members in agent order, tool bindings in
 * tool order, one delegator over all members.
 */
export class TeamAssembler<M, T, A extends AgentRuntime> implements TeamBuilder {
  constructor(
    private readonly registry: BindingRegistry<M, T>,
    private readonly engine: ExecutionEngine<M, T, A>,
    private readonly options: TeamAssemblerOptions
  ) {}

  async assemble(hierarchy: HierarchyConfig): Promise<RuntimeTeam> {
    const { tenantId, instanceId } = hierarchy;

    const members = hierarchy.agents.map((spec) => this.buildMember(spec));
    const delegator = this.buildDelegator(hierarchy, members);

    logger.info(
      {
        tenantId,
        instanceId,
        members: members.length,
        tools: members.reduce((count, member) => count + member.tools.length, 0),
      },
      'Assembled agent team'
    );

    return {
      tenantId,
      instanceId,
      delegator,
      members,
      configUpdatedAt: hierarchy.updatedAt,
      assembledAt: new Date(),
    };
  }

  private buildMember(spec: AgentSpec): A {
    const model = this.registry.resolveModel(spec.modelProvider, spec.modelId);
    const tools = spec.tools.map((tool) => this.registry.resolveTool(tool));

    return this.guard(`agent '${spec.name}'`, () => this.engine.buildAgent({ spec, model, tools }));
  }

  private buildDelegator(hierarchy: HierarchyConfig, members: A[]): DelegatorRuntime {
    const { provider, modelId } = this.options.delegatorModel;
    const model = this.registry.resolveModel(provider, modelId);

    return this.guard('delegator', () =>
      this.engine.buildDelegator({
        name: `team-${hierarchy.instanceId}`,
        model,
        members,
        instructions: hierarchy.delegatorInstructions,
        historyEnabled: this.options.historyEnabled ?? true,
      })
    );
  }

  private guard<R>(what: string, build: () => R): R {
    try {
      return build();
    } catch (error) {
      if (error instanceof AssemblyError) throw error;
      throw new AssemblyError(`Failed to build ${what}`, { cause: error });
    }
  }
}
