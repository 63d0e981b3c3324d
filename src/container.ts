/**
 * Composition root: wires stores, services, the engine and the team cache.
 *
 * HierarchyService invalidates the cache and the cache loads through
 * HierarchyService, so the cache is created first with a loader that
 * resolves the service lazily.
 */
import type { DataSource } from 'typeorm';
import type { Config } from './config';
import { AgentInstance } from './entities/AgentInstance';
import { TeamSession } from './entities/TeamSession';
import { HierarchyService } from './services/HierarchyService';
import { SessionService } from './services/SessionService';
import { TeamChatService } from './services/TeamChatService';
import { TypeOrmHierarchyStore } from './stores/HierarchyStore';
import { TypeOrmTranscriptStore } from './stores/TranscriptStore';
import { TeamAssembler } from './team/TeamAssembler';
import { TeamCache } from './team/TeamCache';
import { AgentKitEngine } from './team/agentkit/AgentKitEngine';
import { createAgentKitRegistry, fallbackModel } from './team/agentkit/registry';

export interface Container {
  hierarchies: HierarchyService;
  sessions: SessionService;
  teams: TeamCache;
  chat: TeamChatService;
}

export function createContainer(dataSource: DataSource, config: Config): Container {
  const sessions = new SessionService(new TypeOrmTranscriptStore(dataSource.getRepository(TeamSession)));

  const registry = createAgentKitRegistry(config);
  const engine = new AgentKitEngine(sessions, { maxIter: config.team.maxIter });
  const assembler = new TeamAssembler(registry, engine, {
    delegatorModel: { ...fallbackModel(config), modelId: config.defaults.delegatorModelId },
    historyEnabled: true,
  });

  let hierarchies: HierarchyService | undefined;
  const teams = new TeamCache(
    (tenantId, instanceId) => {
      if (!hierarchies) {
        return Promise.reject(new Error('Hierarchy service is not initialized'));
      }
      return hierarchies.loadOrProvision(tenantId, instanceId);
    },
    assembler,
    { ttlMs: config.team.cacheTtlMs }
  );
  hierarchies = new HierarchyService(
    new TypeOrmHierarchyStore(dataSource.getRepository(AgentInstance)),
    teams
  );

  return {
    hierarchies,
    sessions,
    teams,
    chat: new TeamChatService(teams, config.team.chatTimeoutMs),
  };
}
