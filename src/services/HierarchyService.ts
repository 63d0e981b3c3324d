import { logger } from '../config';
import { NotFoundError, StorageError, errorMessage } from '../errors';
import type { HierarchyDocumentStore } from '../stores/HierarchyStore';
import {
  DEFAULT_DELEGATOR_INSTRUCTIONS,
  cacheKeyOf,
  type HierarchyConfig,
  type HierarchyKey,
  type HierarchyUpdate,
} from '../types/hierarchy';
import { KeyedLock } from '../utils/keyedLock';

export interface TeamInvalidator {
  invalidate(tenantId: string, instanceId: string): unknown;
}

export function createDefaultHierarchy(key: HierarchyKey, now: Date): HierarchyConfig {
  return {
    tenantId: key.tenantId,
    instanceId: key.instanceId,
    delegatorInstructions: DEFAULT_DELEGATOR_INSTRUCTIONS,
    agents: [],
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Merge an update into a stored hierarchy. Fields present in the update
 * replace the stored ones wholesale; absent fields are kept.
 */
export function applyHierarchyUpdate(
  existing: HierarchyConfig | null,
  key: HierarchyKey,
  update: HierarchyUpdate,
  now: Date
): HierarchyConfig {
  const base = existing ?? createDefaultHierarchy(key, now);
  return {
    ...base,
    delegatorInstructions: update.delegatorInstructions ?? base.delegatorInstructions,
    agents: update.agents ? [...update.agents] : base.agents,
    createdAt: base.createdAt,
    updatedAt: now,
  };
}

export class HierarchyService {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: HierarchyDocumentStore,
    private readonly invalidator: TeamInvalidator,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async upsertHierarchy(
    tenantId: string,
    instanceId: string,
    update: HierarchyUpdate
  ): Promise<HierarchyConfig> {
    const key = { tenantId, instanceId };

    const saved = await this.lock.run(cacheKeyOf(key), async () => {
      const existing = await this.storage('load', key, () => this.store.findOne(tenantId, instanceId));
      const merged = applyHierarchyUpdate(existing, key, update, this.clock());
      return this.storage('save', key, () => this.store.save(merged));
    });

    this.invalidator.invalidate(tenantId, instanceId);
    logger.info(
      { tenantId, instanceId, agents: saved.agents.length, fields: Object.keys(update) },
      'Hierarchy updated'
    );
    return saved;
  }

  /**
   * Load the stored hierarchy, creating a default one on first contact.
   */
  async loadOrProvision(tenantId: string, instanceId: string): Promise<HierarchyConfig> {
    const key = { tenantId, instanceId };

    return this.lock.run(cacheKeyOf(key), async () => {
      const existing = await this.storage('load', key, () => this.store.findOne(tenantId, instanceId));
      if (existing) return existing;

      const provisioned = await this.storage('save', key, () =>
        this.store.save(createDefaultHierarchy(key, this.clock()))
      );
      logger.info({ tenantId, instanceId }, 'Provisioned default hierarchy');
      return provisioned;
    });
  }

  async getHierarchy(tenantId: string, instanceId: string): Promise<HierarchyConfig> {
    const key = { tenantId, instanceId };
    const hierarchy = await this.storage('load', key, () => this.store.findOne(tenantId, instanceId));
    if (!hierarchy) {
      throw new NotFoundError(`No hierarchy for tenant '${tenantId}' and instance '${instanceId}'`);
    }
    return hierarchy;
  }

  async listInstances(tenantId: string): Promise<HierarchyConfig[]> {
    return this.storage('list', { tenantId }, () => this.store.listByTenant(tenantId));
  }

  private async storage<T>(
    action: string,
    context: Partial<HierarchyKey>,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      logger.error({ ...context, action, error: errorMessage(error) }, 'Hierarchy store operation failed');
      throw new StorageError(`Failed to ${action} hierarchy`, { cause: error });
    }
  }
}
