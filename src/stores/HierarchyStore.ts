/**
 * Document store for hierarchy configurations.
 *
 * The store is plain CRUD keyed by (tenantId, instanceId); merge rules and
 * cache invalidation live in HierarchyService.
 */
import { QueryFailedError, type Repository } from 'typeorm';
import { AgentInstance } from '../entities/AgentInstance';
import type { HierarchyConfig } from '../types/hierarchy';

export interface HierarchyDocumentStore {
  findOne(tenantId: string, instanceId: string): Promise<HierarchyConfig | null>;
  save(hierarchy: HierarchyConfig): Promise<HierarchyConfig>;
  listByTenant(tenantId: string): Promise<HierarchyConfig[]>;
}

function toDomain(entity: AgentInstance): HierarchyConfig {
  return {
    tenantId: entity.tenant_id,
    instanceId: entity.instance_id,
    delegatorInstructions: entity.delegator_instructions,
    agents: entity.agents ?? [],
    createdAt: entity.created_at,
    updatedAt: entity.updated_at,
  };
}

/**
 * PostgreSQL unique constraint violation (another process created the row first).
 */
function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === '23505'
  );
}

export class TypeOrmHierarchyStore implements HierarchyDocumentStore {
  constructor(private readonly repository: Repository<AgentInstance>) {}

  async findOne(tenantId: string, instanceId: string): Promise<HierarchyConfig | null> {
    const entity = await this.repository.findOne({
      where: { tenant_id: tenantId, instance_id: instanceId },
    });
    return entity ? toDomain(entity) : null;
  }

  async save(hierarchy: HierarchyConfig): Promise<HierarchyConfig> {
    try {
      return await this.write(hierarchy);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      // Lost a first-insert race with another process; the row exists now
      return this.write(hierarchy);
    }
  }

  async listByTenant(tenantId: string): Promise<HierarchyConfig[]> {
    const entities = await this.repository.find({
      where: { tenant_id: tenantId },
      order: { instance_id: 'ASC' },
    });
    return entities.map(toDomain);
  }

  private async write(hierarchy: HierarchyConfig): Promise<HierarchyConfig> {
    const existing = await this.repository.findOne({
      where: { tenant_id: hierarchy.tenantId, instance_id: hierarchy.instanceId },
    });

    const entity =
      existing ??
      this.repository.create({
        tenant_id: hierarchy.tenantId,
        instance_id: hierarchy.instanceId,
      });

    entity.delegator_instructions = hierarchy.delegatorInstructions;
    entity.agents = hierarchy.agents;
    entity.created_at = existing?.created_at ?? hierarchy.createdAt;
    entity.updated_at = hierarchy.updatedAt;

    const saved = await this.repository.save(entity);
    return toDomain(saved);
  }
}
