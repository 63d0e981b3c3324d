import { logger } from '../config';
import { cacheKeyOf, type HierarchyConfig } from '../types/hierarchy';
import type { RuntimeTeam, TeamBuilder } from './types';

export type HierarchyLoader = (tenantId: string, instanceId: string) => Promise<HierarchyConfig>;

export interface TeamCacheOptions {
  /** Evict a team after this many idle milliseconds; 0 keeps teams until invalidated */
  ttlMs?: number;
  now?: () => number;
}

export interface TeamCacheStats {
  size: number;
  pending: number;
  hits: number;
  misses: number;
  builds: number;
}

interface CacheEntry {
  team: RuntimeTeam;
  lastAccessAt: number;
}

interface PendingBuild {
  generation: number;
  promise: Promise<RuntimeTeam>;
}

/**
 * Cache of assembled teams keyed by (tenantId, instanceId).
 *
 * A miss registers its build promise before any I/O starts, so concurrent
 * callers for the same key share one build. Invalidation bumps the key's
 * generation: a build that began earlier still answers its own callers but
 * never lands in the cache.
 */
export class TeamCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, PendingBuild>();
  private readonly generations = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private builds = 0;

  constructor(
    private readonly loader: HierarchyLoader,
    private readonly builder: TeamBuilder,
    options: TeamCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  getOrCreate(tenantId: string, instanceId: string): Promise<RuntimeTeam> {
    const key = cacheKeyOf({ tenantId, instanceId });

    const entry = this.entries.get(key);
    if (entry) {
      if (!this.isExpired(entry)) {
        this.hits += 1;
        entry.lastAccessAt = this.now();
        return Promise.resolve(entry.team);
      }
      this.entries.delete(key);
      logger.info({ tenantId, instanceId }, 'Evicted idle agent team');
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.hits += 1;
      return inFlight.promise;
    }

    this.misses += 1;
    const generation = this.generationOf(key);
    const promise = this.build(key, tenantId, instanceId, generation);
    this.pending.set(key, { generation, promise });
    return promise;
  }

  /**
   * Drop the cached team and any in-flight build for the key.
   *
   * @returns true if a team or build was dropped
   */
  invalidate(tenantId: string, instanceId: string): boolean {
    const key = cacheKeyOf({ tenantId, instanceId });
    this.generations.set(key, this.generationOf(key) + 1);

    const hadEntry = this.entries.delete(key);
    const hadPending = this.pending.delete(key);
    if (hadEntry || hadPending) {
      logger.info({ tenantId, instanceId }, 'Invalidated cached agent team');
    }
    return hadEntry || hadPending;
  }

  has(tenantId: string, instanceId: string): boolean {
    const entry = this.entries.get(cacheKeyOf({ tenantId, instanceId }));
    return entry !== undefined && !this.isExpired(entry);
  }

  clear(): void {
    for (const key of new Set([...this.entries.keys(), ...this.pending.keys()])) {
      this.generations.set(key, this.generationOf(key) + 1);
    }
    this.entries.clear();
    this.pending.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): TeamCacheStats {
    return {
      size: this.entries.size,
      pending: this.pending.size,
      hits: this.hits,
      misses: this.misses,
      builds: this.builds,
    };
  }

  private async build(
    key: string,
    tenantId: string,
    instanceId: string,
    generation: number
  ): Promise<RuntimeTeam> {
    try {
      const hierarchy = await this.loader(tenantId, instanceId);
      this.builds += 1;
      const team = await this.builder.assemble(hierarchy);

      if (this.generationOf(key) === generation) {
        this.entries.set(key, { team, lastAccessAt: this.now() });
      } else {
        logger.debug({ tenantId, instanceId }, 'Discarding team built from a superseded configuration');
      }
      return team;
    } finally {
      if (this.pending.get(key)?.generation === generation) {
        this.pending.delete(key);
      }
    }
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.ttlMs > 0 && this.now() - entry.lastAccessAt >= this.ttlMs;
  }
}
