/**
 * Orchestrator for the CVM inventory.
 *
 * Decides between the cache and the API, builds the inventory on a miss,
 * and answers --list and --host requests.
 */

import type { FetchResult, HostVars, InventoryConfig, InventoryDocument } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { InventoryBuilder } from './builder';
import { CacheError, CacheStore } from './cacheStore';
import { InstanceFetcher } from './fetcher';

const logger = setupLogger('cvm-inventory:orchestrator');

/**
 * Where an answer came from, and whether it is complete.
 */
export interface OutcomeInfo {
  source: 'cache' | 'api';

  /**
   * Regions that failed during the fetch; non-empty means the inventory is partial.
   */
  failedRegions: FetchResult['failedRegions'];
}

export interface ListOutcome extends OutcomeInfo {
  inventory: InventoryDocument;
}

export interface HostOutcome extends OutcomeInfo {
  /**
   * Variables of the requested host; empty object for an unknown host.
   */
  hostvars: HostVars | Record<string, never>;
}

export interface OrchestratorDeps {
  fetcher?: InstanceFetcher;
  cache?: CacheStore;
  builder?: InventoryBuilder;

  /**
   * Current time in epoch seconds.
   */
  clock?: () => number;
}

export class Orchestrator {
  private readonly config: InventoryConfig;
  private readonly fetcher: InstanceFetcher;
  private readonly cache: CacheStore;
  private readonly builder: InventoryBuilder;
  private readonly clock: () => number;

  constructor(config: InventoryConfig, deps: OrchestratorDeps = {}) {
    this.config = config;
    this.fetcher = deps.fetcher ?? new InstanceFetcher(config);
    this.cache = deps.cache ?? new CacheStore(config.cachePath);
    this.builder = deps.builder ?? InventoryBuilder.fromConfig(config);
    this.clock = deps.clock ?? (() => Date.now() / 1000);
  }

  /**
   * Produces the full inventory.
   *
   * @param refreshCache - Clear the cache first and always call the API
   */
  async list(refreshCache = false): Promise<ListOutcome> {
    if (refreshCache) {
      await this.cache.clear();
    } else if (await this.isCacheUsable()) {
      try {
        const entry = await this.cache.load();
        logger.info({ timestamp: entry.timestamp }, 'Serving inventory from cache');
        return { inventory: entry.inventory, source: 'cache', failedRegions: [] };
      } catch (error) {
        this.recoverFromCacheError(error);
      }
    }

    return this.refresh();
  }

  /**
   * Produces the variables of one host, or an empty object when it is unknown.
   *
   * @param address - Host address as listed in the inventory
   * @param refreshCache - Clear the cache first and always call the API
   */
  async host(address: string, refreshCache = false): Promise<HostOutcome> {
    if (!refreshCache && (await this.isCacheUsable())) {
      try {
        const hostvars = await this.cache.lookupHost(address);
        return { hostvars: hostvars ?? {}, source: 'cache', failedRegions: [] };
      } catch (error) {
        this.recoverFromCacheError(error);
      }
    }

    const outcome = await this.list(refreshCache);
    const hostvars = outcome.inventory._meta.hostvars;
    return {
      hostvars: Object.hasOwn(hostvars, address) ? hostvars[address] : {},
      source: outcome.source,
      failedRegions: outcome.failedRegions,
    };
  }

  /**
   * Fetches, builds and, for complete results, stores the inventory.
   *
   * A partial result (some regions failed) is returned but not cached, so
   * the next run retries the failed regions.
   */
  private async refresh(): Promise<ListOutcome> {
    const fetched = await this.fetcher.fetch();
    const inventory = this.builder.build(fetched.instances);

    if (fetched.failedRegions.length > 0) {
      logger.warn(
        { failedRegions: fetched.failedRegions.map((f) => f.region) },
        'Inventory is partial, not caching it'
      );
    } else if (this.config.cacheMaxAge > 0) {
      await this.storeQuietly(inventory);
    }

    return { inventory, source: 'api', failedRegions: fetched.failedRegions };
  }

  /**
   * Write failures are logged; the fetched inventory is still returned.
   */
  private async storeQuietly(inventory: InventoryDocument): Promise<void> {
    try {
      await this.cache.store(inventory, this.clock());
    } catch (error) {
      logger.warn(
        { path: this.config.cachePath, error: String(error) },
        'Failed to write the inventory cache'
      );
    }
  }

  private async isCacheUsable(): Promise<boolean> {
    return this.cache.isFresh(this.clock(), this.config.cacheMaxAge);
  }

  /**
   * Cache problems degrade to a miss; anything else propagates.
   */
  private recoverFromCacheError(error: unknown): void {
    if (!(error instanceof CacheError)) {
      throw error;
    }
    logger.warn({ error: error.message }, 'Cache unusable, fetching from the API');
  }
}
