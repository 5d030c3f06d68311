/**
 * File cache for built inventories.
 *
 * Two files live under the cache directory:
 * - ansible-tencentcloud.cache: the timestamped inventory document
 * - ansible-tencentcloud.index: address → instance map plus the same timestamp
 *
 * Invariants:
 * - Both files are replaced atomically; a reader never sees a partial write
 * - The document is written before the index, so an index older than the
 *   document is stale and is ignored
 * - Unreadable content is reported as CorruptCacheError, never returned
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { INSTANCE_STATES } from '@shared/types';
import type {
  CacheEntry,
  CacheIndex,
  HostLocation,
  HostVars,
  InventoryDocument,
} from '@shared/types';
import { atomicWrite, isNotFound, modifiedAt, removeIfExists } from '@shared/utils/atomicFile';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cvm-inventory:cache');

const HostVarsSchema = z
  .object({
    id: z.string(),
    instance_name: z.string().optional(),
    region: z.string(),
    availability_zone: z.string(),
    image_id: z.string(),
    instance_type: z.string(),
    vpc_id: z.string(),
    subnet_id: z.string(),
    security_group_ids: z.array(z.string()),
    status: z.enum(INSTANCE_STATES),
    public_ip_address: z.string().optional(),
    private_ip_address: z.string().optional(),
    public_ip_addresses: z.array(z.string()),
    private_ip_addresses: z.array(z.string()),
    cpu: z.number().optional(),
    memory: z.number().optional(),
    os_name: z.string().optional(),
    created_time: z.string().optional(),
    tags: z.record(z.string()),
    ansible_host: z.string().optional(),
  })
  .passthrough();

const GroupSchema = z.union([
  z.array(z.string()),
  z.object({
    hosts: z.array(z.string()).optional(),
    children: z.array(z.string()),
  }),
]);

const CacheEntrySchema = z.object({
  timestamp: z.number(),
  inventory: z
    .object({
      _meta: z.object({ hostvars: z.record(HostVarsSchema) }),
    })
    .catchall(GroupSchema),
});

const CacheIndexSchema = z.object({
  timestamp: z.number(),
  hosts: z.record(z.object({ region: z.string(), instanceId: z.string() })),
});

/**
 * Base exception for cache errors.
 */
export class CacheError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/**
 * Raised when no cache entry exists.
 */
export class CacheMissError extends CacheError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CacheMissError';
  }
}

/**
 * Raised when the cache file cannot be parsed back into an inventory.
 */
export class CorruptCacheError extends CacheError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CorruptCacheError';
  }
}

export class CacheStore {
  static readonly CACHE_NAME = 'ansible-tencentcloud';

  readonly documentPath: string;
  readonly indexPath: string;

  /**
   * @param cacheDir - Directory holding the cache files; created on first store
   */
  constructor(cacheDir: string) {
    this.documentPath = join(cacheDir, `${CacheStore.CACHE_NAME}.cache`);
    this.indexPath = join(cacheDir, `${CacheStore.CACHE_NAME}.index`);
  }

  /**
   * Whether a stored entry is young enough to be used.
   *
   * Always false when `maxAge` is 0 or no readable entry exists.
   *
   * @param now - Current time in epoch seconds
   * @param maxAge - Staleness window in seconds
   */
  async isFresh(now: number, maxAge: number): Promise<boolean> {
    if (maxAge <= 0) {
      return false;
    }

    const timestamp = await this.readTimestamp();
    if (timestamp === null) {
      return false;
    }

    const age = now - timestamp;
    logger.debug({ age, maxAge }, 'Cache age');
    return age <= maxAge;
  }

  /**
   * Reads the stored entry.
   *
   * @throws {CacheMissError} If there is no cache file
   * @throws {CorruptCacheError} If the file is not a valid cache entry
   */
  async load(): Promise<CacheEntry> {
    let text: string;
    try {
      text = await readFile(this.documentPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new CacheMissError(`No cache file at ${this.documentPath}`, { cause: error });
      }
      throw new CorruptCacheError(`Failed to read cache file ${this.documentPath}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CorruptCacheError(`Cache file ${this.documentPath} is not valid JSON`, {
        cause: error,
      });
    }

    const result = CacheEntrySchema.safeParse(raw);
    if (!result.success) {
      throw new CorruptCacheError(
        `Cache file ${this.documentPath} does not contain an inventory: ${result.error.message}`,
        { cause: result.error }
      );
    }

    const { _meta: meta, ...groups } = result.data.inventory;
    const inventory: InventoryDocument = { _meta: { hostvars: meta.hostvars } };
    for (const [name, group] of Object.entries(groups)) {
      inventory[name] = group;
    }

    return { timestamp: result.data.timestamp, inventory };
  }

  /**
   * Persists an inventory with its index.
   *
   * @param document - Inventory to store
   * @param now - Snapshot time in epoch seconds
   * @returns The stored entry
   */
  async store(document: InventoryDocument, now: number): Promise<CacheEntry> {
    const entry: CacheEntry = { timestamp: now, inventory: document };
    const index: CacheIndex = { timestamp: now, hosts: indexHosts(document) };

    await atomicWrite(this.documentPath, JSON.stringify(entry, null, 2));
    await atomicWrite(this.indexPath, JSON.stringify(index, null, 2));

    logger.info(
      { path: this.documentPath, hosts: Object.keys(index.hosts).length },
      'Inventory cached'
    );
    return entry;
  }

  /**
   * Removes both cache files. Succeeds when they are already absent.
   */
  async clear(): Promise<void> {
    await removeIfExists(this.documentPath);
    await removeIfExists(this.indexPath);
    logger.debug({ path: this.documentPath }, 'Cache cleared');
  }

  /**
   * Reads the index when it exists, parses, and is not older than the document.
   *
   * @returns The index, or null when it cannot be trusted
   */
  async readIndex(): Promise<CacheIndex | null> {
    const [documentTime, indexTime] = await Promise.all([
      modifiedAt(this.documentPath),
      modifiedAt(this.indexPath),
    ]);

    if (documentTime === null || indexTime === null) {
      return null;
    }
    if (indexTime < documentTime) {
      logger.debug('Cache index is older than the document, ignoring it');
      return null;
    }

    try {
      const result = CacheIndexSchema.safeParse(JSON.parse(await readFile(this.indexPath, 'utf-8')));
      if (result.success) {
        return result.data;
      }
      logger.warn({ path: this.indexPath }, 'Cache index has an unexpected shape, ignoring it');
    } catch (error) {
      logger.warn({ path: this.indexPath, error: String(error) }, 'Cache index unreadable, ignoring it');
    }
    return null;
  }

  /**
   * Finds the stored variables of one host.
   *
   * A trusted index answers "unknown host" without parsing the document.
   *
   * @param address - Host address as listed in the inventory
   * @returns Host variables, or null when the host is not in the cache
   * @throws {CacheMissError} If there is no cache file
   * @throws {CorruptCacheError} If the document is not a valid cache entry
   */
  async lookupHost(address: string): Promise<HostVars | null> {
    const index = await this.readIndex();
    if (index && !Object.hasOwn(index.hosts, address)) {
      return null;
    }

    const { inventory } = await this.load();
    return Object.hasOwn(inventory._meta.hostvars, address)
      ? inventory._meta.hostvars[address]
      : null;
  }

  private async readTimestamp(): Promise<number | null> {
    const index = await this.readIndex();
    if (index) {
      return index.timestamp;
    }

    try {
      return (await this.load()).timestamp;
    } catch (error) {
      if (error instanceof CacheError) {
        logger.debug({ error: error.message }, 'No usable cache entry');
        return null;
      }
      throw error;
    }
  }
}

function indexHosts(document: InventoryDocument): Record<string, HostLocation> {
  const hosts: Record<string, HostLocation> = {};
  for (const [address, vars] of Object.entries(document._meta.hostvars)) {
    hosts[address] = { region: vars.region, instanceId: vars.id };
  }
  return hosts;
}
