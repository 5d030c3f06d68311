/**
 * Instance discovery for the CVM inventory.
 *
 * Lists instances through the Tencent Cloud CVM API in every configured
 * region and normalizes them into InstanceRecord values.
 */

import * as tencentcloud from 'tencentcloud-sdk-nodejs-cvm';
import type {
  Credentials,
  FetchResult,
  InstanceRecord,
  InstanceState,
  InventoryConfig,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { mapWithConcurrency } from '@shared/utils/pool';

const logger = setupLogger('cvm-inventory:fetcher');

const CvmClient = tencentcloud.cvm.v20170312.Client;

/**
 * Subset of the CVM instance payload the inventory reads.
 */
export interface CvmInstancePayload {
  InstanceId?: string | null;
  InstanceName?: string | null;
  InstanceType?: string | null;
  InstanceState?: string | null;
  ImageId?: string | null;
  CPU?: number | null;
  Memory?: number | null;
  OsName?: string | null;
  CreatedTime?: string | null;
  Placement?: { Zone?: string | null } | null;
  VirtualPrivateCloud?: { VpcId?: string | null; SubnetId?: string | null } | null;
  SecurityGroupIds?: string[] | null;
  PublicIpAddresses?: string[] | null;
  PrivateIpAddresses?: string[] | null;
  Tags?: Array<{ Key?: string | null; Value?: string | null }> | null;
}

export interface DescribeInstancesInput {
  Offset?: number;
  Limit?: number;
  InstanceIds?: string[];
}

export interface DescribeInstancesPayload {
  TotalCount?: number | null;
  InstanceSet?: CvmInstancePayload[] | null;
}

export interface DescribeRegionsPayload {
  RegionSet?: Array<{ Region?: string | null; RegionState?: string | null }> | null;
}

/**
 * The CVM client operations used by the fetcher.
 * The SDK client satisfies this structurally; tests supply a fake.
 */
export interface CvmApi {
  DescribeRegions(req?: null): Promise<DescribeRegionsPayload>;
  DescribeInstances(req: DescribeInstancesInput): Promise<DescribeInstancesPayload>;
}

export type CvmClientFactory = (region: string, credentials: Credentials) => CvmApi;

/**
 * Creates an SDK client bound to one region.
 */
export const createCvmClient: CvmClientFactory = (region, credentials) =>
  new CvmClient({
    credential: {
      secretId: credentials.secretId,
      secretKey: credentials.secretKey,
      token: credentials.securityToken,
    },
    region,
    profile: {
      httpProfile: {
        reqTimeout: 30,
      },
    },
  });

/**
 * Raised when instances cannot be listed at all.
 */
export class FetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/**
 * Raised for missing or rejected credentials. Never retried.
 */
export class AuthenticationError extends FetchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * API states folded into the inventory's lifecycle states.
 */
const STATE_MAP: Record<string, InstanceState> = {
  PENDING: 'pending',
  LAUNCH_FAILED: 'terminated',
  RUNNING: 'running',
  STOPPED: 'stopped',
  STARTING: 'starting',
  STOPPING: 'stopping',
  REBOOTING: 'rebooting',
  SHUTDOWN: 'terminated',
  TERMINATING: 'terminated',
};

export type FetcherOptions = Pick<
  InventoryConfig,
  'regions' | 'regionsExclude' | 'apiRegion' | 'maxConcurrency' | 'credentials'
>;

/**
 * Lists CVM instances across regions.
 */
export class InstanceFetcher {
  static readonly PAGE_SIZE = 100;

  private readonly options: FetcherOptions;
  private readonly clientFactory: CvmClientFactory;

  /**
   * @param options - Region selection, concurrency cap and credentials
   * @param clientFactory - Optional client factory for testing
   */
  constructor(options: FetcherOptions, clientFactory: CvmClientFactory = createCvmClient) {
    this.options = options;
    this.clientFactory = clientFactory;
  }

  /**
   * Lists instances in every resolved region.
   *
   * Regions are scanned by a bounded pool. A region whose call fails is
   * reported in `failedRegions` and the others still contribute; an
   * authentication failure anywhere aborts the whole fetch.
   *
   * @returns Instances merged by instance id and sorted by id
   * @throws {AuthenticationError} If credentials are missing or rejected
   * @throws {FetchError} If region discovery fails or every region fails
   */
  async fetch(): Promise<FetchResult> {
    this.assertCredentials();

    const regions = await this.resolveRegions();
    const limit = Math.min(regions.length, this.options.maxConcurrency);
    logger.info(`Scanning ${regions.length} region(s) with ${limit} worker(s): ${regions.join(', ')}`);

    const failedRegions: FetchResult['failedRegions'] = [];

    // One accumulator per region, merged once every worker has finished
    const perRegion = await mapWithConcurrency(regions, limit, async (region) => {
      try {
        return await this.fetchRegion(region);
      } catch (error) {
        if (isAuthFailure(error)) {
          throw new AuthenticationError(
            `Authentication failed in region ${region}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        logger.warn({ region, error: errorMessage(error) }, 'Failed to list instances in region');
        failedRegions.push({ region, error: errorMessage(error) });
        return [];
      }
    });

    if (regions.length > 0 && failedRegions.length === regions.length) {
      throw new FetchError(
        `Failed to list instances in every region: ${failedRegions
          .map((f) => `${f.region} (${f.error})`)
          .join(', ')}`
      );
    }

    const instances = mergeInstances(perRegion);
    failedRegions.sort((a, b) => compareIds(a.region, b.region));

    logger.info(`Discovered ${instances.length} instances across ${regions.length} region(s)`);
    return { instances, regions, failedRegions };
  }

  /**
   * Resolves the configured region selection.
   *
   * 'all' asks DescribeRegions for every available region. Exclusions apply
   * to both forms. The result is de-duplicated and sorted.
   */
  async resolveRegions(): Promise<string[]> {
    const { regions, regionsExclude, apiRegion } = this.options;
    const excluded = new Set(regionsExclude);

    let candidates: string[];
    if (regions === 'all') {
      candidates = await this.describeRegions(apiRegion);
    } else {
      candidates = regions;
    }

    const resolved = [...new Set(candidates)].filter((region) => !excluded.has(region)).sort();
    logger.debug({ regions: resolved, excluded: regionsExclude }, 'Resolved regions');
    return resolved;
  }

  private async describeRegions(apiRegion: string): Promise<string[]> {
    const client = this.clientFactory(apiRegion, this.options.credentials);

    let response: DescribeRegionsPayload;
    try {
      response = await client.DescribeRegions(null);
    } catch (error) {
      if (isAuthFailure(error)) {
        throw new AuthenticationError(`Authentication failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      throw new FetchError(`Failed to describe regions: ${errorMessage(error)}`, { cause: error });
    }

    const regions: string[] = [];
    for (const item of response.RegionSet ?? []) {
      if (!item.Region) {
        continue;
      }
      if (item.RegionState && item.RegionState !== 'AVAILABLE') {
        logger.debug(`Skipping region ${item.Region} in state ${item.RegionState}`);
        continue;
      }
      regions.push(item.Region);
    }
    return regions;
  }

  /**
   * Lists every instance in one region.
   * Handles Offset/Limit pagination of DescribeInstances.
   */
  private async fetchRegion(region: string): Promise<InstanceRecord[]> {
    logger.debug(`Scanning region: ${region}`);
    const client = this.clientFactory(region, this.options.credentials);
    const records: InstanceRecord[] = [];
    const limit = InstanceFetcher.PAGE_SIZE;

    let offset = 0;
    for (;;) {
      const response = await client.DescribeInstances({ Offset: offset, Limit: limit });
      const page = response.InstanceSet ?? [];

      for (const raw of page) {
        const record = InstanceFetcher.toInstanceRecord(raw, region);
        if (record) {
          records.push(record);
        }
      }

      offset += page.length;
      const total = response.TotalCount ?? undefined;
      if (page.length < limit || (total !== undefined && offset >= total)) {
        break;
      }
    }

    logger.debug(`Found ${records.length} instances in ${region}`);
    return records;
  }

  /**
   * Normalizes one DescribeInstances item.
   *
   * @param raw - Instance payload from the API
   * @param region - Region the payload was listed in
   * @returns InstanceRecord, or null when the payload has no instance id
   */
  static toInstanceRecord(raw: CvmInstancePayload, region: string): InstanceRecord | null {
    if (!raw.InstanceId) {
      logger.warn({ region }, 'Skipping instance payload without InstanceId');
      return null;
    }

    const publicIpAddresses = raw.PublicIpAddresses ?? [];
    const privateIpAddresses = raw.PrivateIpAddresses ?? [];
    const tags: InstanceRecord['tags'] = [];
    for (const tag of raw.Tags ?? []) {
      if (tag.Key) {
        tags.push({ key: tag.Key, value: tag.Value ?? '' });
      }
    }

    return {
      instanceId: raw.InstanceId,
      instanceName: raw.InstanceName ?? undefined,
      region,
      availabilityZone: raw.Placement?.Zone ?? '',
      imageId: raw.ImageId ?? '',
      instanceType: raw.InstanceType ?? '',
      vpcId: raw.VirtualPrivateCloud?.VpcId ?? '',
      subnetId: raw.VirtualPrivateCloud?.SubnetId ?? '',
      securityGroupIds: raw.SecurityGroupIds ?? [],
      tags,
      state: toInstanceState(raw.InstanceState, raw.InstanceId),
      publicIp: publicIpAddresses[0],
      privateIp: privateIpAddresses[0],
      publicIpAddresses,
      privateIpAddresses,
      cpu: raw.CPU ?? undefined,
      memory: raw.Memory ?? undefined,
      osName: raw.OsName ?? undefined,
      createdTime: raw.CreatedTime ?? undefined,
    };
  }

  private assertCredentials(): void {
    const { secretId, secretKey } = this.options.credentials;
    if (!secretId || !secretKey) {
      throw new AuthenticationError(
        'Missing credentials: set TENCENTCLOUD_SECRET_ID and TENCENTCLOUD_SECRET_KEY ' +
          'or the credentials section of the configuration file'
      );
    }
  }
}

/**
 * Merges per-region results into one collection keyed by instance id.
 * Input order does not affect the output.
 */
export function mergeInstances(perRegion: InstanceRecord[][]): InstanceRecord[] {
  const byId = new Map<string, InstanceRecord>();
  for (const records of perRegion) {
    for (const record of records) {
      byId.set(record.instanceId, record);
    }
  }
  return [...byId.values()].sort((a, b) => compareIds(a.instanceId, b.instanceId));
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toInstanceState(apiState: string | null | undefined, instanceId: string): InstanceState {
  const state = apiState ? STATE_MAP[apiState.toUpperCase()] : undefined;
  if (!state) {
    logger.warn({ instanceId, state: apiState }, 'Unknown instance state, treating as terminated');
    return 'terminated';
  }
  return state;
}

/**
 * Type guard for SDK errors carrying an AuthFailure code.
 */
function isAuthFailure(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('AuthFailure')
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
