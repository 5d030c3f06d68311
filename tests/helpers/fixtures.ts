/**
 * Test fixtures and fakes.
 *
 * Provides instance records, configurations and an in-process CVM API.
 */

import type { GroupByOptions, InstanceRecord, InventoryConfig } from '@shared/types';
import type {
  CvmApi,
  CvmClientFactory,
  CvmInstancePayload,
  DescribeInstancesInput,
} from '@functions/inventory/core/fetcher';

/**
 * Creates an InstanceRecord for a running instance in ap-guangzhou.
 *
 * @param overrides - Optional overrides for specific fields
 */
export function createInstance(overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    instanceId: 'ins-a',
    instanceName: 'web-1',
    region: 'ap-guangzhou',
    availabilityZone: 'ap-guangzhou-3',
    imageId: 'img-base',
    instanceType: 'S5.MEDIUM4',
    vpcId: 'vpc-main',
    subnetId: 'subnet-a',
    securityGroupIds: ['sg-web'],
    tags: [],
    state: 'running',
    publicIp: '203.0.113.10',
    privateIp: '10.0.0.10',
    publicIpAddresses: ['203.0.113.10'],
    privateIpAddresses: ['10.0.0.10'],
    ...overrides,
  };
}

/**
 * Every group_by toggle enabled.
 */
export function allGroupsEnabled(overrides: Partial<GroupByOptions> = {}): GroupByOptions {
  return {
    group_by_instance_id: true,
    group_by_region: true,
    group_by_availability_zone: true,
    group_by_image_id: true,
    group_by_instance_type: true,
    group_by_vpc_id: true,
    group_by_subnet_id: true,
    group_by_security_group: true,
    group_by_tag_keys: true,
    group_by_tag_none: true,
    ...overrides,
  };
}

/**
 * Creates an InventoryConfig with test credentials and a 300 second cache.
 *
 * @param overrides - Optional overrides for specific fields
 */
export function createConfig(overrides: Partial<InventoryConfig> = {}): InventoryConfig {
  return {
    regions: ['ap-guangzhou'],
    regionsExclude: [],
    apiRegion: 'ap-guangzhou',
    destinationVariable: 'public_ip_address',
    allInstances: false,
    instanceStates: ['running'],
    cachePath: '/nonexistent/cache',
    cacheMaxAge: 300,
    nestedGroups: false,
    maxConcurrency: 8,
    groupBy: allGroupsEnabled(),
    credentials: { secretId: 'test-id', secretKey: 'test-secret' },
    ...overrides,
  };
}

/**
 * Creates a DescribeInstances item.
 *
 * @param overrides - Optional overrides for specific fields
 */
export function createPayload(overrides: Partial<CvmInstancePayload> = {}): CvmInstancePayload {
  return {
    InstanceId: 'ins-a',
    InstanceName: 'web-1',
    InstanceType: 'S5.MEDIUM4',
    InstanceState: 'RUNNING',
    ImageId: 'img-base',
    CPU: 2,
    Memory: 4,
    OsName: 'TencentOS Server 3.1',
    CreatedTime: '2024-03-01T08:00:00Z',
    Placement: { Zone: 'ap-guangzhou-3' },
    VirtualPrivateCloud: { VpcId: 'vpc-main', SubnetId: 'subnet-a' },
    SecurityGroupIds: ['sg-web'],
    PublicIpAddresses: ['203.0.113.10'],
    PrivateIpAddresses: ['10.0.0.10'],
    Tags: [{ Key: 'env', Value: 'prod' }],
    ...overrides,
  };
}

export interface FakeCall {
  region: string;
  method: 'DescribeRegions' | 'DescribeInstances';
  input: DescribeInstancesInput | null | undefined;
}

/**
 * In-process stand-in for the CVM API.
 *
 * Serves DescribeInstances pages from `instances`, fails regions listed in
 * `failures`, and records every call.
 */
export class FakeCvmCloud {
  readonly calls: FakeCall[] = [];
  regionSet: Array<{ Region: string; RegionState: string }> = [];
  instances: Record<string, CvmInstancePayload[]> = {};
  failures: Record<string, Error> = {};
  includeTotalCount = true;
  delayMs = 0;
  inFlight = 0;
  maxInFlight = 0;

  readonly factory: CvmClientFactory = (region) => this.client(region);

  private client(region: string): CvmApi {
    return {
      DescribeRegions: async (input) => {
        this.calls.push({ region, method: 'DescribeRegions', input });
        const failure = this.failures[region];
        if (failure) {
          throw failure;
        }
        return { RegionSet: this.regionSet };
      },
      DescribeInstances: async (input) => {
        this.calls.push({ region, method: 'DescribeInstances', input });
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
          if (this.delayMs > 0) {
            await new Promise((resolve) => setTimeout(resolve, this.delayMs));
          }
          const failure = this.failures[region];
          if (failure) {
            throw failure;
          }
          const all = this.instances[region] ?? [];
          const offset = input.Offset ?? 0;
          const limit = input.Limit ?? 20;
          return {
            InstanceSet: all.slice(offset, offset + limit),
            TotalCount: this.includeTotalCount ? all.length : undefined,
          };
        } finally {
          this.inFlight--;
        }
      },
    };
  }

  describeInstancesCalls(region?: string): FakeCall[] {
    return this.calls.filter(
      (call) =>
        call.method === 'DescribeInstances' && (region === undefined || call.region === region)
    );
  }
}

/**
 * Error shaped like an SDK exception with an API error code.
 */
export function apiError(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}
