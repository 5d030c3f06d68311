/**
 * Core type definitions for the Tencent Cloud CVM inventory.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Lifecycle states an instance record can carry.
 *
 * API states are folded into this set by the fetcher:
 * SHUTDOWN, TERMINATING and LAUNCH_FAILED all become 'terminated'.
 */
export const INSTANCE_STATES = [
  'pending',
  'running',
  'stopped',
  'starting',
  'stopping',
  'rebooting',
  'terminated',
] as const;

export type InstanceState = (typeof INSTANCE_STATES)[number];

/**
 * Instance tag as returned by the CVM API.
 */
export interface InstanceTag {
  key: string;
  value: string;
}

/**
 * One CVM instance, normalized from the DescribeInstances payload.
 */
export interface InstanceRecord {
  instanceId: string;
  instanceName?: string;
  region: string;
  availabilityZone: string;
  imageId: string;
  instanceType: string;
  vpcId: string;
  subnetId: string;
  securityGroupIds: string[];
  tags: InstanceTag[];
  state: InstanceState;

  /**
   * First public (or elastic) IP, when the instance has one.
   */
  publicIp?: string;

  /**
   * First private IP, when the instance has one.
   */
  privateIp?: string;

  publicIpAddresses: string[];
  privateIpAddresses: string[];
  cpu?: number;
  memory?: number;
  osName?: string;
  createdTime?: string;
}

/**
 * Which instance IP field is used as the host address in the inventory.
 */
export type DestinationVariable = 'public_ip_address' | 'private_ip_address';

/**
 * Variables published for one host under `_meta.hostvars`.
 */
export interface HostVars {
  id: string;
  instance_name?: string;
  region: string;
  availability_zone: string;
  image_id: string;
  instance_type: string;
  vpc_id: string;
  subnet_id: string;
  security_group_ids: string[];
  status: InstanceState;
  public_ip_address?: string;
  private_ip_address?: string;
  public_ip_addresses: string[];
  private_ip_addresses: string[];
  cpu?: number;
  memory?: number;
  os_name?: string;
  created_time?: string;
  tags: Record<string, string>;

  /**
   * Connection address for Ansible. Absent when the host is keyed by its instance id.
   */
  ansible_host?: string;
}

/**
 * A group that has child groups (nested mode only).
 */
export interface NestedGroup {
  hosts?: string[];
  children: string[];
}

export type InventoryGroup = string[] | NestedGroup;

/**
 * Inventory document in the Ansible dynamic inventory JSON shape.
 *
 * @example
 * {
 *   "region_ap-guangzhou": ["203.0.113.10"],
 *   "tencentcloud": ["203.0.113.10"],
 *   "_meta": { "hostvars": { "203.0.113.10": { "id": "ins-1", ... } } }
 * }
 */
export interface InventoryDocument {
  _meta: InventoryMeta;
  [group: string]: InventoryGroup | InventoryMeta;
}

export interface InventoryMeta {
  hostvars: Record<string, HostVars>;
}

/**
 * Index entry pointing an address back to its instance.
 */
export interface HostLocation {
  region: string;
  instanceId: string;
}

/**
 * Lightweight companion of the cached document, answering host
 * membership questions without parsing the full inventory.
 */
export interface CacheIndex {
  timestamp: number;
  hosts: Record<string, HostLocation>;
}

/**
 * Timestamped snapshot of a previously built inventory.
 */
export interface CacheEntry {
  /**
   * Seconds since the Unix epoch at which the snapshot was stored.
   */
  timestamp: number;
  inventory: InventoryDocument;
}

/**
 * Outcome of fetching instances across regions.
 */
export interface FetchResult {
  instances: InstanceRecord[];
  regions: string[];

  /**
   * Regions whose list call failed after the client exhausted its retries.
   */
  failedRegions: Array<{ region: string; error: string }>;
}

/**
 * CVM API credentials.
 */
export interface Credentials {
  secretId?: string;
  secretKey?: string;
  securityToken?: string;
}

/**
 * Grouping toggles, one per rule.
 */
export interface GroupByOptions {
  group_by_instance_id: boolean;
  group_by_region: boolean;
  group_by_availability_zone: boolean;
  group_by_image_id: boolean;
  group_by_instance_type: boolean;
  group_by_vpc_id: boolean;
  group_by_subnet_id: boolean;
  group_by_security_group: boolean;
  group_by_tag_keys: boolean;
  group_by_tag_none: boolean;
}

/**
 * Resolved inventory configuration.
 */
export interface InventoryConfig {
  /**
   * Explicit region list, or 'all' to enumerate regions through the API.
   */
  regions: string[] | 'all';
  regionsExclude: string[];

  /**
   * Region used for the DescribeRegions call.
   */
  apiRegion: string;
  destinationVariable: DestinationVariable;
  allInstances: boolean;
  instanceStates: InstanceState[];
  cachePath: string;

  /**
   * Cache staleness window in seconds. 0 disables the cache.
   */
  cacheMaxAge: number;
  nestedGroups: boolean;
  maxConcurrency: number;
  patternInclude?: RegExp;
  patternExclude?: RegExp;
  groupBy: GroupByOptions;
  credentials: Credentials;
}
