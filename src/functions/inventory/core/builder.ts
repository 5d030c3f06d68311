/**
 * Inventory builder.
 *
 * Turns a collection of instance records into an Ansible inventory document:
 * state filtering, address resolution, rule-based grouping, and host variables.
 * The output depends only on the input set, not on its order.
 */

import type {
  DestinationVariable,
  HostVars,
  InstanceRecord,
  InstanceState,
  InventoryConfig,
  InventoryDocument,
  InventoryGroup,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { getEnabledRules } from '../rules/factory';
import type { GroupingRule } from '../rules/base';

const logger = setupLogger('cvm-inventory:builder');

export interface BuilderOptions {
  rules: GroupingRule[];
  destinationVariable: DestinationVariable;

  /**
   * When true the state filter is skipped entirely.
   */
  allInstances: boolean;
  instanceStates: InstanceState[];
  nestedGroups: boolean;
  patternInclude?: RegExp;
  patternExclude?: RegExp;
}

/**
 * Resolved address for one instance.
 */
export interface ResolvedAddress {
  address: string;

  /**
   * True when the selected IP field was empty and the instance id is used instead.
   */
  fallback: boolean;
}

interface GroupMembers {
  hosts: Set<string>;
  children: Set<string>;
}

export class InventoryBuilder {
  /**
   * Group every retained host belongs to.
   */
  static readonly CATCH_ALL_GROUP = 'tencentcloud';

  /**
   * Hosts keyed by their instance id instead of an IP address.
   */
  static readonly NO_ADDRESS_GROUP = 'no_address';

  private readonly options: BuilderOptions;

  constructor(options: BuilderOptions) {
    this.options = options;
  }

  /**
   * Creates a builder with the rules and filters from configuration.
   */
  static fromConfig(config: InventoryConfig): InventoryBuilder {
    return new InventoryBuilder({
      rules: getEnabledRules(config.groupBy),
      destinationVariable: config.destinationVariable,
      allInstances: config.allInstances,
      instanceStates: config.instanceStates,
      nestedGroups: config.nestedGroups,
      patternInclude: config.patternInclude,
      patternExclude: config.patternExclude,
    });
  }

  /**
   * Builds the inventory document.
   *
   * @param instances - Fetched instances, in any order
   * @returns Inventory document; empty input yields only `_meta.hostvars`
   */
  build(instances: readonly InstanceRecord[]): InventoryDocument {
    const retained = instances
      .filter((instance) => this.isRetainedState(instance))
      .sort((a, b) => compare(a.instanceId, b.instanceId));

    const groups = new Map<string, GroupMembers>();
    const hostvars = new Map<string, HostVars>();

    for (const instance of retained) {
      const resolved = this.resolveAddress(instance, hostvars);
      const { address } = resolved;

      if (!this.matchesPatterns(address)) {
        logger.debug({ instanceId: instance.instanceId, address }, 'Host excluded by pattern');
        continue;
      }

      for (const rule of this.options.rules) {
        for (const assignment of rule.classify(instance)) {
          membersOf(groups, assignment.group).hosts.add(address);
          if (this.options.nestedGroups) {
            for (const edge of assignment.edges) {
              membersOf(groups, edge.parent).children.add(edge.child);
            }
          }
        }
      }

      membersOf(groups, InventoryBuilder.CATCH_ALL_GROUP).hosts.add(address);
      if (resolved.fallback) {
        membersOf(groups, InventoryBuilder.NO_ADDRESS_GROUP).hosts.add(address);
      }

      hostvars.set(address, InventoryBuilder.toHostVars(instance, resolved));
    }

    logger.info(
      { retained: hostvars.size, fetched: instances.length, groups: groups.size },
      'Inventory built'
    );

    return this.toDocument(groups, hostvars);
  }

  /**
   * Selects the host address for an instance.
   *
   * Uses the first IP of the configured destination field. When that field is
   * empty, or the address is already taken by another instance, the
   * instance id becomes the address and a warning is logged.
   *
   * @param instance - Instance to address
   * @param taken - Addresses already assigned in this build
   */
  resolveAddress(
    instance: InstanceRecord,
    taken: ReadonlyMap<string, unknown> = new Map()
  ): ResolvedAddress {
    const ip =
      this.options.destinationVariable === 'public_ip_address'
        ? instance.publicIp
        : instance.privateIp;

    if (!ip) {
      logger.warn(
        { instanceId: instance.instanceId, destinationVariable: this.options.destinationVariable },
        'Instance has no address for the destination variable, using instance id'
      );
      return { address: instance.instanceId, fallback: true };
    }

    if (taken.has(ip)) {
      logger.warn(
        { instanceId: instance.instanceId, address: ip },
        'Address already used by another instance, using instance id'
      );
      return { address: instance.instanceId, fallback: true };
    }

    return { address: ip, fallback: false };
  }

  /**
   * Maps an instance to its snake_cased host variables.
   *
   * @param instance - Instance record
   * @param resolved - Resolved address; sets ansible_host unless it is a fallback
   */
  static toHostVars(instance: InstanceRecord, resolved?: ResolvedAddress): HostVars {
    const tags: Record<string, string> = {};
    for (const tag of [...instance.tags].sort((a, b) => compare(a.key, b.key))) {
      tags[tag.key] = tag.value;
    }

    const vars: HostVars = {
      id: instance.instanceId,
      region: instance.region,
      availability_zone: instance.availabilityZone,
      image_id: instance.imageId,
      instance_type: instance.instanceType,
      vpc_id: instance.vpcId,
      subnet_id: instance.subnetId,
      security_group_ids: [...instance.securityGroupIds],
      status: instance.state,
      public_ip_addresses: [...instance.publicIpAddresses],
      private_ip_addresses: [...instance.privateIpAddresses],
      tags,
    };

    // Optional fields are only set when present so the JSON has no nulls
    if (instance.instanceName !== undefined) vars.instance_name = instance.instanceName;
    if (instance.publicIp !== undefined) vars.public_ip_address = instance.publicIp;
    if (instance.privateIp !== undefined) vars.private_ip_address = instance.privateIp;
    if (instance.cpu !== undefined) vars.cpu = instance.cpu;
    if (instance.memory !== undefined) vars.memory = instance.memory;
    if (instance.osName !== undefined) vars.os_name = instance.osName;
    if (instance.createdTime !== undefined) vars.created_time = instance.createdTime;
    if (resolved && !resolved.fallback) vars.ansible_host = resolved.address;

    return vars;
  }

  private isRetainedState(instance: InstanceRecord): boolean {
    return this.options.allInstances || this.options.instanceStates.includes(instance.state);
  }

  private matchesPatterns(address: string): boolean {
    const { patternInclude, patternExclude } = this.options;
    if (patternInclude && !patternInclude.test(address)) {
      return false;
    }
    if (patternExclude && patternExclude.test(address)) {
      return false;
    }
    return true;
  }

  /**
   * Assembles the document with sorted group names, hosts and children.
   * Groups with children (nested mode) become `{ hosts?, children }`.
   */
  private toDocument(
    groups: Map<string, GroupMembers>,
    hostvars: Map<string, HostVars>
  ): InventoryDocument {
    const document: InventoryDocument = { _meta: { hostvars: {} } };

    for (const address of [...hostvars.keys()].sort(compare)) {
      const vars = hostvars.get(address);
      if (vars) {
        document._meta.hostvars[address] = vars;
      }
    }

    for (const name of [...groups.keys()].sort(compare)) {
      const members = groups.get(name);
      if (members) {
        document[name] = toGroup(members);
      }
    }

    return document;
  }
}

function toGroup(members: GroupMembers): InventoryGroup {
  const hosts = [...members.hosts].sort(compare);
  if (members.children.size === 0) {
    return hosts;
  }

  const children = [...members.children].sort(compare);
  return hosts.length > 0 ? { hosts, children } : { children };
}

function membersOf(groups: Map<string, GroupMembers>, name: string): GroupMembers {
  let members = groups.get(name);
  if (!members) {
    members = { hosts: new Set(), children: new Set() };
    groups.set(name, members);
  }
  return members;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
