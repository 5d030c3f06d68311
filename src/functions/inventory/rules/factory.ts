/**
 * Simple factory for selecting the enabled grouping rules.
 *
 * Maps group_by toggles to their rule classes.
 */

import type { GroupByOptions } from '@shared/types';
import type { GroupingRule } from './base';
import { SecurityGroupRule, SubnetRule, VpcRule } from './network';
import {
  AvailabilityZoneRule,
  ImageRule,
  InstanceIdRule,
  InstanceTypeRule,
  RegionRule,
} from './placement';
import { TagKeysRule, TagNoneRule } from './tags';

/**
 * Get a rule for a specific group_by toggle.
 *
 * @param option - Toggle name (e.g., "group_by_region")
 * @param groupBy - All toggles, for rules whose shape depends on another rule
 * @returns GroupingRule instance
 */
export function getRule(option: keyof GroupByOptions, groupBy: GroupByOptions): GroupingRule {
  switch (option) {
    case 'group_by_instance_id':
      return new InstanceIdRule();
    case 'group_by_region':
      return new RegionRule();
    case 'group_by_availability_zone':
      return new AvailabilityZoneRule(groupBy.group_by_region);
    case 'group_by_image_id':
      return new ImageRule();
    case 'group_by_instance_type':
      return new InstanceTypeRule();
    case 'group_by_vpc_id':
      return new VpcRule();
    case 'group_by_subnet_id':
      return new SubnetRule();
    case 'group_by_security_group':
      return new SecurityGroupRule();
    case 'group_by_tag_keys':
      return new TagKeysRule();
    case 'group_by_tag_none':
      return new TagNoneRule();
  }
}

const RULE_ORDER: ReadonlyArray<keyof GroupByOptions> = [
  'group_by_instance_id',
  'group_by_region',
  'group_by_availability_zone',
  'group_by_image_id',
  'group_by_instance_type',
  'group_by_vpc_id',
  'group_by_subnet_id',
  'group_by_security_group',
  'group_by_tag_keys',
  'group_by_tag_none',
];

/**
 * Rules for every enabled toggle, in a fixed order.
 *
 * @param groupBy - Toggles from configuration
 * @returns Active rules
 */
export function getEnabledRules(groupBy: GroupByOptions): GroupingRule[] {
  return RULE_ORDER.filter((option) => groupBy[option]).map((option) => getRule(option, groupBy));
}
