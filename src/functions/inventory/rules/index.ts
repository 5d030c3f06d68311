/**
 * Rules module - exports all grouping-rule types and functions.
 */

// Export base types and utilities
export { AttributeRule, toSafeGroupName } from './base';
export type { GroupAssignment, GroupEdge, GroupingRule } from './base';

// Export concrete rule implementations
export {
  AvailabilityZoneRule,
  ImageRule,
  InstanceIdRule,
  InstanceTypeRule,
  RegionRule,
} from './placement';
export { SecurityGroupRule, SubnetRule, VpcRule } from './network';
export { TagKeysRule, TagNoneRule, UNTAGGED_GROUP, tagKeyGroupName } from './tags';

// Export factory functions
export { getEnabledRules, getRule } from './factory';
