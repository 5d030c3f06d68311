/**
 * Core types and utilities for grouping rules.
 *
 * A grouping rule maps one instance to the groups it belongs to. Rules are
 * independent of each other; the builder applies every enabled rule and
 * unions the results.
 */

import type { GroupByOptions, InstanceRecord } from '@shared/types';

/**
 * A parent → child link between two groups, used only in nested mode.
 */
export interface GroupEdge {
  parent: string;
  child: string;
}

/**
 * One group an instance is placed in, plus the hierarchy links that
 * position the group when nested groups are enabled.
 */
export interface GroupAssignment {
  group: string;
  edges: GroupEdge[];
}

/**
 * Interface that all grouping rules implement.
 */
export interface GroupingRule {
  /**
   * Configuration toggle that enables this rule.
   */
  readonly option: keyof GroupByOptions;

  /**
   * Groups the instance belongs to under this rule. Empty when the
   * attribute the rule reads is absent.
   */
  classify(instance: InstanceRecord): GroupAssignment[];
}

/**
 * Converts characters that are not valid in Ansible group names to underscores.
 *
 * @example
 * toSafeGroupName('tag_', 'team:web', '_', 'a b') // 'tag_team_web_a_b'
 */
export function toSafeGroupName(...parts: string[]): string {
  return parts.join('').replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Rule that turns a single scalar attribute into one prefixed group,
 * registered under a fixed parent in nested mode.
 */
export abstract class AttributeRule implements GroupingRule {
  abstract readonly option: keyof GroupByOptions;

  protected abstract readonly prefix: string;
  protected abstract readonly parent: string;

  protected abstract value(instance: InstanceRecord): string;

  classify(instance: InstanceRecord): GroupAssignment[] {
    const value = this.value(instance);
    if (!value) {
      return [];
    }

    const group = toSafeGroupName(this.prefix, value);
    return [{ group, edges: [{ parent: this.parent, child: group }] }];
  }
}
