/**
 * Rules grouping instances by their tags.
 */

import type { InstanceRecord } from '@shared/types';
import { toSafeGroupName } from './base';
import type { GroupAssignment, GroupEdge, GroupingRule } from './base';

/**
 * Group of instances without any tag.
 */
export const UNTAGGED_GROUP = 'tag_none';

/**
 * Group for a tag key. A key named `none` becomes `tag_none_key` so tagged
 * instances never land in the untagged group.
 */
export function tagKeyGroupName(key: string): string {
  const name = toSafeGroupName('tag_', key);
  return name === UNTAGGED_GROUP ? `${name}_key` : name;
}

/**
 * One group per tag: `tag_<key>_<value>`, or the key group from
 * `tagKeyGroupName` for an empty value.
 *
 * Nested mode builds `tags` → `tag_<key>` → `tag_<key>_<value>`.
 */
export class TagKeysRule implements GroupingRule {
  readonly option = 'group_by_tag_keys' as const;

  classify(instance: InstanceRecord): GroupAssignment[] {
    return instance.tags.map((tag) => {
      const keyGroup = tagKeyGroupName(tag.key);
      const edges: GroupEdge[] = [{ parent: 'tags', child: keyGroup }];

      if (!tag.value) {
        return { group: keyGroup, edges };
      }

      const group = toSafeGroupName('tag_', tag.key, '_', tag.value);
      edges.push({ parent: keyGroup, child: group });
      return { group, edges };
    });
  }
}

/**
 * `tag_none` for instances without any tag.
 */
export class TagNoneRule implements GroupingRule {
  readonly option = 'group_by_tag_none' as const;

  classify(instance: InstanceRecord): GroupAssignment[] {
    if (instance.tags.length > 0) {
      return [];
    }
    return [{ group: UNTAGGED_GROUP, edges: [{ parent: 'tags', child: UNTAGGED_GROUP }] }];
  }
}
