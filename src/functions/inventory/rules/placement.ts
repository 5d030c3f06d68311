/**
 * Rules grouping instances by identity and placement.
 */

import type { InstanceRecord } from '@shared/types';
import { AttributeRule, toSafeGroupName } from './base';
import type { GroupAssignment, GroupingRule } from './base';

/**
 * One group per instance, named after the instance id.
 */
export class InstanceIdRule extends AttributeRule {
  readonly option = 'group_by_instance_id' as const;
  protected readonly prefix = '';
  protected readonly parent = 'instances';

  protected value(instance: InstanceRecord): string {
    return instance.instanceId;
  }
}

export class RegionRule extends AttributeRule {
  readonly option = 'group_by_region' as const;
  protected readonly prefix = 'region_';
  protected readonly parent = 'regions';

  protected value(instance: InstanceRecord): string {
    return instance.region;
  }
}

/**
 * `zone_<zone>` groups. In nested mode a zone is listed under `zones` and,
 * when region grouping is also enabled, under its region group.
 */
export class AvailabilityZoneRule implements GroupingRule {
  readonly option = 'group_by_availability_zone' as const;

  private readonly nestUnderRegion: boolean;

  /**
   * @param nestUnderRegion - Whether region groups are generated alongside zone groups
   */
  constructor(nestUnderRegion: boolean) {
    this.nestUnderRegion = nestUnderRegion;
  }

  classify(instance: InstanceRecord): GroupAssignment[] {
    if (!instance.availabilityZone) {
      return [];
    }

    const group = toSafeGroupName('zone_', instance.availabilityZone);
    const edges = [{ parent: 'zones', child: group }];
    if (this.nestUnderRegion && instance.region) {
      edges.push({ parent: toSafeGroupName('region_', instance.region), child: group });
    }
    return [{ group, edges }];
  }
}

export class ImageRule extends AttributeRule {
  readonly option = 'group_by_image_id' as const;
  protected readonly prefix = 'image_';
  protected readonly parent = 'images';

  protected value(instance: InstanceRecord): string {
    return instance.imageId;
  }
}

export class InstanceTypeRule extends AttributeRule {
  readonly option = 'group_by_instance_type' as const;
  protected readonly prefix = 'type_';
  protected readonly parent = 'types';

  protected value(instance: InstanceRecord): string {
    return instance.instanceType;
  }
}
