/**
 * Rules grouping instances by network placement.
 */

import type { InstanceRecord } from '@shared/types';
import { AttributeRule, toSafeGroupName } from './base';
import type { GroupAssignment, GroupingRule } from './base';

export class VpcRule extends AttributeRule {
  readonly option = 'group_by_vpc_id' as const;
  protected readonly prefix = 'vpc_';
  protected readonly parent = 'vpcs';

  protected value(instance: InstanceRecord): string {
    return instance.vpcId;
  }
}

export class SubnetRule extends AttributeRule {
  readonly option = 'group_by_subnet_id' as const;
  protected readonly prefix = 'subnet_';
  protected readonly parent = 'subnets';

  protected value(instance: InstanceRecord): string {
    return instance.subnetId;
  }
}

/**
 * One `security_group_<id>` group per attached security group.
 */
export class SecurityGroupRule implements GroupingRule {
  readonly option = 'group_by_security_group' as const;

  classify(instance: InstanceRecord): GroupAssignment[] {
    return instance.securityGroupIds
      .filter((id) => id.length > 0)
      .map((id) => {
        const group = toSafeGroupName('security_group_', id);
        return { group, edges: [{ parent: 'security_groups', child: group }] };
      });
  }
}
