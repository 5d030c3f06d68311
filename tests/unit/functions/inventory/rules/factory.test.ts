import { describe, it, expect } from 'vitest';
import {
  AvailabilityZoneRule,
  RegionRule,
  TagKeysRule,
  getEnabledRules,
  getRule,
} from '@functions/inventory/rules';
import { allGroupsEnabled, createInstance } from '../../../../helpers/fixtures';

describe('Rule Factory', () => {
  describe('getRule', () => {
    it('should return the rule for each toggle', () => {
      const groupBy = allGroupsEnabled();

      expect(getRule('group_by_region', groupBy)).toBeInstanceOf(RegionRule);
      expect(getRule('group_by_tag_keys', groupBy)).toBeInstanceOf(TagKeysRule);
      expect(getRule('group_by_availability_zone', groupBy)).toBeInstanceOf(AvailabilityZoneRule);
    });

    it('should not nest zones under regions when region grouping is off', () => {
      const rule = getRule(
        'group_by_availability_zone',
        allGroupsEnabled({ group_by_region: false })
      );

      expect(rule.classify(createInstance())[0].edges).toEqual([
        { parent: 'zones', child: 'zone_ap-guangzhou-3' },
      ]);
    });
  });

  describe('getEnabledRules', () => {
    it('should return every rule in a fixed order when all toggles are on', () => {
      expect(getEnabledRules(allGroupsEnabled()).map((rule) => rule.option)).toEqual([
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
      ]);
    });

    it('should skip disabled rules', () => {
      const rules = getEnabledRules(
        allGroupsEnabled({ group_by_instance_id: false, group_by_tag_none: false })
      );

      expect(rules).toHaveLength(8);
      expect(rules.map((rule) => rule.option)).not.toContain('group_by_instance_id');
      expect(rules.map((rule) => rule.option)).not.toContain('group_by_tag_none');
    });
  });
});
