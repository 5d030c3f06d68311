/**
 * Custom assertion helpers for tests.
 *
 * Provides inventory-specific assertions for common test scenarios.
 */

import { expect } from 'vitest';
import type { InventoryDocument } from '@shared/types';

/**
 * Collects every host listed in any group of the document.
 *
 * @param document - Inventory document
 * @returns Sorted unique addresses
 */
export function hostsInGroups(document: InventoryDocument): string[] {
  const hosts = new Set<string>();
  for (const [name, group] of Object.entries(document)) {
    if (name === '_meta') {
      continue;
    }
    const members = Array.isArray(group) ? group : 'hosts' in group ? group.hosts ?? [] : [];
    for (const host of members) {
      hosts.add(host);
    }
  }
  return [...hosts].sort();
}

/**
 * Group names of the document, without `_meta`.
 */
export function groupNames(document: InventoryDocument): string[] {
  return Object.keys(document).filter((name) => name !== '_meta');
}

/**
 * Asserts that grouped hosts and `_meta.hostvars` list exactly the same addresses.
 *
 * @param document - Inventory document to check
 */
export function assertHostsConsistent(document: InventoryDocument): void {
  expect(hostsInGroups(document)).toEqual(Object.keys(document._meta.hostvars).sort());
}
