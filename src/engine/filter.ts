/**
 * filter.ts - The filter predicate and result ordering
 *
 * matchesFilter is a logical AND over the constrained fields of a FilterSpec;
 * an unconstrained field never rejects anything. Both functions are pure, so
 * the same spec over the same inventory always yields the same result.
 */

import type { FilterSpec } from "../query/types";
import type { ResourceRecord } from "./types";

export function matchesFilter(record: ResourceRecord, spec: FilterSpec): boolean {
  if (spec.timeRange.constrained) {
    // Without a creation time there is nothing to compare
    if (!record.createdAt) return false;
    const created = record.createdAt.getTime();
    const { start, end } = spec.timeRange.value;
    if (created < start.getTime() || created > end.getTime()) return false;
  }

  if (spec.namespace.constrained && record.namespace !== spec.namespace.value) {
    return false;
  }

  if (
    spec.nameFilter.constrained &&
    !record.name.toLowerCase().includes(spec.nameFilter.value.toLowerCase())
  ) {
    return false;
  }

  if (spec.labelSelectors.constrained) {
    for (const [key, value] of Object.entries(spec.labelSelectors.value)) {
      if (!Object.hasOwn(record.labels, key) || record.labels[key] !== value) return false;
    }
  }

  if (spec.statusFilter.constrained && record.status !== spec.statusFilter.value) {
    return false;
  }

  return true;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Result order: clusterId ascending, then newest first, then name.
 * Records without a creation time sort after timestamped ones of the same
 * cluster; namespace breaks any remaining tie so the order is total.
 */
export function compareRecords(a: ResourceRecord, b: ResourceRecord): number {
  const byCluster = compareText(a.clusterId, b.clusterId);
  if (byCluster !== 0) return byCluster;

  const aTime = a.createdAt?.getTime() ?? null;
  const bTime = b.createdAt?.getTime() ?? null;
  if (aTime !== bTime) {
    if (aTime === null) return 1;
    if (bTime === null) return -1;
    return bTime - aTime;
  }

  const byName = compareText(a.name, b.name);
  if (byName !== 0) return byName;

  return compareText(a.namespace ?? "", b.namespace ?? "");
}
