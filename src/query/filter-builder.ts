/**
 * filter-builder.ts - Validates a ParsedQuery into an executable FilterSpec
 *
 * The only hard failure is an unknown resource type: without a kind there is
 * nothing to list. Everything else that cannot apply to the kind is dropped
 * with a warning, so "running namespaces" still lists namespaces.
 */

import { InvalidFilterError } from "../errors";
import { getKindSupport } from "./kinds";
import { orderRange } from "./normalizer";
import {
  constrain,
  NO_CONSTRAINT,
  type Constraint,
  type FilterSpec,
  type ParsedQuery,
  type ResourceStatus,
  type TimeRange,
} from "./types";

/** Job reports "Complete" where pods say "Succeeded"; users mix them up */
const STATUS_EQUIVALENTS: Partial<Record<ResourceStatus, ResourceStatus>> = {
  Succeeded: "Complete",
  Complete: "Succeeded",
};

function optionalText(value: string | null): Constraint<string> {
  const trimmed = value?.trim();
  return trimmed ? constrain(trimmed) : NO_CONSTRAINT;
}

/**
 * Builds a FilterSpec, or throws InvalidFilterError if the query names no
 * supported kind.
 */
export function buildFilterSpec(parsed: ParsedQuery): FilterSpec {
  if (parsed.resourceType === "unknown") {
    throw new InvalidFilterError(
      "Could not determine which kind of resource to list. Name one, e.g. pods, deployments, or services."
    );
  }

  const support = getKindSupport(parsed.resourceType);
  const warnings: string[] = [...parsed.warnings];

  let namespace = optionalText(parsed.namespace);
  if (namespace.constrained && !support.namespaced) {
    warnings.push(
      `Ignored namespace "${namespace.value}": ${support.kind} is not a namespaced resource`
    );
    namespace = NO_CONSTRAINT;
  }

  let statusFilter: Constraint<ResourceStatus> = NO_CONSTRAINT;
  if (parsed.statusFilter) {
    const requested = parsed.statusFilter;
    const equivalent = STATUS_EQUIVALENTS[requested];
    if (support.statuses.includes(requested)) {
      statusFilter = constrain(requested);
    } else if (equivalent && support.statuses.includes(equivalent)) {
      statusFilter = constrain(equivalent);
    } else {
      warnings.push(`Ignored status "${requested}": ${support.kind} does not report it`);
    }
  }

  let timeRange: Constraint<TimeRange> = NO_CONSTRAINT;
  if (parsed.timeRange) {
    const { start, end } = parsed.timeRange;
    if (start.getTime() > end.getTime()) {
      warnings.push("Time range was inverted; swapped start and end");
    }
    timeRange = constrain(orderRange(start, end));
  }

  const labels = Object.fromEntries(
    Object.entries(parsed.labelSelectors)
      .map(([key, value]): [string, string] => [key.trim(), value.trim()])
      .filter(([key]) => key.length > 0)
  );

  return Object.freeze({
    resourceType: parsed.resourceType,
    timeRange,
    nameFilter: optionalText(parsed.nameFilter),
    namespace,
    labelSelectors: Object.keys(labels).length > 0 ? constrain(Object.freeze(labels)) : NO_CONSTRAINT,
    statusFilter,
    warnings: Object.freeze(warnings),
  });
}

/** A FilterSpec that matches every object of the kind */
export function identityFilter(kind: FilterSpec["resourceType"]): FilterSpec {
  return Object.freeze({
    resourceType: kind,
    timeRange: NO_CONSTRAINT,
    nameFilter: NO_CONSTRAINT,
    namespace: NO_CONSTRAINT,
    labelSelectors: NO_CONSTRAINT,
    statusFilter: NO_CONSTRAINT,
    warnings: Object.freeze([]),
  });
}
