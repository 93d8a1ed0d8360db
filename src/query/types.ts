/**
 * types.ts - Shared data types for query parsing and filter building
 *
 * These types flow through the request pipeline:
 * - RawQuery is what the user typed (plus an optional cluster hint)
 * - ParsedQuery is the Intent Extractor's possibly-partial reading of it
 * - FilterSpec is the validated, executable version of a ParsedQuery
 *
 * All three are request-scoped and never mutated after creation.
 */

/**
 * The closed set of Kubernetes kinds the engine knows how to list and filter.
 *
 * Adding a kind means adding it here and to KIND_TABLE in kinds.ts.
 * Kinds are data, not classes: per-kind behavior lives in the table.
 */
export const RESOURCE_KINDS = [
  "Pod",
  "Deployment",
  "Service",
  "Node",
  "Namespace",
  "ConfigMap",
  "Secret",
  "StatefulSet",
  "DaemonSet",
  "ReplicaSet",
  "Job",
  "CronJob",
  "Ingress",
  "PersistentVolumeClaim",
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * The closed set of status values a filter can ask for.
 *
 * Not every kind reports every status: pods have phases, nodes are
 * Ready/NotReady, workloads are Available/Unavailable. KIND_TABLE records
 * which values each kind can produce.
 */
export const RESOURCE_STATUSES = [
  "Running",
  "Pending",
  "Succeeded",
  "Failed",
  "Unknown",
  "Ready",
  "NotReady",
  "Active",
  "Terminating",
  "Available",
  "Unavailable",
  "Complete",
  "Bound",
  "Lost",
] as const;

export type ResourceStatus = (typeof RESOURCE_STATUSES)[number];

/** An inclusive UTC time window. */
export interface TimeRange {
  start: Date;
  end: Date;
}

/** Immutable request input. */
export interface RawQuery {
  readonly text: string;
  /** Cluster id or "all"; takes precedence over a cluster named in the text */
  readonly clusterHint?: string;
}

/**
 * Which path produced a ParsedQuery.
 * - deterministic: keyword/regex matching alone was enough
 * - oracle: the NL oracle filled in what matching could not
 * - fallback: the oracle was needed but unavailable, so matching alone was used
 */
export type ParseSource = "deterministic" | "oracle" | "fallback";

/**
 * Structured reading of a free-text query, before validation.
 *
 * Fields are null when the text did not mention them. resourceType is
 * "unknown" when neither matching nor the oracle could name a kind; the
 * Filter Builder rejects that.
 */
export interface ParsedQuery {
  readonly resourceType: ResourceKind | "unknown";
  readonly timeRange: TimeRange | null;
  readonly nameFilter: string | null;
  readonly namespace: string | null;
  readonly labelSelectors: Readonly<Record<string, string>>;
  readonly statusFilter: ResourceStatus | null;
  /** 1.0 for deterministic parses, the oracle's own value otherwise */
  readonly rawConfidence: number;
  readonly source: ParseSource;
  /** Cluster named in the text ("in cluster prod"), or "all" */
  readonly clusterHint: string | null;
  /** Non-fatal notes, e.g. why the oracle was skipped */
  readonly warnings: readonly string[];
}

/**
 * A single filter field: either an explicit "no constraint" marker or a
 * concrete value. Using a tagged union (rather than null) keeps "the user
 * asked for nothing" distinct from "we forgot to set it".
 */
export type Constraint<T> =
  | { readonly constrained: false }
  | { readonly constrained: true; readonly value: T };

export const NO_CONSTRAINT: Constraint<never> = Object.freeze({
  constrained: false,
});

export function constrain<T>(value: T): Constraint<T> {
  return { constrained: true, value };
}

/**
 * Validated, fully-resolved filter criteria.
 * resourceType is always a known kind; every other field is a Constraint.
 */
export interface FilterSpec {
  readonly resourceType: ResourceKind;
  readonly timeRange: Constraint<TimeRange>;
  readonly nameFilter: Constraint<string>;
  readonly namespace: Constraint<string>;
  readonly labelSelectors: Constraint<Readonly<Record<string, string>>>;
  readonly statusFilter: Constraint<ResourceStatus>;
  /** Adjustments the builder made (dropped or swapped fields) */
  readonly warnings: readonly string[];
}

/**
 * What the NL oracle returns. Every field is optional because the oracle
 * may only understand part of the question.
 */
export interface OracleInference {
  resource_type?: string | null;
  time_phrase?: string | null;
  name?: string | null;
  namespace?: string | null;
  labels?: Record<string, string> | null;
  status?: string | null;
  confidence: number;
}
