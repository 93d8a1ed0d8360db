/**
 * formatter.ts - Response Formatter
 *
 * Maps engine results and request-level errors onto the output contract that
 * the CLI (--json) and MCP tools return. Field names are snake_case because
 * this is a wire format; everything in memory stays camelCase.
 *
 * Three outcomes, decided here and nowhere else:
 * - ok: at least one cluster answered. Per-cluster failures ride along in
 *   `errors`, and an empty `matched` sets `zero_results`.
 * - AllClustersFailed: clusters were tried and none answered. Every
 *   cluster's reason is included.
 * - Request errors (InvalidFilter, UnknownCluster): nothing was fetched and
 *   no partial data is returned.
 *
 * The health check has its own document: every cluster's reachability and
 * an overall healthy / degraded / unhealthy verdict.
 */

import type { AgentAction } from "../agent/actions";
import type { AgentAnswer } from "../agent/answerer";
import {
  ClusterFetchError,
  type ClusterErrorKind,
  type RequestError,
  type RequestErrorKind,
} from "../errors";
import type { ClusterHealth } from "../engine/health";
import type { AggregatedResult, ClusterFailure, ResourceRecord } from "../engine/types";
import type { Constraint, FilterSpec } from "../query/types";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface WireRecord {
  cluster_id: string;
  kind: string;
  name: string;
  namespace: string | null;
  /** ISO 8601, UTC */
  created_at: string | null;
  labels: Record<string, string>;
  status: string | null;
}

/** The FilterSpec as executed; null means "no constraint" */
export interface QueryEcho {
  resource_type: string;
  time_range: { start: string; end: string } | null;
  name_filter: string | null;
  namespace: string | null;
  label_selectors: Record<string, string> | null;
  status: string | null;
}

export type WireErrors = Record<string, { kind: ClusterErrorKind; reason: string }>;

export interface FilterSuccess {
  status: "ok";
  matched: WireRecord[];
  total_considered: number;
  errors: WireErrors;
  query_echo: QueryEcho;
  zero_results: boolean;
  warnings: string[];
}

export interface ErrorResponse {
  status: "error";
  error: {
    kind: RequestErrorKind | ClusterErrorKind | "AllClustersFailed";
    message: string;
    /** Per-cluster reasons, when clusters were tried */
    errors?: WireErrors;
  };
}

export type FilterResponse = FilterSuccess | ErrorResponse;

export interface AgentSuccess {
  status: "ok";
  cluster_id: string;
  action: AgentAction;
  answer: string;
  composed_by: "model" | "facts";
  suggestions: string[];
  matched_count: number;
  warnings: string[];
}

export type AgentResponse = AgentSuccess | ErrorResponse;

export interface WireClusterHealth {
  cluster_id: string;
  reachable: boolean;
  latency_ms: number;
  error: { kind: ClusterErrorKind; reason: string } | null;
}

export interface HealthResponse {
  /** healthy: every cluster answered; degraded: some did; unhealthy: none did, or none are configured */
  status: "healthy" | "degraded" | "unhealthy";
  /** Whether the NL oracle and answer composer are configured */
  llm: "enabled" | "disabled";
  clusters: WireClusterHealth[];
  checked_at: string;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function valueOrNull<T>(constraint: Constraint<T>): T | null {
  return constraint.constrained ? constraint.value : null;
}

export function serializeRecord(record: ResourceRecord): WireRecord {
  return {
    cluster_id: record.clusterId,
    kind: record.kind,
    name: record.name,
    namespace: record.namespace,
    created_at: record.createdAt ? record.createdAt.toISOString() : null,
    labels: { ...record.labels },
    status: record.status,
  };
}

export function serializeSpec(spec: FilterSpec): QueryEcho {
  const timeRange = valueOrNull(spec.timeRange);
  const labels = valueOrNull(spec.labelSelectors);
  return {
    resource_type: spec.resourceType,
    time_range: timeRange
      ? { start: timeRange.start.toISOString(), end: timeRange.end.toISOString() }
      : null,
    name_filter: valueOrNull(spec.nameFilter),
    namespace: valueOrNull(spec.namespace),
    label_selectors: labels ? { ...labels } : null,
    status: valueOrNull(spec.statusFilter),
  };
}

function serializeErrors(errors: Record<string, ClusterFailure>): WireErrors {
  return Object.fromEntries(
    Object.entries(errors).map(([clusterId, failure]) => [
      clusterId,
      { kind: failure.kind, reason: failure.reason },
    ])
  );
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export function formatFilterResponse(result: AggregatedResult, spec: FilterSpec): FilterResponse {
  const errors = serializeErrors(result.perClusterErrors);
  const failedIds = Object.keys(errors);

  if (result.clusters.length > 0 && failedIds.length === result.clusters.length) {
    const summary = failedIds.map((id) => `${id} (${errors[id].kind})`).join(", ");
    return {
      status: "error",
      error: {
        kind: "AllClustersFailed",
        message: `Every cluster failed: ${summary}`,
        errors,
      },
    };
  }

  return {
    status: "ok",
    matched: result.matched.map(serializeRecord),
    total_considered: result.totalConsidered,
    errors,
    query_echo: serializeSpec(spec),
    zero_results: result.matched.length === 0 && failedIds.length === 0,
    warnings: [...spec.warnings],
  };
}

export function formatAgentResponse(answer: AgentAnswer): AgentSuccess {
  return {
    status: "ok",
    cluster_id: answer.clusterId,
    action: answer.action,
    answer: answer.answer,
    composed_by: answer.composedBy,
    suggestions: [...answer.suggestions],
    matched_count: answer.matchedCount,
    warnings: [...answer.warnings],
  };
}

export function formatHealthResponse(
  results: ClusterHealth[],
  llmEnabled: boolean,
  checkedAt: Date
): HealthResponse {
  const reachable = results.filter((result) => result.reachable).length;
  const status =
    reachable === 0 ? "unhealthy" : reachable === results.length ? "healthy" : "degraded";
  return {
    status,
    llm: llmEnabled ? "enabled" : "disabled",
    clusters: results.map((result) => ({
      cluster_id: result.clusterId,
      reachable: result.reachable,
      latency_ms: result.latencyMs,
      error: result.failure ? { kind: result.failure.kind, reason: result.failure.reason } : null,
    })),
    checked_at: checkedAt.toISOString(),
  };
}

/**
 * Request-level errors carry no data. A ClusterFetchError only reaches here
 * from the agent path, where its one cluster failing fails the request.
 */
export function formatErrorResponse(error: RequestError | ClusterFetchError): ErrorResponse {
  if (error instanceof ClusterFetchError) {
    return {
      status: "error",
      error: {
        kind: error.kind,
        message: `Could not read cluster ${error.clusterId}: ${error.message}`,
        errors: { [error.clusterId]: { kind: error.kind, reason: error.message } },
      },
    };
  }
  return { status: "error", error: { kind: error.kind, message: error.message } };
}
