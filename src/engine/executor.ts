/**
 * executor.ts - Resource Fetch & Filter Engine
 *
 * Fans a FilterSpec out to every resolved cluster at once, then merges:
 *
 *   ┌─ prod    ── list → toResourceRecord → matchesFilter ─┐
 *   ├─ staging ── list → toResourceRecord → matchesFilter ─┼─→ merge + sort
 *   └─ dev     ── list → ✗ Timeout ────────────────────────┘
 *
 * Each cluster task has its own AbortController and deadline. A task that
 * fails or times out is recorded under perClusterErrors and the others carry
 * on; executeFilter itself never rejects. There are no retries.
 */

import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { ClusterFetchError, errorMessage } from "../errors";
import { getKindSupport } from "../query/kinds";
import type { FilterSpec } from "../query/types";
import { getTracer } from "../tracing";
import { TimeoutError, withTimeout } from "../utils/timeout";
import { KubectlClusterClient, type ClusterClient } from "./cluster-client";
import { compareRecords, matchesFilter } from "./filter";
import { toResourceRecord } from "./normalize";
import type {
  AggregatedResult,
  ClusterContext,
  ClusterFailure,
  ResourceRecord,
} from "./types";

export const DEFAULT_CLUSTER_TIMEOUT_MS = 15000;

export interface ExecuteOptions {
  client?: ClusterClient;
  /** Deadline for each cluster's task */
  timeoutMs?: number;
  onProgress?: (message: string) => void;
  /** Caller's cancellation; aborts every cluster task */
  signal?: AbortSignal;
}

type ClusterOutcome =
  | { ok: true; considered: number; matched: ResourceRecord[] }
  | { ok: false; failure: ClusterFailure };

/**
 * Turns whatever a cluster task threw into a recorded failure.
 * Exported for unit testing.
 */
export function toClusterFailure(error: unknown): ClusterFailure {
  if (error instanceof TimeoutError) {
    return { kind: "Timeout", reason: `No response within ${error.timeoutMs}ms` };
  }
  if (error instanceof ClusterFetchError) {
    return { kind: error.kind, reason: error.message };
  }
  return { kind: "ClusterUnreachable", reason: errorMessage(error) };
}

async function fetchCluster(
  spec: FilterSpec,
  context: ClusterContext,
  client: ClusterClient,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<ClusterOutcome> {
  const tracer = getTracer();
  const support = getKindSupport(spec.resourceType);

  return tracer.startActiveSpan(
    `cluster-query.fetch ${context.clusterId}`,
    {
      kind: SpanKind.INTERNAL,
      attributes: {
        "cluster_query.cluster.id": context.clusterId,
        "cluster_query.resource.kind": spec.resourceType,
      },
    },
    async (span): Promise<ClusterOutcome> => {
      try {
        const objects = await withTimeout(
          (taskSignal) => client.list(spec.resourceType, context, taskSignal),
          timeoutMs,
          signal
        );
        const records = objects.map((object) =>
          toResourceRecord(object, spec.resourceType, context.clusterId, support.namespaced)
        );
        const matched = records.filter((record) => matchesFilter(record, spec));

        span.setAttribute("cluster_query.records.considered", records.length);
        span.setAttribute("cluster_query.records.matched", matched.length);
        span.setStatus({ code: SpanStatusCode.OK });
        return { ok: true, considered: records.length, matched };
      } catch (error) {
        const failure = toClusterFailure(error);
        span.setAttribute("error.type", failure.kind);
        span.setStatus({ code: SpanStatusCode.ERROR, message: failure.reason });
        return { ok: false, failure };
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Runs the filter against every context concurrently and waits for all of
 * them to settle.
 *
 * @returns Matches in (clusterId, newest first, name) order, per-cluster
 *   failures, the pre-filter count over reachable clusters, and the
 *   contexts with reachable filled in (new objects; inputs are untouched)
 */
export async function executeFilter(
  spec: FilterSpec,
  contexts: readonly ClusterContext[],
  options?: ExecuteOptions
): Promise<AggregatedResult> {
  const client = options?.client ?? new KubectlClusterClient();
  const timeoutMs = options?.timeoutMs ?? DEFAULT_CLUSTER_TIMEOUT_MS;
  const onProgress = options?.onProgress ?? console.log; // eslint-disable-line no-console

  const { plural } = getKindSupport(spec.resourceType);
  onProgress(`Listing ${plural} in ${contexts.length} cluster(s)...`);

  const outcomes = await Promise.all(
    contexts.map((context) => fetchCluster(spec, context, client, timeoutMs, options?.signal))
  );

  const matched: ResourceRecord[] = [];
  const perClusterErrors: Record<string, ClusterFailure> = {};
  const clusters: ClusterContext[] = [];
  let totalConsidered = 0;

  outcomes.forEach((outcome, i) => {
    const context = contexts[i];
    if (outcome.ok) {
      matched.push(...outcome.matched);
      totalConsidered += outcome.considered;
      clusters.push({ ...context, reachable: true });
      onProgress(`  ${context.clusterId}: ${outcome.matched.length} of ${outcome.considered} matched`);
    } else {
      perClusterErrors[context.clusterId] = outcome.failure;
      clusters.push({ ...context, reachable: false });
      onProgress(`  ${context.clusterId}: ${outcome.failure.kind} (${outcome.failure.reason})`);
    }
  });

  matched.sort(compareRecords);
  return { matched, perClusterErrors, totalConsidered, clusters };
}
