/**
 * health.ts - Reachability check for every configured cluster
 *
 * Pings each cluster's API server concurrently, each under its own deadline,
 * the same way executeFilter fans out a query. Nothing is listed and nothing
 * is changed; a cluster is reachable when `/readyz` answers.
 */

import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";
import { withTimeout } from "../utils/timeout";
import { KubectlClusterClient, type ClusterClient } from "./cluster-client";
import { DEFAULT_CLUSTER_TIMEOUT_MS, toClusterFailure } from "./executor";
import type { ClusterContext, ClusterFailure } from "./types";

export interface ClusterHealth {
  clusterId: string;
  reachable: boolean;
  /** Wall time of the ping, success or failure */
  latencyMs: number;
  failure: ClusterFailure | null;
}

export interface HealthCheckOptions {
  client?: ClusterClient;
  timeoutMs?: number;
  onProgress?: (message: string) => void;
  signal?: AbortSignal;
  /** Millisecond clock for latency */
  clock?: () => number;
}

async function pingCluster(
  context: ClusterContext,
  client: ClusterClient,
  timeoutMs: number,
  clock: () => number,
  signal: AbortSignal | undefined
): Promise<ClusterHealth> {
  return getTracer().startActiveSpan(
    `cluster-query.ping ${context.clusterId}`,
    { kind: SpanKind.INTERNAL, attributes: { "cluster_query.cluster.id": context.clusterId } },
    async (span): Promise<ClusterHealth> => {
      const started = clock();
      try {
        await withTimeout((taskSignal) => client.ping(context, taskSignal), timeoutMs, signal);
        span.setStatus({ code: SpanStatusCode.OK });
        return { clusterId: context.clusterId, reachable: true, latencyMs: clock() - started, failure: null };
      } catch (error) {
        const failure = toClusterFailure(error);
        span.setAttribute("error.type", failure.kind);
        span.setStatus({ code: SpanStatusCode.ERROR, message: failure.reason });
        return { clusterId: context.clusterId, reachable: false, latencyMs: clock() - started, failure };
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Pings every context and waits for all of them; never rejects.
 * Results keep the order of the contexts.
 */
export async function checkClusters(
  contexts: readonly ClusterContext[],
  options?: HealthCheckOptions
): Promise<ClusterHealth[]> {
  const client = options?.client ?? new KubectlClusterClient();
  const timeoutMs = options?.timeoutMs ?? DEFAULT_CLUSTER_TIMEOUT_MS;
  const onProgress = options?.onProgress ?? console.log; // eslint-disable-line no-console
  const clock = options?.clock ?? Date.now;

  onProgress(`Checking ${contexts.length} cluster(s)...`);
  const results = await Promise.all(
    contexts.map((context) => pingCluster(context, client, timeoutMs, clock, options?.signal))
  );
  for (const result of results) {
    onProgress(
      result.failure
        ? `  ${result.clusterId}: ${result.failure.kind} (${result.failure.reason})`
        : `  ${result.clusterId}: reachable`
    );
  }
  return results;
}
