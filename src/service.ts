/**
 * service.ts - The request layer: filter queries and agent queries
 *
 * Both surfaces (CLI and MCP server) go through QueryService. It owns the
 * collaborators for a process (registry, cluster client, oracle, composer)
 * and keeps nothing between requests, so concurrent requests are independent.
 *
 * Request-level errors come back as error responses, not exceptions. Anything
 * else that escapes (a bug, a broken install) is rethrown for the surface to
 * report.
 */

import type { Span } from "@opentelemetry/api";
import { answerAgentQuery, createAnthropicTextModel, createModelComposer } from "./agent/answerer";
import type { AnswerComposer } from "./agent/answerer";
import { CredentialStore, createS3ObjectFetcher } from "./clusters/credentials";
import { loadClusterRegistry, type ClusterEntry, type ClusterRegistry } from "./clusters/registry";
import { ClusterResolver } from "./clusters/resolver";
import { isLlmEnabled, type Config } from "./config";
import { KubectlClusterClient, type ClusterClient } from "./engine/cluster-client";
import { executeFilter } from "./engine/executor";
import { checkClusters } from "./engine/health";
import { ClusterFetchError, RequestError } from "./errors";
import { extractIntent } from "./query/extractor";
import { buildFilterSpec } from "./query/filter-builder";
import { createAnthropicIntentModel, createModelOracle, type IntentOracle } from "./query/oracle";
import type { RawQuery } from "./query/types";
import {
  formatAgentResponse,
  formatErrorResponse,
  formatFilterResponse,
  formatHealthResponse,
  type AgentResponse,
  type FilterResponse,
  type HealthResponse,
} from "./response/formatter";
import { setTraceOutput, withRequestTracing } from "./tracing/request-tracing";

export interface QueryServiceOptions {
  registry: ClusterRegistry;
  client?: ClusterClient;
  /** null or omitted: deterministic parsing only */
  oracle?: IntentOracle | null;
  /** null or omitted: agent answers are the collected facts */
  composer?: AnswerComposer | null;
  clusterTimeoutMs?: number;
  oracleTimeoutMs?: number;
  composerTimeoutMs?: number;
  /** Clock for relative time phrases (default: the system clock) */
  now?: () => Date;
  onProgress?: (message: string) => void;
  /** Downloaded kubeconfigs, removed by close() */
  credentials?: Pick<CredentialStore, "dispose">;
}

function failureOf(response: FilterResponse | AgentResponse): string | null {
  return response.status === "error" ? `${response.error.kind}: ${response.error.message}` : null;
}

export class QueryService {
  private readonly resolver: ClusterResolver;
  private readonly client: ClusterClient;
  private readonly onProgress: (message: string) => void;

  constructor(private readonly options: QueryServiceOptions) {
    this.resolver = new ClusterResolver(options.registry);
    this.client = options.client ?? new KubectlClusterClient();
    this.onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  }

  /** Configured clusters, in registry order */
  listClusters(): readonly ClusterEntry[] {
    return this.options.registry.list();
  }

  /**
   * Pings every configured cluster. Never an error response: an empty
   * registry or an unreachable cluster shows up in the status.
   */
  checkHealth(signal?: AbortSignal): Promise<HealthResponse> {
    return withRequestTracing(
      "health_check",
      "",
      async (span) => {
        const results = await checkClusters(this.resolver.all(), {
          client: this.client,
          timeoutMs: this.options.clusterTimeoutMs,
          onProgress: this.onProgress,
          signal,
        });
        const response = formatHealthResponse(
          results,
          this.options.oracle != null || this.options.composer != null,
          this.options.now?.() ?? new Date()
        );
        span.setAttributes({
          "cluster_query.clusters.count": results.length,
          "cluster_query.health.status": response.status,
        });
        return response;
      },
      (response) => (response.status === "healthy" ? null : `Cluster health ${response.status}`)
    );
  }

  /** Removes downloaded kubeconfigs; safe to call more than once */
  async close(): Promise<void> {
    await this.options.credentials?.dispose();
  }

  /**
   * Filter query: free text → matching records across clusters.
   * An explicit clusterHint wins over a cluster named in the text.
   */
  filterQuery(query: RawQuery, signal?: AbortSignal): Promise<FilterResponse> {
    return withRequestTracing(
      "filter_query",
      query.text,
      async (span) => {
        try {
          return await this.runFilter(query, span, signal);
        } catch (error) {
          if (error instanceof RequestError) return formatErrorResponse(error);
          throw error;
        }
      },
      failureOf
    );
  }

  /**
   * Agent query: a prompt answered against exactly one cluster.
   * clusterId may be omitted when only one cluster is configured.
   */
  agentQuery(prompt: string, clusterId?: string, signal?: AbortSignal): Promise<AgentResponse> {
    return withRequestTracing(
      "agent_query",
      prompt,
      async (span) => {
        try {
          const answer = await answerAgentQuery(prompt, clusterId, {
            resolver: this.resolver,
            client: this.client,
            oracle: this.options.oracle,
            composer: this.options.composer,
            clusterTimeoutMs: this.options.clusterTimeoutMs,
            oracleTimeoutMs: this.options.oracleTimeoutMs,
            composerTimeoutMs: this.options.composerTimeoutMs,
            now: this.options.now?.(),
            onProgress: this.onProgress,
            signal,
          });
          span.setAttributes({
            "cluster_query.cluster.id": answer.clusterId,
            "cluster_query.agent.action": answer.action,
            "cluster_query.agent.composed_by": answer.composedBy,
            "cluster_query.records.matched": answer.matchedCount,
          });
          setTraceOutput(span, answer.answer);
          return formatAgentResponse(answer);
        } catch (error) {
          if (error instanceof RequestError || error instanceof ClusterFetchError) {
            return formatErrorResponse(error);
          }
          throw error;
        }
      },
      failureOf
    );
  }

  private async runFilter(query: RawQuery, span: Span, signal?: AbortSignal): Promise<FilterResponse> {
    const parsed = await extractIntent(query.text, {
      oracle: this.options.oracle,
      now: this.options.now?.(),
      oracleTimeoutMs: this.options.oracleTimeoutMs,
      signal,
    });
    span.setAttribute("cluster_query.parse.source", parsed.source);

    const spec = buildFilterSpec(parsed);
    const contexts = this.resolver.resolve(query.clusterHint ?? parsed.clusterHint);
    span.setAttributes({
      "cluster_query.resource.kind": spec.resourceType,
      "cluster_query.clusters.count": contexts.length,
    });

    const result = await executeFilter(spec, contexts, {
      client: this.client,
      timeoutMs: this.options.clusterTimeoutMs,
      onProgress: this.onProgress,
      signal,
    });
    span.setAttributes({
      "cluster_query.records.considered": result.totalConsidered,
      "cluster_query.records.matched": result.matched.length,
      "cluster_query.clusters.failed": Object.keys(result.perClusterErrors).length,
    });

    return formatFilterResponse(result, spec);
  }
}

/**
 * Builds the service from validated configuration: the cluster registry,
 * S3 credentials for the configured region, kubectl, and (with an Anthropic
 * key) the NL oracle and answer composer.
 */
export function createQueryServiceFromConfig(
  config: Config,
  options?: { onProgress?: (message: string) => void }
): QueryService {
  const llm = isLlmEnabled(config);
  const credentials = new CredentialStore({
    fetcher: createS3ObjectFetcher(config.awsRegion),
    cacheTtlMs: config.credentialCacheTtlMs,
  });

  return new QueryService({
    registry: loadClusterRegistry(config),
    client: new KubectlClusterClient({ credentials, timeoutMs: config.clusterTimeoutMs }),
    oracle: llm ? createModelOracle(createAnthropicIntentModel(config.oracleModel)) : null,
    composer: llm ? createModelComposer(createAnthropicTextModel(config.answerModel)) : null,
    clusterTimeoutMs: config.clusterTimeoutMs,
    oracleTimeoutMs: config.oracleTimeoutMs,
    onProgress: options?.onProgress,
    credentials,
  });
}
