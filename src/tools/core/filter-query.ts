/**
 * filter-query core - Schema, description and handler for filter queries
 *
 * Shared by the MCP tool and the CLI's default command so both validate the
 * same input and call the service the same way.
 */

import { z } from "zod";
import type { QueryService } from "../../service";
import type { FilterResponse } from "../../response/formatter";

export const filterQuerySchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, "query must not be empty")
    .describe(
      "Free-text description of the resources to find, e.g. 'pods created in the last 2 hours in namespace shop'"
    ),
  cluster: z
    .string()
    .optional()
    .describe(
      "Cluster id to query, or 'all' for every configured cluster. Overrides a cluster named in the query. Omit to use the query's cluster, or all clusters"
    ),
});

export type FilterQueryInput = z.infer<typeof filterQuerySchema>;

export const filterQueryDescription = `Find Kubernetes resources across clusters with a free-text query.

The query is turned into a structured filter (resource type, creation time
window, name substring, namespace, labels, status) and run against every
selected cluster in parallel. Returns JSON:
- matched: records with cluster_id, kind, name, namespace, created_at, labels, status
- total_considered: records fetched before filtering
- errors: per-cluster failures (ClusterUnreachable, Timeout, AuthError)
- query_echo: the filter that was applied, so you can check the reading
- zero_results: true when nothing matched and no cluster failed

Supported kinds: pods, deployments, services, nodes, namespaces,
configmaps, secrets, statefulsets, daemonsets, replicasets, jobs, cronjobs,
ingresses, persistentvolumeclaims.

Example queries:
- "pods created in the last 2 hours"
- "running pods in namespace kube-system in cluster prod"
- "deployments with label app=web across all clusters"
- "jobs named backup since yesterday"`;

export function filterQuery(
  service: QueryService,
  input: FilterQueryInput,
  signal?: AbortSignal
): Promise<FilterResponse> {
  return service.filterQuery({ text: input.query, clusterHint: input.cluster }, signal);
}
