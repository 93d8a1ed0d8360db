/**
 * agent-query core - Schema, description and handler for agent queries
 */

import { z } from "zod";
import type { QueryService } from "../../service";
import type { AgentResponse } from "../../response/formatter";

export const agentQuerySchema = z.object({
  prompt: z
    .string()
    .trim()
    .min(1, "prompt must not be empty")
    .describe("Natural language question about one cluster"),
  cluster_id: z
    .string()
    .optional()
    .describe("Cluster to answer for. Required when more than one cluster is configured"),
});

export type AgentQueryInput = z.infer<typeof agentQuerySchema>;

export const agentQueryDescription = `Answer a question about one Kubernetes cluster.

The prompt is read the same way as filter_query, then one read-only action
runs against the cluster:
- list: the matching resources
- describe: kubectl describe output for one named resource
- diagnose: status, recent events, and recent logs for one named pod,
  answered with a root cause and recommendations
- summarize: counts by status and namespace

The answer is prose written from the collected facts, or the facts
themselves when no language model is configured. Recommendations in a
model-written answer are also returned as a separate suggestions list.

Example prompts:
- "how healthy are the pods in namespace shop?"
- "describe pod api-7f9c"
- "diagnose pod api-7f9c"
- "list deployments created today"`;

export function agentQuery(
  service: QueryService,
  input: AgentQueryInput,
  signal?: AbortSignal
): Promise<AgentResponse> {
  return service.agentQuery(input.prompt, input.cluster_id, signal);
}
