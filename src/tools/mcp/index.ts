/**
 * MCP tool registration for cluster-query
 *
 * One tool per request kind:
 * - filter_query: free text → matching resources across clusters
 * - agent_query: a question about one cluster → an answer
 * - cluster_health: every configured cluster → reachable or not
 *
 * Each returns the response document as JSON text. A request-level error
 * (unknown cluster, unreadable query, every cluster failed) is returned with
 * isError set, so the client sees the reason instead of a protocol error.
 *
 * Trace hierarchy for one call:
 *   execute_tool filter_query
 *   └── cluster-query.filter_query
 *       └── cluster-query.fetch <cluster> ...
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QueryService } from "../../service";
import type { AgentResponse, FilterResponse, HealthResponse } from "../../response/formatter";
import { withMcpToolTracing, type McpToolResult } from "../../tracing/request-tracing";
import {
  agentQuery,
  agentQueryDescription,
  agentQuerySchema,
  filterQuery,
  filterQueryDescription,
  filterQuerySchema,
  healthCheck,
  healthCheckDescription,
  healthCheckSchema,
  type AgentQueryInput,
  type FilterQueryInput,
  type HealthCheckInput,
} from "../core";

/** Exported for unit testing */
export function toToolResult(
  response: FilterResponse | AgentResponse | HealthResponse
): McpToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(response, null, 2) }],
    isError: response.status === "error",
  };
}

export function registerQueryTools(server: McpServer, service: QueryService): void {
  server.registerTool(
    "filter_query",
    {
      description: filterQueryDescription,
      inputSchema: filterQuerySchema.shape,
    },
    (input: FilterQueryInput, extra) =>
      withMcpToolTracing("filter_query", async (args: FilterQueryInput) =>
        toToolResult(await filterQuery(service, args, extra.signal))
      )(input)
  );

  server.registerTool(
    "agent_query",
    {
      description: agentQueryDescription,
      inputSchema: agentQuerySchema.shape,
    },
    (input: AgentQueryInput, extra) =>
      withMcpToolTracing("agent_query", async (args: AgentQueryInput) =>
        toToolResult(await agentQuery(service, args, extra.signal))
      )(input)
  );

  server.registerTool(
    "cluster_health",
    {
      description: healthCheckDescription,
      inputSchema: healthCheckSchema.shape,
    },
    (input: HealthCheckInput, extra) =>
      withMcpToolTracing("cluster_health", async (args: HealthCheckInput) =>
        toToolResult(await healthCheck(service, args, extra.signal))
      )(input)
  );
}
