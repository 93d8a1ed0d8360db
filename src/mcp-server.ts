#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for cluster-query
 *
 * An MCP client spawns this process and talks JSON-RPC over stdio. The
 * server exposes filter_query, agent_query and cluster_health, all backed by
 * the same QueryService as the CLI. Downloaded kubeconfigs are removed when
 * the client disconnects or the process is told to stop.
 *
 * stdout belongs to the protocol, so progress and diagnostics go to stderr.
 */

// Tracing must be initialized before anything instrumented is loaded
import "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { createQueryServiceFromConfig } from "./service";
import { registerQueryTools } from "./tools/mcp";

async function main(): Promise<void> {
  const config = loadConfig();
  const service = createQueryServiceFromConfig(config, {
    onProgress: (message) => console.error(message),
  });

  const server = new McpServer({
    name: "cluster-query",
    version: "0.1.0",
  });
  registerQueryTools(server, service);

  const transport = new StdioServerTransport();
  const shutdown = (): void => {
    service
      .close()
      .catch((error: unknown) => console.error("Failed to remove downloaded kubeconfigs:", error))
      .finally(() => process.exit(0));
  };
  server.server.onclose = shutdown;
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  await server.connect(transport);

  const clusters = service.listClusters().map((entry) => entry.id);
  console.error(
    `cluster-query MCP server ready (${clusters.length > 0 ? clusters.join(", ") : "no clusters configured"})`
  );
}

main().catch((error) => {
  console.error("MCP server error:", error);
  process.exit(1);
});
