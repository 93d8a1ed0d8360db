/**
 * index.test.ts - Unit tests for MCP tool registration
 *
 * The server is connected to an SDK client over an in-memory transport pair,
 * so tools are listed and called the way an MCP client sees them.
 */

import { afterEach, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { registerQueryTools, toToolResult } from "./index";
import { QueryService } from "../../service";
import { ClusterRegistry, type ClusterEntry } from "../../clusters/registry";
import type { ClusterClient } from "../../engine/cluster-client";

const prod: ClusterEntry = {
  id: "prod",
  credentialRef: { source: "local", kubeconfigPath: "/kube/prod", context: null },
};

const reachableClient: ClusterClient = {
  list: () => Promise.resolve([]),
  describe: () => Promise.resolve(""),
  logs: () => Promise.resolve(""),
  events: () => Promise.resolve([]),
  ping: () => Promise.resolve(),
};

const open: Array<{ close(): Promise<void> }> = [];

afterEach(async () => {
  await Promise.all(open.splice(0).map((endpoint) => endpoint.close()));
});

async function connect(entries: ClusterEntry[]): Promise<Client> {
  const server = new McpServer({ name: "test", version: "0.0.0" });
  registerQueryTools(
    server,
    new QueryService({
      registry: new ClusterRegistry(entries),
      client: reachableClient,
      onProgress: () => {},
      now: () => new Date("2024-06-10T15:00:00Z"),
    })
  );
  const client = new Client({ name: "test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  open.push(client, server);
  return client;
}

describe("registerQueryTools", () => {
  it("lists each tool with its input fields", async () => {
    const client = await connect([]);

    const { tools } = await client.listTools();

    expect(
      tools.map((tool) => ({ name: tool.name, fields: Object.keys(tool.inputSchema.properties ?? {}) }))
    ).toEqual([
      { name: "filter_query", fields: ["query", "cluster"] },
      { name: "agent_query", fields: ["prompt", "cluster_id"] },
      { name: "cluster_health", fields: [] },
    ]);
  });

  it("answers cluster_health with the health document", async () => {
    const client = await connect([prod]);

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "cluster_health", arguments: {} })
    );

    expect(result.isError).toBe(false);
    const [content] = result.content;
    expect(content.type).toBe("text");
    expect(content.type === "text" && JSON.parse(content.text)).toMatchObject({
      status: "healthy",
      llm: "disabled",
      clusters: [{ cluster_id: "prod", reachable: true, error: null }],
      checked_at: "2024-06-10T15:00:00.000Z",
    });
  });

  it("flags a request error from filter_query", async () => {
    const client = await connect([prod]);

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: "filter_query", arguments: { query: "list pods", cluster: "qa" } })
    );

    expect(result.isError).toBe(true);
    const [content] = result.content;
    expect(content.type === "text" && JSON.parse(content.text)).toEqual({
      status: "error",
      error: { kind: "UnknownCluster", message: 'Unknown cluster "qa". Known clusters: prod' },
    });
  });
});

describe("toToolResult", () => {
  it("returns the response as JSON text", () => {
    const result = toToolResult({
      status: "ok",
      cluster_id: "prod",
      action: "list",
      answer: "No pods in cluster prod match.",
      composed_by: "facts",
      suggestions: [],
      matched_count: 0,
      warnings: [],
    });

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.content[0].text)).toMatchObject({ status: "ok", cluster_id: "prod" });
  });

  it("flags error responses", () => {
    const result = toToolResult({
      status: "error",
      error: { kind: "UnknownCluster", message: 'Unknown cluster "qa".' },
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text: JSON.stringify(
          { status: "error", error: { kind: "UnknownCluster", message: 'Unknown cluster "qa".' } },
          null,
          2
        ),
      },
    ]);
  });
});
