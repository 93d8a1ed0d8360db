#!/usr/bin/env node
/**
 * index.ts - CLI entry point for cluster-query
 *
 * Three commands:
 *
 * 1. Filter query (default):
 *    cluster-query "running pods in namespace shop" [--cluster prod] [--json]
 *    Finds matching resources across the configured clusters.
 *
 * 2. Agent query:
 *    cluster-query agent "how healthy are the pods?" --cluster prod [--json]
 *    Answers a question about one cluster.
 *
 * 3. Cluster list:
 *    cluster-query clusters [--check] [--json]
 *    Shows the registry the other commands resolve against. --check pings
 *    every cluster instead and exits with status 1 unless all of them answer.
 *
 * With --json the response document is the only thing on stdout; progress
 * moves to stderr. An error response exits with status 1. Kubeconfigs
 * downloaded from S3 are removed before the process exits.
 */

// Tracing must be initialized before anything instrumented is loaded
import "./tracing";

import { Command } from "commander";
import { execSync } from "child_process";
import { loadConfig } from "./config";
import { createQueryServiceFromConfig, type QueryService } from "./service";
import type { ClusterEntry } from "./clusters/registry";
import {
  renderAgentResponse,
  renderFilterResponse,
  renderHealthResponse,
  renderTable,
} from "./response/render";
import {
  agentQuery,
  agentQuerySchema,
  filterQuery,
  filterQuerySchema,
  healthCheck,
} from "./tools/core";

// ---------------------------------------------------------------------------
// Environment validation
// ---------------------------------------------------------------------------

/** Filter and agent queries shell out to kubectl */
function validateKubectl(): void {
  try {
    execSync("kubectl version --client", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    console.error("Error: kubectl is not installed or not in PATH.");
    console.error("");
    console.error("Install kubectl:");
    console.error("  https://kubernetes.io/docs/tasks/tools/");
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface OutputOptions {
  json?: boolean;
}

function createService(options: OutputOptions): QueryService {
  const config = loadConfig();
  // eslint-disable-next-line no-console
  const progress = options.json ? console.error : console.log;
  return createQueryServiceFromConfig(config, { onProgress: (message) => progress(message) });
}

/** Runs one command against a fresh service and cleans up after it */
async function withService(
  options: OutputOptions,
  run: (service: QueryService) => Promise<void>
): Promise<void> {
  const service = createService(options);
  try {
    await run(service);
  } finally {
    await service.close();
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2)); // eslint-disable-line no-console
}

function describeCredentials(entry: ClusterEntry): string {
  const ref = entry.credentialRef;
  return ref.source === "s3" ? `s3://${ref.bucket}/${ref.key}` : ref.kubeconfigPath;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function main() {
  const program = new Command();

  program
    .name("cluster-query")
    .description("Natural-language queries over the state of one or more Kubernetes clusters")
    .version("0.1.0")
    // --cluster and --json belong to whichever command they follow
    .enablePositionalOptions();

  program
    .argument("<query...>", "Free-text description of the resources to find")
    .option("-c, --cluster <id>", 'Cluster id, or "all" (default: the query\'s cluster, or all)')
    .option("--json", "Print the response document as JSON")
    .action(async (words: string[], options: OutputOptions & { cluster?: string }) => {
      validateKubectl();
      const input = filterQuerySchema.parse({ query: words.join(" "), cluster: options.cluster });

      await withService(options, async (service) => {
        const response = await filterQuery(service, input);

        if (options.json) {
          printJson(response);
        } else {
          console.log(`\n${renderFilterResponse(response)}\n`); // eslint-disable-line no-console
        }
        if (response.status === "error") process.exitCode = 1;
      });
    });

  program
    .command("agent")
    .description("Answer a question about one cluster")
    .argument("<prompt...>", "Natural language question")
    .option("-c, --cluster <id>", "Cluster to answer for (required with more than one cluster)")
    .option("--json", "Print the response document as JSON")
    .action(async (words: string[], options: OutputOptions & { cluster?: string }) => {
      validateKubectl();
      const input = agentQuerySchema.parse({ prompt: words.join(" "), cluster_id: options.cluster });

      await withService(options, async (service) => {
        const response = await agentQuery(service, input);

        if (options.json) {
          printJson(response);
        } else {
          console.log("─".repeat(60)); // eslint-disable-line no-console
          console.log(renderAgentResponse(response)); // eslint-disable-line no-console
          console.log(); // eslint-disable-line no-console
        }
        if (response.status === "error") process.exitCode = 1;
      });
    });

  program
    .command("clusters")
    .description("List the configured clusters")
    .option("--check", "Check that every cluster answers")
    .option("--json", "Print the registry (or the health check) as JSON")
    .action(async (options: OutputOptions & { check?: boolean }) => {
      if (options.check) {
        validateKubectl();
        await withService(options, async (service) => {
          const response = await healthCheck(service, {});
          if (options.json) {
            printJson(response);
          } else {
            console.log(`\n${renderHealthResponse(response)}\n`); // eslint-disable-line no-console
          }
          if (response.status !== "healthy") process.exitCode = 1;
        });
        return;
      }

      const clusters = createService(options).listClusters();

      if (options.json) {
        printJson(clusters.map((entry) => ({ id: entry.id, ...entry.credentialRef })));
        return;
      }
      if (clusters.length === 0) {
        console.log("No clusters configured."); // eslint-disable-line no-console
        return;
      }
      const rows = clusters.map((entry) => [
        entry.id,
        entry.credentialRef.source,
        describeCredentials(entry),
        entry.credentialRef.context ?? "-",
      ]);
      console.log(renderTable(["ID", "SOURCE", "KUBECONFIG", "CONTEXT"], rows)); // eslint-disable-line no-console
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
