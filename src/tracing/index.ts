/**
 * tracing/index.ts - OpenTelemetry initialization for cluster-query
 *
 * Tracing is opt-in: nothing is initialized unless OTEL_TRACING_ENABLED=true,
 * and the OTel API hands out no-op tracers until then.
 *
 * The SDK packages (@traceloop/node-server-sdk, @opentelemetry/sdk-trace-node,
 * @opentelemetry/exporter-trace-otlp-proto) are optional peer dependencies,
 * loaded through optional-deps.ts. When they are missing, the spans created
 * by the engine and the request layer are no-ops.
 *
 * OpenLLMetry owns the TracerProvider. Our exporter is passed to it so the
 * auto-instrumented Anthropic spans (oracle and answer composer) and our
 * own request, cluster and kubectl spans land in the same trace.
 *
 * Status lines go to stderr: stdout carries JSON-RPC in the MCP server and
 * the response document under `--json`.
 *
 * Exporters (OTEL_EXPORTER_TYPE):
 * - console (default): spans printed by ConsoleSpanExporter
 * - otlp: spans sent to OTEL_EXPORTER_OTLP_ENDPOINT over HTTP/protobuf
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

const traceloop = loadTraceloop();
const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "cluster-query";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * When true, query text, prompts and answers are written to span attributes.
 * Off by default: cluster questions can name workloads and namespaces.
 */
const isCaptureAiPayloads = process.env.OTEL_CAPTURE_AI_PAYLOADS === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

const log = console.error; // eslint-disable-line no-console

function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    log(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  log("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

if (isTracingEnabled) {
  if (!traceloop) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    log("[OTel] Initializing OpenTelemetry tracing...");

    traceloop.initialize({
      appName: SERVICE_NAME,
      exporter: createSpanExporter(),
      // CLI runs are short; export each span as it ends
      disableBatch: true,
      traceContent: isCaptureAiPayloads,
      silenceInitializationMessage: true,
    });

    log(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

    // @traceloop/node-server-sdk 0.22 has forceFlush but no shutdown
    const traceloopSdk = traceloop;
    const shutdown = async () => {
      try {
        await traceloopSdk.forceFlush();
        log("[OTel] Flushed pending spans");
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  }
}

/**
 * Tracer from the global provider: OpenLLMetry's when tracing is enabled,
 * the API's no-op otherwise.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

export { isCaptureAiPayloads };
