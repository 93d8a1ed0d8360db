/**
 * request-tracing.ts - Root spans for requests and MCP tool calls
 *
 * Every filter or agent query gets one root span; the engine's per-cluster
 * spans and the kubectl subprocess spans nest under it through the active
 * context:
 *
 *   execute_tool filter_query          (MCP server only)
 *   └── cluster-query.filter_query
 *       ├── cluster-query.fetch prod
 *       │   └── kubectl get pods
 *       └── cluster-query.fetch staging
 *           └── kubectl get pods
 *
 * A health check is the same shape: `cluster-query.health_check` with one
 * `cluster-query.ping <id>` child per cluster.
 *
 * Query text and answers are recorded only when OTEL_CAPTURE_AI_PAYLOADS=true.
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, type Span } from "@opentelemetry/api";
import { errorMessage } from "../errors";
import { getTracer, isCaptureAiPayloads } from "./index";

export type RequestOperation = "filter_query" | "agent_query" | "health_check";

/**
 * MCP tool result. The index signature is what the SDK's CallToolResult
 * requires; isError marks a failed request that did not throw.
 */
export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function markSpanError(span: Span, error: unknown): void {
  span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
  if (error instanceof Error) {
    span.recordException(error);
  }
}

/** Records the response on a request span, if payload capture is on */
export function setTraceOutput(span: Span, output: string): void {
  if (isCaptureAiPayloads) {
    span.setAttribute("traceloop.entity.output", output);
  }
}

/**
 * Runs one request under a root span named `cluster-query.<operation>`.
 *
 * @param fn - receives the span to add outcome attributes to
 * @param failureOf - message for a result that reports a failure without
 *   throwing (an error response); the span is then marked ERROR
 */
export async function withRequestTracing<T>(
  operation: RequestOperation,
  input: string,
  fn: (span: Span) => Promise<T>,
  failureOf?: (result: T) => string | null
): Promise<T> {
  const attributes: Record<string, string> = {
    "cluster_query.request.operation": operation,
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": operation,
  };
  if (isCaptureAiPayloads) {
    attributes["cluster_query.request.text"] = input;
    attributes["traceloop.entity.input"] = input;
  }

  return getTracer().startActiveSpan(
    `cluster-query.${operation}`,
    { kind: SpanKind.INTERNAL, attributes },
    async (span) => {
      try {
        const result = await fn(span);
        const failure = failureOf?.(result) ?? null;
        span.setStatus(
          failure === null
            ? { code: SpanStatusCode.OK }
            : { code: SpanStatusCode.ERROR, message: failure }
        );
        return result;
      } catch (error) {
        markSpanError(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Wraps an MCP tool handler in an `execute_tool <name>` span with the
 * OTel GenAI tool attributes. A result with isError sets the span to ERROR.
 */
export function withMcpToolTracing<TInput>(
  toolName: string,
  handler: (input: TInput) => Promise<McpToolResult>
): (input: TInput) => Promise<McpToolResult> {
  return async (input: TInput) => {
    const attributes: Record<string, string> = {
      "gen_ai.operation.name": "execute_tool",
      "gen_ai.tool.name": toolName,
      "gen_ai.tool.type": "function",
      "gen_ai.tool.call.id": randomUUID(),
      "cluster_query.mcp.tool.name": toolName,
    };
    if (isCaptureAiPayloads) {
      attributes["gen_ai.tool.call.arguments"] = JSON.stringify(input);
    }

    return getTracer().startActiveSpan(
      `execute_tool ${toolName}`,
      { kind: SpanKind.INTERNAL, attributes },
      async (span) => {
        try {
          const result = await handler(input);
          const text = result.content.map((part) => part.text).join("\n");
          if (result.isError) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: text || "MCP tool returned error" });
          } else {
            span.setStatus({ code: SpanStatusCode.OK });
          }
          if (isCaptureAiPayloads && text) {
            span.setAttribute("gen_ai.tool.call.result", text);
          }
          return result;
        } catch (error) {
          markSpanError(span, error);
          throw error;
        } finally {
          span.end();
        }
      }
    );
  };
}
