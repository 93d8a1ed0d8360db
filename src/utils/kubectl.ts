/**
 * kubectl.ts - Executes kubectl commands as subprocesses
 *
 * How it works:
 * 1. Takes an array of kubectl arguments (e.g., ["get", "pods", "-A", "-o", "json"])
 * 2. Spawns kubectl as a child process, without a shell
 * 3. Resolves with a structured result; it never rejects
 *
 * Why execFile with an args array?
 * Arguments reach kubectl as separate argv entries and never pass through
 * /bin/sh, so a cluster or namespace name like "prod; rm -rf /" is just a
 * name kubectl fails to find. Query text ends up in these args, so this
 * matters.
 *
 * Why async?
 * Every cluster in a request is queried concurrently. A synchronous spawn
 * would serialize them and make the per-cluster timeout meaningless.
 *
 * OpenTelemetry instrumentation:
 * Each execution is a CLIENT span named "kubectl {operation} {resource}" with
 * k8s.* attributes plus OTel semconv process.* attributes. It nests under the
 * active cluster fetch span.
 */

import { execFile } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/** Default subprocess timeout when the caller gives none */
const DEFAULT_TIMEOUT_MS = 30000;

/** `kubectl get pods -A -o json` on a large cluster runs to tens of MB */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Result from executing a kubectl command.
 *
 * Failures are data, not exceptions: isError follows kubectl's exit code, and
 * timedOut separates "killed at the deadline" from "kubectl said no" so the
 * caller can classify the failure.
 */
export interface KubectlResult {
  output: string;
  isError: boolean;
  timedOut: boolean;
  /** kubectl's own stderr, for failure classification */
  stderr: string;
}

export interface KubectlOptions {
  timeoutMs?: number;
  /** Kills the subprocess when aborted */
  signal?: AbortSignal;
}

/** Signature shared by executeKubectl and the fakes tests inject */
export type KubectlExecutor = (args: string[], options?: KubectlOptions) => Promise<KubectlResult>;

/**
 * Metadata extracted from kubectl args for tracing attributes.
 */
interface KubectlMetadata {
  operation: string;
  resource: string;
  namespace: string | undefined;
  context: string | undefined;
}

function flagValue(args: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const index = args.indexOf(flag);
    if (index !== -1 && args[index + 1]) return args[index + 1];
  }
  return undefined;
}

/**
 * Extracts operation metadata from kubectl args for tracing.
 *
 * Global flags (--kubeconfig, --context) come first in the args this
 * project builds, so operation and resource are the first two positional
 * arguments rather than args[0] and args[1]:
 * - kubectl --context prod get pods -A   → operation=get, resource=pods
 * - kubectl describe pod web-0 -n shop   → operation=describe, resource=pod
 */
function extractKubectlMetadata(args: string[]): KubectlMetadata {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("-")) {
      // Flags that take a separate value skip it
      if (["--kubeconfig", "--context", "-n", "--namespace", "-o", "--output", "-l", "--field-selector"].includes(arg)) {
        i++;
      }
      continue;
    }
    positional.push(arg);
  }

  return {
    operation: positional[0] || "unknown",
    resource: positional[1] || "unknown",
    namespace: flagValue(args, "-n", "--namespace"),
    context: flagValue(args, "--context"),
  };
}

/**
 * Executes a kubectl command and resolves with a structured result.
 *
 * @example
 *   await executeKubectl(["get", "pods", "-A", "-o", "json"], { timeoutMs: 15000 })
 *   // { output: '{"items":[...]}', isError: false, timedOut: false, stderr: "" }
 *
 *   await executeKubectl(["get", "nonexistent"])
 *   // { output: 'Error executing "kubectl get nonexistent": ...', isError: true, ... }
 */
export function executeKubectl(args: string[], options?: KubectlOptions): Promise<KubectlResult> {
  const tracer = getTracer();
  const metadata = extractKubectlMetadata(args);
  const startTime = Date.now();

  // For messages only; never executed
  const command = `kubectl ${args.join(" ")}`;

  return tracer.startActiveSpan(
    `kubectl ${metadata.operation} ${metadata.resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("k8s.client", "kubectl");
      span.setAttribute("k8s.operation", metadata.operation);
      span.setAttribute("k8s.resource", metadata.resource);
      if (metadata.namespace) {
        span.setAttribute("k8s.namespace", metadata.namespace);
      }
      if (metadata.context) {
        span.setAttribute("k8s.context", metadata.context);
      }
      span.setAttribute("process.executable.name", "kubectl");
      span.setAttribute("process.command_args", ["kubectl", ...args]);

      return new Promise<KubectlResult>((resolve) => {
        const finish = (result: KubectlResult, exitCode: number) => {
          span.setAttribute("k8s.duration_ms", Date.now() - startTime);
          span.setAttribute("process.exit.code", exitCode);
          if (result.isError) {
            span.setAttribute("error.type", result.timedOut ? "Timeout" : "KubectlError");
            span.setStatus({ code: SpanStatusCode.ERROR, message: result.output });
          } else {
            span.setStatus({ code: SpanStatusCode.OK });
          }
          span.end();
          resolve(result);
        };

        execFile(
          "kubectl",
          args,
          {
            encoding: "utf8",
            timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            maxBuffer: MAX_OUTPUT_BYTES,
            signal: options?.signal,
          },
          (error, stdout, stderr) => {
            if (!error) {
              finish({ output: stdout, isError: false, timedOut: false, stderr }, 0);
              return;
            }

            // execFile's timeout kills with SIGTERM; an abort surfaces as AbortError
            const timedOut = error.killed === true || error.name === "AbortError";
            const reason = timedOut
              ? "timed out"
              : stderr.trim() || error.message || "Unknown error";
            // ExecFileException allows a null code, which span exceptions do not
            span.recordException(new Error(error.message));
            finish(
              { output: `Error executing "${command}": ${reason}`, isError: true, timedOut, stderr },
              typeof error.code === "number" ? error.code : -1
            );
          }
        );
      });
    }
  );
}
