/**
 * optional-deps.ts - require() loaders for the optional OTel SDK packages
 *
 * Each loader returns the module, or null when the package is not installed.
 * Any other load failure (a broken install, a syntax error) is rethrown so it
 * shows up at startup.
 *
 * Kept apart from tracing/index.ts so tests can vi.mock("./optional-deps");
 * Vitest cannot intercept the raw require() calls themselves.
 */

function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

function loadOptional<T>(packageName: string, load: () => T): T | null {
  try {
    return load();
  } catch (error) {
    if (isModuleNotFound(error, packageName)) return null;
    throw error;
  }
}

/** OpenLLMetry: Anthropic auto-instrumentation and the TracerProvider */
export function loadTraceloop(): typeof import("@traceloop/node-server-sdk") | null {
  return loadOptional("@traceloop/node-server-sdk", () => require("@traceloop/node-server-sdk"));
}

/** ConsoleSpanExporter */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  return loadOptional("@opentelemetry/sdk-trace-node", () => require("@opentelemetry/sdk-trace-node"));
}

/** OTLPTraceExporter */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  return loadOptional("@opentelemetry/exporter-trace-otlp-proto", () =>
    require("@opentelemetry/exporter-trace-otlp-proto")
  );
}
