/**
 * render.ts - Plain-text rendering of responses for the terminal
 *
 * Example output:
 *   Found 2 Pods (of 14 considered):
 *
 *   CLUSTER  NAMESPACE  NAME      STATUS   CREATED
 *   prod     shop       api-7f9c  Running  2024-06-09T08:30:00Z
 *   staging  shop       api-55d1  Pending  2024-06-09T11:02:13Z
 *
 *   Errors:
 *     dev: Timeout - No response within 15000ms
 *
 * Renders the wire shapes from formatter.ts rather than engine types, so
 * `--json` and the text output can never disagree about what was found.
 */

import type {
  AgentResponse,
  ErrorResponse,
  FilterResponse,
  HealthResponse,
  WireErrors,
} from "./formatter";

/** Drops the milliseconds toISOString() always adds */
function shortTime(iso: string | null): string {
  return iso ? iso.replace(/\.\d{3}Z$/, "Z") : "-";
}

/** Left-aligned columns separated by two spaces, no trailing padding */
export function renderTable(header: string[], rows: string[][]): string {
  const widths = header.map((cell, i) =>
    Math.max(cell.length, ...rows.map((row) => (row[i] ?? "").length))
  );
  return [header, ...rows]
    .map((row) =>
      row
        .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i])))
        .join("  ")
    )
    .join("\n");
}

function renderErrors(errors: WireErrors): string[] {
  const entries = Object.entries(errors);
  if (entries.length === 0) return [];
  return ["", "Errors:", ...entries.map(([id, e]) => `  ${id}: ${e.kind} - ${e.reason}`)];
}

function renderWarnings(warnings: string[]): string[] {
  if (warnings.length === 0) return [];
  return ["", "Warnings:", ...warnings.map((warning) => `  ${warning}`)];
}

function renderError(response: ErrorResponse): string {
  const { kind, message, errors } = response.error;
  return [`Error (${kind}): ${message}`, ...renderErrors(errors ?? {})].join("\n");
}

export function renderFilterResponse(response: FilterResponse): string {
  if (response.status === "error") return renderError(response);

  const kind = response.query_echo.resource_type;
  const lines: string[] = [];

  if (response.matched.length === 0) {
    lines.push(`No ${kind} resources matched (${response.total_considered} considered).`);
  } else {
    const count = response.matched.length;
    lines.push(`Found ${count} ${kind}${count === 1 ? "" : "s"} (of ${response.total_considered} considered):`);
    lines.push("");
    lines.push(
      renderTable(
        ["CLUSTER", "NAMESPACE", "NAME", "STATUS", "CREATED"],
        response.matched.map((record) => [
          record.cluster_id,
          record.namespace ?? "-",
          record.name,
          record.status ?? "-",
          shortTime(record.created_at),
        ])
      )
    );
  }

  lines.push(...renderErrors(response.errors));
  lines.push(...renderWarnings(response.warnings));
  return lines.join("\n");
}

export function renderAgentResponse(response: AgentResponse): string {
  if (response.status === "error") return renderError(response);
  const suggestions =
    response.suggestions.length > 0
      ? ["", "Suggestions:", ...response.suggestions.map((suggestion) => `  - ${suggestion}`)]
      : [];
  return [response.answer, ...suggestions, ...renderWarnings(response.warnings)].join("\n");
}

export function renderHealthResponse(response: HealthResponse): string {
  const lines = [`Status: ${response.status} (LLM ${response.llm})`];
  if (response.clusters.length === 0) {
    lines.push("", "No clusters configured.");
    return lines.join("\n");
  }
  lines.push(
    "",
    renderTable(
      ["CLUSTER", "REACHABLE", "LATENCY", "ERROR"],
      response.clusters.map((cluster) => [
        cluster.cluster_id,
        cluster.reachable ? "yes" : "no",
        `${cluster.latency_ms}ms`,
        cluster.error ? `${cluster.error.kind} - ${cluster.error.reason}` : "-",
      ])
    )
  );
  return lines.join("\n");
}
