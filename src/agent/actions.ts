/**
 * actions.ts - The agent's read-only actions
 *
 * An agent prompt maps onto exactly one of four actions:
 * - list: the matching resources, one per line
 * - describe: `kubectl describe` output for one named resource
 * - diagnose: recent events and the log tail of one named pod
 * - summarize: counts by status and namespace
 *
 * The fact builders here produce plain text that serves twice: as the
 * context handed to the answer composer, and as the answer itself when no
 * composer is available.
 */

import { getKindSupport } from "../query/kinds";
import type { FilterSpec, ParsedQuery } from "../query/types";
import type { ResourceEvent, ResourceRecord } from "../engine/types";

export type AgentAction = "list" | "describe" | "diagnose" | "summarize";

const SUMMARIZE_PATTERN = /\b(summari[sz]e|summary|overview|how many|count|health|healthy)\b/i;
const DESCRIBE_PATTERN = /\b(describe|details?|detailed|inspect|explain|what'?s wrong|why)\b/i;
const DIAGNOSE_PATTERN =
  /\b(diagnose|diagnosis|troubleshoot|debug|root cause|logs?|crash\w*|restart\w*|what'?s wrong|why)\b/i;

/** Most records listed before the rest are counted instead */
export const MAX_LISTED = 50;

/**
 * Picks the action for a prompt. describe and diagnose need a name, so
 * "describe the pods" without one lists them instead. Only pods have logs
 * to diagnose; "why" about any other kind describes it.
 */
export function chooseAction(prompt: string, parsed: ParsedQuery): AgentAction {
  if (parsed.nameFilter && parsed.resourceType === "Pod" && DIAGNOSE_PATTERN.test(prompt)) {
    return "diagnose";
  }
  if (SUMMARIZE_PATTERN.test(prompt)) return "summarize";
  if (parsed.nameFilter && DESCRIBE_PATTERN.test(prompt)) return "describe";
  return "list";
}

function plural(spec: FilterSpec, count: number): string {
  const support = getKindSupport(spec.resourceType);
  return count === 1 ? spec.resourceType.toLowerCase() : support.plural;
}

/** "shop/web-0" for namespaced records, "node-a" otherwise */
export function qualifiedName(record: ResourceRecord): string {
  return record.namespace ? `${record.namespace}/${record.name}` : record.name;
}

function describeRecord(record: ResourceRecord): string {
  const details: string[] = [];
  if (record.status) details.push(record.status);
  if (record.createdAt) details.push(`created ${record.createdAt.toISOString()}`);
  return details.length > 0
    ? `- ${qualifiedName(record)} (${details.join(", ")})`
    : `- ${qualifiedName(record)}`;
}

export function listFacts(spec: FilterSpec, clusterId: string, records: ResourceRecord[]): string {
  if (records.length === 0) {
    return `No ${plural(spec, 0)} in cluster ${clusterId} match.`;
  }

  const count = records.length;
  const lines = [
    `${count} ${plural(spec, count)} in cluster ${clusterId} ${count === 1 ? "matches" : "match"}:`,
  ];
  lines.push(...records.slice(0, MAX_LISTED).map(describeRecord));
  if (records.length > MAX_LISTED) {
    lines.push(`... and ${records.length - MAX_LISTED} more`);
  }
  return lines.join("\n");
}

/** Tallies sorted by count descending, then key */
function tally(values: string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .map(([key, count]) => `${key} ${count}`)
    .join(", ");
}

export function summaryFacts(spec: FilterSpec, clusterId: string, records: ResourceRecord[]): string {
  const support = getKindSupport(spec.resourceType);
  const lines = [`${records.length} ${plural(spec, records.length)} in cluster ${clusterId}.`];
  if (records.length === 0) return lines[0];

  if (support.statuses.length > 0) {
    lines.push(`By status: ${tally(records.map((record) => record.status ?? "(none)"))}`);
  }
  if (support.namespaced) {
    lines.push(`By namespace: ${tally(records.map((record) => record.namespace ?? "(none)"))}`);
  }
  return lines.join("\n");
}

/**
 * Which record a describe prompt means: an exact name match, or the only
 * substring match. null when there is none or the name is ambiguous.
 */
export function describeTarget(name: string, records: ResourceRecord[]): ResourceRecord | null {
  const exact = records.find((record) => record.name === name);
  if (exact) return exact;
  return records.length === 1 ? records[0] : null;
}

/** Events shown per diagnosis */
export const MAX_EVENTS = 10;

/** Log lines requested per container */
export const LOG_TAIL_LINES = 50;

/** Log text beyond this is cut from the front, keeping the newest lines */
const MAX_LOG_CHARS = 4000;

function describeEvent(event: ResourceEvent): string {
  const when = event.at ? ` (${event.at.toISOString()})` : "";
  const repeated = event.count > 1 ? ` x${event.count}` : "";
  return `- [${event.type}] ${event.reason}${repeated}: ${event.message}${when}`;
}

/**
 * Events and logs are null when they could not be read; the reason is
 * reported as a warning by the caller.
 */
export function diagnoseFacts(
  record: ResourceRecord,
  events: ResourceEvent[] | null,
  logs: string | null
): string {
  const lines = [
    `Pod ${qualifiedName(record)} in cluster ${record.clusterId} (status ${record.status ?? "unknown"}).`,
    "",
  ];

  if (events === null) {
    lines.push("Events: unavailable.");
  } else if (events.length === 0) {
    lines.push("Events: none recorded.");
  } else {
    lines.push("Events (newest first):");
    lines.push(...events.slice(0, MAX_EVENTS).map(describeEvent));
    if (events.length > MAX_EVENTS) {
      lines.push(`... and ${events.length - MAX_EVENTS} older`);
    }
  }

  lines.push("");
  const trimmed = logs?.trimEnd() ?? null;
  if (trimmed === null) {
    lines.push("Logs: unavailable.");
  } else if (!trimmed) {
    lines.push("Logs: empty.");
  } else {
    const tail =
      trimmed.length > MAX_LOG_CHARS ? `... (truncated)\n${trimmed.slice(-MAX_LOG_CHARS)}` : trimmed;
    lines.push(`Logs (last ${LOG_TAIL_LINES} lines per container):`, tail);
  }
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Suggestions
// ---------------------------------------------------------------------------

/** Most suggestions returned with an answer */
export const MAX_SUGGESTIONS = 5;

const BULLET_PATTERN = /^\s*(?:[-*\u2022]|\d+[.)])\s+(.+)$/;
/** "## Issues", "**Recommendations**", "**Root cause:**", "Remediation:" */
const HEADING_PATTERN = /^\s*(?:#{1,6}\s+(.+?)|\*\*([^*]+?):?\*\*:?|([a-z][a-z ]*):)\s*$/i;
const ADVICE_PATTERN = /\b(recommend\w*|should|check|try|consider|run|verify|inspect)\b/i;

/**
 * Pulls next steps out of a composed answer: the bullets under a
 * "Recommendations" (or "Remediation") heading when there is one, otherwise
 * any bullet that reads as advice.
 */
export function extractSuggestions(answer: string): string[] {
  const inSection: string[] = [];
  const advice: string[] = [];
  let section: string | null = null;

  for (const line of answer.split("\n")) {
    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      section = (heading[1] ?? heading[2] ?? heading[3] ?? "").trim().toLowerCase();
      continue;
    }
    const bullet = BULLET_PATTERN.exec(line);
    if (!bullet) continue;
    const text = bullet[1].replace(/\*\*/g, "").trim();
    if (!text) continue;
    if (section === "recommendations" || section === "remediation") {
      inSection.push(text);
    } else if (ADVICE_PATTERN.test(text)) {
      advice.push(text);
    }
  }

  return (inSection.length > 0 ? inSection : advice).slice(0, MAX_SUGGESTIONS);
}
