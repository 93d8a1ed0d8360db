/**
 * extractor.ts - Intent Extractor: free text → ParsedQuery
 *
 * How it works:
 * 1. A deterministic pass pulls out everything keyword and regex matching can
 *    see: cluster, namespace, name, labels, then kind, status and time phrase.
 *    Each structured span is blanked out of the text once matched, so a pod
 *    named "error-handler" is not also read as status Failed.
 * 2. If that pass found a kind plus at least one constraint, or the text is a
 *    bare listing ("list all pods"), the result is final.
 * 3. Otherwise the NL oracle is asked, under its own timeout. Its answer goes
 *    back through the normalizer, and deterministic findings win field by field.
 * 4. If the oracle is missing, slow, or broken, the deterministic result is
 *    used anyway with source "fallback" and a warning saying why.
 *
 * The returned ParsedQuery is frozen. Nothing downstream may change it.
 */

import { errorMessage } from "../errors";
import { TimeoutError, withTimeout } from "../utils/timeout";
import {
  findResourceType,
  findStatus,
  normalizeResourceType,
  normalizeStatus,
  normalizeTimePhrase,
} from "./normalizer";
import type { IntentOracle } from "./oracle";
import type {
  OracleInference,
  ParsedQuery,
  ParseSource,
  ResourceKind,
  ResourceStatus,
  TimeRange,
} from "./types";

export const DEFAULT_ORACLE_TIMEOUT_MS = 8000;

/** What keyword and regex matching found, before any oracle involvement. */
export interface DeterministicExtraction {
  resourceType: ResourceKind | null;
  timeRange: TimeRange | null;
  nameFilter: string | null;
  namespace: string | null;
  labelSelectors: Record<string, string>;
  statusFilter: ResourceStatus | null;
  clusterHint: string | null;
  /** True when nothing but the kind and filler words remain ("list all pods") */
  bareListing: boolean;
}

export interface ExtractOptions {
  /** NL oracle; omitted or null means deterministic parsing only */
  oracle?: IntentOracle | null;
  /** Reference time for relative phrases (default: now) */
  now?: Date;
  oracleTimeoutMs?: number;
  /** Caller's cancellation, forwarded to the oracle */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Span patterns
// ---------------------------------------------------------------------------

const TOKEN = "([a-z0-9][\\w.-]*)";

const ALL_CLUSTERS_PATTERN = /\b(?:across|in|on|from)\s+(?:all|every)\s+(?:the\s+)?clusters?\b/i;

const CLUSTER_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(?:in|on|from|against)\\s+(?:the\\s+)?cluster\\s+["']?${TOKEN}["']?`, "i"),
  new RegExp(`\\bcluster\\s*[=:]\\s*${TOKEN}`, "i"),
  new RegExp(`\\b(?:in|on|from|against)\\s+(?:the\\s+)?${TOKEN}\\s+cluster\\b`, "i"),
];

const NAMESPACE_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(?:in|from|within)\\s+(?:the\\s+)?namespace\\s+["']?${TOKEN}["']?`, "i"),
  new RegExp(`\\b(?:in|from|within)\\s+(?:the\\s+)?${TOKEN}\\s+namespace\\b`, "i"),
  new RegExp(`\\b(?:namespace|ns)\\s*[=:]\\s*${TOKEN}`, "i"),
  new RegExp(`(?:^|\\s)(?:-n|--namespace)(?:\\s+|=)${TOKEN}`, "i"),
];

const NAME_PATTERNS: readonly RegExp[] = [
  new RegExp(
    `\\b(?:named|called|containing|matching|with\\s+(?:a\\s+)?name(?:\\s+(?:containing|matching|like))?|whose\\s+name\\s+(?:contains|matches))\\s+["']?${TOKEN}["']?`,
    "i"
  ),
  new RegExp(`\\bname\\s*[=:]\\s*${TOKEN}`, "i"),
];

const LABEL_PATTERN = /(?:^|[\s,(])([a-z0-9][\w./-]*)\s*=\s*([\w.-]+)/gi;

/** Keys that look like labels but name other constraints */
const RESERVED_KEYS = new Set(["namespace", "ns", "name", "status", "cluster", "label", "labels"]);

/** Words that do not narrow a query: "list all the pods" says nothing but the kind */
const FILLER_WORDS = new Set([
  "a", "about", "all", "an", "any", "are", "can", "count", "current", "currently",
  "describe", "display", "do", "each", "every", "exist", "existing", "find", "for",
  "get", "give", "have", "health", "how", "i", "in", "is", "let", "list", "many",
  "me", "my", "namespaces", "number", "of", "overview", "please", "resources", "see", "show",
  "summarise", "summarize", "summary", "tell", "the", "there", "to", "us", "we",
  "what", "which", "with", "you",
]);

/** Verbs after which the token following the kind is a name */
const NAME_FOLLOWS_PATTERN = /\b(?:describe|diagnose|troubleshoot|debug)\b/i;

/** Words that can follow a kind without being its name ("describe pod in ...") */
const NOT_A_NAME = new Set([
  "in", "on", "from", "with", "that", "which", "created", "named", "called",
  "across", "older", "newer", "since", "before", "after", "between", "and",
]);

interface SpanMatch {
  value: string;
  residual: string;
}

/**
 * Returns the first capture of the first matching pattern, with the whole
 * match blanked out of the text. Captures listed in `skip` are ignored.
 */
function takeSpan(
  text: string,
  patterns: readonly RegExp[],
  skip: ReadonlySet<string> = new Set()
): SpanMatch | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match || skip.has(match[1].toLowerCase())) continue;
    return { value: match[1], residual: blank(text, match.index, match[0].length) };
  }
  return null;
}

function blank(text: string, index: number, length: number): string {
  return `${text.slice(0, index)} ${text.slice(index + length)}`;
}

/**
 * "namespace" is left out of the synonym table because it introduces a scope
 * ("in namespace shop"). Once the scope patterns have run, a singular
 * "namespace" still in the text can only name the kind.
 */
function findSingularNamespace(
  text: string
): { kind: ResourceKind; phrase: string; index: number } | null {
  const match = /\bnamespace\b/i.exec(text);
  return match ? { kind: "Namespace", phrase: match[0], index: match.index } : null;
}

const NOT_A_SCOPE = new Set(["all", "every", "any", "this", "that", "the", "a", "each"]);

// ---------------------------------------------------------------------------
// Deterministic pass
// ---------------------------------------------------------------------------

/**
 * Extracts every field keyword and regex matching can see.
 *
 * Examples:
 *   "list all running pods"            → Pod, Running, bare listing
 *   "pods in namespace kube-system"    → Pod, namespace kube-system
 *   "deployments with label app=web"   → Deployment, labels { app: "web" }
 *   "show pods in cluster prod-east"   → Pod, clusterHint prod-east
 */
export function extractDeterministic(
  text: string,
  now: Date = new Date()
): DeterministicExtraction {
  let residual = text;

  let clusterHint: string | null = null;
  const allClusters = ALL_CLUSTERS_PATTERN.exec(residual);
  if (allClusters) {
    clusterHint = "all";
    residual = blank(residual, allClusters.index, allClusters[0].length);
  } else {
    const cluster = takeSpan(residual, CLUSTER_PATTERNS, NOT_A_SCOPE);
    if (cluster) {
      clusterHint = cluster.value;
      residual = cluster.residual;
    }
  }

  let namespace: string | null = null;
  const ns = takeSpan(residual, NAMESPACE_PATTERNS, NOT_A_SCOPE);
  if (ns) {
    namespace = ns.value;
    residual = ns.residual;
  }

  let nameFilter: string | null = null;
  const name = takeSpan(residual, NAME_PATTERNS);
  if (name) {
    nameFilter = name.value;
    residual = name.residual;
  }

  const labelSelectors: Record<string, string> = {};
  residual = residual.replace(LABEL_PATTERN, (whole: string, key: string, value: string) => {
    if (RESERVED_KEYS.has(key.toLowerCase())) return whole;
    labelSelectors[key] = value;
    return " ";
  });
  residual = residual.replace(/\blabel(?:s|ed|led)?\b/gi, " ");

  const kindMatch = findResourceType(residual) ?? findSingularNamespace(residual);
  const resourceType = kindMatch ? kindMatch.kind : null;
  if (kindMatch) {
    const end = kindMatch.index + kindMatch.phrase.length;
    // "describe pod web-0", "diagnose pod web-0", "show namespace shop":
    // the token right after the kind is its name
    const namesFollow = kindMatch.kind === "Namespace" && kindMatch.phrase.toLowerCase() === "namespace";
    if (!nameFilter && (namesFollow || NAME_FOLLOWS_PATTERN.test(residual))) {
      const after = /^\s+([a-z0-9][\w.-]*)/i.exec(residual.slice(end));
      if (after && !NOT_A_NAME.has(after[1].toLowerCase())) {
        nameFilter = after[1];
        residual = blank(residual, end, after[0].length);
      }
    }
    residual = blank(residual, kindMatch.index, kindMatch.phrase.length);
  }

  const statusFilter = findStatus(residual);
  const timeRange = normalizeTimePhrase(residual, now);

  const words = residual.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const bareListing = words.every((word) => FILLER_WORDS.has(word));

  return {
    resourceType,
    timeRange,
    nameFilter,
    namespace,
    labelSelectors,
    statusFilter,
    clusterHint,
    bareListing,
  };
}

function hasConstraint(found: DeterministicExtraction): boolean {
  return (
    found.timeRange !== null ||
    found.nameFilter !== null ||
    found.namespace !== null ||
    found.statusFilter !== null ||
    Object.keys(found.labelSelectors).length > 0
  );
}

// ---------------------------------------------------------------------------
// ParsedQuery assembly
// ---------------------------------------------------------------------------

function freezeParsed(parsed: ParsedQuery): ParsedQuery {
  Object.freeze(parsed.labelSelectors);
  Object.freeze(parsed.warnings);
  return Object.freeze(parsed);
}

function fromDeterministic(
  found: DeterministicExtraction,
  source: ParseSource,
  rawConfidence: number,
  warnings: string[]
): ParsedQuery {
  return freezeParsed({
    resourceType: found.resourceType ?? "unknown",
    timeRange: found.timeRange,
    nameFilter: found.nameFilter,
    namespace: found.namespace,
    labelSelectors: { ...found.labelSelectors },
    statusFilter: found.statusFilter,
    rawConfidence,
    source,
    clusterHint: found.clusterHint,
    warnings,
  });
}

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Combines deterministic findings with the oracle's reading.
 * A field the deterministic pass found is never overridden.
 */
function mergeInference(
  found: DeterministicExtraction,
  inference: OracleInference,
  now: Date
): ParsedQuery {
  const warnings: string[] = [];

  let resourceType: ResourceKind | "unknown" = found.resourceType ?? "unknown";
  if (!found.resourceType && inference.resource_type) {
    const kind = normalizeResourceType(inference.resource_type);
    if (kind) {
      resourceType = kind;
    } else {
      warnings.push(`NL oracle suggested unsupported resource type "${inference.resource_type}"`);
    }
  }

  let timeRange = found.timeRange;
  if (!timeRange && inference.time_phrase) {
    timeRange = normalizeTimePhrase(inference.time_phrase, now);
    if (!timeRange) {
      warnings.push(`Ignored unrecognized time phrase "${inference.time_phrase}"`);
    }
  }

  let statusFilter = found.statusFilter;
  if (!statusFilter && inference.status) {
    statusFilter = normalizeStatus(inference.status);
    if (!statusFilter) {
      warnings.push(`Ignored unrecognized status "${inference.status}"`);
    }
  }

  return freezeParsed({
    resourceType,
    timeRange,
    nameFilter: found.nameFilter ?? blankToNull(inference.name),
    namespace: found.namespace ?? blankToNull(inference.namespace),
    labelSelectors: { ...(inference.labels ?? {}), ...found.labelSelectors },
    statusFilter,
    rawConfidence: clampConfidence(inference.confidence),
    source: "oracle",
    clusterHint: found.clusterHint,
    warnings,
  });
}

// ---------------------------------------------------------------------------
// Public entry point
// ---------------------------------------------------------------------------

/**
 * Parses free text into a ParsedQuery, consulting the NL oracle only when
 * deterministic matching leaves the query ambiguous.
 *
 * Never rejects: oracle failures turn into a "fallback" result with a warning.
 * A resourceType of "unknown" is left for the Filter Builder to reject.
 */
export async function extractIntent(
  text: string,
  options?: ExtractOptions
): Promise<ParsedQuery> {
  const now = options?.now ?? new Date();
  const found = extractDeterministic(text, now);

  if (found.resourceType && (hasConstraint(found) || found.bareListing)) {
    return fromDeterministic(found, "deterministic", 1, []);
  }

  const fallbackConfidence = found.resourceType ? 0.5 : 0;
  const oracle = options?.oracle;
  if (!oracle) {
    return fromDeterministic(found, "fallback", fallbackConfidence, [
      "NL oracle not configured; used keyword matching only",
    ]);
  }

  const timeoutMs = options?.oracleTimeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
  try {
    const inference = await withTimeout(
      (signal) => oracle.infer(text, signal),
      timeoutMs,
      options?.signal
    );
    return mergeInference(found, inference, now);
  } catch (error) {
    const reason =
      error instanceof TimeoutError
        ? `NL oracle timed out after ${timeoutMs}ms`
        : `NL oracle unavailable (${errorMessage(error)})`;
    return fromDeterministic(found, "fallback", fallbackConfidence, [
      `${reason}; used keyword matching only`,
    ]);
  }
}
