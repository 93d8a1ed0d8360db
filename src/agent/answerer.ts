/**
 * answerer.ts - Answers agent-style prompts about one cluster
 *
 * The agent path reuses the filter pipeline and adds two steps:
 *
 *   prompt → extractIntent → chooseAction → executeFilter (one cluster)
 *          → [describe | events + logs] → facts → composer (LLM) → answer
 *                                                    ↘ fallback: the facts themselves
 *
 * A composed answer also yields suggestions: the bullets under its
 * Recommendations heading.
 *
 * Every action is read-only. The composer only rewrites facts the engine
 * already collected; it has no tools and cannot reach the cluster.
 */

import { ChatAnthropic } from "@langchain/anthropic";
import { StringOutputParser } from "@langchain/core/output_parsers";
import * as fs from "fs";
import * as path from "path";
import type { ClusterResolver } from "../clusters/resolver";
import { KubectlClusterClient, type ClusterClient } from "../engine/cluster-client";
import { DEFAULT_CLUSTER_TIMEOUT_MS, executeFilter } from "../engine/executor";
import type { ClusterContext, ResourceEvent, ResourceRecord } from "../engine/types";
import { ClusterFetchError, errorMessage } from "../errors";
import { extractIntent } from "../query/extractor";
import { buildFilterSpec } from "../query/filter-builder";
import type { IntentOracle } from "../query/oracle";
import type { FilterSpec } from "../query/types";
import { TimeoutError, withTimeout } from "../utils/timeout";
import {
  LOG_TAIL_LINES,
  chooseAction,
  describeTarget,
  diagnoseFacts,
  extractSuggestions,
  listFacts,
  qualifiedName,
  summaryFacts,
  type AgentAction,
} from "./actions";

// ---------------------------------------------------------------------------
// Composer
// ---------------------------------------------------------------------------

export interface ComposeInput {
  prompt: string;
  clusterId: string;
  action: AgentAction;
  facts: string;
}

export interface AnswerComposer {
  compose(input: ComposeInput, signal: AbortSignal): Promise<string>;
}

/** The slice of a text-producing runnable the composer uses */
export interface TextModel {
  invoke(messages: Array<[string, string]>, options?: { signal?: AbortSignal }): Promise<string>;
}

/** Sonnet: answers are prose read by people, not parsed */
export const DEFAULT_ANSWER_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_COMPOSER_TIMEOUT_MS = 30000;

/** describe output beyond this is cut before it reaches the model */
const MAX_DESCRIBE_CHARS = 8000;

/**
 * Goes from src/agent/ up to project root, then into prompts/.
 */
const promptPath = path.join(__dirname, "../../prompts/agent-answer.md");

let cachedPrompt: string | null = null;

function getSystemPrompt(): string {
  if (!cachedPrompt) {
    cachedPrompt = fs.readFileSync(promptPath, "utf8");
  }
  return cachedPrompt;
}

export function createAnthropicTextModel(modelName: string = DEFAULT_ANSWER_MODEL): TextModel {
  const llm = new ChatAnthropic({
    model: modelName,
    maxTokens: 2048,
  });
  return llm.pipe(new StringOutputParser());
}

export function createModelComposer(model: TextModel): AnswerComposer {
  return {
    compose(input, signal) {
      const human = [
        `Question: ${input.prompt}`,
        `Cluster: ${input.clusterId}`,
        `Action taken: ${input.action}`,
        "",
        "Facts collected:",
        input.facts,
      ].join("\n");
      return model.invoke(
        [
          ["system", getSystemPrompt()],
          ["human", human],
        ],
        { signal }
      );
    },
  };
}

// ---------------------------------------------------------------------------
// Agent query
// ---------------------------------------------------------------------------

export interface AgentDeps {
  resolver: ClusterResolver;
  client?: ClusterClient;
  oracle?: IntentOracle | null;
  /** null or omitted: answer with the collected facts */
  composer?: AnswerComposer | null;
  clusterTimeoutMs?: number;
  oracleTimeoutMs?: number;
  composerTimeoutMs?: number;
  now?: Date;
  onProgress?: (message: string) => void;
  signal?: AbortSignal;
}

export interface AgentAnswer {
  clusterId: string;
  action: AgentAction;
  answer: string;
  /** Whether the answer was written by the model or is the raw facts */
  composedBy: "model" | "facts";
  /** Next steps from the composed answer; empty when the answer is the facts */
  suggestions: string[];
  matchedCount: number;
  warnings: string[];
}

/**
 * Answers a prompt against exactly one cluster.
 *
 * @throws UnknownClusterError when clusterId does not resolve to one cluster
 * @throws InvalidFilterError when the prompt names no kind to look at
 * @throws ClusterFetchError when the cluster could not be read
 */
export async function answerAgentQuery(
  prompt: string,
  clusterId: string | undefined,
  deps: AgentDeps
): Promise<AgentAnswer> {
  const context = deps.resolver.resolveOne(clusterId);
  const client = deps.client ?? new KubectlClusterClient();
  const onProgress = deps.onProgress ?? console.log; // eslint-disable-line no-console

  const parsed = await extractIntent(prompt, {
    oracle: deps.oracle,
    now: deps.now,
    oracleTimeoutMs: deps.oracleTimeoutMs,
    signal: deps.signal,
  });
  const action = chooseAction(prompt, parsed);

  // "How healthy is this cluster?" names no kind; pods are what it means.
  // A diagnosis looks the pod up by name whatever state it is in.
  const spec = buildFilterSpec(
    parsed.resourceType === "unknown" && action === "summarize"
      ? { ...parsed, resourceType: "Pod" }
      : action === "diagnose"
        ? { ...parsed, statusFilter: null }
        : parsed
  );

  const warnings = [...spec.warnings];
  if (parsed.clusterHint && parsed.clusterHint !== context.clusterId) {
    warnings.push(
      `Ignored cluster "${parsed.clusterHint}" in the prompt; answering for ${context.clusterId}`
    );
  }

  const result = await executeFilter(spec, [context], {
    client,
    timeoutMs: deps.clusterTimeoutMs,
    onProgress,
    signal: deps.signal,
  });
  const failure = result.perClusterErrors[context.clusterId];
  if (failure) {
    throw new ClusterFetchError(failure.kind, context.clusterId, failure.reason);
  }

  onProgress(`Action: ${action}`);
  const facts = await collectFacts(action, spec, context, result.matched, client, deps, warnings);

  let answer = facts;
  let composedBy: AgentAnswer["composedBy"] = "facts";
  const composer = deps.composer;
  if (composer) {
    const timeoutMs = deps.composerTimeoutMs ?? DEFAULT_COMPOSER_TIMEOUT_MS;
    try {
      answer = await withTimeout(
        (signal) => composer.compose({ prompt, clusterId: context.clusterId, action, facts }, signal),
        timeoutMs,
        deps.signal
      );
      composedBy = "model";
    } catch (error) {
      const reason =
        error instanceof TimeoutError ? `timed out after ${timeoutMs}ms` : errorMessage(error);
      warnings.push(`Answer composer unavailable (${reason}); returned the collected facts`);
    }
  }

  return {
    clusterId: context.clusterId,
    action,
    answer,
    composedBy,
    suggestions: composedBy === "model" ? extractSuggestions(answer) : [],
    matchedCount: result.matched.length,
    warnings,
  };
}

/**
 * Runs one extra read against the cluster under the per-cluster timeout.
 * A failure becomes a warning and null, so the answer keeps what was read.
 */
async function readOrWarn<T>(
  label: string,
  read: (signal: AbortSignal) => Promise<T>,
  deps: AgentDeps,
  warnings: string[]
): Promise<T | null> {
  try {
    return await withTimeout(read, deps.clusterTimeoutMs ?? DEFAULT_CLUSTER_TIMEOUT_MS, deps.signal);
  } catch (error) {
    warnings.push(`Could not read ${label}: ${errorMessage(error)}`);
    return null;
  }
}

async function collectFacts(
  action: AgentAction,
  spec: FilterSpec,
  context: ClusterContext,
  matched: ResourceRecord[],
  client: ClusterClient,
  deps: AgentDeps,
  warnings: string[]
): Promise<string> {
  if (action === "summarize") {
    return summaryFacts(spec, context.clusterId, matched);
  }
  if (action === "list" || !spec.nameFilter.constrained) {
    return listFacts(spec, context.clusterId, matched);
  }

  const name = spec.nameFilter.value;
  const target = describeTarget(name, matched);
  if (!target) {
    const header =
      matched.length === 0
        ? `No ${spec.resourceType.toLowerCase()} named "${name}" in cluster ${context.clusterId}.`
        : `"${name}" matches more than one ${spec.resourceType.toLowerCase()}; name one exactly to ${action} it.`;
    return matched.length === 0 ? header : `${header}\n${listFacts(spec, context.clusterId, matched)}`;
  }

  if (action === "diagnose") {
    const namespace = target.namespace ?? "default";
    const [events, logs] = await Promise.all([
      readOrWarn<ResourceEvent[]>(
        `events for ${qualifiedName(target)}`,
        (signal) => client.events(target.name, namespace, context, signal),
        deps,
        warnings
      ),
      readOrWarn<string>(
        `logs for ${qualifiedName(target)}`,
        (signal) => client.logs(target.name, namespace, LOG_TAIL_LINES, context, signal),
        deps,
        warnings
      ),
    ]);
    return diagnoseFacts(target, events, logs);
  }

  const text = await readOrWarn<string>(
    `${qualifiedName(target)} details`,
    (signal) => client.describe(spec.resourceType, target.name, target.namespace, context, signal),
    deps,
    warnings
  );
  if (text === null) {
    return listFacts(spec, context.clusterId, [target]);
  }
  const trimmed =
    text.length > MAX_DESCRIBE_CHARS ? `${text.slice(0, MAX_DESCRIBE_CHARS)}\n... (truncated)` : text;
  return `${spec.resourceType} ${qualifiedName(target)} in cluster ${context.clusterId}:\n${trimmed.trimEnd()}`;
}
