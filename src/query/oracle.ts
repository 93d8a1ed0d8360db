/**
 * oracle.ts - NL oracle: asks an LLM to read queries keyword matching could not
 *
 * The Intent Extractor only sees the IntentOracle interface, so tests pass a
 * stub and deployments without an API key pass nothing at all.
 *
 * The default implementation is Claude through ChatAnthropic with
 * withStructuredOutput(), which uses Anthropic's tool_use to constrain the
 * answer to the zod schema below. The answer is still validated with
 * safeParse: a model that drifts off-schema is treated as unavailable, not
 * trusted.
 */

import { ChatAnthropic } from "@langchain/anthropic";
import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import { errorMessage, OracleUnavailableError } from "../errors";
import type { OracleInference } from "./types";

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface IntentOracle {
  /** Reads free text; rejects with OracleUnavailableError when it cannot */
  infer(text: string, signal: AbortSignal): Promise<OracleInference>;
}

/**
 * The slice of a structured-output runnable the oracle uses.
 * Returns unknown because the answer is validated here, not trusted.
 */
export interface StructuredIntentModel {
  invoke(
    messages: Array<[string, string]>,
    options?: { signal?: AbortSignal }
  ): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Zod schema for structured LLM output
// ---------------------------------------------------------------------------

export const OracleInferenceSchema = z.object({
  resource_type: z
    .string()
    .nullish()
    .describe(
      "Kubernetes kind the user is asking about, singular and capitalized (e.g., 'Pod', 'Deployment'). Null if unclear."
    ),
  time_phrase: z
    .string()
    .nullish()
    .describe(
      "Creation-time constraint rewritten as one of: 'today', 'yesterday', 'this week', 'last N hours', 'last N days', 'N days ago', 'since YYYY-MM-DD', 'before YYYY-MM-DD', 'between YYYY-MM-DD and YYYY-MM-DD', 'on YYYY-MM-DD'. Null if none."
    ),
  name: z
    .string()
    .nullish()
    .describe("Substring the resource name must contain. Null if none."),
  namespace: z
    .string()
    .nullish()
    .describe("Exact namespace. Null if none or if the user means all namespaces."),
  labels: z
    .record(z.string())
    .nullish()
    .describe("Label key/value pairs the resource must carry. Null if none."),
  status: z
    .string()
    .nullish()
    .describe(
      "Status the resource must be in (e.g., 'Running', 'Pending', 'Failed', 'Ready', 'NotReady', 'Available'). Null if none."
    ),
  confidence: z
    .number()
    .min(0)
    .max(1)
    .describe("Confidence in this reading: 0.9+ when explicit, 0.5-0.8 when inferred, below 0.5 when guessing"),
});

// ---------------------------------------------------------------------------
// Prompt template loading
// ---------------------------------------------------------------------------

/**
 * Path to the intent extraction prompt.
 * Goes from src/query/ up to project root, then into prompts/.
 */
const promptPath = path.join(__dirname, "../../prompts/intent-extraction.md");

let cachedPrompt: string | null = null;

function getPromptTemplate(): string {
  if (!cachedPrompt) {
    try {
      cachedPrompt = fs.readFileSync(promptPath, "utf8");
    } catch (error) {
      throw new OracleUnavailableError(
        "unconfigured",
        `Could not load prompt template from ${promptPath}: ${errorMessage(error)}`
      );
    }
  }
  return cachedPrompt;
}

// ---------------------------------------------------------------------------
// Default model creation
// ---------------------------------------------------------------------------

/** Haiku: extraction is short, structured, and on the request's critical path */
export const DEFAULT_ORACLE_MODEL = "claude-haiku-4-5-20251001";

export function createAnthropicIntentModel(
  modelName: string = DEFAULT_ORACLE_MODEL
): StructuredIntentModel {
  const llm = new ChatAnthropic({
    model: modelName,
    maxTokens: 512,
    temperature: 0,
  });
  return llm.withStructuredOutput(OracleInferenceSchema);
}

// ---------------------------------------------------------------------------
// Oracle
// ---------------------------------------------------------------------------

/**
 * Wraps a structured model as an IntentOracle.
 *
 * Every failure mode comes out as OracleUnavailableError:
 * - the invocation throws or is aborted → "failed"
 * - the answer does not match the schema → "malformed"
 */
export function createModelOracle(model: StructuredIntentModel): IntentOracle {
  return {
    async infer(text: string, signal: AbortSignal): Promise<OracleInference> {
      const messages: Array<[string, string]> = [
        ["system", getPromptTemplate()],
        ["human", text],
      ];

      let answer: unknown;
      try {
        answer = await model.invoke(messages, { signal });
      } catch (error) {
        throw new OracleUnavailableError("failed", errorMessage(error));
      }

      const parsed = OracleInferenceSchema.safeParse(answer);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ");
        throw new OracleUnavailableError("malformed", `Malformed oracle answer: ${issues}`);
      }
      return parsed.data;
    },
  };
}
