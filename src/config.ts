/**
 * config.ts - Environment configuration, validated once at startup
 *
 * Every setting comes from an environment variable. Blank values count as
 * unset, so `KUBECONFIG_PATH=` in a .env file does not select an empty path.
 *
 * | Variable              | Setting            | Default                    |
 * |-----------------------|--------------------|----------------------------|
 * | CLUSTERS_FILE         | clustersFile       | -                          |
 * | KUBECONFIG_PATH       | kubeconfigPath     | -                          |
 * | S3_BUCKET_NAME        | s3Bucket           | -                          |
 * | S3_KUBECONFIG_KEY     | s3KubeconfigKey    | -                          |
 * | AWS_REGION            | awsRegion          | -                          |
 * | CLUSTER_TIMEOUT_MS    | clusterTimeoutMs   | 15000                      |
 * | ORACLE_TIMEOUT_MS     | oracleTimeoutMs    | 8000                       |
 * | CREDENTIAL_CACHE_TTL_MS | credentialCacheTtlMs | 300000                   |
 * | ORACLE_MODEL          | oracleModel        | claude-haiku-4-5-20251001  |
 * | ANSWER_MODEL          | answerModel        | claude-sonnet-4-20250514   |
 * | ANTHROPIC_API_KEY     | anthropicApiKey    | - (LLM steps disabled)     |
 */

import { z } from "zod";
import { homedir } from "os";
import { resolve } from "path";
import { DEFAULT_ANSWER_MODEL } from "./agent/answerer";
import { DEFAULT_CREDENTIAL_CACHE_TTL_MS } from "./clusters/credentials";
import { DEFAULT_CLUSTER_TIMEOUT_MS } from "./engine/executor";
import { DEFAULT_ORACLE_TIMEOUT_MS } from "./query/extractor";
import { DEFAULT_ORACLE_MODEL } from "./query/oracle";

const ENV_NAMES = {
  clustersFile: "CLUSTERS_FILE",
  kubeconfigPath: "KUBECONFIG_PATH",
  s3Bucket: "S3_BUCKET_NAME",
  s3KubeconfigKey: "S3_KUBECONFIG_KEY",
  awsRegion: "AWS_REGION",
  clusterTimeoutMs: "CLUSTER_TIMEOUT_MS",
  oracleTimeoutMs: "ORACLE_TIMEOUT_MS",
  credentialCacheTtlMs: "CREDENTIAL_CACHE_TTL_MS",
  oracleModel: "ORACLE_MODEL",
  answerModel: "ANSWER_MODEL",
  anthropicApiKey: "ANTHROPIC_API_KEY",
} as const;

type SettingName = keyof typeof ENV_NAMES;

export const ConfigSchema = z
  .object({
    clustersFile: z.string().optional(),
    kubeconfigPath: z.string().optional(),
    s3Bucket: z.string().optional(),
    s3KubeconfigKey: z.string().optional(),
    awsRegion: z.string().optional(),
    clusterTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_CLUSTER_TIMEOUT_MS),
    oracleTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_ORACLE_TIMEOUT_MS),
    credentialCacheTtlMs: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_CREDENTIAL_CACHE_TTL_MS),
    oracleModel: z.string().default(DEFAULT_ORACLE_MODEL),
    answerModel: z.string().default(DEFAULT_ANSWER_MODEL),
    anthropicApiKey: z.string().optional(),
  })
  .refine((config) => Boolean(config.s3Bucket) === Boolean(config.s3KubeconfigKey), {
    message: "S3_BUCKET_NAME and S3_KUBECONFIG_KEY must be set together",
    path: ["s3KubeconfigKey"],
  });

export type Config = z.infer<typeof ConfigSchema>;

function expandPath(value: string): string {
  if (value === "~" || value.startsWith("~/")) {
    return resolve(homedir(), value.slice(2));
  }
  return resolve(value);
}

function isSettingName(key: string | number | undefined): key is SettingName {
  return typeof key === "string" && Object.hasOwn(ENV_NAMES, key);
}

/**
 * Reads and validates configuration.
 *
 * @param env - defaults to process.env; tests pass their own
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [setting, envName] of Object.entries(ENV_NAMES)) {
    const value = env[envName]?.trim();
    if (value) raw[setting] = value;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => {
        const key = issue.path[0];
        const name = isSettingName(key) ? ENV_NAMES[key] : issue.path.join(".");
        return `  - ${name}: ${issue.message}`;
      })
      .join("\n");
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  const config = result.data;
  return {
    ...config,
    clustersFile: config.clustersFile && expandPath(config.clustersFile),
    kubeconfigPath: config.kubeconfigPath && expandPath(config.kubeconfigPath),
  };
}

/** The oracle and the answer composer both need an Anthropic key */
export function isLlmEnabled(config: Config): boolean {
  return Boolean(config.anthropicApiKey);
}
