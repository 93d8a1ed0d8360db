/**
 * config.test.ts - Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import * as os from "os";
import * as path from "path";
import { isLlmEnabled, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      clusterTimeoutMs: 15000,
      oracleTimeoutMs: 8000,
      credentialCacheTtlMs: 300000,
      oracleModel: "claude-haiku-4-5-20251001",
      answerModel: "claude-sonnet-4-20250514",
    });
  });

  it("reads numbers and strings from the environment", () => {
    const config = loadConfig({
      CLUSTER_TIMEOUT_MS: "5000",
      ORACLE_MODEL: "claude-test-model",
      AWS_REGION: "eu-west-1",
      CREDENTIAL_CACHE_TTL_MS: "60000",
    });

    expect(config.clusterTimeoutMs).toBe(5000);
    expect(config.credentialCacheTtlMs).toBe(60000);
    expect(config.oracleModel).toBe("claude-test-model");
    expect(config.awsRegion).toBe("eu-west-1");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ KUBECONFIG_PATH: "  ", ANTHROPIC_API_KEY: "", ORACLE_TIMEOUT_MS: "" });

    expect(config.kubeconfigPath).toBeUndefined();
    expect(config.oracleTimeoutMs).toBe(8000);
    expect(isLlmEnabled(config)).toBe(false);
  });

  it("names the variable that failed validation", () => {
    expect(() => loadConfig({ CLUSTER_TIMEOUT_MS: "-5" })).toThrow(
      "Invalid configuration:\n  - CLUSTER_TIMEOUT_MS: Number must be greater than 0"
    );
  });

  it("lists every invalid variable", () => {
    expect(() => loadConfig({ CLUSTER_TIMEOUT_MS: "soon", ORACLE_TIMEOUT_MS: "1.5" })).toThrow(
      /^Invalid configuration:\n {2}- CLUSTER_TIMEOUT_MS: .+\n {2}- ORACLE_TIMEOUT_MS: .+$/
    );
  });

  it("requires the S3 bucket and key together", () => {
    expect(() => loadConfig({ S3_BUCKET_NAME: "kubeconfigs" })).toThrow(
      "Invalid configuration:\n  - S3_KUBECONFIG_KEY: S3_BUCKET_NAME and S3_KUBECONFIG_KEY must be set together"
    );
  });

  it("expands ~ and resolves relative paths", () => {
    const config = loadConfig({
      CLUSTERS_FILE: "~/clusters.json",
      KUBECONFIG_PATH: "conf/kubeconfig",
    });

    expect(config.clustersFile).toBe(path.join(os.homedir(), "clusters.json"));
    expect(config.kubeconfigPath).toBe(path.resolve("conf/kubeconfig"));
  });
});

describe("isLlmEnabled", () => {
  it("is on with an Anthropic key", () => {
    expect(isLlmEnabled(loadConfig({ ANTHROPIC_API_KEY: "test-key" }))).toBe(true);
  });
});
