/**
 * cluster-client.ts - Read-only access to one cluster's resources
 *
 * The engine talks to clusters only through the ClusterClient interface.
 * The default implementation shells out to kubectl with the cluster's
 * kubeconfig and context, the same way an operator would by hand:
 *
 *   kubectl --kubeconfig <path> [--context <ctx>] get <plural> [-A] -o json
 *
 * Every call is read-only: get, describe, logs, and the API server's
 * readiness endpoint.
 *
 * Every failure becomes a ClusterFetchError whose kind says whether the
 * cluster refused us (AuthError), did not answer in time (Timeout), or could
 * not be reached at all (ClusterUnreachable).
 */

import { executeKubectl as defaultKubectl, type KubectlExecutor } from "../utils/kubectl";
import { CredentialStore, type KubeAccess } from "../clusters/credentials";
import { ClusterFetchError, errorMessage, type ClusterErrorKind } from "../errors";
import { getKindSupport } from "../query/kinds";
import type { ResourceKind } from "../query/types";
import { parseEventList, parseObjectList, type KubeObject } from "./normalize";
import type { ClusterContext, ResourceEvent } from "./types";

export interface ClusterClient {
  /** Every object of the kind, across all namespaces */
  list(kind: ResourceKind, context: ClusterContext, signal: AbortSignal): Promise<KubeObject[]>;
  /** Human-readable `kubectl describe` output for one object */
  describe(
    kind: ResourceKind,
    name: string,
    namespace: string | null,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<string>;
  /** The last tailLines lines of every container in one pod */
  logs(
    pod: string,
    namespace: string,
    tailLines: number,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<string>;
  /** Events about one object, newest first */
  events(
    name: string,
    namespace: string,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<ResourceEvent[]>;
  /** Resolves once the API server answers its readiness endpoint */
  ping(context: ClusterContext, signal: AbortSignal): Promise<void>;
}

export interface KubectlClusterClientOptions {
  kubectl?: KubectlExecutor;
  credentials?: CredentialStore;
  /** Upper bound for one kubectl subprocess (the engine's own deadline is usually shorter) */
  timeoutMs?: number;
}

/** stderr fragments that mean the cluster answered but refused us */
const AUTH_FAILURE_PATTERN =
  /unauthorized|forbidden|authentication required|you must be logged in|x509|certificate|token has expired|invalid bearer token|exec plugin|getting credentials/i;

/**
 * Classifies a failed kubectl run.
 * Exported for unit testing.
 */
export function classifyKubectlFailure(stderr: string, timedOut: boolean): ClusterErrorKind {
  if (timedOut) return "Timeout";
  if (AUTH_FAILURE_PATTERN.test(stderr)) return "AuthError";
  if (/i\/o timeout|context deadline exceeded|timed out/i.test(stderr)) return "Timeout";
  return "ClusterUnreachable";
}

/** --kubeconfig and --context flags that point kubectl at one cluster */
export function clusterArgs(access: KubeAccess): string[] {
  const args = ["--kubeconfig", access.kubeconfigPath];
  if (access.context) {
    args.push("--context", access.context);
  }
  return args;
}

export class KubectlClusterClient implements ClusterClient {
  private readonly kubectl: KubectlExecutor;
  private readonly credentials: CredentialStore;
  private readonly timeoutMs: number | undefined;

  constructor(options?: KubectlClusterClientOptions) {
    this.kubectl = options?.kubectl ?? defaultKubectl;
    this.credentials = options?.credentials ?? new CredentialStore();
    this.timeoutMs = options?.timeoutMs;
  }

  async list(kind: ResourceKind, context: ClusterContext, signal: AbortSignal): Promise<KubeObject[]> {
    const support = getKindSupport(kind);
    const args = [...(await this.access(context)), "get", support.plural];
    if (support.namespaced) {
      args.push("-A");
    }
    args.push("-o", "json");

    const output = await this.run(args, context, signal);
    try {
      return parseObjectList(output, kind);
    } catch (error) {
      throw new ClusterFetchError("ClusterUnreachable", context.clusterId, errorMessage(error));
    }
  }

  async describe(
    kind: ResourceKind,
    name: string,
    namespace: string | null,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<string> {
    const support = getKindSupport(kind);
    const args = [...(await this.access(context)), "describe", support.plural, name];
    if (support.namespaced && namespace) {
      args.push("-n", namespace);
    }
    return this.run(args, context, signal);
  }

  async logs(
    pod: string,
    namespace: string,
    tailLines: number,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<string> {
    const args = [
      ...(await this.access(context)),
      "logs",
      pod,
      "-n",
      namespace,
      `--tail=${tailLines}`,
      "--all-containers=true",
      "--prefix=true",
    ];
    return this.run(args, context, signal);
  }

  async events(
    name: string,
    namespace: string,
    context: ClusterContext,
    signal: AbortSignal
  ): Promise<ResourceEvent[]> {
    const args = [
      ...(await this.access(context)),
      "get",
      "events",
      "-n",
      namespace,
      "--field-selector",
      `involvedObject.name=${name}`,
      "-o",
      "json",
    ];
    const output = await this.run(args, context, signal);
    try {
      return parseEventList(output);
    } catch (error) {
      throw new ClusterFetchError("ClusterUnreachable", context.clusterId, errorMessage(error));
    }
  }

  async ping(context: ClusterContext, signal: AbortSignal): Promise<void> {
    await this.run([...(await this.access(context)), "get", "--raw", "/readyz"], context, signal);
  }

  private async access(context: ClusterContext): Promise<string[]> {
    try {
      return clusterArgs(await this.credentials.materialize(context.credentialRef));
    } catch (error) {
      throw new ClusterFetchError(
        "AuthError",
        context.clusterId,
        `Could not load credentials: ${errorMessage(error)}`
      );
    }
  }

  private async run(args: string[], context: ClusterContext, signal: AbortSignal): Promise<string> {
    const result = await this.kubectl(args, { timeoutMs: this.timeoutMs, signal });
    if (result.isError) {
      throw new ClusterFetchError(
        classifyKubectlFailure(result.stderr, result.timedOut),
        context.clusterId,
        result.timedOut ? "kubectl timed out" : result.stderr.trim() || result.output
      );
    }
    return result.output;
  }
}
