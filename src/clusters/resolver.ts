/**
 * resolver.ts - Cluster Resolver: a cluster hint → the clusters to query
 *
 * Pure lookup against the registry. It never contacts a cluster; whether a
 * cluster is reachable is the engine's business.
 */

import { UnknownClusterError } from "../errors";
import type { ClusterContext } from "../engine/types";
import type { ClusterEntry, ClusterRegistry } from "./registry";

/** Reserved hint meaning every configured cluster */
export const ALL_CLUSTERS = "all";

function toContext(entry: ClusterEntry): ClusterContext {
  return { clusterId: entry.id, credentialRef: entry.credentialRef, reachable: null };
}

function isAll(hint: string): boolean {
  return hint.toLowerCase() === ALL_CLUSTERS;
}

export class ClusterResolver {
  constructor(private readonly registry: ClusterRegistry) {}

  /**
   * Clusters for a filter query.
   * - no hint or "all": every configured cluster, in registry order
   * - anything else: exactly the named cluster
   *
   * @throws UnknownClusterError if the hint matches nothing, or nothing is configured
   */
  resolve(hint?: string | null): ClusterContext[] {
    const trimmed = hint?.trim() ?? "";
    const entries = this.registry.list();

    if (!trimmed || isAll(trimmed)) {
      if (entries.length === 0) {
        throw new UnknownClusterError(
          "No clusters are configured. Set CLUSTERS_FILE, KUBECONFIG_PATH, or S3_BUCKET_NAME and S3_KUBECONFIG_KEY.",
          trimmed || null
        );
      }
      return entries.map(toContext);
    }

    return [toContext(this.findOrThrow(trimmed))];
  }

  /** Every configured cluster, in registry order; empty when none are */
  all(): ClusterContext[] {
    return this.registry.list().map(toContext);
  }

  /**
   * Exactly one cluster, for the agent path. Without a hint the single
   * configured cluster is used; with several configured, one must be named.
   *
   * @throws UnknownClusterError when no single cluster can be chosen
   */
  resolveOne(hint?: string | null): ClusterContext {
    const trimmed = hint?.trim() ?? "";
    const entries = this.registry.list();

    if (trimmed && !isAll(trimmed)) {
      return toContext(this.findOrThrow(trimmed));
    }
    if (entries.length === 1) {
      return toContext(entries[0]);
    }
    if (entries.length === 0) {
      throw new UnknownClusterError("No clusters are configured.", trimmed || null);
    }
    throw new UnknownClusterError(
      `Agent queries run against one cluster; choose one of: ${entries.map((entry) => entry.id).join(", ")}`,
      trimmed || null
    );
  }

  private findOrThrow(hint: string): ClusterEntry {
    const entry = this.registry.find(hint);
    if (!entry) {
      const known = this.registry.list().map((candidate) => candidate.id);
      const suffix = known.length > 0 ? ` Known clusters: ${known.join(", ")}` : "";
      throw new UnknownClusterError(`Unknown cluster "${hint}".${suffix}`, hint);
    }
    return entry;
  }
}
