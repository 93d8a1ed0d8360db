/**
 * types.ts - Shared data types for fetching and filtering cluster resources
 *
 * ClusterContext comes from the Cluster Resolver, ResourceRecord is the
 * engine's uniform view of one Kubernetes object, and AggregatedResult is
 * what all per-cluster tasks add up to once they have settled.
 */

import type { CredentialRef } from "../clusters/registry";
import type { ClusterErrorKind } from "../errors";
import type { ResourceKind } from "../query/types";

/**
 * One cluster selected for a request.
 * reachable is null until the engine has tried it.
 */
export interface ClusterContext {
  readonly clusterId: string;
  readonly credentialRef: CredentialRef;
  readonly reachable: boolean | null;
}

/** The fields of a Kubernetes object that filters can look at */
export interface ResourceRecord {
  clusterId: string;
  kind: ResourceKind;
  name: string;
  /** null for cluster-scoped kinds */
  namespace: string | null;
  /** metadata.creationTimestamp; null when absent or unparseable */
  createdAt: Date | null;
  labels: Record<string, string>;
  /** Kind-specific status (see toResourceRecord); null when the kind has none */
  status: string | null;
}

/** One Kubernetes event about an object, as the diagnose action reports it */
export interface ResourceEvent {
  /** Normal or Warning */
  type: string;
  reason: string;
  message: string;
  /** How many times the event has repeated */
  count: number;
  /** lastTimestamp, else eventTime, else creation time; null when none parse */
  at: Date | null;
}

/** Why one cluster contributed nothing */
export interface ClusterFailure {
  kind: ClusterErrorKind;
  reason: string;
}

export interface AggregatedResult {
  /** Ordered by clusterId, then newest first, then name */
  matched: ResourceRecord[];
  perClusterErrors: Record<string, ClusterFailure>;
  /** Records fetched from reachable clusters before filtering */
  totalConsidered: number;
  /** The input contexts with reachable filled in */
  clusters: ClusterContext[];
}
