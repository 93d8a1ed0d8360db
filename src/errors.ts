/**
 * errors.ts - Error taxonomy for query handling
 *
 * Two families:
 * - Request-level errors (InvalidFilter, UnknownCluster) stop the request and
 *   become a top-level error response with no partial data.
 * - Per-cluster errors (ClusterUnreachable, Timeout, AuthError) are recorded
 *   against one cluster while the others carry on.
 *
 * OracleUnavailableError never reaches a response: the Intent Extractor
 * catches it and falls back to deterministic parsing, leaving a warning.
 */

export type RequestErrorKind = "InvalidFilter" | "UnknownCluster";

export type ClusterErrorKind = "ClusterUnreachable" | "Timeout" | "AuthError";

/** Base class for errors that abort the whole request. */
export abstract class RequestError extends Error {
  abstract readonly kind: RequestErrorKind;
}

/** The query could not be turned into an executable filter. */
export class InvalidFilterError extends RequestError {
  readonly kind = "InvalidFilter";

  constructor(message: string) {
    super(message);
    this.name = "InvalidFilterError";
  }
}

/** The cluster hint names no configured cluster, or none are configured. */
export class UnknownClusterError extends RequestError {
  readonly kind = "UnknownCluster";

  constructor(
    message: string,
    readonly clusterHint: string | null
  ) {
    super(message);
    this.name = "UnknownClusterError";
  }
}

/** A fetch against one cluster failed. */
export class ClusterFetchError extends Error {
  constructor(
    readonly kind: ClusterErrorKind,
    readonly clusterId: string,
    message: string
  ) {
    super(message);
    this.name = "ClusterFetchError";
  }
}

export type OracleFailureReason = "unconfigured" | "timeout" | "failed" | "malformed";

/** The NL oracle could not produce a usable answer. */
export class OracleUnavailableError extends Error {
  constructor(
    readonly reason: OracleFailureReason,
    message: string
  ) {
    super(message);
    this.name = "OracleUnavailableError";
  }
}

/** Shared helper for turning unknown thrown values into messages. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
