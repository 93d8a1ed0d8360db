/**
 * health-check core - Schema, description and handler for the reachability check
 */

import { z } from "zod";
import type { QueryService } from "../../service";
import type { HealthResponse } from "../../response/formatter";

export const healthCheckSchema = z.object({});

export type HealthCheckInput = z.infer<typeof healthCheckSchema>;

export const healthCheckDescription = `Check that every configured Kubernetes cluster answers.

Each cluster's API server is asked for /readyz under the usual per-cluster
deadline. Nothing is listed or changed.

Returns an overall status (healthy, degraded, or unhealthy), whether the
language model is configured, and each cluster's reachability, latency, and
failure reason.`;

export function healthCheck(
  service: QueryService,
  _input: HealthCheckInput,
  signal?: AbortSignal
): Promise<HealthResponse> {
  return service.checkHealth(signal);
}
