/**
 * normalize.ts - Raw Kubernetes objects → ResourceRecord
 *
 * kubectl returns a List object whose items carry metadata, spec, and status
 * in kind-specific shapes. Filters only need a handful of fields, so each
 * object is flattened into a ResourceRecord here and nothing downstream
 * looks at raw JSON again.
 *
 * Status is derived per kind:
 * | Kind                                | Status                                          |
 * |-------------------------------------|-------------------------------------------------|
 * | Pod, Namespace, PersistentVolumeClaim | status.phase                                  |
 * | Node                                | Ready condition True → Ready, else NotReady     |
 * | Deployment                          | availableReplicas >= replicas → Available       |
 * | StatefulSet, ReplicaSet             | readyReplicas >= replicas → Available           |
 * | DaemonSet                           | numberReady >= desiredNumberScheduled           |
 * | Job                                 | Complete / Failed condition, else Running       |
 * | everything else                     | null                                            |
 */

import { z } from "zod";
import type { ResourceKind } from "../query/types";
import type { ResourceEvent, ResourceRecord } from "./types";

// ---------------------------------------------------------------------------
// Raw object schema
// ---------------------------------------------------------------------------

/**
 * The parts of a Kubernetes object this module reads. Everything else is
 * kept (passthrough) but never interpreted.
 */
export const KubeObjectSchema = z
  .object({
    metadata: z
      .object({
        name: z.string().optional(),
        namespace: z.string().optional(),
        labels: z.record(z.string()).nullish(),
        creationTimestamp: z.string().nullish(),
      })
      .passthrough()
      .optional(),
    spec: z.record(z.unknown()).optional(),
    status: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type KubeObject = z.infer<typeof KubeObjectSchema>;

const KubeListSchema = z.object({
  items: z.array(KubeObjectSchema).nullish(),
});

/**
 * Parses the JSON output of `kubectl get <plural> -o json` into raw objects.
 *
 * @throws Error if the output is not JSON or not a List
 */
export function parseObjectList(json: string, kind: ResourceKind): KubeObject[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(
      `Failed to parse ${kind} list: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = KubeListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected ${kind} list shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data.items ?? [];
}

// ---------------------------------------------------------------------------
// Status derivation
// ---------------------------------------------------------------------------

function numberAt(record: Record<string, unknown> | undefined, key: string): number | null {
  const value = record?.[key];
  return typeof value === "number" ? value : null;
}

function stringAt(record: Record<string, unknown> | undefined, key: string): string | null {
  const value = record?.[key];
  return typeof value === "string" && value ? value : null;
}

/** True when status.conditions has {type, status: "True"} */
function hasTrueCondition(object: KubeObject, type: string): boolean {
  const conditions = object.status?.conditions;
  if (!Array.isArray(conditions)) return false;
  return conditions.some((condition: unknown) => {
    if (typeof condition !== "object" || condition === null) return false;
    return (
      "type" in condition &&
      condition.type === type &&
      "status" in condition &&
      condition.status === "True"
    );
  });
}

function replicaStatus(ready: number | null, desired: number | null): string {
  return (ready ?? 0) >= (desired ?? 1) ? "Available" : "Unavailable";
}

type StatusReader = (object: KubeObject) => string | null;

const phase: StatusReader = (object) => stringAt(object.status, "phase");

const STATUS_READERS: Partial<Record<ResourceKind, StatusReader>> = {
  Pod: phase,
  Namespace: phase,
  PersistentVolumeClaim: phase,
  Node: (object) => (hasTrueCondition(object, "Ready") ? "Ready" : "NotReady"),
  Deployment: (object) =>
    replicaStatus(numberAt(object.status, "availableReplicas"), numberAt(object.spec, "replicas")),
  StatefulSet: (object) =>
    replicaStatus(numberAt(object.status, "readyReplicas"), numberAt(object.spec, "replicas")),
  ReplicaSet: (object) =>
    replicaStatus(numberAt(object.status, "readyReplicas"), numberAt(object.spec, "replicas")),
  DaemonSet: (object) =>
    replicaStatus(
      numberAt(object.status, "numberReady"),
      numberAt(object.status, "desiredNumberScheduled") ?? 0
    ),
  Job: (object) => {
    if (hasTrueCondition(object, "Complete")) return "Complete";
    if (hasTrueCondition(object, "Failed")) return "Failed";
    return "Running";
  },
};

// ---------------------------------------------------------------------------
// Record conversion
// ---------------------------------------------------------------------------

function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Flattens one raw object into a ResourceRecord.
 *
 * The kind is passed in rather than read from the item because list items
 * do not always carry their own kind.
 *
 * @param namespaced - cluster-scoped kinds always get a null namespace
 */
export function toResourceRecord(
  object: KubeObject,
  kind: ResourceKind,
  clusterId: string,
  namespaced: boolean
): ResourceRecord {
  const metadata = object.metadata;
  const reader = STATUS_READERS[kind];

  return {
    clusterId,
    kind,
    name: metadata?.name ?? "",
    namespace: namespaced ? (metadata?.namespace ?? "default") : null,
    createdAt: parseTimestamp(metadata?.creationTimestamp),
    labels: { ...(metadata?.labels ?? {}) },
    status: reader ? reader(object) : null,
  };
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

const EventSchema = z
  .object({
    type: z.string().nullish(),
    reason: z.string().nullish(),
    message: z.string().nullish(),
    count: z.number().nullish(),
    lastTimestamp: z.string().nullish(),
    eventTime: z.string().nullish(),
    metadata: z.object({ creationTimestamp: z.string().nullish() }).passthrough().optional(),
  })
  .passthrough();

const EventListSchema = z.object({
  items: z.array(EventSchema).nullish(),
});

/**
 * Parses `kubectl get events -o json` into ResourceEvents, newest first.
 * Events without a timestamp sort last.
 *
 * @throws Error if the output is not JSON or not a List
 */
export function parseEventList(json: string): ResourceEvent[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(
      `Failed to parse event list: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = EventListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected event list shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const events = (parsed.data.items ?? []).map(
    (item): ResourceEvent => ({
      type: item.type ?? "Normal",
      reason: item.reason ?? "",
      message: (item.message ?? "").trim(),
      count: item.count ?? 1,
      at: parseTimestamp(item.lastTimestamp ?? item.eventTime ?? item.metadata?.creationTimestamp),
    })
  );
  return events.sort((a, b) => {
    if (a.at && b.at) return b.at.getTime() - a.at.getTime();
    return a.at ? -1 : b.at ? 1 : 0;
  });
}
