/**
 * kinds.ts - Per-kind field-support metadata
 *
 * Each supported Kubernetes kind is one row of data: how kubectl names it,
 * whether it lives in a namespace, which status values it can report, and
 * which words users type to mean it. The normalizer, filter builder, and
 * cluster client all read this table instead of switching on kind.
 */

import type { ResourceKind, ResourceStatus } from "./types";

export interface KindSupport {
  kind: ResourceKind;
  /** Plural resource name passed to kubectl get (e.g., "pods") */
  plural: string;
  /** Whether objects of this kind live in a namespace */
  namespaced: boolean;
  /** Status values toResourceRecord can produce for this kind */
  statuses: readonly ResourceStatus[];
  /** Lowercase words and phrases that mean this kind */
  synonyms: readonly string[];
}

const WORKLOAD_STATUSES: readonly ResourceStatus[] = ["Available", "Unavailable"];

export const KIND_TABLE: Readonly<Record<ResourceKind, KindSupport>> = {
  Pod: {
    kind: "Pod",
    plural: "pods",
    namespaced: true,
    statuses: ["Running", "Pending", "Succeeded", "Failed", "Unknown"],
    synonyms: ["pod", "pods", "po"],
  },
  Deployment: {
    kind: "Deployment",
    plural: "deployments",
    namespaced: true,
    statuses: WORKLOAD_STATUSES,
    synonyms: ["deployment", "deployments", "deploy", "deploys"],
  },
  Service: {
    kind: "Service",
    plural: "services",
    namespaced: true,
    statuses: [],
    synonyms: ["service", "services", "svc", "svcs"],
  },
  Node: {
    kind: "Node",
    plural: "nodes",
    namespaced: false,
    statuses: ["Ready", "NotReady"],
    synonyms: ["node", "nodes"],
  },
  Namespace: {
    kind: "Namespace",
    plural: "namespaces",
    namespaced: false,
    statuses: ["Active", "Terminating"],
    synonyms: ["namespaces", "ns"],
  },
  ConfigMap: {
    kind: "ConfigMap",
    plural: "configmaps",
    namespaced: true,
    statuses: [],
    synonyms: ["configmap", "configmaps", "cm", "config map", "config maps"],
  },
  Secret: {
    kind: "Secret",
    plural: "secrets",
    namespaced: true,
    statuses: [],
    synonyms: ["secret", "secrets"],
  },
  StatefulSet: {
    kind: "StatefulSet",
    plural: "statefulsets",
    namespaced: true,
    statuses: WORKLOAD_STATUSES,
    synonyms: ["statefulset", "statefulsets", "sts", "stateful set", "stateful sets"],
  },
  DaemonSet: {
    kind: "DaemonSet",
    plural: "daemonsets",
    namespaced: true,
    statuses: WORKLOAD_STATUSES,
    synonyms: ["daemonset", "daemonsets", "ds", "daemon set", "daemon sets"],
  },
  ReplicaSet: {
    kind: "ReplicaSet",
    plural: "replicasets",
    namespaced: true,
    statuses: WORKLOAD_STATUSES,
    synonyms: ["replicaset", "replicasets", "rs", "replica set", "replica sets"],
  },
  Job: {
    kind: "Job",
    plural: "jobs",
    namespaced: true,
    statuses: ["Running", "Complete", "Failed"],
    synonyms: ["job", "jobs"],
  },
  CronJob: {
    kind: "CronJob",
    plural: "cronjobs",
    namespaced: true,
    statuses: [],
    synonyms: ["cronjob", "cronjobs", "cj", "cron job", "cron jobs"],
  },
  Ingress: {
    kind: "Ingress",
    plural: "ingresses",
    namespaced: true,
    statuses: [],
    synonyms: ["ingress", "ingresses", "ing"],
  },
  PersistentVolumeClaim: {
    kind: "PersistentVolumeClaim",
    plural: "persistentvolumeclaims",
    namespaced: true,
    statuses: ["Pending", "Bound", "Lost"],
    synonyms: [
      "persistentvolumeclaim",
      "persistentvolumeclaims",
      "pvc",
      "pvcs",
      "persistent volume claim",
      "persistent volume claims",
      "volume claim",
      "volume claims",
    ],
  },
};

export function getKindSupport(kind: ResourceKind): KindSupport {
  return KIND_TABLE[kind];
}

/**
 * Every synonym mapped to its kind, longest phrase first so that
 * "config maps" wins over a hypothetical shorter match inside it.
 */
export const SYNONYM_INDEX: ReadonlyArray<[string, ResourceKind]> = Object.values(
  KIND_TABLE
)
  .flatMap((support) =>
    support.synonyms.map((synonym): [string, ResourceKind] => [synonym, support.kind])
  )
  .sort((a, b) => b[0].length - a[0].length);
