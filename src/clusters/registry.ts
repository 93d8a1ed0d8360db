/**
 * registry.ts - The set of clusters this process may query
 *
 * Clusters come from the first source that yields any:
 * 1. A clusters file (CLUSTERS_FILE): a JSON list of named clusters, each with
 *    its own kubeconfig path or S3 object and optional context
 * 2. KUBECONFIG_PATH, if the file exists
 * 3. An S3 bucket/key pair holding a kubeconfig
 * 4. ~/.kube/config, if it exists
 *
 * Sources 2-4 yield a single cluster with id "default". If none applies the
 * registry is empty and every filter query fails with UnknownCluster.
 *
 * Registry order is file order, and it is the order "all" resolves to.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { errorMessage } from "../errors";

// ---------------------------------------------------------------------------
// Credential references
// ---------------------------------------------------------------------------

/**
 * Where a cluster's kubeconfig lives. Opaque to everything except the
 * CredentialStore; the engine only passes it along.
 */
export type CredentialRef =
  | { source: "local"; kubeconfigPath: string; context: string | null }
  | {
      source: "s3";
      bucket: string;
      key: string;
      region: string | null;
      context: string | null;
    };

export interface ClusterEntry {
  id: string;
  credentialRef: CredentialRef;
}

export const DEFAULT_CLUSTER_ID = "default";

// ---------------------------------------------------------------------------
// Clusters file schema
// ---------------------------------------------------------------------------

const ClusterFileEntrySchema = z
  .object({
    id: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9][\w.-]*$/, "must be letters, digits, '.', '_' or '-'")
      .refine((id) => id.toLowerCase() !== "all", "'all' is reserved"),
    kubeconfig: z.string().min(1).optional(),
    context: z.string().min(1).optional(),
    s3: z
      .object({
        bucket: z.string().min(1),
        key: z.string().min(1),
        region: z.string().min(1).optional(),
      })
      .optional(),
  })
  .refine((entry) => !(entry.kubeconfig && entry.s3), {
    message: "set either kubeconfig or s3, not both",
  });

export const ClustersFileSchema = z.object({
  clusters: z
    .array(ClusterFileEntrySchema)
    .refine(
      (entries) => new Set(entries.map((entry) => entry.id)).size === entries.length,
      "cluster ids must be unique"
    ),
});

export type ClustersFile = z.infer<typeof ClustersFileSchema>;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ClusterRegistry {
  private readonly entries: readonly ClusterEntry[];

  constructor(entries: ClusterEntry[]) {
    this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
  }

  /** Every configured cluster, in registry order */
  list(): readonly ClusterEntry[] {
    return this.entries;
  }

  /** Exact id match first, then case-insensitive */
  find(id: string): ClusterEntry | undefined {
    return (
      this.entries.find((entry) => entry.id === id) ??
      this.entries.find((entry) => entry.id.toLowerCase() === id.toLowerCase())
    );
  }
}

export interface RegistrySources {
  clustersFile?: string;
  kubeconfigPath?: string;
  s3Bucket?: string;
  s3KubeconfigKey?: string;
  awsRegion?: string;
}

/** Filesystem access, injectable for testing */
export interface RegistryFs {
  readFile(filePath: string): string;
  exists(filePath: string): boolean;
  homedir(): string;
}

const nodeFs: RegistryFs = {
  readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
  exists: (filePath) => fs.existsSync(filePath),
  homedir: () => os.homedir(),
};

function entriesFromFile(filePath: string, fsAccess: RegistryFs): ClusterEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fsAccess.readFile(filePath));
  } catch (error) {
    throw new Error(`Could not read clusters file ${filePath}: ${errorMessage(error)}`);
  }

  const parsed = ClustersFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid clusters file ${filePath}:\n${issues}`);
  }

  const defaultKubeconfig = path.join(fsAccess.homedir(), ".kube", "config");
  return parsed.data.clusters.map((entry): ClusterEntry => {
    const context = entry.context ?? null;
    if (entry.s3) {
      return {
        id: entry.id,
        credentialRef: {
          source: "s3",
          bucket: entry.s3.bucket,
          key: entry.s3.key,
          region: entry.s3.region ?? null,
          context,
        },
      };
    }
    return {
      id: entry.id,
      credentialRef: {
        source: "local",
        kubeconfigPath: entry.kubeconfig ?? defaultKubeconfig,
        context,
      },
    };
  });
}

/**
 * Builds the registry from configuration, trying each source in order.
 *
 * @throws Error if a clusters file is configured but missing or invalid;
 *   a broken explicit setting should stop startup, not silently fall through
 */
export function loadClusterRegistry(
  sources: RegistrySources,
  fsAccess: RegistryFs = nodeFs
): ClusterRegistry {
  if (sources.clustersFile) {
    return new ClusterRegistry(entriesFromFile(sources.clustersFile, fsAccess));
  }

  if (sources.kubeconfigPath && fsAccess.exists(sources.kubeconfigPath)) {
    return new ClusterRegistry([
      {
        id: DEFAULT_CLUSTER_ID,
        credentialRef: { source: "local", kubeconfigPath: sources.kubeconfigPath, context: null },
      },
    ]);
  }

  if (sources.s3Bucket && sources.s3KubeconfigKey) {
    return new ClusterRegistry([
      {
        id: DEFAULT_CLUSTER_ID,
        credentialRef: {
          source: "s3",
          bucket: sources.s3Bucket,
          key: sources.s3KubeconfigKey,
          region: sources.awsRegion ?? null,
          context: null,
        },
      },
    ]);
  }

  const defaultKubeconfig = path.join(fsAccess.homedir(), ".kube", "config");
  if (fsAccess.exists(defaultKubeconfig)) {
    return new ClusterRegistry([
      {
        id: DEFAULT_CLUSTER_ID,
        credentialRef: { source: "local", kubeconfigPath: defaultKubeconfig, context: null },
      },
    ]);
  }

  return new ClusterRegistry([]);
}
