/**
 * credentials.ts - Turns a CredentialRef into a kubeconfig kubectl can read
 *
 * Local references pass straight through. S3 references are downloaded into
 * a private temp file (mode 0600) and reused until the cache TTL runs out;
 * concurrent requests for the same object share one download. An expired
 * download is fetched again and its old file deleted, so a rotated
 * kubeconfig is picked up by a long-running MCP server.
 *
 * dispose() deletes every downloaded file (and the temp directory, when the
 * store created it). The CLI and the MCP server call it on the way out.
 *
 * The engine calls materialize() inside each cluster's task, so a slow or
 * failing download only affects that cluster.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { CredentialRef } from "./registry";

/** What kubectl needs to reach a cluster */
export interface KubeAccess {
  kubeconfigPath: string;
  context: string | null;
}

/** Reads one object as text; injectable so tests never reach AWS */
export interface ObjectFetcher {
  getObjectText(bucket: string, key: string, region: string | null): Promise<string>;
}

/**
 * Default fetcher backed by @aws-sdk/client-s3.
 * One S3Client per region; credentials come from the standard AWS chain.
 */
export function createS3ObjectFetcher(defaultRegion?: string): ObjectFetcher {
  const clients = new Map<string, S3Client>();

  function clientFor(region: string | null): S3Client {
    const resolved = region ?? defaultRegion ?? "";
    let client = clients.get(resolved);
    if (!client) {
      client = new S3Client(resolved ? { region: resolved } : {});
      clients.set(resolved, client);
    }
    return client;
  }

  return {
    async getObjectText(bucket, key, region) {
      const response = await clientFor(region).send(
        new GetObjectCommand({ Bucket: bucket, Key: key })
      );
      if (!response.Body) {
        throw new Error(`s3://${bucket}/${key} has no body`);
      }
      return response.Body.transformToString("utf-8");
    },
  };
}

/** How long a downloaded kubeconfig is reused before it is fetched again */
export const DEFAULT_CREDENTIAL_CACHE_TTL_MS = 5 * 60 * 1000;

export interface CredentialStoreOptions {
  fetcher?: ObjectFetcher;
  /** Directory for downloaded kubeconfigs (default: a fresh dir under os.tmpdir()) */
  tempDir?: string;
  cacheTtlMs?: number;
  now?: () => number;
}

interface CachedDownload {
  filePath: Promise<string>;
  fetchedAt: number;
}

export class CredentialStore {
  private readonly fetcher: ObjectFetcher;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private readonly downloads = new Map<string, CachedDownload>();
  private readonly written = new Set<string>();
  private tempDir: Promise<string> | null = null;
  private sequence = 0;

  constructor(private readonly options: CredentialStoreOptions = {}) {
    this.fetcher = options.fetcher ?? createS3ObjectFetcher();
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CREDENTIAL_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async materialize(ref: CredentialRef): Promise<KubeAccess> {
    if (ref.source === "local") {
      return { kubeconfigPath: ref.kubeconfigPath, context: ref.context };
    }

    const cacheKey = `${ref.region ?? ""}/${ref.bucket}/${ref.key}`;
    let cached = this.downloads.get(cacheKey);
    if (cached && this.now() - cached.fetchedAt >= this.cacheTtlMs) {
      this.downloads.delete(cacheKey);
      await this.removeFile(cached.filePath);
      cached = undefined;
    }
    if (!cached) {
      const entry: CachedDownload = {
        filePath: this.download(ref.bucket, ref.key, ref.region),
        fetchedAt: this.now(),
      };
      this.downloads.set(cacheKey, entry);
      // A failed download is retried by the next request, not cached
      void entry.filePath.catch(() => {
        if (this.downloads.get(cacheKey) === entry) this.downloads.delete(cacheKey);
      });
      cached = entry;
    }
    return { kubeconfigPath: await cached.filePath, context: ref.context };
  }

  /** Deletes every downloaded kubeconfig; the store can still be used afterwards */
  async dispose(): Promise<void> {
    const pending = [...this.downloads.values()];
    this.downloads.clear();
    await Promise.all(pending.map((entry) => this.removeFile(entry.filePath)));

    const dir = this.tempDir;
    this.tempDir = null;
    if (dir && !this.options.tempDir) {
      await fs.rm(await dir, { recursive: true, force: true });
    }
  }

  private async download(bucket: string, key: string, region: string | null): Promise<string> {
    const contents = await this.fetcher.getObjectText(bucket, key, region);
    const dir = await this.getTempDir();
    this.sequence += 1;
    const fileName = `${this.sequence}-${path.basename(key).replace(/[^\w.-]/g, "_")}`;
    const filePath = path.join(dir, fileName);
    await fs.writeFile(filePath, contents, { mode: 0o600 });
    this.written.add(filePath);
    return filePath;
  }

  /** Removes a download's file; a download that failed left nothing behind */
  private async removeFile(filePath: Promise<string>): Promise<void> {
    const resolved = await filePath.catch(() => null);
    if (resolved && this.written.delete(resolved)) {
      await fs.rm(resolved, { force: true });
    }
  }

  private getTempDir(): Promise<string> {
    if (!this.tempDir) {
      this.tempDir = this.options.tempDir
        ? Promise.resolve(this.options.tempDir)
        : fs.mkdtemp(path.join(os.tmpdir(), "cluster-query-"));
    }
    return this.tempDir;
  }
}
