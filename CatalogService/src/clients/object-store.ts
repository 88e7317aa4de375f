import { Storage, type Bucket, type StorageOptions } from "@google-cloud/storage";
import pino, { type Logger } from "pino";
import type { Env } from "../config";
import { decodeServiceAccountKey } from "../utils/gcp-credentials";

export interface ObjectListPage {
  names: string[];
  nextPageToken?: string;
}

export interface ListObjectsOptions {
  pageToken?: string;
  pageSize: number;
  signal?: AbortSignal;
}

/**
 * Minimal remote blob store surface the deletion path needs. Implementations
 * make one network round trip per call and do no retrying of their own.
 *
 * Signals are advisory: an adapter must not start a call once its signal has
 * aborted, but a request already sent may run to completion. The storage
 * gateway stops waiting on an aborted attempt either way.
 */
export interface ObjectStore {
  readonly kind: string;
  /** Deleting an object that does not exist succeeds. */
  deleteObject(path: string, signal?: AbortSignal): Promise<void>;
  objectExists(path: string, signal?: AbortSignal): Promise<boolean>;
  listObjects(prefix: string, options: ListObjectsOptions): Promise<ObjectListPage>;
}

export function createStorageOptions(config: Env): StorageOptions {
  // The storage gateway owns retries; the client must not add its own.
  const options: StorageOptions = { retryOptions: { autoRetry: false } };
  if (config.GCP_PROJECT_ID) {
    options.projectId = config.GCP_PROJECT_ID;
  }
  if (config.GCP_SERVICE_ACCOUNT_KEY) {
    options.credentials = decodeServiceAccountKey(config.GCP_SERVICE_ACCOUNT_KEY);
  }
  return options;
}

function readPageToken(query: unknown): string | undefined {
  if (
    typeof query === "object" &&
    query !== null &&
    "pageToken" in query &&
    typeof query.pageToken === "string"
  ) {
    return query.pageToken;
  }
  return undefined;
}

export class GcsObjectStore implements ObjectStore {
  readonly kind = "gcs";
  private readonly logger: Logger;

  constructor(
    private readonly bucket: Bucket,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "gcs-object-store", bucket: bucket.name });
  }

  async deleteObject(path: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await this.bucket.file(path).delete({ ignoreNotFound: true });
    this.logger.debug({ path }, "Deleted object");
  }

  async objectExists(path: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const [exists] = await this.bucket.file(path).exists();
    return exists;
  }

  async listObjects(
    prefix: string,
    options: ListObjectsOptions
  ): Promise<ObjectListPage> {
    options.signal?.throwIfAborted();
    const [files, nextQuery] = await this.bucket.getFiles({
      prefix,
      maxResults: options.pageSize,
      pageToken: options.pageToken,
      autoPaginate: false,
    });
    return {
      names: files.map((file) => file.name),
      nextPageToken: readPageToken(nextQuery),
    };
  }
}

/**
 * Process-local object store for development and tests. Listing is
 * lexicographic and a page token is the last name of the previous page, so
 * deleting while paging does not skip entries.
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly kind = "memory";
  private readonly objects = new Set<string>();

  constructor(paths: Iterable<string> = []) {
    for (const path of paths) {
      this.objects.add(path);
    }
  }

  put(path: string) {
    this.objects.add(path);
  }

  has(path: string) {
    return this.objects.has(path);
  }

  paths(): string[] {
    return [...this.objects].sort();
  }

  async deleteObject(path: string): Promise<void> {
    this.objects.delete(path);
  }

  async objectExists(path: string): Promise<boolean> {
    return this.objects.has(path);
  }

  async listObjects(
    prefix: string,
    options: ListObjectsOptions
  ): Promise<ObjectListPage> {
    const after = options.pageToken;
    const matching = this.paths().filter(
      (path) => path.startsWith(prefix) && (after === undefined || path > after)
    );
    const names = matching.slice(0, options.pageSize);
    return {
      names,
      nextPageToken:
        matching.length > names.length ? names[names.length - 1] : undefined,
    };
  }
}

export type ObjectStoreSelection =
  | { store: ObjectStore }
  | { store: null; reason: string };

/**
 * Builds the configured object store. `none`, or a client that cannot be
 * initialised while catalog-only deletion is allowed, yields no store and a
 * reason that callers log.
 */
export function createObjectStore(
  config: Env,
  logger?: Logger
): ObjectStoreSelection {
  const scopedLogger = logger ?? pino({ name: "object-store" });

  if (config.STORAGE_BACKEND === "none") {
    return { store: null, reason: "STORAGE_BACKEND is none" };
  }
  if (config.STORAGE_BACKEND === "memory") {
    scopedLogger.warn(
      "Using the in-process object store; deletions never reach a real bucket"
    );
    return { store: new InMemoryObjectStore() };
  }

  try {
    if (!config.STORAGE_BUCKET) {
      throw new Error("STORAGE_BUCKET is required for gcs backend");
    }
    const storage = new Storage(createStorageOptions(config));
    return {
      store: new GcsObjectStore(storage.bucket(config.STORAGE_BUCKET), scopedLogger),
    };
  } catch (error) {
    if (!config.ALLOW_CATALOG_ONLY_DELETION) {
      throw error;
    }
    scopedLogger.warn(
      { err: error },
      "Object store unavailable; deletions will remove catalog rows only"
    );
    return {
      store: null,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}
