import pino, { type Logger } from "pino";
import {
  StorageGatewayError,
  type StorageGateway,
} from "../clients/storage-gateway";
import type { CatalogRepository } from "../repositories/catalog-repository";
import type { CatalogRecord } from "../types/catalog";
import { createDeadline } from "../utils/timeout";
import { buildDeletionPlan } from "./deletion-plan";

export type DeletionItemStatus = "deleted" | "absent" | "failed" | "skipped";

export interface DeletionItemReport {
  kind: "object" | "prefix";
  target: string;
  status: DeletionItemStatus;
  /** Objects removed under a prefix. */
  removed?: number;
  error?: string;
}

interface DeletionReport {
  recordId: number;
  externalId: string;
  items: DeletionItemReport[];
  storageSkipped: boolean;
}

export type DeletionOutcome =
  | ({ status: "deleted" } & DeletionReport)
  | ({ status: "partial"; failures: DeletionItemReport[] } & DeletionReport)
  | { status: "not_found"; recordId: number }
  | ({ status: "store_failure"; error: string } & Partial<DeletionReport> & {
        recordId: number;
      })
  | ({ status: "deadline_exceeded" } & DeletionReport);

export interface DeleteCompletelyOptions {
  /** Overall budget for the storage pass and the row delete. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface AssetDeletionServiceOptions {
  repository: CatalogRepository;
  /** Null selects catalog-only deletion. */
  gateway: StorageGateway | null;
  degradedReason?: string;
  defaultTimeoutMs: number;
  logger?: Logger;
}

function describeError(error: unknown): string {
  if (error instanceof StorageGatewayError) {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Permanently removes a catalog record and everything it owns in the object
 * store. Storage is purged first, item by item and without stopping on
 * individual failures; the row goes last because it holds the only copy of
 * the paths. Rerunning after any failure is safe.
 */
export class AssetDeletionService {
  private readonly repository: CatalogRepository;
  private readonly gateway: StorageGateway | null;
  private readonly degradedReason: string;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AssetDeletionServiceOptions) {
    this.repository = options.repository;
    this.gateway = options.gateway;
    this.degradedReason = options.degradedReason ?? "object store not configured";
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.logger = (options.logger ?? pino({ name: "asset-deletion" })).child({
      component: "asset-deletion",
    });
  }

  get catalogOnly(): boolean {
    return this.gateway === null;
  }

  async deleteCompletely(
    recordId: number,
    options: DeleteCompletelyOptions = {}
  ): Promise<DeletionOutcome> {
    const deadline = createDeadline(
      options.timeoutMs ?? this.defaultTimeoutMs,
      options.signal
    );
    try {
      return await this.run(recordId, deadline.signal);
    } finally {
      deadline.dispose();
    }
  }

  private async run(recordId: number, signal: AbortSignal): Promise<DeletionOutcome> {
    let record: CatalogRecord | null;
    try {
      record = await this.repository.findById(recordId);
    } catch (error) {
      this.logger.error({ err: error, recordId }, "Failed to load asset for deletion");
      return { status: "store_failure", recordId, error: describeError(error) };
    }
    if (!record) {
      return { status: "not_found", recordId };
    }

    this.logger.info(
      { recordId, externalId: record.externalId, ownerId: record.ownerId },
      "Starting complete asset deletion"
    );

    const items = this.gateway
      ? await this.purgeStorage(this.gateway, record, signal)
      : this.skipStorage(record);
    const report: DeletionReport = {
      recordId,
      externalId: record.externalId,
      items,
      storageSkipped: this.gateway === null,
    };

    if (signal.aborted) {
      this.logger.warn(
        { recordId, items: items.length },
        "Deletion deadline exceeded; catalog row kept for retry"
      );
      return { status: "deadline_exceeded", ...report };
    }

    try {
      const removed = await this.repository.deleteById(recordId);
      if (!removed) {
        return { status: "not_found", recordId };
      }
    } catch (error) {
      this.logger.error(
        { err: error, recordId },
        "Failed to delete catalog row; storage cleanup kept"
      );
      return { status: "store_failure", ...report, error: describeError(error) };
    }

    const failures = items.filter((item) => item.status === "failed");
    this.logger.info(
      { recordId, externalId: record.externalId, failures: failures.length },
      "Asset completely deleted"
    );
    if (failures.length > 0) {
      return { status: "partial", ...report, failures };
    }
    return { status: "deleted", ...report };
  }

  private skipStorage(record: CatalogRecord): DeletionItemReport[] {
    const plan = buildDeletionPlan(record);
    this.logger.warn(
      {
        recordId: record.id,
        reason: this.degradedReason,
        orphaned: [...plan.objects, ...plan.prefixes],
      },
      "Catalog-only deletion; storage objects are left in place"
    );
    return [
      ...plan.objects.map((target) => ({
        kind: "object" as const,
        target,
        status: "skipped" as const,
      })),
      ...plan.prefixes.map((target) => ({
        kind: "prefix" as const,
        target,
        status: "skipped" as const,
      })),
    ];
  }

  private async purgeStorage(
    gateway: StorageGateway,
    record: CatalogRecord,
    signal: AbortSignal
  ): Promise<DeletionItemReport[]> {
    const plan = buildDeletionPlan(record);
    const items: DeletionItemReport[] = [];

    for (const target of plan.objects) {
      if (signal.aborted) {
        items.push({ kind: "object", target, status: "skipped" });
        continue;
      }
      try {
        const exists = await gateway.objectExists(target, signal);
        if (exists) {
          await gateway.deleteObject(target, signal);
        }
        items.push({ kind: "object", target, status: exists ? "deleted" : "absent" });
      } catch (error) {
        this.logger.warn(
          { err: error, recordId: record.id, path: target },
          "Failed to delete object (continuing)"
        );
        items.push({ kind: "object", target, status: "failed", error: describeError(error) });
      }
    }

    for (const target of plan.prefixes) {
      if (signal.aborted) {
        items.push({ kind: "prefix", target, status: "skipped" });
        continue;
      }
      try {
        const removed = await gateway.deleteByPrefix(target, signal);
        items.push({
          kind: "prefix",
          target,
          status: removed > 0 ? "deleted" : "absent",
          removed,
        });
      } catch (error) {
        this.logger.warn(
          { err: error, recordId: record.id, prefix: target },
          "Failed to delete objects under prefix (continuing)"
        );
        items.push({ kind: "prefix", target, status: "failed", error: describeError(error) });
      }
    }

    this.logger.info(
      {
        recordId: record.id,
        deleted: items.filter((item) => item.status === "deleted").length,
        failed: items.filter((item) => item.status === "failed").length,
      },
      "Storage cleanup completed"
    );
    return items;
  }
}
