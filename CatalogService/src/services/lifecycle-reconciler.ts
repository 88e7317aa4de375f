import pino, { type Logger } from "pino";
import type {
  AssetFinalizedEvent,
  AssetRegisteredEvent,
} from "../schemas/events";
import type {
  CatalogRepository,
  CatalogTransaction,
} from "../repositories/catalog-repository";
import {
  emptyCatalogFields,
  type AssetStatus,
  type CatalogFields,
  type CatalogRecord,
} from "../types/catalog";
import {
  FINALIZATION_POLICY,
  REGISTRATION_POLICY,
  advanceStatus,
  mergeFields,
  type MergePolicy,
} from "./catalog-merge";
import { CatalogServiceError } from "./catalog-errors";

export interface ReconcileResult {
  record: CatalogRecord;
  created: boolean;
  /** Fields (and `status`) that this delivery actually changed. */
  changed: string[];
}

interface MergeRequest {
  event: "asset-registered" | "asset-finalized";
  externalId: string;
  incoming: Partial<CatalogFields>;
  policy: MergePolicy;
  /** Status a new record starts in. */
  initialStatus: AssetStatus;
  /** Status an existing record advances towards, if any. */
  targetStatus?: AssetStatus;
}

interface LifecycleReconcilerOptions {
  repository: CatalogRepository;
  logger?: Logger;
}

/**
 * Folds the two asset lifecycle events into one catalog record per external
 * id. Deliveries may arrive twice and in either order; every merge runs as a
 * single read-modify-write transaction against the repository.
 */
export class LifecycleReconciler {
  private readonly repository: CatalogRepository;
  private readonly logger: Logger;

  constructor(options: LifecycleReconcilerOptions) {
    this.repository = options.repository;
    this.logger = (options.logger ?? pino({ name: "lifecycle-reconciler" })).child({
      component: "lifecycle-reconciler",
    });
  }

  async handleRegistered(event: AssetRegisteredEvent): Promise<ReconcileResult> {
    if (!event.externalId || !event.ownerId) {
      throw new CatalogServiceError(
        "INVALID_EVENT",
        "asset-registered event requires externalId and ownerId"
      );
    }

    return this.reconcile({
      event: "asset-registered",
      externalId: event.externalId,
      incoming: {
        ownerId: event.ownerId,
        ownerDisplayName: event.ownerDisplayName,
        title: event.title,
        description: event.description,
        category: event.category,
        tags: event.tags,
        isPrivate: event.isPrivate,
        originalFilename: event.originalFilename,
        rawObjectPath: event.rawObjectPath,
      },
      policy: REGISTRATION_POLICY,
      initialStatus: "processing",
    });
  }

  async handleFinalized(event: AssetFinalizedEvent): Promise<ReconcileResult> {
    if (!event.externalId || !event.manifestUrl) {
      throw new CatalogServiceError(
        "INVALID_EVENT",
        "asset-finalized event requires externalId and manifestUrl"
      );
    }

    const incoming: Partial<CatalogFields> = {
      ownerId: event.ownerId,
      title: event.title,
      description: event.description,
      category: event.category,
      tags: event.tags,
      isPrivate: event.isPrivate,
      originalFilename: event.originalFilename,
      rawObjectPath: event.rawObjectPath,
      manifestUrl: event.manifestUrl,
      thumbnailUrl: event.thumbnailUrl,
    };
    if (event.mediaMetadata !== undefined) {
      incoming.media = event.mediaMetadata;
    }

    return this.reconcile({
      event: "asset-finalized",
      externalId: event.externalId,
      incoming,
      policy: FINALIZATION_POLICY,
      initialStatus: "processing",
      targetStatus: "ready",
    });
  }

  private async reconcile(request: MergeRequest): Promise<ReconcileResult> {
    try {
      const result = await this.repository.transaction((tx) =>
        this.mergeWithin(tx, request)
      );
      if (result.created || result.changed.length > 0) {
        this.logger.info(
          {
            event: request.event,
            externalId: request.externalId,
            recordId: result.record.id,
            created: result.created,
            changed: result.changed,
            status: result.record.status,
          },
          result.created ? "Catalog record created" : "Catalog record updated"
        );
      } else {
        this.logger.debug(
          { event: request.event, externalId: request.externalId },
          "Duplicate delivery; catalog record unchanged"
        );
      }
      return result;
    } catch (error) {
      if (error instanceof CatalogServiceError) {
        throw error;
      }
      throw new CatalogServiceError(
        "STORE_FAILURE",
        `Failed to apply ${request.event} for ${request.externalId}`,
        { cause: error }
      );
    }
  }

  private async mergeWithin(
    tx: CatalogTransaction,
    request: MergeRequest
  ): Promise<ReconcileResult> {
    const existing = await tx.findByExternalIdForUpdate(request.externalId);
    if (existing) {
      return this.applyTo(tx, existing, request);
    }

    const placeholder = mergeFields(
      emptyCatalogFields(),
      request.incoming,
      request.policy
    );
    const status = request.targetStatus
      ? advanceStatus(request.initialStatus, request.targetStatus)
      : request.initialStatus;
    const created = await tx.createIfAbsent({
      ...placeholder.fields,
      externalId: request.externalId,
      status,
    });
    if (created) {
      return { record: created, created: true, changed: [] };
    }

    // Another delivery inserted the same external id first.
    const winner = await tx.findByExternalIdForUpdate(request.externalId);
    if (!winner) {
      throw new Error(
        `Catalog record ${request.externalId} conflicted on insert but could not be read`
      );
    }
    return this.applyTo(tx, winner, request);
  }

  private async applyTo(
    tx: CatalogTransaction,
    existing: CatalogRecord,
    request: MergeRequest
  ): Promise<ReconcileResult> {
    const merged = mergeFields(existing, request.incoming, request.policy);
    const status = request.targetStatus
      ? advanceStatus(existing.status, request.targetStatus)
      : existing.status;
    const changed: string[] = [...merged.changed];
    if (status !== existing.status) {
      changed.push("status");
    }
    if (changed.length === 0) {
      return { record: existing, created: false, changed };
    }

    const saved = await tx.save({ ...existing, ...merged.fields, status });
    return { record: saved, created: false, changed };
  }
}
