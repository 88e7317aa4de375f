import pino, { type Logger } from "pino";
import type { CatalogRepository } from "../repositories/catalog-repository";
import {
  parseAssetFinalizedEvent,
  parseAssetRegisteredEvent,
} from "../schemas/events";
import type { CatalogRecord } from "../types/catalog";
import type {
  AssetDeletionService,
  DeleteCompletelyOptions,
  DeletionOutcome,
} from "./asset-deletion-service";
import { CatalogServiceError } from "./catalog-errors";
import type { LifecycleReconciler, ReconcileResult } from "./lifecycle-reconciler";

export type CatalogServiceOptions = {
  repository: CatalogRepository;
  reconciler: LifecycleReconciler;
  deletion: AssetDeletionService;
  logger?: Logger;
};

/**
 * Entry point for everything outside the core: Pub/Sub workers and the
 * internal HTTP routes hand raw payloads in here.
 */
export class CatalogService {
  private readonly repository: CatalogRepository;
  private readonly reconciler: LifecycleReconciler;
  private readonly deletion: AssetDeletionService;
  private readonly logger: Logger;

  constructor(options: CatalogServiceOptions) {
    this.repository = options.repository;
    this.reconciler = options.reconciler;
    this.deletion = options.deletion;
    this.logger = options.logger ?? pino({ name: "catalog-service" });
  }

  async registerAsset(payload: unknown): Promise<ReconcileResult> {
    return this.reconciler.handleRegistered(parseAssetRegisteredEvent(payload));
  }

  async finalizeAsset(payload: unknown): Promise<ReconcileResult> {
    return this.reconciler.handleFinalized(parseAssetFinalizedEvent(payload));
  }

  async deleteAssetCompletely(
    recordId: number,
    options?: DeleteCompletelyOptions
  ): Promise<DeletionOutcome> {
    return this.deletion.deleteCompletely(recordId, options);
  }

  async getAsset(recordId: number): Promise<CatalogRecord> {
    const record = await this.read(() => this.repository.findById(recordId));
    if (!record) {
      throw new CatalogServiceError("NOT_FOUND", `Asset ${recordId} not found`);
    }
    return record;
  }

  async getAssetByExternalId(externalId: string): Promise<CatalogRecord> {
    const record = await this.read(() =>
      this.repository.findByExternalId(externalId)
    );
    if (!record) {
      throw new CatalogServiceError(
        "NOT_FOUND",
        `Asset with external id ${externalId} not found`
      );
    }
    return record;
  }

  private async read<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      this.logger.error({ err: error }, "Catalog lookup failed");
      throw new CatalogServiceError("STORE_FAILURE", "Catalog lookup failed", {
        cause: error,
      });
    }
  }
}
