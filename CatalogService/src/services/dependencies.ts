import pino from "pino";
import { loadConfig, type Env } from "../config";
import { createObjectStore } from "../clients/object-store";
import {
  StorageGateway,
  gatewayOptionsFromConfig,
} from "../clients/storage-gateway";
import {
  createCatalogRepository,
  type CatalogRepository,
} from "../repositories/catalog-repository";
import { AssetDeletionService } from "./asset-deletion-service";
import { CatalogService } from "./catalog-service";
import { LifecycleEventWorker } from "./lifecycle-event-worker";
import { LifecycleReconciler } from "./lifecycle-reconciler";

export interface ServiceDependencies {
  config: Env;
  logger: pino.Logger;
  repository: CatalogRepository;
  gateway: StorageGateway | null;
  reconciler: LifecycleReconciler;
  deletion: AssetDeletionService;
  catalogService: CatalogService;
  worker: LifecycleEventWorker;
}

export function createServiceDependencies(
  config: Env,
  logger: pino.Logger = pino({ level: config.LOG_LEVEL, name: "catalog-service" })
): ServiceDependencies {
  const repository = createCatalogRepository(config, logger);

  const selection = createObjectStore(config, logger);
  const gateway = selection.store
    ? new StorageGateway(selection.store, {
        ...gatewayOptionsFromConfig(config),
        logger,
      })
    : null;
  const degradedReason = selection.store === null ? selection.reason : undefined;
  if (degradedReason) {
    logger.warn(
      { reason: degradedReason },
      "Running without an object store; deletions remove catalog rows only"
    );
  }

  const reconciler = new LifecycleReconciler({ repository, logger });
  const deletion = new AssetDeletionService({
    repository,
    gateway,
    degradedReason,
    defaultTimeoutMs: config.DELETION_TIMEOUT_MS,
    logger,
  });
  const catalogService = new CatalogService({
    repository,
    reconciler,
    deletion,
    logger,
  });
  const worker = new LifecycleEventWorker({
    catalogService,
    maxDeliveryAttempts: config.MAX_DELIVERY_ATTEMPTS,
    logger,
  });

  return {
    config,
    logger,
    repository,
    gateway,
    reconciler,
    deletion,
    catalogService,
    worker,
  };
}

let cached: ServiceDependencies | null = null;

export function getServiceDependencies(): ServiceDependencies {
  if (cached) {
    return cached;
  }
  cached = createServiceDependencies(loadConfig());
  return cached;
}
