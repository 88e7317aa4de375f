import pino, { type Logger } from "pino";
import { isCatalogServiceError } from "./catalog-errors";
import type { CatalogService } from "./catalog-service";

export type LifecycleEventKind = "asset-registered" | "asset-finalized";

export interface LifecycleMessage {
  data: Buffer | string;
  messageId: string;
  /** Zero or absent when the subscription has no dead-letter policy. */
  deliveryAttempt?: number | null;
}

export interface WorkerResult {
  action: "ack" | "nack";
  reason?: "processed" | "poison" | "max-attempts" | "retry";
}

interface LifecycleEventWorkerOptions {
  catalogService: CatalogService;
  maxDeliveryAttempts?: number;
  logger?: Logger;
}

function isPoison(error: unknown) {
  return error instanceof SyntaxError || isCatalogServiceError(error, "INVALID_EVENT");
}

/**
 * Applies one lifecycle message and decides its fate. Unparseable and invalid
 * events are acknowledged and dropped; store failures are redelivered until
 * `maxDeliveryAttempts`.
 */
export class LifecycleEventWorker {
  private readonly catalogService: CatalogService;
  private readonly maxDeliveryAttempts: number;
  private readonly logger: Logger;

  constructor(options: LifecycleEventWorkerOptions) {
    this.catalogService = options.catalogService;
    this.maxDeliveryAttempts = options.maxDeliveryAttempts ?? 5;
    this.logger = (options.logger ?? pino({ name: "lifecycle-worker" })).child({
      component: "lifecycle-worker",
    });
  }

  async handleMessage(
    kind: LifecycleEventKind,
    message: LifecycleMessage
  ): Promise<WorkerResult> {
    const attempt =
      message.deliveryAttempt && message.deliveryAttempt > 0
        ? message.deliveryAttempt
        : 1;
    try {
      const payload: unknown = JSON.parse(message.data.toString());
      const result =
        kind === "asset-registered"
          ? await this.catalogService.registerAsset(payload)
          : await this.catalogService.finalizeAsset(payload);
      this.logger.debug(
        {
          kind,
          messageId: message.messageId,
          externalId: result.record.externalId,
          changed: result.changed,
        },
        "Lifecycle event applied"
      );
      return { action: "ack", reason: "processed" };
    } catch (error) {
      if (isPoison(error)) {
        this.logger.error(
          { err: error, kind, messageId: message.messageId },
          "Dropping poison message"
        );
        return { action: "ack", reason: "poison" };
      }
      if (attempt >= this.maxDeliveryAttempts) {
        this.logger.error(
          { err: error, kind, messageId: message.messageId, attempt },
          "Dropping message after max delivery attempts"
        );
        return { action: "ack", reason: "max-attempts" };
      }
      this.logger.warn(
        { err: error, kind, messageId: message.messageId, attempt },
        "Lifecycle event failed; requesting redelivery"
      );
      return { action: "nack", reason: "retry" };
    }
  }
}
