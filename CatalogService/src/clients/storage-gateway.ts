import pino, { type Logger } from "pino";
import type { Env } from "../config";
import type { ObjectStore } from "./object-store";
import {
  CircuitBreaker,
  CircuitOpenError,
  type BreakerState,
} from "../utils/circuit-breaker";
import { withExponentialBackoff } from "../utils/retry";
import {
  AttemptTimeoutError,
  OperationAbortedError,
  runWithTimeout,
} from "../utils/timeout";

export type StorageErrorCode =
  | "TRANSIENT"
  | "TIMEOUT"
  | "BREAKER_OPEN"
  | "ABORTED";

export class StorageGatewayError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    public readonly operation: string,
    public readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} ${target} failed: ${code}`, options);
    this.name = "StorageGatewayError";
  }
}

export interface StorageGatewayOptions {
  attemptTimeoutMs: number;
  retries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  breakerFailureThreshold: number;
  breakerCooldownMs: number;
  listPageSize: number;
  now?: () => number;
  logger?: Logger;
}

export function gatewayOptionsFromConfig(
  config: Env
): Omit<StorageGatewayOptions, "logger" | "now"> {
  return {
    attemptTimeoutMs: config.STORAGE_ATTEMPT_TIMEOUT_MS,
    retries: config.STORAGE_RETRIES,
    backoffBaseMs: config.STORAGE_BACKOFF_BASE_MS,
    backoffMaxMs: config.STORAGE_BACKOFF_MAX_MS,
    breakerFailureThreshold: config.STORAGE_BREAKER_FAILURE_THRESHOLD,
    breakerCooldownMs: config.STORAGE_BREAKER_COOLDOWN_MS,
    listPageSize: config.STORAGE_LIST_PAGE_SIZE,
  };
}

/**
 * Wraps an {@link ObjectStore} so that every remote call gets a per-attempt
 * timeout, bounded retries with exponential backoff and one circuit breaker
 * shared by all calls made through this gateway. Retry attempts pass through
 * the breaker individually; an open breaker ends the retry loop at once.
 */
export class StorageGateway {
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    private readonly store: ObjectStore,
    private readonly options: StorageGatewayOptions
  ) {
    this.logger = (options.logger ?? pino({ name: "storage-gateway" })).child({
      component: "storage-gateway",
      backend: store.kind,
    });
    this.breaker = new CircuitBreaker({
      name: `object-store:${store.kind}`,
      failureThreshold: options.breakerFailureThreshold,
      cooldownMs: options.breakerCooldownMs,
      now: options.now,
      isFailure: (error) => !(error instanceof OperationAbortedError),
      onStateChange: (from, to) => {
        if (to === "open") {
          this.logger.warn({ from, to }, "Object store circuit breaker opened");
        } else {
          this.logger.info({ from, to }, "Object store circuit breaker changed state");
        }
      },
    });
  }

  get breakerState(): BreakerState {
    return this.breaker.currentState;
  }

  async deleteObject(path: string, signal?: AbortSignal): Promise<void> {
    await this.call("delete", path, (attemptSignal) =>
      this.store.deleteObject(path, attemptSignal), signal);
  }

  async objectExists(path: string, signal?: AbortSignal): Promise<boolean> {
    return this.call("exists", path, (attemptSignal) =>
      this.store.objectExists(path, attemptSignal), signal);
  }

  /**
   * Deletes every object whose name starts with `prefix`, page by page.
   * Stops at the first call that still fails after its retries.
   */
  async deleteByPrefix(prefix: string, signal?: AbortSignal): Promise<number> {
    let deleted = 0;
    let pageToken: string | undefined;
    do {
      const page = await this.call("list", prefix, (attemptSignal) =>
        this.store.listObjects(prefix, {
          pageToken,
          pageSize: this.options.listPageSize,
          signal: attemptSignal,
        }), signal);
      for (const name of page.names) {
        await this.deleteObject(name, signal);
        deleted += 1;
      }
      pageToken = page.nextPageToken;
    } while (pageToken);
    return deleted;
  }

  private async call<T>(
    operation: string,
    target: string,
    attempt: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    try {
      return await withExponentialBackoff(
        () =>
          this.breaker.execute(() =>
            runWithTimeout(attempt, this.options.attemptTimeoutMs, signal)
          ),
        {
          retries: this.options.retries,
          minDelayMs: this.options.backoffBaseMs,
          maxDelayMs: this.options.backoffMaxMs,
          signal,
          shouldRetry: (error) =>
            !(error instanceof CircuitOpenError) &&
            !(error instanceof OperationAbortedError),
          onRetry: (error, nextAttempt, delayMs) => {
            this.logger.warn(
              { err: error, operation, target, attempt: nextAttempt, delayMs },
              "Retrying object store call"
            );
          },
        }
      );
    } catch (error) {
      throw this.translate(error, operation, target, signal);
    }
  }

  private translate(
    error: unknown,
    operation: string,
    target: string,
    signal?: AbortSignal
  ): StorageGatewayError {
    if (error instanceof CircuitOpenError) {
      return new StorageGatewayError("BREAKER_OPEN", operation, target, { cause: error });
    }
    if (error instanceof OperationAbortedError || signal?.aborted) {
      return new StorageGatewayError("ABORTED", operation, target, { cause: error });
    }
    if (error instanceof AttemptTimeoutError) {
      return new StorageGatewayError("TIMEOUT", operation, target, { cause: error });
    }
    return new StorageGatewayError("TRANSIENT", operation, target, { cause: error });
  }
}
