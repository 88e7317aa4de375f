export type BreakerState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures that trip the breaker. */
  failureThreshold: number;
  /** Time spent open before a single probe call is let through. */
  cooldownMs: number;
  now?: () => number;
  /** Errors for which this returns false neither trip nor reset the breaker. */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (from: BreakerState, to: BreakerState) => void;
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly breaker: string,
    public readonly retryAt: number
  ) {
    super(`Circuit ${breaker} is open`);
    this.name = "CircuitOpenError";
  }
}

export class CircuitBreaker {
  private state: BreakerState = "closed";
  private consecutiveFailures = 0;
  private openedAt = 0;
  private probeInFlight = false;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  get currentState(): BreakerState {
    this.refresh();
    return this.state;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const probe = this.admit();
    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (this.options.isFailure?.(error) ?? true) {
        this.recordFailure();
      }
      throw error;
    } finally {
      if (probe) {
        this.probeInFlight = false;
      }
    }
  }

  private refresh() {
    if (
      this.state === "open" &&
      this.now() - this.openedAt >= this.options.cooldownMs
    ) {
      this.transition("half-open");
    }
  }

  /** Returns true when the admitted call is the half-open probe. */
  private admit(): boolean {
    this.refresh();
    if (this.state === "closed") {
      return false;
    }
    if (this.state === "half-open" && !this.probeInFlight) {
      this.probeInFlight = true;
      return true;
    }
    throw new CircuitOpenError(
      this.options.name,
      this.openedAt + this.options.cooldownMs
    );
  }

  private recordSuccess() {
    this.consecutiveFailures = 0;
    if (this.state !== "closed") {
      this.transition("closed");
    }
  }

  private recordFailure() {
    this.consecutiveFailures += 1;
    if (
      this.state === "half-open" ||
      (this.state === "closed" &&
        this.consecutiveFailures >= this.options.failureThreshold)
    ) {
      this.openedAt = this.now();
      this.transition("open");
    }
  }

  private transition(next: BreakerState) {
    const previous = this.state;
    this.state = next;
    this.options.onStateChange?.(previous, next);
  }
}
