import { setTimeout as delay } from "node:timers/promises";
import { TransportError } from "../errors";
import { ObservabilityHooks } from "../types";
import { computeBackoff } from "./Transport";

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
}

export class CircuitBreaker {
  private failureCount = 0;
  private openUntil = 0;

  constructor(private readonly failureThreshold = 5, private readonly cooldownMs = 15000) {}

  get isOpen(): boolean {
    return this.openUntil > Date.now();
  }

  async exec<T>(fn: () => Promise<T>, hooks?: ObservabilityHooks): Promise<T> {
    const now = Date.now();
    if (this.openUntil > now) {
      hooks?.logger?.warn("[circuit-breaker] short-circuiting call");
      throw new TransportError("circuit_open");
    }
    try {
      const result = await fn();
      this.failureCount = 0;
      return result;
    } catch (err) {
      // Only transport failures count against the gateway.
      if (err instanceof TransportError) {
        this.failureCount += 1;
        hooks?.logger?.warn("[circuit-breaker] failure count", this.failureCount, err.message);
        if (this.failureCount >= this.failureThreshold) {
          this.openUntil = now + this.cooldownMs;
          hooks?.onTelemetry?.({ name: "circuit_open", at: Date.now(), detail: { until: this.openUntil } });
        }
      }
      throw err;
    }
  }
}

/**
 * Retries `fn` while it rejects with a retryable `TransportError`. Anything
 * else (contract violations, cancellations, 4xx answers) is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
  hooks?: ObservabilityHooks,
): Promise<T> {
  const { retries, baseDelayMs, maxDelayMs = 5000, signal } = options;
  let attempt = 0;
  while (true) {
    try {
      const start = Date.now();
      const result = await fn();
      hooks?.onTelemetry?.({ name: "retry_success", at: Date.now(), detail: { attempt, duration: Date.now() - start } });
      return result;
    } catch (err) {
      if (!(err instanceof TransportError) || !err.retryable || attempt >= retries) throw err;
      const sleep = computeBackoff(attempt, baseDelayMs, maxDelayMs);
      hooks?.logger?.warn("[retry] transient failure", { attempt, sleep, error: err.message });
      hooks?.onTelemetry?.({ name: "retry_backoff", at: Date.now(), detail: { attempt, sleep } });
      await delay(sleep, undefined, { signal });
      attempt += 1;
    }
  }
}
