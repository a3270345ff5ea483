import { afterEach, describe, expect, it, vi } from "vitest";
import { ProtocolContractViolation, TransportError } from "../../errors";
import { CircuitBreaker, withRetry } from "../resilience";
import { computeBackoff } from "../Transport";

describe("computeBackoff", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("doubles per attempt and stays under the cap", () => {
    vi.spyOn(Math, "random").mockReturnValue(0);

    expect(computeBackoff(0, 100, 1000)).toBe(75);
    expect(computeBackoff(2, 100, 1000)).toBe(300);
    expect(computeBackoff(8, 100, 1000)).toBe(750);
  });
});

describe("withRetry", () => {
  it("retries retryable transport errors until the call succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransportError("gateway_unreachable"))
      .mockRejectedValueOnce(new TransportError("busy", { status: 503 }))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { retries: 2, baseDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after the configured number of retries", async () => {
    const failure = new TransportError("busy", { status: 502 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(fn, { retries: 1, baseDelayMs: 1 })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors or contract violations", async () => {
    const rejected = new TransportError("PEER_ID_INVALID", { status: 400 });
    const violation = new ProtocolContractViolation("bad payload");
    const first = vi.fn<() => Promise<string>>().mockRejectedValue(rejected);
    const second = vi.fn<() => Promise<string>>().mockRejectedValue(violation);

    await expect(withRetry(first, { retries: 3, baseDelayMs: 1 })).rejects.toBe(rejected);
    await expect(withRetry(second, { retries: 3, baseDelayMs: 1 })).rejects.toBe(violation);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });
});

describe("CircuitBreaker", () => {
  it("opens after repeated transport failures and short-circuits", async () => {
    const breaker = new CircuitBreaker(2, 60_000);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransportError("gateway_unreachable"));

    await expect(breaker.exec(fn)).rejects.toThrow("gateway_unreachable");
    expect(breaker.isOpen).toBe(false);
    await expect(breaker.exec(fn)).rejects.toThrow("gateway_unreachable");
    expect(breaker.isOpen).toBe(true);

    await expect(breaker.exec(fn)).rejects.toThrow("circuit_open");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("ignores failures that are not the gateway's fault", async () => {
    const breaker = new CircuitBreaker(1, 60_000);

    await expect(breaker.exec(() => Promise.reject(new ProtocolContractViolation("bad")))).rejects.toThrow("bad");
    expect(breaker.isOpen).toBe(false);
  });

  it("resets the failure count after a success", async () => {
    const breaker = new CircuitBreaker(2, 60_000);
    const failing = () => Promise.reject(new TransportError("gateway_timeout"));

    await expect(breaker.exec(failing)).rejects.toThrow("gateway_timeout");
    await expect(breaker.exec(() => Promise.resolve(1))).resolves.toBe(1);
    await expect(breaker.exec(failing)).rejects.toThrow("gateway_timeout");
    expect(breaker.isOpen).toBe(false);
  });
});
