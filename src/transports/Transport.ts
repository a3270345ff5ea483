import { RpcRequest, RpcResult } from "../tl/types";

/**
 * Per-call knobs. Implementations must honor `signal` by rejecting as soon as
 * it aborts; the dialog engine relies on that to cancel a pending page.
 */
export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Contract for the one network primitive the dialog engine consumes.
 * Implementations own framing, encryption, retries and backoff; callers only
 * see the typed result or a rejection, which they propagate untouched.
 */
export interface RpcTransport {
  invoke<R extends RpcRequest>(request: R, options?: InvokeOptions): Promise<RpcResult<R>>;
}

/** Exponential backoff with up to 25% jitter, capped at `maxMs`. */
export function computeBackoff(
  attempt: number,
  baseMs: number,
  maxMs: number,
): number {
  const capped = Math.min(maxMs, baseMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.25 * capped;
  return Math.round(capped * 0.75 + jitter);
}
