import { v4 as uuidv4 } from "uuid";
import { RequestCancelledError, TransportError } from "../errors";
import { RpcMethod, RpcRequest, RpcResult } from "../tl/types";
import { Logger, ObservabilityHooks, resolveLogger } from "../types";
import { CircuitBreaker, withRetry } from "./resilience";
import { InvokeOptions, RpcTransport } from "./Transport";
import { parseRpcResult } from "./validation";

export interface HttpGatewayTransportOptions extends ObservabilityHooks {
  /** Gateway root; each call is posted to `${baseUrl}/${constructor}`. */
  baseUrl: string;
  /** Optional bearer token sent with every request. */
  authToken?: string;
  /** Static headers to add to every request. */
  headers?: Record<string, string>;
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  breaker?: CircuitBreaker;
}

function readGatewayError(body: unknown): { code?: string; message?: string } {
  if (typeof body !== "object" || body === null || !("error" in body)) return {};
  const error: unknown = body.error;
  if (typeof error !== "object" || error === null) return {};
  return {
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    message: "message" in error && typeof error.message === "string" ? error.message : undefined,
  };
}

function readResult(body: unknown): { result: unknown } | undefined {
  if (typeof body === "object" && body !== null && "result" in body) return { result: body.result };
  return undefined;
}

/**
 * Transport for deployments that reach the messaging platform through an
 * HTTP gateway holding the authorized session. Requests are JSON-encoded
 * schema objects; the gateway answers `{ result }` or `{ error: { code, message } }`.
 *
 * Retries, backoff and the circuit breaker live here, not in the dialog
 * engine. Successful results are checked against the bundled JSON Schemas
 * before they are handed back typed.
 */
export class HttpGatewayTransport implements RpcTransport {
  public readonly name = "http-gateway" as const;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(private readonly options: HttpGatewayTransportOptions) {
    this.breaker = options.breaker ?? new CircuitBreaker();
    this.logger = resolveLogger(options.logger);
  }

  async invoke<R extends RpcRequest>(request: R, options: InvokeOptions = {}): Promise<RpcResult<R>> {
    const method = request._;
    const requestId = uuidv4();
    const hooks: ObservabilityHooks = { logger: this.logger, onTelemetry: this.options.onTelemetry };
    const started = Date.now();

    let payload: unknown;
    try {
      payload = await this.breaker.exec(
        () =>
          withRetry(
            () => this.post(method, request, requestId, options.signal),
            {
              retries: this.options.retries ?? 2,
              baseDelayMs: this.options.retryDelayMs ?? 200,
              signal: options.signal,
            },
            hooks,
          ),
        hooks,
      );
    } catch (err) {
      if (options.signal?.aborted) throw new RequestCancelledError();
      this.logger.error("[gateway] request failed", { method, requestId, error: err instanceof Error ? err.message : String(err) });
      throw err;
    }

    this.options.onTelemetry?.({
      name: "gateway_invoke",
      at: Date.now(),
      detail: { method, requestId, durationMs: Date.now() - started },
    });
    return parseRpcResult<R["_"]>(method, payload);
  }

  private async post(method: RpcMethod, request: RpcRequest, requestId: string, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) throw new RequestCancelledError();

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 15000);

    try {
      const response = await fetch(`${this.options.baseUrl}/${method}`, {
        method: "POST",
        headers: this.buildHeaders(requestId),
        body: JSON.stringify(request),
        signal: controller.signal,
      });
      const body: unknown = await response.json().catch(() => undefined);
      if (!response.ok) {
        const error = readGatewayError(body);
        throw new TransportError(error.message ?? `Gateway responded with status ${response.status}`, {
          status: response.status,
          code: error.code,
        });
      }
      const envelope = readResult(body);
      if (!envelope) {
        throw new TransportError("gateway_malformed_response", { status: response.status });
      }
      return envelope.result;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      if (signal?.aborted) throw new RequestCancelledError();
      if (controller.signal.aborted) throw new TransportError("gateway_timeout", { cause: err });
      throw new TransportError("gateway_unreachable", { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildHeaders(requestId: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "X-Request-Id": requestId,
      ...this.options.headers,
    };
    if (this.options.authToken) {
      headers["Authorization"] = `Bearer ${this.options.authToken}`;
    }
    return headers;
  }
}
