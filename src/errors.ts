/**
 * Raised by transport implementations when a call cannot be completed: the
 * gateway answered with an error, the network failed, or the request timed
 * out. The dialog engine never inspects, retries or wraps these; they reach
 * the caller as the exact object the transport rejected with.
 */
export class TransportError extends Error {
  readonly status?: number;
  /** RPC error name reported by the platform, e.g. `FLOOD_WAIT_30`. */
  readonly code?: string;

  constructor(message: string, details: { status?: number; code?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = "TransportError";
    this.status = details.status;
    this.code = details.code;
  }

  /** 5xx, 429 and network-level failures are worth another attempt. */
  get retryable(): boolean {
    if (this.status === undefined) return true;
    return this.status >= 500 || this.status === 429;
  }
}

/**
 * The remote side broke a documented guarantee: a "not modified" answer to a
 * request sent with `hash = 0`, a constructor outside the known unions, or a
 * dialog that references an entity the page did not ship. Not recoverable.
 */
export class ProtocolContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolContractViolation";
  }
}

export class RequestCancelledError extends Error {
  constructor(message = "dialog_request_cancelled") {
    super(message);
    this.name = "RequestCancelledError";
  }
}

/** Exhaustiveness guard for union switches; reaching it means an unknown constructor. */
export function unknownConstructor(where: string, value: never): never {
  const raw: unknown = value;
  const tag = typeof raw === "object" && raw !== null && "_" in raw ? String(raw._) : String(raw);
  throw new ProtocolContractViolation(`${where}: unknown constructor ${tag}`);
}
