/**
 * Minimal logger contract shared across the package. `console` satisfies it,
 * and so does any structured logger with the same method names.
 */
export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug?(...args: unknown[]): void;
}

/**
 * Lightweight telemetry event emitted around remote calls. It stays generic so
 * it can be forwarded to whatever metrics system the host application uses.
 */
export interface TelemetryEvent {
  name: string;
  detail?: Record<string, unknown>;
  at: number;
}

export interface ObservabilityHooks {
  logger?: Logger;
  onTelemetry?: (event: TelemetryEvent) => void;
}

/** Console-backed default. It has no `debug`; debug output only reaches a logger passed in. */
const defaultLogger: Logger = {
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function resolveLogger(logger?: Logger): Logger {
  return logger ?? defaultLogger;
}
