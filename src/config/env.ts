import { Logger, resolveLogger } from "../types";

export type EnvConfig = {
  gatewayUrl?: string;
  gatewayToken?: string;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
};

function clampInt(value: string | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const num = Number.parseInt(value, 10);
  if (Number.isNaN(num)) return fallback;
  return Math.min(Math.max(num, min), max);
}

/**
 * Dependency-free environment loader for the gateway transport and the CLI.
 * Numeric settings are clamped to sane ranges instead of rejected; a missing
 * gateway URL is reported but left for the caller to decide on.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = resolveLogger()): EnvConfig {
  const gatewayUrl = env.DIALOGS_GATEWAY_URL?.trim() || undefined;

  const parsed: EnvConfig = {
    gatewayUrl: gatewayUrl?.replace(/\/+$/, ""),
    gatewayToken: env.DIALOGS_GATEWAY_TOKEN?.trim() || undefined,
    retries: clampInt(env.DIALOGS_GATEWAY_RETRIES, 0, 10, 2),
    retryDelayMs: clampInt(env.DIALOGS_GATEWAY_RETRY_DELAY_MS, 10, 60000, 200),
    timeoutMs: clampInt(env.DIALOGS_GATEWAY_TIMEOUT_MS, 100, 120000, 15000),
  };

  if (!parsed.gatewayUrl) {
    logger.warn("[env] DIALOGS_GATEWAY_URL not set; no gateway transport can be built.");
  }

  if (parsed.gatewayUrl && !parsed.gatewayToken) {
    logger.warn("[env] DIALOGS_GATEWAY_TOKEN not set; requests go out unauthenticated.");
  }

  logger.debug?.("[env] loaded", {
    gateway: parsed.gatewayUrl ?? null,
    token: !!parsed.gatewayToken,
    retries: parsed.retries,
    retryDelayMs: parsed.retryDelayMs,
    timeoutMs: parsed.timeoutMs,
  });

  return parsed;
}
