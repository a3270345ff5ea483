import { parseArgs } from "node:util";
import { DialogClient } from "../client/DialogClient";
import { loadEnvConfig } from "../config/env";
import { Dialog } from "../dialogs/Dialog";
import { HttpGatewayTransport } from "../transports/HttpGatewayTransport";
import { RpcTransport } from "../transports/Transport";
import { Logger } from "../types";

export interface ListDialogsDeps {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  write: (line: string) => void;
  /** Overrides the gateway transport built from the environment. */
  transport?: RpcTransport;
}

const USAGE = "usage: dialog-pager [--limit N] [--total] [--json]";

function formatDialog(dialog: Dialog, json: boolean): string {
  if (json) {
    return JSON.stringify({
      id: dialog.id,
      kind: dialog.chat.kind,
      title: dialog.title,
      pinned: dialog.pinned,
      unread: dialog.unreadCount,
      lastMessageId: dialog.lastMessage?.id ?? null,
    });
  }
  const marker = dialog.pinned ? "*" : " ";
  return `${marker} ${dialog.chat.kind}\t${dialog.id}\t${dialog.unreadCount}\t${dialog.title}`;
}

/** Runs the CLI against `argv` (without node and script path) and returns the exit code. */
export async function runListDialogs(argv: string[], deps: ListDialogsDeps): Promise<number> {
  let values: { limit?: string; total?: boolean; json?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        limit: { type: "string" },
        total: { type: "boolean" },
        json: { type: "boolean" },
      },
      strict: true,
    }));
  } catch (err) {
    deps.logger.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    deps.logger.error(USAGE);
    return 2;
  }

  if (values.limit !== undefined && !/^\d+$/.test(values.limit)) {
    deps.logger.error("[cli] --limit must be a non-negative integer");
    return 2;
  }
  const limit = values.limit === undefined ? undefined : Number.parseInt(values.limit, 10);

  let transport = deps.transport;
  if (!transport) {
    const config = loadEnvConfig(deps.env, deps.logger);
    if (!config.gatewayUrl) {
      deps.logger.error("[cli] DIALOGS_GATEWAY_URL is required");
      return 1;
    }
    transport = new HttpGatewayTransport({
      baseUrl: config.gatewayUrl,
      authToken: config.gatewayToken,
      retries: config.retries,
      retryDelayMs: config.retryDelayMs,
      timeoutMs: config.timeoutMs,
      logger: deps.logger,
    });
  }

  const client = new DialogClient({ transport, logger: deps.logger });
  const dialogs = client.iterDialogs();
  if (limit !== undefined) dialogs.limit(limit);

  try {
    if (values.total) {
      deps.write(String(await dialogs.total()));
      return 0;
    }
    for await (const dialog of dialogs) {
      deps.write(formatDialog(dialog, values.json ?? false));
    }
    return 0;
  } catch (err) {
    deps.logger.error("[cli] listing dialogs failed", err instanceof Error ? err.message : String(err));
    return 1;
  }
}
