import { DialogIterator } from "../dialogs/DialogIterator";
import { deleteDialog } from "../dialogs/deleteDialog";
import { InputPeer } from "../tl/types";
import { InvokeOptions, RpcTransport } from "../transports/Transport";
import { Logger, ObservabilityHooks, resolveLogger } from "../types";

export interface DialogClientOptions extends ObservabilityHooks {
  transport: RpcTransport;
}

/**
 * Entry point for working with the caller's dialog list. The client holds
 * no state of its own besides the transport; every `iterDialogs()` call
 * starts an independent enumeration.
 */
export class DialogClient {
  private readonly transport: RpcTransport;
  private readonly hooks: ObservabilityHooks;
  private readonly logger: Logger;

  constructor(options: DialogClientOptions) {
    this.transport = options.transport;
    this.hooks = { logger: options.logger, onTelemetry: options.onTelemetry };
    this.logger = resolveLogger(options.logger);
  }

  iterDialogs(): DialogIterator {
    return new DialogIterator(this.transport, this.hooks);
  }

  /**
   * Deletes a dialog, removing it from the caller's list of open conversations.
   *
   * The dialog is only deleted for the caller. For private conversations this
   * clears the history; for groups and channels it is the same as leaving.
   * The chat itself is **not** deleted and its other members stay inside.
   */
  async deleteDialog(peer: InputPeer, options?: InvokeOptions): Promise<void> {
    await deleteDialog(this.transport, peer, options);
    this.logger.info("[dialogs] deleted dialog", { peer: peer._ });
    this.hooks.onTelemetry?.({ name: "dialog_deleted", at: Date.now(), detail: { peer: peer._ } });
  }
}
