import { ProtocolContractViolation, RequestCancelledError, unknownConstructor } from "../errors";
import { IterBuffer } from "../iter/IterBuffer";
import { DialogsPayload, DialogsResponse, GetDialogsRequest } from "../tl/types";
import { InvokeOptions, RpcTransport } from "../transports/Transport";
import { Logger, ObservabilityHooks, resolveLogger } from "../types";
import { Dialog } from "./Dialog";
import { EntitySet } from "./EntitySet";
import { MessageSet } from "./MessageSet";
import { deriveOffsets } from "./offsets";

export const MAX_PAGE_SIZE = 100;

export function defaultDialogsRequest(): GetDialogsRequest {
  return {
    _: "messages.getDialogs",
    excludePinned: false,
    folderId: undefined,
    offsetDate: 0,
    offsetId: 0,
    offsetPeer: { _: "inputPeerEmpty" },
    limit: 0,
    hash: 0,
  };
}

type Chunk =
  | { shape: "full"; payload: DialogsPayload }
  | { shape: "slice"; payload: DialogsPayload; count: number };

/**
 * Walks the caller's dialog list page by page. The server hands out no
 * cursor: each request is positioned after the last dialog of the previous
 * page, using that dialog's peer and the date/id of the newest message seen.
 *
 * One instance belongs to one caller. Calls must not overlap; the iterator
 * mutates its request template and buffer in place.
 */
export class DialogIterator extends IterBuffer<GetDialogsRequest, Dialog> {
  private readonly logger: Logger;

  constructor(private readonly transport: RpcTransport, private readonly hooks: ObservabilityHooks = {}) {
    super(defaultDialogsRequest());
    this.logger = resolveLogger(hooks.logger);
  }

  /** Copy of the request the next fetch will be based on. */
  get cursor(): Readonly<GetDialogsRequest> {
    return { ...this.request };
  }

  /**
   * Number of dialogs the server reports in total. Only hits the network when
   * no page has been fetched yet, and then asks for a single dialog.
   */
  async total(options: InvokeOptions = {}): Promise<number> {
    if (this.totalCount !== undefined) return this.totalCount;

    const chunk = await this.fetchChunk({ ...this.request, limit: 1 }, options);
    this.request.limit = 1;
    this.totalCount = chunk.shape === "full" ? chunk.payload.dialogs.length : chunk.count;
    return this.totalCount;
  }

  /**
   * Next dialog in server order, or `undefined` once the list (or the quota
   * set with `limit()`) is exhausted. State is only touched after a page has
   * fully arrived and decoded, so a rejected or cancelled fetch changes nothing.
   */
  async next(options: InvokeOptions = {}): Promise<Dialog | undefined> {
    const ready = this.nextBuffered();
    if (ready) return ready.item;

    const limit = this.determineLimit(MAX_PAGE_SIZE);
    const chunk = await this.fetchChunk({ ...this.request, limit }, options);
    const { dialogs, messages, users, chats } = chunk.payload;

    const entities = new EntitySet(users, chats);
    const messageSet = new MessageSet(messages);
    const decoded = dialogs.map((raw) => Dialog.decode(raw, messageSet, entities));

    this.request.limit = limit;
    if (chunk.shape === "full") {
      this.lastChunk = true;
      this.totalCount = dialogs.length;
    } else {
      this.lastChunk = dialogs.length < limit;
      // Each slice reports the server's current count; it replaces, never adds.
      this.totalCount = chunk.count;
    }
    this.buffer.push(...decoded);

    this.logger.debug?.("[dialogs] fetched chunk", {
      shape: chunk.shape,
      size: dialogs.length,
      limit,
      last: this.lastChunk,
    });
    this.hooks.onTelemetry?.({
      name: "dialogs_chunk",
      at: Date.now(),
      detail: { shape: chunk.shape, size: dialogs.length, total: this.totalCount },
    });

    if (!this.lastChunk && this.buffer.length > 0) {
      this.advanceOffsets();
    }

    return this.popItem();
  }

  private advanceOffsets(): void {
    this.request.excludePinned = true;
    for (let i = this.buffer.length - 1; i >= 0; i--) {
      const message = this.buffer[i].lastMessage;
      if (message) {
        const offsets = deriveOffsets(message, this.request);
        this.request.offsetDate = offsets.offsetDate;
        this.request.offsetId = offsets.offsetId;
        break;
      }
    }
    const last = this.buffer.at(-1);
    if (last) this.request.offsetPeer = last.inputPeer();
  }

  private async fetchChunk(request: GetDialogsRequest, { signal }: InvokeOptions): Promise<Chunk> {
    if (signal?.aborted) throw new RequestCancelledError();
    const response = await this.transport.invoke(request, { signal });
    if (signal?.aborted) throw new RequestCancelledError();
    return classify(response);
  }
}

function classify(response: DialogsResponse): Chunk {
  switch (response._) {
    case "messages.dialogs":
      return { shape: "full", payload: response };
    case "messages.dialogsSlice":
      return { shape: "slice", payload: response, count: response.count };
    case "messages.dialogsNotModified":
      throw new ProtocolContractViolation("server answered messages.dialogsNotModified to a request sent with hash = 0");
    default:
      return unknownConstructor("dialogs", response);
  }
}
