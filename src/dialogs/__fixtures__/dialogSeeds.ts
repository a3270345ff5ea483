import {
  ChannelRecord,
  Chat,
  DialogsResponse,
  Message,
  Peer,
  RawDialog,
  RpcMethod,
  RpcRequest,
  RpcResult,
  RpcResultMap,
  User,
  UserRecord,
} from "../../tl/types";
import { InvokeOptions, RpcTransport } from "../../transports/Transport";

// Deterministic seed data: user `n` owns a dialog whose top message has id
// `n * 10` and date `10_000 - n`, so cursor assertions can be derived by hand.

export function seedUser(id: number, extra: Partial<UserRecord> = {}): UserRecord {
  return { _: "user", id, accessHash: `${id}00`, firstName: `User ${id}`, ...extra };
}

export function seedChannel(id: number, extra: Partial<ChannelRecord> = {}): ChannelRecord {
  return { _: "channel", id, accessHash: `${id}00`, title: `Channel ${id}`, ...extra };
}

export function seedGroup(id: number): Chat {
  return { _: "chat", id, title: `Group ${id}`, participantsCount: 3 };
}

export function userPeer(id: number): Peer {
  return { _: "peerUser", userId: id };
}

export function textMessage(peer: Peer, id: number, date: number): Message {
  return { _: "message", id, peerId: peer, date, message: `hello ${id}` };
}

export function seedDialog(peer: Peer, topMessage: number, extra: { pinned?: boolean; unreadCount?: number } = {}): RawDialog {
  return { _: "dialog", peer, topMessage, unreadCount: extra.unreadCount ?? 0, pinned: extra.pinned };
}

export interface SeedPageOptions {
  /** Slice count; omit for a full (final) response. */
  count?: number;
  /**
   * Replaces the default top message of user `id` (the dialog points at its
   * id); `null` ships no message for that dialog.
   */
  messageFor?: (id: number) => Message | null;
}

/** One page holding a dialog per user id, in the order given. */
export function seedUserPage(ids: number[], options: SeedPageOptions = {}): DialogsResponse {
  const users: User[] = [];
  const dialogs: RawDialog[] = [];
  const messages: Message[] = [];
  for (const id of ids) {
    const message = options.messageFor ? options.messageFor(id) : textMessage(userPeer(id), id * 10, 10_000 - id);
    users.push(seedUser(id));
    dialogs.push(seedDialog(userPeer(id), message ? message.id : id * 10));
    if (message) messages.push(message);
  }
  if (options.count === undefined) {
    return { _: "messages.dialogs", dialogs, messages, users, chats: [] };
  }
  return { _: "messages.dialogsSlice", count: options.count, dialogs, messages, users, chats: [] };
}

export function range(from: number, to: number): number[] {
  const ids: number[] = [];
  for (let id = from; id <= to; id++) ids.push(id);
  return ids;
}

type Handlers = {
  [M in RpcMethod]: (request: RpcRequest, options: InvokeOptions) => Promise<RpcResultMap[M]>;
};

type QueuedPage =
  | { kind: "page"; response: DialogsResponse }
  | { kind: "failure"; error: unknown }
  | { kind: "deferred"; promise: Promise<DialogsResponse> };

/**
 * In-process stand-in for the RPC transport. Dialog pages are answered from a
 * queue in order; delete calls succeed with canned payloads. Every request is
 * recorded as a snapshot so later cursor mutations do not rewrite history.
 */
export class FakeTransport implements RpcTransport {
  readonly calls: RpcRequest[] = [];
  private readonly pages: QueuedPage[] = [];

  private readonly handlers: Handlers = {
    "messages.getDialogs": () => this.nextPage(),
    "messages.deleteHistory": async () => ({ _: "messages.affectedHistory", pts: 1, ptsCount: 1, offset: 0 }),
    "messages.deleteChatUser": async () => ({ _: "updates", date: 0, seq: 0 }),
    "channels.leaveChannel": async () => ({ _: "updates", date: 0, seq: 0 }),
  };

  enqueue(...responses: DialogsResponse[]): this {
    for (const response of responses) this.pages.push({ kind: "page", response });
    return this;
  }

  enqueueFailure(error: unknown): this {
    this.pages.push({ kind: "failure", error });
    return this;
  }

  /** Queues a page that only arrives when the returned `resolve` is called. */
  enqueueDeferred(): { resolve: (response: DialogsResponse) => void } {
    let resolve: (response: DialogsResponse) => void = () => undefined;
    const promise = new Promise<DialogsResponse>((done) => {
      resolve = done;
    });
    this.pages.push({ kind: "deferred", promise });
    return { resolve: (response) => resolve(response) };
  }

  get dialogCalls(): RpcRequest[] {
    return this.calls.filter((call) => call._ === "messages.getDialogs");
  }

  async invoke<R extends RpcRequest>(request: R, options: InvokeOptions = {}): Promise<RpcResult<R>> {
    this.calls.push(structuredClone(request));
    return this.handlerFor<R["_"]>(request._)(request, options);
  }

  private handlerFor<M extends RpcMethod>(method: M): Handlers[M] {
    return this.handlers[method];
  }

  private async nextPage(): Promise<DialogsResponse> {
    const next = this.pages.shift();
    if (!next) throw new Error("fake transport has no page queued");
    switch (next.kind) {
      case "page":
        return next.response;
      case "failure":
        throw next.error;
      case "deferred":
        return next.promise;
    }
  }
}
