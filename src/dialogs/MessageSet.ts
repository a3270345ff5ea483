import { unknownConstructor } from "../errors";
import { Message, Peer } from "../tl/types";
import { peerKey } from "./EntitySet";

/**
 * Messages shipped with a page, addressed by conversation and id. Message ids
 * are only unique within a conversation, so the peer is part of the key.
 * Empty placeholders may come without a `peerId`; those are matched by id alone.
 */
export class MessageSet {
  private readonly messages = new Map<string, Message>();

  constructor(messages: readonly Message[]) {
    for (const message of messages) {
      switch (message._) {
        case "message":
        case "messageService":
        case "messageEmpty":
          break;
        default:
          unknownConstructor("message", message);
      }
      const scope = message.peerId ? peerKey(message.peerId) : "";
      this.messages.set(`${scope}#${message.id}`, message);
    }
  }

  get(peer: Peer, id: number): Message | undefined {
    return this.messages.get(`${peerKey(peer)}#${id}`) ?? this.messages.get(`#${id}`);
  }
}
