import { ProtocolContractViolation, unknownConstructor } from "../errors";
import { InputPeer, Message, RawDialog } from "../tl/types";
import { Entity, EntitySet, peerKey } from "./EntitySet";
import { MessageSet } from "./MessageSet";

/**
 * One entry of the dialog list, resolved against the side-tables of the page
 * it arrived in. It holds everything needed to render or address the
 * conversation, so no further lookups are required once it is decoded.
 */
export class Dialog {
  constructor(
    readonly raw: RawDialog,
    readonly chat: Entity,
    readonly lastMessage: Message | undefined,
  ) {}

  static decode(raw: RawDialog, messages: MessageSet, entities: EntitySet): Dialog {
    switch (raw._) {
      case "dialog":
      case "dialogFolder":
        break;
      default:
        return unknownConstructor("dialog", raw);
    }
    const chat = entities.get(raw.peer);
    if (!chat) {
      throw new ProtocolContractViolation(`dialog references ${peerKey(raw.peer)} but the page did not include it`);
    }
    return new Dialog(raw, chat, messages.get(raw.peer, raw.topMessage));
  }

  get id(): number {
    return this.chat.kind === "user" ? this.chat.user.id : this.chat.chat.id;
  }

  get title(): string {
    switch (this.chat.kind) {
      case "user": {
        const { firstName, lastName, username } = this.chat.user;
        const name = [firstName, lastName].filter(Boolean).join(" ");
        return name || username || "";
      }
      case "group":
        return this.chat.chat._ === "chatEmpty" ? "" : this.chat.chat.title;
      case "channel":
        return this.chat.chat.title;
      default:
        return unknownConstructor("entity", this.chat);
    }
  }

  get pinned(): boolean {
    return this.raw.pinned ?? false;
  }

  /** Unread messages for plain dialogs; unread peers for a folder entry. */
  get unreadCount(): number {
    return this.raw._ === "dialog"
      ? this.raw.unreadCount
      : this.raw.unreadMutedPeersCount + this.raw.unreadUnmutedPeersCount;
  }

  /** Reference used to address this conversation in follow-up requests. */
  inputPeer(): InputPeer {
    const entity = this.chat;
    switch (entity.kind) {
      case "user":
        if (entity.user.self) return { _: "inputPeerSelf" };
        return { _: "inputPeerUser", userId: entity.user.id, accessHash: entity.user.accessHash ?? "0" };
      case "group":
        if (entity.chat._ === "chatEmpty") return { _: "inputPeerEmpty" };
        return { _: "inputPeerChat", chatId: entity.chat.id };
      case "channel":
        return { _: "inputPeerChannel", channelId: entity.chat.id, accessHash: entity.chat.accessHash ?? "0" };
      default:
        return unknownConstructor("entity", entity);
    }
  }
}
