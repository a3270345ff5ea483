import { unknownConstructor } from "../errors";
import { Chat, ChannelRecord, Peer, User, UserRecord } from "../tl/types";

/** A user or chat record resolved from a page's side-tables. */
export type Entity =
  | { kind: "user"; user: UserRecord }
  | { kind: "group"; chat: Exclude<Chat, ChannelRecord | { _: "channelForbidden" }> }
  | { kind: "channel"; chat: ChannelRecord | Extract<Chat, { _: "channelForbidden" }> };

export function peerKey(peer: Peer): string {
  switch (peer._) {
    case "peerUser":
      return `user:${peer.userId}`;
    case "peerChat":
      return `chat:${peer.chatId}`;
    case "peerChannel":
      return `channel:${peer.channelId}`;
    default:
      return unknownConstructor("peer", peer);
  }
}

/**
 * Lookup of the users and chats shipped alongside one page of results.
 * Built once per page and never mutated afterwards. `userEmpty` entries are
 * dropped since they carry nothing a dialog could be resolved to.
 */
export class EntitySet {
  private readonly entities = new Map<string, Entity>();

  constructor(users: readonly User[], chats: readonly Chat[]) {
    for (const user of users) {
      switch (user._) {
        case "user":
          this.entities.set(`user:${user.id}`, { kind: "user", user });
          break;
        case "userEmpty":
          break;
        default:
          unknownConstructor("user", user);
      }
    }
    for (const chat of chats) {
      switch (chat._) {
        case "chat":
        case "chatForbidden":
        case "chatEmpty":
          this.entities.set(`chat:${chat.id}`, { kind: "group", chat });
          break;
        case "channel":
        case "channelForbidden":
          this.entities.set(`channel:${chat.id}`, { kind: "channel", chat });
          break;
        default:
          unknownConstructor("chat", chat);
      }
    }
  }

  get(peer: Peer): Entity | undefined {
    return this.entities.get(peerKey(peer));
  }

  get size(): number {
    return this.entities.size;
  }
}
