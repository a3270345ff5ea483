import { describe, expect, it } from "vitest";
import { ProtocolContractViolation } from "../errors";
import { Message, RawDialog } from "../tl/types";
import { Dialog } from "./Dialog";
import { EntitySet } from "./EntitySet";
import { MessageSet } from "./MessageSet";
import { seedChannel, seedDialog, seedGroup, seedUser, textMessage, userPeer } from "./__fixtures__/dialogSeeds";

function decodeOne(raw: RawDialog, entities: EntitySet, messages: Message[] = []): Dialog {
  return Dialog.decode(raw, new MessageSet(messages), entities);
}

describe("EntitySet", () => {
  it("indexes users, groups and channels by peer", () => {
    const entities = new EntitySet(
      [seedUser(1), { _: "userEmpty", id: 2 }],
      [seedGroup(1), seedChannel(1), { _: "chatForbidden", id: 3, title: "Gone" }],
    );

    expect(entities.size).toBe(4);
    expect(entities.get(userPeer(1))).toEqual({ kind: "user", user: seedUser(1) });
    expect(entities.get(userPeer(2))).toBeUndefined();
    expect(entities.get({ _: "peerChat", chatId: 1 })?.kind).toBe("group");
    expect(entities.get({ _: "peerChannel", channelId: 1 })?.kind).toBe("channel");
    expect(entities.get({ _: "peerChat", chatId: 3 })?.kind).toBe("group");
  });
});

describe("MessageSet", () => {
  it("keeps equal ids from different conversations apart", () => {
    const messages = new MessageSet([textMessage(userPeer(1), 5, 100), textMessage(userPeer(2), 5, 200)]);

    expect(messages.get(userPeer(2), 5)).toMatchObject({ date: 200 });
    expect(messages.get(userPeer(3), 5)).toBeUndefined();
  });

  it("matches placeholders without a peer by id", () => {
    const messages = new MessageSet([{ _: "messageEmpty", id: 9 }]);

    expect(messages.get(userPeer(4), 9)).toEqual({ _: "messageEmpty", id: 9 });
  });
});

describe("Dialog", () => {
  it("resolves the peer and top message of a user dialog", () => {
    const entities = new EntitySet([seedUser(7, { lastName: "Stone" })], []);
    const dialog = decodeOne(seedDialog(userPeer(7), 70, { unreadCount: 4, pinned: true }), entities, [
      textMessage(userPeer(7), 70, 1234),
    ]);

    expect(dialog.id).toBe(7);
    expect(dialog.title).toBe("User 7 Stone");
    expect(dialog.pinned).toBe(true);
    expect(dialog.unreadCount).toBe(4);
    expect(dialog.lastMessage).toMatchObject({ id: 70, date: 1234 });
    expect(dialog.inputPeer()).toEqual({ _: "inputPeerUser", userId: 7, accessHash: "700" });
  });

  it("falls back to the username when a user has no name", () => {
    const entities = new EntitySet([seedUser(8, { firstName: undefined, username: "eight" })], []);

    expect(decodeOne(seedDialog(userPeer(8), 1), entities).title).toBe("eight");
  });

  it("addresses the caller's own dialog as self", () => {
    const entities = new EntitySet([seedUser(9, { self: true })], []);

    expect(decodeOne(seedDialog(userPeer(9), 1), entities).inputPeer()).toEqual({ _: "inputPeerSelf" });
  });

  it("builds group and channel references", () => {
    const entities = new EntitySet([], [seedGroup(11), seedChannel(12), { _: "chatEmpty", id: 13 }]);

    const group = decodeOne(seedDialog({ _: "peerChat", chatId: 11 }, 1), entities);
    const channel = decodeOne(seedDialog({ _: "peerChannel", channelId: 12 }, 1), entities);
    const empty = decodeOne(seedDialog({ _: "peerChat", chatId: 13 }, 1), entities);

    expect(group.title).toBe("Group 11");
    expect(group.inputPeer()).toEqual({ _: "inputPeerChat", chatId: 11 });
    expect(channel.title).toBe("Channel 12");
    expect(channel.inputPeer()).toEqual({ _: "inputPeerChannel", channelId: 12, accessHash: "1200" });
    expect(empty.title).toBe("");
    expect(empty.inputPeer()).toEqual({ _: "inputPeerEmpty" });
  });

  it("sums unread peers for folder entries", () => {
    const entities = new EntitySet([], [seedChannel(20)]);
    const folder: RawDialog = {
      _: "dialogFolder",
      folder: { id: 1, title: "Archived" },
      peer: { _: "peerChannel", channelId: 20 },
      topMessage: 3,
      unreadMutedPeersCount: 2,
      unreadUnmutedPeersCount: 5,
    };

    const dialog = decodeOne(folder, entities);

    expect(dialog.unreadCount).toBe(7);
    expect(dialog.pinned).toBe(false);
    expect(dialog.lastMessage).toBeUndefined();
  });

  it("rejects a dialog whose entity was not shipped", () => {
    const entities = new EntitySet([seedUser(1)], []);

    expect(() => decodeOne(seedDialog(userPeer(2), 1), entities)).toThrow(ProtocolContractViolation);
    expect(() => decodeOne(seedDialog(userPeer(2), 1), entities)).toThrow(
      "dialog references user:2 but the page did not include it",
    );
  });
});
