import { describe, expect, it, vi } from "vitest";
import { TransportError } from "../errors";
import { FakeTransport, seedChannel, seedDialog, seedUser, seedUserPage, textMessage, userPeer } from "../dialogs/__fixtures__/dialogSeeds";
import { runListDialogs } from "./list-dialogs";

function setup(transport?: FakeTransport | { invoke: () => Promise<never> }, env: NodeJS.ProcessEnv = {}) {
  const lines: string[] = [];
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const deps = { env, logger, transport, write: (line: string) => lines.push(line) };
  return { lines, logger, deps };
}

describe("runListDialogs", () => {
  it("prints one tab-separated line per dialog", async () => {
    const transport = new FakeTransport().enqueue({
      _: "messages.dialogs",
      dialogs: [
        seedDialog({ _: "peerChannel", channelId: 3 }, 30, { pinned: true, unreadCount: 2 }),
        seedDialog(userPeer(1), 10),
      ],
      messages: [textMessage({ _: "peerChannel", channelId: 3 }, 30, 100), textMessage(userPeer(1), 10, 90)],
      users: [seedUser(1)],
      chats: [seedChannel(3)],
    });
    const { lines, deps } = setup(transport);

    const code = await runListDialogs([], deps);

    expect(code).toBe(0);
    expect(lines).toEqual(["* channel\t3\t2\tChannel 3", "  user\t1\t0\tUser 1"]);
  });

  it("prints JSON lines and honors --limit", async () => {
    const transport = new FakeTransport().enqueue(seedUserPage([1, 2], { count: 9 }));
    const { lines, deps } = setup(transport);

    const code = await runListDialogs(["--json", "--limit", "2"], deps);

    expect(code).toBe(0);
    expect(transport.dialogCalls[0]).toMatchObject({ limit: 2 });
    expect(lines).toEqual([
      '{"id":1,"kind":"user","title":"User 1","pinned":false,"unread":0,"lastMessageId":10}',
      '{"id":2,"kind":"user","title":"User 2","pinned":false,"unread":0,"lastMessageId":20}',
    ]);
  });

  it("prints the total with --total", async () => {
    const transport = new FakeTransport().enqueue(seedUserPage([1], { count: 321 }));
    const { lines, deps } = setup(transport);

    expect(await runListDialogs(["--total"], deps)).toBe(0);
    expect(lines).toEqual(["321"]);
    expect(transport.dialogCalls[0]).toMatchObject({ limit: 1 });
  });

  it("rejects unknown flags and bad limits with usage errors", async () => {
    const { logger, deps } = setup(new FakeTransport());

    expect(await runListDialogs(["--verbose"], deps)).toBe(2);
    expect(logger.error).toHaveBeenLastCalledWith("usage: dialog-pager [--limit N] [--total] [--json]");

    expect(await runListDialogs(["--limit=-3"], deps)).toBe(2);
    expect(logger.error).toHaveBeenLastCalledWith("[cli] --limit must be a non-negative integer");

    expect(await runListDialogs(["--limit", "5abc"], deps)).toBe(2);
    expect(logger.error).toHaveBeenLastCalledWith("[cli] --limit must be a non-negative integer");
  });

  it("requires a gateway url when no transport is injected", async () => {
    const { logger, deps } = setup(undefined, {});

    expect(await runListDialogs([], deps)).toBe(1);
    expect(logger.error).toHaveBeenCalledWith("[cli] DIALOGS_GATEWAY_URL is required");
  });

  it("exits non-zero when the transport fails", async () => {
    const failure = new TransportError("gateway_unreachable");
    const { lines, logger, deps } = setup({ invoke: () => Promise.reject(failure) });

    expect(await runListDialogs([], deps)).toBe(1);
    expect(lines).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith("[cli] listing dialogs failed", "gateway_unreachable");
  });
});
