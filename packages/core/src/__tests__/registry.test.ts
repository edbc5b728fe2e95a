import { afterEach, describe, expect, it, vi } from "vitest";
import type { FlushScheduler } from "../autoFollow.js";
import { mergeConfig } from "../config.js";
import { SessionRegistry } from "../registry.js";
import { MemoryTransport } from "../transport/memory.js";
import { assistant, ids, user } from "./fixtures.js";

const immediate: FlushScheduler = (flush) => flush();

const config = mergeConfig({ sync: { cadenceMs: 10, pageSize: 2, revisionPollMs: 10 } });

function seededTransport(): MemoryTransport {
  const transport = new MemoryTransport();
  transport.createSession("alpha", [user("u1"), assistant("a1"), user("u2"), assistant("a2")]);
  transport.createSession("beta", [user("b1"), assistant("b2")]);
  return transport;
}

describe("session registry", () => {
  let registry: SessionRegistry | null = null;

  afterEach(async () => {
    await registry?.dispose();
    registry = null;
  });

  it("answers presentation queries per session", async () => {
    registry = new SessionRegistry(seededTransport(), config, { followSchedule: immediate, autoStart: false });
    await registry.open("alpha").syncOnce();

    expect(ids(registry.currentWindow("alpha"))).toEqual(["u2", "a2"]);
    expect(registry.windowState("alpha")).toEqual({ displayedCount: 2, total: 4, hasMore: true });
    expect(registry.metadata("alpha", "u2")).toEqual({ turnsAfter: 1, nthUserMessage: 0 });
    expect(registry.isPinned("alpha")).toBe(true);
    expect(registry.unreadCount("alpha")).toBe(0);

    const grouped = registry.currentTurns("alpha");
    expect(grouped.mode).toBe("turns");
    if (grouped.mode === "turns") {
      expect(grouped.turns.map((turn) => turn.id)).toEqual(["turn-u2"]);
    }

    expect(registry.loadMore("alpha")).toEqual({ displayedCount: 4, total: 4, hasMore: false });
    expect(registry.metadata("alpha", "u1")).toEqual({ turnsAfter: 1, nthUserMessage: 0 });
  });

  it("forwards session events with the session id", async () => {
    registry = new SessionRegistry(seededTransport(), config, { followSchedule: immediate, autoStart: false });
    const onUpdate = vi.fn();
    const onFollow = vi.fn();
    registry.on("update", onUpdate);
    registry.on("follow", onFollow);

    await registry.open("beta").syncOnce();
    registry.reportViewport("beta", { distanceFromBottom: 250 });

    expect(onUpdate).toHaveBeenCalledWith("beta", expect.objectContaining({ sessionId: "beta", path: "replace" }));
    expect(onFollow).toHaveBeenCalledWith("beta", { isPinned: false, unreadCount: 0 });
    registry.jumpToBottom("beta");
    expect(registry.isPinned("beta")).toBe(true);
  });

  it("rejects queries for sessions that are not open", () => {
    registry = new SessionRegistry(seededTransport(), config, { autoStart: false });
    expect(() => registry?.currentWindow("ghost")).toThrow("unknown session: ghost");
  });

  it("returns the open session when opened twice", () => {
    registry = new SessionRegistry(seededTransport(), config, { autoStart: false });
    expect(registry.open("alpha")).toBe(registry.open("alpha"));
  });

  it("cancels the previous session's fetch when switching", async () => {
    const transport = seededTransport();
    registry = new SessionRegistry(transport, config, { followSchedule: immediate });
    transport.pauseSnapshots();
    const alpha = registry.open("alpha");
    await expect.poll(() => transport.calls.snapshot).toBe(1);

    const beta = registry.switchTo("alpha", "beta");
    transport.resumeSnapshots();

    await expect.poll(() => beta.isLoaded).toBe(true);
    expect(alpha.isClosed).toBe(true);
    expect(alpha.isLoaded).toBe(false);
    expect(alpha.messages()).toEqual([]);
    expect(registry.openSessionIds()).toEqual(["beta"]);
    expect(ids(registry.currentWindow("beta"))).toEqual(["b1", "b2"]);
  });

  it("announces closed sessions, including the one switched away from", () => {
    registry = new SessionRegistry(seededTransport(), config, { autoStart: false });
    const onClose = vi.fn();
    registry.on("close", onClose);
    registry.open("alpha");

    registry.switchTo("alpha", "beta");
    registry.close("beta");
    registry.close("ghost");

    expect(onClose.mock.calls).toEqual([["alpha"], ["beta"]]);
    expect(registry.getMaxListeners()).toBe(0);
  });

  it("suspends follow tracking while the client scrolls programmatically", async () => {
    registry = new SessionRegistry(seededTransport(), config, { followSchedule: immediate, autoStart: false });
    await registry.open("alpha").syncOnce();

    registry.setProgrammaticScroll("alpha", true);
    registry.reportViewport("alpha", { distanceFromBottom: 400 });
    expect(registry.isPinned("alpha")).toBe(true);

    registry.setProgrammaticScroll("alpha", false);
    registry.reportViewport("alpha", { distanceFromBottom: 400 });
    expect(registry.isPinned("alpha")).toBe(false);
  });

  it("closes every session and the transport on dispose", async () => {
    const transport = seededTransport();
    const closeSpy = vi.spyOn(transport, "close");
    registry = new SessionRegistry(transport, config);
    const alpha = registry.open("alpha");
    await registry.dispose();
    registry = null;

    expect(alpha.isClosed).toBe(true);
    expect(transport.listenerCount("alpha")).toBe(0);
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});
