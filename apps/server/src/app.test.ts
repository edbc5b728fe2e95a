import { mkdtemp, readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import type { Message, WindowState } from "@mirrorline/contracts";
import { MemoryTransport, mergeConfig, SessionRegistry, type FlushScheduler } from "@mirrorline/core";
import { createServer, formatSseEvent, parseViewport } from "./app.js";

const immediate: FlushScheduler = (flush) => flush();

function message(id: string, kind: Message["kind"], content: string): Message {
  return { id, kind, content, images: [], isInProgress: false };
}

interface Fixture {
  server: FastifyInstance;
  registry: SessionRegistry;
  transport: MemoryTransport;
  configPath: string;
}

async function createFixture(): Promise<Fixture> {
  const transport = new MemoryTransport();
  transport.createSession("s1", [
    message("u1", "user", "list files"),
    message("a1", "assistant", "here they are"),
    message("u2", "user", "thanks"),
  ]);
  transport.createSession("s2", [message("x1", "user", "other")]);
  const config = mergeConfig({ sync: { cadenceMs: 10, pageSize: 2 } });
  const registry = new SessionRegistry(transport, config, { followSchedule: immediate, autoStart: false });
  const root = await mkdtemp(path.join(os.tmpdir(), "mirrorline-server-"));
  const configPath = path.join(root, "config.toml");
  const server = await createServer({ registry, configPath });
  return { server, registry, transport, configPath };
}

describe("server api", () => {
  let fixture: Fixture | null = null;

  afterEach(async () => {
    await fixture?.server.close();
    fixture = null;
  });

  it("reports liveness and lists the authority's sessions", async () => {
    fixture = await createFixture();
    const health = await fixture.server.inject({ method: "GET", url: "/api/healthz" });
    expect(health.json()).toEqual({ ok: true });

    const sessions = await fixture.server.inject({ method: "GET", url: "/api/sessions" });
    expect(sessions.statusCode).toBe(200);
    expect(sessions.json()).toEqual({
      sessions: [
        { sessionId: "s1", revision: 1 },
        { sessionId: "s2", revision: 1 },
      ],
      open: [],
    });
  });

  it("opens a session and serves its window, turns, and metadata", async () => {
    fixture = await createFixture();
    const open = await fixture.server.inject({ method: "POST", url: "/api/sessions/s1/open" });
    expect(open.json()).toEqual({
      ok: true,
      sessionId: "s1",
      loaded: false,
      window: { displayedCount: 0, total: 0, hasMore: false },
    });
    await fixture.registry.require("s1").syncOnce();

    const windowRes = await fixture.server.inject({ method: "GET", url: "/api/sessions/s1/window" });
    expect(windowRes.statusCode).toBe(200);
    const payload = windowRes.json<{
      messages: Message[];
      window: WindowState;
      label: string;
      nextPageSize: number;
      forkedFrom: string | null;
      revision: number | null;
    }>();
    expect(payload.messages.map((entry) => entry.id)).toEqual(["a1", "u2"]);
    expect(payload.window).toEqual({ displayedCount: 2, total: 3, hasMore: true });
    expect(payload.label).toBe("Showing 2 of 3 messages");
    expect(payload.nextPageSize).toBe(1);
    expect(payload.revision).toBe(1);
    expect(payload.forkedFrom).toBeNull();

    const turns = await fixture.server.inject({ method: "GET", url: "/api/sessions/s1/turns?current=live-1" });
    const grouped = turns.json<{ transcript: { mode: string; turns: Array<{ id: string; status: string }> } }>();
    expect(grouped.transcript.mode).toBe("turns");
    expect(grouped.transcript.turns.map((turn) => [turn.id, turn.status])).toEqual([
      ["turn-origin", "completed"],
      ["turn-u2", "active"],
    ]);

    const metadata = await fixture.server.inject({ method: "GET", url: "/api/sessions/s1/metadata/u2" });
    expect(metadata.json()).toEqual({ messageId: "u2", metadata: { turnsAfter: 0, nthUserMessage: 0 } });
  });

  it("pages in history on load-more", async () => {
    fixture = await createFixture();
    fixture.registry.open("s1");
    await fixture.registry.require("s1").syncOnce();

    const res = await fixture.server.inject({ method: "POST", url: "/api/sessions/s1/load-more" });
    const payload = res.json<{ messages: Message[]; window: WindowState; nextPageSize: number }>();
    expect(payload.window).toEqual({ displayedCount: 3, total: 3, hasMore: false });
    expect(payload.nextPageSize).toBe(0);
    expect(payload.messages.map((entry) => entry.id)).toEqual(["u1", "a1", "u2"]);
  });

  it("tracks the follow state from viewport reports", async () => {
    fixture = await createFixture();
    fixture.registry.open("s1");

    const report = await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s1/viewport",
      payload: { distanceFromBottom: 640 },
    });
    expect(report.json()).toEqual({ ok: true });

    const follow = await fixture.server.inject({ method: "GET", url: "/api/sessions/s1/follow" });
    expect(follow.json()).toEqual({ isPinned: false, unreadCount: 0 });

    const jump = await fixture.server.inject({ method: "POST", url: "/api/sessions/s1/jump-to-bottom" });
    expect(jump.json()).toEqual({ ok: true, isPinned: true, unreadCount: 0 });
  });

  it("ignores viewport reports between programmatic scroll markers", async () => {
    fixture = await createFixture();
    fixture.registry.open("s1");

    const begin = await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s1/programmatic-scroll",
      payload: { active: true },
    });
    expect(begin.json()).toEqual({ ok: true });
    await fixture.server.inject({ method: "POST", url: "/api/sessions/s1/viewport", payload: { distanceFromBottom: 640 } });
    expect(fixture.registry.isPinned("s1")).toBe(true);

    await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s1/programmatic-scroll",
      payload: { active: false },
    });
    await fixture.server.inject({ method: "POST", url: "/api/sessions/s1/viewport", payload: { distanceFromBottom: 640 } });
    expect(fixture.registry.isPinned("s1")).toBe(false);

    const invalid = await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s1/programmatic-scroll",
      payload: { active: "yes" },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ ok: false, error: "active must be a boolean" });
  });

  it("ends a session's stream when the session is closed", async () => {
    fixture = await createFixture();
    const registry = fixture.registry;
    registry.open("s1");

    const pending = fixture.server.inject({ method: "GET", url: "/api/sessions/s1/stream" });
    await expect.poll(() => registry.listenerCount("close")).toBe(1);
    registry.close("s1");
    const res = await pending;

    expect(res.headers["content-type"]).toBe("text/event-stream; charset=utf-8");
    expect(res.payload.startsWith("event: snapshot\n")).toBe(true);
    expect(registry.listenerCount("update")).toBe(0);
    expect(registry.listenerCount("close")).toBe(0);
  });

  it("rejects a viewport report without a bottom distance", async () => {
    fixture = await createFixture();
    fixture.registry.open("s1");
    const res = await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s1/viewport",
      payload: { distanceFromTop: 3 },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: "distanceFromBottom must be a finite number" });
  });

  it("answers 404 for sessions that are not open", async () => {
    fixture = await createFixture();
    const windowRes = await fixture.server.inject({ method: "GET", url: "/api/sessions/ghost/window" });
    expect(windowRes.statusCode).toBe(404);
    expect(windowRes.json()).toEqual({ ok: false, error: "unknown session: ghost" });

    const close = await fixture.server.inject({ method: "POST", url: "/api/sessions/ghost/close" });
    expect(close.statusCode).toBe(404);

    const stream = await fixture.server.inject({ method: "GET", url: "/api/sessions/ghost/stream" });
    expect(stream.statusCode).toBe(404);
  });

  it("switches sessions when opened with a previous session", async () => {
    fixture = await createFixture();
    const first = fixture.registry.open("s1");

    const res = await fixture.server.inject({
      method: "POST",
      url: "/api/sessions/s2/open",
      payload: { from: "s1" },
    });

    expect(res.json()).toMatchObject({ ok: true, sessionId: "s2" });
    expect(first.isClosed).toBe(true);
    expect(fixture.registry.openSessionIds()).toEqual(["s2"]);
  });

  it("merges and persists config updates", async () => {
    fixture = await createFixture();
    const res = await fixture.server.inject({
      method: "POST",
      url: "/api/config",
      payload: { sync: { pageSize: 7 } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json<{ config: { sync: { pageSize: number; cadenceMs: number } } }>().config.sync).toMatchObject({
      pageSize: 7,
      cadenceMs: 10,
    });
    expect(fixture.registry.getConfig().sync.pageSize).toBe(7);
    expect(await readFile(fixture.configPath, "utf8")).toContain("pageSize = 7");

    const current = await fixture.server.inject({ method: "GET", url: "/api/config" });
    expect(current.json<{ config: { sync: { pageSize: number } } }>().config.sync.pageSize).toBe(7);
  });
});

describe("stream helpers", () => {
  it("formats an envelope as a server-sent event", () => {
    expect(formatSseEvent({ id: "3", type: "heartbeat", version: 3, payload: { ts: 1 } })).toBe(
      'event: heartbeat\ndata: {"id":"3","type":"heartbeat","version":3,"payload":{"ts":1}}\n\n',
    );
  });

  it("parses viewport bodies", () => {
    expect(parseViewport({ distanceFromBottom: 12, distanceFromTop: 4 })).toEqual({
      distanceFromBottom: 12,
      distanceFromTop: 4,
    });
    expect(parseViewport({ distanceFromBottom: 12, distanceFromTop: "far" })).toEqual({ distanceFromBottom: 12 });
    expect(parseViewport(null)).toBeNull();
  });
});
