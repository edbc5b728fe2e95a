import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { FollowState, SessionUpdate, StreamEnvelope, ViewportGeometry, WindowState } from "@mirrorline/contracts";
import {
  asErrorMessage,
  asFiniteNumber,
  asRecord,
  createLogger,
  createTransport,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  mergeConfig,
  saveConfig,
  SessionRegistry,
  setLogLevel,
  type TranscriptSession,
} from "@mirrorline/core";

const log = createLogger("server");
const DEFAULT_HEARTBEAT_MS = 15_000;

export interface CreateServerOptions {
  registry: SessionRegistry;
  configPath?: string;
  heartbeatMs?: number;
}

interface SessionParams {
  id: string;
}

interface ErrorBody {
  ok: false;
  error: string;
}

export function formatSseEvent(envelope: StreamEnvelope): string {
  return `event: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`;
}

/** Reads a viewport report from a request body; null when the bottom distance is missing. */
export function parseViewport(body: unknown): ViewportGeometry | null {
  const raw = asRecord(body);
  const distanceFromBottom = asFiniteNumber(raw.distanceFromBottom);
  if (distanceFromBottom === null) return null;
  const geometry: ViewportGeometry = { distanceFromBottom };
  const distanceFromTop = asFiniteNumber(raw.distanceFromTop);
  if (distanceFromTop !== null) geometry.distanceFromTop = distanceFromTop;
  return geometry;
}

function windowPayload(session: TranscriptSession): Record<string, unknown> {
  return {
    sessionId: session.sessionId,
    messages: session.currentWindow(),
    window: session.windowState(),
    label: session.window.label(),
    nextPageSize: session.window.nextPageSize,
    forkedFrom: session.forkedFromSessionId ?? null,
    revision: session.revision,
  };
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  const registry = options.registry;
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;

  const unknownSession = (reply: FastifyReply, sessionId: string): ErrorBody => {
    reply.code(404);
    return { ok: false, error: `unknown session: ${sessionId}` };
  };

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/config", async () => ({ config: registry.getConfig() }));

  server.post("/api/config", async (request) => {
    const current = registry.getConfig();
    const body = asRecord(request.body);
    const merged = mergeConfig({
      sync: { ...current.sync, ...asRecord(body.sync) },
      follow: { ...current.follow, ...asRecord(body.follow) },
      transport: { ...current.transport, ...asRecord(body.transport) },
      logging: { ...current.logging, ...asRecord(body.logging) },
    });
    await saveConfig(merged, configPath);
    registry.setConfig(merged);
    setLogLevel(merged.logging.level);
    return { config: merged };
  });

  server.get("/api/sessions", async (_request, reply) => {
    if (!registry.transport.listSessions) {
      return { sessions: [], open: registry.openSessionIds() };
    }
    try {
      return { sessions: await registry.transport.listSessions(), open: registry.openSessionIds() };
    } catch (error) {
      reply.code(502);
      return { ok: false, error: asErrorMessage(error) };
    }
  });

  server.post<{ Params: SessionParams }>("/api/sessions/:id/open", async (request) => {
    const from = asRecord(request.body).from;
    const session =
      typeof from === "string" && from ? registry.switchTo(from, request.params.id) : registry.open(request.params.id);
    return { ok: true, sessionId: session.sessionId, loaded: session.isLoaded, window: session.windowState() };
  });

  server.post<{ Params: SessionParams }>("/api/sessions/:id/close", async (request, reply) => {
    if (!registry.close(request.params.id)) return unknownSession(reply, request.params.id);
    return { ok: true };
  });

  server.get<{ Params: SessionParams }>("/api/sessions/:id/window", async (request, reply) => {
    const session = registry.get(request.params.id);
    if (!session) return unknownSession(reply, request.params.id);
    return windowPayload(session);
  });

  server.get<{ Params: SessionParams; Querystring: { current?: string } }>(
    "/api/sessions/:id/turns",
    async (request, reply) => {
      const session = registry.get(request.params.id);
      if (!session) return unknownSession(reply, request.params.id);
      const current = request.query.current?.trim();
      return {
        sessionId: session.sessionId,
        transcript: session.currentTurns({ currentTurnId: current ? current : null }),
      };
    },
  );

  server.get<{ Params: SessionParams & { messageId: string } }>(
    "/api/sessions/:id/metadata/:messageId",
    async (request, reply) => {
      if (!registry.has(request.params.id)) return unknownSession(reply, request.params.id);
      return {
        messageId: request.params.messageId,
        metadata: registry.metadata(request.params.id, request.params.messageId),
      };
    },
  );

  server.post<{ Params: SessionParams }>("/api/sessions/:id/load-more", async (request, reply) => {
    const session = registry.get(request.params.id);
    if (!session) return unknownSession(reply, request.params.id);
    session.loadMore();
    return windowPayload(session);
  });

  server.get<{ Params: SessionParams }>("/api/sessions/:id/follow", async (request, reply) => {
    if (!registry.has(request.params.id)) return unknownSession(reply, request.params.id);
    return {
      isPinned: registry.isPinned(request.params.id),
      unreadCount: registry.unreadCount(request.params.id),
    };
  });

  server.post<{ Params: SessionParams }>("/api/sessions/:id/jump-to-bottom", async (request, reply) => {
    if (!registry.has(request.params.id)) return unknownSession(reply, request.params.id);
    registry.jumpToBottom(request.params.id);
    return { ok: true, ...registry.require(request.params.id).followState() };
  });

  server.post<{ Params: SessionParams }>("/api/sessions/:id/viewport", async (request, reply) => {
    if (!registry.has(request.params.id)) return unknownSession(reply, request.params.id);
    const geometry = parseViewport(request.body);
    if (!geometry) {
      reply.code(400);
      return { ok: false, error: "distanceFromBottom must be a finite number" };
    }
    registry.reportViewport(request.params.id, geometry);
    return { ok: true };
  });

  server.post<{ Params: SessionParams }>("/api/sessions/:id/programmatic-scroll", async (request, reply) => {
    if (!registry.has(request.params.id)) return unknownSession(reply, request.params.id);
    const active = asRecord(request.body).active;
    if (typeof active !== "boolean") {
      reply.code(400);
      return { ok: false, error: "active must be a boolean" };
    }
    registry.setProgrammaticScroll(request.params.id, active);
    return { ok: true };
  });

  server.get<{ Params: SessionParams }>("/api/sessions/:id/stream", async (request, reply) => {
    const sessionId = request.params.id;
    const session = registry.get(sessionId);
    if (!session) return unknownSession(reply, sessionId);

    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    let version = 0;
    const send = (type: StreamEnvelope["type"], payload: unknown): void => {
      const envelope: StreamEnvelope = { id: String(version), type, version, payload };
      version += 1;
      reply.raw.write(formatSseEvent(envelope));
    };

    send("snapshot", { ...windowPayload(session), follow: session.followState() });

    const onUpdate = (updatedId: string, update: SessionUpdate): void => {
      if (updatedId !== sessionId) return;
      const current = registry.get(sessionId);
      send("window_updated", { update, messages: current ? current.currentWindow() : [] });
    };
    const onWindow = (updatedId: string, window: WindowState): void => {
      if (updatedId !== sessionId) return;
      const current = registry.get(sessionId);
      send("window_updated", { window, messages: current ? current.currentWindow() : [] });
    };
    const onFollow = (updatedId: string, follow: FollowState): void => {
      if (updatedId === sessionId) send("follow_updated", follow);
    };
    const heartbeat = setInterval(() => {
      send("heartbeat", { ts: Date.now() });
    }, heartbeatMs);

    let ended = false;
    const end = (): void => {
      if (ended) return;
      ended = true;
      clearInterval(heartbeat);
      registry.off("update", onUpdate);
      registry.off("window", onWindow);
      registry.off("follow", onFollow);
      registry.off("close", onClose);
      reply.raw.end();
    };
    // closing or switching away from the session ends its stream
    const onClose = (closedId: string): void => {
      if (closedId === sessionId) end();
    };

    registry.on("update", onUpdate);
    registry.on("window", onWindow);
    registry.on("follow", onFollow);
    registry.on("close", onClose);
    request.raw.on("close", end);
    return reply;
  });

  server.addHook("onClose", async () => {
    await registry.dispose();
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const host = options.host ?? process.env.MIRRORLINE_HOST ?? "127.0.0.1";
  const port = options.port ?? Number(process.env.MIRRORLINE_PORT ?? "8787");
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;

  const config = await loadConfig(configPath);
  setLogLevel(config.logging.level);
  const registry = new SessionRegistry(createTransport(config.transport), config);
  const server = await createServer({ registry, configPath });

  await server.listen({ host, port });

  process.once("SIGINT", () => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("shutdown failed", { error: asErrorMessage(error) });
        process.exit(1);
      });
  });

  log.info(`listening on http://${host}:${port}`, { transport: config.transport.kind });
}
