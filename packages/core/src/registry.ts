import { EventEmitter } from "node:events";
import type {
  AppConfig,
  FollowState,
  GroupedTranscript,
  Message,
  MessageMetadata,
  SessionUpdate,
  ViewportGeometry,
  WindowState,
} from "@mirrorline/contracts";
import type { FlushScheduler } from "./autoFollow.js";
import { createLogger } from "./logger.js";
import { TranscriptSession, type TranscriptSessionOptions } from "./session.js";
import type { TranscriptTransport } from "./transport/types.js";
import type { BuildTurnsOptions } from "./turns.js";

const log = createLogger("registry");

export interface SessionRegistryOptions {
  followSchedule?: FlushScheduler;
  /** Start revision watching on open. Disable for one-shot reads. */
  autoStart?: boolean;
}

/**
 * Owns every open session view. Passed by reference to whatever needs to read
 * a mirror; there is no process-wide session state.
 *
 * Re-emits session events as `update`, `window` and `follow`, each with the
 * session id as the first argument, and emits `close` with the id of every
 * session it closes. Listener count is unbounded: each stream subscriber adds
 * its own.
 */
export class SessionRegistry extends EventEmitter {
  private readonly sessions = new Map<string, TranscriptSession>();

  constructor(
    readonly transport: TranscriptTransport,
    private config: AppConfig,
    private readonly options: SessionRegistryOptions = {},
  ) {
    super();
    this.setMaxListeners(0);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /** Applies to sessions opened afterwards. */
  setConfig(config: AppConfig): void {
    this.config = config;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): TranscriptSession | undefined {
    return this.sessions.get(sessionId);
  }

  require(sessionId: string): TranscriptSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`unknown session: ${sessionId}`);
    }
    return session;
  }

  openSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  open(sessionId: string): TranscriptSession {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const sessionOptions: TranscriptSessionOptions = { config: this.config };
    if (this.options.followSchedule) sessionOptions.followSchedule = this.options.followSchedule;
    const session = new TranscriptSession(sessionId, this.transport, sessionOptions);
    session.on("update", (update: SessionUpdate) => this.emit("update", sessionId, update));
    session.on("window", (state: WindowState) => this.emit("window", sessionId, state));
    session.on("follow", (state: FollowState) => this.emit("follow", sessionId, state));
    this.sessions.set(sessionId, session);
    log.debug("opened session", () => ({ sessionId }));

    if (this.options.autoStart ?? true) {
      session.start();
    }
    return session;
  }

  close(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.sessions.delete(sessionId);
    session.close();
    log.debug("closed session", () => ({ sessionId }));
    this.emit("close", sessionId);
    return true;
  }

  /**
   * Moves a view from one session to another. The previous session's loop is
   * cancelled before the next one is created.
   */
  switchTo(previousSessionId: string | null, nextSessionId: string): TranscriptSession {
    if (previousSessionId !== null && previousSessionId !== nextSessionId) {
      this.close(previousSessionId);
    }
    return this.open(nextSessionId);
  }

  closeAll(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.close(sessionId);
    }
  }

  async dispose(): Promise<void> {
    this.closeAll();
    this.removeAllListeners();
    await this.transport.close?.();
  }

  currentWindow(sessionId: string): Message[] {
    return this.require(sessionId).currentWindow();
  }

  currentTurns(sessionId: string, options: BuildTurnsOptions = {}): GroupedTranscript {
    return this.require(sessionId).currentTurns(options);
  }

  metadata(sessionId: string, messageId: string): MessageMetadata {
    return this.require(sessionId).metadata(messageId);
  }

  windowState(sessionId: string): WindowState {
    return this.require(sessionId).windowState();
  }

  loadMore(sessionId: string): WindowState {
    return this.require(sessionId).loadMore();
  }

  isPinned(sessionId: string): boolean {
    return this.require(sessionId).follow.isPinned;
  }

  unreadCount(sessionId: string): number {
    return this.require(sessionId).follow.unreadCount;
  }

  jumpToBottom(sessionId: string): void {
    this.require(sessionId).jumpToBottom();
  }

  reportViewport(sessionId: string, geometry: ViewportGeometry): void {
    this.require(sessionId).reportViewport(geometry);
  }

  /** Marks the start (`true`) or end (`false`) of a scroll the client performs itself. */
  setProgrammaticScroll(sessionId: string, active: boolean): void {
    const session = this.require(sessionId);
    if (active) {
      session.beginProgrammaticScroll();
    } else {
      session.endProgrammaticScroll();
    }
  }
}
