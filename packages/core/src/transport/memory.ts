import type { Message, SessionListing, TranscriptSnapshot } from "@mirrorline/contracts";
import type { TranscriptTransport, Unsubscribe } from "./types.js";

interface MemorySession {
  messages: Message[];
  revision: number;
  forkedFrom?: string;
}

export type MemoryFailureTarget = "revision" | "snapshot";

export type MessagePatch = Partial<Omit<Message, "id">>;

function copyMessage(message: Message): Message {
  return { ...message, images: message.images.map((image) => ({ ...image })) };
}

/**
 * In-process authority. Every mutation bumps the session's revision and
 * notifies watchers synchronously.
 */
export class MemoryTransport implements TranscriptTransport {
  private readonly sessions = new Map<string, MemorySession>();
  private readonly listeners = new Map<string, Set<() => void>>();
  private readonly failures: Record<MemoryFailureTarget, number> = { revision: 0, snapshot: 0 };
  private gate: Promise<void> | null = null;
  private releaseGate: (() => void) | null = null;
  readonly calls: Record<MemoryFailureTarget, number> = { revision: 0, snapshot: 0 };

  createSession(sessionId: string, messages: Message[] = [], forkedFrom?: string): void {
    const session: MemorySession = { messages: messages.map(copyMessage), revision: 1 };
    if (forkedFrom !== undefined) session.forkedFrom = forkedFrom;
    this.sessions.set(sessionId, session);
    this.notify(sessionId);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  messages(sessionId: string): Message[] {
    return this.require(sessionId).messages.map(copyMessage);
  }

  append(sessionId: string, ...messages: Message[]): void {
    const session = this.require(sessionId);
    session.messages.push(...messages.map(copyMessage));
    this.bump(sessionId, session);
  }

  update(sessionId: string, messageId: string, patch: MessagePatch): void {
    const session = this.require(sessionId);
    const index = session.messages.findIndex((message) => message.id === messageId);
    const current = session.messages[index];
    if (!current) {
      throw new Error(`unknown message ${messageId} in session ${sessionId}`);
    }
    session.messages[index] = { ...current, ...patch };
    this.bump(sessionId, session);
  }

  /** Replaces the whole log, as an authority does after an edit it cannot express as a suffix. */
  replace(sessionId: string, messages: Message[]): void {
    const session = this.require(sessionId);
    session.messages = messages.map(copyMessage);
    this.bump(sessionId, session);
  }

  /** Drops every message after `messageId`, which is kept. */
  rollback(sessionId: string, messageId: string): void {
    const session = this.require(sessionId);
    const index = session.messages.findIndex((message) => message.id === messageId);
    if (index < 0) {
      throw new Error(`unknown message ${messageId} in session ${sessionId}`);
    }
    session.messages = session.messages.slice(0, index + 1);
    this.bump(sessionId, session);
  }

  /** Removes the last turn: the final user message and everything after it. */
  undo(sessionId: string): void {
    const session = this.require(sessionId);
    let cut = -1;
    for (let index = session.messages.length - 1; index >= 0; index -= 1) {
      if (session.messages[index]?.kind === "user") {
        cut = index;
        break;
      }
    }
    session.messages = cut < 0 ? [] : session.messages.slice(0, cut);
    this.bump(sessionId, session);
  }

  /** Creates `targetId` holding the source's messages up to and including `atMessageId`. */
  fork(sourceId: string, targetId: string, atMessageId: string): void {
    const source = this.require(sourceId);
    const index = source.messages.findIndex((message) => message.id === atMessageId);
    if (index < 0) {
      throw new Error(`unknown message ${atMessageId} in session ${sourceId}`);
    }
    this.createSession(targetId, source.messages.slice(0, index + 1), sourceId);
  }

  setRevision(sessionId: string, revision: number): void {
    const session = this.require(sessionId);
    session.revision = revision;
    this.notify(sessionId);
  }

  /** The next `count` calls of the given kind reject. */
  failNext(target: MemoryFailureTarget, count = 1): void {
    this.failures[target] += count;
  }

  /** Holds every snapshot read until {@link resumeSnapshots}. */
  pauseSnapshots(): void {
    if (this.gate) return;
    this.gate = new Promise<void>((resolve) => {
      this.releaseGate = resolve;
    });
  }

  resumeSnapshots(): void {
    this.releaseGate?.();
    this.releaseGate = null;
    this.gate = null;
  }

  async getRevision(sessionId: string): Promise<number> {
    this.calls.revision += 1;
    this.consumeFailure("revision", sessionId);
    return this.require(sessionId).revision;
  }

  async getSnapshot(sessionId: string): Promise<TranscriptSnapshot> {
    this.calls.snapshot += 1;
    if (this.gate) await this.gate;
    this.consumeFailure("snapshot", sessionId);
    const session = this.require(sessionId);
    const snapshot: TranscriptSnapshot = {
      messages: session.messages.map(copyMessage),
      revision: session.revision,
    };
    if (session.forkedFrom !== undefined) snapshot.forkedFrom = session.forkedFrom;
    return snapshot;
  }

  watch(sessionId: string, onChange: () => void): Unsubscribe {
    let set = this.listeners.get(sessionId);
    if (!set) {
      set = new Set();
      this.listeners.set(sessionId, set);
    }
    set.add(onChange);
    return () => {
      set.delete(onChange);
    };
  }

  async listSessions(): Promise<SessionListing[]> {
    return Array.from(this.sessions.entries()).map(([sessionId, session]) => {
      const listing: SessionListing = { sessionId, revision: session.revision };
      if (session.forkedFrom !== undefined) listing.forkedFrom = session.forkedFrom;
      return listing;
    });
  }

  listenerCount(sessionId: string): number {
    return this.listeners.get(sessionId)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.listeners.clear();
    this.resumeSnapshots();
  }

  private require(sessionId: string): MemorySession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`unknown session: ${sessionId}`);
    }
    return session;
  }

  private consumeFailure(target: MemoryFailureTarget, sessionId: string): void {
    if (this.failures[target] <= 0) return;
    this.failures[target] -= 1;
    throw new Error(`injected ${target} failure for ${sessionId}`);
  }

  private bump(sessionId: string, session: MemorySession): void {
    session.revision += 1;
    this.notify(sessionId);
  }

  private notify(sessionId: string): void {
    for (const listener of Array.from(this.listeners.get(sessionId) ?? [])) {
      listener();
    }
  }
}
