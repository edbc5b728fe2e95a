import { EventEmitter } from "node:events";
import type { TranscriptTransport, Unsubscribe } from "./transport/types.js";
import { createLogger } from "./logger.js";
import { asErrorMessage } from "./utils.js";

const log = createLogger("revision");

export interface RevisionWatcherOptions {
  pollIntervalMs: number;
}

/**
 * Observes a session's revision counter and emits `change` once per observed
 * difference. A lower value counts as a change; the authority may reset its
 * counter on rollback.
 *
 * Transport pushes emit `push` before the poll they trigger; a push may carry a
 * change the revision value does not show.
 */
export class RevisionWatcher extends EventEmitter {
  private lastRevision: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private unsubscribe: Unsubscribe | null = null;
  private pollInFlight = false;
  private pollPending = false;
  private started = false;

  constructor(
    private readonly transport: TranscriptTransport,
    readonly sessionId: string,
    private readonly options: RevisionWatcherOptions,
  ) {
    super();
  }

  get revision(): number | null {
    return this.lastRevision;
  }

  /** Records a revision value and signals if it differs from the last one. */
  observe(revision: number): boolean {
    if (this.lastRevision === revision) return false;
    const previous = this.lastRevision;
    this.lastRevision = revision;
    log.debug("revision changed", () => ({ sessionId: this.sessionId, previous, revision }));
    this.emit("change", revision);
    return true;
  }

  /** Forgets the last revision so the next observation signals again. */
  invalidate(): void {
    this.lastRevision = null;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    if (this.transport.watch) {
      this.unsubscribe = this.transport.watch(this.sessionId, () => {
        if (!this.started) return;
        this.emit("push");
        void this.poll();
      });
    }
    void this.poll();
  }

  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.removeAllListeners();
  }

  async poll(): Promise<void> {
    if (!this.started) return;
    if (this.pollInFlight) {
      this.pollPending = true;
      return;
    }
    this.pollInFlight = true;
    try {
      this.pollPending = false;
      const revision = await this.transport.getRevision(this.sessionId);
      if (this.started) this.observe(revision);
    } catch (error) {
      log.debug("revision poll failed", () => ({ sessionId: this.sessionId, error: asErrorMessage(error) }));
    } finally {
      this.pollInFlight = false;
      if (this.started) {
        this.scheduleNextPoll(this.pollPending ? 0 : this.options.pollIntervalMs);
      }
    }
  }

  private scheduleNextPoll(delayMs: number): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.poll();
    }, Math.max(0, delayMs));
  }
}
