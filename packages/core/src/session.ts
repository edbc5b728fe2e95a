import { EventEmitter } from "node:events";
import type {
  AppConfig,
  FollowState,
  GroupedTranscript,
  Message,
  MessageMetadata,
  SessionUpdate,
  TranscriptSnapshot,
  ViewportGeometry,
  WindowState,
} from "@mirrorline/contracts";
import { AutoFollowController, type AutoFollowOptions, type FlushScheduler } from "./autoFollow.js";
import { createLogger } from "./logger.js";
import { computeMessageMetadata, metadataFor } from "./metadata.js";
import { reconcile, type ReconcileResult } from "./reconcile.js";
import { RefreshScheduler } from "./refreshScheduler.js";
import { RevisionWatcher } from "./revisionWatcher.js";
import type { TranscriptTransport } from "./transport/types.js";
import { groupTranscript, type BuildTurnsOptions } from "./turns.js";
import { asErrorMessage } from "./utils.js";
import { TranscriptWindow } from "./window.js";

const log = createLogger("session");

export interface TranscriptSessionOptions {
  config: AppConfig;
  /** Overrides how auto-follow defers geometry processing. */
  followSchedule?: FlushScheduler;
}

/**
 * One viewed session: the mirror, its window, and the loop that keeps both in
 * step with the authority. The scheduler's pass is the only writer.
 *
 * Emits `update` ({@link SessionUpdate}) after every pass that changed
 * something, `window` after `loadMore`, and `follow` ({@link FollowState}).
 */
export class TranscriptSession extends EventEmitter {
  readonly window: TranscriptWindow;
  readonly follow: AutoFollowController;
  private readonly watcher: RevisionWatcher;
  private readonly scheduler: RefreshScheduler;
  private mirror: Message[] = [];
  private visibleMessages: Message[] = [];
  private metadataById = new Map<string, MessageMetadata>();
  private forkedFrom: string | undefined;
  private appliedRevision: number | null = null;
  private loaded = false;
  private closed = false;

  constructor(
    readonly sessionId: string,
    private readonly transport: TranscriptTransport,
    options: TranscriptSessionOptions,
  ) {
    super();
    const { sync, follow } = options.config;
    this.window = new TranscriptWindow(sync.pageSize);
    const followOptions: AutoFollowOptions = {
      ...follow,
      hasMore: () => this.window.hasMore,
    };
    if (options.followSchedule) followOptions.schedule = options.followSchedule;
    this.follow = new AutoFollowController(followOptions);
    this.follow.on("change", (state: FollowState) => this.emit("follow", state));
    this.follow.on("loadMore", () => {
      this.loadMore();
    });

    this.watcher = new RevisionWatcher(transport, sessionId, { pollIntervalMs: sync.revisionPollMs });
    this.scheduler = new RefreshScheduler((signal) => this.runPass(signal), sync.cadenceMs);
    this.watcher.on("change", () => this.scheduler.signal());
    this.watcher.on("push", () => this.scheduler.signal());
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Revision of the last applied snapshot, or the last polled one when the snapshot carried none. */
  get revision(): number | null {
    return this.appliedRevision ?? this.watcher.revision;
  }

  get forkedFromSessionId(): string | undefined {
    return this.forkedFrom;
  }

  /** Starts watching the revision counter; the first observation loads the mirror. */
  start(): void {
    if (this.closed) return;
    this.watcher.start();
  }

  /** Runs (or joins) a pass and resolves when the loop has gone idle. */
  async syncOnce(): Promise<void> {
    this.scheduler.signal();
    await this.scheduler.idle();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.watcher.stop();
    this.scheduler.cancel();
    this.follow.dispose();
    this.mirror = [];
    this.visibleMessages = [];
    this.metadataById = new Map();
    this.appliedRevision = null;
    this.window.reset();
    this.emit("close", this.sessionId);
    this.removeAllListeners();
  }

  messages(): readonly Message[] {
    return this.mirror;
  }

  currentWindow(): Message[] {
    return this.visibleMessages.slice();
  }

  currentTurns(options: BuildTurnsOptions = {}): GroupedTranscript {
    return groupTranscript(this.visibleMessages, options);
  }

  metadata(messageId: string): MessageMetadata {
    return metadataFor(this.metadataById, messageId);
  }

  windowState(): WindowState {
    return this.window.state();
  }

  followState(): FollowState {
    return this.follow.state();
  }

  loadMore(): WindowState {
    if (this.closed) return this.window.state();
    const before = this.window.displayedCount;
    this.window.loadMore();
    if (this.window.displayedCount !== before) {
      this.refreshDerived();
      this.follow.noteHistoryLoaded();
      this.emit("window", this.window.state());
    }
    return this.window.state();
  }

  reportViewport(geometry: ViewportGeometry): void {
    this.follow.reportGeometry(geometry);
  }

  jumpToBottom(): void {
    this.follow.jumpToBottom();
  }

  /** Viewport reports are ignored until the matching `endProgrammaticScroll()`. */
  beginProgrammaticScroll(): void {
    this.follow.beginProgrammaticScroll();
  }

  endProgrammaticScroll(): void {
    this.follow.endProgrammaticScroll();
  }

  /**
   * Reconciles a fetched snapshot into the mirror. Synchronous: the fetch is
   * already done by the time this runs.
   */
  private applySnapshot(snapshot: TranscriptSnapshot): ReconcileResult {
    const result = reconcile(this.mirror, snapshot.messages);
    if (result.dedupedCount > 0) {
      log.warn("snapshot contained duplicate message ids; keeping the last of each", {
        sessionId: this.sessionId,
        dropped: result.dedupedCount,
      });
    }

    this.appliedRevision = snapshot.revision ?? this.watcher.revision;
    const forkChanged = snapshot.forkedFrom !== this.forkedFrom;
    this.forkedFrom = snapshot.forkedFrom;
    const firstLoad = !this.loaded;
    this.loaded = true;

    if (result.path === "noop" && !forkChanged && !firstLoad) {
      return result;
    }

    this.mirror = result.messages;
    this.window.apply(result.path, result.appended, this.mirror.length);
    this.refreshDerived();
    this.follow.observeMessageCount(this.mirror.length);

    log.debug("reconciled", () => ({
      sessionId: this.sessionId,
      path: result.path,
      appended: result.appended,
      patched: result.patched,
      total: this.mirror.length,
    }));

    const update: SessionUpdate = {
      sessionId: this.sessionId,
      path: result.path,
      revision: this.revision,
      window: this.window.state(),
    };
    if (this.forkedFrom !== undefined) update.forkedFrom = this.forkedFrom;
    this.emit("update", update);
    return result;
  }

  private refreshDerived(): void {
    this.visibleMessages = this.window.visible(this.mirror);
    this.metadataById = computeMessageMetadata(this.visibleMessages);
  }

  private async runPass(signal: AbortSignal): Promise<void> {
    let snapshot: TranscriptSnapshot;
    try {
      snapshot = await this.transport.getSnapshot(this.sessionId);
    } catch (error) {
      // the mirror stays as it is; forgetting the revision makes the next poll retry
      this.watcher.invalidate();
      log.debug("snapshot fetch failed", () => ({ sessionId: this.sessionId, error: asErrorMessage(error) }));
      return;
    }
    if (signal.aborted || this.closed) return;
    this.applySnapshot(snapshot);
  }
}
