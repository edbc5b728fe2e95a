import { EventEmitter } from "node:events";
import type { FollowConfig, FollowState, ViewportGeometry } from "@mirrorline/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";

export type FlushScheduler = (flush: () => void) => void;

export interface AutoFollowOptions extends Partial<FollowConfig> {
  /** Defers geometry processing; defaults to once per event-loop tick. */
  schedule?: FlushScheduler;
  /** Whether older history can still be paged in. */
  hasMore?: () => boolean;
}

const nextTick: FlushScheduler = (flush) => {
  setImmediate(flush);
};

/**
 * Pinned/unpinned hysteresis for the transcript viewport. Geometry reports are
 * coalesced; only the latest report of a tick is evaluated.
 *
 * Emits `change` with a {@link FollowState} and `loadMore` when the viewport
 * nears the top while older history exists.
 */
export class AutoFollowController extends EventEmitter {
  readonly unpinThreshold: number;
  readonly repinThreshold: number;
  readonly loadMoreThreshold: number;
  private readonly schedule: FlushScheduler;
  private readonly hasMore: () => boolean;
  private pinned = true;
  private unread = 0;
  private lastMessageCount: number | null = null;
  private pendingGeometry: ViewportGeometry | null = null;
  private flushScheduled = false;
  private programmaticDepth = 0;
  private loadMoreRequested = false;
  private disposed = false;

  constructor(options: AutoFollowOptions = {}) {
    super();
    const defaults = DEFAULT_CONFIG.follow;
    this.unpinThreshold = options.unpinThreshold ?? defaults.unpinThreshold;
    this.repinThreshold = Math.min(this.unpinThreshold, options.repinThreshold ?? defaults.repinThreshold);
    this.loadMoreThreshold = options.loadMoreThreshold ?? defaults.loadMoreThreshold;
    this.schedule = options.schedule ?? nextTick;
    this.hasMore = options.hasMore ?? (() => false);
  }

  get isPinned(): boolean {
    return this.pinned;
  }

  get unreadCount(): number {
    return this.unread;
  }

  state(): FollowState {
    return { isPinned: this.pinned, unreadCount: this.unread };
  }

  reportGeometry(geometry: ViewportGeometry): void {
    if (this.disposed || this.programmaticDepth > 0) return;
    this.pendingGeometry = geometry;
    if (this.flushScheduled) return;
    this.flushScheduled = true;
    this.schedule(() => this.flush());
  }

  /** Processes the latest pending geometry report immediately. */
  flush(): void {
    this.flushScheduled = false;
    const geometry = this.pendingGeometry;
    this.pendingGeometry = null;
    if (!geometry || this.disposed) return;

    if (this.pinned) {
      if (geometry.distanceFromBottom >= this.unpinThreshold) {
        this.pinned = false;
        this.emitChange();
      }
    } else if (geometry.distanceFromBottom <= this.repinThreshold) {
      this.pinned = true;
      this.unread = 0;
      this.emitChange();
    }

    if (
      geometry.distanceFromTop !== undefined &&
      geometry.distanceFromTop <= this.loadMoreThreshold &&
      !this.loadMoreRequested &&
      this.hasMore()
    ) {
      this.loadMoreRequested = true;
      this.emit("loadMore");
    }
  }

  /** Feeds the latest mirror size; growth while unpinned becomes unread. */
  observeMessageCount(count: number): void {
    const previous = this.lastMessageCount;
    this.lastMessageCount = count;
    if (previous === null || count === previous) return;
    this.loadMoreRequested = false;
    if (count > previous && !this.pinned) {
      this.unread += count - previous;
      this.emitChange();
    }
  }

  /** Window grew without new messages (history paged in). */
  noteHistoryLoaded(): void {
    this.loadMoreRequested = false;
  }

  jumpToBottom(): void {
    const changed = !this.pinned || this.unread !== 0;
    this.pinned = true;
    this.unread = 0;
    this.pendingGeometry = null;
    if (changed) this.emitChange();
  }

  /** Geometry reported between begin/end comes from our own scrolling and is ignored. */
  beginProgrammaticScroll(): void {
    this.programmaticDepth += 1;
  }

  endProgrammaticScroll(): void {
    this.programmaticDepth = Math.max(0, this.programmaticDepth - 1);
  }

  dispose(): void {
    this.disposed = true;
    this.pendingGeometry = null;
    this.removeAllListeners();
  }

  private emitChange(): void {
    this.emit("change", this.state());
  }
}
