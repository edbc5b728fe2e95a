import type { Message, ReconcilePath, WindowState } from "@mirrorline/contracts";
import { createLogger } from "./logger.js";

const log = createLogger("window");

/**
 * Tracks how many trailing mirror messages are exposed to rendering. The count
 * only grows while a session is viewed; `reset()` is the session-switch path.
 */
export class TranscriptWindow {
  private displayed = 0;
  private total = 0;
  private desyncReported = false;

  constructor(readonly pageSize: number) {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new Error(`page size must be a positive integer, got ${pageSize}`);
    }
  }

  get displayedCount(): number {
    return this.displayed;
  }

  get hasMore(): boolean {
    return this.displayed < this.total;
  }

  /** Size of the next `loadMore()` step. */
  get nextPageSize(): number {
    return Math.min(this.pageSize, this.total - this.displayed);
  }

  reset(): void {
    this.displayed = 0;
    this.total = 0;
    this.desyncReported = false;
  }

  /** Applies the outcome of a reconciliation pass. */
  apply(path: ReconcilePath, appended: number, total: number): void {
    if (path === "noop") {
      this.total = total;
      return;
    }
    if (path === "append") {
      this.displayed = Math.min(this.displayed + appended, total);
    } else {
      this.displayed = Math.min(Math.max(this.displayed, this.pageSize), total);
    }
    this.total = total;
  }

  loadMore(): number {
    this.displayed = Math.min(this.displayed + this.pageSize, this.total);
    return this.displayed;
  }

  visible(mirror: Message[]): Message[] {
    const count = Math.min(this.displayed, mirror.length);
    const slice = count > 0 ? mirror.slice(mirror.length - count) : [];
    if (slice.length === 0 && mirror.length > 0) {
      if (!this.desyncReported) {
        this.desyncReported = true;
        log.warn("window empty for a non-empty mirror; exposing all messages", {
          displayedCount: this.displayed,
          total: mirror.length,
        });
      }
      return mirror.slice();
    }
    return slice;
  }

  state(): WindowState {
    return {
      displayedCount: this.displayed,
      total: this.total,
      hasMore: this.hasMore,
    };
  }

  label(): string {
    return `Showing ${Math.min(this.displayed, this.total)} of ${this.total} messages`;
  }
}
