import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import fg from "fast-glob";
import type { SessionListing, TranscriptSnapshot } from "@mirrorline/contracts";
import { createLogger } from "../logger.js";
import { parseSnapshot } from "../snapshot.js";
import { asErrorMessage, asFiniteNumber, asRecord, digestRevision, expandHome } from "../utils.js";
import type { TranscriptTransport, Unsubscribe } from "./types.js";

const log = createLogger("file-transport");

const SESSION_FILE_SUFFIX = ".json";

export interface FileTransportOptions {
  directory: string;
  /** chokidar write-stability window; 0 disables it. */
  stabilityMs?: number;
}

/**
 * Sessions stored as `<sessionId>.json` in one directory. The revision is the
 * file's `revision` field, or a digest of its mtime and contents when the file
 * carries none, so a rewrite within the same mtime tick still moves it.
 */
export class FileTransport implements TranscriptTransport {
  readonly directory: string;
  private watcher: FSWatcher | null = null;
  private readonly listeners = new Map<string, Set<() => void>>();

  constructor(private readonly options: FileTransportOptions) {
    this.directory = path.resolve(expandHome(options.directory));
  }

  sessionPath(sessionId: string): string {
    if (!sessionId || sessionId !== path.basename(sessionId) || sessionId.startsWith(".")) {
      throw new Error(`invalid session id: ${sessionId}`);
    }
    return path.join(this.directory, `${sessionId}${SESSION_FILE_SUFFIX}`);
  }

  async getRevision(sessionId: string): Promise<number> {
    const filePath = this.sessionPath(sessionId);
    const text = await readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(text);
    const explicit = asFiniteNumber(asRecord(parsed).revision);
    if (explicit !== null) return explicit;
    const fileStat = await stat(filePath);
    return digestRevision([String(fileStat.mtimeMs), text]);
  }

  async getSnapshot(sessionId: string): Promise<TranscriptSnapshot> {
    return parseSnapshot(await this.readJson(this.sessionPath(sessionId)));
  }

  async listSessions(): Promise<SessionListing[]> {
    const matches = await fg(`*${SESSION_FILE_SUFFIX}`, {
      cwd: this.directory,
      onlyFiles: true,
      dot: false,
      suppressErrors: true,
      followSymbolicLinks: false,
    });

    const listings: SessionListing[] = [];
    for (const match of matches.sort()) {
      const sessionId = match.slice(0, -SESSION_FILE_SUFFIX.length);
      try {
        const snapshot = await this.getSnapshot(sessionId);
        const listing: SessionListing = { sessionId, revision: await this.getRevision(sessionId) };
        if (snapshot.forkedFrom !== undefined) listing.forkedFrom = snapshot.forkedFrom;
        listings.push(listing);
      } catch (error) {
        log.debug("skipping unreadable session file", () => ({ sessionId, error: asErrorMessage(error) }));
      }
    }
    return listings;
  }

  watch(sessionId: string, onChange: () => void): Unsubscribe {
    const target = this.sessionPath(sessionId);
    let set = this.listeners.get(target);
    if (!set) {
      set = new Set();
      this.listeners.set(target, set);
    }
    set.add(onChange);
    this.ensureWatcher();
    return () => {
      set.delete(onChange);
      if (set.size === 0) this.listeners.delete(target);
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
  }

  private async readJson(filePath: string): Promise<unknown> {
    const text = await readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  private ensureWatcher(): void {
    if (this.watcher) return;
    const stabilityMs = this.options.stabilityMs ?? 50;
    this.watcher = chokidar.watch(this.directory, {
      ignoreInitial: true,
      persistent: true,
      followSymlinks: false,
      depth: 0,
      awaitWriteFinish: stabilityMs > 0 ? { stabilityThreshold: stabilityMs, pollInterval: 20 } : false,
    });

    const onDirty = (rawPath: string): void => {
      const listeners = this.listeners.get(path.resolve(rawPath));
      if (!listeners) return;
      for (const listener of Array.from(listeners)) {
        listener();
      }
    };
    this.watcher.on("add", onDirty);
    this.watcher.on("change", onDirty);
    this.watcher.on("unlink", onDirty);
    this.watcher.on("error", (error: unknown) => {
      // revision polling still covers missed events
      log.debug("watcher error", () => ({ directory: this.directory, error: asErrorMessage(error) }));
    });
  }
}
