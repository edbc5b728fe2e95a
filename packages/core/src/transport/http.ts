import type { SessionListing, TranscriptSnapshot } from "@mirrorline/contracts";
import { parseRevision, parseSnapshot } from "../snapshot.js";
import { asArray, asFiniteNumber, asRecord, asString } from "../utils.js";
import type { TranscriptTransport } from "./types.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  fetch?: FetchLike;
}

/**
 * Reads an authority over HTTP:
 * `GET {baseUrl}/sessions/:id/revision`, `GET {baseUrl}/sessions/:id/messages`
 * and `GET {baseUrl}/sessions`.
 */
export class HttpTransport implements TranscriptTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async getRevision(sessionId: string): Promise<number> {
    return parseRevision(await this.fetchJson(this.sessionUrl(sessionId, "revision")));
  }

  async getSnapshot(sessionId: string): Promise<TranscriptSnapshot> {
    return parseSnapshot(await this.fetchJson(this.sessionUrl(sessionId, "messages")));
  }

  async listSessions(): Promise<SessionListing[]> {
    const body = await this.fetchJson(`${this.baseUrl}/sessions`);
    const entries = Array.isArray(body) ? body : asArray(asRecord(body).sessions);
    const listings: SessionListing[] = [];
    for (const entry of entries) {
      const raw = asRecord(entry);
      const sessionId = asString(raw.sessionId ?? raw.id).trim();
      if (!sessionId) continue;
      const listing: SessionListing = { sessionId, revision: asFiniteNumber(raw.revision) ?? 0 };
      const forkedFrom = asString(raw.forkedFrom).trim();
      if (forkedFrom) listing.forkedFrom = forkedFrom;
      listings.push(listing);
    }
    return listings;
  }

  private sessionUrl(sessionId: string, resource: string): string {
    return `${this.baseUrl}/sessions/${encodeURIComponent(sessionId)}/${resource}`;
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.options.requestTimeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    const body: unknown = await response.json();
    return body;
  }
}
