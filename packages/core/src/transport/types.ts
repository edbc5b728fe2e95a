import type { SessionListing, TranscriptSnapshot } from "@mirrorline/contracts";

export type Unsubscribe = () => void;

/**
 * Connection to the authority that owns a session's transcript. Both reads
 * are side-effect free; the engine may call them as often as it likes.
 */
export interface TranscriptTransport {
  getRevision(sessionId: string): Promise<number>;
  getSnapshot(sessionId: string): Promise<TranscriptSnapshot>;
  /** Push notification that the revision may have moved. */
  watch?(sessionId: string, onChange: () => void): Unsubscribe;
  listSessions?(): Promise<SessionListing[]>;
  close?(): Promise<void>;
}
