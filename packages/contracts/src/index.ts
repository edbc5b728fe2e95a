export type MessageKind = "user" | "assistant" | "tool" | "thinking" | "steer" | "shell";

export type ReconcilePath = "noop" | "append" | "replace";
export type TurnStatus = "active" | "completed" | "failed";
export type TransportKind = "http" | "file";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface MessageImage {
  id: string;
  mimeType: string;
  data: string;
}

export interface Message {
  id: string;
  kind: MessageKind;
  content: string;
  toolName?: string;
  toolOutput?: string;
  toolDuration?: number;
  inputTokens?: number;
  outputTokens?: number;
  thinking?: string;
  images: MessageImage[];
  isInProgress: boolean;
  timestampMs?: number;
}

export interface TranscriptSnapshot {
  messages: Message[];
  forkedFrom?: string;
  revision?: number;
}

export interface TurnDiff {
  turnId: string;
  diff: string;
}

export interface Turn {
  id: string;
  turnNumber: number;
  anchor: Message | null;
  messages: Message[];
  toolsUsed: string[];
  status: TurnStatus;
  diff?: string;
  inputTokens: number;
  outputTokens: number;
}

export type GroupedTranscript =
  | { mode: "turns"; turns: Turn[] }
  | { mode: "flat"; messages: Message[] };

export interface MessageMetadata {
  turnsAfter: number | null;
  nthUserMessage: number | null;
}

export interface WindowState {
  displayedCount: number;
  total: number;
  hasMore: boolean;
}

export interface FollowState {
  isPinned: boolean;
  unreadCount: number;
}

export interface ViewportGeometry {
  distanceFromBottom: number;
  distanceFromTop?: number;
}

export interface SessionListing {
  sessionId: string;
  revision: number;
  forkedFrom?: string;
}

export interface SyncConfig {
  cadenceMs: number;
  pageSize: number;
  revisionPollMs: number;
}

export interface FollowConfig {
  unpinThreshold: number;
  repinThreshold: number;
  loadMoreThreshold: number;
}

export interface TransportConfig {
  kind: TransportKind;
  baseUrl: string;
  directory: string;
  requestTimeoutMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  sync: SyncConfig;
  follow: FollowConfig;
  transport: TransportConfig;
  logging: LoggingConfig;
}

export interface SessionUpdate {
  sessionId: string;
  path: ReconcilePath;
  revision: number | null;
  window: WindowState;
  forkedFrom?: string;
}

export interface StreamEnvelope {
  id: string;
  type: "snapshot" | "window_updated" | "follow_updated" | "heartbeat";
  version: number;
  payload: unknown;
}
