import type { Message, MessageImage, MessageKind, TranscriptSnapshot } from "@mirrorline/contracts";
import { asArray, asFiniteNumber, asRecord, asString } from "./utils.js";

const MESSAGE_KINDS: readonly MessageKind[] = ["user", "assistant", "tool", "thinking", "steer", "shell"];

function isMessageKind(value: string): value is MessageKind {
  return MESSAGE_KINDS.some((kind) => kind === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function parseImage(value: unknown, index: number): MessageImage | null {
  const raw = asRecord(value);
  const data = asString(raw.data);
  if (!data) return null;
  return {
    id: asString(raw.id) || `image-${index}`,
    mimeType: asString(raw.mimeType) || "application/octet-stream",
    data,
  };
}

/**
 * Normalizes one message from an authority payload. Returns null for entries
 * without an id or with a kind outside the closed set.
 */
export function parseMessage(value: unknown): Message | null {
  const raw = asRecord(value);
  const id = asString(raw.id).trim();
  const kind = asString(raw.kind ?? raw.type).trim().toLowerCase();
  if (!id || !isMessageKind(kind)) {
    return null;
  }

  const message: Message = {
    id,
    kind,
    content: typeof raw.content === "string" ? raw.content : asString(raw.content),
    images: asArray(raw.images)
      .map(parseImage)
      .filter((image): image is MessageImage => image !== null),
    isInProgress: raw.isInProgress === true,
  };

  const toolName = optionalString(raw.toolName);
  if (toolName !== undefined) message.toolName = toolName;
  const toolOutput = optionalString(raw.toolOutput);
  if (toolOutput !== undefined) message.toolOutput = toolOutput;
  const toolDuration = asFiniteNumber(raw.toolDuration);
  if (toolDuration !== null) message.toolDuration = toolDuration;
  const inputTokens = asFiniteNumber(raw.inputTokens);
  if (inputTokens !== null) message.inputTokens = inputTokens;
  const outputTokens = asFiniteNumber(raw.outputTokens);
  if (outputTokens !== null) message.outputTokens = outputTokens;
  const thinking = optionalString(raw.thinking);
  if (thinking !== undefined) message.thinking = thinking;
  const timestampMs = asFiniteNumber(raw.timestampMs);
  if (timestampMs !== null) message.timestampMs = timestampMs;

  return message;
}

export function parseSnapshot(value: unknown): TranscriptSnapshot {
  const raw: Record<string, unknown> = Array.isArray(value) ? { messages: value } : asRecord(value);
  const snapshot: TranscriptSnapshot = {
    messages: asArray(raw.messages)
      .map(parseMessage)
      .filter((message): message is Message => message !== null),
  };
  const forkedFrom = asString(raw.forkedFrom).trim();
  if (forkedFrom) snapshot.forkedFrom = forkedFrom;
  const revision = asFiniteNumber(raw.revision);
  if (revision !== null) snapshot.revision = revision;
  return snapshot;
}

export function parseRevision(value: unknown): number {
  const direct = asFiniteNumber(value);
  if (direct !== null) return direct;
  const nested = asFiniteNumber(asRecord(value).revision);
  if (nested !== null) return nested;
  throw new Error(`revision payload is not a number: ${asString(value).slice(0, 80)}`);
}
