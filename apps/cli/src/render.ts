import type { GroupedTranscript, Message, MessageMetadata, SessionListing, Turn } from "@mirrorline/contracts";
import { normalizePreview } from "@mirrorline/core";

const PREVIEW_LEN = 100;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const next = cursor[key];
    const child: Record<string, unknown> = isPlainObject(next) ? next : {};
    cursor[key] = child;
    cursor = child;
  }
  cursor[lastKey] = value;
}

export function getPath(source: unknown, dottedKey: string): unknown {
  let cursor = source;
  for (const key of dottedKey.split(".").filter(Boolean)) {
    if (!isPlainObject(cursor)) return undefined;
    cursor = cursor[key];
  }
  return cursor;
}

export function tableLines(rows: string[][]): string[] {
  const header = rows[0];
  if (!header) return [];
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  const lines: string[] = [];
  for (const [idx, row] of rows.entries()) {
    lines.push(
      row
        .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
        .join(idx === 0 ? " | " : "   ")
        .trimEnd(),
    );
    if (idx === 0) {
      lines.push(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
  return lines;
}

export function sessionRows(sessions: SessionListing[]): string[][] {
  return [
    ["SESSION", "REVISION", "FORKED FROM"],
    ...sessions.map((session) => [session.sessionId, String(session.revision), session.forkedFrom ?? "-"]),
  ];
}

function kindLabel(message: Message): string {
  if (message.kind === "tool" && message.toolName) return `tool ${message.toolName}`;
  return message.kind;
}

export function formatMessageLine(message: Message, metadata?: MessageMetadata): string {
  const text = message.kind === "tool" ? (message.toolOutput ?? message.content) : message.content;
  const parts = [`[${kindLabel(message)}]`, normalizePreview(text, PREVIEW_LEN) || "-"];
  if (message.isInProgress) parts.push("…");
  if (metadata && metadata.nthUserMessage !== null) {
    parts.push(`(#${metadata.nthUserMessage + 1}, ${metadata.turnsAfter ?? 0} after)`);
  }
  return parts.join(" ");
}

function turnHeader(turn: Turn): string {
  const tools = turn.toolsUsed.length > 0 ? ` tools: ${turn.toolsUsed.join(", ")}` : "";
  return `Turn ${turn.turnNumber} [${turn.status}]${tools} (in ${turn.inputTokens}, out ${turn.outputTokens})`;
}

export function transcriptLines(
  grouped: GroupedTranscript,
  metadataOf?: (messageId: string) => MessageMetadata,
): string[] {
  const line = (message: Message): string => formatMessageLine(message, metadataOf?.(message.id));
  if (grouped.mode === "flat") {
    return grouped.messages.map(line);
  }
  const lines: string[] = [];
  for (const turn of grouped.turns) {
    lines.push(turnHeader(turn));
    for (const message of turn.messages) {
      lines.push(`  ${line(message)}`);
    }
  }
  return lines;
}
