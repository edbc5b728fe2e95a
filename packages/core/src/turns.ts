import type { GroupedTranscript, Message, Turn, TurnDiff, TurnStatus } from "@mirrorline/contracts";

export const ORIGIN_TURN_ID = "turn-origin";

export interface BuildTurnsOptions {
  diffs?: TurnDiff[];
  /** Marker for the turn the authority is still producing, if any. */
  currentTurnId?: string | null;
}

export function turnIdFor(anchor: Message | null): string {
  return anchor ? `turn-${anchor.id}` : ORIGIN_TURN_ID;
}

function hasToolError(messages: Message[]): boolean {
  return messages.some((message) => message.kind === "tool" && /error/i.test(message.toolOutput ?? ""));
}

function uniqueToolNames(messages: Message[]): string[] {
  const seen = new Set<string>();
  for (const message of messages) {
    if (message.kind === "tool" && message.toolName) seen.add(message.toolName);
  }
  return Array.from(seen);
}

/**
 * Groups the windowed messages into turns. A user message opens a turn and
 * everything up to the next user message belongs to it; messages before the
 * first user message form an anchor-less turn.
 */
export function buildTurns(messages: Message[], options: BuildTurnsOptions = {}): Turn[] {
  if (messages.length === 0) return [];

  const groups: Array<{ anchor: Message | null; messages: Message[] }> = [];
  let current: { anchor: Message | null; messages: Message[] } | null = null;
  for (const message of messages) {
    if (message.kind === "user" || !current) {
      current = { anchor: message.kind === "user" ? message : null, messages: [] };
      groups.push(current);
    }
    current.messages.push(message);
  }

  const diffByTurnId = new Map<string, string>();
  for (const entry of options.diffs ?? []) {
    diffByTurnId.set(entry.turnId, entry.diff);
  }
  const currentTurnId = options.currentTurnId ?? null;

  return groups.map((group, index) => {
    const isLast = index === groups.length - 1;
    const isActive = isLast && (currentTurnId !== null || group.messages.some((message) => message.isInProgress));
    const status: TurnStatus = isActive ? "active" : hasToolError(group.messages) ? "failed" : "completed";
    const id = group.anchor === null && isActive && currentTurnId !== null ? currentTurnId : turnIdFor(group.anchor);

    let inputTokens = 0;
    let outputTokens = 0;
    for (const message of group.messages) {
      inputTokens += message.inputTokens ?? 0;
      outputTokens += message.outputTokens ?? 0;
    }

    const turn: Turn = {
      id,
      turnNumber: index + 1,
      anchor: group.anchor,
      messages: group.messages,
      toolsUsed: uniqueToolNames(group.messages),
      status,
      inputTokens,
      outputTokens,
    };
    const diff = diffByTurnId.get(id);
    if (diff !== undefined) turn.diff = diff;
    return turn;
  });
}

/** Grouped view with a flat fallback so a non-empty transcript never renders blank. */
export function groupTranscript(messages: Message[], options: BuildTurnsOptions = {}): GroupedTranscript {
  const turns = buildTurns(messages, options);
  if (turns.length === 0 && messages.length > 0) {
    return { mode: "flat", messages };
  }
  return { mode: "turns", turns };
}
