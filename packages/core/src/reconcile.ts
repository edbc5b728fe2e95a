import type { Message, MessageImage, ReconcilePath } from "@mirrorline/contracts";

export interface ReconcileResult {
  path: ReconcilePath;
  /** The new mirror. On the noop path this is the input mirror itself. */
  messages: Message[];
  appended: number;
  patched: number;
  dedupedCount: number;
}

function imagesEqual(left: MessageImage[], right: MessageImage[]): boolean {
  if (left.length !== right.length) return false;
  for (let idx = 0; idx < left.length; idx += 1) {
    const lhs = left[idx];
    const rhs = right[idx];
    if (!lhs || !rhs) return false;
    if (lhs.id !== rhs.id || lhs.mimeType !== rhs.mimeType || lhs.data !== rhs.data) return false;
  }
  return true;
}

/**
 * Equality on the fields that change what a message looks like. Timestamps
 * and other bookkeeping are ignored.
 */
export function isRenderEquivalent(left: Message, right: Message): boolean {
  if (left === right) return true;
  return (
    left.id === right.id &&
    left.kind === right.kind &&
    left.content === right.content &&
    left.toolName === right.toolName &&
    left.toolOutput === right.toolOutput &&
    left.toolDuration === right.toolDuration &&
    left.inputTokens === right.inputTokens &&
    left.outputTokens === right.outputTokens &&
    left.isInProgress === right.isInProgress &&
    left.thinking === right.thinking &&
    imagesEqual(left.images, right.images)
  );
}

/**
 * Collapses repeated ids: the last occurrence wins but keeps the position of
 * the first one, so the chronological order of distinct ids is preserved.
 */
export function dedupeById(messages: Message[]): { messages: Message[]; dropped: number } {
  const positionById = new Map<string, number>();
  const result: Message[] = [];
  for (const message of messages) {
    const existing = positionById.get(message.id);
    if (existing === undefined) {
      positionById.set(message.id, result.length);
      result.push(message);
    } else {
      result[existing] = message;
    }
  }
  return { messages: result, dropped: messages.length - result.length };
}

function sharesIdPrefix(mirror: Message[], snapshot: Message[]): boolean {
  for (let idx = 0; idx < mirror.length; idx += 1) {
    if (mirror[idx]?.id !== snapshot[idx]?.id) return false;
  }
  return true;
}

function isUnchanged(mirror: Message[], snapshot: Message[]): boolean {
  if (mirror.length !== snapshot.length) return false;
  for (let idx = 0; idx < mirror.length; idx += 1) {
    const lhs = mirror[idx];
    const rhs = snapshot[idx];
    if (!lhs || !rhs || !isRenderEquivalent(lhs, rhs)) return false;
  }
  return true;
}

export function reconcile(mirror: Message[], incoming: Message[]): ReconcileResult {
  const { messages: snapshot, dropped } = dedupeById(incoming);

  if (isUnchanged(mirror, snapshot)) {
    return { path: "noop", messages: mirror, appended: 0, patched: 0, dedupedCount: dropped };
  }

  if (mirror.length > 0 && snapshot.length >= mirror.length && sharesIdPrefix(mirror, snapshot)) {
    const next = mirror.slice();
    let patched = 0;
    for (let idx = 0; idx < mirror.length; idx += 1) {
      const current = mirror[idx];
      const candidate = snapshot[idx];
      if (!current || !candidate) continue;
      if (!isRenderEquivalent(current, candidate)) {
        next[idx] = candidate;
        patched += 1;
      }
    }
    const tail = snapshot.slice(mirror.length);
    next.push(...tail);
    return { path: "append", messages: next, appended: tail.length, patched, dedupedCount: dropped };
  }

  return { path: "replace", messages: snapshot.slice(), appended: 0, patched: 0, dedupedCount: dropped };
}
