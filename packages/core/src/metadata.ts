import type { Message, MessageMetadata } from "@mirrorline/contracts";

const NO_METADATA: MessageMetadata = { turnsAfter: null, nthUserMessage: null };

/**
 * Per-message rollback/fork addressing for the windowed slice, in two linear
 * passes. `turnsAfter` of 0 means there is nothing to roll back yet.
 */
export function computeMessageMetadata(messages: Message[]): Map<string, MessageMetadata> {
  const result = new Map<string, MessageMetadata>();
  const userIndices: number[] = [];

  for (let idx = 0; idx < messages.length; idx += 1) {
    const message = messages[idx];
    if (!message) continue;
    if (message.kind === "user") {
      result.set(message.id, { turnsAfter: 0, nthUserMessage: userIndices.length });
      userIndices.push(idx);
    } else {
      result.set(message.id, NO_METADATA);
    }
  }

  // scanning backwards once tells whether a non-user message follows each index
  const lastNonUserIndex = findLastNonUserIndex(messages);

  for (let rank = 0; rank < userIndices.length; rank += 1) {
    const msgIndex = userIndices[rank] ?? 0;
    const message = messages[msgIndex];
    if (!message) continue;
    const userMessagesAfter = userIndices.length - rank - 1;
    const turnsAfter = userMessagesAfter > 0 ? userMessagesAfter : lastNonUserIndex > msgIndex ? 1 : 0;
    result.set(message.id, { turnsAfter, nthUserMessage: rank });
  }

  return result;
}

function findLastNonUserIndex(messages: Message[]): number {
  for (let idx = messages.length - 1; idx >= 0; idx -= 1) {
    if (messages[idx]?.kind !== "user") return idx;
  }
  return -1;
}

export function metadataFor(metadata: Map<string, MessageMetadata>, messageId: string): MessageMetadata {
  return metadata.get(messageId) ?? NO_METADATA;
}
