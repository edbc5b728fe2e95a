import type { Message } from "@mirrorline/contracts";

type Extra = Partial<Omit<Message, "id" | "kind">>;

export function user(id: string, content = `question ${id}`, extra: Extra = {}): Message {
  return { id, kind: "user", content, images: [], isInProgress: false, ...extra };
}

export function assistant(id: string, content = `answer ${id}`, extra: Extra = {}): Message {
  return { id, kind: "assistant", content, images: [], isInProgress: false, ...extra };
}

export function tool(id: string, toolName: string, toolOutput = "ok", extra: Extra = {}): Message {
  return { id, kind: "tool", content: "", toolName, toolOutput, images: [], isInProgress: false, ...extra };
}

export function ids(messages: readonly Message[]): string[] {
  return messages.map((message) => message.id);
}
