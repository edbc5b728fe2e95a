import type { SessionUpdate } from "@mirrorline/contracts";
import type { SessionRegistry } from "@mirrorline/core";
import { formatMessageLine, transcriptLines } from "./render.js";

export type LineWriter = (line: string) => void;

export interface FollowSessionOptions {
  grouped?: boolean;
  signal: AbortSignal;
}

function headerLine(label: string, update: SessionUpdate): string {
  return update.forkedFrom ? `-- ${label}, forked from ${update.forkedFrom} --` : `-- ${label} --`;
}

/**
 * Prints a session as it changes until `signal` aborts. Appends print only new
 * or changed lines; anything else reprints the window under a header.
 */
export async function followSession(
  registry: SessionRegistry,
  sessionId: string,
  write: LineWriter,
  options: FollowSessionOptions,
): Promise<void> {
  const rendered = new Map<string, string>();

  const onUpdate = (updatedId: string, update: SessionUpdate): void => {
    if (updatedId !== sessionId) return;
    const session = registry.get(sessionId);
    if (!session) return;

    if (options.grouped) {
      write(headerLine(session.window.label(), update));
      for (const line of transcriptLines(session.currentTurns())) write(line);
      return;
    }

    if (update.path !== "append") {
      rendered.clear();
      write(headerLine(session.window.label(), update));
    }
    for (const message of session.currentWindow()) {
      const line = formatMessageLine(message);
      const previous = rendered.get(message.id);
      if (previous === line) continue;
      rendered.set(message.id, line);
      write(previous === undefined ? line : `~ ${line}`);
    }
  };

  registry.on("update", onUpdate);
  try {
    registry.open(sessionId);
    await new Promise<void>((resolve) => {
      if (options.signal.aborted) {
        resolve();
        return;
      }
      options.signal.addEventListener("abort", () => resolve(), { once: true });
    });
  } finally {
    registry.off("update", onUpdate);
    registry.close(sessionId);
  }
}
