import type { TransportConfig } from "@mirrorline/contracts";
import { FileTransport } from "./file.js";
import { HttpTransport, type FetchLike, type HttpTransportOptions } from "./http.js";
import type { TranscriptTransport } from "./types.js";

export interface CreateTransportOptions {
  fetch?: FetchLike;
}

export function createTransport(config: TransportConfig, options: CreateTransportOptions = {}): TranscriptTransport {
  if (config.kind === "file") {
    return new FileTransport({ directory: config.directory });
  }
  const httpOptions: HttpTransportOptions = {
    baseUrl: config.baseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  };
  if (options.fetch) httpOptions.fetch = options.fetch;
  return new HttpTransport(httpOptions);
}

export { FileTransport, type FileTransportOptions } from "./file.js";
export { HttpTransport, type FetchLike, type HttpTransportOptions } from "./http.js";
export { MemoryTransport, type MemoryFailureTarget, type MessagePatch } from "./memory.js";
export type { TranscriptTransport, Unsubscribe } from "./types.js";
