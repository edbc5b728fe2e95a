import type { AppConfig } from "@mirrorline/contracts";

export const DEFAULT_CONFIG: AppConfig = {
  sync: {
    cadenceMs: 50,
    pageSize: 50,
    revisionPollMs: 250,
  },
  follow: {
    unpinThreshold: 200,
    repinThreshold: 56,
    loadMoreThreshold: 40,
  },
  transport: {
    kind: "http",
    baseUrl: "http://127.0.0.1:4000",
    directory: "~/.mirrorline/sessions",
    requestTimeoutMs: 5_000,
  },
  logging: {
    level: "info",
  },
};

export const MIN_CADENCE_MS = 10;
export const MAX_CADENCE_MS = 1_000;
