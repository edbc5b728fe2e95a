import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  FollowConfig,
  LoggingConfig,
  SyncConfig,
  TransportConfig,
  TransportKind,
} from "@mirrorline/contracts";
import { DEFAULT_CONFIG, MAX_CADENCE_MS, MIN_CADENCE_MS } from "./defaults.js";
import { createLogger, parseLogLevel } from "./logger.js";
import { asErrorMessage, asFiniteNumber, asRecord, clamp } from "./utils.js";

const log = createLogger("config");

export const DEFAULT_CONFIG_PATH = process.env.MIRRORLINE_CONFIG ?? path.join(os.homedir(), ".mirrorline", "config.toml");

export type PartialAppConfig = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = asFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeOrDefault(value: unknown, fallback: number): number {
  const numeric = asFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return numeric;
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function isTransportKind(value: unknown): value is TransportKind {
  return value === "http" || value === "file";
}

function mergeSync(input: unknown): SyncConfig {
  const defaults = DEFAULT_CONFIG.sync;
  const raw = asRecord(input);
  return {
    cadenceMs: clamp(positiveIntOrDefault(raw.cadenceMs, defaults.cadenceMs), MIN_CADENCE_MS, MAX_CADENCE_MS),
    pageSize: positiveIntOrDefault(raw.pageSize, defaults.pageSize),
    revisionPollMs: Math.max(MIN_CADENCE_MS, positiveIntOrDefault(raw.revisionPollMs, defaults.revisionPollMs)),
  };
}

function mergeFollow(input: unknown): FollowConfig {
  const defaults = DEFAULT_CONFIG.follow;
  const raw = asRecord(input);
  const unpinThreshold = nonNegativeOrDefault(raw.unpinThreshold, defaults.unpinThreshold);
  // repin band never exceeds the unpin band
  const repinThreshold = Math.min(unpinThreshold, nonNegativeOrDefault(raw.repinThreshold, defaults.repinThreshold));
  return {
    unpinThreshold,
    repinThreshold,
    loadMoreThreshold: nonNegativeOrDefault(raw.loadMoreThreshold, defaults.loadMoreThreshold),
  };
}

function mergeTransport(input: unknown): TransportConfig {
  const defaults = DEFAULT_CONFIG.transport;
  const raw = asRecord(input);
  return {
    kind: isTransportKind(raw.kind) ? raw.kind : defaults.kind,
    baseUrl: nonEmptyStringOrDefault(raw.baseUrl, defaults.baseUrl).replace(/\/+$/, ""),
    directory: nonEmptyStringOrDefault(raw.directory, defaults.directory),
    requestTimeoutMs: positiveIntOrDefault(raw.requestTimeoutMs, defaults.requestTimeoutMs),
  };
}

function mergeLogging(input: unknown): LoggingConfig {
  const raw = asRecord(input);
  return {
    level: parseLogLevel(raw.level) ?? DEFAULT_CONFIG.logging.level,
  };
}

export function mergeConfig(input: PartialAppConfig | Record<string, unknown> = {}): AppConfig {
  const raw = asRecord(input);
  return {
    sync: mergeSync(raw.sync),
    follow: mergeFollow(raw.follow),
    transport: mergeTransport(raw.transport),
    logging: mergeLogging(raw.logging),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  try {
    return mergeConfig(TOML.parse(raw));
  } catch (error) {
    log.warn(`ignoring unreadable config at ${configPath}`, { error: asErrorMessage(error) });
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const document: JsonMap = {
    sync: { ...config.sync },
    follow: { ...config.follow },
    transport: { ...config.transport },
    logging: { ...config.logging },
  };
  await writeFile(configPath, TOML.stringify(document), "utf8");
}
