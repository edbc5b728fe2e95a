import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, mergeConfig, saveConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../defaults.js";

async function createTempRoot(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "mirrorline-config-"));
}

describe("config", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("provides defaults for sync cadence, paging, follow bands, and transport", () => {
    const config = mergeConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.sync.cadenceMs).toBe(50);
    expect(config.sync.pageSize).toBe(50);
    expect(config.follow.repinThreshold).toBeLessThanOrEqual(config.follow.unpinThreshold);
    expect(config.transport.kind).toBe("http");
  });

  it("clamps the refresh cadence into its supported range", () => {
    expect(mergeConfig({ sync: { cadenceMs: 3 } }).sync.cadenceMs).toBe(10);
    expect(mergeConfig({ sync: { cadenceMs: 5_000 } }).sync.cadenceMs).toBe(1_000);
    expect(mergeConfig({ sync: { cadenceMs: 0 } }).sync.cadenceMs).toBe(50);
  });

  it("falls back per field on invalid values", () => {
    const config = mergeConfig({
      sync: { pageSize: -4, revisionPollMs: 120 },
      transport: { kind: "carrier-pigeon", requestTimeoutMs: "soon" },
      logging: { level: "LOUD" },
    });
    expect(config.sync.pageSize).toBe(50);
    expect(config.sync.revisionPollMs).toBe(120);
    expect(config.transport.kind).toBe("http");
    expect(config.transport.requestTimeoutMs).toBe(5_000);
    expect(config.logging.level).toBe("info");
  });

  it("never lets the repin band exceed the unpin band", () => {
    const config = mergeConfig({ follow: { unpinThreshold: 40, repinThreshold: 90 } });
    expect(config.follow).toEqual({ unpinThreshold: 40, repinThreshold: 40, loadMoreThreshold: 40 });
  });

  it("strips trailing slashes from the base url", () => {
    expect(mergeConfig({ transport: { baseUrl: "http://localhost:9000//" } }).transport.baseUrl).toBe(
      "http://localhost:9000",
    );
  });

  it("returns defaults when the config file is missing", async () => {
    const root = await createTempRoot();
    await expect(loadConfig(path.join(root, "absent.toml"))).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("reads toml sections", async () => {
    const root = await createTempRoot();
    const configPath = path.join(root, "config.toml");
    await writeFile(
      configPath,
      ['[sync]', 'pageSize = 25', '', '[transport]', 'kind = "file"', 'directory = "/tmp/sessions"', ''].join("\n"),
      "utf8",
    );
    const config = await loadConfig(configPath);
    expect(config.sync.pageSize).toBe(25);
    expect(config.transport.kind).toBe("file");
    expect(config.transport.directory).toBe("/tmp/sessions");
    expect(config.follow).toEqual(DEFAULT_CONFIG.follow);
  });

  it("warns and uses defaults when the toml cannot be parsed", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const root = await createTempRoot();
    const configPath = path.join(root, "config.toml");
    await writeFile(configPath, "[sync\npageSize = ", "utf8");
    await expect(loadConfig(configPath)).resolves.toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("writes a file that loads back to the same config", async () => {
    const root = await createTempRoot();
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({ sync: { pageSize: 10 }, logging: { level: "debug" } });
    await saveConfig(config, configPath);
    await expect(loadConfig(configPath)).resolves.toEqual(config);
  });
});
