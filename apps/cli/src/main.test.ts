import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { asRecord } from "@mirrorline/core";

const cliRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const repoRoot = path.resolve(cliRoot, "../..");

async function readJson(filePath: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  return asRecord(parsed);
}

describe("cli entry point", () => {
  it("runs the TypeScript entry through tsx", async () => {
    const manifest = await readJson(path.join(cliRoot, "package.json"));
    expect(manifest.bin).toEqual({ mirrorline: "./src/main.ts" });

    const main = await readFile(path.join(cliRoot, "src/main.ts"), "utf8");
    expect(main.split("\n", 1)[0]).toBe("#!/usr/bin/env tsx");
  });

  it("declares tsx and a root script that starts the cli", async () => {
    const manifest = await readJson(path.join(repoRoot, "package.json"));
    expect(manifest.scripts).toMatchObject({ cli: "tsx apps/cli/src/main.ts" });
    expect(manifest.devDependencies).toHaveProperty("tsx");
  });
});
