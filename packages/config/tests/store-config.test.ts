import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import {
  ConfigurationFile,
  type StoreConfig,
  storeConfigFields,
  storeConfigSchema,
} from "../src/index.js";

describe("storeConfigSchema", () => {
  it("fills in defaults", () => {
    expect(storeConfigSchema.parse({ kind: "files", path: "./db" })).toEqual({
      kind: "files",
      path: "./db",
      flush: { mode: "manual" },
      compressionLevel: 9,
    });
  });

  it("accepts an interval flush policy", () => {
    const config = storeConfigSchema.parse({
      kind: "files",
      path: "./db",
      flush: { mode: "interval", intervalMs: 500 },
    });
    expect(config.flush).toEqual({ mode: "interval", intervalMs: 500 });
  });

  it.each([
    { kind: "files", path: "" },
    { kind: "files", path: "   " },
    { kind: "sql", path: "./db" },
    { kind: "files", path: "./db", flush: { mode: "interval", intervalMs: 0 } },
    { kind: "files", path: "./db", flush: { mode: "interval" } },
    { kind: "archive", path: "db.zip", compressionLevel: 12 },
  ])("rejects %j", (input) => {
    expect(storeConfigSchema.safeParse(input).success).toBe(false);
  });

  it("loads through a ConfigurationFile", async () => {
    const testDir = await fs.mkdtemp(path.join(os.tmpdir(), "guidstore-store-config-"));
    try {
      const configPath = path.join(testDir, "store.json");
      await fs.writeFile(configPath, JSON.stringify({ kind: "archive", path: "data/db.zip" }));
      const config = new ConfigurationFile<StoreConfig>({
        path: configPath,
        schema: storeConfigSchema,
        fields: storeConfigFields,
        defaults: storeConfigSchema.parse({ kind: "files", path: "data" }),
      });

      await config.load();

      expect(config.values).toEqual({
        kind: "archive",
        path: "data/db.zip",
        flush: { mode: "manual" },
        compressionLevel: 9,
      });
    } finally {
      await fs.rm(testDir, { recursive: true, force: true });
    }
  });
});
