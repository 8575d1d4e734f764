import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { StoreConfigurationError } from "@guidstore/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ConfigurationFile } from "../src/index.js";

const settingsSchema = z.object({
  name: z.string(),
  retries: z.number().int(),
  verbose: z.boolean().default(false),
});

type Settings = z.infer<typeof settingsSchema>;

const defaults: Settings = { name: "default", retries: 3, verbose: false };

describe("ConfigurationFile", () => {
  let testDir: string;
  let configPath: string;

  function createConfig(fields: readonly (keyof Settings)[] = ["name", "retries", "verbose"]) {
    return new ConfigurationFile<Settings>({
      path: configPath,
      schema: settingsSchema,
      fields,
      defaults,
    });
  }

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "guidstore-config-"));
    configPath = path.join(testDir, "settings.json");
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("writes the defaults when the file does not exist", async () => {
    const config = createConfig();

    expect(await config.load()).toEqual(defaults);
    expect(await fs.readFile(configPath, "utf8")).toBe(JSON.stringify(defaults, null, 2));
  });

  it("merges loaded values into the live instance", async () => {
    await fs.writeFile(configPath, JSON.stringify({ name: "nightly", retries: 5, verbose: true }));
    const config = createConfig();
    const live = config.values;

    await config.load();

    expect(config.values).toBe(live);
    expect(live).toEqual({ name: "nightly", retries: 5, verbose: true });
  });

  it("copies only the fields in its table", async () => {
    await fs.writeFile(configPath, JSON.stringify({ name: "nightly", retries: 5, verbose: true }));
    const config = createConfig(["name", "retries"]);

    await config.load();

    expect(config.values).toEqual({ name: "nightly", retries: 5, verbose: false });
  });

  it("applies schema defaults to missing fields", async () => {
    await fs.writeFile(configPath, JSON.stringify({ name: "nightly", retries: 1 }));
    const config = createConfig();
    config.set("verbose", true);

    await config.load();

    expect(config.values.verbose).toBe(false);
  });

  it("saves changed values", async () => {
    const config = createConfig();
    config.set("retries", 10);
    await config.save();

    const reloaded = createConfig();
    await reloaded.load();
    expect(reloaded.values.retries).toBe(10);
  });

  it("creates missing parent directories on save", async () => {
    configPath = path.join(testDir, "nested", "settings.json");
    await createConfig().save();

    expect(JSON.parse(await fs.readFile(configPath, "utf8"))).toEqual(defaults);
  });

  it("rejects a file that is not JSON", async () => {
    await fs.writeFile(configPath, "{ name: nightly");

    await expect(createConfig().load()).rejects.toBeInstanceOf(StoreConfigurationError);
  });

  it("rejects a file that does not match the schema", async () => {
    await fs.writeFile(configPath, JSON.stringify({ name: "nightly", retries: "five" }));

    await expect(createConfig().load()).rejects.toBeInstanceOf(StoreConfigurationError);
  });

  it("requires a path", async () => {
    const config = createConfig();
    config.path = "";

    await expect(config.load()).rejects.toBeInstanceOf(StoreConfigurationError);
    await expect(config.save()).rejects.toBeInstanceOf(StoreConfigurationError);
  });

  it("notifies listeners on load and save", async () => {
    await fs.writeFile(configPath, JSON.stringify({ name: "nightly", retries: 5 }));
    const config = createConfig();
    const loaded = vi.fn();
    const saved = vi.fn();
    config.onLoaded(loaded);
    const stopSaved = config.onSaved(saved);

    await config.load();
    await config.save();
    stopSaved();
    await config.save();

    expect(loaded).toHaveBeenCalledTimes(1);
    expect(loaded).toHaveBeenCalledWith({ name: "nightly", retries: 5, verbose: false });
    expect(saved).toHaveBeenCalledTimes(1);
  });

  it("does not fire the loaded listener when it writes defaults", async () => {
    const config = createConfig();
    const loaded = vi.fn();
    const saved = vi.fn();
    config.onLoaded(loaded);
    config.onSaved(saved);

    await config.load();

    expect(loaded).not.toHaveBeenCalled();
    expect(saved).toHaveBeenCalledTimes(1);
  });
});
