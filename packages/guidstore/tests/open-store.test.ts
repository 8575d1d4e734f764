import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ArchiveStore,
  ConfigurationFile,
  type EntryStore,
  openStore,
  ShardedFileStore,
  type StoreConfig,
  StoreConfigurationError,
  storeConfigFields,
  storeConfigSchema,
} from "../src/index.js";

const KEY = "3f2504e0-4f89-11d3-9a0c-0305e82c3301";

describe("openStore", () => {
  let testDir: string;
  const stores: EntryStore[] = [];

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "guidstore-open-"));
  });

  afterEach(async () => {
    for (const store of stores.splice(0)) {
      await store.dispose();
    }
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("opens an archive store", async () => {
    const store = await openStore({ kind: "archive", path: path.join(testDir, "db.zip") });
    stores.push(store);

    expect(store).toBeInstanceOf(ArchiveStore);
  });

  it("opens a sharded file store with its flush policy", async () => {
    const store = await openStore({
      kind: "files",
      path: path.join(testDir, "db"),
      flush: { mode: "auto" },
    });
    stores.push(store);

    expect(store).toBeInstanceOf(ShardedFileStore);
    await store.writeEntry(KEY, { a: 1 });
    const content = await fs.readFile(
      path.join(testDir, "db", "3f", "3f2504e04f8911d39a0c0305e82c3301"),
      "utf8",
    );
    expect(content).toBe('{"a":1}');
  });

  it("rejects an invalid configuration", async () => {
    await expect(openStore({ kind: "files", path: "" })).rejects.toBeInstanceOf(
      StoreConfigurationError,
    );
    await expect(
      openStore({ kind: "files", path: testDir, flush: { mode: "interval", intervalMs: -1 } }),
    ).rejects.toBeInstanceOf(StoreConfigurationError);
  });

  it("opens the store named by a configuration file", async () => {
    const configPath = path.join(testDir, "store.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({ kind: "archive", path: path.join(testDir, "data.zip") }),
    );
    const config = new ConfigurationFile<StoreConfig>({
      path: configPath,
      schema: storeConfigSchema,
      fields: storeConfigFields,
      defaults: storeConfigSchema.parse({ kind: "files", path: testDir }),
    });

    const store = await openStore(await config.load());
    stores.push(store);
    await store.writeEntry(KEY, ["x"]);
    await store.dispose();

    const reopened = await ArchiveStore.open(path.join(testDir, "data.zip"));
    stores.push(reopened);
    expect(await reopened.readEntry(KEY)).toEqual(["x"]);
  });
});
