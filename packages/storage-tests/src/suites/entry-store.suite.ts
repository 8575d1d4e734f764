/**
 * Parametrized test suite for EntryStore implementations
 *
 * Runs the same contract tests against every engine: round-trip,
 * existence, absent reads, overwrite, persistence across reopen,
 * raw byte entries and the disposed-store behaviour.
 */

import {
  type EntryStore,
  InvalidKeyError,
  MalformedEntryError,
  readText,
  StoreDisposedError,
  toByteStream,
} from "@guidstore/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

/**
 * Context provided by the store factory
 */
export interface EntryStoreTestContext {
  store: EntryStore;
  /** Open a new store instance over the same backing path */
  reopen: () => Promise<EntryStore>;
  cleanup?: () => Promise<void>;
}

/**
 * Factory function to create a store instance for testing
 */
export type EntryStoreFactory = () => Promise<EntryStoreTestContext>;

const KEY_A = "11111111-1111-1111-1111-111111111111";
const KEY_B = "2b7e1516-28ae-d2a6-abf7-158809cf4f3c";
const KEY_MISSING = "ffffffff-0000-0000-0000-000000000000";

const encoder = new TextEncoder();

/**
 * Create the EntryStore test suite with a specific factory
 */
export function createEntryStoreTests(name: string, factory: EntryStoreFactory): void {
  describe(`EntryStore [${name}]`, () => {
    let ctx: EntryStoreTestContext;
    const opened: EntryStore[] = [];

    async function reopen(): Promise<EntryStore> {
      const store = await ctx.reopen();
      opened.push(store);
      return store;
    }

    beforeEach(async () => {
      ctx = await factory();
      opened.push(ctx.store);
    });

    afterEach(async () => {
      for (const store of opened.splice(0)) {
        await store.dispose();
      }
      await ctx.cleanup?.();
    });

    describe("writeEntry/readEntry", () => {
      it("round-trips an object", async () => {
        const value = { a: 1, nested: { list: [1, "two", null], flag: true } };
        await ctx.store.writeEntry(KEY_A, value);

        expect(await ctx.store.readEntry(KEY_A)).toEqual(value);
      });

      it("round-trips primitive values", async () => {
        await ctx.store.writeEntry(KEY_A, "hello");
        await ctx.store.writeEntry(KEY_B, 42);

        expect(await ctx.store.readEntry<string>(KEY_A)).toBe("hello");
        expect(await ctx.store.readEntry<number>(KEY_B)).toBe(42);
      });

      it("returns undefined for a key never written", async () => {
        expect(await ctx.store.readEntry(KEY_MISSING)).toBeUndefined();
      });

      it("keeps entries of distinct keys apart", async () => {
        await ctx.store.writeEntry(KEY_A, { id: "a" });
        await ctx.store.writeEntry(KEY_B, { id: "b" });

        expect(await ctx.store.readEntry(KEY_A)).toEqual({ id: "a" });
        expect(await ctx.store.readEntry(KEY_B)).toEqual({ id: "b" });
      });

      it("returns the second value after overwriting", async () => {
        await ctx.store.writeEntry(KEY_A, { version: 1, padding: "x".repeat(64) });
        await ctx.store.writeEntry(KEY_A, { version: 2 });

        expect(await ctx.store.readEntry(KEY_A)).toEqual({ version: 2 });
      });

      it("returns the second value after overwriting, flushing and reopening", async () => {
        await ctx.store.writeEntry(KEY_A, { version: 1, padding: "x".repeat(64) });
        await ctx.store.writeEntry(KEY_A, { version: 2 });
        await ctx.store.flush();
        await ctx.store.dispose();

        const reopened = await reopen();
        expect(await reopened.readEntry(KEY_A)).toEqual({ version: 2 });
      });

      it("accepts every textual form of the same key", async () => {
        await ctx.store.writeEntry("{2B7E1516-28AE-D2A6-ABF7-158809CF4F3C}", "braced");

        expect(await ctx.store.readEntry(KEY_B)).toBe("braced");
        expect(await ctx.store.readEntry("2b7e151628aed2a6abf7158809cf4f3c")).toBe("braced");
      });

      it("validates the decoded value against a schema", async () => {
        const schema = z.object({ a: z.number() });
        await ctx.store.writeEntry(KEY_A, { a: 1 });
        await ctx.store.writeEntry(KEY_B, { a: "one" });

        expect(await ctx.store.readEntry(KEY_A, schema)).toEqual({ a: 1 });
        await expect(ctx.store.readEntry(KEY_B, schema)).rejects.toBeInstanceOf(
          MalformedEntryError,
        );
      });

      it("reports a payload that is not JSON as malformed", async () => {
        await ctx.store.writeFile(KEY_A, toByteStream(encoder.encode("{not json")));

        await expect(ctx.store.readEntry(KEY_A)).rejects.toBeInstanceOf(MalformedEntryError);
      });

      it("rejects invalid keys", async () => {
        await expect(ctx.store.writeEntry("not-a-guid", 1)).rejects.toBeInstanceOf(
          InvalidKeyError,
        );
        await expect(ctx.store.readEntry("1234")).rejects.toBeInstanceOf(InvalidKeyError);
      });

      it("rejects values that cannot be serialized", async () => {
        await expect(ctx.store.writeEntry(KEY_A, undefined)).rejects.toBeInstanceOf(TypeError);
        expect(await ctx.store.exists(KEY_A)).toBe(false);
      });
    });

    describe("exists", () => {
      it("returns false for a key never written", async () => {
        expect(await ctx.store.exists(KEY_MISSING)).toBe(false);
      });

      it("returns true right after a write", async () => {
        await ctx.store.writeEntry(KEY_A, { a: 1 });

        expect(await ctx.store.exists(KEY_A)).toBe(true);
        expect(await ctx.store.exists(KEY_B)).toBe(false);
      });
    });

    describe("writeFile/readFile", () => {
      it("round-trips bytes verbatim", async () => {
        const bytes = new Uint8Array([0, 1, 2, 255, 254, 253]);
        await ctx.store.writeFile(KEY_A, toByteStream(bytes));

        const stream = await ctx.store.readFile(KEY_A);
        expect(stream).toBeDefined();
        const chunks: number[] = [];
        for await (const chunk of stream ?? toByteStream()) {
          chunks.push(...chunk);
        }
        expect(chunks).toEqual([0, 1, 2, 255, 254, 253]);
      });

      it("stores multi-chunk content in order", async () => {
        await ctx.store.writeFile(
          KEY_A,
          toByteStream(encoder.encode("Hello"), encoder.encode(", "), encoder.encode("World!")),
        );

        const stream = await ctx.store.readFile(KEY_A);
        expect(await readText(stream ?? toByteStream())).toBe("Hello, World!");
      });

      it("streams an entry written as JSON", async () => {
        await ctx.store.writeEntry(KEY_A, { a: 1 });

        const stream = await ctx.store.readFile(KEY_A);
        expect(await readText(stream ?? toByteStream())).toBe('{"a":1}');
      });

      it("returns undefined for a key never written", async () => {
        expect(await ctx.store.readFile(KEY_MISSING)).toBeUndefined();
      });
    });

    describe("persistence", () => {
      it("keeps entries after dispose and reopen", async () => {
        await ctx.store.writeEntry(KEY_A, { a: 1 });
        await ctx.store.writeFile(KEY_B, toByteStream(encoder.encode("blob")));
        await ctx.store.dispose();

        const reopened = await reopen();
        expect(await reopened.exists(KEY_A)).toBe(true);
        expect(await reopened.readEntry(KEY_A)).toEqual({ a: 1 });
        expect(await readText((await reopened.readFile(KEY_B)) ?? toByteStream())).toBe("blob");
      });

      it("keeps serving reads after flush", async () => {
        await ctx.store.writeEntry(KEY_A, { a: 1 });
        await ctx.store.flush();

        expect(await ctx.store.readEntry(KEY_A)).toEqual({ a: 1 });
        await ctx.store.writeEntry(KEY_B, { b: 2 });
        expect(await ctx.store.readEntry(KEY_B)).toEqual({ b: 2 });
      });
    });

    describe("dispose", () => {
      it("marks the store as disposed", async () => {
        expect(ctx.store.disposed).toBe(false);
        await ctx.store.dispose();
        expect(ctx.store.disposed).toBe(true);
      });

      it("is a no-op when called twice", async () => {
        await ctx.store.writeEntry(KEY_A, { a: 1 });
        await ctx.store.dispose();
        await ctx.store.dispose();

        const reopened = await reopen();
        expect(await reopened.readEntry(KEY_A)).toEqual({ a: 1 });
      });

      it("fails fast on every operation afterwards", async () => {
        await ctx.store.dispose();

        await expect(ctx.store.writeEntry(KEY_A, 1)).rejects.toBeInstanceOf(StoreDisposedError);
        await expect(
          ctx.store.writeFile(KEY_A, toByteStream(new Uint8Array([1]))),
        ).rejects.toBeInstanceOf(StoreDisposedError);
        await expect(ctx.store.readEntry(KEY_A)).rejects.toBeInstanceOf(StoreDisposedError);
        await expect(ctx.store.readFile(KEY_A)).rejects.toBeInstanceOf(StoreDisposedError);
        await expect(ctx.store.exists(KEY_A)).rejects.toBeInstanceOf(StoreDisposedError);
        await expect(ctx.store.flush()).rejects.toBeInstanceOf(StoreDisposedError);
      });

      it("persists writes that were in flight when dispose was called", async () => {
        const write = ctx.store.writeEntry(KEY_A, { a: 1 });
        const dispose = ctx.store.dispose();
        await Promise.all([write, dispose]);

        const reopened = await reopen();
        expect(await reopened.readEntry(KEY_A)).toEqual({ a: 1 });
      });
    });
  });
}
