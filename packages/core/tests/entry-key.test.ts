import * as path from "node:path";
import { describe, expect, it } from "vitest";
import {
  entryAddress,
  entryPath,
  isEntryKey,
  normalizeKey,
  shardOf,
} from "../src/keys/index.js";
import { InvalidKeyError } from "../src/store/index.js";

const HYPHENATED = "6F9619FF-8B86-D011-B42D-00C04FC964FF";
const PLAIN = "6f9619ff8b86d011b42d00c04fc964ff";

describe("normalizeKey", () => {
  it("lowercases and strips hyphens", () => {
    expect(normalizeKey(HYPHENATED)).toBe(PLAIN);
  });

  it("accepts the braced form", () => {
    expect(normalizeKey(`{${HYPHENATED}}`)).toBe(PLAIN);
  });

  it("keeps the plain form unchanged", () => {
    expect(normalizeKey(PLAIN)).toBe(PLAIN);
  });

  it.each([
    "",
    "6f9619ff",
    "6f9619ff-8b86-d011-b42d-00c04fc964fg",
    "6f9619ff8b86-d011-b42d-00c04fc964ff",
    ` ${PLAIN}`,
    `${PLAIN}0`,
    "{6f9619ff8b86d011b42d00c04fc964ff",
  ])("rejects %j", (key) => {
    expect(() => normalizeKey(key)).toThrow(InvalidKeyError);
  });

  it("reports the rejected key", () => {
    try {
      normalizeKey("abc");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidKeyError);
      expect(error).toHaveProperty("key", "abc");
    }
  });
});

describe("isEntryKey", () => {
  it("recognizes keys", () => {
    expect(isEntryKey(HYPHENATED)).toBe(true);
    expect(isEntryKey(PLAIN)).toBe(true);
  });

  it("rejects other values", () => {
    expect(isEntryKey("report.json")).toBe(false);
    expect(isEntryKey(42)).toBe(false);
    expect(isEntryKey(undefined)).toBe(false);
  });
});

describe("entryAddress", () => {
  it("maps a key to shard/leaf", () => {
    expect(entryAddress(HYPHENATED)).toBe(`6f/${PLAIN}`);
  });

  it("is the same for every form of a key", () => {
    expect(entryAddress(PLAIN)).toBe(entryAddress(HYPHENATED));
    expect(entryAddress(`{${PLAIN.toUpperCase()}}`)).toBe(entryAddress(HYPHENATED));
  });

  it("gives distinct keys in one shard distinct addresses", () => {
    const first = "00000000-0000-0000-0000-000000000001";
    const second = "00000000-0000-0000-0000-000000000002";

    expect(shardOf(first)).toBe(shardOf(second));
    expect(entryAddress(first)).toBe("00/00000000000000000000000000000001");
    expect(entryAddress(second)).toBe("00/00000000000000000000000000000002");
  });
});

describe("shardOf", () => {
  it("returns the first two hex digits", () => {
    expect(shardOf(HYPHENATED)).toBe("6f");
    expect(shardOf("ABCDEF00-0000-0000-0000-000000000000")).toBe("ab");
  });
});

describe("entryPath", () => {
  it("joins the address under the root", () => {
    expect(entryPath("/var/data", HYPHENATED)).toBe(path.join("/var/data", "6f", PLAIN));
  });
});
