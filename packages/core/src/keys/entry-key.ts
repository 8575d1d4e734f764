/**
 * Entry keys and their storage addresses.
 *
 * A key is a 128-bit identifier supplied by the caller. Every accepted
 * textual form is normalized to 32 lowercase hex digits, and the address
 * of an entry is derived from those digits alone:
 *
 *   shard = first 2 digits, leaf = all 32 digits, address = "shard/leaf"
 *
 * Example: "6F9619FF-8B86-D011-B42D-00C04FC964FF" is stored at
 * "6f/6f9619ff8b86d011b42d00c04fc964ff".
 */

import { join } from "node:path";
import { InvalidKeyError } from "../store/errors.js";

/**
 * Canonical key: 32 lowercase hex digits.
 */
export type EntryKey = string;

const PLAIN_KEY = /^[0-9a-f]{32}$/;
const HYPHENATED_KEY = /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/;

/**
 * Normalize a key to its canonical form.
 *
 * Accepts 32 hex digits or the hyphenated 8-4-4-4-12 form, optionally
 * wrapped in braces, in any letter case.
 *
 * @throws InvalidKeyError for anything else
 */
export function normalizeKey(key: string): EntryKey {
  let text = key.toLowerCase();
  if (text.startsWith("{") && text.endsWith("}")) {
    text = text.slice(1, -1);
  }
  if (PLAIN_KEY.test(text)) {
    return text;
  }
  const match = HYPHENATED_KEY.exec(text);
  if (match) {
    return match.slice(1).join("");
  }
  throw new InvalidKeyError(key);
}

export function isEntryKey(value: unknown): value is string {
  if (typeof value !== "string") return false;
  try {
    normalizeKey(value);
    return true;
  } catch (error) {
    if (error instanceof InvalidKeyError) return false;
    throw error;
  }
}

/**
 * First two hex digits of the key; at most 256 distinct shards.
 */
export function shardOf(key: string): string {
  return normalizeKey(key).substring(0, 2);
}

/**
 * Relative address of an entry, always "/"-separated.
 *
 * Used verbatim as the entry name inside archive containers.
 */
export function entryAddress(key: string): string {
  const leaf = normalizeKey(key);
  return `${leaf.substring(0, 2)}/${leaf}`;
}

/**
 * Platform path of an entry under a directory root.
 */
export function entryPath(root: string, key: string): string {
  const leaf = normalizeKey(key);
  return join(root, leaf.substring(0, 2), leaf);
}
