/**
 * Entry store contract
 *
 * Both engines (single archive container, sharded directory tree) expose
 * exactly this shape. Keys are 128-bit identifiers in any form accepted
 * by normalizeKey(); values are JSON-serializable.
 */

import type { EntrySchema } from "../serialization/index.js";
import type { ByteStream } from "../streams/index.js";

export interface EntryStore {
  /** True once dispose() has been called */
  readonly disposed: boolean;

  /**
   * Serialize a value and store it under key.
   *
   * A later write to the same key replaces the earlier value.
   */
  writeEntry(key: string, value: unknown): Promise<void>;

  /**
   * Store a byte stream verbatim under key.
   *
   * The stream is fully consumed before the returned promise resolves.
   */
  writeFile(key: string, content: ByteStream): Promise<void>;

  /**
   * Read and decode the value stored under key.
   *
   * @param schema Optional zod schema validating the decoded value
   * @returns The value, or undefined if nothing is stored under key
   * @throws MalformedEntryError if the payload cannot be decoded
   */
  readEntry<T>(key: string, schema?: EntrySchema<T>): Promise<T | undefined>;

  /**
   * Open a live stream over the bytes stored under key.
   *
   * @returns The stream, or undefined if nothing is stored under key
   */
  readFile(key: string): Promise<ByteStream | undefined>;

  /** Check whether an entry is stored under key */
  exists(key: string): Promise<boolean>;

  /** Push pending writes to the backing medium */
  flush(): Promise<void>;

  /**
   * Persist pending writes and release the backing resource.
   *
   * Calling it again is a no-op; every other operation fails with
   * StoreDisposedError afterwards.
   */
  dispose(): Promise<void>;
}
