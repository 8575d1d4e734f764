/**
 * Directory-backed EntryStore
 *
 * Each entry is a plain file at root/<shard>/<leaf>, where shard is the
 * first 2 hex digits of the key and leaf is the full 32-digit key:
 *
 *   key "ab12...ef" is stored at "root/ab/ab12...ef"
 *
 * Write handles are kept open per key after the first write so that
 * repeated writes skip the open/close cost. Every write truncates and
 * rewrites the file, so the last write always wins. Writes to one key
 * run in call order.
 *
 * Reads never go through the write handles: they probe and open the
 * file directly, in order with the writes queued on that key. Node hands
 * every write to the OS before resolving, so an entry is visible to
 * readers as soon as writeEntry() resolves; flush() makes it durable
 * (fsync).
 *
 * flush() keeps the handles open, so the registry holds one open file
 * descriptor per key written since open() until dispose(). Long sessions
 * over many distinct keys should dispose and reopen the store to release
 * them.
 */

import { createReadStream } from "node:fs";
import { type FileHandle, mkdir, open, readFile, stat } from "node:fs/promises";
import { dirname } from "node:path";
import {
  type ByteStream,
  createIntervalFlusher,
  createLogger,
  decodeEntry,
  type EntryKey,
  type EntrySchema,
  type EntrySerializer,
  type EntryStore,
  entryPath,
  type IntervalFlusher,
  isNotFoundError,
  jsonSerializer,
  type Logger,
  normalizeKey,
  StoreConfigurationError,
  StoreDisposedError,
  StoreIOError,
  toByteStream,
} from "@guidstore/core";

/**
 * When held-open handles are synced to stable storage.
 *
 * - auto: after every write
 * - manual: on flush() and dispose() only
 * - interval: every intervalMs, plus flush() and dispose()
 */
export type FlushPolicy =
  | { mode: "auto" }
  | { mode: "manual" }
  | { mode: "interval"; intervalMs: number };

/**
 * Options for ShardedFileStore
 */
export interface ShardedFileStoreOptions {
  /** Default: { mode: "manual" } */
  flush?: FlushPolicy;
  /** Payload serializer (default: JSON) */
  serializer?: EntrySerializer;
  /** Receives errors of interval-driven flushes */
  onFlushError?: (error: unknown) => void;
  logger?: Logger;
}

/**
 * Registry slot of a key with an open write handle
 */
interface HeldHandle {
  path: string;
  /** Opened by the first write on this key */
  handle?: FileHandle;
  /** Settles when every write queued on this key has finished */
  tail: Promise<void>;
}

const encoder = new TextEncoder();

export class ShardedFileStore implements EntryStore {
  private readonly handles = new Map<EntryKey, HeldHandle>();
  private readonly flusher: IntervalFlusher | undefined;
  private closed = false;

  private constructor(
    readonly root: string,
    private readonly policy: FlushPolicy,
    private readonly serializer: EntrySerializer,
    private readonly log: Logger,
    onFlushError?: (error: unknown) => void,
  ) {
    if (policy.mode === "interval") {
      this.flusher = createIntervalFlusher({
        intervalMs: policy.intervalMs,
        flush: () => this.flush(),
        onError: onFlushError,
        logger: log,
      });
      this.flusher.start();
    }
  }

  /**
   * Open a store rooted at a directory, creating the directory if absent.
   *
   * @throws StoreConfigurationError for an empty root or invalid flush policy
   * @throws StoreIOError if the root cannot be created or is not a directory
   */
  static async open(root: string, options: ShardedFileStoreOptions = {}): Promise<ShardedFileStore> {
    if (root.trim() === "") {
      throw new StoreConfigurationError("Store root must not be empty");
    }
    const policy = options.flush ?? { mode: "manual" };
    if (policy.mode === "interval" && (!Number.isFinite(policy.intervalMs) || policy.intervalMs <= 0)) {
      throw new StoreConfigurationError(
        `Flush interval must be a positive number of milliseconds, got ${policy.intervalMs}`,
      );
    }
    const log = options.logger ?? createLogger("sharded-file-store", { root });

    try {
      await mkdir(root, { recursive: true });
    } catch (error) {
      throw new StoreIOError("Cannot create store root", root, error);
    }
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new StoreIOError("Store root is not a directory", root);
    }
    log.debug({ flush: policy.mode }, "Opened file system store");

    return new ShardedFileStore(
      root,
      policy,
      options.serializer ?? jsonSerializer,
      log,
      options.onFlushError,
    );
  }

  get disposed(): boolean {
    return this.closed;
  }

  /**
   * Number of keys with a held-open write handle
   */
  get openHandleCount(): number {
    return this.handles.size;
  }

  async writeEntry(key: string, value: unknown): Promise<void> {
    this.ensureOpen();
    const leaf = normalizeKey(key);
    const bytes = encoder.encode(this.serializer.serialize(value));
    await this.enqueueWrite(leaf, toByteStream(bytes));
  }

  async writeFile(key: string, content: ByteStream): Promise<void> {
    this.ensureOpen();
    await this.enqueueWrite(normalizeKey(key), content);
  }

  async readEntry<T>(key: string, schema?: EntrySchema<T>): Promise<T | undefined> {
    this.ensureOpen();
    const leaf = normalizeKey(key);
    const path = entryPath(this.root, leaf);
    const text = await this.inWriteOrder(leaf, async () => {
      if (!(await isEntryFile(path))) {
        return undefined;
      }
      try {
        return await readFile(path, "utf8");
      } catch (error) {
        if (isNotFoundError(error)) {
          return undefined;
        }
        throw error;
      }
    });
    if (text === undefined) {
      return undefined;
    }
    this.log.debug({ key: leaf }, "Reading entry");
    return decodeEntry(this.serializer, leaf, text, schema);
  }

  async readFile(key: string): Promise<ByteStream | undefined> {
    this.ensureOpen();
    const leaf = normalizeKey(key);
    const path = entryPath(this.root, leaf);
    if (!(await this.inWriteOrder(leaf, () => isEntryFile(path)))) {
      return undefined;
    }
    this.log.debug({ key: leaf }, "Reading entry");
    return createReadStream(path);
  }

  async exists(key: string): Promise<boolean> {
    this.ensureOpen();
    const leaf = normalizeKey(key);
    return this.inWriteOrder(leaf, () => isEntryFile(entryPath(this.root, leaf)));
  }

  /**
   * Sync every held-open handle to stable storage, concurrently.
   *
   * Handles stay open. Writes already queued on a key complete before
   * its handle is synced.
   */
  async flush(): Promise<void> {
    this.ensureOpen();
    const held = [...this.handles.values()];
    await Promise.all(
      held.map(async (slot) => {
        await slot.tail;
        await slot.handle?.sync();
      }),
    );
    this.log.debug({ handles: held.length }, "Flushed open handles");
  }

  /**
   * Stop the interval flusher, then sync and close every held-open handle.
   *
   * Writes already in flight complete first; writes issued after this
   * call fail with StoreDisposedError.
   */
  async dispose(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.log.warn("Disposing of the file system store");

    if (this.flusher) {
      this.flusher.dispose();
      await this.flusher.whenIdle();
    }

    const held = [...this.handles.values()];
    this.handles.clear();
    await Promise.all(held.map((slot) => this.release(slot)));
  }

  private enqueueWrite(leaf: EntryKey, content: ByteStream): Promise<void> {
    const slot = this.acquire(leaf);
    const result = slot.tail.then(async () => {
      if (!slot.handle) {
        await mkdir(dirname(slot.path), { recursive: true });
        slot.handle = await open(slot.path, "w");
        this.log.debug({ key: leaf }, "Creating entry");
      }
      await rewrite(slot.handle, content);
      if (this.policy.mode === "auto") {
        await slot.handle.sync();
      }
    });
    // Failures reach the caller through `result`; later writes on the key still run.
    slot.tail = result.catch(() => undefined);
    return result;
  }

  /**
   * Run a read after the writes queued on the key; writes queued later
   * wait for it.
   */
  private inWriteOrder<R>(leaf: EntryKey, task: () => Promise<R>): Promise<R> {
    const slot = this.handles.get(leaf);
    if (!slot) {
      return task();
    }
    const result = slot.tail.then(task);
    slot.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private acquire(leaf: EntryKey): HeldHandle {
    let slot = this.handles.get(leaf);
    if (!slot) {
      slot = { path: entryPath(this.root, leaf), tail: Promise.resolve() };
      this.handles.set(leaf, slot);
    }
    return slot;
  }

  private async release(slot: HeldHandle): Promise<void> {
    await slot.tail;
    const handle = slot.handle;
    if (!handle) return;
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StoreDisposedError(`ShardedFileStore(${this.root})`);
    }
  }
}

/**
 * True if a regular file exists at path
 */
async function isEntryFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Replace the whole file content behind an open handle
 */
async function rewrite(handle: FileHandle, content: ByteStream): Promise<void> {
  await handle.truncate(0);
  let position = 0;
  for await (const chunk of content) {
    let offset = 0;
    while (offset < chunk.length) {
      const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset, position);
      offset += bytesWritten;
      position += bytesWritten;
    }
  }
}
