/**
 * Archive-backed EntryStore
 *
 * Stores every entry inside one ZIP container. Entry names follow the
 * shared addressing scheme ("ab/ab12...") without directory entries:
 * the container provides its own namespace.
 *
 * The whole container is held in memory while the store is open.
 * ZIP entries cannot be rewritten in place (their compressed size
 * changes), so writes replace the entry and flush() rewrites the
 * complete container: its cost is O(container size).
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Readable } from "node:stream";
import {
  type ByteStream,
  collect,
  createLogger,
  decodeEntry,
  type EntrySchema,
  type EntrySerializer,
  type EntryStore,
  entryAddress,
  isNotFoundError,
  jsonSerializer,
  type Logger,
  StoreConfigurationError,
  StoreDisposedError,
  StoreIOError,
} from "@guidstore/core";
import JSZip from "jszip";

/**
 * Options for ArchiveStore
 */
export interface ArchiveStoreOptions {
  /**
   * DEFLATE level for new entries, 1 to 9 (smallest size); 0 stores
   * entries uncompressed.
   *
   * Default: 9
   */
  compressionLevel?: number;
  /** Payload serializer (default: JSON) */
  serializer?: EntrySerializer;
  logger?: Logger;
}

const DEFAULT_COMPRESSION_LEVEL = 9;

export class ArchiveStore implements EntryStore {
  private dirty = false;
  private closed = false;
  /** Tail of the mutation queue; writes, flush and dispose run one at a time */
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    readonly path: string,
    private container: JSZip,
    private readonly compressionLevel: number,
    private readonly serializer: EntrySerializer,
    private readonly log: Logger,
  ) {}

  /**
   * Open the container at path, creating it if absent.
   *
   * A new container is written to disk immediately so that an
   * unwritable path fails here rather than on first flush.
   *
   * @throws StoreConfigurationError for an empty path or invalid options
   * @throws StoreIOError if the container cannot be read, parsed or created
   */
  static async open(path: string, options: ArchiveStoreOptions = {}): Promise<ArchiveStore> {
    if (path.trim() === "") {
      throw new StoreConfigurationError("Archive path must not be empty");
    }
    const level = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new StoreConfigurationError(`Compression level must be an integer 0-9, got ${level}`);
    }
    const log = options.logger ?? createLogger("archive-store", { path });

    log.debug("Creating or opening archive");
    let container = await loadContainer(path);
    if (!container) {
      container = new JSZip();
      await writeContainer(path, container, level);
    }

    return new ArchiveStore(path, container, level, options.serializer ?? jsonSerializer, log);
  }

  get disposed(): boolean {
    return this.closed;
  }

  /**
   * Number of entries currently held by the container
   */
  get entryCount(): number {
    this.ensureOpen();
    return Object.values(this.container.files).filter((file) => !file.dir).length;
  }

  async writeEntry(key: string, value: unknown): Promise<void> {
    this.ensureOpen();
    const address = entryAddress(key);
    const text = this.serializer.serialize(value);
    await this.enqueue(async () => this.replaceEntry(address, text));
  }

  async writeFile(key: string, content: ByteStream): Promise<void> {
    this.ensureOpen();
    const address = entryAddress(key);
    const bytes = await collect(content);
    this.ensureOpen();
    await this.enqueue(async () => this.replaceEntry(address, bytes));
  }

  async readEntry<T>(key: string, schema?: EntrySchema<T>): Promise<T | undefined> {
    this.ensureOpen();
    const address = entryAddress(key);
    const entry = this.container.file(address);
    if (!entry) {
      return undefined;
    }
    this.log.debug({ address }, "Reading entry");
    const text = await entry.async("string");
    return decodeEntry(this.serializer, address, text, schema);
  }

  async readFile(key: string): Promise<ByteStream | undefined> {
    this.ensureOpen();
    const address = entryAddress(key);
    const entry = this.container.file(address);
    if (!entry) {
      return undefined;
    }
    this.log.debug({ address }, "Reading entry");
    return streamEntry(entry);
  }

  async exists(key: string): Promise<boolean> {
    this.ensureOpen();
    return this.container.file(entryAddress(key)) !== null;
  }

  /**
   * Write the container to disk and reopen it from there.
   */
  async flush(): Promise<void> {
    this.ensureOpen();
    await this.enqueue(async () => {
      await this.persist();
      const reopened = await loadContainer(this.path);
      if (!reopened) {
        throw new StoreIOError("Archive disappeared during flush", this.path);
      }
      this.container = reopened;
    });
  }

  async dispose(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.log.warn("Disposing of the archive");
    await this.enqueue(async () => this.persist());
  }

  private replaceEntry(address: string, data: string | Uint8Array): void {
    if (this.container.file(address)) {
      this.container.remove(address);
    }
    this.container.file(address, data, {
      ...compressionFor(this.compressionLevel),
      createFolders: false,
    });
    this.dirty = true;
    this.log.debug({ address }, "Writing entry");
  }

  private async persist(): Promise<void> {
    if (!this.dirty) return;
    await writeContainer(this.path, this.container, this.compressionLevel);
    this.dirty = false;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const result = this.queue.then(task);
    // Failures reach the caller through `result`; the queue itself keeps going.
    this.queue = result.catch(() => undefined);
    return result;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StoreDisposedError(`ArchiveStore(${this.path})`);
    }
  }
}

/**
 * Load the container at path, or undefined if no file exists there
 */
async function loadContainer(path: string): Promise<JSZip | undefined> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw new StoreIOError("Cannot read archive", path, error);
  }
  try {
    return await JSZip.loadAsync(bytes);
  } catch (error) {
    throw new StoreIOError("Corrupt archive", path, error);
  }
}

/**
 * Write the container through a sibling temporary file, then rename it
 * over the target.
 */
async function writeContainer(path: string, container: JSZip, level: number): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    const bytes = await container.generateAsync({
      type: "nodebuffer",
      ...compressionFor(level),
    });
    await writeFile(tempPath, bytes);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new StoreIOError("Cannot write archive", path, error);
  }
}

interface CompressionSettings {
  compression: "STORE" | "DEFLATE";
  compressionOptions: { level: number } | null;
}

// JSZip reads a DEFLATE level of 0 as "use the default level".
function compressionFor(level: number): CompressionSettings {
  if (level === 0) {
    return { compression: "STORE", compressionOptions: null };
  }
  return { compression: "DEFLATE", compressionOptions: { level } };
}

async function* streamEntry(entry: JSZip.JSZipObject): ByteStream {
  // nodeStream() returns an old-style stream without async iteration.
  const stream = new Readable().wrap(entry.nodeStream("nodebuffer"));
  for await (const chunk of stream) {
    yield typeof chunk === "string" ? Buffer.from(chunk) : chunk;
  }
}
