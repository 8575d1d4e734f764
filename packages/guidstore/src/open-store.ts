/**
 * Open a store engine from a configuration object.
 */

import { ArchiveStore } from "@guidstore/store-archive";
import { ShardedFileStore } from "@guidstore/store-files";
import { type StoreConfig, type StoreConfigInput, storeConfigSchema } from "@guidstore/config";
import {
  type EntrySerializer,
  type EntryStore,
  type Logger,
  StoreConfigurationError,
} from "@guidstore/core";

export interface OpenStoreOptions {
  serializer?: EntrySerializer;
  logger?: Logger;
  /** Receives errors of interval-driven flushes ("files" engine) */
  onFlushError?: (error: unknown) => void;
}

/**
 * Validate a configuration and open the engine it names.
 *
 * @throws StoreConfigurationError if the configuration is invalid
 *
 * @example
 * ```typescript
 * const store = await openStore({ kind: "files", path: "./data", flush: { mode: "auto" } });
 * await store.writeEntry("6f9619ff-8b86-d011-b42d-00c04fc964ff", { name: "report" });
 * await store.dispose();
 * ```
 */
export async function openStore(
  config: StoreConfigInput,
  options: OpenStoreOptions = {},
): Promise<EntryStore> {
  const parsed = storeConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new StoreConfigurationError("Invalid store configuration", { cause: parsed.error });
  }
  return openValidated(parsed.data, options);
}

function openValidated(config: StoreConfig, options: OpenStoreOptions): Promise<EntryStore> {
  switch (config.kind) {
    case "archive":
      return ArchiveStore.open(config.path, {
        compressionLevel: config.compressionLevel,
        serializer: options.serializer,
        logger: options.logger,
      });
    case "files":
      return ShardedFileStore.open(config.path, {
        flush: config.flush,
        serializer: options.serializer,
        logger: options.logger,
        onFlushError: options.onFlushError,
      });
  }
}
