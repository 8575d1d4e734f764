/**
 * guidstore
 *
 * Embedded key-value store for JSON values and byte blobs under GUID keys,
 * backed by a single ZIP container or by a sharded directory tree.
 *
 * @example
 * ```typescript
 * import { ArchiveStore } from "guidstore";
 *
 * const store = await ArchiveStore.open("db.zip");
 * await store.writeEntry("11111111-1111-1111-1111-111111111111", { a: 1 });
 * await store.readEntry("11111111-1111-1111-1111-111111111111"); // { a: 1 }
 * await store.dispose();
 * ```
 */

export * from "@guidstore/config";
export * from "@guidstore/core";
export * from "@guidstore/store-archive";
export * from "@guidstore/store-files";
export * from "@guidstore/utils";
export * from "./open-store.js";
