/**
 * @guidstore/store-files
 *
 * EntryStore backed by a sharded directory tree, one plain file per entry.
 */

export * from "./sharded-file-store.js";
