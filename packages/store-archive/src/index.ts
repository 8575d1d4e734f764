/**
 * @guidstore/store-archive
 *
 * EntryStore backed by a single compressed ZIP container.
 */

export * from "./archive-store.js";
