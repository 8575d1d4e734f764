/**
 * @guidstore/core
 *
 * Shared building blocks of the store engines: key addressing,
 * the EntryStore contract, errors, serialization, byte streams,
 * logging and the interval flusher.
 */

export * from "./flush/index.js";
export * from "./keys/index.js";
export * from "./logging/index.js";
export * from "./serialization/index.js";
export * from "./store/index.js";
export * from "./streams/index.js";
