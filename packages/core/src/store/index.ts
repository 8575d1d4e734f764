export * from "./entry-store.js";
export * from "./errors.js";
