export * from "./entry-key.js";
