export * from "./entry-store.suite.js";
