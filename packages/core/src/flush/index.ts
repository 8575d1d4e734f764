export * from "./interval-flusher.js";
