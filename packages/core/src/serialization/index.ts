export * from "./entry-serializer.js";
