/**
 * @guidstore/storage-tests
 *
 * Conformance test suites shared by the store engines.
 */

export * from "./suites/index.js";
