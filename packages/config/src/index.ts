/**
 * @guidstore/config
 *
 * JSON configuration files with schema validation, and the
 * configuration schema of the store engines.
 */

export * from "./configuration-file.js";
export * from "./store-config.js";
