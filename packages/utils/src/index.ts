/**
 * @guidstore/utils
 *
 * Small helpers used around the stores: size formatting and
 * file name / string checks.
 */

export * from "./format/file-size.js";
export * from "./strings/strings.js";
