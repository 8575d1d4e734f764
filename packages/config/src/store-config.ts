/**
 * Store configuration schema
 */

import { z } from "zod";

export const flushPolicySchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("auto") }),
  z.object({ mode: z.literal("manual") }),
  z.object({ mode: z.literal("interval"), intervalMs: z.number().finite().positive() }),
]);

export const storeConfigSchema = z.object({
  /** "archive": single ZIP container; "files": sharded directory tree */
  kind: z.enum(["archive", "files"]),
  /** Container file (archive) or root directory (files) */
  path: z.string().trim().min(1),
  /** Only used by the "files" engine */
  flush: flushPolicySchema.default({ mode: "manual" }),
  /** Only used by the "archive" engine */
  compressionLevel: z.number().int().min(0).max(9).default(9),
});

export type StoreConfig = z.infer<typeof storeConfigSchema>;
export type StoreConfigInput = z.input<typeof storeConfigSchema>;

/**
 * Fields copied by ConfigurationFile when loading a StoreConfig
 */
export const storeConfigFields = [
  "kind",
  "path",
  "flush",
  "compressionLevel",
] as const satisfies readonly (keyof StoreConfig)[];
