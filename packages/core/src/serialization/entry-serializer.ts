/**
 * Conversion between stored entry text and caller values.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { MalformedEntryError } from "../store/errors.js";

/**
 * Zod schema that produces a T from any input.
 */
export type EntrySchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Serializer contract used by the store engines.
 */
export interface EntrySerializer {
  /** Encode a value as text */
  serialize(value: unknown): string;

  /**
   * Decode text into a value.
   *
   * When a schema is given the decoded value is validated against it.
   * Throws on malformed input.
   */
  deserialize<T>(text: string, schema?: EntrySchema<T>): T;
}

/**
 * Plain JSON serializer with optional zod validation on read.
 */
export const jsonSerializer: EntrySerializer = {
  serialize(value: unknown): string {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new TypeError(`Cannot serialize a value of type ${typeof value}`);
    }
    return text;
  },

  deserialize<T>(text: string, schema?: EntrySchema<T>): T {
    const parsed = JSON.parse(text);
    return schema ? schema.parse(parsed) : parsed;
  },
};

/**
 * Decode an entry payload, reporting any failure as a MalformedEntryError.
 */
export function decodeEntry<T>(
  serializer: EntrySerializer,
  key: string,
  text: string,
  schema?: EntrySchema<T>,
): T {
  try {
    return serializer.deserialize(text, schema);
  } catch (error) {
    throw new MalformedEntryError(key, error);
  }
}
