/**
 * JSON configuration file bound to a zod schema.
 *
 * The caller constructs and owns each instance; there is no global one.
 * load() copies the validated file content onto the live values field by
 * field, following the explicit `fields` table, so references obtained
 * from `values` before a load observe the loaded data.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  createLogger,
  type EntrySchema,
  isNotFoundError,
  type Logger,
  StoreConfigurationError,
} from "@guidstore/core";

export type ConfigurationListener<T> = (values: Readonly<T>) => void;

/**
 * Options for ConfigurationFile
 */
export interface ConfigurationFileOptions<T extends object> {
  /** Path of the JSON file */
  path: string;
  /** Schema validating file content */
  schema: EntrySchema<T>;
  /** Fields copied from the file onto the live values */
  fields: readonly (keyof T)[];
  /** Initial values, written out when the file does not exist yet */
  defaults: T;
  logger?: Logger;
}

export class ConfigurationFile<T extends object> {
  /** Configuration file path; may be reassigned before load()/save() */
  path: string;

  private readonly schema: EntrySchema<T>;
  private readonly fields: readonly (keyof T)[];
  private readonly current: T;
  private readonly log: Logger;
  private readonly loadedListeners = new Set<ConfigurationListener<T>>();
  private readonly savedListeners = new Set<ConfigurationListener<T>>();

  constructor(options: ConfigurationFileOptions<T>) {
    this.path = options.path;
    this.schema = options.schema;
    this.fields = options.fields;
    this.current = { ...options.defaults };
    this.log = options.logger ?? createLogger("config");
  }

  /**
   * Live configuration values
   */
  get values(): Readonly<T> {
    return this.current;
  }

  /**
   * Change one value in memory; call save() to persist it.
   */
  set<K extends keyof T>(field: K, value: T[K]): void {
    this.current[field] = value;
  }

  /**
   * Load the file, or create it from the current values if it is missing.
   *
   * @throws StoreConfigurationError if the path is empty or the file
   * content is not valid JSON matching the schema
   */
  async load(): Promise<Readonly<T>> {
    const path = this.requirePath();
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        await this.save();
        return this.current;
      }
      throw error;
    }

    this.log.debug({ path }, "Loading config file");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StoreConfigurationError(`Config file is not valid JSON: ${path}`, { cause: error });
    }
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreConfigurationError(`Config file does not match its schema: ${path}`, {
        cause: parsed.error,
      });
    }
    this.merge(parsed.data);

    for (const listener of this.loadedListeners) {
      listener(this.current);
    }
    return this.current;
  }

  /**
   * Write the current values as indented JSON.
   *
   * @throws StoreConfigurationError if the path is empty
   */
  async save(): Promise<void> {
    const path = this.requirePath();
    this.log.debug({ path }, "Saving config file");
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(this.current, null, 2), "utf8");

    for (const listener of this.savedListeners) {
      listener(this.current);
    }
  }

  /**
   * Register a listener called after every successful load.
   * @returns Function removing the listener
   */
  onLoaded(listener: ConfigurationListener<T>): () => void {
    this.loadedListeners.add(listener);
    return () => this.loadedListeners.delete(listener);
  }

  /**
   * Register a listener called after every save.
   * @returns Function removing the listener
   */
  onSaved(listener: ConfigurationListener<T>): () => void {
    this.savedListeners.add(listener);
    return () => this.savedListeners.delete(listener);
  }

  private merge(source: T): void {
    for (const field of this.fields) {
      this.current[field] = source[field];
    }
  }

  private requirePath(): string {
    if (this.path.trim() === "") {
      throw new StoreConfigurationError("Configuration file path is not set");
    }
    return this.path;
  }
}
