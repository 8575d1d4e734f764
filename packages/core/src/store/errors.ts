/**
 * Error taxonomy shared by every store engine.
 *
 * Reading an absent key is never an error: engines return `undefined`.
 */

/**
 * Base class for all store errors.
 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * Thrown when a key is not a 128-bit identifier in one of the accepted forms.
 */
export class InvalidKeyError extends StoreError {
  readonly key: string;

  constructor(key: string) {
    super(`Invalid entry key: "${key}"`);
    this.name = "InvalidKeyError";
    this.key = key;
  }
}

/**
 * Thrown when an entry exists but its payload cannot be decoded
 * as the requested value.
 */
export class MalformedEntryError extends StoreError {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super(`Entry ${key} holds a malformed payload`, { cause });
    this.name = "MalformedEntryError";
    this.key = key;
  }
}

/**
 * Thrown by any operation called on a store after dispose().
 */
export class StoreDisposedError extends StoreError {
  constructor(store: string) {
    super(`${store} has been disposed`);
    this.name = "StoreDisposedError";
  }
}

/**
 * Thrown at construction time for invalid store options.
 */
export class StoreConfigurationError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreConfigurationError";
  }
}

/**
 * Thrown when the backing file or directory cannot be opened or persisted.
 */
export class StoreIOError extends StoreError {
  /** Backing path the operation failed on */
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}`, { cause });
    this.name = "StoreIOError";
    this.path = path;
  }
}

/**
 * Check if error is a Node.js "not found" error
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}
