/**
 * Periodic flush timer.
 *
 * Calls a flush callback every `intervalMs` until stopped. Ticks are
 * non-reentrant: a tick that fires while the previous flush is still
 * pending is skipped rather than queued, so flushes never overlap.
 */

import { createLogger, type Logger, logError } from "../logging/index.js";
import { StoreConfigurationError, StoreDisposedError } from "../store/errors.js";

/**
 * Options for the interval flusher.
 */
export interface IntervalFlusherOptions {
  /** Period between flushes in milliseconds (positive, finite) */
  intervalMs: number;
  /** Flush callback */
  flush: () => Promise<void>;
  /** Called with every error the flush callback rejects with */
  onError?: (error: unknown) => void;
  logger?: Logger;
}

/**
 * Cancellable periodic timer driving a flush callback.
 */
export interface IntervalFlusher {
  /** Start the timer; no-op when already running */
  start: () => void;
  /** Cancel the timer; it can be started again */
  stop: () => void;
  /** Stop the timer for good */
  dispose: () => void;
  /** Resolves once no flush triggered by the timer is in flight */
  whenIdle: () => Promise<void>;
  isRunning: () => boolean;
  isFlushing: () => boolean;
}

export function createIntervalFlusher(options: IntervalFlusherOptions): IntervalFlusher {
  const { intervalMs, flush, onError } = options;
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new StoreConfigurationError(
      `Flush interval must be a positive number of milliseconds, got ${intervalMs}`,
    );
  }
  const log = options.logger ?? createLogger("interval-flusher");

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;
  let disposed = false;

  const runFlush = async () => {
    try {
      await flush();
    } catch (error) {
      logError(log, error, "Interval flush failed");
      onError?.(error);
    }
  };

  const tick = () => {
    if (inFlight) {
      log.debug({ intervalMs }, "Previous flush still running, skipping tick");
      return;
    }
    inFlight = runFlush().finally(() => {
      inFlight = null;
    });
  };

  const stop = () => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  };

  return {
    start: () => {
      if (disposed) {
        throw new StoreDisposedError("IntervalFlusher");
      }
      if (timer !== null) return;
      timer = setInterval(tick, intervalMs);
      timer.unref();
      log.debug({ intervalMs }, "Interval flush started");
    },
    stop,
    dispose: () => {
      stop();
      disposed = true;
    },
    whenIdle: async () => {
      await inFlight;
    },
    isRunning: () => timer !== null,
    isFlushing: () => inFlight !== null,
  };
}
