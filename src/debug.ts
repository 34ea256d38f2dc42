/**
 * Shared debug logging utility.
 * Enable with --debug (or --verbose for timings) or by setting
 * globalThis.__IDENTMATCH_DEBUG__ / __IDENTMATCH_VERBOSE__ = true
 */

const DEBUG_FLAG = "__IDENTMATCH_DEBUG__";
const VERBOSE_FLAG = "__IDENTMATCH_VERBOSE__";

function readFlag(name: string): boolean {
  return !!(globalThis as Record<string, unknown>)[name];
}

function writeFlag(name: string, on: boolean): void {
  (globalThis as Record<string, unknown>)[name] = on;
}

/**
 * Check if debug mode is enabled.
 */
export function isDebugEnabled(): boolean {
  return readFlag(DEBUG_FLAG);
}

/**
 * Check if verbose (timing) output is enabled. Debug implies verbose.
 */
export function isVerboseEnabled(): boolean {
  return readFlag(VERBOSE_FLAG) || isDebugEnabled();
}

export function setDebugEnabled(on: boolean): void {
  writeFlag(DEBUG_FLAG, on);
}

export function setVerboseEnabled(on: boolean): void {
  writeFlag(VERBOSE_FLAG, on);
}

/**
 * Create a debug logger with an optional module prefix.
 * @param prefix Optional prefix to identify the module (e.g., "markers")
 */
export function createDebugLogger(prefix?: string) {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  return (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.error(tag, ...args);
    }
  };
}

/**
 * Progress output shown with --verbose. Goes to stderr so JSON on stdout stays clean.
 */
export function verbose(...args: unknown[]): void {
  if (isVerboseEnabled()) {
    console.error(...args);
  }
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Format duration in milliseconds to a readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Time a synchronous function and log the result in verbose mode.
 * @param label Label for the timing output
 * @param fn Function to time
 * @param prefix Optional prefix for the log (stage or input name)
 */
export function timeSync<T>(label: string, fn: () => T, prefix?: string): T {
  if (!isVerboseEnabled()) {
    return fn();
  }

  const tag = prefix ? `[TIME ${prefix}]` : "[TIME]";
  const start = performance.now();
  const startTime = new Date();

  try {
    const result = fn();
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: ${formatDuration(elapsed)}`);
    return result;
  } catch (err) {
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: FAILED after ${formatDuration(elapsed)}`);
    throw err;
  }
}

/**
 * Create a scoped timer for measuring multiple stages.
 * @param prefix Optional prefix for all logs
 */
export function createTimer(prefix?: string) {
  const tag = prefix ? `[TIME ${prefix}]` : "[TIME]";
  const overallStart = performance.now();

  return {
    time<T>(label: string, fn: () => T): T {
      return timeSync(label, fn, prefix);
    },

    /**
     * Log total elapsed time.
     */
    done(label = "Total"): void {
      if (isVerboseEnabled()) {
        const elapsed = performance.now() - overallStart;
        console.error(`${tag} ${formatTimestamp(new Date())} ${label}: ${formatDuration(elapsed)}`);
      }
    },
  };
}
