// Namespaced console logging.
//
// Debug output follows the `DEBUG` environment variable pattern list (like
// npm's debug package): `echo:*`, `echo:rpc,echo:server`, `*,-echo:pipeline`.
// info, warn and error lines are always written.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  readonly namespace: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger for `${namespace}:${suffix}` sharing these options. */
  child(suffix: string): Logger;
}

export interface LoggerOptions {
  /**
   * Debug pattern list. Defaults to `process.env.DEBUG`.
   */
  debug?: string;

  /**
   * Emit debug output for every namespace regardless of the pattern.
   */
  verbose?: boolean;

  /**
   * Suppress everything below this level. Defaults to "debug" (debug lines are
   * still subject to the pattern).
   */
  minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix); later patterns win.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  // Convert glob pattern to regex
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace.
 *
 * @example
 * ```typescript
 * const log = createLogger("echo:server", { verbose: true });
 * log.info("listening", { port: 8080 });
 * // [2026-01-01T00:00:00.000Z] INFO echo:server listening { port: 8080 }
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const debugPattern = options.debug ?? process.env.DEBUG;
  const verbose = options.verbose ?? false;
  const minLevel = LEVEL_ORDER[options.minLevel ?? "debug"];
  const debugEnabled = verbose || isEnabled(namespace, debugPattern);

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < minLevel) return;
    if (level === "debug" && !debugEnabled) return;

    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${namespace} ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (data && Object.keys(data).length > 0) {
      sink(line, data);
    } else {
      sink(line);
    }
  };

  return {
    namespace,
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    child: (suffix) => createLogger(`${namespace}:${suffix}`, options),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  namespace: "silent",
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
