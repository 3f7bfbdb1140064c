// Logger that keeps its entries in memory for assertions.

import type { Logger, LogLevel } from "../logging.ts";

export interface LogEntry {
  level: LogLevel;
  namespace: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface RecordingLogger extends Logger {
  /** Entries from this logger and all its children, in order. */
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

export function recordingLogger(namespace = "test"): RecordingLogger {
  const entries: LogEntry[] = [];
  return build(namespace, entries);
}

function build(namespace: string, entries: LogEntry[]): RecordingLogger {
  const write =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      entries.push(data ? { level, namespace, message, data } : { level, namespace, message });
    };

  return {
    namespace,
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (suffix) => build(`${namespace}:${suffix}`, entries),
  };
}
