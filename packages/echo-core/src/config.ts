// Service configuration: defaults, ECHO_* environment variables, overrides.

/** Configuration for the echo server and its stream handlers. */
export interface EchoConfig {
  /** Interface to bind. */
  host: string;
  /** Port to bind. */
  port: number;
  /** Calls admitted at once; further calls get RESOURCE_EXHAUSTED. */
  maxConcurrentCalls: number;
  /** Max message size in bytes, both directions. */
  maxMessageBytes: number;
  /** Capacity of each relay queue of an async bidirectional call. */
  queueCapacity: number;
  /** Upper bound on how long a blocked activity goes without re-checking cancellation. */
  pollIntervalMs: number;
  /** Responses sent per server-streaming call. */
  fanOutCount: number;
  /** Pause between server-streaming responses. */
  fanOutIntervalMs: number;
  /** Simulated processing time per message in the async pipeline. */
  processingDelayMs: number;
  /** How long an async call waits for its spawned activities after emission ends. */
  joinTimeoutMs: number;
  /** Grace period for in-flight calls on shutdown. */
  shutdownGraceMs: number;
}

/** Default configuration. */
export function defaultEchoConfig(): EchoConfig {
  return {
    host: "0.0.0.0",
    port: 8080,
    maxConcurrentCalls: 10,
    maxMessageBytes: 50 * 1024 * 1024,
    queueCapacity: 10,
    pollIntervalMs: 100,
    fanOutCount: 5,
    fanOutIntervalMs: 100,
    processingDelayMs: 200,
    joinTimeoutMs: 1000,
    shutdownGraceMs: 5000,
  };
}

export class ConfigError extends Error {
  constructor(
    public field: keyof EchoConfig,
    public source: string,
    message: string,
  ) {
    super(`${field} (from ${source}): ${message}`);
    this.name = "ConfigError";
  }
}

type NumericField = Exclude<keyof EchoConfig, "host">;

const ENV_NAMES: Record<keyof EchoConfig, string> = {
  host: "ECHO_HOST",
  port: "ECHO_PORT",
  maxConcurrentCalls: "ECHO_MAX_CALLS",
  maxMessageBytes: "ECHO_MAX_MESSAGE_BYTES",
  queueCapacity: "ECHO_QUEUE_CAPACITY",
  pollIntervalMs: "ECHO_POLL_INTERVAL_MS",
  fanOutCount: "ECHO_FAN_OUT_COUNT",
  fanOutIntervalMs: "ECHO_FAN_OUT_INTERVAL_MS",
  processingDelayMs: "ECHO_PROCESSING_DELAY_MS",
  joinTimeoutMs: "ECHO_JOIN_TIMEOUT_MS",
  shutdownGraceMs: "ECHO_SHUTDOWN_GRACE_MS",
};

const NUMERIC_FIELDS: readonly NumericField[] = [
  "port",
  "maxConcurrentCalls",
  "maxMessageBytes",
  "queueCapacity",
  "pollIntervalMs",
  "fanOutCount",
  "fanOutIntervalMs",
  "processingDelayMs",
  "joinTimeoutMs",
  "shutdownGraceMs",
];

// Fields where zero makes no sense.
const POSITIVE_FIELDS: ReadonlySet<NumericField> = new Set([
  "port",
  "maxConcurrentCalls",
  "maxMessageBytes",
  "queueCapacity",
  "pollIntervalMs",
  "fanOutCount",
]);

/**
 * Build the effective configuration.
 *
 * Later sources win: defaults, then `ECHO_*` variables from `env`, then
 * `overrides` (typically CLI flags).
 */
export function resolveConfig(
  overrides: Partial<EchoConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): EchoConfig {
  const config = defaultEchoConfig();

  const host = env[ENV_NAMES.host];
  if (host) config.host = host;

  for (const field of NUMERIC_FIELDS) {
    const raw = env[ENV_NAMES[field]];
    if (raw === undefined || raw === "") continue;
    config[field] = parseInteger(field, raw, ENV_NAMES[field]);
  }

  if (overrides.host !== undefined) config.host = overrides.host;
  for (const field of NUMERIC_FIELDS) {
    const value = overrides[field];
    if (value !== undefined) config[field] = value;
  }

  validateConfig(config);
  return config;
}

/** Check ranges; throws ConfigError on the first bad field. */
export function validateConfig(config: EchoConfig): void {
  if (config.host.trim() === "") {
    throw new ConfigError("host", "config", "must not be empty");
  }
  for (const field of NUMERIC_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(field, "config", `expected a non-negative integer, got ${value}`);
    }
    if (POSITIVE_FIELDS.has(field) && value === 0) {
      throw new ConfigError(field, "config", "must be greater than zero");
    }
  }
  if (config.port > 65535) {
    throw new ConfigError("port", "config", `expected 1-65535, got ${config.port}`);
  }
}

function parseInteger(field: NumericField, raw: string, source: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(field, source, `expected a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}
