/**
 * Debug Channels
 *
 * Targeted trace output for path arithmetic and file-system operations.
 * Channels are off unless named in the TREEKIT_DEBUG environment variable:
 *
 * ```bash
 * TREEKIT_DEBUG=file npm test          # file operations only
 * TREEKIT_DEBUG=directory,hash npm test
 * TREEKIT_DEBUG=* npm test             # everything
 * ```
 *
 * In code (always present, a no-op when disabled):
 * ```typescript
 * debug.file("move", { from, to, policy });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.error) */
  output: (message: string) => void;
}

const ENV_VAR = "TREEKIT_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.error,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugEnv();

/** Channels created through getDebugChannel() */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 80) return `"${value.slice(0, 77)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (value instanceof Date) return value.toISOString();
  // Path values and other objects that render themselves
  if (typeof value === "object" && value.toString !== Object.prototype.toString) {
    const rendered = String(value);
    if (rendered !== "[object Object]") return `"${rendered}"`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }

  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read TREEKIT_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.syntax = createChannel("syntax");
  debug.file = createChannel("file");
  debug.directory = createChannel("directory");
  debug.hash = createChannel("hash");
  debug.host = createChannel("host");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

/**
 * Configure debug output format.
 */
export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel (or the given one) is enabled.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Normalization, combination and relative-path computation */
  syntax: createChannel("syntax"),

  /** File-scoped operations (write, move, copy, touch) */
  file: createChannel("file"),

  /** Directory-scoped operations (enumeration, recursive move/copy) */
  directory: createChannel("directory"),

  /** File and file-set digests */
  hash: createChannel("hash"),

  /** Primitive calls into a file-system host */
  host: createChannel("host"),
};

export type Debug = typeof debug;
