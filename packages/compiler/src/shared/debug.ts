/**
 * Debug Channels
 *
 * Targeted debug logging for following data flow through the store, snapshot,
 * cache and scheduler layers. Channels are always present in code and cost a
 * single no-op call when disabled.
 *
 * Enable via environment variable:
 * ```bash
 * QUILL_DEBUG=cache npm test            # one channel
 * QUILL_DEBUG=cache,scheduler npm test  # several
 * QUILL_DEBUG=* npm test                # everything
 * ```
 *
 * Hosts can override the environment at runtime with `setDebugChannels`.
 */

export type DebugData = Record<string, unknown>;

/** Logs when enabled, no-op when disabled. */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to stderr so stdio transports stay clean. */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => process.stderr.write(`${message}\n`),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseChannelList(raw: string): Set<string> {
  if (!raw || raw === "0" || raw === "false") return new Set();
  if (raw === "*" || raw === "1" || raw === "true") return new Set(["*"]);
  return new Set(raw.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseChannelList(process.env["QUILL_DEBUG"] ?? "");

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
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) return `[${value.map((v) => formatValue(v)).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
    return "{...}";
  }
  return String(value);
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

const CHANNEL_NAMES = ["store", "snapshot", "cache", "scheduler", "publisher", "query", "compile", "server"] as const;
export type DebugChannelName = (typeof CHANNEL_NAMES)[number];

function createChannels(): Record<DebugChannelName, DebugChannel> {
  return {
    store: createChannel("store"),
    snapshot: createChannel("snapshot"),
    cache: createChannel("cache"),
    scheduler: createChannel("scheduler"),
    publisher: createChannel("publisher"),
    query: createChannel("query"),
    compile: createChannel("compile"),
    server: createChannel("server"),
  };
}

/**
 * Debug channels per subsystem. Always look channels up at call time
 * (`debug.cache(...)`), since refreshing replaces them.
 */
export const debug: Record<DebugChannelName, DebugChannel> = createChannels();

function refresh(): void {
  Object.assign(debug, createChannels());
}

/** Re-read QUILL_DEBUG. */
export function refreshDebugChannels(): void {
  enabledChannels = parseChannelList(process.env["QUILL_DEBUG"] ?? "");
  refresh();
}

/** Replace the enabled channel set; `null` falls back to the environment. */
export function setDebugChannels(channels: readonly string[] | null): void {
  if (channels === null) {
    refreshDebugChannels();
    return;
  }
  enabledChannels = new Set(channels.map((c) => c.trim().toLowerCase()).filter(Boolean));
  refresh();
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: DebugChannelName): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const DEBUG_CHANNELS: readonly DebugChannelName[] = CHANNEL_NAMES;
