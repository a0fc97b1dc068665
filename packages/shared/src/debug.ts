/**
 * Debug Channels
 *
 * Targeted debug output for following how modules are split into variants
 * and how prebuilt paths are composed. Each channel is a function that is a
 * no-op unless enabled.
 *
 * Enable via environment variable:
 * ```bash
 * NDK_GRAPH_DEBUG=mutate npm test         # Just the variant mutator
 * NDK_GRAPH_DEBUG=prebuilt,stl npm test   # Multiple channels
 * NDK_GRAPH_DEBUG=* npm test              # Everything
 * ```
 *
 * In code:
 * ```typescript
 * debug.mutate("variants.created", { module: "libfoo", kinds: ["static", "shared"] });
 * ```
 */

export const DEBUG_ENV_VAR = "NDK_GRAPH_DEBUG";

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

/** Parse a channel list as found in NDK_GRAPH_DEBUG. */
export function parseDebugChannels(value: string | undefined): Set<string> {
  const env = value?.trim() ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter(Boolean),
  );
}

let enabledChannels = parseDebugChannels(process.env[DEBUG_ENV_VAR]);

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatDebugMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
  timestamp?: Date,
): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(timestamp && { timestamp: timestamp.toISOString() }),
    });
  }

  const prefix = timestamp ? `[${timestamp.toISOString()}] ` : "";
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
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("name" in value && typeof value.name === "string") {
      return `<${value.name}>`;
    }
    return "{...}";
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
    const message = formatDebugMessage(name, point, data, config.timestamps ? new Date() : undefined);
    config.output(message);
  };
}

/**
 * Re-read NDK_GRAPH_DEBUG (or use an explicit channel list) and rebuild
 * every channel.
 */
export function refreshDebugChannels(channels?: string): void {
  enabledChannels = parseDebugChannels(channels ?? process.env[DEBUG_ENV_VAR]);
  debug.mutate = createChannel("mutate");
  debug.reuse = createChannel("reuse");
  debug.prebuilt = createChannel("prebuilt");
  debug.stl = createChannel("stl");
  debug.link = createChannel("link");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Restore the default output format and destination. */
export function resetDebugConfig(): void {
  config = { ...DEFAULT_CONFIG };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Variant expansion (one logical module → static/shared variants) */
  mutate: createChannel("mutate"),

  /** Object reuse between static and shared variants */
  reuse: createChannel("reuse"),

  /** Platform prebuilt directory and file name composition */
  prebuilt: createChannel("prebuilt"),

  /** STL flavor lookup */
  stl: createChannel("stl"),

  /** Link phase dispatch */
  link: createChannel("link"),
};
