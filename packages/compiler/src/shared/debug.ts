/**
 * Debug Channels
 *
 * Trace points for following what the compiler decides: which names a
 * library declares, which ids get assigned, what the system builder merges.
 *
 * Channels are switched on through `TESSERA_DEBUG`:
 * ```bash
 * TESSERA_DEBUG=compile npm test          # library compilation only
 * TESSERA_DEBUG=transpile,system npm test # several channels
 * TESSERA_DEBUG=* npm test                # everything
 * ```
 *
 * Call sites stay in place whether or not a channel is on:
 * ```typescript
 * debug.compile("id.assigned", { node, id });
 * debug.system("import", { lib, types });
 * ```
 */

export type DebugData = Record<string, unknown>;

/** Writes one trace point when its channel is on; otherwise does nothing. */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `pretty` for people, `json` for one parseable object per line. */
  format: "json" | "pretty";
  timestamps: boolean;
  output: (message: string) => void;
}

const CORE_CHANNELS = ["transpile", "compile", "system", "layout", "identity"] as const;
type CoreChannel = (typeof CORE_CHANNELS)[number];

const MAX_INLINE_LINE = 100;
const MAX_INLINE_ARRAY = 50;
const MAX_STRING = 60;

let config: DebugConfig = { format: "pretty", timestamps: false, output: console.log };

function readSwitch(): ReadonlySet<string> {
  const raw = process.env["TESSERA_DEBUG"] ?? "";
  if (raw === "" || raw === "0" || raw === "false") return new Set();
  if (raw === "*" || raw === "1" || raw === "true") return new Set(["*"]);
  return new Set(raw.split(",").map((part) => part.trim().toLowerCase()));
}

let enabled = readSwitch();
const extra = new Map<string, DebugChannel>();

function channelOn(name: string): boolean {
  return enabled.has("*") || enabled.has(name.toLowerCase());
}

const silent: DebugChannel = () => {};

function openChannel(name: string): DebugChannel {
  if (!channelOn(name)) return silent;
  return (point, data) => config.output(render(name, point, data));
}

function render(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    const record: Record<string, unknown> = { channel, point };
    if (data) record["data"] = data;
    if (config.timestamps) record["timestamp"] = Date.now();
    return JSON.stringify(record);
  }

  const stamp = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const head = `${stamp}[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return head;
  return `${head} ${renderRecord(data, 0)}`;
}

function renderRecord(data: object, depth: number): string {
  const pairs = Object.entries(data).map(([key, value]) => `${key}=${renderValue(value, depth)}`);
  if (pairs.length === 0) return "{}";
  const line = `{ ${pairs.join(", ")} }`;
  if (depth > 0 || line.length <= MAX_INLINE_LINE) return line;
  return `{\n  ${pairs.join(",\n  ")}\n}`;
}

function renderValue(value: unknown, depth: number): string {
  switch (typeof value) {
    case "string":
      return value.length > MAX_STRING ? `"${value.slice(0, MAX_STRING - 3)}..."` : `"${value}"`;
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    case "undefined":
      return "undefined";
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return renderArray(value, depth);
      return renderObject(value, depth);
    default:
      return `<${typeof value}>`;
  }
}

function renderArray(items: readonly unknown[], depth: number): string {
  if (items.length === 0) return "[]";
  if (items.length <= 3 && depth < 2) {
    const line = `[${items.map((item) => renderValue(item, depth + 1)).join(", ")}]`;
    if (line.length <= MAX_INLINE_ARRAY) return line;
  }
  return `[${items.length} items]`;
}

function renderObject(value: object, depth: number): string {
  // Named things (libraries, fqns) and type nodes read best by their label.
  if ("name" in value && typeof value.name === "string") return `<${value.name}>`;
  if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
  return depth < 1 ? renderRecord(value, depth + 1) : "{...}";
}

function openCore(): Record<CoreChannel, DebugChannel> {
  return {
    transpile: openChannel("transpile"),
    compile: openChannel("compile"),
    system: openChannel("system"),
    layout: openChannel("layout"),
    identity: openChannel("identity"),
  };
}

/**
 * Channels of the compiler stages: `transpile` (declarations to a symbolic
 * library), `compile` (symbolic library to ids), `system` (builder and type
 * system codec), `layout` (type trees) and `identity` (id text forms).
 */
export const debug: Record<CoreChannel, DebugChannel> = openCore();

export type Debug = typeof debug;

/** A channel outside the core set, for packages built on the compiler. */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (key === "") return silent;
  let channel = extra.get(key);
  if (!channel) {
    channel = openChannel(key);
    extra.set(key, channel);
  }
  return channel;
}

/** Re-reads `TESSERA_DEBUG` and reopens every channel handed out so far. */
export function refreshDebugChannels(): void {
  enabled = readSwitch();
  Object.assign(debug, openCore());
  for (const key of [...extra.keys()]) extra.set(key, openChannel(key));
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  return channel === undefined ? enabled.size > 0 : channelOn(channel);
}
