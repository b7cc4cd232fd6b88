/**
 * Debug channels: activation through TESSERA_DEBUG, pretty and JSON output,
 * and runtime configuration.
 */
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  configureDebug,
  debug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
} from "../../src/shared/debug.js";

// =============================================================================
// Helpers
// =============================================================================

function capture(): string[] {
  const messages: string[] = [];
  configureDebug({ output: (msg) => messages.push(msg) });
  return messages;
}

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env["TESSERA_DEBUG"];
  } else {
    process.env["TESSERA_DEBUG"] = value;
  }
  refreshDebugChannels();
}

let originalEnv: string | undefined;

beforeEach(() => {
  originalEnv = process.env["TESSERA_DEBUG"];
  configureDebug({ format: "pretty", timestamps: false });
});

afterEach(() => {
  setDebugEnv(originalEnv);
  configureDebug({ format: "pretty", timestamps: false, output: console.log });
});

// =============================================================================
// Activation
// =============================================================================

describe("debug channel activation", () => {
  test("channels are disabled without the env var", () => {
    setDebugEnv(undefined);
    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("compile")).toBe(false);
  });

  test.each(["0", "false", ""])("TESSERA_DEBUG=%j disables everything", (value) => {
    setDebugEnv(value);
    expect(isDebugEnabled()).toBe(false);
  });

  test.each(["*", "1", "true"])("TESSERA_DEBUG=%s enables every channel", (value) => {
    setDebugEnv(value);
    for (const channel of ["transpile", "compile", "system", "layout", "identity"]) {
      expect(isDebugEnabled(channel)).toBe(true);
    }
  });

  test("a channel list is trimmed and case-insensitive", () => {
    setDebugEnv("  COMPILE , System");
    expect(isDebugEnabled("compile")).toBe(true);
    expect(isDebugEnabled("system")).toBe(true);
    expect(isDebugEnabled("layout")).toBe(false);
  });

  test("only enabled channels write", () => {
    setDebugEnv("compile,layout");
    const messages = capture();

    debug.compile("one");
    debug.system("two");
    debug.layout("three");
    debug.identity("four");

    expect(messages).toEqual(["[compile.one]", "[layout.three]"]);
  });

  test("refresh picks up a changed env var", () => {
    setDebugEnv(undefined);
    const messages = capture();
    debug.transpile("before");

    setDebugEnv("transpile");
    debug.transpile("after");

    expect(messages).toEqual(["[transpile.after]"]);
  });

  test("extra channels follow the same switch", () => {
    setDebugEnv("reader");
    const messages = capture();

    getDebugChannel("Reader")("parsed", { declarations: 2 });
    getDebugChannel("other")("ignored");

    expect(messages).toEqual(["[reader.parsed] { declarations=2 }"]);
  });
});

// =============================================================================
// Pretty format
// =============================================================================

describe("pretty formatting", () => {
  beforeEach(() => setDebugEnv("*"));

  test("point without data", () => {
    const messages = capture();
    debug.compile("library");
    debug.compile("library", {});
    expect(messages).toEqual(["[compile.library]", "[compile.library]"]);
  });

  test("scalars inline", () => {
    const messages = capture();
    debug.compile("id.assigned", { node: "Geo.Point", cycle: 2, named: true, name: null });
    expect(messages[0]).toBe('[compile.id.assigned] { node="Geo.Point", cycle=2, named=true, name=null }');
  });

  test("long strings are cut at 57 characters", () => {
    const messages = capture();
    debug.identity("parsed", { text: "x".repeat(80) });
    expect(messages[0]).toBe(`[identity.parsed] { text="${"x".repeat(57)}..." }`);
  });

  test("short arrays inline, long arrays summarized", () => {
    const messages = capture();
    debug.system("import", { libs: ["Std", "Geo"] });
    debug.system("import", { ids: [1, 2, 3, 4] });
    expect(messages).toEqual(['[system.import] { libs=["Std", "Geo"] }', "[system.import] { ids=[4 items] }"]);
  });

  test("objects with a name or kind collapse to it", () => {
    const messages = capture();
    debug.transpile("declared", { lib: { name: "Geo" }, ty: { kind: "struct" } });
    expect(messages[0]).toBe("[transpile.declared] { lib=<Geo>, ty=<struct> }");
  });

  test("timestamps prefix the line when enabled", () => {
    configureDebug({ timestamps: true });
    const messages = capture();
    debug.layout("tree");
    expect(messages[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[layout\.tree\]$/);
  });
});

// =============================================================================
// JSON format
// =============================================================================

describe("JSON formatting", () => {
  beforeEach(() => {
    setDebugEnv("*");
    configureDebug({ format: "json" });
  });

  test("one JSON object per point", () => {
    const messages = capture();
    debug.system("finalize", { libs: 2, types: 7 });
    expect(JSON.parse(messages[0] ?? "")).toEqual({
      channel: "system",
      point: "finalize",
      data: { libs: 2, types: 7 },
    });
  });

  test("data is omitted when absent", () => {
    const messages = capture();
    debug.layout("vesper");
    expect(JSON.parse(messages[0] ?? "")).toEqual({ channel: "layout", point: "vesper" });
  });

  test("partial configuration keeps the other settings", () => {
    const messages = capture();
    configureDebug({ timestamps: true });
    configureDebug({ timestamps: false });
    debug.compile("library");
    expect(JSON.parse(messages[0] ?? "")).toEqual({ channel: "compile", point: "library" });
  });
});
