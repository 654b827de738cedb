/**
 * Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, createLogger } from "@pickler/core";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    config.reset();
    dir = mkdtempSync(join(tmpdir(), "pickler-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
    rmSync(dir, { recursive: true, force: true });
  });

  it("should fall back to defaults", () => {
    config.loadFrom(dir);
    expect(config.resolved()).toEqual({ debug: false, tagKey: "$type", omitDefaults: true });
  });

  it("should read an rc file", () => {
    writeFileSync(join(dir, ".picklerrc.json"), JSON.stringify({ tagKey: "kind", plugins: { x: 1 } }));
    config.loadFrom(dir);
    expect(config.resolved()).toEqual({ debug: false, tagKey: "kind", omitDefaults: true });
  });

  it("should read the pickler key of package.json", () => {
    writeFileSync(join(dir, "package.json"), JSON.stringify({ name: "app", pickler: { omitDefaults: false } }));
    config.loadFrom(dir);
    expect(config.resolved().omitDefaults).toBe(false);
  });

  it("should let environment variables win over files", () => {
    writeFileSync(join(dir, ".picklerrc.json"), JSON.stringify({ tagKey: "kind" }));
    vi.stubEnv("PICKLER_TAG_KEY", "tag");
    vi.stubEnv("PICKLER_OMIT_DEFAULTS", "0");
    vi.stubEnv("PICKLER_NO_COLOR", "1");
    config.loadFrom(dir);
    expect(config.resolved()).toEqual({ debug: false, tagKey: "tag", omitDefaults: false });
  });

  it("should apply programmatic values", () => {
    config.loadFrom(dir);
    config.set({ omitDefaults: false });
    expect(config.resolved()).toEqual({ debug: false, tagKey: "$type", omitDefaults: false });
  });

  it("should reject a value of the wrong type", () => {
    writeFileSync(join(dir, ".picklerrc.json"), JSON.stringify({ tagKey: 3 }));
    config.loadFrom(dir);
    expect(() => config.resolved()).toThrow("pickler config: 'tagKey' must be a string, got number");
  });

  it("should reject a configuration that is not an object", () => {
    writeFileSync(join(dir, ".picklerrc.json"), "[1]");
    expect(() => config.loadFrom(dir)).toThrow(/pickler configuration must be an object/);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should prefix lines with its scope", () => {
    const lines: string[] = [];
    const log = createLogger("macro", { verbose: true, sink: (level, line) => lines.push(`${level} ${line}`) });
    log.debug("expanding");
    log.warn("careful");
    expect(lines).toEqual(["debug [pickler:macro] expanding", "warn [pickler:macro] careful"]);
  });

  it("should drop debug lines unless enabled", () => {
    const lines: string[] = [];
    const log = createLogger("macro", { verbose: false, sink: (_level, line) => lines.push(line) });
    log.debug("hidden");
    log.warn("shown");
    expect(log.enabled).toBe(false);
    expect(lines).toEqual(["[pickler:macro] shown"]);
  });

  it("should follow the debug setting by default", () => {
    vi.stubEnv("PICKLER_DEBUG", "1");
    config.reset();
    expect(createLogger("macro", { sink: () => {} }).enabled).toBe(true);
  });
});
