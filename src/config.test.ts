import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stepshell-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    expect(loadConfig("/nonexistent/path.json")).toEqual({
      implDir: "../gherkin-implements",
      implExtension: ".gherkin",
      logLevel: "info",
      shell: null,
      stepTimeoutMs: null,
      warnOnAmbiguousSteps: false,
    });
  });

  it("merges file values over the defaults", async () => {
    const path = join(dir, "stepshell.config.json");
    await writeFile(path, JSON.stringify({ implDir: "steps", stepTimeoutMs: 5000, warnOnAmbiguousSteps: true }));

    const config = loadConfig(path);

    expect(config.implDir).toBe("steps");
    expect(config.stepTimeoutMs).toBe(5000);
    expect(config.warnOnAmbiguousSteps).toBe(true);
    expect(config.implExtension).toBe(".gherkin");
  });

  it("rejects malformed JSON", async () => {
    const path = join(dir, "stepshell.config.json");
    await writeFile(path, "{ not json");

    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(`Failed to load config from ${path}: `);
  });

  it("rejects unknown keys and bad values", async () => {
    const path = join(dir, "stepshell.config.json");
    await writeFile(path, JSON.stringify({ logLevel: "loud", port: 3000 }));

    let error: unknown;
    try {
      loadConfig(path);
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof Error ? error.message : "";
    expect(message.startsWith(`Invalid config in ${path}: `)).toBe(true);
    expect(message).toContain("logLevel: ");
    expect(message).toContain("Unrecognized key(s) in object: 'port'");
  });

  it("rejects an extension without a leading dot", async () => {
    const path = join(dir, "stepshell.config.json");
    await writeFile(path, JSON.stringify({ implExtension: "gherkin" }));

    expect(() => loadConfig(path)).toThrow(`Invalid config in ${path}: implExtension: must look like .ext`);
  });
});
