import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConfiguredInterpreterLocator,
  PosixInterpreterLocator,
  WindowsInterpreterLocator,
  createInterpreterLocator,
  findOnPath,
} from "./interpreter.js";
import { LaunchError } from "../errors.js";

describe("interpreter location", () => {
  let dir: string;
  let bash: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stepshell-path-"));
    bash = join(dir, "bash");
    await writeFile(bash, "#!/bin/sh\n");
    await chmod(bash, 0o755);
    await writeFile(join(dir, "plain"), "not executable");
    await chmod(join(dir, "plain"), 0o644);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("finds executables on PATH", () => {
    expect(findOnPath("bash", { platform: "linux", env: { PATH: `/nonexistent:${dir}` } })).toBe(bash);
  });

  it("ignores files that are not executable", () => {
    expect(findOnPath("plain", { platform: "linux", env: { PATH: dir } })).toBeNull();
  });

  it("locates bash on POSIX", async () => {
    await expect(new PosixInterpreterLocator({ platform: "linux", env: { PATH: dir } }).locate()).resolves.toBe(bash);
  });

  it("raises a LaunchError when no bash is on PATH", async () => {
    const locator = new PosixInterpreterLocator({ platform: "linux", env: { PATH: "/nonexistent" } });
    await expect(locator.locate()).rejects.toBeInstanceOf(LaunchError);
  });

  it("uses a configured interpreter path as is", async () => {
    await expect(new ConfiguredInterpreterLocator(bash).locate()).resolves.toBe(bash);
  });

  it("looks a configured interpreter name up on PATH", async () => {
    const locator = new ConfiguredInterpreterLocator("bash", { platform: "linux", env: { PATH: dir } });
    await expect(locator.locate()).resolves.toBe(bash);
  });

  it("rejects a configured interpreter that does not exist", async () => {
    await expect(new ConfiguredInterpreterLocator(join(dir, "zsh")).locate()).rejects.toThrow(
      `Configured shell "${join(dir, "zsh")}" was not found or is not executable`,
    );
  });

  it("picks a locator for the platform and configuration", () => {
    expect(createInterpreterLocator(null, { platform: "linux", env: {} })).toBeInstanceOf(PosixInterpreterLocator);
    expect(createInterpreterLocator(null, { platform: "win32", env: {} })).toBeInstanceOf(WindowsInterpreterLocator);
    expect(createInterpreterLocator("/bin/sh", { platform: "win32", env: {} })).toBeInstanceOf(ConfiguredInterpreterLocator);
  });
});
