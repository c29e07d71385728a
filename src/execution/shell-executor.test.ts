import { describe, it, expect, vi } from "vitest";
import { ShellStepExecutor, buildStepEnvironment } from "./shell-executor.js";
import { ConfiguredInterpreterLocator } from "./interpreter.js";
import { LaunchError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { InterpreterLocator, StepInvocationRequest } from "./types.js";

function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn(), trace: vi.fn(), child: vi.fn().mockReturnThis(), level: "silent", silent: vi.fn() } as unknown as Logger;
}

function shExecutor(timeoutMs: number | null = null): ShellStepExecutor {
  return new ShellStepExecutor({
    locator: new ConfiguredInterpreterLocator("/bin/sh"),
    logger: mockLogger(),
    timeoutMs,
    baseEnv: { PATH: process.env.PATH },
  });
}

function request(script: string, overrides: Partial<StepInvocationRequest> = {}): StepInvocationRequest {
  return { script, captures: [], previousOutput: "", ...overrides };
}

describe("buildStepEnvironment", () => {
  it("numbers captures from 1 and adds the previous output", () => {
    const env = buildStepEnvironment({ HOME: "/home/test" }, ["5", "apples"], "7");
    expect(env).toEqual({ HOME: "/home/test", MATCH_1: "5", MATCH_2: "apples", PREVIOUS_STEP_STDOUT: "7" });
  });

  it("builds a new map for every invocation", () => {
    const base = { HOME: "/home/test" };
    const first = buildStepEnvironment(base, ["a", "b"], "x");
    const second = buildStepEnvironment(base, ["c"], "");

    expect(second).toEqual({ HOME: "/home/test", MATCH_1: "c", PREVIOUS_STEP_STDOUT: "" });
    expect(first.MATCH_2).toBe("b");
    expect(base).toEqual({ HOME: "/home/test" });
  });
});

describe("ShellStepExecutor", () => {
  it("exposes captures to the script", async () => {
    const result = await shExecutor().execute(request('printf "%s-%s" "$MATCH_1" "$MATCH_2"', { captures: ["5", "x"] }));
    expect(result).toEqual({ exitCode: 0, stdout: "5-x", stderr: "" });
  });

  it("passes the previous output through verbatim", async () => {
    const result = await shExecutor().execute(request('printf "%s" "$PREVIOUS_STEP_STDOUT"', { previousOutput: "7" }));
    expect(result.stdout).toBe("7");
  });

  it("reports a non-zero exit with its output", async () => {
    const result = await shExecutor().execute(request("echo partial; echo oops >&2; exit 3"));
    expect(result).toEqual({ exitCode: 3, stdout: "partial\n", stderr: "oops\n" });
  });

  it("fails an empty script without spawning", async () => {
    const locator: InterpreterLocator = { locate: vi.fn(async () => "/bin/sh") };
    const executor = new ShellStepExecutor({ locator, logger: mockLogger() });

    const result = await executor.execute(request("  \n"));

    expect(result).toEqual({ exitCode: 1, stdout: "", stderr: "Empty script content" });
    expect(locator.locate).not.toHaveBeenCalled();
  });

  it("locates the interpreter only once", async () => {
    const locator: InterpreterLocator = { locate: vi.fn(async () => "/bin/sh") };
    const executor = new ShellStepExecutor({ locator, logger: mockLogger() });

    await executor.execute(request("true"));
    await executor.execute(request("true"));

    expect(locator.locate).toHaveBeenCalledTimes(1);
  });

  it("raises a LaunchError when the interpreter cannot be started", async () => {
    const executor = new ShellStepExecutor({
      locator: { locate: async () => "/nonexistent/stepshell-sh" },
      logger: mockLogger(),
    });

    await expect(executor.execute(request("true"))).rejects.toBeInstanceOf(LaunchError);
  });

  it("fails the step when spawn rejects its environment", async () => {
    const result = await shExecutor().execute(request("true", { previousOutput: "a\u0000b" }));

    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr).toMatch(/^Error executing script: .*PREVIOUS_STEP_STDOUT.*null bytes/);
  });

  it("kills a step that outlives the timeout", async () => {
    const result = await shExecutor(100).execute(request("exec sleep 5"));
    expect(result.exitCode).toBe(124);
    expect(result.stderr).toBe("Step timed out after 100ms");
  });

  it("kills the step when cancelled", async () => {
    const controller = new AbortController();
    const pending = shExecutor().execute(request("exec sleep 5", { signal: controller.signal }));
    setTimeout(() => controller.abort(), 50);

    const result = await pending;

    expect(result.exitCode).toBe(130);
    expect(result.stderr).toBe("Step cancelled");
  });

  it("does not start a step once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await shExecutor().execute(request("echo never", { signal: controller.signal }));

    expect(result).toEqual({ exitCode: 130, stdout: "", stderr: "Step cancelled" });
  });
});
