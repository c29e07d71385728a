import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { ShellStepExecutor } from "./shell-executor.js";
import type { Logger } from "../logger.js";
import type { StepInvocationRequest } from "./types.js";

const { spawn } = vi.hoisted(() => ({ spawn: vi.fn() }));
vi.mock("node:child_process", () => ({ spawn }));

function mockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn(), trace: vi.fn(), child: vi.fn().mockReturnThis(), level: "silent", silent: vi.fn() } as unknown as Logger;
}

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly kill = vi.fn();
}

function executor() {
  return new ShellStepExecutor({ locator: { locate: async () => "/bin/sh" }, logger: mockLogger(), baseEnv: {} });
}

function request(script: string): StepInvocationRequest {
  return { script, captures: [], previousOutput: "" };
}

describe("ShellStepExecutor output capture", () => {
  beforeEach(() => {
    spawn.mockReset();
  });

  it("fails a step whose stdout errors, even when the child exits 0", async () => {
    spawn.mockImplementation(() => {
      const child = new FakeChild();
      setImmediate(() => {
        child.stdout.emit("error", new Error("read failed"));
        setImmediate(() => child.emit("close", 0));
      });
      return child;
    });

    const result = await executor().execute(request("echo hi"));

    expect(result).toEqual({ exitCode: 1, stdout: "", stderr: "Output capture failed: stdout: read failed" });
  });

  it("keeps a non-zero exit code when stderr errors", async () => {
    spawn.mockImplementation(() => {
      const child = new FakeChild();
      setImmediate(() => {
        child.stderr.emit("error", new Error("pipe closed"));
        setImmediate(() => child.emit("close", 3));
      });
      return child;
    });

    const result = await executor().execute(request("exit 3"));

    expect(result).toEqual({ exitCode: 3, stdout: "", stderr: "Output capture failed: stderr: pipe closed" });
  });

  it("fails the step when spawn throws", async () => {
    spawn.mockImplementation(() => {
      throw new TypeError("invalid argument");
    });

    const result = await executor().execute(request("true"));

    expect(result).toEqual({ exitCode: 1, stdout: "", stderr: "Error executing script: invalid argument" });
  });
});
