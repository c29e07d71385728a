import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";
import { LaunchError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  CANCELLED_EXIT_CODE,
  CAPTURE_VARIABLE_PREFIX,
  PREVIOUS_OUTPUT_VARIABLE,
  TIMEOUT_EXIT_CODE,
  type InterpreterLocator,
  type StepExecutor,
  type StepInvocationRequest,
  type StepInvocationResult,
} from "./types.js";

export interface ShellStepExecutorDeps {
  readonly locator: InterpreterLocator;
  readonly logger: Logger;
  /** Kill a step after this long. No limit when absent. */
  readonly timeoutMs?: number | null;
  /** Environment every child inherits; defaults to this process's. */
  readonly baseEnv?: NodeJS.ProcessEnv;
}

/** A fresh environment map per spawn: base variables, MATCH_1..N, PREVIOUS_STEP_STDOUT. */
export function buildStepEnvironment(
  base: NodeJS.ProcessEnv,
  captures: readonly string[],
  previousOutput: string,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  captures.forEach((value, i) => {
    env[`${CAPTURE_VARIABLE_PREFIX}${i + 1}`] = value;
  });
  env[PREVIOUS_OUTPUT_VARIABLE] = previousOutput;
  return env;
}

/**
 * Runs step scripts as `<interpreter> -c <script>`, buffering stdout and
 * stderr until the child exits.
 */
export class ShellStepExecutor implements StepExecutor {
  private interpreter: Promise<string> | null = null;

  constructor(private readonly deps: ShellStepExecutorDeps) {}

  /** Locates the interpreter once; later calls reuse the result. */
  resolveInterpreter(): Promise<string> {
    this.interpreter ??= this.deps.locator.locate();
    return this.interpreter;
  }

  async execute(request: StepInvocationRequest): Promise<StepInvocationResult> {
    if (request.script.trim() === "") {
      return { exitCode: 1, stdout: "", stderr: "Empty script content" };
    }

    const interpreter = await this.resolveInterpreter();

    if (request.signal?.aborted) {
      return { exitCode: CANCELLED_EXIT_CODE, stdout: "", stderr: "Step cancelled" };
    }

    const env = buildStepEnvironment(this.deps.baseEnv ?? process.env, request.captures, request.previousOutput);
    this.deps.logger.debug(
      { interpreter, captures: request.captures, previousOutput: request.previousOutput },
      "Executing step script",
    );

    const result = await this.spawnScript(interpreter, request, env);

    this.deps.logger.debug({ exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr }, "Step script finished");
    return result;
  }

  private spawnScript(
    interpreter: string,
    request: StepInvocationRequest,
    env: NodeJS.ProcessEnv,
  ): Promise<StepInvocationResult> {
    const timeoutMs = this.deps.timeoutMs ?? null;

    return new Promise((resolve, reject) => {
      // Own process group on POSIX so a timeout or cancel also reaches the script's children.
      let child: ChildProcessByStdio<null, Readable, Readable>;
      try {
        child = spawn(interpreter, ["-c", request.script], {
          env,
          stdio: ["ignore", "pipe", "pipe"],
          detached: process.platform !== "win32",
        });
      } catch (err) {
        // Arguments spawn refuses (a NUL byte in the script or environment) fail this step only.
        const message = err instanceof Error ? err.message : String(err);
        this.deps.logger.debug({ err }, "Step script could not be spawned");
        resolve({ exitCode: 1, stdout: "", stderr: `Error executing script: ${message}` });
        return;
      }

      const terminate = (): void => {
        if (child.pid !== undefined && process.platform !== "win32") {
          try {
            process.kill(-child.pid, "SIGTERM");
            return;
          } catch (err) {
            this.deps.logger.debug({ err, pid: child.pid }, "Could not signal process group, killing child only");
          }
        }
        child.kill("SIGTERM");
      };

      let stdout = "";
      let stderr = "";
      let captureFault: string | null = null;
      let interruption: "timeout" | "cancelled" | null = null;
      let settled = false;

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });
      child.stdout.on("error", (err) => {
        captureFault ??= `stdout: ${err.message}`;
      });
      child.stderr.on("error", (err) => {
        captureFault ??= `stderr: ${err.message}`;
      });

      const timer = timeoutMs
        ? setTimeout(() => {
            interruption = "timeout";
            terminate();
          }, timeoutMs)
        : null;

      const onAbort = (): void => {
        interruption ??= "cancelled";
        terminate();
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = (): void => {
        settled = true;
        if (timer) clearTimeout(timer);
        request.signal?.removeEventListener("abort", onAbort);
      };

      child.on("error", (err) => {
        if (settled) return;
        if (child.pid === undefined) {
          cleanup();
          reject(new LaunchError(interpreter, `Failed to launch ${interpreter}: ${err.message}`, { cause: err }));
          return;
        }
        captureFault ??= err.message;
      });

      child.on("close", (code) => {
        if (settled) return;
        cleanup();

        if (interruption === "timeout") {
          resolve({ exitCode: TIMEOUT_EXIT_CODE, stdout, stderr: appendLine(stderr, `Step timed out after ${timeoutMs}ms`) });
        } else if (interruption === "cancelled") {
          resolve({ exitCode: CANCELLED_EXIT_CODE, stdout, stderr: appendLine(stderr, "Step cancelled") });
        } else if (captureFault !== null) {
          resolve({
            exitCode: code === null || code === 0 ? 1 : code,
            stdout,
            stderr: appendLine(stderr, `Output capture failed: ${captureFault}`),
          });
        } else {
          resolve({ exitCode: code ?? -1, stdout, stderr });
        }
      });
    });
  }
}

function appendLine(text: string, line: string): string {
  if (text === "") return line;
  return text.endsWith("\n") ? `${text}${line}` : `${text}\n${line}`;
}
