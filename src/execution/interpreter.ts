import { execFile } from "node:child_process";
import { accessSync, constants, statSync } from "node:fs";
import { posix, win32 } from "node:path";
import { promisify } from "node:util";
import { LaunchError } from "../errors.js";
import type { InterpreterLocator } from "./types.js";

const execFileAsync = promisify(execFile);

export interface LocatorEnvironment {
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
}

const HOST: LocatorEnvironment = { platform: process.platform, env: process.env };

export function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** First executable named `name` on PATH, or null. */
export function findOnPath(name: string, host: LocatorEnvironment = HOST): string | null {
  const isWindows = host.platform === "win32";
  const pathValue = host.env.PATH ?? host.env.Path ?? "";
  const join = isWindows ? win32.join : posix.join;
  const names = isWindows && !name.toLowerCase().endsWith(".exe") ? [`${name}.exe`, name] : [name];

  for (const dir of pathValue.split(isWindows ? ";" : ":")) {
    if (!dir) continue;
    for (const candidate of names) {
      const full = join(dir, candidate);
      if (isExecutableFile(full)) return full;
    }
  }
  return null;
}

/** Uses the interpreter named in configuration: a path, or a name looked up on PATH. */
export class ConfiguredInterpreterLocator implements InterpreterLocator {
  constructor(
    private readonly shell: string,
    private readonly host: LocatorEnvironment = HOST,
  ) {}

  async locate(): Promise<string> {
    const looksLikePath = this.shell.includes("/") || this.shell.includes("\\");
    const found = looksLikePath ? (isExecutableFile(this.shell) ? this.shell : null) : findOnPath(this.shell, this.host);
    if (!found) {
      throw new LaunchError(this.shell, `Configured shell "${this.shell}" was not found or is not executable`);
    }
    return found;
  }
}

export class PosixInterpreterLocator implements InterpreterLocator {
  constructor(private readonly host: LocatorEnvironment = HOST) {}

  async locate(): Promise<string> {
    const bash = findOnPath("bash", this.host);
    if (!bash) {
      throw new LaunchError(null, "No bash executable was found on PATH");
    }
    return bash;
  }
}

/**
 * Prefers Git for Windows' bash: next to git.exe, then the standard install
 * locations, then any bash on PATH that is not WSL's.
 */
export class WindowsInterpreterLocator implements InterpreterLocator {
  constructor(private readonly host: LocatorEnvironment = HOST) {}

  async locate(): Promise<string> {
    const git = findOnPath("git", this.host);
    if (git) {
      const besideGit = win32.join(win32.dirname(git), "bash.exe");
      if (isExecutableFile(besideGit)) return besideGit;
    }

    const { env } = this.host;
    const installs = [
      win32.join(env.ProgramFiles ?? "C:\\Program Files", "Git", "bin", "bash.exe"),
      win32.join(env["ProgramFiles(x86)"] ?? "C:\\Program Files (x86)", "Git", "bin", "bash.exe"),
    ];
    if (env.LOCALAPPDATA) {
      installs.push(win32.join(env.LOCALAPPDATA, "Programs", "Git", "bin", "bash.exe"));
    }
    const installed = installs.find(isExecutableFile);
    if (installed) return installed;

    const onPath = findOnPath("bash", this.host);
    if (onPath && (await isNativeBash(onPath))) return onPath;

    throw new LaunchError(
      null,
      "A suitable non-WSL bash executable was not found. Install Git for Windows and put its bin directory on PATH.",
    );
  }
}

// `uname -o` prints "Msys" under Git Bash and "GNU/Linux" under WSL.
async function isNativeBash(bash: string): Promise<boolean> {
  try {
    const { stdout } = await execFileAsync(bash, ["-c", "uname -o"], { timeout: 3000, encoding: "utf8" });
    return !stdout.toLowerCase().includes("linux");
  } catch {
    return false;
  }
}

export function createInterpreterLocator(shell: string | null, host: LocatorEnvironment = HOST): InterpreterLocator {
  if (shell) return new ConfiguredInterpreterLocator(shell, host);
  return host.platform === "win32" ? new WindowsInterpreterLocator(host) : new PosixInterpreterLocator(host);
}
