import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface StepshellConfig {
  readonly implDir: string;
  readonly implExtension: string;
  readonly logLevel: LogLevel;
  readonly shell: string | null;
  readonly stepTimeoutMs: number | null;
  readonly warnOnAmbiguousSteps: boolean;
}

export const CONFIG_FILE_NAME = "stepshell.config.json";

const DEFAULTS: StepshellConfig = {
  implDir: "../gherkin-implements",
  implExtension: ".gherkin",
  logLevel: "info",
  shell: null,
  stepTimeoutMs: null,
  warnOnAmbiguousSteps: false,
};

const UserConfigSchema = z
  .object({
    implDir: z.string().min(1),
    implExtension: z.string().regex(/^\.[^./\\]+$/, "must look like .ext"),
    logLevel: z.enum(LOG_LEVELS),
    shell: z.string().min(1).nullable(),
    stepTimeoutMs: z.number().int().positive().nullable(),
    warnOnAmbiguousSteps: z.boolean(),
  })
  .partial()
  .strict();

export function loadConfig(configPath?: string): StepshellConfig {
  const filePath = configPath ?? resolve(process.cwd(), CONFIG_FILE_NAME);

  if (!existsSync(filePath)) {
    return { ...DEFAULTS };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to load config from ${filePath}: ${message}`);
  }

  const parsed = UserConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }

  return { ...DEFAULTS, ...parsed.data };
}
