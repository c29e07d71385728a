import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { loadCatalog } from "../catalog/catalog.js";
import { DirectorySourceProvider, FileSourceProvider } from "../catalog/providers.js";
import { StepResolver } from "../catalog/resolver.js";
import type { ImplementationSourceProvider } from "../catalog/types.js";
import { CONFIG_FILE_NAME, loadConfig, type StepshellConfig } from "../config.js";
import { UsageError, isStepshellError } from "../errors.js";
import { createInterpreterLocator } from "../execution/interpreter.js";
import { ShellStepExecutor } from "../execution/shell-executor.js";
import { parseFeature } from "../feature/parser.js";
import { createLogger, type Logger } from "../logger.js";
import { renderJsonReport } from "../report/structured-report.js";
import { renderTextReport } from "../report/text-report.js";
import { FeatureRunner } from "../runner/feature-runner.js";
import { USAGE, parseCliArgs, type CliArgs } from "./args.js";

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_FATAL = 2;

export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Base for relative paths; defaults to process.cwd(). */
  readonly cwd?: string;
  /** Environment handed to the interpreter locator and every step. */
  readonly env?: NodeJS.ProcessEnv;
  /** Whether the text report may use ANSI colors at all. */
  readonly colors?: boolean;
  readonly signal?: AbortSignal;
  readonly createLogger?: (config: Pick<StepshellConfig, "logLevel">) => Logger;
}

/**
 * Runs one feature file and prints its report. Resolves to the process exit
 * code: 0 when every scenario passed, 1 when any did not, 2 on a fatal error.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    deps.stderr(`${formatFatal(error)}\n\n${USAGE}`);
    return EXIT_FATAL;
  }

  if (args.help) {
    deps.stdout(USAGE);
    return EXIT_PASSED;
  }
  if (!args.featureFile) {
    deps.stderr(`${formatFatal(new UsageError("A feature file is required"))}\n\n${USAGE}`);
    return EXIT_FATAL;
  }

  try {
    return await run(args, args.featureFile, deps);
  } catch (error) {
    deps.stderr(`${formatFatal(error)}\n`);
    return EXIT_FATAL;
  }
}

async function run(args: CliArgs, featureFile: string, deps: CliDeps): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const config = loadConfig(resolve(cwd, args.configPath ?? CONFIG_FILE_NAME));
  const logger = (deps.createLogger ?? createLogger)({ logLevel: args.debug ? "debug" : config.logLevel });

  const provider: ImplementationSourceProvider =
    args.implementationFiles.length > 0
      ? new FileSourceProvider(args.implementationFiles.map((file) => resolve(cwd, file)))
      : new DirectorySourceProvider(resolve(cwd, args.implDir ?? config.implDir), config.implExtension, logger);

  const catalog = await loadCatalog(provider, logger);
  if (catalog.size === 0) {
    throw new UsageError(`No step implementations found in ${provider.description}`);
  }

  const executor = new ShellStepExecutor({
    locator: createInterpreterLocator(args.shell ?? config.shell, { platform: process.platform, env }),
    logger,
    timeoutMs: args.timeoutMs ?? config.stepTimeoutMs,
    baseEnv: env,
  });
  // Fail before any step runs when there is no interpreter.
  const interpreter = await executor.resolveInterpreter();
  logger.debug({ interpreter }, "Using interpreter");

  const featureText = await readFeatureFile(resolve(cwd, featureFile));
  const feature = parseFeature(featureText, featureFile);

  const runner = new FeatureRunner({
    resolver: new StepResolver(catalog, { warnOnAmbiguity: args.warnAmbiguous || config.warnOnAmbiguousSteps, logger }),
    executor,
    logger,
  });
  const result = await runner.run(feature, { signal: deps.signal });

  deps.stdout(
    args.json ? renderJsonReport(result) : renderTextReport(result, { color: args.color && deps.colors === true }),
  );

  return result.summary.scenarios.failed === 0 ? EXIT_PASSED : EXIT_FAILED;
}

async function readFeatureFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`Cannot read feature file ${path}: ${message}`);
  }
}

function formatFatal(error: unknown): string {
  if (isStepshellError(error)) return `Error: ${error.message}`;
  if (error instanceof Error) return `Unexpected error: ${error.message}`;
  return `Unexpected error: ${String(error)}`;
}
