export { parseFeature, CANONICAL_KEYWORDS, isContinuationKeyword } from "./feature/parser.js";
export type { Background, Feature, Scenario, Step, StepKeyword, StepType } from "./feature/types.js";

export { parseImplementationSource, cleanScript } from "./catalog/source-parser.js";
export { ImplementationCatalog, compileCatalog, compilePattern, loadCatalog } from "./catalog/catalog.js";
export { StepResolver, candidateTexts, type StepResolverOptions } from "./catalog/resolver.js";
export { DirectorySourceProvider, FileSourceProvider } from "./catalog/providers.js";
export type {
  ImplementationDeclaration,
  ImplementationEntry,
  ImplementationSource,
  ImplementationSourceProvider,
  StepResolution,
} from "./catalog/types.js";

export { ShellStepExecutor, buildStepEnvironment, type ShellStepExecutorDeps } from "./execution/shell-executor.js";
export {
  ConfiguredInterpreterLocator,
  PosixInterpreterLocator,
  WindowsInterpreterLocator,
  createInterpreterLocator,
  findOnPath,
  type LocatorEnvironment,
} from "./execution/interpreter.js";
export {
  CANCELLED_EXIT_CODE,
  CAPTURE_VARIABLE_PREFIX,
  PREVIOUS_OUTPUT_VARIABLE,
  TIMEOUT_EXIT_CODE,
  type InterpreterLocator,
  type StepExecutor,
  type StepInvocationRequest,
  type StepInvocationResult,
} from "./execution/types.js";

export { FeatureRunner, deriveScenarioStatus, summarize, type FeatureRunnerDeps, type RunOptions } from "./runner/feature-runner.js";
export type { RunResult, RunSummary, ScenarioResult, ScenarioStatus, StepOutput, StepResult, StepStatus } from "./runner/types.js";

export { renderJsonReport, toStructuredReport, type StructuredReport } from "./report/structured-report.js";
export { renderTextReport, type TextReportOptions } from "./report/text-report.js";

export { loadConfig, type StepshellConfig, type LogLevel } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export {
  CatalogCompileError,
  ConfigError,
  LaunchError,
  ParseError,
  StepshellError,
  UsageError,
  isStepshellError,
  type StepshellErrorCode,
} from "./errors.js";
export { runCli, type CliDeps } from "./cli/main.js";
