/** What a step script receives: its captures and the previous step's stdout. */
export interface StepInvocationRequest {
  readonly script: string;
  readonly captures: readonly string[];
  readonly previousOutput: string;
  /** Aborting kills the running child; the step then counts as failed. */
  readonly signal?: AbortSignal;
}

export interface StepInvocationResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface StepExecutor {
  execute(request: StepInvocationRequest): Promise<StepInvocationResult>;
}

/** Finds the POSIX-compatible command interpreter scripts run under. */
export interface InterpreterLocator {
  locate(): Promise<string>;
}

export const PREVIOUS_OUTPUT_VARIABLE = "PREVIOUS_STEP_STDOUT";
export const CAPTURE_VARIABLE_PREFIX = "MATCH_";

export const TIMEOUT_EXIT_CODE = 124;
export const CANCELLED_EXIT_CODE = 130;
