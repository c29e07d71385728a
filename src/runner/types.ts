import type { StepKeyword, StepType } from "../feature/types.js";

export type StepStatus = "not-run" | "passed" | "failed" | "skipped" | "undefined";

export type ScenarioStatus = "passed" | "failed" | "undefined" | "skipped";

/** Present only on steps that were executed. */
export interface StepOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export interface StepResult {
  readonly keyword: StepKeyword;
  readonly type: StepType;
  readonly text: string;
  readonly line: number;
  readonly status: StepStatus;
  readonly exitCode: number | null;
  readonly output: StepOutput | null;
}

export interface ScenarioResult {
  readonly name: string;
  readonly line: number;
  readonly tags: readonly string[];
  readonly status: ScenarioStatus;
  readonly steps: readonly StepResult[];
}

export interface RunSummary {
  readonly scenarios: { readonly total: number; readonly passed: number; readonly failed: number };
  readonly steps: {
    readonly total: number;
    readonly passed: number;
    readonly failed: number;
    readonly skipped: number;
    readonly undefined: number;
  };
}

export interface RunResult {
  readonly feature: { readonly name: string; readonly uri: string; readonly description: string };
  readonly scenarios: readonly ScenarioResult[];
  readonly summary: RunSummary;
}
