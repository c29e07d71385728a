import type { RunResult, RunSummary, ScenarioStatus, StepStatus } from "../runner/types.js";
import type { StepKeyword } from "../feature/types.js";

export interface StructuredStep {
  readonly keyword: StepKeyword;
  readonly text: string;
  readonly status: StepStatus;
  readonly exitCode: number | null;
  readonly output: { readonly stdout: string; readonly stderr: string } | null;
}

export interface StructuredScenario {
  readonly name: string;
  readonly status: ScenarioStatus;
  readonly steps: readonly StructuredStep[];
}

/** Machine-readable report; carries every fact the text report prints. */
export interface StructuredReport {
  readonly feature: { readonly name: string; readonly uri: string; readonly description: string };
  readonly summary: RunSummary;
  readonly scenarios: readonly StructuredScenario[];
}

export function toStructuredReport(result: RunResult): StructuredReport {
  return {
    feature: { name: result.feature.name, uri: result.feature.uri, description: result.feature.description },
    summary: {
      scenarios: { ...result.summary.scenarios },
      steps: { ...result.summary.steps },
    },
    scenarios: result.scenarios.map((scenario) => ({
      name: scenario.name,
      status: scenario.status,
      steps: scenario.steps.map((step) => ({
        keyword: step.keyword,
        text: step.text,
        status: step.status,
        exitCode: step.exitCode,
        output: step.output ? { stdout: step.output.stdout, stderr: step.output.stderr } : null,
      })),
    })),
  };
}

export function renderJsonReport(result: RunResult): string {
  return `${JSON.stringify(toStructuredReport(result), null, 2)}\n`;
}
