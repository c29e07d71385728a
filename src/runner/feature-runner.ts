import type { StepResolver } from "../catalog/resolver.js";
import type { StepExecutor } from "../execution/types.js";
import type { Feature, Scenario, Step } from "../feature/types.js";
import type { Logger } from "../logger.js";
import type { RunResult, RunSummary, ScenarioResult, ScenarioStatus, StepResult, StepStatus } from "./types.js";

export interface FeatureRunnerDeps {
  readonly resolver: Pick<StepResolver, "resolve">;
  readonly executor: StepExecutor;
  readonly logger: Logger;
}

export interface RunOptions {
  /** Aborting fails the running step and skips everything after it. */
  readonly signal?: AbortSignal;
}

/**
 * A scenario is failed if any step failed and passed if every step passed.
 * Otherwise it takes the status of its first step that was neither passed
 * nor skipped, or is skipped when nothing ran.
 */
export function deriveScenarioStatus(steps: readonly Pick<StepResult, "status">[]): ScenarioStatus {
  if (steps.some((step) => step.status === "failed")) return "failed";
  if (steps.every((step) => step.status === "passed")) return "passed";
  const first = steps.find((step) => step.status !== "passed" && step.status !== "skipped");
  return first?.status === "undefined" ? "undefined" : "skipped";
}

export function summarize(scenarios: readonly ScenarioResult[]): RunSummary {
  const steps = scenarios.flatMap((scenario) => scenario.steps);
  const countSteps = (status: StepStatus): number => steps.filter((step) => step.status === status).length;
  const passedScenarios = scenarios.filter((scenario) => scenario.status === "passed").length;

  return {
    scenarios: {
      total: scenarios.length,
      passed: passedScenarios,
      failed: scenarios.length - passedScenarios,
    },
    steps: {
      total: steps.length,
      passed: countSteps("passed"),
      failed: countSteps("failed"),
      skipped: countSteps("skipped"),
      undefined: countSteps("undefined"),
    },
  };
}

/** Shell command substitution drops trailing newlines; chained output does the same. */
export function chainedOutput(stdout: string): string {
  return stdout.replace(/[\r\n]+$/, "");
}

/**
 * Walks a feature's scenarios in document order, one step at a time. A failed
 * or undefined step skips the rest of its scenario; the next scenario starts
 * with an empty previous-output chain.
 */
export class FeatureRunner {
  constructor(private readonly deps: FeatureRunnerDeps) {}

  async run(feature: Feature, options: RunOptions = {}): Promise<RunResult> {
    this.deps.logger.info({ feature: feature.name, uri: feature.uri, scenarios: feature.scenarios.length }, "Running feature");

    const scenarios: ScenarioResult[] = [];
    for (const scenario of feature.scenarios) {
      scenarios.push(await this.runScenario(scenario, options.signal));
    }

    const summary = summarize(scenarios);
    this.deps.logger.info({ feature: feature.name, ...summary }, "Feature finished");

    return {
      feature: { name: feature.name, uri: feature.uri, description: feature.description },
      scenarios,
      summary,
    };
  }

  private async runScenario(scenario: Scenario, signal: AbortSignal | undefined): Promise<ScenarioResult> {
    const steps: StepResult[] = [];
    let previousOutput = "";
    let halted = signal?.aborted ?? false;

    for (const step of scenario.steps) {
      if (halted) {
        steps.push(toResult(step, "skipped", null, null));
        continue;
      }

      const resolution = this.deps.resolver.resolve(step);
      if (!resolution) {
        this.deps.logger.debug({ scenario: scenario.name, step: `${step.keyword} ${step.text}` }, "No implementation found");
        steps.push(toResult(step, "undefined", null, null));
        halted = true;
        continue;
      }

      const invocation = await this.deps.executor.execute({
        script: resolution.entry.script,
        captures: resolution.captures,
        previousOutput,
        signal,
      });
      const status: StepStatus = invocation.exitCode === 0 ? "passed" : "failed";

      this.deps.logger.debug(
        {
          scenario: scenario.name,
          step: `${step.keyword} ${step.text}`,
          implementation: `${resolution.entry.source}:${resolution.entry.line}`,
          exitCode: invocation.exitCode,
        },
        status === "passed" ? "Step passed" : "Step failed",
      );

      steps.push(toResult(step, status, invocation.exitCode, { stdout: invocation.stdout, stderr: invocation.stderr }));
      previousOutput = chainedOutput(invocation.stdout);
      halted = status === "failed" || (signal?.aborted ?? false);
    }

    const status = deriveScenarioStatus(steps);
    this.deps.logger.info({ scenario: scenario.name, status }, "Scenario finished");
    return { name: scenario.name, line: scenario.line, tags: scenario.tags, status, steps };
  }
}

function toResult(step: Step, status: StepStatus, exitCode: number | null, output: StepResult["output"]): StepResult {
  return { keyword: step.keyword, type: step.type, text: step.text, line: step.line, status, exitCode, output };
}
