import type { RunResult, StepResult, StepStatus } from "../runner/types.js";

export interface TextReportOptions {
  readonly color?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
} as const;

const GLYPHS: Record<StepStatus, string> = {
  passed: "✓",
  failed: "✖",
  skipped: "-",
  undefined: "?",
  "not-run": " ",
};

const STATUS_COLORS: Record<StepStatus, string> = {
  passed: ANSI.green,
  failed: ANSI.red,
  skipped: ANSI.yellow,
  undefined: ANSI.magenta,
  "not-run": ANSI.gray,
};

const RULE = "-".repeat(50);

/**
 * Human-readable report: one line per step with a status glyph, failed steps'
 * output indented beneath them, and a count summary.
 */
export function renderTextReport(result: RunResult, options: TextReportOptions = {}): string {
  const paint = (text: string, color: string): string => (options.color ? `${color}${text}${ANSI.reset}` : text);
  const lines: string[] = [];

  lines.push(paint(`Feature: ${result.feature.name}`, ANSI.bold));
  for (const line of splitLines(result.feature.description)) {
    lines.push(`  ${line}`);
  }

  for (const scenario of result.scenarios) {
    lines.push("", `  Scenario: ${scenario.name}`);
    for (const step of scenario.steps) {
      const color = STATUS_COLORS[step.status];
      lines.push(paint(`    ${GLYPHS[step.status]} ${step.keyword} ${step.text}`, color));
      lines.push(...stepDetails(step).map((detail) => paint(detail, color)));
    }
  }

  const { scenarios, steps } = result.summary;
  lines.push(
    "",
    RULE,
    paint("Run Summary:", ANSI.bold),
    `  Scenarios: ${scenarios.total} total, ${paint(`${scenarios.passed} passed`, ANSI.green)}, ${paint(`${scenarios.failed} failed`, ANSI.red)}`,
    `  Steps:     ${steps.total} total, ${paint(`${steps.passed} passed`, ANSI.green)}, ${paint(`${steps.failed} failed`, ANSI.red)}, ` +
      `${paint(`${steps.skipped} skipped`, ANSI.yellow)}, ${paint(`${steps.undefined} undefined`, ANSI.magenta)}`,
    RULE,
  );

  return `${lines.join("\n")}\n`;
}

function stepDetails(step: StepResult): string[] {
  if (step.status === "undefined") {
    return [`      No implementation found for: ${step.keyword} ${step.text}`];
  }
  if (step.status !== "failed") {
    return [];
  }

  const details = [`      Exit code: ${step.exitCode ?? "none"}`];
  for (const [label, text] of [
    ["stdout", step.output?.stdout ?? ""],
    ["stderr", step.output?.stderr ?? ""],
  ] as const) {
    const outputLines = splitLines(text);
    if (outputLines.length === 0) continue;
    details.push(`      ${label}:`, ...outputLines.map((line) => `        ${line}`));
  }
  return details;
}

function splitLines(text: string): string[] {
  const trimmed = text.replace(/\n+$/, "");
  return trimmed === "" ? [] : trimmed.split("\n");
}
