import { ParseError } from "../errors.js";
import type { Background, Feature, Scenario, Step, StepKeyword, StepType } from "./types.js";

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

type HeaderKind = "feature" | "background" | "scenario" | "outline" | "examples";

// Longer keywords first: "Scenario Outline:" must win over "Scenario:".
const HEADERS: ReadonlyArray<readonly [string, HeaderKind]> = [
  ["Feature:", "feature"],
  ["Background:", "background"],
  ["Scenario Outline:", "outline"],
  ["Scenario Template:", "outline"],
  ["Scenario:", "scenario"],
  ["Example:", "scenario"],
  ["Examples:", "examples"],
  ["Scenarios:", "examples"],
];

const STEP_KEYWORDS: ReadonlyArray<readonly [StepKeyword, StepType | null]> = [
  ["Given", "context"],
  ["When", "action"],
  ["Then", "outcome"],
  ["And", null],
  ["But", null],
  ["*", null],
];

export const CANONICAL_KEYWORDS: Readonly<Record<StepType, StepKeyword>> = {
  context: "Given",
  action: "When",
  outcome: "Then",
};

export function isContinuationKeyword(keyword: StepKeyword): boolean {
  return keyword === "And" || keyword === "But" || keyword === "*";
}

// ---------------------------------------------------------------------------
// Parser state
// ---------------------------------------------------------------------------

interface TableRowDraft {
  readonly cells: string[];
  readonly line: number;
}

interface ExamplesDraft {
  readonly tags: string[];
  readonly line: number;
  header: TableRowDraft | null;
  readonly rows: TableRowDraft[];
}

interface BlockDraft {
  readonly kind: "background" | "scenario" | "outline";
  readonly name: string;
  readonly tags: string[];
  readonly line: number;
  readonly description: string[];
  readonly steps: Step[];
  readonly examples: ExamplesDraft[];
  /** Type of the last step in this block, inherited by continuation keywords. */
  lastType: StepType | null;
}

interface FeatureDraft {
  readonly name: string;
  readonly tags: string[];
  readonly line: number;
}

/**
 * Parse a feature document into an immutable Feature tree.
 *
 * ```ts
 * const feature = parseFeature(`
 * Feature: Counter
 *   Scenario: Increment
 *     Given the counter is 1
 *     When I increment it
 *     Then count should be 2
 * `, "features/counter.feature");
 * ```
 *
 * Background steps are prepended to every scenario and Scenario Outlines are
 * expanded into one scenario per Examples row. Throws a ParseError naming the
 * offending line on malformed input.
 */
export function parseFeature(source: string, uri: string): Feature {
  const lines = normalizeLineEndings(source).split("\n");

  let feature: FeatureDraft | null = null;
  const narrative: string[] = [];
  let background: BlockDraft | null = null;
  const blocks: BlockDraft[] = [];
  let current: BlockDraft | null = null;
  let examples: ExamplesDraft | null = null;
  let pendingTags: string[] = [];

  const fail: (line: number, reason: string) => never = (line, reason) => {
    throw new ParseError(uri, line, reason);
  };

  const takeTags = (): string[] => {
    const tags = pendingTags;
    pendingTags = [];
    return tags;
  };

  const closeBlock = (): void => {
    if (current) {
      validateBlock(current, fail);
    }
    current = null;
    examples = null;
  };

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const trimmed = (lines[index] ?? "").trim();

    if (trimmed === "" || trimmed.startsWith("#")) continue;

    if (trimmed.startsWith("@")) {
      const tags = splitWhitespace(trimmed);
      const invalid = tags.find((tag) => !tag.startsWith("@") || tag.length === 1);
      if (invalid !== undefined) fail(lineNo, `Invalid tag "${invalid}"`);
      pendingTags.push(...tags);
      continue;
    }

    const header = matchHeader(trimmed);

    if (!feature) {
      if (header?.kind !== "feature") fail(lineNo, `Expected "Feature:" but found "${trimmed}"`);
      feature = { name: header?.name ?? "", tags: takeTags(), line: lineNo };
      continue;
    }

    if (header) {
      switch (header.kind) {
        case "feature":
          fail(lineNo, "Only one Feature is allowed per document");
          break;
        case "background":
          if (background) fail(lineNo, "Only one Background is allowed per Feature");
          if (blocks.length > 0) fail(lineNo, "Background must come before the first Scenario");
          if (pendingTags.length > 0) fail(lineNo, "Tags are not allowed on a Background");
          closeBlock();
          current = newBlock("background", header.name, [], lineNo);
          background = current;
          break;
        case "scenario":
        case "outline":
          closeBlock();
          current = newBlock(header.kind, header.name, takeTags(), lineNo);
          blocks.push(current);
          break;
        case "examples": {
          const block: BlockDraft | null = current;
          if (!block || block.kind !== "outline") {
            fail(lineNo, "Examples are only allowed in a Scenario Outline");
            break;
          }
          if (block.steps.length === 0) fail(block.line, "Scenario Outline has no steps");
          examples = { tags: takeTags(), line: lineNo, header: null, rows: [] };
          block.examples.push(examples);
          break;
        }
      }
      continue;
    }

    if (trimmed.startsWith("|")) {
      const table: ExamplesDraft | null = examples;
      if (!table) {
        fail(lineNo, "Data tables are not supported outside of Examples");
        continue;
      }
      const row = parseTableRow(trimmed, lineNo, fail);
      if (!table.header) {
        table.header = row;
      } else if (row.cells.length !== table.header.cells.length) {
        fail(lineNo, `Examples row has ${row.cells.length} cells but the header has ${table.header.cells.length}`);
      } else {
        table.rows.push(row);
      }
      continue;
    }

    if (trimmed.startsWith('"""') || trimmed.startsWith("```")) {
      fail(lineNo, "Doc strings are not supported");
    }

    const step = matchStep(trimmed);
    if (step) {
      const block: BlockDraft | null = current;
      if (!block) {
        fail(lineNo, "Step found outside of a Scenario or Background");
        continue;
      }
      if (examples) fail(lineNo, "Steps are not allowed inside Examples");
      if (step.text === "") fail(lineNo, `"${step.keyword}" step has no text`);

      const type = step.type ?? block.lastType;
      if (!type) {
        fail(lineNo, `"${step.keyword}" has no preceding step to continue`);
        continue;
      }
      block.steps.push({ keyword: step.keyword, type, text: step.text, line: lineNo });
      block.lastType = type;
      continue;
    }

    // Free text: feature narrative, or a block description before its first step.
    // Text between "Examples:" and its header row is an ignored description.
    const block: BlockDraft | null = current;
    const table: ExamplesDraft | null = examples;
    if (!block) {
      narrative.push(trimmed);
    } else if (block.steps.length === 0) {
      block.description.push(trimmed);
    } else if (table) {
      if (table.header) fail(lineNo, `Unexpected text in Examples: "${trimmed}"`);
    } else {
      fail(lineNo, `Unrecognized line "${trimmed}"`);
    }
  }

  closeBlock();

  const parsed: FeatureDraft | null = feature;
  if (!parsed) {
    return fail(Math.max(lines.length, 1), "No Feature found");
  }
  if (blocks.length === 0) {
    return fail(parsed.line, "Feature has no scenarios");
  }

  const bg: BlockDraft | null = background;
  const backgroundSteps = bg ? bg.steps : [];
  const scenarios = blocks.flatMap((block) => expandBlock(block, backgroundSteps));

  return {
    name: parsed.name,
    uri,
    description: narrative.join("\n"),
    tags: parsed.tags,
    line: parsed.line,
    background: bg ? toBackground(bg) : null,
    scenarios,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function normalizeLineEndings(text: string): string {
  return text.replaceAll("\r\n", "\n").replaceAll("\r", "\n");
}

function newBlock(kind: BlockDraft["kind"], name: string, tags: string[], line: number): BlockDraft {
  return { kind, name, tags, line, description: [], steps: [], examples: [], lastType: null };
}

function validateBlock(block: BlockDraft, fail: (line: number, reason: string) => never): void {
  if (block.steps.length === 0) {
    const label = block.kind === "background" ? "Background" : block.kind === "outline" ? "Scenario Outline" : "Scenario";
    fail(block.line, `${label} has no steps`);
  }
  if (block.kind === "outline" && block.examples.every((table) => table.rows.length === 0)) {
    fail(block.line, "Scenario Outline has no Examples rows");
  }
}

function matchHeader(trimmed: string): { kind: HeaderKind; name: string } | null {
  for (const [keyword, kind] of HEADERS) {
    if (trimmed.startsWith(keyword)) {
      return { kind, name: trimmed.slice(keyword.length).trim() };
    }
  }
  return null;
}

function matchStep(trimmed: string): { keyword: StepKeyword; type: StepType | null; text: string } | null {
  for (const [keyword, type] of STEP_KEYWORDS) {
    if (!trimmed.startsWith(keyword)) continue;
    const rest = trimmed.slice(keyword.length);
    if (rest === "") return { keyword, type, text: "" };
    if (rest.startsWith(" ") || rest.startsWith("\t")) {
      return { keyword, type, text: rest.trim() };
    }
  }
  return null;
}

function parseTableRow(trimmed: string, line: number, fail: (line: number, reason: string) => never): TableRowDraft {
  if (trimmed.length < 2 || !trimmed.endsWith("|")) {
    fail(line, "Table row must start and end with |");
  }
  const cells = trimmed
    .slice(1, -1)
    .split("|")
    .map((cell) => cell.trim());
  return { cells, line };
}

function splitWhitespace(text: string): string[] {
  return text
    .replaceAll("\t", " ")
    .split(" ")
    .filter((part) => part !== "");
}

// One pass, so a cell value that looks like a placeholder stays literal.
function substitute(text: string, values: ReadonlyMap<string, string>): string {
  return text.replace(/<([^<>]+)>/g, (placeholder: string, name: string) => values.get(name) ?? placeholder);
}

function toBackground(block: BlockDraft): Background {
  return { name: block.name, line: block.line, steps: block.steps };
}

function expandBlock(block: BlockDraft, backgroundSteps: readonly Step[]): Scenario[] {
  const description = block.description.join("\n");

  if (block.kind !== "outline") {
    return [{ name: block.name, description, tags: block.tags, line: block.line, steps: [...backgroundSteps, ...block.steps] }];
  }

  const scenarios: Scenario[] = [];
  let ordinal = 0;
  for (const table of block.examples) {
    const header = table.header;
    if (!header) continue;
    for (const row of table.rows) {
      ordinal++;
      const values = new Map<string, string>();
      header.cells.forEach((name, column) => values.set(name, row.cells[column] ?? ""));
      scenarios.push({
        name: `${substitute(block.name, values)} (example ${ordinal})`,
        description,
        tags: [...block.tags, ...table.tags],
        line: row.line,
        steps: [
          ...backgroundSteps,
          ...block.steps.map((step) => ({ ...step, text: substitute(step.text, values) })),
        ],
      });
    }
  }
  return scenarios;
}
