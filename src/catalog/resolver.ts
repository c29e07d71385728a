import type { Logger } from "../logger.js";
import { CANONICAL_KEYWORDS, isContinuationKeyword } from "../feature/parser.js";
import type { Step } from "../feature/types.js";
import type { ImplementationCatalog } from "./catalog.js";
import type { ImplementationEntry, StepResolution } from "./types.js";

export interface StepResolverOptions {
  /** Log every other entry that also matches a resolved step. */
  readonly warnOnAmbiguity?: boolean;
  readonly logger?: Logger;
}

/**
 * Texts a step is matched against, in order: the bare text, the text with its
 * literal keyword, and for continuation steps the text with the keyword of the
 * type they inherited (`And x` after a Given also tries `Given x`).
 */
export function candidateTexts(step: Pick<Step, "keyword" | "type" | "text">): string[] {
  const candidates = [step.text, `${step.keyword} ${step.text}`];
  if (isContinuationKeyword(step.keyword)) {
    candidates.push(`${CANONICAL_KEYWORDS[step.type]} ${step.text}`);
  }
  return candidates;
}

/**
 * Resolves steps against the catalog. The first entry in catalog order that
 * matches wins, regardless of how specific later entries are.
 */
export class StepResolver {
  constructor(
    private readonly catalog: ImplementationCatalog,
    private readonly options: StepResolverOptions = {},
  ) {}

  resolve(step: Pick<Step, "keyword" | "type" | "text" | "line">): StepResolution | null {
    const candidates = candidateTexts(step);

    let resolution: StepResolution | null = null;
    const shadowed: ImplementationEntry[] = [];

    for (const entry of this.catalog.entries) {
      const captures = matchEntry(entry, candidates);
      if (!captures) continue;

      if (!resolution) {
        resolution = { entry, captures };
        if (!this.options.warnOnAmbiguity) break;
      } else {
        shadowed.push(entry);
      }
    }

    if (resolution && shadowed.length > 0) {
      this.options.logger?.warn(
        {
          step: `${step.keyword} ${step.text}`,
          line: step.line,
          chosen: describe(resolution.entry),
          alsoMatching: shadowed.map(describe),
        },
        "Ambiguous step: several implementations match, using the first",
      );
    }

    return resolution;
  }
}

function matchEntry(entry: ImplementationEntry, candidates: readonly string[]): string[] | null {
  for (const text of candidates) {
    const match = entry.regex.exec(text);
    if (match) {
      return match.slice(1).map((group) => group ?? "");
    }
  }
  return null;
}

function describe(entry: ImplementationEntry): string {
  return `${entry.source}:${entry.line} ${entry.pattern}`;
}
