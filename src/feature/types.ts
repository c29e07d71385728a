export type StepKeyword = "Given" | "When" | "Then" | "And" | "But" | "*";

/** Semantic step type. Continuation keywords (And, But, *) inherit one. */
export type StepType = "context" | "action" | "outcome";

export interface Step {
  readonly keyword: StepKeyword;
  readonly type: StepType;
  readonly text: string;
  readonly line: number;
}

export interface Scenario {
  readonly name: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly line: number;
  /** Background steps first, then the scenario's own. */
  readonly steps: readonly Step[];
}

export interface Background {
  readonly name: string;
  readonly line: number;
  readonly steps: readonly Step[];
}

export interface Feature {
  readonly name: string;
  readonly uri: string;
  /** Narrative text after the title; reported, never executed. */
  readonly description: string;
  readonly tags: readonly string[];
  readonly line: number;
  readonly background: Background | null;
  readonly scenarios: readonly Scenario[];
}
