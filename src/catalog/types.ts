/** One implementation document, e.g. the contents of a `.gherkin` file. */
export interface ImplementationSource {
  /** Provenance identifier, usually the file path. */
  readonly id: string;
  readonly content: string;
}

/** An uncompiled `IMPLEMENTS <pattern>` block. */
export interface ImplementationDeclaration {
  readonly pattern: string;
  readonly script: string;
  readonly source: string;
  readonly line: number;
}

export interface ImplementationEntry extends ImplementationDeclaration {
  readonly regex: RegExp;
  /** Position in the catalog; lower wins resolution. */
  readonly index: number;
}

export interface StepResolution {
  readonly entry: ImplementationEntry;
  /** Capture groups in order; unmatched optional groups are "". */
  readonly captures: readonly string[];
}

/** Discovery collaborator: supplies implementation documents to the catalog. */
export interface ImplementationSourceProvider {
  readonly description: string;
  list(): Promise<ImplementationSource[]>;
}
