import { CatalogCompileError } from "../errors.js";
import type { Logger } from "../logger.js";
import { parseImplementationSource } from "./source-parser.js";
import type { ImplementationDeclaration, ImplementationEntry, ImplementationSourceProvider } from "./types.js";

/**
 * Ordered, read-only list of compiled step implementations. Built once per
 * run; order is source order, then declaration order within a source.
 */
export class ImplementationCatalog {
  readonly entries: readonly ImplementationEntry[];

  constructor(entries: readonly ImplementationEntry[]) {
    this.entries = Object.freeze([...entries]);
  }

  get size(): number {
    return this.entries.length;
  }
}

/** Compile a step pattern into an anchored, case-insensitive expression. */
export function compilePattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`, "i");
}

export function compileCatalog(declarations: readonly ImplementationDeclaration[], logger?: Logger): ImplementationCatalog {
  const seen = new Map<string, ImplementationDeclaration>();

  const entries = declarations.map((declaration, index): ImplementationEntry => {
    let regex: RegExp;
    try {
      regex = compilePattern(declaration.pattern);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CatalogCompileError(declaration.source, declaration.line, declaration.pattern, reason);
    }

    const previous = seen.get(declaration.pattern);
    if (previous) {
      logger?.warn(
        {
          pattern: declaration.pattern,
          first: `${previous.source}:${previous.line}`,
          duplicate: `${declaration.source}:${declaration.line}`,
        },
        "Duplicate step implementation; the first declaration wins",
      );
    } else {
      seen.set(declaration.pattern, declaration);
    }

    return { ...declaration, regex, index };
  });

  return new ImplementationCatalog(entries);
}

/** Read every source from the provider, in order, and compile the catalog. */
export async function loadCatalog(provider: ImplementationSourceProvider, logger: Logger): Promise<ImplementationCatalog> {
  const sources = await provider.list();
  logger.info({ count: sources.length, from: provider.description }, "Loading step implementations");

  const declarations: ImplementationDeclaration[] = [];
  for (const source of sources) {
    const parsed = parseImplementationSource(source);
    logger.debug({ source: source.id, patterns: parsed.map((d) => d.pattern) }, "Parsed implementation source");
    declarations.push(...parsed);
  }

  const catalog = compileCatalog(declarations, logger);
  logger.info({ count: catalog.size }, "Step implementations loaded");
  return catalog;
}
