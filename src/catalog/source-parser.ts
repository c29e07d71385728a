import { ParseError } from "../errors.js";
import { normalizeLineEndings } from "../feature/parser.js";
import type { ImplementationDeclaration, ImplementationSource } from "./types.js";

const DECLARATION_KEYWORD = "IMPLEMENTS";

/**
 * Normalize line endings, drop a leading shebang (scripts always run through
 * the located interpreter) and strip trailing whitespace from every line.
 */
export function cleanScript(script: string): string {
  const lines = normalizeLineEndings(script).split("\n");
  if (lines[0]?.trim().startsWith("#!")) {
    lines.shift();
  }
  return lines.map((line) => line.trimEnd()).join("\n");
}

/**
 * Split an implementation document into declarations. Each `IMPLEMENTS <pattern>`
 * line starts a block whose script runs to the next declaration or the end of
 * the document; anything before the first declaration is ignored.
 */
export function parseImplementationSource(source: ImplementationSource): ImplementationDeclaration[] {
  const lines = normalizeLineEndings(source.content).split("\n");
  const declarations: ImplementationDeclaration[] = [];

  let current: { pattern: string; line: number; body: string[] } | null = null;

  const flush = (): void => {
    if (current) {
      declarations.push({
        pattern: current.pattern,
        script: trimBlankLines(cleanScript(current.body.join("\n"))),
        source: source.id,
        line: current.line,
      });
    }
  };

  lines.forEach((line, index) => {
    const pattern = matchDeclaration(line.trim());
    if (pattern === null) {
      current?.body.push(line);
      return;
    }
    if (pattern === "") {
      throw new ParseError(source.id, index + 1, `${DECLARATION_KEYWORD} requires a step pattern`);
    }
    flush();
    current = { pattern, line: index + 1, body: [] };
  });
  flush();

  return declarations;
}

function matchDeclaration(trimmed: string): string | null {
  if (!trimmed.startsWith(DECLARATION_KEYWORD)) return null;
  const rest = trimmed.slice(DECLARATION_KEYWORD.length);
  if (rest === "") return "";
  if (!rest.startsWith(" ") && !rest.startsWith("\t")) return null;
  return rest.trim();
}

function trimBlankLines(script: string): string {
  return script.replace(/^\n+/, "").replace(/\n+$/, "");
}
