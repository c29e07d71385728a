import { UsageError } from "../errors.js";

export interface CliArgs {
  readonly featureFile: string | null;
  /** Explicit implementation files; when given, the implementation directory is not read. */
  readonly implementationFiles: string[];
  readonly implDir: string | null;
  readonly configPath: string | null;
  readonly json: boolean;
  readonly debug: boolean;
  readonly shell: string | null;
  readonly timeoutMs: number | null;
  readonly warnAmbiguous: boolean;
  readonly color: boolean;
  readonly help: boolean;
}

export const USAGE = `Usage: stepshell <feature-file> [implementation-files...] [options]

Options:
  --impl-dir <dir>   Directory of implementation files (default: ../gherkin-implements)
  --config <path>    Config file (default: ./stepshell.config.json)
  --json             Print the report as JSON
  --debug            Enable debug logging
  --shell <path>     Interpreter used to run step scripts
  --timeout <ms>     Kill a step that runs longer than this
  --warn-ambiguous   Log steps that more than one implementation matches
  --no-color         Disable colors in the text report
  --help             Show this message
`;

const VALUE_FLAGS = new Set(["--impl-dir", "--config", "--shell", "--timeout"]);

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === "") {
        throw new UsageError(`${name} requires a value`);
      }
      values.set(name, value);
    } else if (["--json", "--debug", "--warn-ambiguous", "--no-color", "--help"].includes(name) && eq === -1) {
      switches.add(name);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  const [featureFile, ...implementationFiles] = positional;

  return {
    featureFile: featureFile ?? null,
    implementationFiles,
    implDir: values.get("--impl-dir") ?? null,
    configPath: values.get("--config") ?? null,
    json: switches.has("--json"),
    debug: switches.has("--debug"),
    shell: values.get("--shell") ?? null,
    timeoutMs: parseTimeout(values.get("--timeout")),
    warnAmbiguous: switches.has("--warn-ambiguous"),
    color: !switches.has("--no-color"),
    help: switches.has("--help"),
  };
}

function parseTimeout(value: string | undefined): number | null {
  if (value === undefined) return null;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new UsageError(`--timeout must be a positive whole number of milliseconds, got "${value}"`);
  }
  return ms;
}
