import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { ImplementationSource, ImplementationSourceProvider } from "./types.js";
import type { Logger } from "../logger.js";

/** Lists implementation files with a given extension in one directory, sorted by name. */
export class DirectorySourceProvider implements ImplementationSourceProvider {
  constructor(
    private readonly directory: string,
    private readonly extension: string,
    private readonly logger: Logger,
  ) {}

  get description(): string {
    return this.directory;
  }

  async list(): Promise<ImplementationSource[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) {
        this.logger.debug({ directory: this.directory }, "Implementation directory does not exist");
        return [];
      }
      throw error;
    }

    const files = names
      .filter((name) => name.endsWith(this.extension))
      .sort(compareCodeUnits)
      .map((name) => join(this.directory, name));

    this.logger.debug({ directory: this.directory, files }, "Found implementation files");
    return readSources(files);
  }
}

/** Uses exactly the files it was given, in the given order. */
export class FileSourceProvider implements ImplementationSourceProvider {
  constructor(private readonly files: readonly string[]) {}

  get description(): string {
    return this.files.join(", ");
  }

  async list(): Promise<ImplementationSource[]> {
    return readSources(this.files);
  }
}

async function readSources(files: readonly string[]): Promise<ImplementationSource[]> {
  const sources: ImplementationSource[] = [];
  for (const file of files) {
    sources.push({ id: file, content: await readFile(file, "utf-8") });
  }
  return sources;
}

// Independent of the host locale: file order decides which implementation wins.
function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
