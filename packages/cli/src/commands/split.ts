import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve as resolvePath } from "node:path";
import {
  displayName,
  extractTables,
  manifestEntry,
  renderExtractedFile,
  serializeManifest,
  type ManifestEntry,
  type RawDocument,
} from "@db2sf/core";
import {
  ExitCode,
  isDirectory,
  joinPosix,
  listFiles,
  readDocument,
  type DocumentReader,
  type FileFailure,
} from "../files";
import { describeError, type Logger } from "../logger";

export const SPLIT_EXTENSIONS = [".sql", ".txt"] as const;

export interface SplitOptions {
  input: string;
  output: string;
  manifest: string;
  cwd?: string;
  /** Defaults to reading the file as UTF-8 */
  read?: DocumentReader;
}

export interface SplitSummary {
  files: string[];
  manifest: ManifestEntry[];
  warnings: string[];
  failures: FileFailure[];
  exitCode: ExitCode;
}

/**
 * Split every DDL dump in `input` into one `<SCHEMA>__<TABLE>.sql` file per
 * table and write the manifest. A file that cannot be read or written is
 * reported and skipped; the rest of the batch still runs.
 */
export function runSplit(
  options: SplitOptions,
  logger: Logger,
  now: () => Date = () => new Date(),
): SplitSummary {
  const cwd = options.cwd ?? process.cwd();
  const read = options.read ?? readDocument;
  const inputDir = resolvePath(cwd, options.input);
  const outputDir = resolvePath(cwd, options.output);
  const summary: SplitSummary = {
    files: [],
    manifest: [],
    warnings: [],
    failures: [],
    exitCode: ExitCode.Success,
  };

  if (!isDirectory(inputDir)) {
    logger.error(`Input directory ${options.input} does not exist`);
    return { ...summary, exitCode: ExitCode.NoInput };
  }

  summary.files = listFiles(inputDir, SPLIT_EXTENSIONS);
  if (summary.files.length === 0) {
    logger.error(`No .sql or .txt files found in ${options.input}`);
    return { ...summary, exitCode: ExitCode.NoInput };
  }

  mkdirSync(outputDir, { recursive: true });
  const writtenFrom = new Map<string, string>();

  for (const name of summary.files) {
    const source = joinPosix(options.input, name);
    logger.info(`Processing ${source}`);

    let document: RawDocument;
    try {
      document = read(join(inputDir, name), source);
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error reading ${source}: ${message}`);
      summary.failures.push({ file: source, stage: "read", message });
      continue;
    }

    const extraction = extractTables(document);
    for (const warning of extraction.warnings) {
      logger.warn(warning);
      summary.warnings.push(warning);
    }

    for (const table of extraction.tables) {
      const previous = writtenFrom.get(table.fileName);
      if (previous) {
        const warning = `${displayName(table)} from ${source} overwrites the copy extracted from ${previous}`;
        logger.warn(warning);
        summary.warnings.push(warning);
      }

      const target = joinPosix(options.output, table.fileName);
      try {
        writeFileSync(
          join(outputDir, table.fileName),
          renderExtractedFile(table, source, now()),
          "utf8",
        );
      } catch (error) {
        const message = describeError(error);
        logger.error(`Error writing ${target}: ${message}`);
        summary.failures.push({ file: source, stage: "write", message });
        continue;
      }

      writtenFrom.set(table.fileName, source);
      summary.manifest.push(manifestEntry(table, target, source));
      logger.info(`Extracted ${displayName(table)} to ${table.fileName}`);
    }
  }

  if (summary.manifest.length === 0) {
    logger.error("No CREATE TABLE statements found in any input files");
    return { ...summary, exitCode: ExitCode.NothingConverted };
  }

  const manifestPath = resolvePath(cwd, options.manifest);
  mkdirSync(dirname(manifestPath), { recursive: true });
  writeFileSync(manifestPath, serializeManifest(summary.manifest), "utf8");

  logger.info(
    `Successfully processed ${summary.files.length} files, extracted ${summary.manifest.length} tables`,
  );
  return summary;
}
