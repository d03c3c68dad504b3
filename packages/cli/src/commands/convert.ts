import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve as resolvePath } from "node:path";
import {
  createDiagnostic,
  displayName,
  formatDiagnosticLine,
  transpileFile,
  type Diagnostic,
  type TranspiledFile,
  type TranspileResult,
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
import { tableNameFromFile } from "../utils";

export interface ConvertOptions {
  input: string;
  output: string;
  issues: string;
  cwd?: string;
  /** Defaults to reading the file as UTF-8 */
  read?: DocumentReader;
}

export interface ConvertSummary {
  files: string[];
  converted: TranspileResult[];
  diagnostics: Diagnostic[];
  failures: FileFailure[];
  exitCode: ExitCode;
}

/**
 * Convert every extracted table file in `input` to Snowflake DDL and write the
 * issues log. Read, conversion and write failures are logged as diagnostics
 * and do not stop the batch.
 */
export function runConvert(options: ConvertOptions, logger: Logger): ConvertSummary {
  const cwd = options.cwd ?? process.cwd();
  const read = options.read ?? readDocument;
  const inputDir = resolvePath(cwd, options.input);
  const outputDir = resolvePath(cwd, options.output);
  const summary: ConvertSummary = {
    files: [],
    converted: [],
    diagnostics: [],
    failures: [],
    exitCode: ExitCode.Success,
  };

  if (!isDirectory(inputDir)) {
    logger.error(`Input directory ${options.input} does not exist`);
    return { ...summary, exitCode: ExitCode.NoInput };
  }

  summary.files = listFiles(inputDir, [".sql"]);
  if (summary.files.length === 0) {
    logger.error(`No .sql files found in ${options.input}`);
    return { ...summary, exitCode: ExitCode.NoInput };
  }

  mkdirSync(outputDir, { recursive: true });

  for (const name of summary.files) {
    const source = joinPosix(options.input, name);
    const table = tableNameFromFile(name);
    logger.info(`Processing ${source}`);

    let content: string;
    try {
      content = read(join(inputDir, name), source).text;
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error reading ${source}: ${message}`);
      summary.diagnostics.push(
        createDiagnostic("parse_error", "file_read", message, source),
      );
      summary.failures.push({ file: source, stage: "read", message });
      continue;
    }

    let transpiled: TranspiledFile;
    try {
      transpiled = transpileFile(content);
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error converting ${source}: ${message}`);
      summary.diagnostics.push(
        createDiagnostic(table, "conversion_error", message, source),
      );
      summary.failures.push({ file: source, stage: "convert", message });
      continue;
    }
    summary.diagnostics.push(...transpiled.result.diagnostics);

    try {
      writeFileSync(join(outputDir, name), transpiled.content, "utf8");
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error writing ${joinPosix(options.output, name)}: ${message}`);
      summary.diagnostics.push(createDiagnostic(table, "file_write", message, source));
      summary.failures.push({ file: source, stage: "write", message });
      continue;
    }

    summary.converted.push(transpiled.result);
    logger.info(`Converted ${displayName(transpiled.result.identity)} to ${name}`);
  }

  const issuesPath = resolvePath(cwd, options.issues);
  mkdirSync(dirname(issuesPath), { recursive: true });
  writeFileSync(
    issuesPath,
    summary.diagnostics.map((d) => `${formatDiagnosticLine(d)}\n`).join(""),
    "utf8",
  );

  if (summary.converted.length === 0) {
    logger.error("No tables were successfully converted");
    return { ...summary, exitCode: ExitCode.NothingConverted };
  }

  if (summary.failures.length > 0) {
    logger.warn(`${summary.failures.length} of ${summary.files.length} files failed`);
  }
  logger.info(
    `Successfully converted ${summary.converted.length} tables, ${summary.diagnostics.length} issues logged to ${options.issues}`,
  );
  return summary;
}
