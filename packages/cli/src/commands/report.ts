import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve as resolvePath } from "node:path";
import { parseDiagnosticLine, type Diagnostic } from "@db2sf/core";
import { ExitCode, isDirectory, listFiles } from "../files";
import { describeError, type Logger } from "../logger";
import { fileStem, tableNameFromFile } from "../utils";
import {
  generateOverviewHTML,
  generateTableHTML,
  type ReviewReport,
  type ReviewTable,
} from "../view";

export interface ReportOptions {
  converted: string;
  issues: string;
  output: string;
  cwd?: string;
}

export interface ReportSummary {
  report: ReviewReport;
  pages: string[];
  exitCode: ExitCode;
}

/** Issues log → diagnostics. Lines that are not in the four-field format are skipped. */
export function readIssues(path: string, logger: Logger): Diagnostic[] {
  if (!existsSync(path)) {
    logger.warn(`Issues file ${path} not found, reporting without issues`);
    return [];
  }

  const diagnostics: Diagnostic[] = [];
  let skipped = 0;
  for (const line of readFileSync(path, "utf8").split("\n")) {
    if (line.trim() === "") continue;
    const diagnostic = parseDiagnosticLine(line);
    if (diagnostic) {
      diagnostics.push(diagnostic);
    } else {
      skipped += 1;
    }
  }
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} malformed lines in ${path}`);
  }
  return diagnostics;
}

/** Pair each converted file with the diagnostics logged under its table. */
export function buildReviewReport(
  files: Array<{ fileName: string; sql: string }>,
  diagnostics: Diagnostic[],
  generatedAt: string,
): ReviewReport {
  const byTable = new Map<string, Diagnostic[]>();
  for (const diagnostic of diagnostics) {
    const list = byTable.get(diagnostic.table) ?? [];
    list.push(diagnostic);
    byTable.set(diagnostic.table, list);
  }

  const tables = files.map((file): ReviewTable => {
    const name = tableNameFromFile(file.fileName);
    const own = byTable.get(name) ?? [];
    byTable.delete(name);
    return {
      name,
      fileName: file.fileName,
      pageName: `table-${fileStem(file.fileName)}.html`,
      sql: file.sql,
      diagnostics: own,
    };
  });

  return {
    tables,
    unassigned: Array.from(byTable.values()).flat(),
    generatedAt,
  };
}

/**
 * Write the static review report: `index.html` plus one page per converted
 * table showing its Snowflake DDL and logged issues.
 */
export function runReport(
  options: ReportOptions,
  logger: Logger,
  now: () => Date = () => new Date(),
): ReportSummary {
  const cwd = options.cwd ?? process.cwd();
  const convertedDir = resolvePath(cwd, options.converted);
  const outputDir = resolvePath(cwd, options.output);
  const empty: ReviewReport = { tables: [], unassigned: [], generatedAt: "" };

  if (!isDirectory(convertedDir)) {
    logger.error(`Converted directory ${options.converted} does not exist`);
    return { report: empty, pages: [], exitCode: ExitCode.NoInput };
  }

  const names = listFiles(convertedDir, [".sql"]);
  if (names.length === 0) {
    logger.error(`No .sql files found in ${options.converted}`);
    return { report: empty, pages: [], exitCode: ExitCode.NoInput };
  }

  const files: Array<{ fileName: string; sql: string }> = [];
  for (const fileName of names) {
    try {
      files.push({ fileName, sql: readFileSync(join(convertedDir, fileName), "utf8") });
    } catch (error) {
      logger.error(`Error reading ${fileName}: ${describeError(error)}`);
    }
  }

  const report = buildReviewReport(
    files,
    readIssues(resolvePath(cwd, options.issues), logger),
    now().toISOString(),
  );

  mkdirSync(outputDir, { recursive: true });
  const pages = ["index.html"];
  writeFileSync(join(outputDir, "index.html"), generateOverviewHTML(report), "utf8");
  for (const table of report.tables) {
    writeFileSync(join(outputDir, table.pageName), generateTableHTML(table), "utf8");
    pages.push(table.pageName);
  }

  logger.info(`Review report for ${report.tables.length} tables written to ${options.output}`);
  return { report, pages, exitCode: ExitCode.Success };
}
