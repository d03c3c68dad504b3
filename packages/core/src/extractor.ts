import { stripComments } from "./comments";
import {
  displayName,
  tableFileName,
  type ExtractedTable,
  type ExtractionResult,
  type ManifestEntry,
  type RawDocument,
} from "./model";
import { identifyStatement, segmentStatements } from "./segmenter";

/**
 * Pull every `CREATE TABLE` statement out of a DDL dump.
 *
 * Nothing here is fatal: a document without statements, a statement whose
 * table cannot be named and a statement that never closes all end up in
 * `warnings`. Only statements with an identity are returned.
 */
export function extractTables(document: RawDocument): ExtractionResult {
  const tables: ExtractedTable[] = [];
  const warnings: string[] = [];
  let found = 0;

  for (const statement of segmentStatements(stripComments(document.text))) {
    found++;
    const identity = identifyStatement(statement);
    if (!identity) {
      warnings.push(
        `Could not extract schema/table from statement in ${document.source}`,
      );
      continue;
    }

    if (!statement.closed) {
      warnings.push(
        `Statement for ${displayName(identity)} in ${document.source} is not terminated; captured best-effort`,
      );
    }

    tables.push({
      ...statement,
      ...identity,
      fileName: tableFileName(identity),
      text: statement.lines.join("\n"),
    });
  }

  if (found === 0) {
    warnings.push(`No CREATE TABLE statements found in ${document.source}`);
  }

  return { source: document.source, tables, warnings };
}

/** Provenance header, blank line, then the statement. */
export function renderExtractedFile(
  table: Pick<ExtractedTable, "text">,
  sourceFile: string,
  extractedAt: Date,
): string {
  return [
    `-- Source file: ${sourceFile}`,
    `-- Extracted: ${extractedAt.toISOString()}`,
    "",
    table.text,
    "",
  ].join("\n");
}

export function manifestEntry(
  table: ExtractedTable,
  path: string,
  sourceFile: string,
): ManifestEntry {
  return { schema: table.schema, table: table.table, path, sourceFile };
}

/** Manifest as written to disk: an ordered JSON list using `source_file`. */
export function serializeManifest(entries: readonly ManifestEntry[]): string {
  const records = entries.map((entry) => ({
    schema: entry.schema,
    table: entry.table,
    path: entry.path,
    source_file: entry.sourceFile,
  }));
  return `${JSON.stringify(records, null, 2)}\n`;
}
