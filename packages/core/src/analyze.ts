import { extractTables } from "./extractor";
import { CollectingSink } from "./diagnostics";
import type { Diagnostic, ExtractedTable, RawDocument, TranspileResult } from "./model";
import { transpileStatement } from "./transpiler";

export interface TableConversion {
  table: ExtractedTable;
  result?: TranspileResult;
  error?: string;
}

export interface DumpConversion {
  tables: TableConversion[];
  warnings: string[];
  diagnostics: Diagnostic[];
}

/**
 * End-to-end DB2 → Snowflake conversion of one dump, in memory.
 *
 * Deterministic, rule-based, and side-effect free:
 * - Extracts every CREATE TABLE statement from the dump.
 * - Rewrites each one independently; a failing statement does not stop the rest.
 */
export function convertDump(document: RawDocument): DumpConversion {
  const extraction = extractTables(document);
  const sink = new CollectingSink();

  const tables = extraction.tables.map((table): TableConversion => {
    try {
      const result = transpileStatement(table.text);
      sink.reportAll(result.diagnostics);
      return { table, result };
    } catch (error) {
      return {
        table,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  });

  return {
    tables,
    warnings: extraction.warnings,
    diagnostics: sink.diagnostics,
  };
}
