import { isConstraintLine, parseColumnDefinition } from "./columnParser";
import { readColumnList } from "./columnList";
import { stripComments } from "./comments";
import { createDiagnostic, fromRuleIssue } from "./diagnostics";
import { TranspileError } from "./errors";
import {
  displayName,
  qualifiedName,
  type ColumnDefinition,
  type ConvertedColumn,
  type Diagnostic,
  type TableIdentity,
  type TranspileResult,
  type TranspiledFile,
} from "./model";
import { findPrimaryKey, renderPrimaryKeyStatement } from "./primaryKey";
import { CREATE_TABLE_HEADER, identifyStatement } from "./segmenter";
import { convertDefault, convertType } from "./typeRules";

const CONSTRAINT_NAME = /^CONSTRAINT\s+(\w+)/i;

export interface ColumnConversion {
  column: ConvertedColumn;
  diagnostics: Diagnostic[];
}

/** Convert one parsed column, collecting the diagnostics it raises. */
export function convertColumn(
  definition: ColumnDefinition,
  table: string,
): ColumnConversion {
  const diagnostics: Diagnostic[] = [];
  const type = convertType(definition.typeExpression);
  if (type.issue) {
    diagnostics.push(fromRuleIssue(table, definition.name, type.issue));
  }

  const defaultValue = convertDefault(definition.defaultClause);
  if (defaultValue.issue) {
    diagnostics.push(fromRuleIssue(table, definition.name, defaultValue.issue));
  }

  for (const clause of definition.droppedClauses) {
    diagnostics.push(
      createDiagnostic(
        table,
        definition.name,
        `inline ${clause} clause dropped`,
        definition.text,
      ),
    );
  }

  return {
    column: {
      name: definition.name,
      type: type.type,
      typeStatus: type.status,
      nullability: definition.nullability,
      defaultClause: defaultValue.clause,
    },
    diagnostics,
  };
}

export function renderColumn(column: ConvertedColumn): string {
  const parts = [column.name, column.type];
  if (column.nullability === "not-null") parts.push("NOT NULL");
  if (column.nullability === "null") parts.push("NULL");
  parts.push(column.defaultClause);
  return parts.filter(Boolean).join(" ");
}

/**
 * Rewrite one DB2 `CREATE TABLE` statement as Snowflake DDL. Primary keys are
 * moved to a trailing `ALTER TABLE ... ADD PRIMARY KEY` statement; every
 * lossy or dropped construct is reported as a diagnostic.
 */
export function transpileStatement(statementText: string): TranspileResult {
  const text = stripComments(statementText);
  const header = CREATE_TABLE_HEADER.exec(text);
  const identity = header ? identifyStatement({ lines: [header[0]] }) : null;
  if (!header || !identity) {
    throw new TranspileError(
      "no CREATE TABLE statement found",
      text.trim().split("\n")[0],
    );
  }

  const table = displayName(identity);
  const list = readColumnList(text, header.index + header[0].length);
  if (!list) {
    throw new TranspileError(`no column list found for ${table}`, header[0]);
  }

  const diagnostics: Diagnostic[] = [];
  if (!list.closed) {
    diagnostics.push(
      createDiagnostic(
        table,
        "statement",
        "unbalanced parentheses; column list captured best-effort",
        header[0],
      ),
    );
  }

  const columns: ConvertedColumn[] = [];
  for (const item of list.items) {
    if (isConstraintLine(item)) {
      if (!/\bPRIMARY\s+KEY\b/i.test(item)) {
        const name = CONSTRAINT_NAME.exec(item);
        diagnostics.push(
          createDiagnostic(
            table,
            name ? name[1] : "table_constraint",
            "table constraint dropped",
            item,
          ),
        );
      }
      continue;
    }

    const definition = parseColumnDefinition(item);
    if (!definition) continue;
    const converted = convertColumn(definition, table);
    columns.push(converted.column);
    diagnostics.push(...converted.diagnostics);
  }

  if (list.trailing) {
    diagnostics.push(
      createDiagnostic(table, "table_options", "table options dropped", list.trailing),
    );
  }

  const primaryKey = findPrimaryKey(list.items);
  if (primaryKey.shadowed) {
    diagnostics.push(
      createDiagnostic(
        table,
        "primary_key",
        "table-level PRIMARY KEY ignored; inline key kept",
        `PRIMARY KEY (${primaryKey.shadowed.join(", ")})`,
      ),
    );
  }

  return {
    identity,
    columns,
    primaryKey,
    sql: renderStatement(identity, columns, primaryKey.columns),
    diagnostics,
  };
}

function renderStatement(
  identity: TableIdentity,
  columns: readonly ConvertedColumn[],
  primaryKey: readonly string[],
): string {
  const name = qualifiedName(identity);
  const lines = [`CREATE TABLE ${name} (`];
  columns.forEach((column, i) => {
    const comma = i < columns.length - 1 ? "," : "";
    lines.push(`  ${renderColumn(column)}${comma}`);
  });
  lines.push(");");
  if (primaryKey.length > 0) {
    lines.push(renderPrimaryKeyStatement(name, primaryKey));
  }
  return lines.join("\n");
}

/** Split off the leading `--` provenance lines written by the extractor. */
export function splitHeader(content: string): {
  headerLines: string[];
  body: string;
} {
  const lines = content.split("\n");
  let end = 0;
  while (end < lines.length && lines[end].trim().startsWith("--")) end++;
  return {
    headerLines: lines.slice(0, end).map((line) => line.replace(/\r$/, "")),
    body: lines.slice(end).join("\n"),
  };
}

/** Rewrite an extracted table file, keeping its header lines verbatim. */
export function transpileFile(content: string): TranspiledFile {
  const { headerLines, body } = splitHeader(content);
  const result = transpileStatement(body);
  const prefix = headerLines.length > 0 ? `${headerLines.join("\n")}\n\n` : "";
  return {
    headerLines,
    content: `${prefix}${result.sql}\n`,
    result,
  };
}
