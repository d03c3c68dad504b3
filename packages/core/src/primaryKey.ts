import { isConstraintLine, parseColumnDefinition } from "./columnParser";
import { readColumnList } from "./columnList";
import type { PrimaryKeySet } from "./model";
import { CREATE_TABLE_HEADER } from "./segmenter";

const TABLE_LEVEL_KEY = /\bPRIMARY\s+KEY\s*\(([^)]+)\)/i;

/**
 * Find the primary key among the items of a column list.
 *
 * An inline `PRIMARY KEY` on a column wins over a table-level
 * `PRIMARY KEY (...)` clause; the table-level columns are then reported as
 * `shadowed`. Only the first inline marker counts.
 */
export function findPrimaryKey(items: readonly string[]): PrimaryKeySet {
  let inline: string | undefined;
  let tableLevel: string[] | undefined;

  for (const item of items) {
    if (isConstraintLine(item)) {
      const match = TABLE_LEVEL_KEY.exec(item);
      if (match && !tableLevel) tableLevel = splitKeyColumns(match[1]);
      continue;
    }
    if (inline) continue;
    const column = parseColumnDefinition(item);
    if (column?.inlinePrimaryKey) inline = column.name;
  }

  if (inline) {
    return tableLevel
      ? { columns: [inline], form: "inline", shadowed: tableLevel }
      : { columns: [inline], form: "inline" };
  }
  if (tableLevel) return { columns: tableLevel, form: "table" };
  return { columns: [], form: "none" };
}

/** Primary key columns of a full `CREATE TABLE` statement, in written order. */
export function extractPrimaryKey(statement: string): string[] {
  const header = CREATE_TABLE_HEADER.exec(statement);
  if (!header) return [];
  const list = readColumnList(statement, header.index + header[0].length);
  return list ? findPrimaryKey(list.items).columns : [];
}

export function renderPrimaryKeyStatement(
  tableName: string,
  columns: readonly string[],
): string {
  return `ALTER TABLE ${tableName} ADD PRIMARY KEY (${columns.join(", ")});`;
}

function splitKeyColumns(list: string): string[] {
  return list
    .split(",")
    .map((column) => column.trim())
    .filter(Boolean);
}
