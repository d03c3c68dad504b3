export const DEFAULT_SCHEMA = "DEFAULT";

export interface RawDocument {
  /** Identifier of the file the text was read from. */
  readonly source: string;
  readonly text: string;
}

export interface SegmentedStatement {
  lines: string[];
  /** Parenthesis balance after the last accumulated line. */
  depth: number;
  /** True when the statement ended on a `;` line at depth <= 0. */
  closed: boolean;
}

export interface TableIdentity {
  schema: string;
  table: string;
  schemaExplicit: boolean;
}

export type Statement = SegmentedStatement & TableIdentity;

export interface ExtractedTable extends Statement {
  fileName: string;
  text: string;
}

export interface ExtractionResult {
  source: string;
  tables: ExtractedTable[];
  warnings: string[];
}

export type Nullability = "not-null" | "null" | "unspecified";

export interface ColumnDefinition {
  /** The definition as written, trailing comma removed. */
  text: string;
  name: string;
  typeExpression: string;
  nullability: Nullability;
  /** Default clause as written, introducer included (e.g. `WITH DEFAULT 0`). */
  defaultClause?: string;
  inlinePrimaryKey: boolean;
  droppedClauses: string[];
}

// "preserved" is a confirmed-safe passthrough, "unknown" matched no rule.
export type TypeStatus = "mapped" | "preserved" | "unknown";

export interface ConvertedColumn {
  name: string;
  type: string;
  typeStatus: TypeStatus;
  nullability: Nullability;
  defaultClause: string;
}

export type PrimaryKeyForm = "inline" | "table" | "none";

export interface PrimaryKeySet {
  columns: string[];
  form: PrimaryKeyForm;
  /** Table-level key columns ignored because an inline key was found. */
  shadowed?: string[];
}

export interface Diagnostic {
  table: string;
  section: string;
  issue: string;
  snippet: string;
}

export interface RuleIssue {
  issue: string;
  snippet: string;
}

export interface ManifestEntry {
  schema: string;
  table: string;
  path: string;
  sourceFile: string;
}

export interface TranspileResult {
  identity: TableIdentity;
  columns: ConvertedColumn[];
  primaryKey: PrimaryKeySet;
  sql: string;
  diagnostics: Diagnostic[];
}

export interface TranspiledFile {
  headerLines: string[];
  content: string;
  result: TranspileResult;
}

export function qualifiedName(identity: TableIdentity): string {
  return identity.schemaExplicit
    ? `${identity.schema}.${identity.table}`
    : identity.table;
}

export function displayName(identity: TableIdentity): string {
  return `${identity.schema}.${identity.table}`;
}

export function tableFileName(identity: TableIdentity): string {
  return `${identity.schema}__${identity.table}.sql`;
}
