export * from "./model";
export { stripComments } from "./comments";
export { CREATE_TABLE_HEADER, segmentStatements, identifyStatement } from "./segmenter";
export { isConstraintLine, parseColumnDefinition } from "./columnParser";
export { readColumnList, type ColumnList } from "./columnList";
export {
  TYPE_RULES,
  convertDefault,
  convertType,
  findTypeRule,
  normalizeType,
  type DefaultConversion,
  type TypeConversion,
  type TypeRule,
} from "./typeRules";
export {
  extractPrimaryKey,
  findPrimaryKey,
  renderPrimaryKeyStatement,
} from "./primaryKey";
export {
  CollectingSink,
  SNIPPET_LIMIT,
  createDiagnostic,
  formatDiagnosticLine,
  parseDiagnosticLine,
  type DiagnosticSink,
} from "./diagnostics";
export { TranspileError } from "./errors";
export {
  convertColumn,
  renderColumn,
  splitHeader,
  transpileFile,
  transpileStatement,
  type ColumnConversion,
} from "./transpiler";
export {
  extractTables,
  manifestEntry,
  renderExtractedFile,
  serializeManifest,
} from "./extractor";
export { convertDump, type DumpConversion, type TableConversion } from "./analyze";
