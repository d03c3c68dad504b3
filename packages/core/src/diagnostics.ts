import type { Diagnostic, RuleIssue } from "./model";
import { truncate } from "./sqlText";

export const SNIPPET_LIMIT = 80;

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  reportAll(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) this.report(diagnostic);
  }
}

export function createDiagnostic(
  table: string,
  section: string,
  issue: string,
  snippet: string,
): Diagnostic {
  return { table, section, issue, snippet: truncate(snippet, SNIPPET_LIMIT) };
}

export function fromRuleIssue(
  table: string,
  section: string,
  ruleIssue: RuleIssue,
): Diagnostic {
  return createDiagnostic(table, section, ruleIssue.issue, ruleIssue.snippet);
}

/** `<table> | <section> | <issue> | <snippet>` */
export function formatDiagnosticLine(diagnostic: Diagnostic): string {
  const snippet = truncate(diagnostic.snippet, SNIPPET_LIMIT);
  return `${diagnostic.table} | ${diagnostic.section} | ${diagnostic.issue} | ${snippet}`;
}

/**
 * Read a line written by `formatDiagnosticLine`. The snippet is free text and
 * may itself contain ` | `, so everything after the third separator belongs
 * to it.
 */
export function parseDiagnosticLine(line: string): Diagnostic | null {
  const parts = line.split(" | ");
  if (parts.length < 4) return null;
  const [table, section, issue, ...snippet] = parts;
  return { table, section, issue, snippet: snippet.join(" | ") };
}
