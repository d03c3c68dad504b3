import type { ColumnDefinition, Nullability } from "./model";
import { maskNested } from "./sqlText";

// Keywords that end the type expression of a column. The leftmost one wins.
const BOUNDARY_KEYWORDS: readonly RegExp[] = [
  /\bNOT\s+NULL\b/i,
  /\b(?:WITH\s+)?DEFAULT\b/i,
  /\bNULL\b/i,
  /\bCONSTRAINT\b/i,
  /\bPRIMARY\s+KEY\b/i,
  /\bUNIQUE\b/i,
  /\bCHECK\b/i,
  /\bGENERATED\b/i,
  /\bREFERENCES\b/i,
];

const DEFAULT_INTRODUCER = /\b(?:WITH\s+)?DEFAULT\b/i;

// A default expression stops before any of these.
const DEFAULT_TERMINATORS =
  /,|\b(?:NOT\s+NULL|CONSTRAINT|PRIMARY\s+KEY|UNIQUE|CHECK|GENERATED|REFERENCES)\b/i;

const DROPPED_CLAUSES: ReadonlyArray<[string, RegExp]> = [
  ["UNIQUE", /\bUNIQUE\b/i],
  ["CHECK", /\bCHECK\b/i],
  ["REFERENCES", /\bREFERENCES\b/i],
  ["GENERATED", /\bGENERATED\b/i],
];

// The DEFAULT in an identity clause does not introduce a column default.
const GENERATED_BY_DEFAULT = /\bGENERATED\s+BY\s+DEFAULT\b/gi;

/** Top-level text to search for keywords: literals, nested text and identity DEFAULTs blanked. */
function scanMask(text: string): string {
  return maskNested(text).replace(GENERATED_BY_DEFAULT, (clause) =>
    clause.replace(/DEFAULT$/i, (word) => "_".repeat(word.length)),
  );
}

const CONSTRAINT_LINE =
  /^(?:CONSTRAINT|PRIMARY\s+KEY|UNIQUE|CHECK|FOREIGN\s+KEY)\b/i;

export function isConstraintLine(line: string): boolean {
  return CONSTRAINT_LINE.test(line.trim());
}

/**
 * Split one column definition line into name, type expression, nullability
 * and default clause. Returns null for a line that is empty once its trailing
 * comma is removed.
 */
export function parseColumnDefinition(line: string): ColumnDefinition | null {
  const trimmed = line.trim().replace(/,$/, "").trim();
  if (!trimmed) return null;

  const name = trimmed.split(/\s+/)[0];
  const rest = trimmed.slice(name.length);
  const masked = scanMask(rest);

  let typeEnd = rest.length;
  for (const keyword of BOUNDARY_KEYWORDS) {
    const match = keyword.exec(masked);
    if (match && match.index < typeEnd) typeEnd = match.index;
  }

  const typeExpression = rest.slice(0, typeEnd).trim();
  const remainder = rest.slice(typeEnd).trim();
  const { defaultClause, withoutDefault } = splitDefault(remainder);
  const constraints = scanMask(withoutDefault);

  return {
    text: trimmed,
    name,
    typeExpression,
    nullability: readNullability(constraints),
    defaultClause,
    inlinePrimaryKey: /\bPRIMARY\s+KEY\b/i.test(constraints),
    droppedClauses: DROPPED_CLAUSES.filter(([, pattern]) =>
      pattern.test(constraints),
    ).map(([keyword]) => keyword),
  };
}

function splitDefault(remainder: string): {
  defaultClause?: string;
  withoutDefault: string;
} {
  const masked = scanMask(remainder);
  const intro = DEFAULT_INTRODUCER.exec(masked);
  if (!intro) return { withoutDefault: remainder };

  const exprStart = intro.index + intro[0].length;
  const terminator = DEFAULT_TERMINATORS.exec(masked.slice(exprStart));
  const exprEnd = terminator ? exprStart + terminator.index : remainder.length;

  const introducer = remainder.slice(intro.index, exprStart);
  const expression = remainder.slice(exprStart, exprEnd).trim();

  return {
    defaultClause: expression ? `${introducer} ${expression}` : introducer,
    withoutDefault: `${remainder.slice(0, intro.index)} ${remainder.slice(exprEnd)}`,
  };
}

function readNullability(constraints: string): Nullability {
  if (/\bNOT\s+NULL\b/i.test(constraints)) return "not-null";
  if (/\bNULL\b/i.test(constraints)) return "null";
  return "unspecified";
}
