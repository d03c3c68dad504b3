import type { RuleIssue, TypeStatus } from "./model";
import {
  normalizeWhitespace,
  rewriteOutsideLiterals,
  searchOutsideLiterals,
} from "./sqlText";

export interface TypeRule {
  name: string;
  pattern: RegExp;
  convert: (type: string) => string;
  status: Exclude<TypeStatus, "unknown">;
  issue?: string;
}

export interface TypeConversion {
  type: string;
  status: TypeStatus;
  issue?: RuleIssue;
}

export interface DefaultConversion {
  clause: string;
  issue?: RuleIssue;
}

// Annotations removed before the rules run. They carry no meaning for the
// target dialect.
const TYPE_ANNOTATIONS: readonly RegExp[] = [
  /\s*\bFOR (?:SBCS|MIXED) DATA\b/g,
  /\s*\bCCSID (?:\d+|ASCII|EBCDIC|UNICODE)\b/g,
];

const same = (type: string) => type;

/**
 * DB2 → Snowflake type rules, evaluated top to bottom; the first rule whose
 * pattern matches the normalized type wins.
 */
export const TYPE_RULES: readonly TypeRule[] = [
  {
    name: "bit-data",
    pattern: /\bFOR BIT DATA\b/,
    convert: () => "BINARY",
    status: "mapped",
    issue: "mapped to BINARY from FOR BIT DATA",
  },
  {
    name: "exact-numeric",
    pattern: /^(?:DECIMAL|NUMERIC)/,
    convert: (type) => type.replace(/^(?:DECIMAL|NUMERIC)/, "NUMBER"),
    status: "mapped",
  },
  {
    name: "integer",
    pattern: /^(?:SMALLINT|INT|INTEGER|BIGINT)$/,
    convert: same,
    status: "preserved",
  },
  {
    name: "floating",
    pattern: /^(?:REAL|FLOAT(?: ?\( ?\d+ ?\))?|DOUBLE(?: PRECISION)?|DECFLOAT(?: ?\( ?\d+ ?\))?)$/,
    convert: () => "FLOAT",
    status: "mapped",
  },
  {
    name: "character",
    pattern: /^(?:CHAR(?:ACTER)?(?: VARYING)?|VARCHAR)(?: ?\( ?\d+ ?\))?$/,
    convert: same,
    status: "preserved",
  },
  {
    name: "graphic",
    pattern: /^(?:VAR)?GRAPHIC/,
    convert: (type) => type.replace(/^(?:VAR)?GRAPHIC/, "VARCHAR"),
    status: "mapped",
    issue: "mapped (VAR)GRAPHIC to VARCHAR",
  },
  {
    name: "clob",
    pattern: /^CLOB/,
    convert: () => "VARCHAR",
    status: "mapped",
    issue: "CLOB mapped to VARCHAR (possible size loss)",
  },
  {
    name: "blob",
    pattern: /^BLOB/,
    convert: () => "BINARY",
    status: "mapped",
  },
  {
    name: "xml",
    pattern: /^XML$/,
    convert: () => "VARIANT",
    status: "mapped",
    issue: "XML mapped to VARIANT",
  },
  {
    name: "date-time",
    pattern: /^(?:DATE|TIME)$/,
    convert: same,
    status: "preserved",
  },
  {
    name: "timestamp-tz",
    pattern: /^TIMESTAMP( ?\( ?\d+ ?\))? WITH TIME ZONE$/,
    convert: (type) =>
      type.replace(/^TIMESTAMP( ?\( ?\d+ ?\))? WITH TIME ZONE$/, "TIMESTAMP_TZ$1"),
    status: "mapped",
  },
  {
    name: "timestamp",
    pattern: /^TIMESTAMP( ?\( ?\d+ ?\))?$/,
    convert: (type) => type.replace(/^TIMESTAMP/, "TIMESTAMP_NTZ"),
    status: "mapped",
  },
];

export function normalizeType(type: string): string {
  let normalized = normalizeWhitespace(type).toUpperCase();
  for (const annotation of TYPE_ANNOTATIONS) {
    normalized = normalized.replace(annotation, "");
  }
  return normalized.trim();
}

export function findTypeRule(normalizedType: string): TypeRule | undefined {
  return TYPE_RULES.find((rule) => rule.pattern.test(normalizedType));
}

export function convertType(sourceType: string): TypeConversion {
  const normalized = normalizeType(sourceType);

  if (!normalized) {
    return {
      type: "",
      status: "unknown",
      issue: { issue: "column has no data type", snippet: sourceType.trim() },
    };
  }

  const rule = findTypeRule(normalized);
  if (!rule) {
    return {
      type: normalized,
      status: "unknown",
      issue: {
        issue: "unrecognized type passed through unchanged",
        snippet: normalized,
      },
    };
  }

  return {
    type: rule.convert(normalized),
    status: rule.status,
    issue: rule.issue ? { issue: rule.issue, snippet: normalized } : undefined,
  };
}

const DEFAULT_INTRODUCER = /^(?:WITH\s+)?DEFAULT\b/i;

const SPECIAL_REGISTERS: ReadonlyArray<[RegExp, string]> = [
  [/\bCURRENT\s+TIMESTAMP\b/gi, "CURRENT_TIMESTAMP"],
  [/\bCURRENT\s+DATE\b/gi, "CURRENT_DATE"],
  [/\bCURRENT\s+TIME\b/gi, "CURRENT_TIME"],
  [/\bCURRENT\s+USER\b/gi, "CURRENT_USER"],
];

const SESSION_USER = /\bUSER\b/i;

/**
 * Convert a DB2 default clause (`WITH DEFAULT <expr>`, `DEFAULT <expr>` or a
 * bare expression) into a Snowflake `DEFAULT <expr>` clause.
 */
export function convertDefault(defaultClause?: string): DefaultConversion {
  const clause = defaultClause?.trim() ?? "";
  if (!clause) return { clause: "" };

  const intro = DEFAULT_INTRODUCER.exec(clause);
  let expression = intro ? clause.slice(intro[0].length).trim() : clause;

  if (!expression) {
    return {
      clause: "",
      issue: {
        issue: "ambiguous default removed",
        snippet: normalizeWhitespace(clause).toUpperCase(),
      },
    };
  }

  expression = rewriteOutsideLiterals(expression, (code) =>
    SPECIAL_REGISTERS.reduce(
      (acc, [pattern, replacement]) => acc.replace(pattern, replacement),
      code,
    ),
  );

  let issue: RuleIssue | undefined;
  if (searchOutsideLiterals(expression, SESSION_USER) !== -1) {
    issue = { issue: "USER converted to CURRENT_USER", snippet: expression };
    expression = rewriteOutsideLiterals(expression, (code) =>
      code.replace(/\bUSER\b/gi, "CURRENT_USER"),
    );
  }

  return { clause: `DEFAULT ${expression}`, issue };
}
