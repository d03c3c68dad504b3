import {
  maskLiterals,
  normalizeWhitespace,
  rewriteOutsideLiterals,
  splitTopLevel,
} from "./sqlText";

export interface ColumnList {
  /** Non-empty items, whitespace outside literals collapsed. */
  items: string[];
  /** False when the closing parenthesis was never found. */
  closed: boolean;
  /** Text between the closing parenthesis and the terminating `;`. */
  trailing: string;
}

/**
 * Read the parenthesized column list that starts at the first `(` at or after
 * `from`. Returns null when there is none.
 */
export function readColumnList(text: string, from = 0): ColumnList | null {
  const masked = maskLiterals(text);
  const open = masked.indexOf("(", from);
  if (open === -1) return null;

  let depth = 0;
  let close = -1;
  for (let i = open; i < masked.length; i++) {
    if (masked[i] === "(") depth++;
    if (masked[i] === ")") depth--;
    if (depth === 0) {
      close = i;
      break;
    }
  }

  const body =
    close === -1
      ? text.slice(open + 1).replace(/;\s*$/, "")
      : text.slice(open + 1, close);
  const items = splitTopLevel(body)
    .map((item) =>
      rewriteOutsideLiterals(item, (code) => code.replace(/\s+/g, " ")).trim(),
    )
    .filter(Boolean);

  if (close === -1) {
    return { items, closed: false, trailing: "" };
  }

  const afterClose = masked.slice(close + 1);
  const semicolon = afterClose.indexOf(";");
  const trailing = text.slice(
    close + 1,
    semicolon === -1 ? text.length : close + 1 + semicolon,
  );

  return { items, closed: true, trailing: normalizeWhitespace(trailing) };
}
