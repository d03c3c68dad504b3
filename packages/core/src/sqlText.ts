// Small text helpers shared by the parsers. All of them treat single-quoted
// string literals ('' escapes included) as opaque.

const LITERAL = /'(?:[^']|'')*'/g;

/**
 * Replace the inside of every string literal with underscores, keeping the
 * text length unchanged so offsets found in the mask apply to the original.
 */
export function maskLiterals(input: string): string {
  return input.replace(
    LITERAL,
    (literal) => `'${"_".repeat(literal.length - 2)}'`,
  );
}

/**
 * `maskLiterals`, then every character inside parentheses blanked to `_`.
 * Only top-level text stays readable; offsets still match the input.
 */
export function maskNested(input: string): string {
  const masked = maskLiterals(input);
  let out = "";
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === ")") depth = Math.max(0, depth - 1);
    out += depth > 0 ? "_" : ch;
    if (ch === "(") depth++;
  }
  return out;
}

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function parenBalance(line: string): number {
  let balance = 0;
  for (const ch of maskLiterals(line)) {
    if (ch === "(") balance++;
    if (ch === ")") balance--;
  }
  return balance;
}

/** Split on commas that sit outside parentheses and literals. */
export function splitTopLevel(body: string): string[] {
  const masked = maskLiterals(body);
  const parts: string[] = [];
  let start = 0;
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === "(") depth++;
    if (ch === ")") depth--;
    if (ch === "," && depth === 0) {
      parts.push(body.slice(start, i));
      start = i + 1;
    }
  }
  if (body.slice(start).trim()) parts.push(body.slice(start));
  return parts;
}

/**
 * Index of the first match of `pattern` outside string literals, or -1.
 * `pattern` must not be global.
 */
export function searchOutsideLiterals(input: string, pattern: RegExp): number {
  const match = pattern.exec(maskLiterals(input));
  return match ? match.index : -1;
}

/** Apply `rewrite` to the text between string literals only. */
export function rewriteOutsideLiterals(
  input: string,
  rewrite: (code: string) => string,
): string {
  let out = "";
  let last = 0;
  for (const match of input.matchAll(LITERAL)) {
    const index = match.index ?? 0;
    out += rewrite(input.slice(last, index)) + match[0];
    last = index + match[0].length;
  }
  return out + rewrite(input.slice(last));
}

export function truncate(input: string, max: number): string {
  return input.length > max ? input.slice(0, max) : input;
}
