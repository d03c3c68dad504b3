/**
 * Remove `/* ... *\/` and `-- ...` comments.
 *
 * Block comments are dropped first, newlines inside them included, so the
 * line count can shrink. Line comments are handled on what is left: whatever
 * came before the marker stays (trailing whitespace trimmed) and a
 * comment-only line becomes empty. Markers inside string literals are text.
 */
export function stripComments(content: string): string {
  return stripLineComments(stripBlockComments(content));
}

// Literal state for a single scan: a literal never spans lines in a DDL dump,
// so it also ends on a newline.
function literalAfter(inLiteral: boolean, ch: string): boolean {
  if (inLiteral) return !(ch === "'" || ch === "\n");
  return ch === "'";
}

function stripBlockComments(content: string): string {
  let out = "";
  let i = 0;
  let inLiteral = false;

  while (i < content.length) {
    const ch = content[i];

    if (!inLiteral && ch === "/" && content[i + 1] === "*") {
      const end = content.indexOf("*/", i + 2);
      if (end !== -1) {
        i = end + 2;
        continue;
      }
    }

    inLiteral = literalAfter(inLiteral, ch);
    out += ch;
    i++;
  }

  return out;
}

function stripLineComments(content: string): string {
  let out = "";
  let i = 0;
  let inLiteral = false;

  while (i < content.length) {
    const ch = content[i];

    if (!inLiteral && ch === "-" && content[i + 1] === "-") {
      const lineStart = out.lastIndexOf("\n") + 1;
      out = out.slice(0, lineStart) + out.slice(lineStart).trimEnd();
      const newline = content.indexOf("\n", i);
      if (newline === -1) break;
      i = newline;
      continue;
    }

    inLiteral = literalAfter(inLiteral, ch);
    out += ch;
    i++;
  }

  return out;
}
