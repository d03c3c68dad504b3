import {
  DEFAULT_SCHEMA,
  type SegmentedStatement,
  type TableIdentity,
} from "./model";
import { parenBalance } from "./sqlText";

/** `CREATE TABLE <name>` or `CREATE TABLE <schema>.<name>`, anywhere in the text. */
export const CREATE_TABLE_HEADER = /CREATE\s+TABLE\s+\w+(?:\.\w+)?/i;
const CREATE_TABLE_LINE = new RegExp(`^${CREATE_TABLE_HEADER.source}`, "i");
const QUALIFIED_NAME = /CREATE\s+TABLE\s+(\w+)\.(\w+)/i;
const BARE_NAME = /CREATE\s+TABLE\s+(\w+)/i;

type ScanState =
  | { kind: "idle" }
  | { kind: "inStatement"; lines: string[]; depth: number };

interface ScanStep {
  state: ScanState;
  emit?: SegmentedStatement;
}

const IDLE: ScanState = { kind: "idle" };

function flush(lines: string[], depth: number, closed: boolean): SegmentedStatement {
  return { lines, depth, closed };
}

function step(state: ScanState, line: string): ScanStep {
  if (CREATE_TABLE_LINE.test(line)) {
    // A new CREATE TABLE while one is still open: emit the open one as-is.
    const emit =
      state.kind === "inStatement"
        ? flush(state.lines, state.depth, false)
        : undefined;
    return { state: accumulate([], 0, line), emit };
  }

  if (state.kind === "idle") return { state };

  return { state: accumulate(state.lines, state.depth, line) };
}

function accumulate(lines: string[], depth: number, line: string): ScanState {
  return {
    kind: "inStatement",
    lines: [...lines, line],
    depth: depth + parenBalance(line),
  };
}

function close(state: ScanState): ScanStep {
  if (state.kind === "inStatement" && state.depth <= 0) {
    const last = state.lines[state.lines.length - 1];
    if (last.endsWith(";")) {
      return { state: IDLE, emit: flush(state.lines, state.depth, true) };
    }
  }
  return { state };
}

/**
 * Lazily split comment-free DDL into `CREATE TABLE` statements.
 *
 * Blank lines are dropped and every kept line is trimmed. Lines outside a
 * statement are ignored. A statement still open at end of input is yielded
 * with `closed: false`.
 */
export function* segmentStatements(text: string): Generator<SegmentedStatement> {
  let state: ScanState = IDLE;

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!line) continue;

    const opened = step(state, line);
    if (opened.emit) yield opened.emit;

    const closed = close(opened.state);
    if (closed.emit) yield closed.emit;
    state = closed.state;
  }

  if (state.kind === "inStatement") {
    yield flush(state.lines, state.depth, false);
  }
}

export function identifyStatement(
  statement: Pick<SegmentedStatement, "lines">,
): TableIdentity | null {
  const text = statement.lines.join("\n");

  const qualified = QUALIFIED_NAME.exec(text);
  if (qualified) {
    return { schema: qualified[1], table: qualified[2], schemaExplicit: true };
  }

  const bare = BARE_NAME.exec(text);
  if (bare) {
    return { schema: DEFAULT_SCHEMA, table: bare[1], schemaExplicit: false };
  }

  return null;
}
