import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { readDocument, type DocumentReader } from "./files";
import type { Logger } from "./logger";

export interface RecordingLogger extends Logger {
  lines: string[];
}

/** Logger that keeps `LEVEL: message` lines for assertions. */
export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`INFO: ${message}`),
    warn: (message) => lines.push(`WARNING: ${message}`),
    error: (message) => lines.push(`ERROR: ${message}`),
  };
}

export function makeWorkspace(): string {
  return mkdtempSync(join(tmpdir(), "db2sf-"));
}

export function writeFixture(root: string, path: string, content: string): void {
  const target = join(root, path);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, content, "utf8");
}

/** Reader that fails for one source path and reads everything else from disk. */
export function failingReader(brokenSource: string, message: string): DocumentReader {
  return (path, source) => {
    if (source === brokenSource) throw new Error(message);
    return readDocument(path, source);
  };
}
