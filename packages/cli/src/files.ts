import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join } from "node:path";
import type { RawDocument } from "@db2sf/core";

export const ExitCode = {
  Success: 0,
  Failure: 1,
  NoInput: 2,
  NothingConverted: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface FileFailure {
  file: string;
  stage: "read" | "convert" | "write";
  message: string;
}

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/** Files directly inside `dir` with one of `extensions`, sorted by name. */
export function listFiles(dir: string, extensions: readonly string[]): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        extensions.includes(extname(entry.name).toLowerCase()),
    )
    .map((entry) => entry.name)
    .sort();
}

export type DocumentReader = (path: string, source: string) => RawDocument;

export function readDocument(path: string, source: string): RawDocument {
  return { source, text: readFileSync(path, "utf8") };
}

export function toPosix(path: string): string {
  return path.split("\\").join("/");
}

export function joinPosix(...parts: string[]): string {
  return toPosix(join(...parts));
}
