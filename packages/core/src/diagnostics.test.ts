import { describe, expect, it } from "vitest";
import {
  CollectingSink,
  createDiagnostic,
  formatDiagnosticLine,
  parseDiagnosticLine,
} from "./diagnostics";

describe("formatDiagnosticLine", () => {
  it("writes a pipe-delimited line", () => {
    const line = formatDiagnosticLine({
      table: "APP.ACCOUNT",
      section: "CODE",
      issue: "ambiguous default removed",
      snippet: "WITH DEFAULT",
    });
    expect(line).toBe("APP.ACCOUNT | CODE | ambiguous default removed | WITH DEFAULT");
  });

  it("truncates the snippet to 80 characters", () => {
    const line = formatDiagnosticLine({
      table: "T",
      section: "C",
      issue: "x",
      snippet: "A".repeat(120),
    });
    expect(line).toBe(`T | C | x | ${"A".repeat(80)}`);
  });
});

describe("createDiagnostic", () => {
  it("truncates the stored snippet", () => {
    expect(createDiagnostic("T", "C", "x", "B".repeat(81)).snippet).toHaveLength(80);
  });
});

describe("parseDiagnosticLine", () => {
  it("reads a line back, snippet separators included", () => {
    expect(parseDiagnosticLine("HR.EMP | FK | table constraint dropped | a | b")).toEqual({
      table: "HR.EMP",
      section: "FK",
      issue: "table constraint dropped",
      snippet: "a | b",
    });
  });

  it("rejects lines with too few fields", () => {
    expect(parseDiagnosticLine("just text")).toBeNull();
  });
});

describe("CollectingSink", () => {
  it("keeps repeated diagnostics as separate entries", () => {
    const sink = new CollectingSink();
    const diagnostic = createDiagnostic("T", "C", "x", "s");
    sink.report(diagnostic);
    sink.reportAll([diagnostic]);
    expect(sink.diagnostics).toEqual([diagnostic, diagnostic]);
  });
});
