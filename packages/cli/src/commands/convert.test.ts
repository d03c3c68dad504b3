import { existsSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExitCode } from "../files";
import { failingReader, makeWorkspace, recordingLogger, writeFixture } from "../testing";
import { runConvert } from "./convert";

const OPTIONS = { input: "ext", output: "conv", issues: "logs/issues.txt" };

const HEADER = [
  "-- Source file: in/dump.sql",
  "-- Extracted: 2024-01-02T03:04:05.000Z",
];

const ACCOUNT = [
  ...HEADER,
  "",
  "CREATE TABLE APP.ACCOUNT (ID INTEGER NOT NULL PRIMARY KEY, NOTES CLOB(1M));",
  "",
].join("\n");

describe("runConvert", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeWorkspace();
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it("rewrites each table file and logs its issues", () => {
    writeFixture(cwd, "ext/APP__ACCOUNT.sql", ACCOUNT);

    const summary = runConvert({ ...OPTIONS, cwd }, recordingLogger());

    expect(summary.exitCode).toBe(ExitCode.Success);
    expect(readFileSync(join(cwd, "conv/APP__ACCOUNT.sql"), "utf8")).toBe(
      [
        ...HEADER,
        "",
        "CREATE TABLE APP.ACCOUNT (",
        "  ID INTEGER NOT NULL,",
        "  NOTES VARCHAR",
        ");",
        "ALTER TABLE APP.ACCOUNT ADD PRIMARY KEY (ID);",
        "",
      ].join("\n"),
    );
    expect(readFileSync(join(cwd, "logs/issues.txt"), "utf8")).toBe(
      "APP.ACCOUNT | NOTES | CLOB mapped to VARCHAR (possible size loss) | CLOB(1M)\n",
    );
  });

  it("logs a file it cannot rewrite and carries on", () => {
    writeFixture(cwd, "ext/APP__ACCOUNT.sql", ACCOUNT);
    writeFixture(cwd, "ext/APP__BROKEN.sql", [...HEADER, "", "not a table", ""].join("\n"));

    const summary = runConvert({ ...OPTIONS, cwd }, recordingLogger());

    expect(summary.exitCode).toBe(ExitCode.Success);
    expect(summary.converted.map((result) => result.identity.table)).toEqual(["ACCOUNT"]);
    expect(summary.failures).toEqual([
      {
        file: "ext/APP__BROKEN.sql",
        stage: "convert",
        message: "no CREATE TABLE statement found",
      },
    ]);
    expect(readFileSync(join(cwd, "logs/issues.txt"), "utf8").split("\n")).toEqual([
      "APP.ACCOUNT | NOTES | CLOB mapped to VARCHAR (possible size loss) | CLOB(1M)",
      "APP.BROKEN | conversion_error | no CREATE TABLE statement found | ext/APP__BROKEN.sql",
      "",
    ]);
    expect(existsSync(join(cwd, "conv/APP__BROKEN.sql"))).toBe(false);
  });

  it("logs a file it cannot read and converts the rest", () => {
    writeFixture(cwd, "ext/APP__ACCOUNT.sql", ACCOUNT);
    writeFixture(cwd, "ext/APP__LOCKED.sql", "CREATE TABLE APP.LOCKED (ID INTEGER);\n");

    const summary = runConvert(
      {
        ...OPTIONS,
        cwd,
        read: failingReader("ext/APP__LOCKED.sql", "EACCES: permission denied"),
      },
      recordingLogger(),
    );

    expect(summary.exitCode).toBe(ExitCode.Success);
    expect(summary.failures).toEqual([
      { file: "ext/APP__LOCKED.sql", stage: "read", message: "EACCES: permission denied" },
    ]);
    expect(readFileSync(join(cwd, "logs/issues.txt"), "utf8").split("\n")).toEqual([
      "APP.ACCOUNT | NOTES | CLOB mapped to VARCHAR (possible size loss) | CLOB(1M)",
      "parse_error | file_read | EACCES: permission denied | ext/APP__LOCKED.sql",
      "",
    ]);
    expect(existsSync(join(cwd, "conv/APP__ACCOUNT.sql"))).toBe(true);
    expect(existsSync(join(cwd, "conv/APP__LOCKED.sql"))).toBe(false);
  });

  it("exits with 3 and still writes the issues log when nothing converts", () => {
    writeFixture(cwd, "ext/APP__BROKEN.sql", "not a table\n");
    const logger = recordingLogger();

    const summary = runConvert({ ...OPTIONS, cwd }, logger);

    expect(summary.exitCode).toBe(ExitCode.NothingConverted);
    expect(logger.lines.at(-1)).toBe("ERROR: No tables were successfully converted");
    expect(readFileSync(join(cwd, "logs/issues.txt"), "utf8")).toBe(
      "APP.BROKEN | conversion_error | no CREATE TABLE statement found | ext/APP__BROKEN.sql\n",
    );
  });

  it("truncates the issues log from an earlier run", () => {
    writeFixture(cwd, "ext/APP__PLAIN.sql", "CREATE TABLE APP.PLAIN (ID INTEGER);\n");
    writeFixture(cwd, "logs/issues.txt", "OLD.TABLE | X | stale | entry\n");

    runConvert({ ...OPTIONS, cwd }, recordingLogger());

    expect(readFileSync(join(cwd, "logs/issues.txt"), "utf8")).toBe("");
  });

  it("exits with 2 when the input directory is missing", () => {
    const summary = runConvert({ ...OPTIONS, cwd }, recordingLogger());

    expect(summary.exitCode).toBe(ExitCode.NoInput);
    expect(existsSync(join(cwd, "logs/issues.txt"))).toBe(false);
  });

  it("exits with 2 when there are no .sql files", () => {
    writeFixture(cwd, "ext/notes.txt", "CREATE TABLE APP.T (ID INT);\n");

    const summary = runConvert({ ...OPTIONS, cwd }, recordingLogger());

    expect(summary.exitCode).toBe(ExitCode.NoInput);
  });
});
