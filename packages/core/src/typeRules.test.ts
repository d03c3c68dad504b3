import { describe, expect, it } from "vitest";
import { convertDefault, convertType, findTypeRule } from "./typeRules";

describe("convertType", () => {
  it.each([
    ["VARCHAR(100) FOR SBCS DATA", "VARCHAR(100)"],
    ["decimal(18,2)", "NUMBER(18,2)"],
    ["NUMERIC(5)", "NUMBER(5)"],
    ["REAL", "FLOAT"],
    ["DOUBLE", "FLOAT"],
    ["DECFLOAT(34)", "FLOAT"],
    ["BLOB(2G)", "BINARY"],
    ["TIMESTAMP WITH TIME ZONE", "TIMESTAMP_TZ"],
    ["TIMESTAMP(6) WITH TIME ZONE", "TIMESTAMP_TZ(6)"],
    ["TIMESTAMP", "TIMESTAMP_NTZ"],
    ["timestamp(12)", "TIMESTAMP_NTZ(12)"],
  ])("maps %s to %s without a diagnostic", (source, target) => {
    const conversion = convertType(source);
    expect(conversion.type).toBe(target);
    expect(conversion.issue).toBeUndefined();
  });

  it.each(["SMALLINT", "INTEGER", "BIGINT", "CHAR(3)", "VARCHAR(40)", "DATE", "TIME"])(
    "keeps %s as a confirmed passthrough",
    (source) => {
      expect(convertType(source)).toEqual({
        type: source,
        status: "preserved",
        issue: undefined,
      });
    },
  );

  it("maps FOR BIT DATA to BINARY ahead of the character rule", () => {
    expect(convertType("VARCHAR(20) FOR BIT DATA")).toEqual({
      type: "BINARY",
      status: "mapped",
      issue: {
        issue: "mapped to BINARY from FOR BIT DATA",
        snippet: "VARCHAR(20) FOR BIT DATA",
      },
    });
  });

  it("renames graphic types into the VARCHAR family", () => {
    expect(convertType("VARGRAPHIC(50)")).toEqual({
      type: "VARCHAR(50)",
      status: "mapped",
      issue: { issue: "mapped (VAR)GRAPHIC to VARCHAR", snippet: "VARGRAPHIC(50)" },
    });
    expect(convertType("GRAPHIC(10)").type).toBe("VARCHAR(10)");
  });

  it("flags CLOB size loss", () => {
    expect(convertType("CLOB(1M)")).toEqual({
      type: "VARCHAR",
      status: "mapped",
      issue: {
        issue: "CLOB mapped to VARCHAR (possible size loss)",
        snippet: "CLOB(1M)",
      },
    });
  });

  it("flags XML narrowing", () => {
    expect(convertType("xml").issue).toEqual({
      issue: "XML mapped to VARIANT",
      snippet: "XML",
    });
  });

  it("tags unrecognized types for review", () => {
    expect(convertType("rowid")).toEqual({
      type: "ROWID",
      status: "unknown",
      issue: { issue: "unrecognized type passed through unchanged", snippet: "ROWID" },
    });
  });

  it("flags a missing type", () => {
    expect(convertType("  ")).toEqual({
      type: "",
      status: "unknown",
      issue: { issue: "column has no data type", snippet: "" },
    });
  });

  it.each([
    ["VARCHAR(10) CCSID 1208", "VARCHAR(10)"],
    ["CHAR(4) FOR MIXED DATA", "CHAR(4)"],
    ["varchar(30) ccsid unicode", "VARCHAR(30)"],
  ])("strips the encoding annotation from %s", (source, target) => {
    expect(convertType(source)).toEqual({
      type: target,
      status: "preserved",
      issue: undefined,
    });
  });

  it("tags a character type with unrecognized trailing text for review", () => {
    expect(convertType("VARCHAR(10) WITH COMPRESSION")).toEqual({
      type: "VARCHAR(10) WITH COMPRESSION",
      status: "unknown",
      issue: {
        issue: "unrecognized type passed through unchanged",
        snippet: "VARCHAR(10) WITH COMPRESSION",
      },
    });
  });

  it("is a pure function of its input", () => {
    expect(convertType("CLOB(1M)")).toEqual(convertType("CLOB(1M)"));
    expect(convertType(" clob(1m) ")).toEqual(convertType("CLOB(1M)"));
  });
});

describe("findTypeRule", () => {
  it("returns the first matching rule", () => {
    expect(findTypeRule("CHARACTER(5)")?.name).toBe("character");
    expect(findTypeRule("CHAR(5) FOR BIT DATA")?.name).toBe("bit-data");
    expect(findTypeRule("ROWID")).toBeUndefined();
  });
});

describe("convertDefault", () => {
  it("yields no clause without a default", () => {
    expect(convertDefault(undefined)).toEqual({ clause: "" });
    expect(convertDefault("")).toEqual({ clause: "" });
  });

  it("drops a bare placeholder default with one diagnostic", () => {
    expect(convertDefault("with   default")).toEqual({
      clause: "",
      issue: { issue: "ambiguous default removed", snippet: "WITH DEFAULT" },
    });
  });

  it("joins two-word special registers", () => {
    expect(convertDefault("WITH DEFAULT CURRENT TIMESTAMP").clause).toBe(
      "DEFAULT CURRENT_TIMESTAMP",
    );
    expect(convertDefault("WITH DEFAULT current date").clause).toBe(
      "DEFAULT CURRENT_DATE",
    );
    expect(convertDefault("DEFAULT CURRENT TIME").clause).toBe(
      "DEFAULT CURRENT_TIME",
    );
  });

  it("rewrites USER to CURRENT_USER and reports it", () => {
    expect(convertDefault("WITH DEFAULT USER")).toEqual({
      clause: "DEFAULT CURRENT_USER",
      issue: { issue: "USER converted to CURRENT_USER", snippet: "USER" },
    });
  });

  it("only rewrites USER as a whole word outside literals", () => {
    expect(convertDefault("WITH DEFAULT USER_NAME")).toEqual({
      clause: "DEFAULT USER_NAME",
      issue: undefined,
    });
    expect(convertDefault("WITH DEFAULT 'USER'")).toEqual({
      clause: "DEFAULT 'USER'",
      issue: undefined,
    });
    expect(convertDefault("WITH DEFAULT CURRENT USER")).toEqual({
      clause: "DEFAULT CURRENT_USER",
      issue: undefined,
    });
  });

  it("passes other expressions through verbatim", () => {
    expect(convertDefault("WITH DEFAULT 0")).toEqual({
      clause: "DEFAULT 0",
      issue: undefined,
    });
    expect(convertDefault("WITH DEFAULT ''").clause).toBe("DEFAULT ''");
  });
});
