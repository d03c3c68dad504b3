import { describe, expect, it } from "vitest";
import {
  extractPrimaryKey,
  findPrimaryKey,
  renderPrimaryKeyStatement,
} from "./primaryKey";

describe("extractPrimaryKey", () => {
  it("reads an inline key marker", () => {
    const statement = [
      "CREATE TABLE APP.ACCOUNT (",
      "  ACCOUNT_ID INTEGER NOT NULL CONSTRAINT PK_ACC PRIMARY KEY,",
      "  NAME VARCHAR(100)",
      ");",
    ].join("\n");

    expect(extractPrimaryKey(statement)).toEqual(["ACCOUNT_ID"]);
  });

  it("reads a table-level key in written order", () => {
    const statement = [
      "CREATE TABLE APP.ORDERS (",
      "  ORDER_ID INTEGER NOT NULL,",
      "  LINE_NO SMALLINT NOT NULL,",
      "  CONSTRAINT PK_ORD PRIMARY KEY ( LINE_NO , ORDER_ID )",
      ");",
    ].join("\n");

    expect(extractPrimaryKey(statement)).toEqual(["LINE_NO", "ORDER_ID"]);
  });

  it("prefers the inline form when both are present", () => {
    const statement = [
      "CREATE TABLE APP.BOTH (",
      "  ID INTEGER NOT NULL PRIMARY KEY,",
      "  CODE CHAR(2) NOT NULL,",
      "  PRIMARY KEY (ID, CODE)",
      ");",
    ].join("\n");

    expect(extractPrimaryKey(statement)).toEqual(["ID"]);
  });

  it("returns an empty list without a key", () => {
    expect(extractPrimaryKey("CREATE TABLE T (A INT, B INT);")).toEqual([]);
    expect(extractPrimaryKey("not a table")).toEqual([]);
  });

  it("ignores the marker inside a default literal", () => {
    const statement = "CREATE TABLE T (A VARCHAR(20) WITH DEFAULT 'PRIMARY KEY');";
    expect(extractPrimaryKey(statement)).toEqual([]);
  });
});

describe("findPrimaryKey", () => {
  it("reports a table-level key shadowed by an inline one", () => {
    expect(
      findPrimaryKey(["ID INTEGER PRIMARY KEY", "PRIMARY KEY (ID, CODE)"]),
    ).toEqual({ columns: ["ID"], form: "inline", shadowed: ["ID", "CODE"] });
  });

  it("reports the form that was found", () => {
    expect(findPrimaryKey(["A INT", "PRIMARY KEY (A)"])).toEqual({
      columns: ["A"],
      form: "table",
    });
    expect(findPrimaryKey(["A INT"])).toEqual({ columns: [], form: "none" });
  });
});

describe("renderPrimaryKeyStatement", () => {
  it("renders a post-creation ALTER TABLE", () => {
    expect(renderPrimaryKeyStatement("APP.ORDERS", ["ORDER_ID", "LINE_NO"])).toBe(
      "ALTER TABLE APP.ORDERS ADD PRIMARY KEY (ORDER_ID, LINE_NO);",
    );
  });
});
