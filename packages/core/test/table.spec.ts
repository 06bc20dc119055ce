import { describe, it, expect } from "vitest";
import { Table, foreignKeyName, primaryKeyName } from "../src/table";
import { catchTagSqlError, errorCodeOf } from "./helpers";

describe("key names", () => {
  it("derives primary and foreign key names", () => {
    expect(primaryKeyName("person")).toBe("prk_person_id");
    expect(foreignKeyName("pet")).toBe("pet_id");
  });
});

describe("Table", () => {
  it("lowercases and merges attribute columns", () => {
    const table = new Table("person");
    table.observeAttribute("Age", "5");
    table.observeAttribute("age", "5.5");
    table.observeAttribute("name", "Al");

    expect(Array.from(table.columns)).toEqual([
      ["age", "FLOAT"],
      ["name", "NVARCHAR"],
    ]);
  });

  it("routes the value attribute to the text column", () => {
    const table = new Table("note");
    table.observeAttribute("value", "12");
    table.observeValue("some words");

    expect(table.columns.size).toBe(0);
    expect(table.value).toBe("NTEXT");
  });

  it("rejects an attribute named like the primary key", () => {
    const table = new Table("person");
    const err = catchTagSqlError(() => table.observeAttribute("PRK_PERSON_ID", "1"));

    expect(err.code).toBe("NAMING_COLLISION");
    expect(err.table).toBe("person");
    expect(err.column).toBe("prk_person_id");
  });

  it("keeps the maximum child occurrence count", () => {
    const table = new Table("person");
    for (const count of [2, 5, 1]) {
      table.observeChildOccurrence("pet", count);
    }
    expect(table.childCounts.get("pet")).toBe(5);
  });

  it("rejects a foreign key that shadows an attribute column", () => {
    const table = new Table("person");
    table.observeAttribute("pet_id", "3");

    expect(errorCodeOf(() => table.addForeignKey("pet_id", "pet"))).toBe("NAMING_COLLISION");
  });

  it("accepts the same foreign key twice but not for another table", () => {
    const table = new Table("person");
    table.addForeignKey("pet1_id", "pet");
    table.addForeignKey("pet1_id", "pet");
    expect(Array.from(table.foreignKeys)).toEqual([["pet1_id", "pet"]]);

    expect(errorCodeOf(() => table.addForeignKey("pet1_id", "pet1"))).toBe("NAMING_COLLISION");
  });
});
