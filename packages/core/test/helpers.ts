import type { Database } from "../src/database";
import { TagSqlError, type TagSqlErrorCode } from "../src/errors";

/** Runs `fn` and returns the TagSqlError it throws; fails otherwise. */
export function catchTagSqlError(fn: () => unknown): TagSqlError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TagSqlError) return err;
    throw err;
  }
  throw new Error("expected a TagSqlError to be thrown");
}

export function errorCodeOf(fn: () => unknown): TagSqlErrorCode {
  return catchTagSqlError(fn).code;
}

/** Plain-data view of every table, for comparing schemas across runs. */
export function schemaOf(db: Database) {
  return db.tables().map((table) => ({
    name: table.name,
    foreignKeys: Array.from(table.foreignKeys),
    columns: Array.from(table.columns),
    value: table.value,
  }));
}
