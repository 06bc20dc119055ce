/**
 * Error system: every failure is a TagSqlError carrying a stable code and a
 * fix hint. All of them are fatal for the run that raised them.
 */

export type TagSqlErrorCode =
  | "NAMING_COLLISION"
  | "SCHEMA_NOT_SUBSET"
  | "MALFORMED_INPUT"
  | "CONFIGURATION_CONFLICT"
  | "INVALID_CONFIGURATION"
  | "NOT_FINALIZED"
  | "IO_ERROR";

export class TagSqlError extends Error {
  readonly code: TagSqlErrorCode;
  readonly fix: string;
  readonly table?: string;
  readonly column?: string;
  readonly originalError: unknown;

  constructor(opts: {
    code: TagSqlErrorCode;
    message: string;
    fix: string;
    table?: string;
    column?: string;
    originalError?: unknown;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = "TagSqlError";
    this.code = opts.code;
    this.fix = opts.fix;
    this.table = opts.table;
    this.column = opts.column;
    this.originalError = opts.originalError;
  }
}

export const EXIT_CODES: Record<TagSqlErrorCode, number> = {
  CONFIGURATION_CONFLICT: 1,
  INVALID_CONFIGURATION: 1,
  MALFORMED_INPUT: 2,
  IO_ERROR: 2,
  NAMING_COLLISION: 90,
  SCHEMA_NOT_SUBSET: 91,
  NOT_FINALIZED: 1,
};

export function isTagSqlError(err: unknown): err is TagSqlError {
  return err instanceof TagSqlError;
}

// ─── Factories ───────────────────────────────────────────────────────────────

export function namingCollisionError(
  table: string,
  column: string,
  reason: string,
): TagSqlError {
  return new TagSqlError({
    code: "NAMING_COLLISION",
    message: `Column "${column}" collides with ${reason} in table "${table}".`,
    fix: `Rename the attribute or child element so that "${column}" is unique within "${table}".`,
    table,
    column,
  });
}

export function schemaNotSubsetError(detail: string): TagSqlError {
  return new TagSqlError({
    code: "SCHEMA_NOT_SUBSET",
    message: `Validated document is not storable in the inferred schema: ${detail}.`,
    fix: "Widen the source document so it covers every table, column and value of the validated document.",
  });
}

export function malformedInputError(detail: string, originalError?: unknown): TagSqlError {
  return new TagSqlError({
    code: "MALFORMED_INPUT",
    message: `Input is not a well-formed XML document: ${detail}.`,
    fix: "Check the document for unclosed tags, bad attribute quoting or a missing root element.",
    originalError,
  });
}

export function configurationConflictError(first: string, second: string): TagSqlError {
  return new TagSqlError({
    code: "CONFIGURATION_CONFLICT",
    message: `Options "${first}" and "${second}" cannot be used together.`,
    fix: `Drop either "${first}" or "${second}".`,
  });
}

export function invalidConfigurationError(detail: string, originalError?: unknown): TagSqlError {
  return new TagSqlError({
    code: "INVALID_CONFIGURATION",
    message: `Invalid configuration: ${detail}.`,
    fix: "Check option names and value types against `tagsql --help`.",
    originalError,
  });
}

export function notFinalizedError(): TagSqlError {
  return new TagSqlError({
    code: "NOT_FINALIZED",
    message: "Relations were requested before the schema was finalized.",
    fix: "Call db.flush() once the whole document has been walked.",
  });
}

export function ioError(path: string, originalError: unknown): TagSqlError {
  const detail = originalError instanceof Error ? originalError.message : String(originalError);
  return new TagSqlError({
    code: "IO_ERROR",
    message: `Cannot access "${path}": ${detail}.`,
    fix: "Check that the path exists and is readable (or writable for --output).",
    originalError,
  });
}
