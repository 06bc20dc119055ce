import type { DataType, LiteralContext } from "./model";

// Ordered by representational width; each type can store every narrower one.
export const DATA_TYPE_ORDER: readonly DataType[] = [
  "BIT",
  "INT",
  "FLOAT",
  "NVARCHAR",
  "NTEXT",
];

const RANK: Record<DataType, number> = {
  BIT: 0,
  INT: 1,
  FLOAT: 2,
  NVARCHAR: 3,
  NTEXT: 4,
};

// Evaluated in order; the first match wins.
const LITERAL_PATTERNS: readonly { pattern: RegExp; type: DataType }[] = [
  { pattern: /^(?:|0|1|True|False)$/, type: "BIT" },
  { pattern: /^[0-9]+$/, type: "INT" },
  { pattern: /^[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?$/, type: "FLOAT" },
];

export function classifyLiteral(literal: string, context: LiteralContext): DataType {
  for (const { pattern, type } of LITERAL_PATTERNS) {
    if (pattern.test(literal)) return type;
  }
  return context === "value" ? "NTEXT" : "NVARCHAR";
}

/** Negative when `a` is narrower than `b`, zero when equal. */
export function compareDataTypes(a: DataType, b: DataType): number {
  return RANK[a] - RANK[b];
}

export function widerDataType(a: DataType, b: DataType): DataType {
  return compareDataTypes(a, b) >= 0 ? a : b;
}

/**
 * Widen `previous` so it can also hold `literal`. Never narrows; an
 * attribute literal tops out at NVARCHAR.
 */
export function mergeDataType(
  previous: DataType | undefined,
  literal: string,
  context: LiteralContext,
): DataType {
  const observed = classifyLiteral(literal, context);
  return previous === undefined ? observed : widerDataType(previous, observed);
}

/** True when a `candidate` column fits into a `target` column. */
export function isStorable(target: DataType, candidate: DataType): boolean {
  if (target === "NTEXT") return true;
  return compareDataTypes(candidate, target) <= 0;
}
