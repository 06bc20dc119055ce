import type { DataType } from "./model";
import { mergeDataType } from "./dataTypes";
import { namingCollisionError } from "./errors";

/** Attribute name that feeds the text-content column instead of its own. */
export const VALUE_COLUMN = "value";

export function primaryKeyName(table: string): string {
  return `prk_${table}_id`;
}

export function foreignKeyName(referenced: string): string {
  return `${referenced}_id`;
}

/**
 * Accumulated shape of one entity. Everything here only grows: column types
 * widen, child counts keep their maximum, foreign keys are appended by
 * Database.flush().
 */
export class Table {
  readonly name: string;
  readonly primaryKey: string;
  private readonly columnTypes = new Map<string, DataType>();
  private readonly children = new Map<string, number>();
  private readonly keys = new Map<string, string>();
  private valueType: DataType | undefined;

  constructor(name: string) {
    this.name = name;
    this.primaryKey = primaryKeyName(name);
  }

  get columns(): ReadonlyMap<string, DataType> {
    return this.columnTypes;
  }

  get value(): DataType | undefined {
    return this.valueType;
  }

  get childCounts(): ReadonlyMap<string, number> {
    return this.children;
  }

  /** Foreign key column -> referenced table, in insertion order. */
  get foreignKeys(): ReadonlyMap<string, string> {
    return this.keys;
  }

  observeAttribute(column: string, literal: string): void {
    const name = column.toLowerCase();
    if (name === VALUE_COLUMN) {
      this.observeValue(literal);
      return;
    }
    if (name === this.primaryKey) {
      throw namingCollisionError(this.name, name, "the generated primary key");
    }

    this.columnTypes.set(name, mergeDataType(this.columnTypes.get(name), literal, "attribute"));
  }

  observeValue(literal: string): void {
    this.valueType = mergeDataType(this.valueType, literal, "value");
  }

  observeChildOccurrence(childTag: string, count: number): void {
    this.children.set(childTag, Math.max(this.children.get(childTag) ?? 0, count));
  }

  addForeignKey(column: string, references: string): void {
    if (column === this.primaryKey) {
      throw namingCollisionError(this.name, column, "the generated primary key");
    }
    if (this.columnTypes.has(column)) {
      throw namingCollisionError(this.name, column, "an attribute column");
    }

    const existing = this.keys.get(column);
    if (existing !== undefined && existing !== references) {
      throw namingCollisionError(this.name, column, `the foreign key to "${existing}"`);
    }
    this.keys.set(column, references);
  }

  clearForeignKeys(): void {
    this.keys.clear();
  }
}
