import type { InferenceOptions, RelationGraph } from "./model";
import { isStorable } from "./dataTypes";
import { notFinalizedError, schemaNotSubsetError } from "./errors";
import { Table, foreignKeyName } from "./table";

export type DatabaseOptions = Pick<InferenceOptions, "finalization" | "skipColumns">;

const DEFAULT_OPTIONS: DatabaseOptions = {
  finalization: { kind: "default" },
  skipColumns: false,
};

/**
 * Schema index: owns every Table by name, in discovery order, and turns the
 * accumulated child counts into foreign keys once the document is walked.
 */
export class Database {
  private readonly entries = new Map<string, Table>();
  private readonly options: DatabaseOptions;
  private relations: Map<string, Set<string>> | undefined;

  constructor(options: Partial<DatabaseOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Returns the named table, creating it on first reference. */
  table(name: string): Table {
    let table = this.entries.get(name);
    if (!table) {
      table = new Table(name);
      this.entries.set(name, table);
    }
    return table;
  }

  get(name: string): Table | undefined {
    return this.entries.get(name);
  }

  tables(): Table[] {
    return Array.from(this.entries.values());
  }

  tableNames(): string[] {
    return Array.from(this.entries.keys());
  }

  observeAttribute(name: string, column: string, literal: string): void {
    if (this.options.skipColumns) return;
    this.table(name).observeAttribute(column, literal);
  }

  observeValue(name: string, literal: string): void {
    this.table(name).observeValue(literal);
  }

  observeChildOccurrences(name: string, counts: ReadonlyMap<string, number>): void {
    const table = this.table(name);
    for (const [child, count] of counts) {
      table.observeChildOccurrence(child, count);
    }
  }

  /**
   * Convert child counts into foreign keys according to the finalization
   * mode and rebuild the relation graph. Previous keys are discarded first,
   * so calling it again on unchanged input yields the same schema.
   */
  flush(): void {
    const relations = new Map<string, Set<string>>();
    for (const table of this.entries.values()) {
      table.clearForeignKeys();
      relations.set(table.name, new Set());
    }

    const link = (holder: Table, referenced: string, column: string): void => {
      holder.addForeignKey(column, referenced);
      let targets = relations.get(holder.name);
      if (!targets) {
        targets = new Set();
        relations.set(holder.name, targets);
      }
      targets.add(referenced);
    };

    const mode = this.options.finalization;
    for (const parent of this.tables()) {
      for (const [childName, count] of parent.childCounts) {
        const child = this.table(childName);
        const inverted =
          mode.kind === "duplicate-keys" ||
          (mode.kind === "max-columns" && count > mode.threshold);

        if (inverted) {
          link(child, parent.name, foreignKeyName(parent.name));
        } else if (count === 1) {
          link(parent, child.name, foreignKeyName(child.name));
        } else {
          for (let n = 1; n <= count; n++) {
            link(parent, child.name, foreignKeyName(`${child.name}${n}`));
          }
        }
      }
    }

    this.relations = relations;
  }

  relationGraph(): RelationGraph {
    if (!this.relations) throw notFinalizedError();
    return this.relations;
  }

  /**
   * Whether every table, column and value type of `candidate` can be stored
   * in the matching slot of this schema.
   */
  isSubset(candidate: Database): boolean {
    return this.findSubsetViolation(candidate) === null;
  }

  assertSubset(candidate: Database): void {
    const violation = this.findSubsetViolation(candidate);
    if (violation !== null) throw schemaNotSubsetError(violation);
  }

  private findSubsetViolation(candidate: Database): string | null {
    for (const other of candidate.tables()) {
      const own = this.entries.get(other.name);
      if (!own) return `table "${other.name}" is missing`;

      for (const [column, type] of other.columns) {
        const target = own.columns.get(column);
        if (target === undefined) {
          return `column "${other.name}.${column}" is missing`;
        }
        if (!isStorable(target, type)) {
          return `column "${other.name}.${column}" of type ${type} does not fit ${target}`;
        }
      }

      if (other.value !== undefined) {
        if (own.value === undefined) {
          return `table "${other.name}" has no value column`;
        }
        if (!isStorable(own.value, other.value)) {
          return `value of "${other.name}" of type ${other.value} does not fit ${own.value}`;
        }
      }
    }
    return null;
  }
}
