import type { RelationEdge } from "./model";
import type { Database } from "./database";
import { VALUE_COLUMN, type Table } from "./table";
import { classifyAllRelations } from "./relations";

const INDENT = "   ";

export function escapeXml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderHeader(header: string | undefined): string {
  return header === undefined ? "" : `--${header}\n\n`;
}

export function renderCreateTable(table: Table): string {
  const lines = [`${INDENT}${table.primaryKey} INT PRIMARY KEY`];
  for (const column of table.foreignKeys.keys()) {
    lines.push(`${INDENT}${column} INT`);
  }
  for (const [column, type] of table.columns) {
    lines.push(`${INDENT}${column} ${type}`);
  }
  if (table.value !== undefined) {
    lines.push(`${INDENT}${VALUE_COLUMN} ${table.value}`);
  }
  return `CREATE TABLE ${table.name}(\n${lines.join(",\n")}\n);\n\n`;
}

/**
 * DDL for every table in discovery order. Expects a flushed database when
 * `annotateRelations` is set, or whenever foreign keys should appear.
 */
export function renderDdl(db: Database, opts: { annotateRelations?: boolean } = {}): string {
  const relations = opts.annotateRelations ? classifyAllRelations(db) : undefined;

  return db
    .tables()
    .map((table) => {
      const comments = (relations?.get(table.name) ?? [])
        .map((edge) => `-- ${edge.type} ${edge.to}\n`)
        .join("");
      return comments + renderCreateTable(table);
    })
    .join("");
}

function renderRelation(edge: RelationEdge): string {
  return `    <relation to="${escapeXml(edge.to)}" relation_type="${edge.type}" />\n`;
}

export function renderRelationReport(db: Database): string {
  const relations = classifyAllRelations(db);
  const parts = ["<tables>\n"];
  for (const [table, edges] of relations) {
    parts.push(`  <table name="${escapeXml(table)}">\n`);
    parts.push(...edges.map(renderRelation));
    parts.push("  </table>\n");
  }
  parts.push("</tables>\n");
  return parts.join("");
}
