import type { InferenceOptions } from "./model";
import { Database } from "./database";
import { renderDdl, renderHeader, renderRelationReport } from "./render";
import { parseXmlSource, walkSource } from "./xmlSource";

/** Parse `xml` and accumulate its schema. The result is not yet flushed. */
export function inferDatabase(
  xml: string,
  options: Pick<InferenceOptions, "finalization" | "skipColumns">,
): Database {
  const db = new Database({
    finalization: options.finalization,
    skipColumns: options.skipColumns,
  });
  walkSource(parseXmlSource(xml), db);
  return db;
}

/**
 * End-to-end XML → DDL (or relation report) conversion.
 *
 * Deterministic and side-effect free. When `candidateXml` is given, its
 * schema must be storable in the one inferred from `xml`; otherwise nothing
 * is rendered and SCHEMA_NOT_SUBSET is thrown.
 */
export function convertXml(
  xml: string,
  options: InferenceOptions,
  candidateXml?: string,
): string {
  const db = inferDatabase(xml, options);

  if (candidateXml !== undefined) {
    db.assertSubset(inferDatabase(candidateXml, options));
  }

  db.flush();

  const body =
    options.output === "relations"
      ? renderRelationReport(db)
      : renderDdl(db, { annotateRelations: options.annotateRelations });
  return renderHeader(options.header) + body;
}
