export type DataType = "BIT" | "INT" | "FLOAT" | "NVARCHAR" | "NTEXT";

/** Where a literal was observed. Only text content may widen to NTEXT. */
export type LiteralContext = "attribute" | "value";

export type RelationType = "1:1" | "1:N" | "N:1" | "N:M";

export interface RelationEdge {
  type: RelationType;
  to: string;
}

/**
 * Parser-independent view of one element of the source document.
 * Tag and attribute names are already lowercased.
 */
export interface SourceNode {
  tag: string;
  attributes: Record<string, string>;
  text?: string;
  children: SourceNode[];
}

export type FinalizationMode =
  | { kind: "default" }
  | { kind: "duplicate-keys" }
  | { kind: "max-columns"; threshold: number };

export type OutputFormat = "ddl" | "relations";

export interface InferenceOptions {
  finalization: FinalizationMode;
  skipColumns: boolean;
  header?: string;
  output: OutputFormat;
  annotateRelations: boolean;
}

/** Holder table name -> names of the tables it references. */
export type RelationGraph = ReadonlyMap<string, ReadonlySet<string>>;
