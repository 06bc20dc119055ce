import { DOMParser, type Document, type Element, type Node } from "@xmldom/xmldom";
import type { SourceNode } from "./model";
import type { Database } from "./database";
import { isTagSqlError, malformedInputError } from "./errors";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

function toSourceNode(element: Element): SourceNode {
  const attributes: Record<string, string> = {};
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    if (!attr) continue;
    const name = attr.name.toLowerCase();
    // Namespace declarations are not data.
    if (name === "xmlns" || name.startsWith("xmlns:")) continue;
    attributes[name] = attr.value;
  }

  // Only the text ahead of the first child element is the element's value.
  let text = "";
  let leading = true;
  const children: SourceNode[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (!child) continue;
    if (isElement(child)) {
      leading = false;
      children.push(toSourceNode(child));
    } else if (leading && isText(child)) {
      text += child.nodeValue ?? "";
    }
  }

  return {
    tag: element.tagName.toLowerCase(),
    attributes,
    ...(text.trim() !== "" ? { text } : {}),
    children,
  };
}

function assertNothingAfterRoot(doc: Document, root: Element): void {
  let afterRoot = false;
  for (let i = 0; i < doc.childNodes.length; i++) {
    const node = doc.childNodes.item(i);
    if (!node) continue;
    if (node === root) {
      afterRoot = true;
    } else if (afterRoot && (isElement(node) || (isText(node) && (node.nodeValue ?? "").trim() !== ""))) {
      throw malformedInputError("content after the root element");
    }
  }
}

/**
 * Parse an XML document into a SourceNode tree rooted at the document
 * element. Every parser report, warnings included, is fatal.
 */
export function parseXmlSource(xml: string): SourceNode {
  if (xml.trim() === "") {
    throw malformedInputError("the document is empty");
  }

  const parser = new DOMParser({
    onError: (_level, message) => {
      throw malformedInputError(message.trim());
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, "text/xml");
  } catch (err) {
    if (isTagSqlError(err)) throw err;
    throw malformedInputError(err instanceof Error ? err.message : String(err), err);
  }

  const root = doc.documentElement;
  if (!root) {
    throw malformedInputError("no root element");
  }
  assertNothingAfterRoot(doc, root);
  return toSourceNode(root);
}

function walkNode(node: SourceNode, db: Database): void {
  db.table(node.tag);
  for (const [column, literal] of Object.entries(node.attributes)) {
    db.observeAttribute(node.tag, column, literal);
  }
  if (node.text !== undefined) {
    db.observeValue(node.tag, node.text);
  }

  const counts = new Map<string, number>();
  for (const child of node.children) {
    counts.set(child.tag, (counts.get(child.tag) ?? 0) + 1);
    walkNode(child, db);
  }
  db.observeChildOccurrences(node.tag, counts);
}

/** Feed every element below the document root into `db`, depth first. */
export function walkSource(root: SourceNode, db: Database): void {
  for (const child of root.children) {
    walkNode(child, db);
  }
}
