/**
 * Element tree → XML text, via fast-xml-parser's builder in ordered mode.
 * Values are escaped here; the builder writes them as given.
 */

import { XMLBuilder } from "fast-xml-parser";

/** An element to be written; attributes are emitted in array order */
export interface OutElement {
  name: string;
  attributes: [name: string, value: string][];
  children: OutElement[];
  text?: string;
  /** Written as a CDATA section before any text or children */
  cdata?: string;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

type OrderedNode = Record<string, unknown>;

const ATTRIBUTE_ESCAPES = new Map([
  ["&", "&amp;"],
  ["<", "&lt;"],
  [">", "&gt;"],
  ['"', "&quot;"],
  ["\t", "&#9;"],
  ["\n", "&#10;"],
  ["\r", "&#13;"],
]);

const TEXT_ESCAPES = new Map([
  ["&", "&amp;"],
  ["<", "&lt;"],
  [">", "&gt;"],
  ["\r", "&#13;"],
]);

/** Escape an attribute value so whitespace characters survive normalization on read */
function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\t\n\r]/g, (char) => ATTRIBUTE_ESCAPES.get(char) ?? char);
}

function escapeText(value: string): string {
  return value.replace(/[&<>\r]/g, (char) => TEXT_ESCAPES.get(char) ?? char);
}

function toOrdered(element: OutElement): OrderedNode {
  const children: OrderedNode[] = [];
  if (element.cdata !== undefined) children.push({ "#cdata": [{ "#text": element.cdata }] });
  if (element.text !== undefined && element.text !== "") children.push({ "#text": escapeText(element.text) });
  for (const child of element.children) children.push(toOrdered(child));

  const node: OrderedNode = { [element.name]: children };
  if (element.attributes.length > 0) {
    const attributes: Record<string, string> = {};
    for (const [name, value] of element.attributes) attributes[`@_${name}`] = escapeAttribute(value);
    node[":@"] = attributes;
  }
  return node;
}

/**
 * Serialize `root` as a complete document with an XML declaration.
 * An empty `indent` writes everything after the declaration on one line.
 */
export function buildXml(root: OutElement, indent = "  "): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    cdataPropName: "#cdata",
    format: indent.length > 0,
    indentBy: indent,
    suppressEmptyNode: true,
    suppressBooleanAttributes: false,
    processEntities: false,
  });
  const body: string = builder.build([toOrdered(root)]);
  return `${XML_DECLARATION}${body.startsWith("\n") ? "" : "\n"}${body}\n`;
}
