/**
 * XML document → element tree.
 *
 * Wraps fast-xml-parser in ordered mode and reshapes its output into a
 * small typed tree: element name, document path, attributes in source
 * order, child elements, and the element's text. Whitespace-only text
 * between elements is dropped; CDATA content is kept verbatim.
 *
 * Entity and character references are resolved here rather than by the
 * parser, which caps the number of expansions per document and leaves
 * numeric references as they are.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ReadError } from "../errors.js";
import { isXmlText } from "../values/index.js";

export interface XmlElement {
  name: string;
  /** Path from the root with sibling indices, e.g. `OpenDRIVE/road[3]/lanes` */
  path: string;
  /** Attribute name → raw value, in document order */
  attributes: Map<string, string>;
  children: XmlElement[];
  /** Trimmed text content and CDATA content, concatenated in order */
  text: string;
}

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";
const CDATA_KEY = "#cdata";

function createParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: false,
    cdataPropName: CDATA_KEY,
    ignoreDeclaration: true,
    ignorePiTags: true,
    processEntities: false,
    htmlEntities: false,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(message: string, line?: number, column?: number, path = ""): ReadError {
  return new ReadError("MalformedXml", message, { path, line, column });
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

const PREDEFINED_ENTITIES = new Map([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
]);

const REFERENCE = /&(#x[0-9A-Fa-f]+|#[0-9]+|[A-Za-z_][A-Za-z0-9._-]*);/g;

function decodeReference(reference: string, body: string, path: string): string {
  if (!body.startsWith("#")) {
    const value = PREDEFINED_ENTITIES.get(body);
    if (value === undefined) throw malformed(`Undeclared entity ${reference}`, undefined, undefined, path);
    return value;
  }
  const codePoint = body.startsWith("#x") ? Number.parseInt(body.slice(2), 16) : Number.parseInt(body.slice(1), 10);
  const char = codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : "";
  if (char === "" || !isXmlText(char)) {
    throw malformed(`Character reference ${reference} is not a legal XML character`, undefined, undefined, path);
  }
  return char;
}

/** Resolve the predefined entities and numeric character references in `raw` */
function decodeReferences(raw: string, path: string): string {
  if (!raw.includes("&")) return raw;
  return raw.replace(REFERENCE, (reference: string, body: string) => decodeReference(reference, body, path));
}

/** Attribute-value normalization: literal line breaks and tabs become spaces */
function normalizeAttribute(raw: string): string {
  return raw.replace(/\r\n|[\t\n\r]/g, " ");
}

/** Decode input bytes as UTF-8; a string is used as is (minus a byte-order mark) */
export function decodeInput(input: string | Uint8Array): string {
  if (typeof input === "string") {
    return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(input);
  } catch (err) {
    throw malformed(`Input is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Parse an XML document and return its root element.
 *
 * @throws ReadError (MalformedXml) on any well-formedness violation
 */
export function parseXmlTree(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml, { allowBooleanAttributes: false });
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw malformed(msg, line, col);
  }

  let nodes: unknown;
  try {
    nodes = createParser().parse(xml);
  } catch (err) {
    throw malformed(err instanceof Error ? err.message : String(err));
  }

  const roots = toElements(nodes, "");
  const root = roots.elements[0];
  if (root === undefined) throw malformed("Document has no root element");
  if (roots.elements.length > 1) throw malformed("Document has more than one root element");
  return root;
}

// ---------------------------------------------------------------------------
// Reshaping
// ---------------------------------------------------------------------------

interface Content {
  elements: XmlElement[];
  text: string;
}

function toElements(nodes: unknown, parentPath: string): Content {
  const elements: XmlElement[] = [];
  const textParts: string[] = [];
  const siblingCounts = new Map<string, number>();
  if (!Array.isArray(nodes)) return { elements, text: "" };

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
    if (name === undefined) continue;
    const body = node[name];

    if (name === TEXT_KEY) {
      const text = String(body).replace(/\r\n?/g, "\n").trim();
      if (text !== "") textParts.push(decodeReferences(text, parentPath));
      continue;
    }
    if (name === CDATA_KEY) {
      textParts.push(cdataText(body));
      continue;
    }

    const index = siblingCounts.get(name) ?? 0;
    siblingCounts.set(name, index + 1);
    const path = parentPath === "" ? name : `${parentPath}/${name}[${index}]`;
    const content = toElements(body, path);
    elements.push({
      name,
      path,
      attributes: toAttributes(node[ATTRIBUTES_KEY], path),
      children: content.elements,
      text: content.text,
    });
  }
  return { elements, text: textParts.join("") };
}

function cdataText(body: unknown): string {
  if (!Array.isArray(body)) return "";
  return body
    .map((part: unknown) => (isRecord(part) && part[TEXT_KEY] !== undefined ? String(part[TEXT_KEY]) : ""))
    .join("");
}

function toAttributes(raw: unknown, path: string): Map<string, string> {
  const attributes = new Map<string, string>();
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes.set(name, decodeReferences(normalizeAttribute(String(value)), path));
  }
  return attributes;
}
