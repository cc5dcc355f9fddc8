export { parseXmlTree, decodeInput } from "./tree.js";
export type { XmlElement } from "./tree.js";
export { buildXml, XML_DECLARATION } from "./emit.js";
export type { OutElement } from "./emit.js";
