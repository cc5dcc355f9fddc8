export { DocumentIndex } from "./document-index.js";
export type { LinkedElement } from "./document-index.js";
