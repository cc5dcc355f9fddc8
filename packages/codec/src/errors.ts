/**
 * Error taxonomy of the codec.
 *
 * Document defects (reader), evaluation outside a segment (geometry) and
 * unwritable values (writer) are recoverable and carry enough context to
 * locate the problem. Caller bugs are a separate class so they can be told
 * apart from bad input.
 */

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export const READ_ERROR_KINDS = [
  "MalformedXml",
  "MissingRequiredField",
  "InvalidEnumValue",
  "MalformedNumber",
  "ValueOutOfDomain",
  "UnresolvedReference",
  "UnsupportedVersion",
  "StructuralViolation",
] as const;
export type ReadErrorKind = (typeof READ_ERROR_KINDS)[number];

export const WRITE_ERROR_KINDS = ["NonFiniteNumber", "UnrepresentableValue"] as const;
export type WriteErrorKind = (typeof WRITE_ERROR_KINDS)[number];

export type GeometryErrorKind = "OffsetOutOfRange";

export type ProgrammingErrorKind = "InvalidGeometry";

export type CodecErrorKind = ReadErrorKind | WriteErrorKind | GeometryErrorKind | ProgrammingErrorKind;

/** Per-element structural rules checked after an element is read */
export const STRUCTURAL_RULES = [
  "duplicate-lane-id",
  "geometry-start",
  "geometry-gap",
  "geometry-overlap",
  "geometry-length-mismatch",
  "unordered-offsets",
  "mixed-width-border",
  "lane-section-range",
] as const;
export type StructuralRule = (typeof STRUCTURAL_RULES)[number];

/** Where in the document an error was found */
export interface ErrorContext {
  /** Element path, e.g. `OpenDRIVE/road[0]/planView/geometry[1]` */
  path: string;
  /** Attribute or child element name */
  field?: string;
  /** The offending text as it appeared in the source */
  rawText?: string;
  line?: number;
  column?: number;
}

// ---------------------------------------------------------------------------
// Classes
// ---------------------------------------------------------------------------

export class CodecError extends Error {
  readonly kind: CodecErrorKind;
  readonly context: ErrorContext;

  constructor(kind: CodecErrorKind, message: string, context: ErrorContext) {
    super(message);
    this.name = "CodecError";
    this.kind = kind;
    this.context = context;
    Object.setPrototypeOf(this, CodecError.prototype);
  }
}

export class ReadError extends CodecError {
  declare readonly kind: ReadErrorKind;
  readonly rule?: StructuralRule;

  constructor(kind: ReadErrorKind, message: string, context: ErrorContext, rule?: StructuralRule) {
    super(kind, message, context);
    this.name = "ReadError";
    this.rule = rule;
    Object.setPrototypeOf(this, ReadError.prototype);
  }
}

export class WriteError extends CodecError {
  declare readonly kind: WriteErrorKind;

  constructor(kind: WriteErrorKind, message: string, context: ErrorContext) {
    super(kind, message, context);
    this.name = "WriteError";
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

export class GeometryError extends CodecError {
  declare readonly kind: GeometryErrorKind;

  constructor(message: string, context: ErrorContext) {
    super("OffsetOutOfRange", message, context);
    this.name = "GeometryError";
    Object.setPrototypeOf(this, GeometryError.prototype);
  }
}

/** Raised for invalid calls, not for invalid documents */
export class ProgrammingError extends CodecError {
  declare readonly kind: ProgrammingErrorKind;

  constructor(kind: ProgrammingErrorKind, message: string, context: ErrorContext) {
    super(kind, message, context);
    this.name = "ProgrammingError";
    Object.setPrototypeOf(this, ProgrammingError.prototype);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isReadError(err: unknown): err is ReadError {
  return err instanceof ReadError;
}

/** One-line rendering for logs: `[Kind] message (at path, field "x", raw "y")` */
export function describeError(err: CodecError): string {
  const { path, field, rawText, line, column } = err.context;
  const parts = [`at ${path || "(document)"}`];
  if (field !== undefined) parts.push(`field "${field}"`);
  if (rawText !== undefined) parts.push(`raw "${rawText}"`);
  if (line !== undefined) parts.push(`line ${line}${column !== undefined ? `:${column}` : ""}`);
  return `[${err.kind}] ${err.message} (${parts.join(", ")})`;
}
