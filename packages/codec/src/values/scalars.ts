/**
 * Text forms of scalar attribute values.
 *
 * Numbers are read as decimal literals (optional sign, optional fraction,
 * optional exponent) and written in the shortest form that parses back to
 * the identical double. Nothing here throws: callers turn `undefined` into
 * the error kind that fits their context.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Parse a decimal literal; undefined on malformed text or non-finite magnitude */
export function parseDecimal(raw: string): number | undefined {
  if (!DECIMAL_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function parseInteger(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Shortest round-trip decimal. `String()` already yields the shortest
 * digits that reproduce the double; only negative zero needs care.
 */
export function formatDecimal(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

// ---------------------------------------------------------------------------
// Booleans
// ---------------------------------------------------------------------------

/** xs:boolean lexical space */
export function parseXsdBoolean(raw: string): boolean | undefined {
  switch (raw) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return undefined;
  }
}

/** `t_yesNo`, used by signal and object `dynamic` */
export function parseYesNo(raw: string): boolean | undefined {
  if (raw === "yes") return true;
  if (raw === "no") return false;
  return undefined;
}

export function formatYesNo(value: boolean): string {
  return value ? "yes" : "no";
}

// ---------------------------------------------------------------------------
// Domains
// ---------------------------------------------------------------------------

/** Value ranges the schema places on numeric attributes */
export type NumericDomain = "any" | "nonNegative" | "positive" | "unitInterval";

export function inDomain(value: number, domain: NumericDomain): boolean {
  switch (domain) {
    case "any":
      return true;
    case "nonNegative":
      return value >= 0;
    case "positive":
      return value > 0;
    case "unitInterval":
      return value >= 0 && value <= 1;
  }
}

export function describeDomain(domain: NumericDomain): string {
  switch (domain) {
    case "any":
      return "any finite number";
    case "nonNegative":
      return ">= 0";
    case "positive":
      return "> 0";
    case "unitInterval":
      return "within [0, 1]";
  }
}

// ---------------------------------------------------------------------------
// Identifiers and text
// ---------------------------------------------------------------------------

/** An id reference that could resolve: non-empty, no whitespace */
export function isWellFormedId(raw: string): boolean {
  return /^\S+$/.test(raw);
}

const NON_XML_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** True when every character can appear in an XML 1.0 document */
export function isXmlText(text: string): boolean {
  return !NON_XML_CHAR.test(text);
}
