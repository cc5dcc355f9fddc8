/**
 * Per-element reading helpers.
 *
 * An ElementReader wraps one XML element and hands out typed attribute
 * values, turning every malformed or missing value into a ReadError that
 * points at the element path and field. Attributes and children nobody
 * asked for end up as non-fatal diagnostics.
 */

import type { AdditionalData, Angle, Curvature, Length } from "@opendrive-codec/types";
import { isVocabularyToken, meters, perMeter, radians } from "@opendrive-codec/types";
import { ReadError } from "../errors.js";
import type { XmlElement } from "../xml/index.js";
import {
  describeDomain,
  inDomain,
  isWellFormedId,
  parseDecimal,
  parseInteger,
  parseXsdBoolean,
  parseYesNo,
} from "../values/index.js";
import type { NumericDomain } from "../values/index.js";
import type { WorkaroundConfig } from "../workarounds.js";
import { ADDITIONAL_DATA_ELEMENTS, readAdditionalDataElement } from "./additional-data.js";

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type DiagnosticKind = "UnknownElement" | "UnknownAttribute" | "UnexpectedText" | "DuplicateElement";

/** Something the reader skipped without failing */
export interface ReadDiagnostic {
  kind: DiagnosticKind;
  /** Path of the element the diagnostic is about */
  path: string;
  /** Name of the skipped element or attribute */
  name: string;
  message: string;
}

/** State shared by all readers of one document */
export interface ReadContext {
  readonly workarounds: WorkaroundConfig;
  readonly diagnostics: ReadDiagnostic[];
}

export type ChildHandlers = Record<string, (child: ElementReader) => void>;

export interface ChildOptions {
  /** Children that may appear at most once; repeats are skipped with a diagnostic */
  single?: readonly string[];
  /** Collect userData / include / dataQuality children */
  additionalData?: boolean;
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export class ElementReader {
  private readonly consumed = new Set<string>();
  private textConsumed = false;

  constructor(
    readonly element: XmlElement,
    readonly context: ReadContext,
  ) {}

  get path(): string {
    return this.element.path;
  }

  get workarounds(): WorkaroundConfig {
    return this.context.workarounds;
  }

  has(field: string): boolean {
    return this.element.attributes.has(field);
  }

  private raw(field: string): string | undefined {
    this.consumed.add(field);
    return this.element.attributes.get(field);
  }

  missing(field: string): ReadError {
    return new ReadError("MissingRequiredField", `<${this.element.name}> requires "${field}"`, {
      path: this.path,
      field,
    });
  }

  // ─── Strings ──────────────────────────────────────────────────────────────

  string(field: string): string {
    const raw = this.raw(field);
    if (raw === undefined) throw this.missing(field);
    return raw;
  }

  optionalString(field: string): string | undefined {
    return this.raw(field);
  }

  /** Text content of the element */
  text(): string {
    this.textConsumed = true;
    return this.element.text;
  }

  /** An id that refers to another element; must be non-empty without whitespace */
  reference(field: string): string {
    return this.checkReference(field, this.string(field));
  }

  optionalReference(field: string): string | undefined {
    const raw = this.raw(field);
    return raw === undefined ? undefined : this.checkReference(field, raw);
  }

  private checkReference(field: string, raw: string): string {
    if (!isWellFormedId(raw)) {
      throw new ReadError("UnresolvedReference", `"${field}" is not a well-formed id`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return raw;
  }

  // ─── Numbers ──────────────────────────────────────────────────────────────

  decimal(field: string, domain: NumericDomain = "any"): number {
    const value = this.optionalDecimal(field, domain);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  optionalDecimal(field: string, domain: NumericDomain = "any"): number | undefined {
    const raw = this.raw(field);
    if (raw === undefined) return undefined;
    const value = parseDecimal(raw);
    if (value === undefined) {
      throw new ReadError("MalformedNumber", `"${field}" is not a decimal number`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    if (!inDomain(value, domain)) {
      throw new ReadError("ValueOutOfDomain", `"${field}" must be ${describeDomain(domain)}`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return value;
  }

  integer(field: string): number {
    const value = this.optionalInteger(field);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  optionalInteger(field: string, domain: NumericDomain = "any"): number | undefined {
    const raw = this.raw(field);
    if (raw === undefined) return undefined;
    const value = parseInteger(raw);
    if (value === undefined) {
      throw new ReadError("MalformedNumber", `"${field}" is not an integer`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    if (!inDomain(value, domain)) {
      throw new ReadError("ValueOutOfDomain", `"${field}" must be ${describeDomain(domain)}`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return value;
  }

  length(field: string, domain: NumericDomain = "any"): Length {
    return meters(this.decimal(field, domain));
  }

  optionalLength(field: string, domain: NumericDomain = "any"): Length | undefined {
    const value = this.optionalDecimal(field, domain);
    return value === undefined ? undefined : meters(value);
  }

  angle(field: string): Angle {
    return radians(this.decimal(field));
  }

  optionalAngle(field: string): Angle | undefined {
    const value = this.optionalDecimal(field);
    return value === undefined ? undefined : radians(value);
  }

  curvature(field: string): Curvature {
    return perMeter(this.decimal(field));
  }

  // ─── Enumerations & booleans ──────────────────────────────────────────────

  enumeration<const T extends readonly string[]>(field: string, vocabulary: T): T[number] {
    const value = this.optionalEnumeration(field, vocabulary);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  optionalEnumeration<const T extends readonly string[]>(field: string, vocabulary: T): T[number] | undefined {
    const raw = this.raw(field);
    if (raw === undefined) return undefined;
    if (!isVocabularyToken(vocabulary, raw)) {
      throw new ReadError("InvalidEnumValue", `"${field}" must be one of: ${vocabulary.join(", ")}`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return raw;
  }

  /** Enumeration with a schema default for the absent attribute */
  enumerationOr<const T extends readonly string[]>(field: string, vocabulary: T, fallback: T[number]): T[number] {
    return this.optionalEnumeration(field, vocabulary) ?? fallback;
  }

  optionalBoolean(field: string): boolean | undefined {
    const raw = this.raw(field);
    if (raw === undefined) return undefined;
    const value = parseXsdBoolean(raw);
    if (value === undefined) {
      throw new ReadError("InvalidEnumValue", `"${field}" must be true or false`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return value;
  }

  booleanOr(field: string, fallback: boolean): boolean {
    return this.optionalBoolean(field) ?? fallback;
  }

  /** `t_yesNo` attribute */
  optionalYesNo(field: string): boolean | undefined {
    const raw = this.raw(field);
    if (raw === undefined) return undefined;
    const value = parseYesNo(raw);
    if (value === undefined) {
      throw new ReadError("InvalidEnumValue", `"${field}" must be yes or no`, {
        path: this.path,
        field,
        rawText: raw,
      });
    }
    return value;
  }

  yesNo(field: string): boolean {
    const value = this.optionalYesNo(field);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  // ─── Children ─────────────────────────────────────────────────────────────

  /**
   * Dispatch every child element to its handler, in document order.
   * Returns the additional data found, if requested and present.
   */
  children(handlers: ChildHandlers, options: ChildOptions = {}): AdditionalData | undefined {
    const seen = new Set<string>();
    let additionalData: AdditionalData | undefined;

    for (const child of this.element.children) {
      const reader = new ElementReader(child, this.context);
      const handler = Object.hasOwn(handlers, child.name) ? handlers[child.name] : undefined;

      if (handler !== undefined) {
        if (options.single?.includes(child.name) && seen.has(child.name)) {
          this.report("DuplicateElement", child.path, child.name, `<${child.name}> may appear only once; repeat ignored`);
          continue;
        }
        seen.add(child.name);
        handler(reader);
      } else if (options.additionalData && ADDITIONAL_DATA_ELEMENTS.has(child.name)) {
        additionalData ??= { include: [], userData: [] };
        readAdditionalDataElement(reader, additionalData);
      } else {
        this.report("UnknownElement", child.path, child.name, `<${child.name}> is not supported here; skipped`);
        continue;
      }
      reader.finish();
    }
    return additionalData;
  }

  /** Record attributes and text nobody read */
  finish(): void {
    for (const name of this.element.attributes.keys()) {
      if (this.consumed.has(name) || name.startsWith("xmlns") || name.startsWith("xsi:")) continue;
      this.report("UnknownAttribute", this.path, name, `attribute "${name}" is not supported here; skipped`);
    }
    if (!this.textConsumed && this.element.text !== "") {
      this.report("UnexpectedText", this.path, "#text", "text content ignored");
    }
  }

  report(kind: DiagnosticKind, path: string, name: string, message: string): void {
    this.context.diagnostics.push({ kind, path, name, message });
  }
}
