/**
 * Per-element writing helpers.
 *
 * An ElementWriter collects one output element's attributes and children
 * in call order, so each writer function lists fields in schema order and
 * the output follows it. Values XML cannot carry fail with a WriteError.
 */

import type { AdditionalData, OpaqueElement, Quantity, Unit } from "@opendrive-codec/types";
import { WriteError } from "../errors.js";
import { formatDecimal, formatYesNo, isXmlText } from "../values/index.js";
import type { OutElement } from "../xml/index.js";

export class ElementWriter {
  readonly element: OutElement;
  private readonly childCounts = new Map<string, number>();

  constructor(
    name: string,
    readonly path: string,
  ) {
    this.element = { name, attributes: [], children: [] };
  }

  private checkText(field: string, value: string): string {
    if (!isXmlText(value)) {
      throw new WriteError("UnrepresentableValue", `"${field}" contains characters XML 1.0 cannot carry`, {
        path: this.path,
        field,
        rawText: value,
      });
    }
    return value;
  }

  private put(field: string, value: string): this {
    this.element.attributes.push([field, value]);
    return this;
  }

  // ─── Attributes ───────────────────────────────────────────────────────────

  /** Writes nothing for `undefined` */
  string(field: string, value: string | undefined): this {
    return value === undefined ? this : this.put(field, this.checkText(field, value));
  }

  decimal(field: string, value: number | undefined): this {
    if (value === undefined) return this;
    if (!Number.isFinite(value)) {
      throw new WriteError("NonFiniteNumber", `"${field}" must be a finite number`, {
        path: this.path,
        field,
        rawText: String(value),
      });
    }
    return this.put(field, formatDecimal(value));
  }

  quantity(field: string, value: Quantity<Unit> | undefined): this {
    return this.decimal(field, value?.value);
  }

  integer(field: string, value: number | undefined): this {
    if (value !== undefined && !Number.isSafeInteger(value)) {
      throw new WriteError("UnrepresentableValue", `"${field}" must be an integer`, {
        path: this.path,
        field,
        rawText: String(value),
      });
    }
    return this.decimal(field, value);
  }

  boolean(field: string, value: boolean | undefined): this {
    return value === undefined ? this : this.put(field, value ? "true" : "false");
  }

  yesNo(field: string, value: boolean | undefined): this {
    return value === undefined ? this : this.put(field, formatYesNo(value));
  }

  /** Optional attribute with a schema default: omitted when equal to the default */
  defaulted<T extends string>(field: string, value: T, fallback: T): this {
    return value === fallback ? this : this.string(field, value);
  }

  defaultedBoolean(field: string, value: boolean, fallback: boolean): this {
    return value === fallback ? this : this.boolean(field, value);
  }

  // ─── Content ──────────────────────────────────────────────────────────────

  child(name: string, build: (writer: ElementWriter) => void): this {
    const index = this.childCounts.get(name) ?? 0;
    this.childCounts.set(name, index + 1);
    const writer = new ElementWriter(name, `${this.path}/${name}[${index}]`);
    build(writer);
    this.element.children.push(writer.element);
    return this;
  }

  /** One child per item, in order */
  each<T>(name: string, items: readonly T[] | undefined, build: (writer: ElementWriter, item: T) => void): this {
    for (const item of items ?? []) this.child(name, (w) => build(w, item));
    return this;
  }

  text(value: string): this {
    this.element.text = this.checkText("#text", value);
    return this;
  }

  cdata(value: string): this {
    if (value.includes("]]>")) {
      throw new WriteError("UnrepresentableValue", 'CDATA content cannot contain "]]>"', {
        path: this.path,
        field: "#cdata",
        rawText: value,
      });
    }
    this.element.cdata = this.checkText("#cdata", value);
    return this;
  }

  // ─── Additional data ──────────────────────────────────────────────────────

  opaque(element: OpaqueElement): this {
    return this.child(element.name, (w) => {
      for (const [name, value] of element.attributes) w.string(name, value);
      if (element.text !== "") w.text(element.text);
      for (const child of element.children) w.opaque(child);
    });
  }

  /** include*, userData*, dataQuality? at the end of an element */
  additionalData(data: AdditionalData | undefined): this {
    if (data === undefined) return this;
    this.each("include", data.include, (w, include) => {
      w.string("file", include.file);
    });
    this.each("userData", data.userData, (w, userData) => {
      w.string("code", userData.code).string("value", userData.value);
      if (userData.text !== undefined && userData.text !== "") w.text(userData.text);
      for (const element of userData.content) w.opaque(element);
    });
    const quality = data.dataQuality;
    if (quality !== undefined) {
      this.child("dataQuality", (w) => {
        if (quality.error !== undefined) {
          const error = quality.error;
          w.child("error", (e) => {
            e.decimal("xyAbsolute", error.xyAbsolute)
              .decimal("zAbsolute", error.zAbsolute)
              .decimal("xyRelative", error.xyRelative)
              .decimal("zRelative", error.zRelative);
          });
        }
        if (quality.rawData !== undefined) {
          const raw = quality.rawData;
          w.child("rawData", (d) => {
            d.string("date", raw.date)
              .string("source", raw.source)
              .string("sourceComment", raw.sourceComment)
              .string("postProcessing", raw.postProcessing)
              .string("postProcessingComment", raw.postProcessingComment);
          });
        }
      });
    }
    return this;
  }
}
