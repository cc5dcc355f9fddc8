/**
 * Building blocks shared by every part of the model: non-empty sequences,
 * cubic polynomial records and the additional-data extension points.
 */

import type { Length } from "./units.js";
import type { DataSource, PostProcessing } from "./vocabulary.js";

/** A sequence the schema requires to hold at least one entry */
export type NonEmptyArray<T> = [T, ...T[]];

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

/** Coefficients of `a + b*ds + c*ds² + d*ds³` */
export interface CubicPolynomial {
  a: number;
  b: number;
  c: number;
  d: number;
}

/** Cubic polynomial record starting at road coordinate `s` */
export interface RoadPolynomial extends CubicPolynomial {
  s: Length;
}

/** Cubic polynomial record starting at `sOffset` from its lane section */
export interface LanePolynomial extends CubicPolynomial {
  sOffset: Length;
}

// ---------------------------------------------------------------------------
// Additional data
// ---------------------------------------------------------------------------

/**
 * An element carried through untouched inside `<userData>`.
 * Attribute order is kept so the element is written back as it was read.
 */
export interface OpaqueElement {
  name: string;
  attributes: [name: string, value: string][];
  children: OpaqueElement[];
  /** Concatenated, trimmed text content ("" when none) */
  text: string;
}

/** Application-specific extension data */
export interface UserData {
  code?: string;
  value?: string;
  content: OpaqueElement[];
  /** Trimmed text directly inside the element */
  text?: string;
}

/** Reference to an external file whose content is included at this position */
export interface Include {
  file: string;
}

/** Absolute and relative accuracy of the describing data, in meters */
export interface DataQualityError {
  xyAbsolute: number;
  zAbsolute: number;
  xyRelative: number;
  zRelative: number;
}

export interface RawData {
  /** Date of the raw data collection, free-form text */
  date: string;
  source: DataSource;
  sourceComment?: string;
  postProcessing: PostProcessing;
  postProcessingComment?: string;
}

export interface DataQuality {
  error?: DataQualityError;
  rawData?: RawData;
}

/**
 * The `g_additionalData` group: may appear at the end of most elements.
 * Absent (undefined) when an element carries none.
 */
export interface AdditionalData {
  include: Include[];
  userData: UserData[];
  dataQuality?: DataQuality;
}

export function isEmptyAdditionalData(data: AdditionalData | undefined): boolean {
  return (
    data === undefined ||
    (data.include.length === 0 && data.userData.length === 0 && data.dataQuality === undefined)
  );
}
