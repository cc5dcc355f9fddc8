/**
 * Scalar building blocks for document arbitraries.
 *
 * Attribute strings mix markup characters, tabs and line breaks and a few
 * non-ASCII characters. Element text has no edge whitespace, since text
 * content is trimmed on read.
 */

import fc from "fast-check";
import type { Angle, Curvature, Length, NonEmptyArray } from "@opendrive-codec/types";
import { meters, perMeter, radians } from "@opendrive-codec/types";

export function optional<T>(arb: fc.Arbitrary<T>): fc.Arbitrary<T | undefined> {
  return fc.option(arb, { nil: undefined });
}

export function nonEmpty<T>(arb: fc.Arbitrary<T>, maxLength = 3): fc.Arbitrary<NonEmptyArray<T>> {
  return fc
    .tuple(arb, fc.array(arb, { maxLength: maxLength - 1 }))
    .map(([head, tail]): NonEmptyArray<T> => [head, ...tail]);
}

export function list<T>(arb: fc.Arbitrary<T>, maxLength = 3): fc.Arbitrary<T[]> {
  return fc.array(arb, { maxLength });
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

export function decimal(min = -1e4, max = 1e4): fc.Arbitrary<number> {
  return fc.double({ min, max, noNaN: true });
}

export const nonNegative = (max = 1e4): fc.Arbitrary<number> => decimal(0, max);

export const unitInterval: fc.Arbitrary<number> = decimal(0, 1);

export const coefficient: fc.Arbitrary<number> = decimal(-10, 10);

export const integer = (min = -1000, max = 1000): fc.Arbitrary<number> => fc.integer({ min, max });

export const length = (min = -1e4, max = 1e4): fc.Arbitrary<Length> => decimal(min, max).map(meters);

export const nonNegativeLength = (max = 1e4): fc.Arbitrary<Length> => nonNegative(max).map(meters);

export const angle: fc.Arbitrary<Angle> = decimal(-2 * Math.PI, 2 * Math.PI).map(radians);

export const curvature = (limit: number): fc.Arbitrary<Curvature> => decimal(-limit, limit).map(perMeter);

/** `count` offsets in [0, span], ascending */
export function sortedOffsets(count: number, span: number): fc.Arbitrary<number[]> {
  return fc
    .array(unitInterval, { minLength: count, maxLength: count })
    .map((fractions) => [...fractions].sort((a, b) => a - b).map((f) => f * span));
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

const attributeChar: fc.Arbitrary<string> = fc.oneof(
  { arbitrary: fc.stringMatching(/^[A-Za-z0-9]$/), weight: 4 },
  { arbitrary: fc.constantFrom(" ", "_", ".", "-", "&", "<", ">", "'", '"', ";", "#"), weight: 2 },
  { arbitrary: fc.constantFrom("\t", "\n", "\r"), weight: 1 },
  { arbitrary: fc.constantFrom("é", "ß", "€", "中", "😀"), weight: 1 },
);

/** Attribute text: any mix of markup, whitespace and non-ASCII characters */
export const text: fc.Arbitrary<string> = fc
  .array(attributeChar, { minLength: 1, maxLength: 12 })
  .map((chars) => chars.join(""));

/** Element text: markup and non-ASCII characters, no edge whitespace */
export const elementText: fc.Arbitrary<string> = fc.stringMatching(
  /^[A-Za-z0-9_.&<>'"éß€-]([A-Za-z0-9 _.&<>'"éß€-]{0,10}[A-Za-z0-9_.&<>'"éß€-])?$/,
);

/** Element and attribute ids: no whitespace */
export const id: fc.Arbitrary<string> = fc.stringMatching(/^[A-Za-z0-9_.-]{1,8}$/);

/** Names for opaque userData elements and attributes */
export const xmlName: fc.Arbitrary<string> = fc.stringMatching(/^x[A-Z0-9][A-Za-z0-9]{0,5}$/);
