/**
 * Unit-bearing numeric values.
 *
 * Every physical field in the model stores its magnitude together with a
 * literal unit tag fixed by the field's position in the schema. Units are
 * never converted implicitly: the tag documents what the number means and
 * keeps a heading from being passed where a length is expected.
 */

import type { SpeedUnit } from "./vocabulary.js";

/** Units that appear as implicit field units in OpenDRIVE */
export type Unit = "m" | "rad" | "1/m" | "m/s";

/** A magnitude paired with its unit */
export interface Quantity<U extends Unit> {
  readonly value: number;
  readonly unit: U;
}

/** Distance along or across the road, in meters */
export type Length = Quantity<"m">;
/** Heading, pitch or roll, in radians */
export type Angle = Quantity<"rad">;
/** Curvature, in 1/m (positive = counter-clockwise) */
export type Curvature = Quantity<"1/m">;
/** Speed, in m/s */
export type Speed = Quantity<"m/s">;

export function meters(value: number): Length {
  return { value, unit: "m" };
}

export function radians(value: number): Angle {
  return { value, unit: "rad" };
}

export function perMeter(value: number): Curvature {
  return { value, unit: "1/m" };
}

export function metersPerSecond(value: number): Speed {
  return { value, unit: "m/s" };
}

/** Explicit degree → radian conversion (never applied while reading) */
export function degreesToRadians(degrees: number): Angle {
  return radians((degrees * Math.PI) / 180);
}

export function radiansToDegrees(angle: Angle): number {
  return (angle.value * 180) / Math.PI;
}

const METERS_PER_SECOND_PER_MPH = 0.44704;

/** Convert a speed given in one of the schema's speed units to m/s */
export function speedToMetersPerSecond(max: number, unit: SpeedUnit): Speed {
  switch (unit) {
    case "m/s":
      return metersPerSecond(max);
    case "km/h":
      return metersPerSecond(max / 3.6);
    case "mph":
      return metersPerSecond(max * METERS_PER_SECOND_PER_MPH);
  }
}
