/**
 * Reference-line geometry.
 *
 * A road's plan view is an ordered list of segments. Each segment knows
 * where it starts (s, x, y, hdg), how long it is, and which curve family
 * describes its shape.
 */

import type { AdditionalData, NonEmptyArray } from "./core.js";
import type { Angle, Curvature, Length } from "./units.js";
import type { ParamPoly3Range } from "./vocabulary.js";

export interface LineShape {
  kind: "line";
}

/** Circular arc with constant curvature */
export interface ArcShape {
  kind: "arc";
  curvature: Curvature;
}

/** Clothoid: curvature changes linearly from curvStart to curvEnd */
export interface SpiralShape {
  kind: "spiral";
  curvStart: Curvature;
  curvEnd: Curvature;
}

/** Cubic lateral offset `v(u)` in the segment's heading-aligned frame */
export interface Poly3Shape {
  kind: "poly3";
  a: number;
  b: number;
  c: number;
  d: number;
}

/** Independent cubics for u(p) and v(p) */
export interface ParamPoly3Shape {
  kind: "paramPoly3";
  aU: number;
  bU: number;
  cU: number;
  dU: number;
  aV: number;
  bV: number;
  cV: number;
  dV: number;
  pRange: ParamPoly3Range;
}

export type GeometryShape = LineShape | ArcShape | SpiralShape | Poly3Shape | ParamPoly3Shape;

export type GeometryKind = GeometryShape["kind"];

export const GEOMETRY_KINDS = ["line", "spiral", "arc", "poly3", "paramPoly3"] as const satisfies readonly GeometryKind[];

/** One segment of a road's reference line */
export interface Geometry {
  /** Start position along the road */
  s: Length;
  x: Length;
  y: Length;
  /** Start heading (inertial) */
  hdg: Angle;
  length: Length;
  shape: GeometryShape;
  additionalData?: AdditionalData;
}

export type PlanView = NonEmptyArray<Geometry>;

/** Position and heading at an arc-length offset on a curve */
export interface Pose {
  x: number;
  y: number;
  hdg: number;
}
