/**
 * Lanes, lane sections and everything a lane carries.
 */

import type { AdditionalData, LanePolynomial, NonEmptyArray, RoadPolynomial } from "./core.js";
import type { Length } from "./units.js";
import type {
  AccessRestriction,
  AccessRule,
  LaneChange,
  LaneType,
  RoadMarkColor,
  RoadMarkRule,
  RoadMarkType,
  RoadMarkWeight,
  SpeedUnit,
} from "./vocabulary.js";

// ---------------------------------------------------------------------------
// Road marks
// ---------------------------------------------------------------------------

/** Lateral sway of a road mark relative to its lane border */
export interface RoadMarkSway {
  ds: Length;
  a: number;
  b: number;
  c: number;
  d: number;
}

/** One repeating line of a detailed road-mark type */
export interface RoadMarkLine {
  length: Length;
  space: Length;
  tOffset: Length;
  sOffset: Length;
  rule?: RoadMarkRule;
  width?: Length;
  color?: RoadMarkColor;
}

export interface RoadMarkTypeDetail {
  name: string;
  width: Length;
  lines: NonEmptyArray<RoadMarkLine>;
}

/** Irregular line, given explicitly instead of as a repeating pattern */
export interface ExplicitRoadMarkLine {
  length: Length;
  tOffset: Length;
  sOffset: Length;
  rule?: RoadMarkRule;
  width?: Length;
}

export interface RoadMark {
  sOffset: Length;
  type: RoadMarkType;
  weight?: RoadMarkWeight;
  /** Required by the schema; reads as "standard" when missing under the SUMO workaround */
  color: RoadMarkColor;
  material?: string;
  width?: Length;
  laneChange?: LaneChange;
  height?: Length;
  sways: RoadMarkSway[];
  typeDetail?: RoadMarkTypeDetail;
  explicit?: NonEmptyArray<ExplicitRoadMarkLine>;
  additionalData?: AdditionalData;
}

// ---------------------------------------------------------------------------
// Lane records
// ---------------------------------------------------------------------------

export interface LaneMaterial {
  sOffset: Length;
  surface?: string;
  friction: number;
  roughness?: number;
}

export interface LaneSpeed {
  sOffset: Length;
  max: number;
  /** Defaults to m/s */
  unit: SpeedUnit;
}

export interface LaneAccess {
  sOffset: Length;
  rule?: AccessRule;
  restriction: AccessRestriction;
}

export interface LaneHeight {
  sOffset: Length;
  inner: Length;
  outer: Length;
}

export interface LaneRule {
  sOffset: Length;
  value: string;
}

/** Lane ids this lane continues from / into */
export interface LaneLink {
  predecessors: number[];
  successors: number[];
}

/**
 * A lane's lateral extent: either widths relative to the inner neighbour
 * or absolute border offsets. The schema forbids mixing the two.
 */
export type LaneProfile =
  | { kind: "width"; records: NonEmptyArray<LanePolynomial> }
  | { kind: "border"; records: NonEmptyArray<LanePolynomial> };

export interface Lane {
  /** Signed lane id: positive left, 0 center, negative right */
  id: number;
  type: LaneType;
  /** Keep on level (true) or apply superelevation; defaults to false */
  level: boolean;
  link?: LaneLink;
  profile?: LaneProfile;
  roadMarks: RoadMark[];
  materials: LaneMaterial[];
  speeds: LaneSpeed[];
  access: LaneAccess[];
  heights: LaneHeight[];
  rules: LaneRule[];
  additionalData?: AdditionalData;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** The three sides of a lane section */
export const LANE_SIDES = ["left", "center", "right"] as const;
export type LaneSide = (typeof LANE_SIDES)[number];

export interface LaneSection {
  s: Length;
  /** Lane section applies to one side only; defaults to false */
  singleSide: boolean;
  left?: NonEmptyArray<Lane>;
  center: NonEmptyArray<Lane>;
  right?: NonEmptyArray<Lane>;
  additionalData?: AdditionalData;
}

export interface Lanes {
  laneOffsets: RoadPolynomial[];
  laneSections: NonEmptyArray<LaneSection>;
}
