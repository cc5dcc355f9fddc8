/**
 * Road objects: obstacles, furniture, tunnels and bridges.
 */

import type { AdditionalData } from "./core.js";
import type { LaneValidity } from "./signals.js";
import type { Angle, Length } from "./units.js";
import type { BridgeType, ObjectType, Orientation, TunnelType } from "./vocabulary.js";

/** Repeats an object along the road with linearly interpolated dimensions */
export interface ObjectRepeat {
  s: Length;
  length: Length;
  /** Distance between two instances; 0 means continuous */
  distance: Length;
  tStart: Length;
  tEnd: Length;
  heightStart: Length;
  heightEnd: Length;
  zOffsetStart: Length;
  zOffsetEnd: Length;
  widthStart?: Length;
  widthEnd?: Length;
  lengthStart?: Length;
  lengthEnd?: Length;
  radiusStart?: Length;
  radiusEnd?: Length;
}

export interface RoadObject {
  t: Length;
  zOffset: Length;
  type?: ObjectType;
  subtype?: string;
  validLength?: Length;
  orientation?: Orientation;
  radius?: Length;
  length?: Length;
  height?: Length;
  width?: Length;
  hdg?: Angle;
  pitch?: Angle;
  roll?: Angle;
  id: string;
  name?: string;
  s: Length;
  dynamic?: boolean;
  perpToRoad?: boolean;
  repeats: ObjectRepeat[];
  validities: LaneValidity[];
  additionalData?: AdditionalData;
}

/** Places an object defined on another road at a position on this road */
export interface ObjectReference {
  s: Length;
  t: Length;
  id: string;
  zOffset?: Length;
  validLength?: Length;
  orientation: Orientation;
  validities: LaneValidity[];
}

export interface Tunnel {
  s: Length;
  length: Length;
  name?: string;
  id: string;
  type: TunnelType;
  /** Degree of artificial lighting, 0..1 */
  lighting?: number;
  /** Degree of daylight intrusion, 0..1 */
  daylight?: number;
  validities: LaneValidity[];
}

export interface Bridge {
  s: Length;
  length: Length;
  name?: string;
  id: string;
  type: BridgeType;
  validities: LaneValidity[];
}

export interface RoadObjects {
  objects: RoadObject[];
  objectReferences: ObjectReference[];
  tunnels: Tunnel[];
  bridges: Bridge[];
}
