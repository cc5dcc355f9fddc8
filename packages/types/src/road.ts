/**
 * Road: the central element of a road network.
 *
 * A road owns its reference line (plan view), profiles, lanes, objects and
 * signals. Links to neighbouring roads and junctions are plain ids that
 * are resolved through a document index, never through references.
 */

import type { AdditionalData, RoadPolynomial } from "./core.js";
import type { PlanView } from "./geometry.js";
import type { Lanes } from "./lanes.js";
import type { RoadObjects } from "./objects.js";
import type { Signals } from "./signals.js";
import type { Length } from "./units.js";
import type {
  ContactPoint,
  ElementDir,
  ElementType,
  RoadType,
  SpeedUnit,
  TrafficRule,
} from "./vocabulary.js";

/** Id value of `road@junction` for roads outside any junction */
export const NO_JUNCTION = "-1";

/** Link from a road end to a neighbouring road or junction */
export interface RoadLinkTarget {
  elementType: ElementType;
  elementId: string;
  /** Required when linking to a road */
  contactPoint?: ContactPoint;
  /** Position on the linked element (virtual junctions) */
  elementS?: Length;
  elementDir?: ElementDir;
}

export interface RoadLink {
  predecessor?: RoadLinkTarget;
  successor?: RoadLinkTarget;
}

/** Maximum speed: a number in `unit`, or one of the two special tokens */
export type SpeedLimit = number | "no limit" | "undefined";

export interface RoadSpeed {
  max: SpeedLimit;
  /** Defaults to m/s when absent */
  unit: SpeedUnit;
}

/** Road type valid from `s` until the next entry */
export interface RoadTypeEntry {
  s: Length;
  type: RoadType;
  /** ISO 3166-1 country code */
  country?: string;
  speed?: RoadSpeed;
}

export interface ElevationProfile {
  elevations: RoadPolynomial[];
}

/** Lateral shape polynomial at road position s, starting at lateral position t */
export interface LateralShape extends RoadPolynomial {
  t: Length;
}

export interface LateralProfile {
  superelevations: RoadPolynomial[];
  shapes: LateralShape[];
}

export interface Road {
  id: string;
  name?: string;
  /** Total length of the reference line, always > 0 */
  length: Length;
  /** Owning junction id, or {@link NO_JUNCTION} */
  junction: string;
  /** Defaults to RHT */
  rule: TrafficRule;
  link?: RoadLink;
  types: RoadTypeEntry[];
  planView: PlanView;
  elevationProfile?: ElevationProfile;
  lateralProfile?: LateralProfile;
  lanes: Lanes;
  objects?: RoadObjects;
  signals?: Signals;
  additionalData?: AdditionalData;
}
