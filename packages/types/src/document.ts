/**
 * The document root and its header.
 */

import type { AdditionalData } from "./core.js";
import type { Junction, JunctionGroup } from "./junction.js";
import type { Road } from "./road.js";
import type { Controller } from "./signals.js";
import type { Angle, Length } from "./units.js";

/** Standard version this model implements */
export const OPENDRIVE_REV_MAJOR = 1;
export const OPENDRIVE_REV_MINOR = 7;

/** Inertial offset applied to the whole dataset */
export interface HeaderOffset {
  x: Length;
  y: Length;
  z: Length;
  hdg: Angle;
}

export interface Header {
  revMajor: number;
  revMinor: number;
  name?: string;
  version?: string;
  /** Time/date of database creation, free-form text */
  date?: string;
  north?: Length;
  south?: Length;
  east?: Length;
  west?: Length;
  vendor?: string;
  /** Projection definition (PROJ string), carried as CDATA */
  geoReference?: string;
  offset?: HeaderOffset;
  additionalData?: AdditionalData;
}

export interface OpenDrive {
  header: Header;
  roads: Road[];
  controllers: Controller[];
  junctions: Junction[];
  junctionGroups: JunctionGroup[];
  additionalData?: AdditionalData;
}
