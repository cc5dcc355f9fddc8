/**
 * Junctions, their connections and junction groups.
 */

import type { AdditionalData, NonEmptyArray } from "./core.js";
import type { Length } from "./units.js";
import type {
  ConnectionType,
  ContactPoint,
  ElementDir,
  ElementType,
  JunctionGroupType,
  JunctionType,
  Orientation,
} from "./vocabulary.js";

/** Maps a lane of the incoming road to a lane of the connecting road */
export interface JunctionLaneLink {
  from: number;
  to: number;
}

/** Predecessor/successor of a virtual connection */
export interface ConnectionEnd {
  elementType: ElementType;
  elementId: string;
  elementS: Length;
  elementDir: ElementDir;
}

export interface Connection {
  id: string;
  /** Defaults to "default" */
  type: ConnectionType;
  incomingRoad?: string;
  connectingRoad?: string;
  /** Direct junctions link roads without a connecting road */
  linkedRoad?: string;
  contactPoint?: ContactPoint;
  predecessor?: ConnectionEnd;
  successor?: ConnectionEnd;
  laneLinks: JunctionLaneLink[];
  additionalData?: AdditionalData;
}

/** Road `high` has priority over road `low` inside the junction */
export interface JunctionPriority {
  high?: string;
  low?: string;
}

/** Reference to a controller managing signals of this junction */
export interface JunctionController {
  id: string;
  type?: string;
  sequence?: number;
}

export interface Junction {
  id: string;
  name?: string;
  /** Defaults to "default" */
  type: JunctionType;
  /** Virtual junctions: the road the junction lies on */
  mainRoad?: string;
  sStart?: Length;
  sEnd?: Length;
  orientation?: Orientation;
  connections: NonEmptyArray<Connection>;
  priorities: JunctionPriority[];
  controllers: JunctionController[];
  additionalData?: AdditionalData;
}

export interface JunctionGroup {
  id: string;
  name?: string;
  type: JunctionGroupType;
  /** Ids of the member junctions */
  junctions: NonEmptyArray<string>;
}
