/**
 * Signals placed along a road, and the controllers that group them.
 */

import type { AdditionalData, NonEmptyArray } from "./core.js";
import type { Angle, Length } from "./units.js";
import type { Orientation, ReferenceElementType, SignalUnit } from "./vocabulary.js";

/** Lanes an object or signal applies to (inclusive range of lane ids) */
export interface LaneValidity {
  fromLane: number;
  toLane: number;
}

/** Another signal whose state depends on this one */
export interface SignalDependency {
  id: string;
  type?: string;
}

/** Link from a signal to the object or signal it describes */
export interface SignalElementReference {
  elementType: ReferenceElementType;
  elementId: string;
  type?: string;
}

export interface Signal {
  s: Length;
  t: Length;
  id: string;
  name?: string;
  /** Written as yes/no */
  dynamic: boolean;
  orientation: Orientation;
  zOffset: Length;
  country?: string;
  countryRevision?: string;
  /** Country-specific type code */
  type: string;
  subtype: string;
  value?: number;
  unit?: SignalUnit;
  height?: Length;
  width?: Length;
  text?: string;
  hOffset?: Angle;
  pitch?: Angle;
  roll?: Angle;
  validities: LaneValidity[];
  dependencies: SignalDependency[];
  references: SignalElementReference[];
  additionalData?: AdditionalData;
}

/** Places a signal defined on another road at a position on this road */
export interface SignalReference {
  s: Length;
  t: Length;
  /** Id of the referenced signal */
  id: string;
  orientation: Orientation;
  validities: LaneValidity[];
}

export interface Signals {
  signals: Signal[];
  signalReferences: SignalReference[];
}

export interface Control {
  signalId: string;
  type?: string;
}

/** Groups dynamic signals that switch together */
export interface Controller {
  id: string;
  name?: string;
  sequence?: number;
  controls: NonEmptyArray<Control>;
  additionalData?: AdditionalData;
}
