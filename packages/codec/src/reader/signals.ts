/**
 * Signal, signal-reference and controller readers.
 */

import type { Control, Controller, LaneValidity, Signal, Signals } from "@opendrive-codec/types";
import { ORIENTATIONS, REFERENCE_ELEMENT_TYPES, SIGNAL_UNITS, isNonEmpty } from "@opendrive-codec/types";
import type { ElementReader } from "./context.js";

export function readValidity(r: ElementReader): LaneValidity {
  return { fromLane: r.integer("fromLane"), toLane: r.integer("toLane") };
}

function readSignal(r: ElementReader): Signal {
  const signal: Signal = {
    s: r.length("s", "nonNegative"),
    t: r.length("t"),
    id: r.string("id"),
    name: r.optionalString("name"),
    dynamic: r.yesNo("dynamic"),
    orientation: r.enumeration("orientation", ORIENTATIONS),
    zOffset: r.length("zOffset"),
    country: r.optionalString("country"),
    countryRevision: r.optionalString("countryRevision"),
    type: r.string("type"),
    subtype: r.string("subtype"),
    value: r.optionalDecimal("value"),
    unit: r.optionalEnumeration("unit", SIGNAL_UNITS),
    height: r.optionalLength("height", "nonNegative"),
    width: r.optionalLength("width", "nonNegative"),
    text: r.optionalString("text"),
    hOffset: r.optionalAngle("hOffset"),
    pitch: r.optionalAngle("pitch"),
    roll: r.optionalAngle("roll"),
    validities: [],
    dependencies: [],
    references: [],
  };
  signal.additionalData = r.children(
    {
      validity: (c) => {
        signal.validities.push(readValidity(c));
      },
      dependency: (c) => {
        signal.dependencies.push({ id: c.reference("id"), type: c.optionalString("type") });
      },
      reference: (c) => {
        signal.references.push({
          elementType: c.enumeration("elementType", REFERENCE_ELEMENT_TYPES),
          elementId: c.reference("elementId"),
          type: c.optionalString("type"),
        });
      },
    },
    { additionalData: true },
  );
  return signal;
}

export function readSignals(r: ElementReader): Signals {
  const signals: Signals = { signals: [], signalReferences: [] };
  r.children({
    signal: (c) => {
      signals.signals.push(readSignal(c));
    },
    signalReference: (c) => {
      const validities: LaneValidity[] = [];
      const reference = {
        s: c.length("s", "nonNegative"),
        t: c.length("t"),
        id: c.reference("id"),
        orientation: c.enumeration("orientation", ORIENTATIONS),
        validities,
      };
      c.children({
        validity: (v) => {
          validities.push(readValidity(v));
        },
      });
      signals.signalReferences.push(reference);
    },
  });
  return signals;
}

export function readController(r: ElementReader): Controller {
  const id = r.string("id");
  const name = r.optionalString("name");
  const sequence = r.optionalInteger("sequence", "nonNegative");
  const controls: Control[] = [];
  const additionalData = r.children(
    {
      control: (c) => {
        controls.push({ signalId: c.reference("signalId"), type: c.optionalString("type") });
      },
    },
    { additionalData: true },
  );
  if (!isNonEmpty(controls)) throw r.missing("control");
  return { id, name, sequence, controls, additionalData };
}
