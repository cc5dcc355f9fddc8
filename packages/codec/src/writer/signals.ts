/**
 * Signal and controller writers.
 */

import type { Controller, LaneValidity, Signal, Signals } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";

export function writeValidity(w: ElementWriter, validity: LaneValidity): void {
  w.integer("fromLane", validity.fromLane).integer("toLane", validity.toLane);
}

function writeSignal(w: ElementWriter, signal: Signal): void {
  w.quantity("s", signal.s)
    .quantity("t", signal.t)
    .string("id", signal.id)
    .string("name", signal.name)
    .yesNo("dynamic", signal.dynamic)
    .string("orientation", signal.orientation)
    .quantity("zOffset", signal.zOffset)
    .string("country", signal.country)
    .string("countryRevision", signal.countryRevision)
    .string("type", signal.type)
    .string("subtype", signal.subtype)
    .decimal("value", signal.value)
    .string("unit", signal.unit)
    .quantity("height", signal.height)
    .quantity("width", signal.width)
    .string("text", signal.text)
    .quantity("hOffset", signal.hOffset)
    .quantity("pitch", signal.pitch)
    .quantity("roll", signal.roll);

  w.each("validity", signal.validities, writeValidity);
  w.each("dependency", signal.dependencies, (d, dependency) => {
    d.string("id", dependency.id).string("type", dependency.type);
  });
  w.each("reference", signal.references, (r, reference) => {
    r.string("elementType", reference.elementType)
      .string("elementId", reference.elementId)
      .string("type", reference.type);
  });
  w.additionalData(signal.additionalData);
}

export function writeSignals(w: ElementWriter, signals: Signals): void {
  w.each("signal", signals.signals, writeSignal);
  w.each("signalReference", signals.signalReferences, (r, reference) => {
    r.quantity("s", reference.s)
      .quantity("t", reference.t)
      .string("id", reference.id)
      .string("orientation", reference.orientation);
    r.each("validity", reference.validities, writeValidity);
  });
}

export function writeController(w: ElementWriter, controller: Controller): void {
  w.string("id", controller.id).string("name", controller.name).integer("sequence", controller.sequence);
  w.each("control", controller.controls, (c, control) => {
    c.string("signalId", control.signalId).string("type", control.type);
  });
  w.additionalData(controller.additionalData);
}
