/**
 * Road-object readers: objects, object references, tunnels, bridges.
 */

import type { LaneValidity, ObjectRepeat, RoadObject, RoadObjects } from "@opendrive-codec/types";
import { BRIDGE_TYPES, OBJECT_TYPES, ORIENTATIONS, TUNNEL_TYPES } from "@opendrive-codec/types";
import type { ElementReader } from "./context.js";
import { readValidity } from "./signals.js";

function readRepeat(r: ElementReader): ObjectRepeat {
  return {
    s: r.length("s", "nonNegative"),
    length: r.length("length", "nonNegative"),
    distance: r.length("distance", "nonNegative"),
    tStart: r.length("tStart"),
    tEnd: r.length("tEnd"),
    heightStart: r.length("heightStart", "nonNegative"),
    heightEnd: r.length("heightEnd", "nonNegative"),
    zOffsetStart: r.length("zOffsetStart"),
    zOffsetEnd: r.length("zOffsetEnd"),
    widthStart: r.optionalLength("widthStart", "nonNegative"),
    widthEnd: r.optionalLength("widthEnd", "nonNegative"),
    lengthStart: r.optionalLength("lengthStart", "nonNegative"),
    lengthEnd: r.optionalLength("lengthEnd", "nonNegative"),
    radiusStart: r.optionalLength("radiusStart", "nonNegative"),
    radiusEnd: r.optionalLength("radiusEnd", "nonNegative"),
  };
}

function readObject(r: ElementReader): RoadObject {
  const object: RoadObject = {
    t: r.length("t"),
    zOffset: r.length("zOffset"),
    type: r.optionalEnumeration("type", OBJECT_TYPES),
    subtype: r.optionalString("subtype"),
    validLength: r.optionalLength("validLength", "nonNegative"),
    orientation: r.optionalEnumeration("orientation", ORIENTATIONS),
    radius: r.optionalLength("radius", "nonNegative"),
    length: r.optionalLength("length", "nonNegative"),
    height: r.optionalLength("height", "nonNegative"),
    width: r.optionalLength("width", "nonNegative"),
    hdg: r.optionalAngle("hdg"),
    pitch: r.optionalAngle("pitch"),
    roll: r.optionalAngle("roll"),
    id: r.string("id"),
    name: r.optionalString("name"),
    s: r.length("s", "nonNegative"),
    dynamic: r.optionalYesNo("dynamic"),
    perpToRoad: r.optionalBoolean("perpToRoad"),
    repeats: [],
    validities: [],
  };
  object.additionalData = r.children(
    {
      repeat: (c) => {
        object.repeats.push(readRepeat(c));
      },
      validity: (c) => {
        object.validities.push(readValidity(c));
      },
    },
    { additionalData: true },
  );
  return object;
}

/** Validity-only children shared by references, tunnels and bridges */
function readValidities(r: ElementReader): LaneValidity[] {
  const validities: LaneValidity[] = [];
  r.children({
    validity: (c) => {
      validities.push(readValidity(c));
    },
  });
  return validities;
}

export function readObjects(r: ElementReader): RoadObjects {
  const objects: RoadObjects = { objects: [], objectReferences: [], tunnels: [], bridges: [] };
  r.children({
    object: (c) => {
      objects.objects.push(readObject(c));
    },
    objectReference: (c) => {
      objects.objectReferences.push({
        s: c.length("s", "nonNegative"),
        t: c.length("t"),
        id: c.reference("id"),
        zOffset: c.optionalLength("zOffset"),
        validLength: c.optionalLength("validLength", "nonNegative"),
        orientation: c.enumeration("orientation", ORIENTATIONS),
        validities: readValidities(c),
      });
    },
    tunnel: (c) => {
      objects.tunnels.push({
        s: c.length("s", "nonNegative"),
        length: c.length("length", "nonNegative"),
        name: c.optionalString("name"),
        id: c.string("id"),
        type: c.enumeration("type", TUNNEL_TYPES),
        lighting: c.optionalDecimal("lighting", "unitInterval"),
        daylight: c.optionalDecimal("daylight", "unitInterval"),
        validities: readValidities(c),
      });
    },
    bridge: (c) => {
      objects.bridges.push({
        s: c.length("s", "nonNegative"),
        length: c.length("length", "nonNegative"),
        name: c.optionalString("name"),
        id: c.string("id"),
        type: c.enumeration("type", BRIDGE_TYPES),
        validities: readValidities(c),
      });
    },
  });
  return objects;
}
