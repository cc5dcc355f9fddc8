/**
 * Road object writers: objects, references, tunnels and bridges.
 */

import type { ObjectRepeat, RoadObject, RoadObjects } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";
import { writeValidity } from "./signals.js";

function writeRepeat(w: ElementWriter, repeat: ObjectRepeat): void {
  w.quantity("s", repeat.s)
    .quantity("length", repeat.length)
    .quantity("distance", repeat.distance)
    .quantity("tStart", repeat.tStart)
    .quantity("tEnd", repeat.tEnd)
    .quantity("heightStart", repeat.heightStart)
    .quantity("heightEnd", repeat.heightEnd)
    .quantity("zOffsetStart", repeat.zOffsetStart)
    .quantity("zOffsetEnd", repeat.zOffsetEnd)
    .quantity("widthStart", repeat.widthStart)
    .quantity("widthEnd", repeat.widthEnd)
    .quantity("lengthStart", repeat.lengthStart)
    .quantity("lengthEnd", repeat.lengthEnd)
    .quantity("radiusStart", repeat.radiusStart)
    .quantity("radiusEnd", repeat.radiusEnd);
}

function writeObject(w: ElementWriter, object: RoadObject): void {
  w.quantity("t", object.t)
    .quantity("zOffset", object.zOffset)
    .string("type", object.type)
    .string("subtype", object.subtype)
    .quantity("validLength", object.validLength)
    .string("orientation", object.orientation)
    .quantity("radius", object.radius)
    .quantity("length", object.length)
    .quantity("height", object.height)
    .quantity("width", object.width)
    .quantity("hdg", object.hdg)
    .quantity("pitch", object.pitch)
    .quantity("roll", object.roll)
    .string("id", object.id)
    .string("name", object.name)
    .quantity("s", object.s)
    .yesNo("dynamic", object.dynamic)
    .boolean("perpToRoad", object.perpToRoad);

  w.each("repeat", object.repeats, writeRepeat);
  w.each("validity", object.validities, writeValidity);
  w.additionalData(object.additionalData);
}

export function writeObjects(w: ElementWriter, objects: RoadObjects): void {
  w.each("object", objects.objects, writeObject);
  w.each("objectReference", objects.objectReferences, (r, reference) => {
    r.quantity("s", reference.s)
      .quantity("t", reference.t)
      .string("id", reference.id)
      .quantity("zOffset", reference.zOffset)
      .quantity("validLength", reference.validLength)
      .string("orientation", reference.orientation);
    r.each("validity", reference.validities, writeValidity);
  });
  w.each("tunnel", objects.tunnels, (t, tunnel) => {
    t.quantity("s", tunnel.s)
      .quantity("length", tunnel.length)
      .string("name", tunnel.name)
      .string("id", tunnel.id)
      .string("type", tunnel.type)
      .decimal("lighting", tunnel.lighting)
      .decimal("daylight", tunnel.daylight);
    t.each("validity", tunnel.validities, writeValidity);
  });
  w.each("bridge", objects.bridges, (b, bridge) => {
    b.quantity("s", bridge.s)
      .quantity("length", bridge.length)
      .string("name", bridge.name)
      .string("id", bridge.id)
      .string("type", bridge.type);
    b.each("validity", bridge.validities, writeValidity);
  });
}
