/**
 * Road writer: attributes, links, types, plan view and profiles.
 */

import type { Geometry, Road, RoadLinkTarget, RoadPolynomial, RoadTypeEntry } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";
import { writeLanes } from "./lanes.js";
import { writeObjects } from "./objects.js";
import { writeSignals } from "./signals.js";

export function writeRoad(w: ElementWriter, road: Road): void {
  w.string("name", road.name)
    .quantity("length", road.length)
    .string("id", road.id)
    .string("junction", road.junction)
    .defaulted("rule", road.rule, "RHT");

  const { link, elevationProfile, lateralProfile, objects, signals } = road;
  if (link !== undefined) {
    w.child("link", (l) => {
      if (link.predecessor !== undefined) writeLinkTarget(l, "predecessor", link.predecessor);
      if (link.successor !== undefined) writeLinkTarget(l, "successor", link.successor);
    });
  }
  w.each("type", road.types, writeRoadType);
  w.child("planView", (p) => {
    p.each("geometry", road.planView, writeGeometry);
  });
  if (elevationProfile !== undefined) {
    w.child("elevationProfile", (e) => {
      e.each("elevation", elevationProfile.elevations, writeRoadPolynomial);
    });
  }
  if (lateralProfile !== undefined) {
    w.child("lateralProfile", (l) => {
      l.each("superelevation", lateralProfile.superelevations, writeRoadPolynomial);
      l.each("shape", lateralProfile.shapes, (s, shape) => {
        s.quantity("s", shape.s)
          .quantity("t", shape.t)
          .decimal("a", shape.a)
          .decimal("b", shape.b)
          .decimal("c", shape.c)
          .decimal("d", shape.d);
      });
    });
  }
  w.child("lanes", (l) => writeLanes(l, road.lanes));
  if (objects !== undefined) w.child("objects", (o) => writeObjects(o, objects));
  if (signals !== undefined) w.child("signals", (s) => writeSignals(s, signals));
  w.additionalData(road.additionalData);
}

function writeLinkTarget(w: ElementWriter, name: string, target: RoadLinkTarget): void {
  w.child(name, (t) => {
    t.string("elementType", target.elementType)
      .string("elementId", target.elementId)
      .string("contactPoint", target.contactPoint)
      .quantity("elementS", target.elementS)
      .string("elementDir", target.elementDir);
  });
}

function writeRoadType(w: ElementWriter, entry: RoadTypeEntry): void {
  w.quantity("s", entry.s).string("type", entry.type).string("country", entry.country);
  const { speed } = entry;
  if (speed !== undefined) {
    w.child("speed", (s) => {
      if (typeof speed.max === "number") s.decimal("max", speed.max);
      else s.string("max", speed.max);
      s.defaulted("unit", speed.unit, "m/s");
    });
  }
}

export function writeRoadPolynomial(w: ElementWriter, polynomial: RoadPolynomial): void {
  w.quantity("s", polynomial.s)
    .decimal("a", polynomial.a)
    .decimal("b", polynomial.b)
    .decimal("c", polynomial.c)
    .decimal("d", polynomial.d);
}

export function writeGeometry(w: ElementWriter, geometry: Geometry): void {
  w.quantity("s", geometry.s)
    .quantity("x", geometry.x)
    .quantity("y", geometry.y)
    .quantity("hdg", geometry.hdg)
    .quantity("length", geometry.length);

  const { shape } = geometry;
  w.child(shape.kind, (s) => {
    switch (shape.kind) {
      case "line":
        break;
      case "arc":
        s.quantity("curvature", shape.curvature);
        break;
      case "spiral":
        s.quantity("curvStart", shape.curvStart).quantity("curvEnd", shape.curvEnd);
        break;
      case "poly3":
        s.decimal("a", shape.a).decimal("b", shape.b).decimal("c", shape.c).decimal("d", shape.d);
        break;
      case "paramPoly3":
        s.decimal("aU", shape.aU)
          .decimal("bU", shape.bU)
          .decimal("cU", shape.cU)
          .decimal("dU", shape.dU)
          .decimal("aV", shape.aV)
          .decimal("bV", shape.bV)
          .decimal("cV", shape.cV)
          .decimal("dV", shape.dV)
          .string("pRange", shape.pRange);
        break;
    }
  });
  w.additionalData(geometry.additionalData);
}
