/**
 * Lanes writer.
 */

import type { Lane, LanePolynomial, LaneSection, Lanes, RoadMark } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";
import { writeRoadPolynomial } from "./road.js";

export function writeLanes(w: ElementWriter, lanes: Lanes): void {
  w.each("laneOffset", lanes.laneOffsets, writeRoadPolynomial);
  w.each("laneSection", lanes.laneSections, writeLaneSection);
}

function writeLaneSection(w: ElementWriter, section: LaneSection): void {
  w.quantity("s", section.s).defaultedBoolean("singleSide", section.singleSide, false);
  for (const side of ["left", "center", "right"] as const) {
    const lanes = section[side];
    if (lanes !== undefined) {
      w.child(side, (s) => {
        s.each("lane", lanes, writeLane);
      });
    }
  }
  w.additionalData(section.additionalData);
}

function writeLanePolynomial(w: ElementWriter, polynomial: LanePolynomial): void {
  w.quantity("sOffset", polynomial.sOffset)
    .decimal("a", polynomial.a)
    .decimal("b", polynomial.b)
    .decimal("c", polynomial.c)
    .decimal("d", polynomial.d);
}

function writeLane(w: ElementWriter, lane: Lane): void {
  w.integer("id", lane.id).string("type", lane.type).defaultedBoolean("level", lane.level, false);

  const { link, profile } = lane;
  if (link !== undefined) {
    w.child("link", (l) => {
      l.each("predecessor", link.predecessors, (p, id) => {
        p.integer("id", id);
      });
      l.each("successor", link.successors, (s, id) => {
        s.integer("id", id);
      });
    });
  }
  if (profile !== undefined) w.each(profile.kind, profile.records, writeLanePolynomial);
  w.each("roadMark", lane.roadMarks, writeRoadMark);
  w.each("material", lane.materials, (m, material) => {
    m.quantity("sOffset", material.sOffset)
      .string("surface", material.surface)
      .decimal("friction", material.friction)
      .decimal("roughness", material.roughness);
  });
  w.each("speed", lane.speeds, (s, speed) => {
    s.quantity("sOffset", speed.sOffset).decimal("max", speed.max).defaulted("unit", speed.unit, "m/s");
  });
  w.each("access", lane.access, (a, access) => {
    a.quantity("sOffset", access.sOffset).string("rule", access.rule).string("restriction", access.restriction);
  });
  w.each("height", lane.heights, (h, height) => {
    h.quantity("sOffset", height.sOffset).quantity("inner", height.inner).quantity("outer", height.outer);
  });
  w.each("rule", lane.rules, (r, rule) => {
    r.quantity("sOffset", rule.sOffset).string("value", rule.value);
  });
  w.additionalData(lane.additionalData);
}

function writeRoadMark(w: ElementWriter, mark: RoadMark): void {
  w.quantity("sOffset", mark.sOffset)
    .string("type", mark.type)
    .string("weight", mark.weight)
    .string("color", mark.color)
    .string("material", mark.material)
    .quantity("width", mark.width)
    .string("laneChange", mark.laneChange)
    .quantity("height", mark.height);

  w.each("sway", mark.sways, (s, sway) => {
    s.quantity("ds", sway.ds).decimal("a", sway.a).decimal("b", sway.b).decimal("c", sway.c).decimal("d", sway.d);
  });
  const { typeDetail, explicit } = mark;
  if (typeDetail !== undefined) {
    w.child("type", (t) => {
      t.string("name", typeDetail.name).quantity("width", typeDetail.width);
      t.each("line", typeDetail.lines, (l, line) => {
        l.quantity("length", line.length)
          .quantity("space", line.space)
          .quantity("tOffset", line.tOffset)
          .quantity("sOffset", line.sOffset)
          .string("rule", line.rule)
          .quantity("width", line.width)
          .string("color", line.color);
      });
    });
  }
  if (explicit !== undefined) {
    w.child("explicit", (e) => {
      e.each("line", explicit, (l, line) => {
        l.quantity("length", line.length)
          .quantity("tOffset", line.tOffset)
          .quantity("sOffset", line.sOffset)
          .string("rule", line.rule)
          .quantity("width", line.width);
      });
    });
  }
  w.additionalData(mark.additionalData);
}
