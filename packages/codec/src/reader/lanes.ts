/**
 * Lanes reader: lane offsets, sections, lanes and their records.
 */

import type {
  ExplicitRoadMarkLine,
  Lane,
  LaneLink,
  LanePolynomial,
  LaneProfile,
  LaneSection,
  Lanes,
  NonEmptyArray,
  RoadMark,
  RoadMarkLine,
  RoadPolynomial,
} from "@opendrive-codec/types";
import {
  ACCESS_RESTRICTIONS,
  ACCESS_RULES,
  LANE_CHANGES,
  LANE_TYPES,
  ROAD_MARK_COLORS,
  ROAD_MARK_RULES,
  ROAD_MARK_TYPES,
  ROAD_MARK_WEIGHTS,
  SPEED_UNITS,
  isNonEmpty,
} from "@opendrive-codec/types";
import { ReadError } from "../errors.js";
import type { ElementReader } from "./context.js";

/** Require at least one `child` element collected into `items` */
function requireSome<T>(r: ElementReader, items: T[], child: string): NonEmptyArray<T> {
  if (!isNonEmpty(items)) throw r.missing(child);
  return items;
}

export function readLanes(r: ElementReader): Lanes {
  const laneOffsets: RoadPolynomial[] = [];
  const sections: LaneSection[] = [];
  r.children({
    laneOffset: (c) => {
      laneOffsets.push({
        s: c.length("s", "nonNegative"),
        a: c.decimal("a"),
        b: c.decimal("b"),
        c: c.decimal("c"),
        d: c.decimal("d"),
      });
    },
    laneSection: (c) => {
      sections.push(readLaneSection(c));
    },
  });
  return { laneOffsets, laneSections: requireSome(r, sections, "laneSection") };
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function readSide(r: ElementReader): NonEmptyArray<Lane> {
  const lanes: Lane[] = [];
  r.children({
    lane: (c) => {
      lanes.push(readLane(c));
    },
  });
  return requireSome(r, lanes, "lane");
}

function readLaneSection(r: ElementReader): LaneSection {
  const s = r.length("s", "nonNegative");
  const singleSide = r.booleanOr("singleSide", false);
  const sides: Pick<Partial<LaneSection>, "left" | "center" | "right"> = {};

  const additionalData = r.children(
    {
      left: (c) => {
        sides.left = readSide(c);
      },
      center: (c) => {
        sides.center = readSide(c);
      },
      right: (c) => {
        sides.right = readSide(c);
      },
    },
    { single: ["left", "center", "right"], additionalData: true },
  );

  const { left, center, right } = sides;
  if (center === undefined) throw r.missing("center");
  return { s, singleSide, left, center, right, additionalData };
}

// ---------------------------------------------------------------------------
// Lane
// ---------------------------------------------------------------------------

function readLanePolynomial(r: ElementReader): LanePolynomial {
  return {
    sOffset: r.length("sOffset", "nonNegative"),
    a: r.decimal("a"),
    b: r.decimal("b"),
    c: r.decimal("c"),
    d: r.decimal("d"),
  };
}

function readLaneLink(r: ElementReader): LaneLink {
  const link: LaneLink = { predecessors: [], successors: [] };
  r.children({
    predecessor: (c) => {
      link.predecessors.push(c.integer("id"));
    },
    successor: (c) => {
      link.successors.push(c.integer("id"));
    },
  });
  return link;
}

function readLane(r: ElementReader): Lane {
  const lane: Lane = {
    id: r.integer("id"),
    type: r.enumeration("type", LANE_TYPES),
    level: r.booleanOr("level", false),
    roadMarks: [],
    materials: [],
    speeds: [],
    access: [],
    heights: [],
    rules: [],
  };
  const widths: LanePolynomial[] = [];
  const borders: LanePolynomial[] = [];

  lane.additionalData = r.children(
    {
      link: (c) => {
        lane.link = readLaneLink(c);
      },
      width: (c) => {
        widths.push(readLanePolynomial(c));
      },
      border: (c) => {
        borders.push(readLanePolynomial(c));
      },
      roadMark: (c) => {
        lane.roadMarks.push(readRoadMark(c));
      },
      material: (c) => {
        lane.materials.push({
          sOffset: c.length("sOffset", "nonNegative"),
          surface: c.optionalString("surface"),
          friction: c.decimal("friction", "nonNegative"),
          roughness: c.optionalDecimal("roughness", "nonNegative"),
        });
      },
      speed: (c) => {
        lane.speeds.push({
          sOffset: c.length("sOffset", "nonNegative"),
          max: c.decimal("max", "nonNegative"),
          unit: c.enumerationOr("unit", SPEED_UNITS, "m/s"),
        });
      },
      access: (c) => {
        lane.access.push({
          sOffset: c.length("sOffset", "nonNegative"),
          rule: c.optionalEnumeration("rule", ACCESS_RULES),
          restriction: c.enumeration("restriction", ACCESS_RESTRICTIONS),
        });
      },
      height: (c) => {
        lane.heights.push({
          sOffset: c.length("sOffset", "nonNegative"),
          inner: c.length("inner"),
          outer: c.length("outer"),
        });
      },
      rule: (c) => {
        lane.rules.push({ sOffset: c.length("sOffset", "nonNegative"), value: c.string("value") });
      },
    },
    { single: ["link"], additionalData: true },
  );

  lane.profile = laneProfile(r, widths, borders);
  return lane;
}

function laneProfile(r: ElementReader, widths: LanePolynomial[], borders: LanePolynomial[]): LaneProfile | undefined {
  if (isNonEmpty(widths) && isNonEmpty(borders)) {
    throw new ReadError(
      "StructuralViolation",
      "A lane is described either by <width> or by <border> records, not both",
      { path: r.path, field: "border" },
      "mixed-width-border",
    );
  }
  if (isNonEmpty(widths)) return { kind: "width", records: widths };
  if (isNonEmpty(borders)) return { kind: "border", records: borders };
  return undefined;
}

// ---------------------------------------------------------------------------
// Road marks
// ---------------------------------------------------------------------------

function readRoadMarkLine(r: ElementReader): RoadMarkLine {
  return {
    length: r.length("length", "nonNegative"),
    space: r.length("space", "nonNegative"),
    tOffset: r.length("tOffset"),
    sOffset: r.length("sOffset", "nonNegative"),
    rule: r.optionalEnumeration("rule", ROAD_MARK_RULES),
    width: r.optionalLength("width", "nonNegative"),
    color: r.optionalEnumeration("color", ROAD_MARK_COLORS),
  };
}

function readExplicitLine(r: ElementReader): ExplicitRoadMarkLine {
  return {
    length: r.length("length", "nonNegative"),
    tOffset: r.length("tOffset"),
    sOffset: r.length("sOffset", "nonNegative"),
    rule: r.optionalEnumeration("rule", ROAD_MARK_RULES),
    width: r.optionalLength("width", "nonNegative"),
  };
}

function readRoadMark(r: ElementReader): RoadMark {
  const mark: RoadMark = {
    sOffset: r.length("sOffset", "nonNegative"),
    type: r.enumeration("type", ROAD_MARK_TYPES),
    weight: r.optionalEnumeration("weight", ROAD_MARK_WEIGHTS),
    // SUMO writes road marks without a color and means "standard"
    color: r.workarounds.sumoRoadmarkMissingColor
      ? r.enumerationOr("color", ROAD_MARK_COLORS, "standard")
      : r.enumeration("color", ROAD_MARK_COLORS),
    material: r.optionalString("material"),
    width: r.optionalLength("width", "nonNegative"),
    laneChange: r.optionalEnumeration("laneChange", LANE_CHANGES),
    height: r.optionalLength("height"),
    sways: [],
  };

  mark.additionalData = r.children(
    {
      sway: (c) => {
        mark.sways.push({
          ds: c.length("ds", "nonNegative"),
          a: c.decimal("a"),
          b: c.decimal("b"),
          c: c.decimal("c"),
          d: c.decimal("d"),
        });
      },
      type: (c) => {
        const lines: RoadMarkLine[] = [];
        const name = c.string("name");
        const width = c.length("width", "nonNegative");
        c.children({
          line: (l) => {
            lines.push(readRoadMarkLine(l));
          },
        });
        mark.typeDetail = { name, width, lines: requireSome(c, lines, "line") };
      },
      explicit: (c) => {
        const lines: ExplicitRoadMarkLine[] = [];
        c.children({
          line: (l) => {
            lines.push(readExplicitLine(l));
          },
        });
        mark.explicit = requireSome(c, lines, "line");
      },
    },
    { single: ["type", "explicit"], additionalData: true },
  );
  return mark;
}
