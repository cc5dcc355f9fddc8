/**
 * Road reader: attributes, links, types, plan view and profiles.
 * Lanes, objects and signals have their own modules.
 */

import type {
  ElevationProfile,
  Geometry,
  GeometryKind,
  GeometryShape,
  Lanes,
  LateralProfile,
  Road,
  RoadLink,
  RoadLinkTarget,
  RoadObjects,
  RoadPolynomial,
  RoadSpeed,
  RoadTypeEntry,
  Signals,
  SpeedLimit,
} from "@opendrive-codec/types";
import {
  CONTACT_POINTS,
  ELEMENT_DIRS,
  ELEMENT_TYPES,
  GEOMETRY_KINDS,
  PARAM_POLY3_RANGES,
  ROAD_TYPES,
  SPEED_UNITS,
  TRAFFIC_RULES,
  isNonEmpty,
} from "@opendrive-codec/types";
import { ReadError } from "../errors.js";
import { parseDecimal } from "../values/index.js";
import type { ElementReader } from "./context.js";
import { readLanes } from "./lanes.js";
import { readObjects } from "./objects.js";
import { readSignals } from "./signals.js";

// ---------------------------------------------------------------------------
// Road
// ---------------------------------------------------------------------------

export function readRoad(r: ElementReader): Road {
  const name = r.optionalString("name");
  const length = r.length("length", "positive");
  const id = r.string("id");
  const junction = r.reference("junction");
  const rule = r.enumerationOr("rule", TRAFFIC_RULES, "RHT");

  const types: RoadTypeEntry[] = [];
  const parts: {
    link?: RoadLink;
    planView?: Geometry[];
    elevationProfile?: ElevationProfile;
    lateralProfile?: LateralProfile;
    lanes?: Lanes;
    objects?: RoadObjects;
    signals?: Signals;
  } = {};

  const additionalData = r.children(
    {
      link: (c) => {
        parts.link = readRoadLink(c);
      },
      type: (c) => {
        types.push(readRoadType(c));
      },
      planView: (c) => {
        parts.planView = readPlanView(c);
      },
      elevationProfile: (c) => {
        parts.elevationProfile = readElevationProfile(c);
      },
      lateralProfile: (c) => {
        parts.lateralProfile = readLateralProfile(c);
      },
      lanes: (c) => {
        parts.lanes = readLanes(c);
      },
      objects: (c) => {
        parts.objects = readObjects(c);
      },
      signals: (c) => {
        parts.signals = readSignals(c);
      },
    },
    {
      single: ["link", "planView", "elevationProfile", "lateralProfile", "lanes", "objects", "signals"],
      additionalData: true,
    },
  );

  const { planView, lanes } = parts;
  if (planView === undefined) throw r.missing("planView");
  if (!isNonEmpty(planView)) {
    throw new ReadError("MissingRequiredField", "<planView> requires at least one <geometry>", {
      path: `${r.path}/planView[0]`,
      field: "geometry",
    });
  }
  if (lanes === undefined) throw r.missing("lanes");

  return {
    id,
    name,
    length,
    junction,
    rule,
    link: parts.link,
    types,
    planView,
    elevationProfile: parts.elevationProfile,
    lateralProfile: parts.lateralProfile,
    lanes,
    objects: parts.objects,
    signals: parts.signals,
    additionalData,
  };
}

// ---------------------------------------------------------------------------
// Link & type
// ---------------------------------------------------------------------------

function readLinkTarget(r: ElementReader): RoadLinkTarget {
  return {
    elementType: r.enumeration("elementType", ELEMENT_TYPES),
    elementId: r.reference("elementId"),
    contactPoint: r.optionalEnumeration("contactPoint", CONTACT_POINTS),
    elementS: r.optionalLength("elementS", "nonNegative"),
    elementDir: r.optionalEnumeration("elementDir", ELEMENT_DIRS),
  };
}

function readRoadLink(r: ElementReader): RoadLink {
  const link: RoadLink = {};
  r.children(
    {
      predecessor: (c) => {
        link.predecessor = readLinkTarget(c);
      },
      successor: (c) => {
        link.successor = readLinkTarget(c);
      },
    },
    { single: ["predecessor", "successor"] },
  );
  return link;
}

function readSpeedLimit(r: ElementReader): SpeedLimit {
  const raw = r.string("max");
  if (raw === "no limit" || raw === "undefined") return raw;
  const value = parseDecimal(raw);
  if (value === undefined) {
    throw new ReadError("MalformedNumber", '"max" must be a number, "no limit" or "undefined"', {
      path: r.path,
      field: "max",
      rawText: raw,
    });
  }
  return value;
}

function readSpeed(r: ElementReader): RoadSpeed {
  return {
    max: readSpeedLimit(r),
    unit: r.enumerationOr("unit", SPEED_UNITS, "m/s"),
  };
}

function readRoadType(r: ElementReader): RoadTypeEntry {
  const entry: RoadTypeEntry = {
    s: r.length("s", "nonNegative"),
    type: r.enumeration("type", ROAD_TYPES),
    country: r.optionalString("country"),
  };
  r.children(
    {
      speed: (c) => {
        entry.speed = readSpeed(c);
      },
    },
    { single: ["speed"] },
  );
  return entry;
}

// ---------------------------------------------------------------------------
// Plan view
// ---------------------------------------------------------------------------

function readPlanView(r: ElementReader): Geometry[] {
  const geometries: Geometry[] = [];
  r.children({
    geometry: (c) => {
      geometries.push(readGeometry(c));
    },
  });
  return geometries;
}

function readShape(kind: GeometryKind, r: ElementReader): GeometryShape {
  switch (kind) {
    case "line":
      return { kind: "line" };
    case "arc":
      return { kind: "arc", curvature: r.curvature("curvature") };
    case "spiral":
      return { kind: "spiral", curvStart: r.curvature("curvStart"), curvEnd: r.curvature("curvEnd") };
    case "poly3":
      return { kind: "poly3", a: r.decimal("a"), b: r.decimal("b"), c: r.decimal("c"), d: r.decimal("d") };
    case "paramPoly3":
      return readParamPoly3(r);
  }
}

function readParamPoly3(r: ElementReader): GeometryShape {
  const coefficients = {
    aU: r.decimal("aU"),
    bU: r.decimal("bU"),
    cU: r.decimal("cU"),
    dU: r.decimal("dU"),
    aV: r.decimal("aV"),
    bV: r.decimal("bV"),
    cV: r.decimal("cV"),
    dV: r.decimal("dV"),
  };
  // SUMO writes paramPoly3 without pRange and means normalized
  const pRange = r.workarounds.sumoIssue10301
    ? r.enumerationOr("pRange", PARAM_POLY3_RANGES, "normalized")
    : r.enumeration("pRange", PARAM_POLY3_RANGES);
  return { kind: "paramPoly3", ...coefficients, pRange };
}

export function readGeometry(r: ElementReader): Geometry {
  const s = r.length("s", "nonNegative");
  const x = r.length("x");
  const y = r.length("y");
  const hdg = r.angle("hdg");
  const length = r.length("length", "nonNegative");

  const found: { shape?: GeometryShape } = {};
  const shapeHandler = (kind: GeometryKind, c: ElementReader): void => {
    if (found.shape !== undefined) {
      c.report("DuplicateElement", c.path, kind, "geometry already has a shape; extra shape ignored");
      return;
    }
    found.shape = readShape(kind, c);
  };
  const additionalData = r.children(
    Object.fromEntries(GEOMETRY_KINDS.map((kind) => [kind, (c: ElementReader) => shapeHandler(kind, c)])),
    { additionalData: true },
  );
  const { shape } = found;
  if (shape === undefined) throw r.missing(GEOMETRY_KINDS.join("|"));

  return { s, x, y, hdg, length, shape, additionalData };
}

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

function readRoadPolynomial(r: ElementReader): RoadPolynomial {
  return {
    s: r.length("s", "nonNegative"),
    a: r.decimal("a"),
    b: r.decimal("b"),
    c: r.decimal("c"),
    d: r.decimal("d"),
  };
}

function readElevationProfile(r: ElementReader): ElevationProfile {
  const elevations: RoadPolynomial[] = [];
  r.children({
    elevation: (c) => {
      elevations.push(readRoadPolynomial(c));
    },
  });
  return { elevations };
}

function readLateralProfile(r: ElementReader): LateralProfile {
  const profile: LateralProfile = { superelevations: [], shapes: [] };
  r.children({
    superelevation: (c) => {
      profile.superelevations.push(readRoadPolynomial(c));
    },
    shape: (c) => {
      profile.shapes.push({
        s: c.length("s", "nonNegative"),
        t: c.length("t"),
        a: c.decimal("a"),
        b: c.decimal("b"),
        c: c.decimal("c"),
        d: c.decimal("d"),
      });
    },
  });
  return profile;
}
