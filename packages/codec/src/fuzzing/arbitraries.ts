/**
 * fast-check arbitraries for whole documents and their parts.
 *
 * Generated documents pass the reader's structural checks: each geometry
 * starts where the previous one ends (evaluated, not guessed), offsets
 * ascend, lane ids are unique per side, and optional additional data is
 * either absent or non-empty.
 */

import fc from "fast-check";
import type {
  AdditionalData,
  Bridge,
  Connection,
  ConnectionEnd,
  Controller,
  DataQuality,
  Geometry,
  GeometryShape,
  Header,
  Junction,
  JunctionGroup,
  Lane,
  LaneProfile,
  LaneSection,
  LanePolynomial,
  LaneValidity,
  NonEmptyArray,
  ObjectReference,
  OpaqueElement,
  OpenDrive,
  PlanView,
  Pose,
  Road,
  RoadLinkTarget,
  RoadMark,
  RoadObject,
  RoadObjects,
  RoadPolynomial,
  RoadTypeEntry,
  Signal,
  SignalReference,
  Signals,
  Tunnel,
  UserData,
} from "@opendrive-codec/types";
import {
  ACCESS_RESTRICTIONS,
  ACCESS_RULES,
  BRIDGE_TYPES,
  CONNECTION_TYPES,
  CONTACT_POINTS,
  DATA_SOURCES,
  ELEMENT_DIRS,
  ELEMENT_TYPES,
  JUNCTION_GROUP_TYPES,
  JUNCTION_TYPES,
  LANE_CHANGES,
  LANE_TYPES,
  NO_JUNCTION,
  OBJECT_TYPES,
  OPENDRIVE_REV_MAJOR,
  OPENDRIVE_REV_MINOR,
  ORIENTATIONS,
  PARAM_POLY3_RANGES,
  POST_PROCESSING,
  REFERENCE_ELEMENT_TYPES,
  ROAD_MARK_COLORS,
  ROAD_MARK_RULES,
  ROAD_MARK_TYPES,
  ROAD_MARK_WEIGHTS,
  ROAD_TYPES,
  SIGNAL_UNITS,
  SPEED_UNITS,
  TRAFFIC_RULES,
  TUNNEL_TYPES,
  isEmptyAdditionalData,
  meters,
  radians,
} from "@opendrive-codec/types";
import { geometryEnd } from "../geometry/index.js";
import {
  angle,
  coefficient,
  curvature,
  decimal,
  elementText,
  id,
  integer,
  length,
  list,
  nonEmpty,
  nonNegative,
  nonNegativeLength,
  optional,
  sortedOffsets,
  text,
  unitInterval,
  xmlName,
} from "./primitives.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function mapNonEmpty<T, U>([head, ...tail]: NonEmptyArray<T>, fn: (item: T, index: number) => U): NonEmptyArray<U> {
  return [fn(head, 0), ...tail.map((item, i) => fn(item, i + 1))];
}

function sortNonEmpty<T>(items: NonEmptyArray<T>, key: (item: T) => number): NonEmptyArray<T> {
  const [head, ...tail] = [...items].sort((a, b) => key(a) - key(b));
  return head === undefined ? items : [head, ...tail];
}

/** Polynomials at ascending `s` within [0, span] */
function roadPolynomials(span: number, maxLength = 3): fc.Arbitrary<RoadPolynomial[]> {
  return fc
    .integer({ min: 0, max: maxLength })
    .chain((count) =>
      fc.tuple(sortedOffsets(count, span), fc.array(fc.tuple(coefficient, coefficient, coefficient, coefficient), { minLength: count, maxLength: count })),
    )
    .map(([offsets, coefficients]) =>
      offsets.map((s, i) => {
        const [a, b, c, d] = coefficients[i] ?? [0, 0, 0, 0];
        return { s: meters(s), a, b, c, d };
      }),
    );
}

// ---------------------------------------------------------------------------
// Additional data
// ---------------------------------------------------------------------------

const attributes: fc.Arbitrary<[string, string][]> = fc.uniqueArray(fc.tuple(xmlName, text), {
  maxLength: 2,
  selector: ([name]) => name,
});

const opaqueLeaf: fc.Arbitrary<OpaqueElement> = fc.record({
  name: xmlName,
  attributes,
  children: fc.constant([]),
  text: fc.oneof(fc.constant(""), elementText),
});

/** Opaque elements carry either text or child elements, never both */
export const arbitraryOpaqueElement: fc.Arbitrary<OpaqueElement> = fc.oneof(
  opaqueLeaf,
  fc.record({
    name: xmlName,
    attributes,
    children: list(opaqueLeaf, 2),
    text: fc.constant(""),
  }),
);

const userData: fc.Arbitrary<UserData> = fc.oneof(
  fc.record({
    code: optional(text),
    value: optional(text),
    content: list(arbitraryOpaqueElement, 2),
  }),
  fc.record({
    code: optional(text),
    value: optional(text),
    content: fc.constant([]),
    text: elementText,
  }),
);

const dataQuality: fc.Arbitrary<DataQuality> = fc.record({
  error: optional(
    fc.record({
      xyAbsolute: decimal(),
      zAbsolute: decimal(),
      xyRelative: decimal(),
      zRelative: decimal(),
    }),
  ),
  rawData: optional(
    fc.record({
      date: text,
      source: fc.constantFrom(...DATA_SOURCES),
      sourceComment: optional(text),
      postProcessing: fc.constantFrom(...POST_PROCESSING),
      postProcessingComment: optional(text),
    }),
  ),
});

export const arbitraryAdditionalData: fc.Arbitrary<AdditionalData> = fc
  .record({
    include: list(fc.record({ file: text }), 2),
    userData: list(userData, 2),
    dataQuality: optional(dataQuality),
  })
  .filter((data) => !isEmptyAdditionalData(data));

const additionalData = optional(arbitraryAdditionalData);

// ---------------------------------------------------------------------------
// Plan view
// ---------------------------------------------------------------------------

export const arbitraryShape: fc.Arbitrary<GeometryShape> = fc.oneof(
  fc.constant({ kind: "line" } as const),
  curvature(0.2).map((k) => ({ kind: "arc" as const, curvature: k })),
  fc.tuple(curvature(0.1), curvature(0.1)).map(([curvStart, curvEnd]) => ({ kind: "spiral" as const, curvStart, curvEnd })),
  fc
    .tuple(decimal(-1, 1), decimal(-0.5, 0.5), decimal(-0.05, 0.05), decimal(-0.001, 0.001))
    .map(([a, b, c, d]) => ({ kind: "poly3" as const, a, b, c, d })),
  fc
    .record({
      aU: coefficient,
      bU: coefficient,
      cU: coefficient,
      dU: coefficient,
      aV: coefficient,
      bV: coefficient,
      cV: coefficient,
      dV: coefficient,
      pRange: fc.constantFrom(...PARAM_POLY3_RANGES),
    })
    .map((coefficients) => ({ kind: "paramPoly3" as const, ...coefficients })),
);

const segmentLength = decimal(0.5, 50);

const startPose: fc.Arbitrary<Pose> = fc.record({
  x: decimal(-1e3, 1e3),
  y: decimal(-1e3, 1e3),
  hdg: decimal(-Math.PI, Math.PI),
});

/** A single geometry at an arbitrary position */
export const arbitraryGeometry: fc.Arbitrary<Geometry> = fc.record({
  s: nonNegativeLength(),
  x: length(),
  y: length(),
  hdg: angle,
  length: segmentLength.map(meters),
  shape: arbitraryShape,
  additionalData,
});

interface Segment {
  length: number;
  shape: GeometryShape;
  additionalData?: AdditionalData;
}

/** Lay segments end to end, each starting at the evaluated end of the previous one */
export function chainGeometries(start: Pose, segments: NonEmptyArray<Segment>): PlanView {
  const [first, ...rest] = segments;
  let previous: Geometry = {
    s: meters(0),
    x: meters(start.x),
    y: meters(start.y),
    hdg: radians(start.hdg),
    length: meters(first.length),
    shape: first.shape,
    additionalData: first.additionalData,
  };
  const planView: PlanView = [previous];
  for (const segment of rest) {
    const end = geometryEnd(previous);
    const next: Geometry = {
      s: meters(previous.s.value + previous.length.value),
      x: meters(end.x),
      y: meters(end.y),
      hdg: radians(end.hdg),
      length: meters(segment.length),
      shape: segment.shape,
      additionalData: segment.additionalData,
    };
    planView.push(next);
    previous = next;
  }
  return planView;
}

export const arbitraryPlanView: fc.Arbitrary<PlanView> = fc
  .tuple(startPose, nonEmpty(fc.record({ length: segmentLength, shape: arbitraryShape, additionalData }), 4))
  .map(([start, segments]) => chainGeometries(start, segments));

// ---------------------------------------------------------------------------
// Lanes
// ---------------------------------------------------------------------------

const lanePolynomial: fc.Arbitrary<LanePolynomial> = fc.record({
  sOffset: nonNegativeLength(100),
  a: coefficient,
  b: coefficient,
  c: coefficient,
  d: coefficient,
});

const laneProfile: fc.Arbitrary<LaneProfile> = nonEmpty(lanePolynomial).chain((records) => {
  const sorted = sortNonEmpty(records, (record) => record.sOffset.value);
  return fc.constantFrom<LaneProfile>({ kind: "width", records: sorted }, { kind: "border", records: sorted });
});

const roadMarkLine = fc.record({
  length: nonNegativeLength(20),
  space: nonNegativeLength(20),
  tOffset: length(-5, 5),
  sOffset: nonNegativeLength(20),
  rule: optional(fc.constantFrom(...ROAD_MARK_RULES)),
  width: optional(nonNegativeLength(1)),
  color: optional(fc.constantFrom(...ROAD_MARK_COLORS)),
});

const explicitLine = fc.record({
  length: nonNegativeLength(20),
  tOffset: length(-5, 5),
  sOffset: nonNegativeLength(20),
  rule: optional(fc.constantFrom(...ROAD_MARK_RULES)),
  width: optional(nonNegativeLength(1)),
});

export const arbitraryRoadMark: fc.Arbitrary<RoadMark> = fc.record({
  sOffset: nonNegativeLength(100),
  type: fc.constantFrom(...ROAD_MARK_TYPES),
  weight: optional(fc.constantFrom(...ROAD_MARK_WEIGHTS)),
  color: fc.constantFrom(...ROAD_MARK_COLORS),
  material: optional(text),
  width: optional(nonNegativeLength(1)),
  laneChange: optional(fc.constantFrom(...LANE_CHANGES)),
  height: optional(length(-1, 1)),
  sways: list(
    fc.record({ ds: nonNegativeLength(100), a: coefficient, b: coefficient, c: coefficient, d: coefficient }),
    2,
  ),
  typeDetail: optional(fc.record({ name: text, width: nonNegativeLength(2), lines: nonEmpty(roadMarkLine, 2) })),
  explicit: optional(nonEmpty(explicitLine, 2)),
  additionalData,
});

/** A lane with the given id */
export function arbitraryLane(laneId: number): fc.Arbitrary<Lane> {
  return fc.record({
    id: fc.constant(laneId),
    type: fc.constantFrom(...LANE_TYPES),
    level: fc.boolean(),
    link: optional(fc.record({ predecessors: list(integer(-5, 5), 2), successors: list(integer(-5, 5), 2) })),
    profile: optional(laneProfile),
    roadMarks: list(arbitraryRoadMark, 2),
    materials: list(
      fc.record({
        sOffset: nonNegativeLength(100),
        surface: optional(text),
        friction: nonNegative(2),
        roughness: optional(nonNegative(1)),
      }),
      2,
    ),
    speeds: list(
      fc.record({
        sOffset: nonNegativeLength(100),
        max: nonNegative(70),
        unit: fc.constantFrom(...SPEED_UNITS),
      }),
      2,
    ),
    access: list(
      fc.record({
        sOffset: nonNegativeLength(100),
        rule: optional(fc.constantFrom(...ACCESS_RULES)),
        restriction: fc.constantFrom(...ACCESS_RESTRICTIONS),
      }),
      2,
    ),
    heights: list(fc.record({ sOffset: nonNegativeLength(100), inner: length(-1, 1), outer: length(-1, 1) }), 2),
    rules: list(fc.record({ sOffset: nonNegativeLength(100), value: text }), 2),
    additionalData,
  });
}

/** Left lanes are numbered n..1 from the outside in, right lanes -1..-n */
function arbitrarySide(side: "left" | "right"): fc.Arbitrary<NonEmptyArray<Lane>> {
  return nonEmpty(arbitraryLane(0), 3).map((lanes) =>
    mapNonEmpty(lanes, (lane, i) => ({ ...lane, id: side === "left" ? lanes.length - i : -(i + 1) })),
  );
}

export function arbitraryLaneSection(s: number): fc.Arbitrary<LaneSection> {
  return fc.record({
    s: fc.constant(meters(s)),
    singleSide: fc.boolean(),
    left: optional(arbitrarySide("left")),
    center: arbitraryLane(0).map((lane): NonEmptyArray<Lane> => [lane]),
    right: optional(arbitrarySide("right")),
    additionalData,
  });
}

// ---------------------------------------------------------------------------
// Signals & objects
// ---------------------------------------------------------------------------

const validity: fc.Arbitrary<LaneValidity> = fc.record({ fromLane: integer(-5, 5), toLane: integer(-5, 5) });

function arbitrarySignal(span: number): fc.Arbitrary<Signal> {
  return fc.record({
    s: nonNegativeLength(span),
    t: length(-20, 20),
    id,
    name: optional(text),
    dynamic: fc.boolean(),
    orientation: fc.constantFrom(...ORIENTATIONS),
    zOffset: length(-5, 5),
    country: optional(fc.constantFrom("DE", "FR", "US")),
    countryRevision: optional(text),
    type: text,
    subtype: text,
    value: optional(decimal()),
    unit: optional(fc.constantFrom(...SIGNAL_UNITS)),
    height: optional(nonNegativeLength(5)),
    width: optional(nonNegativeLength(5)),
    text: optional(text),
    hOffset: optional(angle),
    pitch: optional(angle),
    roll: optional(angle),
    validities: list(validity, 2),
    dependencies: list(fc.record({ id, type: optional(text) }), 2),
    references: list(
      fc.record({
        elementType: fc.constantFrom(...REFERENCE_ELEMENT_TYPES),
        elementId: id,
        type: optional(text),
      }),
      2,
    ),
    additionalData,
  });
}

export function arbitrarySignals(span: number): fc.Arbitrary<Signals> {
  const signalReference: fc.Arbitrary<SignalReference> = fc.record({
    s: nonNegativeLength(span),
    t: length(-20, 20),
    id,
    orientation: fc.constantFrom(...ORIENTATIONS),
    validities: list(validity, 2),
  });
  return fc.record({ signals: list(arbitrarySignal(span), 2), signalReferences: list(signalReference, 2) });
}

function arbitraryObject(span: number): fc.Arbitrary<RoadObject> {
  return fc.record({
    t: length(-20, 20),
    zOffset: length(-5, 5),
    type: optional(fc.constantFrom(...OBJECT_TYPES)),
    subtype: optional(text),
    validLength: optional(nonNegativeLength(span)),
    orientation: optional(fc.constantFrom(...ORIENTATIONS)),
    radius: optional(nonNegativeLength(10)),
    length: optional(nonNegativeLength(10)),
    height: optional(nonNegativeLength(10)),
    width: optional(nonNegativeLength(10)),
    hdg: optional(angle),
    pitch: optional(angle),
    roll: optional(angle),
    id,
    name: optional(text),
    s: nonNegativeLength(span),
    dynamic: optional(fc.boolean()),
    perpToRoad: optional(fc.boolean()),
    repeats: list(
      fc.record({
        s: nonNegativeLength(span),
        length: nonNegativeLength(span),
        distance: nonNegativeLength(20),
        tStart: length(-20, 20),
        tEnd: length(-20, 20),
        heightStart: nonNegativeLength(10),
        heightEnd: nonNegativeLength(10),
        zOffsetStart: length(-5, 5),
        zOffsetEnd: length(-5, 5),
        widthStart: optional(nonNegativeLength(10)),
        widthEnd: optional(nonNegativeLength(10)),
        lengthStart: optional(nonNegativeLength(10)),
        lengthEnd: optional(nonNegativeLength(10)),
        radiusStart: optional(nonNegativeLength(10)),
        radiusEnd: optional(nonNegativeLength(10)),
      }),
      2,
    ),
    validities: list(validity, 2),
    additionalData,
  });
}

export function arbitraryObjects(span: number): fc.Arbitrary<RoadObjects> {
  const objectReference: fc.Arbitrary<ObjectReference> = fc.record({
    s: nonNegativeLength(span),
    t: length(-20, 20),
    id,
    zOffset: optional(length(-5, 5)),
    validLength: optional(nonNegativeLength(span)),
    orientation: fc.constantFrom(...ORIENTATIONS),
    validities: list(validity, 2),
  });
  const tunnel: fc.Arbitrary<Tunnel> = fc.record({
    s: nonNegativeLength(span),
    length: nonNegativeLength(span),
    name: optional(text),
    id,
    type: fc.constantFrom(...TUNNEL_TYPES),
    lighting: optional(unitInterval),
    daylight: optional(unitInterval),
    validities: list(validity, 2),
  });
  const bridge: fc.Arbitrary<Bridge> = fc.record({
    s: nonNegativeLength(span),
    length: nonNegativeLength(span),
    name: optional(text),
    id,
    type: fc.constantFrom(...BRIDGE_TYPES),
    validities: list(validity, 2),
  });
  return fc.record({
    objects: list(arbitraryObject(span), 2),
    objectReferences: list(objectReference, 2),
    tunnels: list(tunnel, 1),
    bridges: list(bridge, 1),
  });
}

// ---------------------------------------------------------------------------
// Road
// ---------------------------------------------------------------------------

const linkTarget: fc.Arbitrary<RoadLinkTarget> = fc.record({
  elementType: fc.constantFrom(...ELEMENT_TYPES),
  elementId: id,
  contactPoint: optional(fc.constantFrom(...CONTACT_POINTS)),
  elementS: optional(nonNegativeLength(100)),
  elementDir: optional(fc.constantFrom(...ELEMENT_DIRS)),
});

function roadTypes(span: number): fc.Arbitrary<RoadTypeEntry[]> {
  const speed = fc.record({
    max: fc.oneof(nonNegative(70), fc.constantFrom("no limit" as const, "undefined" as const)),
    unit: fc.constantFrom(...SPEED_UNITS),
  });
  return fc
    .integer({ min: 0, max: 2 })
    .chain((count) =>
      fc.tuple(
        sortedOffsets(count, span),
        fc.array(
          fc.record({
            type: fc.constantFrom(...ROAD_TYPES),
            country: optional(fc.constantFrom("DE", "FR", "US")),
            speed: optional(speed),
          }),
          { minLength: count, maxLength: count },
        ),
      ),
    )
    .map(([offsets, entries]) => entries.map((entry, i) => ({ s: meters(offsets[i] ?? 0), ...entry })));
}

function laneSections(span: number): fc.Arbitrary<NonEmptyArray<LaneSection>> {
  return fc
    .integer({ min: 1, max: 3 })
    .chain((count) => sortedOffsets(count, span))
    .chain((offsets) => {
      const [first = 0, ...rest] = offsets;
      return fc.tuple(arbitraryLaneSection(first), fc.tuple(...rest.map(arbitraryLaneSection)));
    })
    .map(([head, tail]): NonEmptyArray<LaneSection> => [head, ...tail]);
}

/**
 * A road with a chained plan view; `junction` supplies the owning
 * junction id ({@link NO_JUNCTION} for ordinary roads).
 */
export function arbitraryRoad(junction: fc.Arbitrary<string> = fc.constant(NO_JUNCTION)): fc.Arbitrary<Road> {
  return arbitraryPlanView.chain((planView) => {
    const last = planView[planView.length - 1] ?? planView[0];
    const span = last.s.value + last.length.value;
    return fc.record({
      id,
      name: optional(text),
      length: fc.constant(meters(span)),
      junction,
      rule: fc.constantFrom(...TRAFFIC_RULES),
      link: optional(fc.record({ predecessor: optional(linkTarget), successor: optional(linkTarget) })),
      types: roadTypes(span),
      planView: fc.constant(planView),
      elevationProfile: optional(roadPolynomials(span).map((elevations) => ({ elevations }))),
      lateralProfile: optional(
        fc.record({
          superelevations: roadPolynomials(span),
          shapes: list(
            fc.record({
              s: nonNegativeLength(span),
              t: length(-20, 20),
              a: coefficient,
              b: coefficient,
              c: coefficient,
              d: coefficient,
            }),
            2,
          ),
        }),
      ),
      lanes: fc.record({ laneOffsets: roadPolynomials(span, 2), laneSections: laneSections(span) }),
      objects: optional(arbitraryObjects(span)),
      signals: optional(arbitrarySignals(span)),
      additionalData,
    });
  });
}

// ---------------------------------------------------------------------------
// Junctions & controllers
// ---------------------------------------------------------------------------

const connectionEnd: fc.Arbitrary<ConnectionEnd> = fc.record({
  elementType: fc.constantFrom(...ELEMENT_TYPES),
  elementId: id,
  elementS: nonNegativeLength(100),
  elementDir: fc.constantFrom(...ELEMENT_DIRS),
});

const connection: fc.Arbitrary<Connection> = fc.record({
  id,
  type: fc.constantFrom(...CONNECTION_TYPES),
  incomingRoad: optional(id),
  connectingRoad: optional(id),
  linkedRoad: optional(id),
  contactPoint: optional(fc.constantFrom(...CONTACT_POINTS)),
  predecessor: optional(connectionEnd),
  successor: optional(connectionEnd),
  laneLinks: list(fc.record({ from: integer(-5, 5), to: integer(-5, 5) }), 3),
  additionalData,
});

export const arbitraryJunction: fc.Arbitrary<Junction> = fc.record({
  id,
  name: optional(text),
  type: fc.constantFrom(...JUNCTION_TYPES),
  mainRoad: optional(id),
  sStart: optional(nonNegativeLength(100)),
  sEnd: optional(nonNegativeLength(100)),
  orientation: optional(fc.constantFrom(...ORIENTATIONS)),
  connections: nonEmpty(connection, 3),
  priorities: list(fc.record({ high: optional(id), low: optional(id) }), 2),
  controllers: list(fc.record({ id, type: optional(text), sequence: optional(integer(0, 100)) }), 2),
  additionalData,
});

export const arbitraryJunctionGroup: fc.Arbitrary<JunctionGroup> = fc.record({
  id,
  name: optional(text),
  type: fc.constantFrom(...JUNCTION_GROUP_TYPES),
  junctions: nonEmpty(id, 3),
});

export const arbitraryController: fc.Arbitrary<Controller> = fc.record({
  id,
  name: optional(text),
  sequence: optional(integer(0, 100)),
  controls: nonEmpty(fc.record({ signalId: id, type: optional(text) }), 3),
  additionalData,
});

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export const arbitraryHeader: fc.Arbitrary<Header> = fc.record({
  revMajor: fc.constant(OPENDRIVE_REV_MAJOR),
  revMinor: integer(0, OPENDRIVE_REV_MINOR),
  name: optional(text),
  version: optional(text),
  date: optional(text),
  north: optional(length()),
  south: optional(length()),
  east: optional(length()),
  west: optional(length()),
  vendor: optional(text),
  geoReference: optional(fc.oneof(elementText, fc.constant("+proj=utm +zone=32 +ellps=WGS84 +units=m +no_defs"))),
  offset: optional(fc.record({ x: length(), y: length(), z: length(), hdg: angle })),
  additionalData,
});

export const arbitraryDocument: fc.Arbitrary<OpenDrive> = fc
  .record({
    header: arbitraryHeader,
    controllers: list(arbitraryController, 2),
    junctions: list(arbitraryJunction, 2),
    junctionGroups: list(arbitraryJunctionGroup, 1),
    additionalData,
  })
  .chain((document) => {
    const junctionIds = [NO_JUNCTION, ...document.junctions.map((junction) => junction.id)];
    return list(arbitraryRoad(fc.constantFrom(...junctionIds)), 3).map((roads) => ({ ...document, roads }));
  });
