/**
 * Enumerated vocabularies of OpenDRIVE 1.7.
 *
 * Each vocabulary is a const tuple of the exact tokens the standard allows;
 * the union type is derived from it so reader, writer and the fuzz
 * generators all share one source of truth.
 */

// ---------------------------------------------------------------------------
// Road
// ---------------------------------------------------------------------------

/** Traffic rule: right-hand or left-hand traffic */
export const TRAFFIC_RULES = ["RHT", "LHT"] as const;
export type TrafficRule = (typeof TRAFFIC_RULES)[number];

export const ROAD_TYPES = [
  "unknown",
  "rural",
  "motorway",
  "town",
  "lowSpeed",
  "pedestrian",
  "bicycle",
  "townExpressway",
  "townCollector",
  "townArterial",
  "townPrivate",
  "townLocal",
  "townPlayStreet",
] as const;
export type RoadType = (typeof ROAD_TYPES)[number];

export const SPEED_UNITS = ["m/s", "mph", "km/h"] as const;
export type SpeedUnit = (typeof SPEED_UNITS)[number];

/** Units a signal value may carry (distance, speed, mass, slope) */
export const SIGNAL_UNITS = ["m", "km", "ft", "mile", "m/s", "mph", "km/h", "kg", "t", "%"] as const;
export type SignalUnit = (typeof SIGNAL_UNITS)[number];

export const ELEMENT_TYPES = ["road", "junction"] as const;
export type ElementType = (typeof ELEMENT_TYPES)[number];

export const CONTACT_POINTS = ["start", "end"] as const;
export type ContactPoint = (typeof CONTACT_POINTS)[number];

export const ELEMENT_DIRS = ["+", "-"] as const;
export type ElementDir = (typeof ELEMENT_DIRS)[number];

/** Parameter range of a paramPoly3 curve */
export const PARAM_POLY3_RANGES = ["arcLength", "normalized"] as const;
export type ParamPoly3Range = (typeof PARAM_POLY3_RANGES)[number];

// ---------------------------------------------------------------------------
// Lanes
// ---------------------------------------------------------------------------

export const LANE_TYPES = [
  "shoulder",
  "border",
  "driving",
  "stop",
  "none",
  "restricted",
  "parking",
  "median",
  "biking",
  "sidewalk",
  "curb",
  "exit",
  "entry",
  "onRamp",
  "offRamp",
  "connectingRamp",
  "bidirectional",
  "special1",
  "special2",
  "special3",
  "roadWorks",
  "tram",
  "rail",
  "bus",
  "taxi",
  "HOV",
] as const;
export type LaneType = (typeof LANE_TYPES)[number];

export const ROAD_MARK_TYPES = [
  "none",
  "solid",
  "broken",
  "solid solid",
  "solid broken",
  "broken solid",
  "broken broken",
  "botts dots",
  "grass",
  "curb",
  "custom",
  "edge",
] as const;
export type RoadMarkType = (typeof ROAD_MARK_TYPES)[number];

export const ROAD_MARK_COLORS = [
  "standard",
  "blue",
  "green",
  "red",
  "white",
  "yellow",
  "orange",
  "violet",
] as const;
export type RoadMarkColor = (typeof ROAD_MARK_COLORS)[number];

export const ROAD_MARK_WEIGHTS = ["standard", "bold"] as const;
export type RoadMarkWeight = (typeof ROAD_MARK_WEIGHTS)[number];

export const ROAD_MARK_RULES = ["no passing", "caution", "none"] as const;
export type RoadMarkRule = (typeof ROAD_MARK_RULES)[number];

/** Whether a lane change across the mark is allowed, and in which direction */
export const LANE_CHANGES = ["increase", "decrease", "both", "none"] as const;
export type LaneChange = (typeof LANE_CHANGES)[number];

export const ACCESS_RULES = ["allow", "deny"] as const;
export type AccessRule = (typeof ACCESS_RULES)[number];

export const ACCESS_RESTRICTIONS = [
  "simulator",
  "autonomousTraffic",
  "pedestrian",
  "passengerCar",
  "bus",
  "delivery",
  "emergency",
  "taxi",
  "throughTraffic",
  "truck",
  "bicycle",
  "motorcycle",
  "none",
  "trucks",
] as const;
export type AccessRestriction = (typeof ACCESS_RESTRICTIONS)[number];

// ---------------------------------------------------------------------------
// Junctions
// ---------------------------------------------------------------------------

export const JUNCTION_TYPES = ["default", "virtual", "direct"] as const;
export type JunctionType = (typeof JUNCTION_TYPES)[number];

export const CONNECTION_TYPES = ["default", "virtual"] as const;
export type ConnectionType = (typeof CONNECTION_TYPES)[number];

export const JUNCTION_GROUP_TYPES = ["roundabout", "unknown"] as const;
export type JunctionGroupType = (typeof JUNCTION_GROUP_TYPES)[number];

// ---------------------------------------------------------------------------
// Signals & objects
// ---------------------------------------------------------------------------

/** Facing direction relative to the reference line ("none" = both) */
export const ORIENTATIONS = ["+", "-", "none"] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

export const REFERENCE_ELEMENT_TYPES = ["object", "signal"] as const;
export type ReferenceElementType = (typeof REFERENCE_ELEMENT_TYPES)[number];

export const OBJECT_TYPES = [
  "none",
  "obstacle",
  "car",
  "pole",
  "tree",
  "vegetation",
  "barrier",
  "building",
  "parkingSpace",
  "patch",
  "railing",
  "trafficIsland",
  "crosswalk",
  "streetLamp",
  "gantry",
  "soundBarrier",
  "van",
  "bus",
  "trailer",
  "bike",
  "motorbike",
  "tram",
  "train",
  "pedestrian",
  "wind",
  "roadMark",
] as const;
export type ObjectType = (typeof OBJECT_TYPES)[number];

export const TUNNEL_TYPES = ["standard", "underpass"] as const;
export type TunnelType = (typeof TUNNEL_TYPES)[number];

export const BRIDGE_TYPES = ["concrete", "steel", "brick", "wood"] as const;
export type BridgeType = (typeof BRIDGE_TYPES)[number];

// ---------------------------------------------------------------------------
// Data quality
// ---------------------------------------------------------------------------

export const DATA_SOURCES = ["sensor", "cadaster", "custom"] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

export const POST_PROCESSING = ["raw", "cleaned", "processed", "fused"] as const;
export type PostProcessing = (typeof POST_PROCESSING)[number];

/** True when `token` is one of `vocabulary`'s exact tokens */
export function isVocabularyToken<const T extends readonly string[]>(
  vocabulary: T,
  token: string,
): token is T[number] {
  return vocabulary.includes(token);
}
