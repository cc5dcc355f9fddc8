/**
 * @opendrive-codec/types
 *
 * Typed model of an ASAM OpenDRIVE 1.7 road network.
 *
 * - Units: magnitudes tagged with their implicit unit
 * - Vocabulary: the standard's enumerated tokens
 * - Geometry: reference-line curve segments
 * - Road, Lanes, Junction, Signals, Objects: the element tree
 * - Document: header and root
 */

export * from "./units.js";
export * from "./vocabulary.js";
export * from "./core.js";
export * from "./geometry.js";
export * from "./road.js";
export * from "./lanes.js";
export * from "./junction.js";
export * from "./signals.js";
export * from "./objects.js";
export * from "./document.js";
