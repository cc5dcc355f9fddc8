/**
 * OpenDRIVE writer.
 *
 * typed document → element tree in schema order → XML text. Optional
 * fields equal to their schema default are left out. Output is the same
 * under every workaround configuration: both flags only relax reading.
 */

import type { OpenDrive } from "@opendrive-codec/types";
import { buildXml } from "../xml/index.js";
import { ElementWriter } from "./context.js";
import { writeHeader } from "./header.js";
import { writeJunction, writeJunctionGroup } from "./junction.js";
import { writeRoad } from "./road.js";
import { writeController } from "./signals.js";

export { ElementWriter } from "./context.js";

export interface WriteOptions {
  /** Indentation per level (default two spaces); empty for single-line output */
  indent?: string;
  /** Log a summary line to the console */
  verbose?: boolean;
}

/**
 * Write an OpenDRIVE document.
 *
 * @throws WriteError for values XML cannot carry (non-finite numbers,
 *   forbidden characters)
 */
export function writeOpenDrive(document: OpenDrive, options: WriteOptions = {}): string {
  const startTime = performance.now();
  const w = new ElementWriter("OpenDRIVE", "OpenDRIVE");

  w.child("header", (h) => writeHeader(h, document.header));
  w.each("road", document.roads, writeRoad);
  w.each("controller", document.controllers, writeController);
  w.each("junction", document.junctions, writeJunction);
  w.each("junctionGroup", document.junctionGroups, writeJunctionGroup);
  w.additionalData(document.additionalData);

  const xml = buildXml(w.element, options.indent ?? "  ");
  if (options.verbose) {
    const elapsed = (performance.now() - startTime).toFixed(1);
    console.log(
      `[writer] Wrote ${document.roads.length} roads, ${document.junctions.length} junctions (${xml.length} chars) in ${elapsed}ms`,
    );
  }
  return xml;
}

/** {@link writeOpenDrive} encoded as UTF-8 */
export function writeOpenDriveBytes(document: OpenDrive, options: WriteOptions = {}): Uint8Array {
  return new TextEncoder().encode(writeOpenDrive(document, options));
}
