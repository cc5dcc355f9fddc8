/**
 * Header reader, including the version gate.
 */

import type { Header } from "@opendrive-codec/types";
import { OPENDRIVE_REV_MAJOR, OPENDRIVE_REV_MINOR } from "@opendrive-codec/types";
import { ReadError } from "../errors.js";
import type { ElementReader } from "./context.js";

/** revMajor must be 1 and revMinor between 0 and 7 */
export function readVersion(r: ElementReader): { revMajor: number; revMinor: number } {
  const revMajor = r.integer("revMajor");
  const revMinor = r.integer("revMinor");
  if (revMajor !== OPENDRIVE_REV_MAJOR || revMinor < 0 || revMinor > OPENDRIVE_REV_MINOR) {
    throw new ReadError(
      "UnsupportedVersion",
      `OpenDRIVE ${revMajor}.${revMinor} is not supported (expected ${OPENDRIVE_REV_MAJOR}.0 to ${OPENDRIVE_REV_MAJOR}.${OPENDRIVE_REV_MINOR})`,
      { path: r.path, field: "revMinor", rawText: `${revMajor}.${revMinor}` },
    );
  }
  return { revMajor, revMinor };
}

export function readHeader(r: ElementReader): Header {
  const { revMajor, revMinor } = readVersion(r);

  const header: Header = {
    revMajor,
    revMinor,
    name: r.optionalString("name"),
    version: r.optionalString("version"),
    date: r.optionalString("date"),
    north: r.optionalLength("north"),
    south: r.optionalLength("south"),
    east: r.optionalLength("east"),
    west: r.optionalLength("west"),
    vendor: r.optionalString("vendor"),
  };

  header.additionalData = r.children(
    {
      geoReference: (g) => {
        header.geoReference = g.text();
      },
      offset: (o) => {
        header.offset = {
          x: o.length("x"),
          y: o.length("y"),
          z: o.length("z"),
          hdg: o.angle("hdg"),
        };
      },
    },
    { single: ["geoReference", "offset"], additionalData: true },
  );
  return header;
}
