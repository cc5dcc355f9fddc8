/**
 * Header writer.
 */

import type { Header } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";

export function writeHeader(w: ElementWriter, header: Header): void {
  w.integer("revMajor", header.revMajor)
    .integer("revMinor", header.revMinor)
    .string("name", header.name)
    .string("version", header.version)
    .string("date", header.date)
    .quantity("north", header.north)
    .quantity("south", header.south)
    .quantity("east", header.east)
    .quantity("west", header.west)
    .string("vendor", header.vendor);

  const { geoReference, offset } = header;
  if (geoReference !== undefined) {
    w.child("geoReference", (g) => {
      if (geoReference !== "") g.cdata(geoReference);
    });
  }
  if (offset !== undefined) {
    w.child("offset", (o) => {
      o.quantity("x", offset.x).quantity("y", offset.y).quantity("z", offset.z).quantity("hdg", offset.hdg);
    });
  }
  w.additionalData(header.additionalData);
}
