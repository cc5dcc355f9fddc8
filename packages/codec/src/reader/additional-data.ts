/**
 * The additional-data group: userData, include, dataQuality.
 *
 * userData content is schema-free, so its child elements are carried as
 * opaque elements and written back unchanged.
 */

import type { AdditionalData, DataQuality, OpaqueElement, UserData } from "@opendrive-codec/types";
import { DATA_SOURCES, POST_PROCESSING } from "@opendrive-codec/types";
import type { XmlElement } from "../xml/index.js";
import type { ElementReader } from "./context.js";

export const ADDITIONAL_DATA_ELEMENTS: ReadonlySet<string> = new Set(["userData", "include", "dataQuality"]);

export function toOpaqueElement(element: XmlElement): OpaqueElement {
  return {
    name: element.name,
    attributes: [...element.attributes.entries()],
    children: element.children.map(toOpaqueElement),
    text: element.text,
  };
}

function readUserData(r: ElementReader): UserData {
  const userData: UserData = {
    code: r.optionalString("code"),
    value: r.optionalString("value"),
    content: r.element.children.map(toOpaqueElement),
  };
  const text = r.text();
  if (text !== "") userData.text = text;
  return userData;
}

function readDataQuality(r: ElementReader): DataQuality {
  const quality: DataQuality = {};
  r.children(
    {
      error: (e) => {
        quality.error = {
          xyAbsolute: e.decimal("xyAbsolute"),
          zAbsolute: e.decimal("zAbsolute"),
          xyRelative: e.decimal("xyRelative"),
          zRelative: e.decimal("zRelative"),
        };
      },
      rawData: (d) => {
        quality.rawData = {
          date: d.string("date"),
          source: d.enumeration("source", DATA_SOURCES),
          sourceComment: d.optionalString("sourceComment"),
          postProcessing: d.enumeration("postProcessing", POST_PROCESSING),
          postProcessingComment: d.optionalString("postProcessingComment"),
        };
      },
    },
    { single: ["error", "rawData"] },
  );
  return quality;
}

/** Add one additional-data child to `data` */
export function readAdditionalDataElement(r: ElementReader, data: AdditionalData): void {
  switch (r.element.name) {
    case "userData":
      data.userData.push(readUserData(r));
      break;
    case "include":
      data.include.push({ file: r.string("file") });
      break;
    case "dataQuality":
      if (data.dataQuality !== undefined) {
        r.report("DuplicateElement", r.path, "dataQuality", "<dataQuality> may appear only once; repeat ignored");
        r.text();
        return;
      }
      data.dataQuality = readDataQuality(r);
      break;
  }
}
