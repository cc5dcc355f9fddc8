import { describe, it, expect } from "vitest";
import type { OpenDrive } from "@opendrive-codec/types";
import { readOpenDrive } from "../reader/index.js";
import { DocumentIndex } from "./document-index.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeRoadXml(attributes: string, link = ""): string {
  return `<road ${attributes}>
    ${link}
    <planView><geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry></planView>
    <lanes><laneSection s="0"><center><lane id="0" type="none"/></center></laneSection></lanes>
  </road>`;
}

function makeDocument(): OpenDrive {
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<OpenDRIVE>
  <header revMajor="1" revMinor="7"/>
  ${makeRoadXml(
    'name="main" length="10" id="1" junction="-1"',
    '<link><predecessor elementType="junction" elementId="3"/><successor elementType="road" elementId="8" contactPoint="start"/></link>',
  )}
  ${makeRoadXml('length="10" id="5" junction="3"')}
  ${makeRoadXml('length="10" id="6" junction="3"', '<link><successor elementType="road" elementId="1" contactPoint="end"/></link>')}
  ${makeRoadXml('name="copy" length="10" id="1" junction="-1"')}
  ${makeRoadXml('length="10" id="9" junction="4"')}
  <controller id="c1"><control signalId="s1"/></controller>
  <junction id="3">
    <connection id="0" incomingRoad="1" connectingRoad="5" contactPoint="start"/>
  </junction>
  <junctionGroup id="g1" type="roundabout"><junctionReference junction="3"/></junctionGroup>
</OpenDRIVE>`;
  return readOpenDrive(xml).document;
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("DocumentIndex", () => {
  const document = makeDocument();
  const index = new DocumentIndex(document);

  it("finds elements by id", () => {
    expect(index.road("5")?.junction).toBe("3");
    expect(index.junction("3")?.connections[0].connectingRoad).toBe("5");
    expect(index.controller("c1")?.controls[0].signalId).toBe("s1");
    expect(index.junctionGroup("g1")?.junctions).toEqual(["3"]);
    expect(index.road("missing")).toBeUndefined();
  });

  it("keeps the first element when ids repeat", () => {
    expect(index.road("1")?.name).toBe("main");
  });

  it("lists the roads of a junction in document order", () => {
    expect(index.roadsInJunction("3").map((road) => road.id)).toEqual(["5", "6"]);
    expect(index.roadsInJunction("-1")).toEqual([]);
  });

  it("returns a copy of the junction's road list", () => {
    index.roadsInJunction("3").pop();
    expect(index.roadsInJunction("3")).toHaveLength(2);
  });

  it("resolves the junction of a road", () => {
    const [main, connecting] = document.roads;
    expect(main && index.roadJunction(main)).toBeUndefined();
    expect(connecting && index.roadJunction(connecting)?.id).toBe("3");
  });

  it("resolves road links to roads and junctions", () => {
    expect(index.resolveLink({ elementType: "junction", elementId: "3" })?.kind).toBe("junction");
    const linked = index.resolveLink({ elementType: "road", elementId: "6", contactPoint: "end" });
    expect(linked?.kind === "road" ? linked.road.id : undefined).toBe("6");
    expect(index.resolveLink({ elementType: "road", elementId: "3" })).toBeUndefined();
  });

  it("reports link targets missing from the document", () => {
    const unresolved = index.unresolvedLinks();
    expect(unresolved.map(({ road, end, target }) => [road.id, end, target.elementId])).toEqual([
      ["1", "successor", "8"],
    ]);
  });
});
