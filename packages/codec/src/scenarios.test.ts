import { describe, it, expect } from "vitest";
import { meters, radians } from "@opendrive-codec/types";
import type { Geometry } from "@opendrive-codec/types";
import { ReadError } from "./errors.js";
import { evaluateGeometry } from "./geometry/index.js";
import { readOpenDrive, tryReadOpenDrive } from "./reader/index.js";
import { SUMO, resolveWorkarounds } from "./workarounds.js";
import { writeOpenDrive } from "./writer/index.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const LANES = `<lanes><laneSection s="0">
  <center><lane id="0" type="none"/></center>
  <right><lane id="-1" type="driving"><width sOffset="0" a="3.5" b="0" c="0" d="0"/><roadMark sOffset="0" type="solid" color="standard"/></lane></right>
</laneSection></lanes>`;

function makeXml(road: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<OpenDRIVE>
  <header revMajor="1" revMinor="7"/>
  ${road}
</OpenDRIVE>`;
}

function expectReadError(xml: string): ReadError {
  const result = tryReadOpenDrive(xml);
  if (result.ok) throw new Error("expected the read to fail");
  return result.error;
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("scenarios", () => {
  it("evaluates a straight line at its midpoint", () => {
    const line: Geometry = {
      s: meters(0),
      x: meters(0),
      y: meters(0),
      hdg: radians(0),
      length: meters(10),
      shape: { kind: "line" },
    };
    expect(evaluateGeometry(line, 5)).toEqual({ x: 5, y: 0, hdg: 0 });
  });

  it("reads paramPoly3 without pRange only with the SUMO workaround", () => {
    const xml = makeXml(`<road length="10" id="1" junction="-1">
      <planView><geometry s="0" x="0" y="0" hdg="0" length="10">
        <paramPoly3 aU="0" bU="10" cU="0" dU="0" aV="0" bV="0" cV="0" dV="0"/>
      </geometry></planView>${LANES}</road>`);

    const sumo = readOpenDrive(xml, { workarounds: resolveWorkarounds(["workaround-sumo-issue-10301"]) });
    const shape = sumo.document.roads[0]?.planView[0].shape;
    expect(shape?.kind === "paramPoly3" ? shape.pRange : undefined).toBe("normalized");

    const err = expectReadError(xml);
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context.field).toBe("pRange");
  });

  it("rejects a gap between consecutive geometries", () => {
    const xml = makeXml(`<road length="16" id="1" junction="-1">
      <planView>
        <geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry>
        <geometry s="11" x="11" y="0" hdg="0" length="5"><line/></geometry>
      </planView>${LANES}</road>`);

    const err = expectReadError(xml);
    expect(err.kind).toBe("StructuralViolation");
    expect(err.rule).toBe("geometry-gap");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]/planView[0]/geometry[1]", field: "s" });
    expect(err.message).toBe("Gap before geometry 1: previous segment ends at s=10, this one starts at s=11");
  });

  it("rejects two lanes with the same id on one side", () => {
    const lanes = `<lanes><laneSection s="0">
      <center><lane id="0" type="none"/></center>
      <right>
        <lane id="1" type="driving"/>
        <lane id="1" type="driving"/>
      </right>
    </laneSection></lanes>`;
    const xml = makeXml(`<road length="10" id="1" junction="-1">
      <planView><geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry></planView>${lanes}</road>`);

    const err = expectReadError(xml);
    expect(err.kind).toBe("StructuralViolation");
    expect(err.rule).toBe("duplicate-lane-id");
    expect(err.context).toEqual({
      path: "OpenDRIVE/road[0]/lanes[0]/laneSection[0]/right[0]/lane[1]",
      field: "id",
    });
  });

  it("fills in road mark colors the source left out only with the SUMO workaround", () => {
    const lanes = LANES.replace(' color="standard"', "");
    const xml = makeXml(`<road length="10" id="1" junction="-1">
      <planView><geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry></planView>${lanes}</road>`);

    const { document } = readOpenDrive(xml, { workarounds: SUMO });
    expect(writeOpenDrive(document)).toContain('<roadMark sOffset="0" type="solid" color="standard"/>');

    const err = expectReadError(xml);
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context.field).toBe("color");
  });
});
