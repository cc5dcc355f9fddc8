import { describe, it, expect, vi, afterEach } from "vitest";
import { meters, radians } from "@opendrive-codec/types";
import type { Lane } from "@opendrive-codec/types";
import { ReadError } from "../errors.js";
import { SUMO } from "../workarounds.js";
import { readOpenDrive, tryReadOpenDrive } from "./index.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const HEADER = '<header revMajor="1" revMinor="7"/>';

const PLAN_VIEW =
  '<planView><geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry></planView>';

const LANES = `<lanes><laneSection s="0">
  <center><lane id="0" type="none"/></center>
  <right><lane id="-1" type="driving"><width sOffset="0" a="3.5" b="0" c="0" d="0"/><roadMark sOffset="0" type="solid" color="standard"/></lane></right>
</laneSection></lanes>`;

function makeXml(...elements: string[]): string {
  return ['<?xml version="1.0" encoding="UTF-8"?>', "<OpenDRIVE>", ...elements, "</OpenDRIVE>"].join("\n");
}

function makeRoadXml(
  options: { attributes?: string; planView?: string; lanes?: string; extra?: string } = {},
): string {
  const attributes = options.attributes ?? 'length="10" id="1" junction="-1"';
  return `<road ${attributes}>${options.planView ?? PLAN_VIEW}${options.lanes ?? LANES}${options.extra ?? ""}</road>`;
}

function makeLane(id: number, overrides: Partial<Lane> = {}): Lane {
  return {
    id,
    type: "driving",
    level: false,
    roadMarks: [],
    materials: [],
    speeds: [],
    access: [],
    heights: [],
    rules: [],
    ...overrides,
  };
}

function readError(xml: string, options = {}): ReadError {
  const result = tryReadOpenDrive(xml, options);
  if (result.ok) throw new Error("expected the read to fail");
  return result.error;
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("readOpenDrive", () => {
  it("reads a minimal road and fills schema defaults", () => {
    const { document, diagnostics } = readOpenDrive(makeXml(HEADER, makeRoadXml()));

    expect(diagnostics).toEqual([]);
    expect(document.header).toEqual({ revMajor: 1, revMinor: 7 });
    expect(document.roads).toEqual([
      {
        id: "1",
        length: meters(10),
        junction: "-1",
        rule: "RHT",
        types: [],
        planView: [
          { s: meters(0), x: meters(0), y: meters(0), hdg: radians(0), length: meters(10), shape: { kind: "line" } },
        ],
        lanes: {
          laneOffsets: [],
          laneSections: [
            {
              s: meters(0),
              singleSide: false,
              center: [makeLane(0, { type: "none" })],
              right: [
                makeLane(-1, {
                  profile: { kind: "width", records: [{ sOffset: meters(0), a: 3.5, b: 0, c: 0, d: 0 }] },
                  roadMarks: [{ sOffset: meters(0), type: "solid", color: "standard", sways: [] }],
                }),
              ],
            },
          ],
        },
      },
    ]);
  });

  it("reads the header with geoReference and offset", () => {
    const header = `<header revMajor="1" revMinor="6" name="Test" vendor="Acme">
      <geoReference><![CDATA[+proj=utm +zone=32]]></geoReference>
      <offset x="1" y="2" z="0" hdg="0.5"/>
    </header>`;
    const { document } = readOpenDrive(makeXml(header));
    expect(document.header).toEqual({
      revMajor: 1,
      revMinor: 6,
      name: "Test",
      vendor: "Acme",
      geoReference: "+proj=utm +zone=32",
      offset: { x: meters(1), y: meters(2), z: meters(0), hdg: radians(0.5) },
    });
  });

  it("accepts UTF-8 bytes", () => {
    const xml = makeXml(HEADER, makeRoadXml({ attributes: 'name="Hauptstraße" length="10" id="1" junction="-1"' }));
    const { document } = readOpenDrive(new TextEncoder().encode(xml));
    expect(document.roads[0]?.name).toBe("Hauptstraße");
  });

  it("decodes character references in attribute values", () => {
    const xml = makeXml(HEADER, makeRoadXml({ attributes: 'name="Stra&#223;e&#10;x" length="10" id="1" junction="-1"' }));
    expect(readOpenDrive(xml).document.roads[0]?.name).toBe("Straße\nx");
  });

  it("keeps userData content as opaque elements", () => {
    const extra = '<userData code="c" value="v"><vendor key="k">hello</vendor></userData><include file="extra.xml"/>';
    const { document } = readOpenDrive(makeXml(HEADER, makeRoadXml({ extra })));
    expect(document.roads[0]?.additionalData).toEqual({
      include: [{ file: "extra.xml" }],
      userData: [
        {
          code: "c",
          value: "v",
          content: [{ name: "vendor", attributes: [["key", "k"]], children: [], text: "hello" }],
        },
      ],
    });
  });

  it("reads road links, types and speed limits", () => {
    const road = makeRoadXml({
      attributes: 'length="10" id="7" junction="-1" rule="LHT"',
      planView: `<link><predecessor elementType="junction" elementId="3"/><successor elementType="road" elementId="8" contactPoint="start"/></link>
        <type s="0" type="town" country="DE"><speed max="50" unit="km/h"/></type>
        <type s="5" type="rural"><speed max="no limit"/></type>${PLAN_VIEW}`,
    });
    const parsed = readOpenDrive(makeXml(HEADER, road)).document.roads[0];
    expect(parsed?.rule).toBe("LHT");
    expect(parsed?.link).toEqual({
      predecessor: { elementType: "junction", elementId: "3" },
      successor: { elementType: "road", elementId: "8", contactPoint: "start" },
    });
    expect(parsed?.types).toEqual([
      { s: meters(0), type: "town", country: "DE", speed: { max: 50, unit: "km/h" } },
      { s: meters(5), type: "rural", speed: { max: "no limit", unit: "m/s" } },
    ]);
  });

  it("reads junctions and controllers", () => {
    const junction = `<junction name="X" id="3">
      <connection id="0" incomingRoad="1" connectingRoad="5" contactPoint="start"><laneLink from="-1" to="-1"/></connection>
      <priority high="5" low="6"/>
    </junction>`;
    const controller = '<controller id="c1" sequence="2"><control signalId="s1" type="0"/></controller>';
    const { document } = readOpenDrive(makeXml(HEADER, controller, junction));
    expect(document.junctions).toEqual([
      {
        id: "3",
        name: "X",
        type: "default",
        connections: [
          {
            id: "0",
            type: "default",
            incomingRoad: "1",
            connectingRoad: "5",
            contactPoint: "start",
            laneLinks: [{ from: -1, to: -1 }],
          },
        ],
        priorities: [{ high: "5", low: "6" }],
        controllers: [],
      },
    ]);
    expect(document.controllers).toEqual([{ id: "c1", sequence: 2, controls: [{ signalId: "s1", type: "0" }] }]);
  });

  it("reads the junction orientation as +, - or none", () => {
    const junction = '<junction id="4" type="virtual" orientation="none"><connection id="0" incomingRoad="1"/></junction>';
    const { document } = readOpenDrive(makeXml(HEADER, junction));
    expect(document.junctions[0]?.orientation).toBe("none");

    const err = readError(makeXml(HEADER, junction.replace('"none"', '"forward"')));
    expect(err.kind).toBe("InvalidEnumValue");
    expect(err.context).toEqual({ path: "OpenDRIVE/junction[0]", field: "orientation", rawText: "forward" });
  });

  it("ignores namespace attributes on the root", () => {
    const xml = makeXml(HEADER).replace(
      "<OpenDRIVE>",
      '<OpenDRIVE xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:noNamespaceSchemaLocation="OpenDRIVE_1.7.xsd">',
    );
    expect(readOpenDrive(xml).diagnostics).toEqual([]);
  });

  it("skips validation when asked", () => {
    const planView = `<planView>
      <geometry s="0" x="0" y="0" hdg="0" length="10"><line/></geometry>
      <geometry s="11" x="11" y="0" hdg="0" length="5"><line/></geometry>
    </planView>`;
    const xml = makeXml(HEADER, makeRoadXml({ attributes: 'length="16" id="1" junction="-1"', planView }));
    expect(readOpenDrive(xml, { validate: false }).document.roads[0]?.planView).toHaveLength(2);
  });
});

describe("diagnostics", () => {
  it("reports unknown elements and attributes without failing", () => {
    const xml = makeXml(
      HEADER,
      makeRoadXml({ attributes: 'length="10" id="1" junction="-1" surfaceGrade="A"', extra: "<railroad/>" }),
    );
    expect(readOpenDrive(xml).diagnostics).toEqual([
      {
        kind: "UnknownElement",
        path: "OpenDRIVE/road[0]/railroad[0]",
        name: "railroad",
        message: "<railroad> is not supported here; skipped",
      },
      {
        kind: "UnknownAttribute",
        path: "OpenDRIVE/road[0]",
        name: "surfaceGrade",
        message: 'attribute "surfaceGrade" is not supported here; skipped',
      },
    ]);
  });

  it("keeps the first of a repeated single element", () => {
    const xml = makeXml(HEADER, makeRoadXml({ extra: PLAN_VIEW }));
    const { document, diagnostics } = readOpenDrive(xml);
    expect(document.roads).toHaveLength(1);
    expect(diagnostics).toEqual([
      {
        kind: "DuplicateElement",
        path: "OpenDRIVE/road[0]/planView[1]",
        name: "planView",
        message: "<planView> may appear only once; repeat ignored",
      },
    ]);
  });

  it("logs diagnostics when verbose", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    readOpenDrive(makeXml(HEADER, makeRoadXml({ extra: "<railroad/>" })), { verbose: true });

    expect(warn).toHaveBeenCalledWith(
      "[reader] UnknownElement at OpenDRIVE/road[0]/railroad[0]: <railroad> is not supported here; skipped",
    );
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[reader\] Read 1 roads, 0 junctions, 0 controllers in [\d.]+ms$/);
  });
});

describe("read errors", () => {
  it("rejects a root other than OpenDRIVE", () => {
    const err = readError("<Road/>");
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context).toEqual({ path: "", field: "OpenDRIVE", rawText: "Road" });
  });

  it("requires a header", () => {
    const err = readError(makeXml(makeRoadXml()));
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context).toEqual({ path: "OpenDRIVE", field: "header" });
  });

  it("rejects unsupported versions before reading roads", () => {
    const err = readError(makeXml('<header revMajor="1" revMinor="8"/>', "<road/>"));
    expect(err.kind).toBe("UnsupportedVersion");
    expect(err.context).toEqual({ path: "OpenDRIVE/header[0]", field: "revMinor", rawText: "1.8" });
  });

  it("reports malformed XML with its position", () => {
    const err = readError("<OpenDRIVE>\n<header revMajor=\"1\" revMinor=\"7\">\n</OpenDRIVE>");
    expect(err.kind).toBe("MalformedXml");
    expect(err.context.line).toBeGreaterThan(0);
  });

  it("rejects malformed numbers", () => {
    const err = readError(makeXml(HEADER, makeRoadXml({ attributes: 'length="ten" id="1" junction="-1"' })));
    expect(err.kind).toBe("MalformedNumber");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]", field: "length", rawText: "ten" });
  });

  it("rejects values outside their domain", () => {
    const err = readError(makeXml(HEADER, makeRoadXml({ attributes: 'length="-5" id="1" junction="-1"' })));
    expect(err.kind).toBe("ValueOutOfDomain");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]", field: "length", rawText: "-5" });
  });

  it("matches enumerations case-sensitively", () => {
    const lanes = LANES.replace('type="driving"', 'type="Driving"');
    const err = readError(makeXml(HEADER, makeRoadXml({ lanes })));
    expect(err.kind).toBe("InvalidEnumValue");
    expect(err.context).toEqual({
      path: "OpenDRIVE/road[0]/lanes[0]/laneSection[0]/right[0]/lane[0]",
      field: "type",
      rawText: "Driving",
    });
  });

  it("rejects empty ids in references", () => {
    const err = readError(makeXml(HEADER, makeRoadXml({ attributes: 'length="10" id="1" junction=""' })));
    expect(err.kind).toBe("UnresolvedReference");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]", field: "junction", rawText: "" });
  });

  it("requires a plan view", () => {
    const err = readError(makeXml(HEADER, makeRoadXml({ planView: "" })));
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]", field: "planView" });
  });

  it("rejects lanes mixing width and border", () => {
    const lanes = LANES.replace("<roadMark", '<border sOffset="0" a="3.5" b="0" c="0" d="0"/><roadMark');
    const err = readError(makeXml(HEADER, makeRoadXml({ lanes })));
    expect(err.kind).toBe("StructuralViolation");
    expect(err.rule).toBe("mixed-width-border");
    expect(err.context.path).toBe("OpenDRIVE/road[0]/lanes[0]/laneSection[0]/right[0]/lane[0]");
  });

  it("throws from readOpenDrive and returns the error from tryReadOpenDrive", () => {
    const xml = makeXml('<header revMajor="2" revMinor="0"/>');
    expect(() => readOpenDrive(xml)).toThrow(ReadError);
    const result = tryReadOpenDrive(xml);
    expect(result.ok).toBe(false);
  });
});

describe("roadMark", () => {
  const lanesWith = (roadMark: string): string => LANES.replace(/<roadMark [^>]*\/>/, roadMark);

  it("requires a color in strict mode", () => {
    const lanes = lanesWith('<roadMark sOffset="0" type="solid"/>');
    const err = readError(makeXml(HEADER, makeRoadXml({ lanes })));
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context).toEqual({
      path: "OpenDRIVE/road[0]/lanes[0]/laneSection[0]/right[0]/lane[0]/roadMark[0]",
      field: "color",
    });
  });

  it("reads a missing color as standard with the SUMO workaround", () => {
    const lanes = lanesWith('<roadMark sOffset="0" type="solid"/>');
    const { document } = readOpenDrive(makeXml(HEADER, makeRoadXml({ lanes })), { workarounds: SUMO });
    const mark = document.roads[0]?.lanes.laneSections[0].right?.[0]?.roadMarks[0];
    expect(mark?.color).toBe("standard");
  });

  it("keeps laneChange only when present", () => {
    const lanes = lanesWith('<roadMark sOffset="0" type="solid" color="yellow" laneChange="none"/>');
    const { document } = readOpenDrive(makeXml(HEADER, makeRoadXml({ lanes })));
    expect(document.roads[0]?.lanes.laneSections[0].right?.[0]?.roadMarks[0]?.laneChange).toBe("none");

    const plain = readOpenDrive(makeXml(HEADER, makeRoadXml())).document;
    expect(plain.roads[0]?.lanes.laneSections[0].right?.[0]?.roadMarks[0]?.laneChange).toBeUndefined();
  });
});

describe("paramPoly3 pRange", () => {
  const planView = `<planView><geometry s="0" x="0" y="0" hdg="0" length="10">
    <paramPoly3 aU="0" bU="10" cU="0" dU="0" aV="0" bV="0" cV="0" dV="0"/>
  </geometry></planView>`;
  const xml = makeXml(HEADER, makeRoadXml({ planView }));

  it("is required in strict mode", () => {
    const err = readError(xml);
    expect(err.kind).toBe("MissingRequiredField");
    expect(err.context).toEqual({ path: "OpenDRIVE/road[0]/planView[0]/geometry[0]/paramPoly3[0]", field: "pRange" });
  });

  it("defaults to normalized with the SUMO workaround", () => {
    const shape = readOpenDrive(xml, { workarounds: SUMO }).document.roads[0]?.planView[0].shape;
    expect(shape).toEqual({
      kind: "paramPoly3",
      aU: 0,
      bU: 10,
      cU: 0,
      dU: 0,
      aV: 0,
      bV: 0,
      cV: 0,
      dV: 0,
      pRange: "normalized",
    });
  });
});
