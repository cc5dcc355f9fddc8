/**
 * OpenDRIVE reader.
 *
 * input bytes/text → element tree → typed document, with per-road
 * structural validation and non-fatal diagnostics for skipped content.
 */

import type { AdditionalData, Controller, Junction, JunctionGroup, OpenDrive, Road } from "@opendrive-codec/types";
import { ReadError, describeError } from "../errors.js";
import { validateRoad } from "../validation/index.js";
import { STRICT } from "../workarounds.js";
import type { WorkaroundConfig } from "../workarounds.js";
import { decodeInput, parseXmlTree } from "../xml/index.js";
import { ElementReader } from "./context.js";
import type { ReadContext, ReadDiagnostic } from "./context.js";
import { readHeader, readVersion } from "./header.js";
import { readJunction, readJunctionGroup } from "./junction.js";
import { readRoad } from "./road.js";
import { readController } from "./signals.js";

export type { ReadDiagnostic, DiagnosticKind } from "./context.js";
export { ElementReader } from "./context.js";

export interface ReadOptions {
  /** Compatibility switches; strict conformance when omitted */
  workarounds?: WorkaroundConfig;
  /** Run per-road structural checks (default: true) */
  validate?: boolean;
  /** Log a summary and every diagnostic to the console */
  verbose?: boolean;
}

export interface ReadResult {
  document: OpenDrive;
  diagnostics: ReadDiagnostic[];
}

export type TryReadResult = ({ ok: true } & ReadResult) | { ok: false; error: ReadError };

function assertValidRoad(road: Road, roadPath: string): void {
  const issue = validateRoad(road)[0];
  if (issue === undefined) return;
  throw new ReadError(
    "StructuralViolation",
    issue.message,
    { path: `${roadPath}/${issue.path}`, field: issue.field },
    issue.rule,
  );
}

/**
 * Read an OpenDRIVE document.
 *
 * @throws ReadError for any document defect; nothing partial is returned
 */
export function readOpenDrive(input: string | Uint8Array, options: ReadOptions = {}): ReadResult {
  const startTime = performance.now();
  const workarounds = options.workarounds ?? STRICT;
  const validate = options.validate ?? true;

  const root = parseXmlTree(decodeInput(input));
  if (root.name !== "OpenDRIVE") {
    throw new ReadError("MissingRequiredField", `Root element must be <OpenDRIVE>, found <${root.name}>`, {
      path: "",
      field: "OpenDRIVE",
      rawText: root.name,
    });
  }

  const context: ReadContext = { workarounds, diagnostics: [] };
  const r = new ElementReader(root, context);

  // Version gate before any road is read, wherever the header sits
  const headerElement = root.children.find((child) => child.name === "header");
  if (headerElement === undefined) throw r.missing("header");
  readVersion(new ElementReader(headerElement, { workarounds, diagnostics: [] }));

  const found: { header?: OpenDrive["header"] } = {};
  const roads: Road[] = [];
  const controllers: Controller[] = [];
  const junctions: Junction[] = [];
  const junctionGroups: JunctionGroup[] = [];

  const additionalData: AdditionalData | undefined = r.children(
    {
      header: (c) => {
        found.header = readHeader(c);
      },
      road: (c) => {
        const road = readRoad(c);
        if (validate) assertValidRoad(road, c.path);
        roads.push(road);
      },
      controller: (c) => {
        controllers.push(readController(c));
      },
      junction: (c) => {
        junctions.push(readJunction(c));
      },
      junctionGroup: (c) => {
        junctionGroups.push(readJunctionGroup(c));
      },
    },
    { single: ["header"], additionalData: true },
  );
  r.finish();

  const { header } = found;
  if (header === undefined) throw r.missing("header");
  const document: OpenDrive = { header, roads, controllers, junctions, junctionGroups, additionalData };

  if (options.verbose) {
    const elapsed = (performance.now() - startTime).toFixed(1);
    console.log(
      `[reader] Read ${roads.length} roads, ${junctions.length} junctions, ${controllers.length} controllers in ${elapsed}ms`,
    );
    for (const diagnostic of context.diagnostics) {
      console.warn(`[reader] ${diagnostic.kind} at ${diagnostic.path}: ${diagnostic.message}`);
    }
  }

  return { document, diagnostics: context.diagnostics };
}

/** Like {@link readOpenDrive}, but document defects come back as a value */
export function tryReadOpenDrive(input: string | Uint8Array, options: ReadOptions = {}): TryReadResult {
  try {
    return { ok: true, ...readOpenDrive(input, options) };
  } catch (err) {
    if (err instanceof ReadError) {
      if (options.verbose) console.warn(`[reader] ${describeError(err)}`);
      return { ok: false, error: err };
    }
    throw err;
  }
}
