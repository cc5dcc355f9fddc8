/**
 * Per-road structural checks.
 *
 * These cover the invariants a single road must satisfy on its own:
 * a gap-free, overlap-free plan view that spans the road length, ordered
 * offset sequences, and unique lane ids within each side. References to
 * other roads are not checked here.
 */

import type { Lane, LaneSection, NonEmptyArray, Road } from "@opendrive-codec/types";
import type { StructuralRule } from "../errors.js";

export interface StructuralIssue {
  rule: StructuralRule;
  /** Path relative to the road element, e.g. `planView[0]/geometry[2]` */
  path: string;
  field?: string;
  message: string;
}

/** Two offsets closer than this are the same position */
export function offsetTolerance(a: number, b: number): number {
  return 1e-6 * Math.max(1, Math.abs(a), Math.abs(b));
}

function sameOffset(a: number, b: number): boolean {
  return Math.abs(a - b) <= offsetTolerance(a, b);
}

// ---------------------------------------------------------------------------
// Plan view
// ---------------------------------------------------------------------------

function checkPlanView(road: Road, issues: StructuralIssue[]): void {
  const geometries = road.planView;
  const first = geometries[0];
  if (!sameOffset(first.s.value, 0)) {
    issues.push({
      rule: "geometry-start",
      path: "planView[0]/geometry[0]",
      field: "s",
      message: `First geometry starts at s=${first.s.value}, expected 0`,
    });
  }

  for (let i = 1; i < geometries.length; i++) {
    const previous = geometries[i - 1];
    const current = geometries[i];
    if (previous === undefined || current === undefined) continue;
    const expected = previous.s.value + previous.length.value;
    const actual = current.s.value;
    if (sameOffset(actual, expected)) continue;
    issues.push({
      rule: actual > expected ? "geometry-gap" : "geometry-overlap",
      path: `planView[0]/geometry[${i}]`,
      field: "s",
      message:
        actual > expected
          ? `Gap before geometry ${i}: previous segment ends at s=${expected}, this one starts at s=${actual}`
          : `Geometry ${i} starts at s=${actual}, inside the previous segment ending at s=${expected}`,
    });
  }

  const last = geometries[geometries.length - 1];
  if (last === undefined) return;
  const end = last.s.value + last.length.value;
  if (!sameOffset(end, road.length.value)) {
    issues.push({
      rule: "geometry-length-mismatch",
      path: `planView[0]/geometry[${geometries.length - 1}]`,
      field: "length",
      message: `Plan view ends at s=${end} but the road length is ${road.length.value}`,
    });
  }
}

// ---------------------------------------------------------------------------
// Offsets
// ---------------------------------------------------------------------------

function checkOrdered(
  offsets: readonly number[],
  pathOf: (index: number) => string,
  field: string,
  issues: StructuralIssue[],
): void {
  for (let i = 1; i < offsets.length; i++) {
    const previous = offsets[i - 1];
    const current = offsets[i];
    if (previous === undefined || current === undefined) continue;
    if (current < previous && !sameOffset(current, previous)) {
      issues.push({
        rule: "unordered-offsets",
        path: pathOf(i),
        field,
        message: `${field}=${current} is smaller than the preceding ${field}=${previous}`,
      });
      return;
    }
  }
}

// ---------------------------------------------------------------------------
// Lanes
// ---------------------------------------------------------------------------

function checkSide(
  lanes: NonEmptyArray<Lane> | undefined,
  sidePath: string,
  issues: StructuralIssue[],
): void {
  if (lanes === undefined) return;
  const seen = new Set<number>();
  lanes.forEach((lane, index) => {
    const lanePath = `${sidePath}/lane[${index}]`;
    if (seen.has(lane.id)) {
      issues.push({
        rule: "duplicate-lane-id",
        path: lanePath,
        field: "id",
        message: `Lane id ${lane.id} appears more than once in the same side`,
      });
    }
    seen.add(lane.id);
    if (lane.profile !== undefined) {
      const element = lane.profile.kind;
      checkOrdered(
        lane.profile.records.map((record) => record.sOffset.value),
        (i) => `${lanePath}/${element}[${i}]`,
        "sOffset",
        issues,
      );
    }
  });
}

function checkLaneSection(section: LaneSection, sectionPath: string, issues: StructuralIssue[]): void {
  checkSide(section.left, `${sectionPath}/left[0]`, issues);
  checkSide(section.center, `${sectionPath}/center[0]`, issues);
  checkSide(section.right, `${sectionPath}/right[0]`, issues);
}

function checkLanes(road: Road, issues: StructuralIssue[]): void {
  const { laneOffsets, laneSections } = road.lanes;
  checkOrdered(
    laneOffsets.map((offset) => offset.s.value),
    (i) => `lanes[0]/laneOffset[${i}]`,
    "s",
    issues,
  );
  checkOrdered(
    laneSections.map((section) => section.s.value),
    (i) => `lanes[0]/laneSection[${i}]`,
    "s",
    issues,
  );

  laneSections.forEach((section, index) => {
    const sectionPath = `lanes[0]/laneSection[${index}]`;
    const s = section.s.value;
    if (s > road.length.value && !sameOffset(s, road.length.value)) {
      issues.push({
        rule: "lane-section-range",
        path: sectionPath,
        field: "s",
        message: `Lane section starts at s=${s}, beyond the road length ${road.length.value}`,
      });
    }
    checkLaneSection(section, sectionPath, issues);
  });
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/** All structural issues of `road`, in document order of the checks */
export function validateRoad(road: Road): StructuralIssue[] {
  const issues: StructuralIssue[] = [];
  checkPlanView(road, issues);
  checkOrdered(road.types.map((t) => t.s.value), (i) => `type[${i}]`, "s", issues);
  if (road.elevationProfile !== undefined) {
    checkOrdered(
      road.elevationProfile.elevations.map((e) => e.s.value),
      (i) => `elevationProfile[0]/elevation[${i}]`,
      "s",
      issues,
    );
  }
  if (road.lateralProfile !== undefined) {
    checkOrdered(
      road.lateralProfile.superelevations.map((e) => e.s.value),
      (i) => `lateralProfile[0]/superelevation[${i}]`,
      "s",
      issues,
    );
  }
  checkLanes(road, issues);
  return issues;
}
