/**
 * Positional continuity of a reference line: each segment should end
 * exactly where the next one declares its start.
 */

import type { PlanView } from "@opendrive-codec/types";
import { evaluateGeometry } from "./evaluate.js";

/** A boundary between segment `index` and `index + 1` that does not meet */
export interface ContinuityBreak {
  index: number;
  /** Euclidean distance between the evaluated end and the declared start, in m */
  positionError: number;
  /** Absolute heading difference wrapped to [0, π], in rad */
  headingError: number;
}

export function wrapAngle(angle: number): number {
  const wrapped = angle % (2 * Math.PI);
  if (wrapped > Math.PI) return wrapped - 2 * Math.PI;
  if (wrapped <= -Math.PI) return wrapped + 2 * Math.PI;
  return wrapped;
}

/** All boundaries whose position or heading mismatch exceeds `tolerance` */
export function checkContinuity(planView: PlanView, tolerance = 1e-6): ContinuityBreak[] {
  const breaks: ContinuityBreak[] = [];
  for (let i = 0; i + 1 < planView.length; i++) {
    const current = planView[i];
    const next = planView[i + 1];
    if (current === undefined || next === undefined) continue;

    const end = evaluateGeometry(current, current.length.value);
    const positionError = Math.hypot(end.x - next.x.value, end.y - next.y.value);
    const headingError = Math.abs(wrapAngle(end.hdg - next.hdg.value));
    if (positionError > tolerance || headingError > tolerance) {
      breaks.push({ index: i, positionError, headingError });
    }
  }
  return breaks;
}
