/**
 * Geometry evaluation for reference-line segments.
 */

export { evaluateGeometry, evaluateReferenceLine, geometryEnd } from "./evaluate.js";
export { checkContinuity, wrapAngle } from "./continuity.js";
export type { ContinuityBreak } from "./continuity.js";
export { integrate, integrateDirection } from "./quadrature.js";
