export { validateRoad, offsetTolerance } from "./road.js";
export type { StructuralIssue } from "./road.js";
