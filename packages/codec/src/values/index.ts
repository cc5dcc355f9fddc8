export * from "./scalars.js";
