/**
 * @opendrive-codec/codec
 *
 * Read and write ASAM OpenDRIVE 1.7 documents, evaluate reference-line
 * geometry, and look up elements by id. Property-test arbitraries live
 * under the `./fuzzing` sub-path.
 */

export { readOpenDrive, tryReadOpenDrive, ElementReader } from "./reader/index.js";
export type { ReadOptions, ReadResult, TryReadResult, ReadDiagnostic, DiagnosticKind } from "./reader/index.js";

export { writeOpenDrive, writeOpenDriveBytes, ElementWriter } from "./writer/index.js";
export type { WriteOptions } from "./writer/index.js";

export { evaluateGeometry, evaluateReferenceLine, geometryEnd, checkContinuity, wrapAngle } from "./geometry/index.js";
export type { ContinuityBreak } from "./geometry/index.js";

export { validateRoad } from "./validation/index.js";
export type { StructuralIssue } from "./validation/index.js";

export { DocumentIndex } from "./lookup/index.js";
export type { LinkedElement } from "./lookup/index.js";

export {
  WORKAROUND_NAMES,
  WORKAROUND_FLAGS,
  STRICT,
  SUMO,
  isWorkaroundName,
  resolveWorkarounds,
  enabledWorkarounds,
} from "./workarounds.js";
export type { WorkaroundConfig, WorkaroundName, WorkaroundFlag, WorkaroundDescription } from "./workarounds.js";

export {
  CodecError,
  ReadError,
  WriteError,
  GeometryError,
  ProgrammingError,
  READ_ERROR_KINDS,
  WRITE_ERROR_KINDS,
  STRUCTURAL_RULES,
  isReadError,
  describeError,
} from "./errors.js";
export type {
  CodecErrorKind,
  ReadErrorKind,
  WriteErrorKind,
  GeometryErrorKind,
  ProgrammingErrorKind,
  StructuralRule,
  ErrorContext,
} from "./errors.js";

export {
  ConfigError,
  CodecProfileSchema,
  ProfileFileSchema,
  deepMerge,
  findConfigsRoot,
  loadBaseProfile,
  loadProfile,
  listProfiles,
  parseBaseProfile,
  parseProfileFile,
  profileToOptions,
} from "./config/index.js";
export type { CodecProfile, LoadedProfile, ProfileFile, ProfileInfo } from "./config/index.js";
