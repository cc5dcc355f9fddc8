/**
 * Compatibility workarounds for known-defective OpenDRIVE producers and
 * consumers.
 *
 * Each flag is an explicit, independently toggleable switch passed into
 * every read call. All flags are off by default, which is strict standard
 * conformance. Writing never depends on them.
 */

import { isVocabularyToken } from "@opendrive-codec/types";

/** Names under which the flags are selected in profiles and on the command line */
export const WORKAROUND_NAMES = [
  "workaround-sumo-issue-10301",
  "workaround-sumo-roadmark-missing-color",
  "workaround-sumo",
] as const;
export type WorkaroundName = (typeof WORKAROUND_NAMES)[number];

export interface WorkaroundConfig {
  /** paramPoly3 without `pRange` reads as "normalized" */
  readonly sumoIssue10301: boolean;
  /** roadMark without `color` reads as "standard" */
  readonly sumoRoadmarkMissingColor: boolean;
}

export type WorkaroundFlag = keyof WorkaroundConfig;

/** What each flag changes, and why */
export interface WorkaroundDescription {
  name: WorkaroundName;
  affects: string;
  conformantBehavior: string;
  defect: string;
}

export const WORKAROUND_FLAGS: Record<WorkaroundFlag, WorkaroundDescription> = {
  sumoIssue10301: {
    name: "workaround-sumo-issue-10301",
    affects: "reader: geometry/paramPoly3@pRange",
    conformantBehavior: "a missing pRange is a MissingRequiredField error",
    defect: "SUMO's netconvert writes paramPoly3 without pRange (issue 10301) and means normalized",
  },
  sumoRoadmarkMissingColor: {
    name: "workaround-sumo-roadmark-missing-color",
    affects: "reader: lane/roadMark@color",
    conformantBehavior: "a missing color is a MissingRequiredField error",
    defect: "SUMO writes roadMark without the required color and means \"standard\"",
  },
};

export const STRICT: WorkaroundConfig = Object.freeze({
  sumoIssue10301: false,
  sumoRoadmarkMissingColor: false,
});

export const SUMO: WorkaroundConfig = Object.freeze({
  sumoIssue10301: true,
  sumoRoadmarkMissingColor: true,
});

export function isWorkaroundName(value: string): value is WorkaroundName {
  return isVocabularyToken(WORKAROUND_NAMES, value);
}

/** Build a config from flag names; `workaround-sumo` enables both SUMO flags */
export function resolveWorkarounds(names: readonly WorkaroundName[]): WorkaroundConfig {
  let sumoIssue10301 = false;
  let sumoRoadmarkMissingColor = false;
  for (const name of names) {
    switch (name) {
      case "workaround-sumo-issue-10301":
        sumoIssue10301 = true;
        break;
      case "workaround-sumo-roadmark-missing-color":
        sumoRoadmarkMissingColor = true;
        break;
      case "workaround-sumo":
        sumoIssue10301 = true;
        sumoRoadmarkMissingColor = true;
        break;
    }
  }
  return { sumoIssue10301, sumoRoadmarkMissingColor };
}

/** Flag names enabled in `config`, for logging */
export function enabledWorkarounds(config: WorkaroundConfig): WorkaroundName[] {
  const names: WorkaroundName[] = [];
  if (config.sumoIssue10301) names.push(WORKAROUND_FLAGS.sumoIssue10301.name);
  if (config.sumoRoadmarkMissingColor) names.push(WORKAROUND_FLAGS.sumoRoadmarkMissingColor.name);
  return names;
}
