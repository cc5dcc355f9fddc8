/**
 * Id lookups over a read document.
 *
 * References in the model are plain ids; this index resolves them. It is
 * built once from a document and does not follow later edits.
 */

import type {
  Controller,
  Junction,
  JunctionGroup,
  OpenDrive,
  Road,
  RoadLinkTarget,
} from "@opendrive-codec/types";
import { NO_JUNCTION } from "@opendrive-codec/types";

/** What a road link points at, if it exists */
export type LinkedElement = { kind: "road"; road: Road } | { kind: "junction"; junction: Junction };

/** Index items by id; the first item with a given id wins */
function byId<T extends { id: string }>(items: readonly T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    if (!index.has(item.id)) index.set(item.id, item);
  }
  return index;
}

export class DocumentIndex {
  private readonly roads: Map<string, Road>;
  private readonly junctions: Map<string, Junction>;
  private readonly controllers: Map<string, Controller>;
  private readonly junctionGroups: Map<string, JunctionGroup>;
  /** junction id -> roads declaring it in `road@junction` */
  private readonly junctionRoads = new Map<string, Road[]>();

  constructor(document: OpenDrive) {
    this.roads = byId(document.roads);
    this.junctions = byId(document.junctions);
    this.controllers = byId(document.controllers);
    this.junctionGroups = byId(document.junctionGroups);

    for (const road of document.roads) {
      if (road.junction === NO_JUNCTION) continue;
      const members = this.junctionRoads.get(road.junction);
      if (members) members.push(road);
      else this.junctionRoads.set(road.junction, [road]);
    }
  }

  road(id: string): Road | undefined {
    return this.roads.get(id);
  }

  junction(id: string): Junction | undefined {
    return this.junctions.get(id);
  }

  controller(id: string): Controller | undefined {
    return this.controllers.get(id);
  }

  junctionGroup(id: string): JunctionGroup | undefined {
    return this.junctionGroups.get(id);
  }

  /** Connecting roads of a junction, in document order */
  roadsInJunction(junctionId: string): Road[] {
    return [...(this.junctionRoads.get(junctionId) ?? [])];
  }

  /** The junction a road belongs to; undefined outside junctions or when unresolved */
  roadJunction(road: Road): Junction | undefined {
    return road.junction === NO_JUNCTION ? undefined : this.junctions.get(road.junction);
  }

  resolveLink(target: RoadLinkTarget): LinkedElement | undefined {
    switch (target.elementType) {
      case "road": {
        const road = this.roads.get(target.elementId);
        return road && { kind: "road", road };
      }
      case "junction": {
        const junction = this.junctions.get(target.elementId);
        return junction && { kind: "junction", junction };
      }
    }
  }

  /** Link targets of every road that name an element missing from the document */
  unresolvedLinks(): { road: Road; end: "predecessor" | "successor"; target: RoadLinkTarget }[] {
    const unresolved: { road: Road; end: "predecessor" | "successor"; target: RoadLinkTarget }[] = [];
    for (const road of this.roads.values()) {
      for (const end of ["predecessor", "successor"] as const) {
        const target = road.link?.[end];
        if (target !== undefined && this.resolveLink(target) === undefined) {
          unresolved.push({ road, end, target });
        }
      }
    }
    return unresolved;
  }
}
