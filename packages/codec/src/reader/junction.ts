/**
 * Junction and junction-group readers.
 */

import type { Connection, ConnectionEnd, Junction, JunctionGroup } from "@opendrive-codec/types";
import {
  CONNECTION_TYPES,
  CONTACT_POINTS,
  ELEMENT_DIRS,
  ELEMENT_TYPES,
  JUNCTION_GROUP_TYPES,
  JUNCTION_TYPES,
  ORIENTATIONS,
  isNonEmpty,
} from "@opendrive-codec/types";
import type { ElementReader } from "./context.js";

function readConnectionEnd(r: ElementReader): ConnectionEnd {
  return {
    elementType: r.enumeration("elementType", ELEMENT_TYPES),
    elementId: r.reference("elementId"),
    elementS: r.length("elementS", "nonNegative"),
    elementDir: r.enumeration("elementDir", ELEMENT_DIRS),
  };
}

function readConnection(r: ElementReader): Connection {
  const connection: Connection = {
    id: r.string("id"),
    type: r.enumerationOr("type", CONNECTION_TYPES, "default"),
    incomingRoad: r.optionalReference("incomingRoad"),
    connectingRoad: r.optionalReference("connectingRoad"),
    linkedRoad: r.optionalReference("linkedRoad"),
    contactPoint: r.optionalEnumeration("contactPoint", CONTACT_POINTS),
    laneLinks: [],
  };
  connection.additionalData = r.children(
    {
      predecessor: (c) => {
        connection.predecessor = readConnectionEnd(c);
      },
      successor: (c) => {
        connection.successor = readConnectionEnd(c);
      },
      laneLink: (c) => {
        connection.laneLinks.push({ from: c.integer("from"), to: c.integer("to") });
      },
    },
    { single: ["predecessor", "successor"], additionalData: true },
  );
  return connection;
}

export function readJunction(r: ElementReader): Junction {
  const name = r.optionalString("name");
  const id = r.string("id");
  const type = r.enumerationOr("type", JUNCTION_TYPES, "default");
  const mainRoad = r.optionalReference("mainRoad");
  const sStart = r.optionalLength("sStart", "nonNegative");
  const sEnd = r.optionalLength("sEnd", "nonNegative");
  const orientation = r.optionalEnumeration("orientation", ORIENTATIONS);

  const connections: Connection[] = [];
  const priorities: Junction["priorities"] = [];
  const controllers: Junction["controllers"] = [];
  const additionalData = r.children(
    {
      connection: (c) => {
        connections.push(readConnection(c));
      },
      priority: (c) => {
        priorities.push({ high: c.optionalReference("high"), low: c.optionalReference("low") });
      },
      controller: (c) => {
        controllers.push({
          id: c.reference("id"),
          type: c.optionalString("type"),
          sequence: c.optionalInteger("sequence", "nonNegative"),
        });
      },
    },
    { additionalData: true },
  );

  if (!isNonEmpty(connections)) throw r.missing("connection");
  return {
    id,
    name,
    type,
    mainRoad,
    sStart,
    sEnd,
    orientation,
    connections,
    priorities,
    controllers,
    additionalData,
  };
}

export function readJunctionGroup(r: ElementReader): JunctionGroup {
  const name = r.optionalString("name");
  const id = r.string("id");
  const type = r.enumeration("type", JUNCTION_GROUP_TYPES);
  const junctions: string[] = [];
  r.children({
    junctionReference: (c) => {
      junctions.push(c.reference("junction"));
    },
  });
  if (!isNonEmpty(junctions)) throw r.missing("junctionReference");
  return { id, name, type, junctions };
}
