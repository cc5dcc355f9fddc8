/**
 * Junction and junction-group writers.
 */

import type { Connection, ConnectionEnd, Junction, JunctionGroup } from "@opendrive-codec/types";
import type { ElementWriter } from "./context.js";

function writeConnectionEnd(w: ElementWriter, end: ConnectionEnd): void {
  w.string("elementType", end.elementType)
    .string("elementId", end.elementId)
    .quantity("elementS", end.elementS)
    .string("elementDir", end.elementDir);
}

function writeConnection(w: ElementWriter, connection: Connection): void {
  w.string("id", connection.id)
    .defaulted("type", connection.type, "default")
    .string("incomingRoad", connection.incomingRoad)
    .string("connectingRoad", connection.connectingRoad)
    .string("linkedRoad", connection.linkedRoad)
    .string("contactPoint", connection.contactPoint);

  const { predecessor, successor } = connection;
  if (predecessor !== undefined) w.child("predecessor", (p) => writeConnectionEnd(p, predecessor));
  if (successor !== undefined) w.child("successor", (s) => writeConnectionEnd(s, successor));
  w.each("laneLink", connection.laneLinks, (l, laneLink) => {
    l.integer("from", laneLink.from).integer("to", laneLink.to);
  });
  w.additionalData(connection.additionalData);
}

export function writeJunction(w: ElementWriter, junction: Junction): void {
  w.string("name", junction.name)
    .string("id", junction.id)
    .defaulted("type", junction.type, "default")
    .string("mainRoad", junction.mainRoad)
    .quantity("sStart", junction.sStart)
    .quantity("sEnd", junction.sEnd)
    .string("orientation", junction.orientation);

  w.each("connection", junction.connections, writeConnection);
  w.each("priority", junction.priorities, (p, priority) => {
    p.string("high", priority.high).string("low", priority.low);
  });
  w.each("controller", junction.controllers, (c, controller) => {
    c.string("id", controller.id).string("type", controller.type).integer("sequence", controller.sequence);
  });
  w.additionalData(junction.additionalData);
}

export function writeJunctionGroup(w: ElementWriter, group: JunctionGroup): void {
  w.string("name", group.name).string("id", group.id).string("type", group.type);
  w.each("junctionReference", group.junctions, (r, junction) => {
    r.string("junction", junction);
  });
}
