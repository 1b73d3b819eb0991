import { isKnownObjectType, type ObjectType } from "../types/objects";

export type WaypointId = number;

export type TurnDirection = "left" | "right";

export type Waypoint = {
  id: WaypointId;
  name: string;
  /** Every one of these must be stabilized before the waypoint is confirmed. */
  identificationObjects: readonly ObjectType[];
  turnObject?: ObjectType;
  turnDirection?: TurnDirection;
  nextWaypoint?: WaypointId;
};

export interface WaypointCatalog {
  readonly first: Waypoint;
  get(id: WaypointId): Waypoint;
  list(): readonly Waypoint[];
}

export class WaypointCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WaypointCatalogError";
  }
}

export const CORRIDOR_ROUTE: readonly Waypoint[] = [
  {
    id: 1,
    name: "corridor 1",
    identificationObjects: ["fireHoseCabinet", "vendingMachine"],
    turnObject: "printer",
    turnDirection: "right",
    nextWaypoint: 2
  },
  {
    id: 2,
    name: "corridor 2",
    identificationObjects: ["humanPainting"],
    turnObject: "fireExtinguisher",
    turnDirection: "left",
    nextWaypoint: 3
  },
  {
    id: 3,
    name: "corridor 3",
    identificationObjects: ["peacock"],
    nextWaypoint: 4
  },
  {
    id: 4,
    name: "corridor 4",
    identificationObjects: ["trashBin"],
    turnObject: "mainDoor"
  }
];

/**
 * Build an O(1) lookup over a linear route. The first entry is the start of the
 * route and following `nextWaypoint` from it must visit every entry exactly once.
 */
export function createWaypointCatalog(waypoints: readonly Waypoint[]): WaypointCatalog {
  const [first] = waypoints;
  if (!first) {
    throw new WaypointCatalogError("Route must contain at least one waypoint");
  }

  const byId = new Map<WaypointId, Waypoint>();
  for (const waypoint of waypoints) {
    if (byId.has(waypoint.id)) {
      throw new WaypointCatalogError(`Duplicate waypoint id ${waypoint.id}`);
    }
    if (waypoint.identificationObjects.length === 0) {
      throw new WaypointCatalogError(`Waypoint ${waypoint.id} has no identification objects`);
    }
    const objects = [...waypoint.identificationObjects, ...(waypoint.turnObject ? [waypoint.turnObject] : [])];
    const unknown = objects.find((type) => !isKnownObjectType(type));
    if (unknown !== undefined) {
      throw new WaypointCatalogError(`Waypoint ${waypoint.id} references unrecognized object "${unknown}"`);
    }
    byId.set(waypoint.id, waypoint);
  }

  const visited = new Set<WaypointId>();
  const ordered: Waypoint[] = [];
  let cursor: Waypoint | undefined = first;
  while (cursor) {
    if (visited.has(cursor.id)) {
      throw new WaypointCatalogError(`Route loops back to waypoint ${cursor.id}`);
    }
    visited.add(cursor.id);
    ordered.push(cursor);
    if (cursor.nextWaypoint === undefined) {
      break;
    }
    const next = byId.get(cursor.nextWaypoint);
    if (!next) {
      throw new WaypointCatalogError(
        `Waypoint ${cursor.id} points to missing waypoint ${cursor.nextWaypoint}`
      );
    }
    cursor = next;
  }
  if (visited.size !== byId.size) {
    throw new WaypointCatalogError("Route does not reach every waypoint from the first one");
  }

  return {
    first,
    get(id) {
      const waypoint = byId.get(id);
      if (!waypoint) {
        throw new WaypointCatalogError(`Unknown waypoint id ${id}`);
      }
      return waypoint;
    },
    list() {
      return ordered;
    }
  };
}

export const DEFAULT_CATALOG: WaypointCatalog = createWaypointCatalog(CORRIDOR_ROUTE);
