import type { AnnouncementKind } from "../announce/announcementGate";
import type { WaypointCatalog, WaypointId } from "../catalog/waypoints";
import type { ObjectType } from "../types/objects";

import type { NavigationTimings } from "./config";

export type NavigationStatus =
  | "Initial"
  | "DetectingWaypoint"
  | "WaypointConfirmed"
  | "WalkingToTurnObject"
  | "ReadyToTurn"
  | "TransitioningWaypoint"
  | "DestinationReached";

export type NavigationTimer = "startup" | "confirmToWalk" | "noTurnObject" | "turn" | "transition";

export type NavigationState = {
  status: NavigationStatus;
  /** Absent until the first waypoint has been confirmed. */
  currentWaypointId?: WaypointId;
  /** Objects already consumed in this phase, in the order they were seen. */
  confirmedObjects: readonly ObjectType[];
  transitioning: boolean;
  /** Bumped on every reset; timers scheduled under an older epoch are ignored. */
  epoch: number;
};

export type NavigationEvent =
  | {
      type: "STABLE_DETECTION";
      timestampMs: number;
      objectType: ObjectType;
    }
  | {
      type: "TIMER_ELAPSED";
      timestampMs: number;
      timer: NavigationTimer;
      epoch: number;
    }
  | {
      type: "RESET";
      timestampMs: number;
    };

export type NavigationEffect =
  | {
      type: "announce";
      text: string;
      kind: AnnouncementKind;
      timestampMs: number;
    }
  | {
      type: "schedule";
      timer: NavigationTimer;
      delayMs: number;
      epoch: number;
    }
  | { type: "resetStabilizer" }
  | { type: "resetCooldowns" }
  | { type: "cancelTimers" };

export type NavigationContext = {
  catalog: WaypointCatalog;
  timings: NavigationTimings;
};

export type NavigationOutput = {
  state: NavigationState;
  effects: NavigationEffect[];
};
