import {
  DESTINATION_PHRASE,
  WELCOME_PHRASE,
  enteringPhrase,
  objectNoticePhrase,
  turnPhrase,
  waypointConfirmedPhrase
} from "../announce/phrases";
import { DEFAULT_CATALOG, type Waypoint, type WaypointCatalog } from "../catalog/waypoints";
import type { ObjectType } from "../types/objects";

import { DEFAULT_NAVIGATION_CONFIG } from "./config";
import type {
  NavigationContext,
  NavigationEvent,
  NavigationOutput,
  NavigationState,
  NavigationStatus,
  NavigationTimer
} from "./types";

export const DEFAULT_NAVIGATION_CONTEXT: NavigationContext = {
  catalog: DEFAULT_CATALOG,
  timings: DEFAULT_NAVIGATION_CONFIG.timings
};

export function createInitialNavigationState(epoch = 0): NavigationState {
  return {
    status: "Initial",
    confirmedObjects: [],
    transitioning: false,
    epoch
  };
}

/** The waypoint being looked for: the current one, or the start of the route. */
export function targetWaypoint(state: NavigationState, catalog: WaypointCatalog): Waypoint {
  return state.currentWaypointId === undefined ? catalog.first : catalog.get(state.currentWaypointId);
}

export function relevantObjects(
  state: NavigationState,
  catalog: WaypointCatalog
): readonly ObjectType[] {
  if (state.status === "DetectingWaypoint") {
    return targetWaypoint(state, catalog).identificationObjects;
  }
  if (state.status === "WalkingToTurnObject") {
    const turnObject = targetWaypoint(state, catalog).turnObject;
    return turnObject ? [turnObject] : [];
  }
  return [];
}

/** Whether a stable detection of `type` may drive a transition right now. */
export function shouldAct(
  state: NavigationState,
  type: ObjectType,
  catalog: WaypointCatalog
): boolean {
  if (state.transitioning || type === "unknown") {
    return false;
  }
  if (state.confirmedObjects.includes(type)) {
    return false;
  }
  return relevantObjects(state, catalog).includes(type);
}

const unchanged = (state: NavigationState): NavigationOutput => ({ state, effects: [] });

const TIMER_STATUS: Record<NavigationTimer, NavigationStatus> = {
  startup: "Initial",
  confirmToWalk: "WaypointConfirmed",
  noTurnObject: "WaypointConfirmed",
  turn: "ReadyToTurn",
  transition: "TransitioningWaypoint"
};

function beginTransition(
  state: NavigationState,
  timestampMs: number,
  context: NavigationContext
): NavigationOutput {
  const current = targetWaypoint(state, context.catalog);

  if (current.nextWaypoint === undefined) {
    return {
      state: {
        ...state,
        status: "DestinationReached",
        confirmedObjects: [],
        transitioning: false
      },
      effects: [
        { type: "resetStabilizer" },
        { type: "announce", text: DESTINATION_PHRASE, kind: "notice", timestampMs }
      ]
    };
  }

  const next = context.catalog.get(current.nextWaypoint);
  return {
    state: {
      ...state,
      status: "TransitioningWaypoint",
      currentWaypointId: next.id,
      confirmedObjects: [],
      transitioning: true
    },
    effects: [
      { type: "resetStabilizer" },
      { type: "announce", text: enteringPhrase(next), kind: "navigation", timestampMs },
      {
        type: "schedule",
        timer: "transition",
        delayMs: context.timings.transitionWindowMs,
        epoch: state.epoch
      }
    ]
  };
}

function reduceStableDetection(
  state: NavigationState,
  objectType: ObjectType,
  timestampMs: number,
  context: NavigationContext
): NavigationOutput {
  if (!shouldAct(state, objectType, context.catalog)) {
    return unchanged(state);
  }

  const waypoint = targetWaypoint(state, context.catalog);

  if (state.status === "DetectingWaypoint") {
    const confirmedObjects = [...state.confirmedObjects, objectType];
    const complete = waypoint.identificationObjects.every((type) => confirmedObjects.includes(type));

    if (!complete) {
      return {
        state: { ...state, confirmedObjects },
        effects: [
          { type: "announce", text: objectNoticePhrase(objectType), kind: "notice", timestampMs }
        ]
      };
    }

    const followUp: NavigationTimer = waypoint.turnObject ? "confirmToWalk" : "noTurnObject";
    const followUpDelayMs = waypoint.turnObject
      ? context.timings.confirmToWalkMs
      : context.timings.noTurnObjectDelayMs;

    return {
      state: {
        ...state,
        status: "WaypointConfirmed",
        currentWaypointId: waypoint.id,
        confirmedObjects: []
      },
      effects: [
        {
          type: "announce",
          text: waypointConfirmedPhrase(waypoint),
          kind: "navigation",
          timestampMs
        },
        { type: "resetStabilizer" },
        { type: "schedule", timer: followUp, delayMs: followUpDelayMs, epoch: state.epoch }
      ]
    };
  }

  // shouldAct only admits the turn object while walking towards it.
  return {
    state: { ...state, status: "ReadyToTurn", confirmedObjects: [objectType] },
    effects: [
      { type: "announce", text: turnPhrase(waypoint), kind: "navigation", timestampMs },
      {
        type: "schedule",
        timer: "turn",
        delayMs: context.timings.turnDelayMs,
        epoch: state.epoch
      }
    ]
  };
}

function reduceTimer(
  state: NavigationState,
  timer: NavigationTimer,
  timestampMs: number,
  context: NavigationContext
): NavigationOutput {
  if (TIMER_STATUS[timer] !== state.status) {
    return unchanged(state);
  }

  switch (timer) {
    case "startup":
      return {
        state: { ...state, status: "DetectingWaypoint" },
        effects: [{ type: "announce", text: WELCOME_PHRASE, kind: "notice", timestampMs }]
      };
    case "confirmToWalk":
      return { state: { ...state, status: "WalkingToTurnObject" }, effects: [] };
    case "noTurnObject":
    case "turn":
      return beginTransition(state, timestampMs, context);
    case "transition":
      return { state: { ...state, status: "DetectingWaypoint", transitioning: false }, effects: [] };
  }
}

export function reduceNavigation(
  state: NavigationState,
  event: NavigationEvent,
  context: NavigationContext = DEFAULT_NAVIGATION_CONTEXT
): NavigationOutput {
  if (event.type === "RESET") {
    const epoch = state.epoch + 1;
    return {
      state: createInitialNavigationState(epoch),
      effects: [
        { type: "cancelTimers" },
        { type: "resetStabilizer" },
        { type: "resetCooldowns" },
        { type: "schedule", timer: "startup", delayMs: context.timings.startupDelayMs, epoch }
      ]
    };
  }

  if (event.type === "TIMER_ELAPSED") {
    if (event.epoch !== state.epoch) {
      return unchanged(state);
    }
    return reduceTimer(state, event.timer, event.timestampMs, context);
  }

  return reduceStableDetection(state, event.objectType, event.timestampMs, context);
}
