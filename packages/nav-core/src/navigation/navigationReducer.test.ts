import { describe, expect, it } from "vitest";

import { DESTINATION_PHRASE, WELCOME_PHRASE } from "../announce/phrases";
import type { ObjectType } from "../types/objects";

import {
  DEFAULT_NAVIGATION_CONTEXT,
  createInitialNavigationState,
  reduceNavigation,
  relevantObjects,
  shouldAct
} from "./navigationReducer";
import type { NavigationEffect, NavigationEvent, NavigationState, NavigationTimer } from "./types";

const catalog = DEFAULT_NAVIGATION_CONTEXT.catalog;

const stable = (objectType: ObjectType, timestampMs = 0): NavigationEvent => ({
  type: "STABLE_DETECTION",
  objectType,
  timestampMs
});

const elapsed = (timer: NavigationTimer, epoch = 0, timestampMs = 0): NavigationEvent => ({
  type: "TIMER_ELAPSED",
  timer,
  epoch,
  timestampMs
});

function run(state: NavigationState, events: NavigationEvent[]) {
  let current = state;
  const effects: NavigationEffect[] = [];
  const statuses = [current.status];
  for (const event of events) {
    const output = reduceNavigation(current, event);
    current = output.state;
    effects.push(...output.effects);
    if (statuses[statuses.length - 1] !== current.status) {
      statuses.push(current.status);
    }
  }
  return { state: current, effects, statuses };
}

const spoken = (effects: NavigationEffect[]) =>
  effects.flatMap((effect) => (effect.type === "announce" ? [effect.text] : []));

const detecting = () => run(createInitialNavigationState(), [elapsed("startup")]).state;

const walkingInCorridor1 = () =>
  run(detecting(), [stable("fireHoseCabinet"), stable("vendingMachine"), elapsed("confirmToWalk")]).state;

describe("navigationReducer", () => {
  it("welcomes the user once the startup timer fires", () => {
    const output = reduceNavigation(createInitialNavigationState(), elapsed("startup", 0, 1000));
    expect(output.state.status).toBe("DetectingWaypoint");
    expect(output.state.currentWaypointId).toBeUndefined();
    expect(output.effects).toEqual([
      { type: "announce", text: WELCOME_PHRASE, kind: "notice", timestampMs: 1000 }
    ]);
  });

  it("ignores timers from another epoch or for another state", () => {
    const initial = createInitialNavigationState();
    expect(reduceNavigation(initial, elapsed("startup", 3))).toEqual({ state: initial, effects: [] });
    expect(reduceNavigation(initial, elapsed("turn"))).toEqual({ state: initial, effects: [] });
  });

  it("does not confirm corridor 1 on one identification object, however often it repeats", () => {
    const result = run(detecting(), [
      stable("fireHoseCabinet", 100),
      stable("fireHoseCabinet", 200),
      stable("fireHoseCabinet", 300)
    ]);
    expect(result.state.status).toBe("DetectingWaypoint");
    expect(result.state.confirmedObjects).toEqual(["fireHoseCabinet"]);
    expect(result.effects).toEqual([
      { type: "announce", text: "Fire hose cabinet detected.", kind: "notice", timestampMs: 100 }
    ]);
  });

  const confirmationOrders: Array<[ObjectType, ObjectType]> = [
    ["fireHoseCabinet", "vendingMachine"],
    ["vendingMachine", "fireHoseCabinet"]
  ];

  it.each(confirmationOrders)("confirms corridor 1 once both %s and %s are stable", (firstSeen, secondSeen) => {
    const start = detecting();
    const first = reduceNavigation(start, stable(firstSeen, 100));
    const second = reduceNavigation(first.state, stable(secondSeen, 200));

    expect(second.state).toEqual({
      status: "WaypointConfirmed",
      currentWaypointId: 1,
      confirmedObjects: [],
      transitioning: false,
      epoch: 0
    });
    expect(second.effects).toEqual([
      {
        type: "announce",
        text: "You are in corridor 1. Walk straight ahead until you reach the printer.",
        kind: "navigation",
        timestampMs: 200
      },
      { type: "resetStabilizer" },
      { type: "schedule", timer: "confirmToWalk", delayMs: 2000, epoch: 0 }
    ]);
  });

  it("ignores objects that are not relevant to the current phase", () => {
    const start = detecting();
    expect(reduceNavigation(start, stable("printer"))).toEqual({ state: start, effects: [] });
    expect(reduceNavigation(start, stable("unknown"))).toEqual({ state: start, effects: [] });

    const walking = walkingInCorridor1();
    expect(walking.status).toBe("WalkingToTurnObject");
    expect(reduceNavigation(walking, stable("vendingMachine"))).toEqual({ state: walking, effects: [] });
  });

  it("announces the turn once and then waits for the turn delay", () => {
    const walking = walkingInCorridor1();
    const ready = reduceNavigation(walking, stable("printer", 5000));
    expect(ready.state.status).toBe("ReadyToTurn");
    expect(ready.state.confirmedObjects).toEqual(["printer"]);
    expect(ready.effects).toEqual([
      { type: "announce", text: "Printer reached. Turn right.", kind: "navigation", timestampMs: 5000 },
      { type: "schedule", timer: "turn", delayMs: 4000, epoch: 0 }
    ]);

    expect(reduceNavigation(ready.state, stable("printer", 5100))).toEqual({
      state: ready.state,
      effects: []
    });
  });

  it("moves into the next corridor and holds detections for the transition window", () => {
    const ready = run(walkingInCorridor1(), [stable("printer")]).state;
    const transitioning = reduceNavigation(ready, elapsed("turn", 0, 9000));

    expect(transitioning.state).toEqual({
      status: "TransitioningWaypoint",
      currentWaypointId: 2,
      confirmedObjects: [],
      transitioning: true,
      epoch: 0
    });
    expect(transitioning.effects).toEqual([
      { type: "resetStabilizer" },
      { type: "announce", text: "Entering corridor 2.", kind: "navigation", timestampMs: 9000 },
      { type: "schedule", timer: "transition", delayMs: 3000, epoch: 0 }
    ]);

    expect(reduceNavigation(transitioning.state, stable("humanPainting"))).toEqual({
      state: transitioning.state,
      effects: []
    });

    const settled = reduceNavigation(transitioning.state, elapsed("transition"));
    expect(settled.state.status).toBe("DetectingWaypoint");
    expect(settled.state.transitioning).toBe(false);
    expect(settled.effects).toEqual([]);
  });

  it("never acts while transitioning, even on a would-be confirming object", () => {
    const state: NavigationState = {
      status: "DetectingWaypoint",
      currentWaypointId: 2,
      confirmedObjects: [],
      transitioning: true,
      epoch: 0
    };
    expect(shouldAct(state, "humanPainting", catalog)).toBe(false);
    expect(reduceNavigation(state, stable("humanPainting"))).toEqual({ state, effects: [] });
  });

  it("skips the turn for a corridor without a turn object", () => {
    const corridor3: NavigationState = {
      status: "DetectingWaypoint",
      currentWaypointId: 3,
      confirmedObjects: [],
      transitioning: false,
      epoch: 0
    };
    const confirmed = reduceNavigation(corridor3, stable("peacock"));
    expect(confirmed.effects).toContainEqual({
      type: "schedule",
      timer: "noTurnObject",
      delayMs: 10000,
      epoch: 0
    });
    expect(spoken(confirmed.effects)).toEqual(["You are in corridor 3. Keep walking straight ahead."]);

    expect(reduceNavigation(confirmed.state, elapsed("confirmToWalk")).state.status).toBe("WalkingToTurnObject");
    const moved = reduceNavigation(confirmed.state, elapsed("noTurnObject"));
    expect(moved.state.status).toBe("TransitioningWaypoint");
    expect(moved.state.currentWaypointId).toBe(4);
  });

  it("walks the whole route once and finishes at the destination", () => {
    const result = run(createInitialNavigationState(), [
      elapsed("startup"),
      stable("fireHoseCabinet"),
      stable("vendingMachine"),
      elapsed("confirmToWalk"),
      stable("printer"),
      elapsed("turn"),
      elapsed("transition"),
      stable("humanPainting"),
      elapsed("confirmToWalk"),
      stable("fireExtinguisher"),
      elapsed("turn"),
      elapsed("transition"),
      stable("peacock"),
      elapsed("noTurnObject"),
      elapsed("transition"),
      stable("trashBin"),
      elapsed("confirmToWalk"),
      stable("mainDoor"),
      elapsed("turn")
    ]);

    expect(result.statuses).toEqual([
      "Initial",
      "DetectingWaypoint",
      "WaypointConfirmed",
      "WalkingToTurnObject",
      "ReadyToTurn",
      "TransitioningWaypoint",
      "DetectingWaypoint",
      "WaypointConfirmed",
      "WalkingToTurnObject",
      "ReadyToTurn",
      "TransitioningWaypoint",
      "DetectingWaypoint",
      "WaypointConfirmed",
      "TransitioningWaypoint",
      "DetectingWaypoint",
      "WaypointConfirmed",
      "WalkingToTurnObject",
      "ReadyToTurn",
      "DestinationReached"
    ]);
    expect(spoken(result.effects)).toEqual([
      WELCOME_PHRASE,
      "Fire hose cabinet detected.",
      "You are in corridor 1. Walk straight ahead until you reach the printer.",
      "Printer reached. Turn right.",
      "Entering corridor 2.",
      "You are in corridor 2. Walk straight ahead until you reach the fire extinguisher.",
      "Fire extinguisher reached. Turn left.",
      "Entering corridor 3.",
      "You are in corridor 3. Keep walking straight ahead.",
      "Entering corridor 4.",
      "You are in corridor 4. Walk straight ahead until you reach the main door.",
      "Main door reached. Continue straight ahead.",
      DESTINATION_PHRASE
    ]);
    expect(result.state).toEqual({
      status: "DestinationReached",
      currentWaypointId: 4,
      confirmedObjects: [],
      transitioning: false,
      epoch: 0
    });
  });

  it("stays at the destination", () => {
    const done: NavigationState = {
      status: "DestinationReached",
      currentWaypointId: 4,
      confirmedObjects: [],
      transitioning: false,
      epoch: 0
    };
    expect(reduceNavigation(done, stable("trashBin"))).toEqual({ state: done, effects: [] });
    expect(reduceNavigation(done, elapsed("transition"))).toEqual({ state: done, effects: [] });
  });

  it("resets to a new epoch and ignores timers from the old one", () => {
    const walking = walkingInCorridor1();
    const reset = reduceNavigation(walking, { type: "RESET", timestampMs: 0 });
    expect(reset.state).toEqual(createInitialNavigationState(1));
    expect(reset.effects).toEqual([
      { type: "cancelTimers" },
      { type: "resetStabilizer" },
      { type: "resetCooldowns" },
      { type: "schedule", timer: "startup", delayMs: 1000, epoch: 1 }
    ]);

    expect(reduceNavigation(reset.state, elapsed("startup", 0)).state.status).toBe("Initial");
    expect(reduceNavigation(reset.state, elapsed("startup", 1)).state.status).toBe("DetectingWaypoint");
  });

  it("lists the relevant objects per phase", () => {
    expect(relevantObjects(createInitialNavigationState(), catalog)).toEqual([]);
    expect(relevantObjects(detecting(), catalog)).toEqual(["fireHoseCabinet", "vendingMachine"]);
    expect(relevantObjects(walkingInCorridor1(), catalog)).toEqual(["printer"]);
  });
});
