import { AnnouncementGate, type AnnouncementKind } from "../announce/announcementGate";
import {
  NOTHING_TO_REPEAT_PHRASE,
  noObjectsPhrase,
  objectCountPhrase,
  objectQueryPhrase,
  statusPhrase,
  visibleObjectsPhrase
} from "../announce/phrases";
import { DEFAULT_CATALOG, type WaypointCatalog, type WaypointId } from "../catalog/waypoints";
import { DetectionStabilizer } from "../filters/detectionStabilizer";
import { DEFAULT_NAVIGATION_CONFIG, type NavigationConfig } from "../navigation/config";
import { createInitialNavigationState, reduceNavigation } from "../navigation/navigationReducer";
import type {
  NavigationContext,
  NavigationEffect,
  NavigationEvent,
  NavigationState,
  NavigationStatus,
  NavigationTimer
} from "../navigation/types";
import { ProximityMonitor } from "../proximity/proximityMonitor";
import { matchingObjects, pickObject, type ObjectQuery, type VisibleObject } from "../scene/sceneQueries";
import { describeObject, parseObjectLabel, type KnownObjectType, type ObjectType } from "../types/objects";
import type { NormalizedBox, Observation } from "../types/observation";

import type { NavigationLogger, SpeechSink, TimerHandle, TimerService } from "./ports";
import { SerialMailbox } from "./serialMailbox";
import { SystemTimerService } from "./timers";

export type NavigationTransition = {
  atMs: number;
  from: NavigationStatus;
  to: NavigationStatus;
  waypointId?: WaypointId;
};

export type NavigationStatusReport = {
  lastDetectionLabel: string | null;
  navigationState: NavigationStatus;
  currentWaypointName: string | null;
};

export type NavigationEngineOptions = {
  speech: SpeechSink;
  timers?: TimerService;
  catalog?: WaypointCatalog;
  config?: NavigationConfig;
  logger?: NavigationLogger;
  now?: () => number;
  /** Source for random object queries, in [0, 1). */
  random?: () => number;
  onTransition?: (transition: NavigationTransition) => void;
};

export type Detection = {
  type: ObjectType;
  confidence: number;
  box?: NormalizedBox | undefined;
};

export type LabelledDetection = {
  label: string;
  confidence: number;
  box?: NormalizedBox | undefined;
};

type FrameEntry = { observation: Observation; label: string };

type EngineMessage =
  | { type: "start" }
  | { type: "frame"; entries: FrameEntry[] }
  | { type: "event"; event: NavigationEvent }
  | { type: "announceStatus" }
  | { type: "repeatInstruction" }
  | { type: "findObject"; query: ObjectQuery; target: KnownObjectType | null }
  | { type: "countObjects"; target: KnownObjectType | null }
  | { type: "describeVisible" };

const PROXIMITY_STATUSES: ReadonlySet<NavigationStatus> = new Set<NavigationStatus>([
  "DetectingWaypoint",
  "WaypointConfirmed",
  "WalkingToTurnObject",
  "ReadyToTurn"
]);

function toEntry(
  type: ObjectType,
  confidence: number,
  at: number,
  box: NormalizedBox | undefined,
  label: string
): FrameEntry {
  return {
    observation: box ? { type, confidence, timestampMs: at, box } : { type, confidence, timestampMs: at },
    label
  };
}

/**
 * Runs the navigation reducer against live input.
 *
 * Detector callbacks, timer callbacks and operator requests all go through one
 * mailbox, so the reducer only ever sees one event at a time. Cooldowns and
 * timers run on the engine's own `now()`; the `at` a detector passes in is kept
 * on the observation but never compared against it.
 */
export class NavigationEngine {
  private state: NavigationState = createInitialNavigationState();
  private started = false;
  private stopped = false;
  private scene: VisibleObject[] = [];
  private sceneAt: number | undefined;
  private lastDetectionLabel: string | null = null;
  private lastInstruction: string | null = null;
  private readonly pendingTimers = new Set<TimerHandle>();

  private readonly speech: SpeechSink;
  private readonly timers: TimerService;
  private readonly catalog: WaypointCatalog;
  private readonly config: NavigationConfig;
  private readonly context: NavigationContext;
  private readonly logger: NavigationLogger;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly onTransition: ((transition: NavigationTransition) => void) | undefined;

  private readonly stabilizer: DetectionStabilizer;
  private readonly gate: AnnouncementGate;
  private readonly proximity: ProximityMonitor;
  private readonly mailbox: SerialMailbox<EngineMessage>;

  constructor(options: NavigationEngineOptions) {
    this.speech = options.speech;
    this.timers = options.timers ?? new SystemTimerService();
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.config = options.config ?? DEFAULT_NAVIGATION_CONFIG;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => Date.now());
    this.random = options.random ?? (() => Math.random());
    this.onTransition = options.onTransition;

    this.context = { catalog: this.catalog, timings: this.config.timings };
    this.stabilizer = new DetectionStabilizer(this.config.stabilizer);
    this.gate = new AnnouncementGate(this.config.gate);
    this.proximity = new ProximityMonitor(this.config.proximity);
    this.mailbox = new SerialMailbox<EngineMessage>(
      (message) => this.handle(message),
      (error, message) => {
        this.logger.error(`[NavigationEngine] Failed to handle ${message.type}:`, error);
      }
    );
  }

  /**
   * Schedules the welcome announcement. Calling it again is a no-op; after
   * `stop()` it begins the route again from the start.
   */
  start(): void {
    this.mailbox.post({ type: "start" });
  }

  /** One detection, delivered as a frame of its own. */
  observe(type: ObjectType, confidence: number, at: number = this.now(), box?: NormalizedBox): void {
    this.observeFrame([{ type, confidence, box }], at);
  }

  observeLabel(label: string, confidence: number, at: number = this.now(), box?: NormalizedBox): void {
    this.observeLabelledFrame([{ label, confidence, box }], at);
  }

  /** Everything the detector reported for one camera frame. */
  observeFrame(detections: readonly Detection[], at: number = this.now()): void {
    this.mailbox.post({
      type: "frame",
      entries: detections.map(({ type, confidence, box }) =>
        toEntry(type, confidence, at, box, describeObject(type))
      )
    });
  }

  observeLabelledFrame(detections: readonly LabelledDetection[], at: number = this.now()): void {
    this.mailbox.post({
      type: "frame",
      entries: detections.map(({ label, confidence, box }) => {
        const type = parseObjectLabel(label);
        return toEntry(type, confidence, at, box, type === "unknown" ? label : describeObject(type));
      })
    });
  }

  restart(): void {
    this.mailbox.post({ type: "event", event: { type: "RESET", timestampMs: this.now() } });
  }

  /**
   * Cancels every pending timer and ignores detections and timer callbacks
   * until `start()` or `restart()`. The state is kept for `currentStatus()`.
   */
  stop(): void {
    this.stopped = true;
    this.cancelTimers();
    this.logger.info("[NavigationEngine] Stopped");
  }

  announceStatus(): void {
    this.mailbox.post({ type: "announceStatus" });
  }

  repeatLastInstruction(): void {
    this.mailbox.post({ type: "repeatInstruction" });
  }

  /** Speaks where the matching object is and how to turn towards it. */
  findObject(query: ObjectQuery, target: KnownObjectType | null = null): void {
    this.mailbox.post({ type: "findObject", query, target });
  }

  countObjects(target: KnownObjectType | null = null): void {
    this.mailbox.post({ type: "countObjects", target });
  }

  /** Reads out every visible object, left to right, with its position. */
  describeVisible(): void {
    this.mailbox.post({ type: "describeVisible" });
  }

  /** Boxed detections of the last frame, or nothing once that frame is too old. */
  visibleObjects(): VisibleObject[] {
    const sceneAt = this.sceneAt;
    if (sceneAt === undefined || this.now() - sceneAt > this.config.scene.visibilityWindowMs) {
      return [];
    }
    return [...this.scene];
  }

  currentStatus(): NavigationStatusReport {
    return {
      lastDetectionLabel: this.lastDetectionLabel,
      navigationState: this.state.status,
      currentWaypointName:
        this.state.currentWaypointId === undefined
          ? null
          : this.catalog.get(this.state.currentWaypointId).name
    };
  }

  snapshot(): NavigationState {
    return this.state;
  }

  private handle(message: EngineMessage): void {
    switch (message.type) {
      case "start":
        if (this.stopped) {
          this.dispatch({ type: "RESET", timestampMs: this.now() });
          return;
        }
        if (this.started || this.state.status !== "Initial") {
          return;
        }
        this.started = true;
        this.schedule("startup", this.config.timings.startupDelayMs, this.state.epoch);
        return;
      case "frame":
        if (!this.stopped) {
          this.handleFrame(message.entries);
        }
        return;
      case "event":
        if (this.stopped && message.event.type === "TIMER_ELAPSED") {
          this.logger.debug(`[NavigationEngine] Ignored ${message.event.timer} timer while stopped`);
          return;
        }
        this.dispatch(message.event);
        return;
      case "announceStatus": {
        const waypoint =
          this.state.currentWaypointId === undefined ? null : this.catalog.get(this.state.currentWaypointId);
        this.speak(statusPhrase(this.state.status, waypoint, this.lastDetectionLabel));
        return;
      }
      case "repeatInstruction":
        this.speak(this.lastInstruction ?? NOTHING_TO_REPEAT_PHRASE);
        return;
      case "findObject": {
        const found = pickObject(this.visibleObjects(), message.query, message.target, this.random);
        this.speak(
          found ? objectQueryPhrase(message.query, found, message.target) : noObjectsPhrase(message.target)
        );
        return;
      }
      case "countObjects":
        this.speak(
          objectCountPhrase(matchingObjects(this.visibleObjects(), message.target).length, message.target)
        );
        return;
      case "describeVisible":
        this.speak(visibleObjectsPhrase(this.visibleObjects()));
        return;
    }
  }

  private handleFrame(entries: readonly FrameEntry[]): void {
    const handledAt = this.now();
    const visible: VisibleObject[] = [];

    for (const { observation, label } of entries) {
      const { type, confidence, box } = observation;
      if (confidence >= this.config.stabilizer.confidenceThreshold) {
        this.lastDetectionLabel = label;
        if (type !== "unknown" && box) {
          visible.push({ type, confidence, box });
        }
      }
      this.handleObservation(observation, handledAt);
    }

    this.scene = visible;
    this.sceneAt = handledAt;
  }

  private handleObservation(observation: Observation, handledAt: number): void {
    // Nothing seen while moving between waypoints may speak or count towards the next one.
    if (this.state.transitioning) {
      return;
    }

    if (PROXIMITY_STATUSES.has(this.state.status)) {
      const warning = this.proximity.check({ ...observation, timestampMs: handledAt });
      if (warning) {
        this.announce(warning, "notice", handledAt);
      }
    }

    if (this.stabilizer.observe(observation.type, observation.confidence)) {
      this.dispatch({
        type: "STABLE_DETECTION",
        objectType: observation.type,
        timestampMs: handledAt
      });
    }
  }

  private dispatch(event: NavigationEvent): void {
    const previous = this.state;
    const { state, effects } = reduceNavigation(previous, event, this.context);
    this.state = state;

    if (event.type === "RESET") {
      this.started = true;
      this.stopped = false;
      this.lastInstruction = null;
      this.logger.info(`[NavigationEngine] Restarted (epoch ${state.epoch})`);
    }

    if (state.status !== previous.status) {
      this.logger.info(`[NavigationEngine] ${previous.status} -> ${state.status}`);
      const transition: NavigationTransition =
        state.currentWaypointId === undefined
          ? { atMs: event.timestampMs, from: previous.status, to: state.status }
          : {
              atMs: event.timestampMs,
              from: previous.status,
              to: state.status,
              waypointId: state.currentWaypointId
            };
      this.onTransition?.(transition);
    } else if (event.type === "TIMER_ELAPSED" && effects.length === 0) {
      this.logger.debug(`[NavigationEngine] Ignored stale ${event.timer} timer (epoch ${event.epoch})`);
    }

    for (const effect of effects) {
      this.apply(effect);
    }
  }

  private apply(effect: NavigationEffect): void {
    switch (effect.type) {
      case "announce":
        this.announce(effect.text, effect.kind, effect.timestampMs);
        return;
      case "schedule":
        this.schedule(effect.timer, effect.delayMs, effect.epoch);
        return;
      case "resetStabilizer":
        this.stabilizer.reset();
        return;
      case "resetCooldowns":
        this.gate.reset();
        this.proximity.reset();
        return;
      case "cancelTimers":
        this.cancelTimers();
        return;
    }
  }

  private announce(text: string, kind: AnnouncementKind, timestampMs: number): void {
    if (!this.gate.tryAnnounce(kind, timestampMs)) {
      this.logger.debug(`[NavigationEngine] Suppressed ${kind} announcement: ${text}`);
      return;
    }
    if (kind === "navigation") {
      this.lastInstruction = text;
    }
    this.speak(text);
  }

  private speak(text: string): void {
    try {
      this.speech.announce(text);
    } catch (error) {
      this.logger.error("[NavigationEngine] Speech sink failed:", error);
    }
  }

  private schedule(timer: NavigationTimer, delayMs: number, epoch: number): void {
    const handle = this.timers.scheduleAfter(delayMs, () => {
      this.pendingTimers.delete(handle);
      this.mailbox.post({
        type: "event",
        event: { type: "TIMER_ELAPSED", timer, epoch, timestampMs: this.now() }
      });
    });
    this.pendingTimers.add(handle);
  }

  private cancelTimers(): void {
    for (const handle of this.pendingTimers) {
      handle.cancel();
    }
    this.pendingTimers.clear();
  }
}
