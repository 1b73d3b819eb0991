import {
  ManualTimerService,
  NavigationEngine,
  VoiceCommandRouter,
  resolveNavigationConfig,
  type NavigationConfig,
  type NavigationLogger,
  type NavigationStatus,
  type NavigationStatusReport,
  type WaypointCatalog
} from "@corridor-guide/nav-core";

import { RecordingSpeechSink, type TranscriptLine } from "./recordingSpeechSink";
import type { ReplayTrace } from "./trace";

export const DEFAULT_TAIL_MS = 15000;

export type ReplayTransition = {
  at: number;
  from: NavigationStatus;
  to: NavigationStatus;
};

export type ReplayResult = {
  transcript: TranscriptLine[];
  transitions: ReplayTransition[];
  final: NavigationStatusReport;
};

export type ReplayOptions = {
  /** Replaces the overrides embedded in the trace. */
  config?: NavigationConfig;
  catalog?: WaypointCatalog;
  logger?: NavigationLogger;
};

/**
 * Plays a recorded trace through a fresh engine on a virtual clock.
 *
 * Events run in timestamp order (file order for ties); the clock then runs on
 * for `tailMs` so pending timers get to fire.
 */
export function runReplay(trace: ReplayTrace, options: ReplayOptions = {}): ReplayResult {
  const config = options.config ?? resolveNavigationConfig(trace.config ?? {});
  const logger = options.logger ?? console;
  const timers = new ManualTimerService();
  const speech = new RecordingSpeechSink(() => timers.now(), logger);
  const transitions: ReplayTransition[] = [];

  const engine = new NavigationEngine({
    speech,
    timers,
    config,
    logger,
    now: () => timers.now(),
    onTransition: ({ atMs, from, to }) => transitions.push({ at: atMs, from, to }),
    ...(options.catalog ? { catalog: options.catalog } : {})
  });
  const commands = new VoiceCommandRouter(engine, speech);

  engine.start();

  const events = [...trace.events].sort((a, b) => a.at - b.at);
  for (const event of events) {
    timers.advanceTo(event.at);
    if ("command" in event) {
      const command = commands.handle(event.command);
      logger.debug(`[Replay] command "${event.command}" -> ${command ? command.type : "ignored, menu closed"}`);
    } else if ("detections" in event) {
      engine.observeLabelledFrame(event.detections, event.at);
    } else {
      engine.observeLabel(event.label, event.confidence, event.at, event.box);
    }
  }

  timers.advanceBy(trace.tailMs ?? DEFAULT_TAIL_MS);
  engine.stop();

  const final = engine.currentStatus();
  logger.info(`[Replay] Finished in ${final.navigationState} after ${speech.lines.length} announcements`);
  return { transcript: speech.lines, transitions, final };
}
