import { DEFAULT_NAVIGATION_CONFIG, type ProximityConfig } from "../navigation/config";
import { describeObject } from "../types/objects";
import type { NormalizedBox, Observation } from "../types/observation";

export type HorizontalPosition =
  | "far left"
  | "on the left"
  | "directly in front"
  | "on the right"
  | "far right";

/** Position of the box centre, in fifths of the frame width. */
export function describePosition(box: NormalizedBox): HorizontalPosition {
  const centerX = box.x + box.width / 2;
  if (centerX < 0.2) return "far left";
  if (centerX < 0.4) return "on the left";
  if (centerX < 0.6) return "directly in front";
  if (centerX < 0.8) return "on the right";
  return "far right";
}

export function directionalGuidance(position: HorizontalPosition): string {
  switch (position) {
    case "far left":
      return "Turn sharply to the left and proceed forward.";
    case "on the left":
      return "Turn slightly to the left and proceed forward.";
    case "directly in front":
      return "Proceed straight ahead.";
    case "on the right":
      return "Turn slightly to the right and proceed forward.";
    case "far right":
      return "Turn sharply to the right and proceed forward.";
  }
}

/**
 * Warns when a recognized object fills most of the frame, i.e. the user is about
 * to walk into it. Keeps a cooldown of its own; the engine still passes each
 * warning through the announcement gate as a notice.
 */
export class ProximityMonitor {
  private config: ProximityConfig;
  private lastWarningAt: number | undefined;

  constructor(config: ProximityConfig = DEFAULT_NAVIGATION_CONFIG.proximity) {
    this.config = config;
  }

  check(observation: Observation): string | null {
    const { box, type, confidence, timestampMs } = observation;
    if (!this.config.enabled || !box || type === "unknown") {
      return null;
    }
    if (!(confidence > this.config.minConfidence)) {
      return null;
    }
    if (box.width <= this.config.sizeRatio && box.height <= this.config.sizeRatio) {
      return null;
    }
    if (this.lastWarningAt !== undefined && timestampMs - this.lastWarningAt <= this.config.cooldownMs) {
      return null;
    }

    this.lastWarningAt = timestampMs;
    return `Attention, ${describeObject(type)} ${describePosition(box)} very close`;
  }

  reset(): void {
    this.lastWarningAt = undefined;
  }
}
