import { DEFAULT_NAVIGATION_CONFIG, type StabilizerConfig } from "../navigation/config";
import type { ObjectType } from "../types/objects";

/**
 * Counting filter over per-frame observations.
 *
 * Each accepted observation adds support to its own type and takes one unit of
 * support away from every other tracked type, so a brief misclassification is
 * forgotten once the real object shows up again.
 */
export class DetectionStabilizer {
  private config: StabilizerConfig;
  private counts = new Map<ObjectType, number>();

  constructor(config: StabilizerConfig = DEFAULT_NAVIGATION_CONFIG.stabilizer) {
    this.config = config;
  }

  /** Returns true while `type` is at or above the stable threshold. */
  observe(type: ObjectType, confidence: number): boolean {
    if (type === "unknown" || !(confidence >= this.config.confidenceThreshold)) {
      return false;
    }

    const count = (this.counts.get(type) ?? 0) + 1;

    for (const [other, otherCount] of this.counts) {
      if (other === type) continue;
      if (otherCount <= 1) {
        this.counts.delete(other);
      } else {
        this.counts.set(other, otherCount - 1);
      }
    }
    this.counts.set(type, count);

    return count >= this.config.stableThreshold;
  }

  countOf(type: ObjectType): number {
    return this.counts.get(type) ?? 0;
  }

  tracked(): ReadonlyMap<ObjectType, number> {
    return new Map(this.counts);
  }

  reset(): void {
    this.counts.clear();
  }
}
