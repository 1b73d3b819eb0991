import { DEFAULT_NAVIGATION_CONFIG, type GateConfig } from "../navigation/config";

/** Tagged where the announcement is produced; the text itself is never inspected. */
export type AnnouncementKind = "navigation" | "notice";

export type GateKey = "any" | "navigation";

/**
 * Two layered cooldowns: at most one announcement of any kind per object
 * cooldown window, and at most one navigation instruction per navigation window.
 */
export class AnnouncementGate {
  private config: GateConfig;
  private lastAllowed = new Map<GateKey, number>();

  constructor(config: GateConfig = DEFAULT_NAVIGATION_CONFIG.gate) {
    this.config = config;
  }

  tryAnnounce(kind: AnnouncementKind, timestampMs: number): boolean {
    if (this.isCoolingDown("any", this.config.objectCooldownMs, timestampMs)) {
      return false;
    }
    if (
      kind === "navigation" &&
      this.isCoolingDown("navigation", this.config.navigationCooldownMs, timestampMs)
    ) {
      return false;
    }

    this.lastAllowed.set("any", timestampMs);
    if (kind === "navigation") {
      this.lastAllowed.set("navigation", timestampMs);
    }
    return true;
  }

  lastAllowedAt(key: GateKey): number | undefined {
    return this.lastAllowed.get(key);
  }

  reset(): void {
    this.lastAllowed.clear();
  }

  private isCoolingDown(key: GateKey, cooldownMs: number, timestampMs: number): boolean {
    const last = this.lastAllowed.get(key);
    return last !== undefined && timestampMs - last < cooldownMs;
  }
}
