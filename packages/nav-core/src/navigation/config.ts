import { z } from "zod";

export type StabilizerConfig = {
  /** Observations below this confidence never touch the counts. */
  confidenceThreshold: number;
  /** Consecutive-ish supporting frames before a type counts as stable. */
  stableThreshold: number;
};

export type GateConfig = {
  objectCooldownMs: number;
  navigationCooldownMs: number;
};

export type NavigationTimings = {
  startupDelayMs: number;
  confirmToWalkMs: number;
  turnDelayMs: number;
  transitionWindowMs: number;
  noTurnObjectDelayMs: number;
};

export type ProximityConfig = {
  enabled: boolean;
  /** Fraction of frame width or height a box must exceed. */
  sizeRatio: number;
  minConfidence: number;
  cooldownMs: number;
};

export type SceneConfig = {
  /** How long the last frame of boxed detections stays answerable to object queries. */
  visibilityWindowMs: number;
};

export type NavigationConfig = {
  stabilizer: StabilizerConfig;
  gate: GateConfig;
  timings: NavigationTimings;
  proximity: ProximityConfig;
  scene: SceneConfig;
};

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = {
  stabilizer: {
    confidenceThreshold: 0.6,
    stableThreshold: 3
  },
  gate: {
    objectCooldownMs: 1500,
    navigationCooldownMs: 3000
  },
  timings: {
    startupDelayMs: 1000,
    confirmToWalkMs: 2000,
    turnDelayMs: 4000,
    transitionWindowMs: 3000,
    noTurnObjectDelayMs: 10000
  },
  proximity: {
    enabled: true,
    sizeRatio: 0.7,
    minConfidence: 0.5,
    cooldownMs: 5000
  },
  scene: {
    visibilityWindowMs: 1000
  }
};

const durationMs = z.number().int().nonnegative();
const ratio = z.number().min(0).max(1);

export const navigationConfigOverridesSchema = z
  .object({
    stabilizer: z
      .object({
        confidenceThreshold: ratio,
        stableThreshold: z.number().int().positive()
      })
      .partial()
      .strict(),
    gate: z
      .object({
        objectCooldownMs: durationMs,
        navigationCooldownMs: durationMs
      })
      .partial()
      .strict(),
    timings: z
      .object({
        startupDelayMs: durationMs,
        confirmToWalkMs: durationMs,
        turnDelayMs: durationMs,
        transitionWindowMs: durationMs,
        noTurnObjectDelayMs: durationMs
      })
      .partial()
      .strict(),
    proximity: z
      .object({
        enabled: z.boolean(),
        sizeRatio: ratio,
        minConfidence: ratio,
        cooldownMs: durationMs
      })
      .partial()
      .strict(),
    scene: z
      .object({
        visibilityWindowMs: durationMs
      })
      .partial()
      .strict()
  })
  .partial()
  .strict();

export type NavigationConfigOverrides = z.infer<typeof navigationConfigOverridesSchema>;

export class NavigationConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid navigation config: ${issues.join("; ")}`);
    this.name = "NavigationConfigError";
    this.issues = issues;
  }
}

type Patch<T> = { [K in keyof T]?: T[K] | undefined };

function mergeSection<T extends object>(base: T, patch: Patch<T> | undefined): T {
  const merged = { ...base };
  if (!patch) {
    return merged;
  }
  for (const key in base) {
    const value = patch[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Validate user-supplied overrides and merge them over the defaults, section by section.
 */
export function resolveNavigationConfig(
  overrides: unknown = {},
  base: NavigationConfig = DEFAULT_NAVIGATION_CONFIG
): NavigationConfig {
  const parsed = navigationConfigOverridesSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    throw new NavigationConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const { stabilizer, gate, timings, proximity, scene } = parsed.data;
  return {
    stabilizer: mergeSection(base.stabilizer, stabilizer),
    gate: mergeSection(base.gate, gate),
    timings: mergeSection(base.timings, timings),
    proximity: mergeSection(base.proximity, proximity),
    scene: mergeSection(base.scene, scene)
  };
}
