import type { ObjectType } from "./objects";

/** Normalized to the frame: all values in [0, 1], origin top-left. */
export type NormalizedBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Observation = {
  type: ObjectType;
  confidence: number;
  timestampMs: number;
  box?: NormalizedBox;
};
