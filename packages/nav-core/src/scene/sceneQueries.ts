import type { KnownObjectType } from "../types/objects";
import type { NormalizedBox } from "../types/observation";

/** A recognized object with a box from the most recent frame. */
export type VisibleObject = {
  type: KnownObjectType;
  confidence: number;
  box: NormalizedBox;
};

export type ObjectQuery = "nearest" | "farthest" | "random";

const centerX = (box: NormalizedBox) => box.x + box.width / 2;

/** Distance of the box centre from the frame centre, in frame units. */
export function distanceFromCenter(box: NormalizedBox): number {
  return Math.hypot(centerX(box) - 0.5, box.y + box.height / 2 - 0.5);
}

export function matchingObjects(
  objects: readonly VisibleObject[],
  target: KnownObjectType | null
): VisibleObject[] {
  return target ? objects.filter((object) => object.type === target) : [...objects];
}

/**
 * Nearest and farthest are measured from the centre of the frame; ties keep
 * frame order. `random` draws an index from `random()` in [0, 1).
 */
export function pickObject(
  objects: readonly VisibleObject[],
  query: ObjectQuery,
  target: KnownObjectType | null,
  random: () => number = Math.random
): VisibleObject | undefined {
  const candidates = matchingObjects(objects, target);
  if (query === "random") {
    const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
    return candidates[index];
  }

  let picked: VisibleObject | undefined;
  for (const candidate of candidates) {
    if (!picked) {
      picked = candidate;
      continue;
    }
    const distance = distanceFromCenter(candidate.box);
    const best = distanceFromCenter(picked.box);
    if (query === "nearest" ? distance < best : distance > best) {
      picked = candidate;
    }
  }
  return picked;
}

/** Left to right by box centre. */
export function sortLeftToRight(objects: readonly VisibleObject[]): VisibleObject[] {
  return [...objects].sort((a, b) => centerX(a.box) - centerX(b.box));
}
