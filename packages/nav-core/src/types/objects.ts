export const KNOWN_OBJECT_TYPES = [
  "fireExtinguisher",
  "fireHoseCabinet",
  "humanPainting",
  "mainDoor",
  "peacock",
  "printer",
  "trashBin",
  "vendingMachine"
] as const;

export type KnownObjectType = (typeof KNOWN_OBJECT_TYPES)[number];

export type ObjectType = KnownObjectType | "unknown";

const normalizeLabel = (label: string) => label.toLowerCase().replace(/[^a-z0-9]/g, "");

const LABEL_LOOKUP: ReadonlyMap<string, KnownObjectType> = new Map(
  KNOWN_OBJECT_TYPES.map((type) => [normalizeLabel(type), type])
);

export function isKnownObjectType(value: string): value is KnownObjectType {
  return LABEL_LOOKUP.get(normalizeLabel(value)) === value;
}

/**
 * Map a raw detector label onto the object vocabulary.
 *
 * Case and separators are ignored, so `fire_hose_cabinet`, `Fire Hose Cabinet`
 * and `fireHoseCabinet` all resolve to the same type. Anything else is `unknown`.
 */
export function parseObjectLabel(label: string): ObjectType {
  return LABEL_LOOKUP.get(normalizeLabel(label)) ?? "unknown";
}

/** Spoken form, e.g. `fireHoseCabinet` -> `fire hose cabinet`. */
export function describeObject(type: ObjectType): string {
  if (type === "unknown") {
    return "unknown object";
  }
  return type.replace(/([A-Z])/g, " $1").toLowerCase();
}
