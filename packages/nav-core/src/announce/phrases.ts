import type { Waypoint } from "../catalog/waypoints";
import type { NavigationStatus } from "../navigation/types";
import { describePosition, directionalGuidance } from "../proximity/proximityMonitor";
import { sortLeftToRight, type ObjectQuery, type VisibleObject } from "../scene/sceneQueries";
import { describeObject, type KnownObjectType, type ObjectType } from "../types/objects";

const capitalize = (text: string) => text.charAt(0).toUpperCase() + text.slice(1);

export const WELCOME_PHRASE = "Navigation started. Point the camera ahead to find the first corridor.";

export const DESTINATION_PHRASE = "You have reached your destination. Navigation finished.";

export const HELP_PHRASE =
  "Available commands: say where am I to hear your position, repeat to hear the last instruction again, restart to start the route over, nearest, farthest or random object to be guided to one, how many objects to count them, what do you see to hear every visible object, exit to close this menu, or help to hear this list. Name an object, such as nearest printer, to ask about that object only.";

export const MENU_OPEN_PHRASE = "Voice commands ready. Say help for available commands.";

export const MENU_EXIT_PHRASE = "Exiting voice command menu.";

export const UNRECOGNIZED_COMMAND_PHRASE = "Command not recognized. Say help for available commands.";

export function objectNoticePhrase(type: ObjectType): string {
  return `${capitalize(describeObject(type))} detected.`;
}

export function waypointConfirmedPhrase(waypoint: Waypoint): string {
  if (!waypoint.turnObject) {
    return `You are in ${waypoint.name}. Keep walking straight ahead.`;
  }
  return `You are in ${waypoint.name}. Walk straight ahead until you reach the ${describeObject(waypoint.turnObject)}.`;
}

export function turnPhrase(waypoint: Waypoint): string {
  const landmark = waypoint.turnObject ? describeObject(waypoint.turnObject) : "turn point";
  if (!waypoint.turnDirection) {
    return `${capitalize(landmark)} reached. Continue straight ahead.`;
  }
  return `${capitalize(landmark)} reached. Turn ${waypoint.turnDirection}.`;
}

export function enteringPhrase(waypoint: Waypoint): string {
  return `Entering ${waypoint.name}.`;
}

export const NOTHING_TO_REPEAT_PHRASE = "There is no instruction to repeat yet.";

export function statusPhrase(
  status: NavigationStatus,
  waypoint: Waypoint | null,
  lastDetectionLabel: string | null
): string {
  const where = waypoint ? waypoint.name : "the first corridor";
  let text: string;
  switch (status) {
    case "Initial":
      text = "Navigation is starting.";
      break;
    case "DetectingWaypoint":
      text = `Looking for ${where}.`;
      break;
    case "WaypointConfirmed":
      text = `You are in ${where}.`;
      break;
    case "WalkingToTurnObject":
      text = waypoint?.turnObject
        ? `You are in ${where}, walking towards the ${describeObject(waypoint.turnObject)}.`
        : `You are in ${where}.`;
      break;
    case "ReadyToTurn":
      text = waypoint?.turnDirection
        ? `You are in ${where}, about to turn ${waypoint.turnDirection}.`
        : `You are in ${where}, about to move on.`;
      break;
    case "TransitioningWaypoint":
      text = `Moving into ${where}.`;
      break;
    case "DestinationReached":
      text = "You have reached your destination.";
      break;
  }
  return lastDetectionLabel ? `${text} Last detected: ${lastDetectionLabel}.` : text;
}

const QUERY_LEAD: Record<ObjectQuery, string> = {
  nearest: "Nearest",
  farthest: "Farthest",
  random: "Random"
};

const objectNoun = (target: KnownObjectType | null) => (target ? describeObject(target) : "object");

export function noObjectsPhrase(target: KnownObjectType | null): string {
  return `No ${objectNoun(target)}s detected.`;
}

export function objectQueryPhrase(
  query: ObjectQuery,
  found: VisibleObject,
  target: KnownObjectType | null
): string {
  const position = describePosition(found.box);
  const subject = target
    ? `${QUERY_LEAD[query]} ${describeObject(target)} is ${position}.`
    : `${QUERY_LEAD[query]} object is the ${describeObject(found.type)}, ${position}.`;
  return `${subject} ${directionalGuidance(position)}`;
}

export function objectCountPhrase(count: number, target: KnownObjectType | null): string {
  if (count === 0) {
    return noObjectsPhrase(target);
  }
  if (count === 1) {
    return `There is 1 ${objectNoun(target)} detected.`;
  }
  return `There are ${count} ${objectNoun(target)}s detected.`;
}

export function visibleObjectsPhrase(objects: readonly VisibleObject[]): string {
  if (objects.length === 0) {
    return noObjectsPhrase(null);
  }
  return sortLeftToRight(objects)
    .map((object) => `${capitalize(describeObject(object.type))} ${describePosition(object.box)}.`)
    .join(" ");
}
