import {
  HELP_PHRASE,
  MENU_EXIT_PHRASE,
  MENU_OPEN_PHRASE,
  UNRECOGNIZED_COMMAND_PHRASE
} from "../announce/phrases";
import type { NavigationEngine } from "../runtime/NavigationEngine";
import type { SpeechSink } from "../runtime/ports";
import { KNOWN_OBJECT_TYPES, describeObject, type KnownObjectType } from "../types/objects";

export type VoiceCommandType =
  | "nearest"
  | "farthest"
  | "random"
  | "count"
  | "describeVisible"
  | "help"
  | "status"
  | "repeat"
  | "restart"
  | "exit"
  | "unknown";

export type VoiceCommand = {
  type: VoiceCommandType;
  /** The object named in a query, e.g. `printer` in "nearest printer". */
  target: KnownObjectType | null;
};

// First match wins, so object queries are checked before the plainer phrases.
const COMMAND_PHRASES: ReadonlyArray<[VoiceCommandType, readonly string[]]> = [
  ["nearest", ["nearest", "closest"]],
  ["farthest", ["farthest", "furthest"]],
  ["random", ["random"]],
  ["count", ["how many"]],
  ["describeVisible", ["what do you see", "what is around", "what s around", "read out", "describe"]],
  ["help", ["help", "what can i say", "what can i do"]],
  ["status", ["where am i", "where are we", "status"]],
  ["repeat", ["repeat", "say again", "say that again"]],
  ["restart", ["restart", "start over"]],
  ["exit", ["exit", "quit", "close the menu"]]
];

const TARGETED: ReadonlySet<VoiceCommandType> = new Set<VoiceCommandType>([
  "nearest",
  "farthest",
  "random",
  "count"
]);

const normalize = (transcript: string) =>
  transcript.toLowerCase().replace(/[^a-z\s]/g, " ").replace(/\s+/g, " ").trim();

function findTarget(spoken: string): KnownObjectType | null {
  return KNOWN_OBJECT_TYPES.find((type) => spoken.includes(describeObject(type))) ?? null;
}

export function parseVoiceCommand(transcript: string): VoiceCommand {
  const spoken = normalize(transcript);
  if (!spoken) {
    return { type: "unknown", target: null };
  }
  for (const [type, phrases] of COMMAND_PHRASES) {
    if (phrases.some((phrase) => spoken.includes(phrase))) {
      return { type, target: TARGETED.has(type) ? findTarget(spoken) : null };
    }
  }
  return { type: "unknown", target: null };
}

type CommandTarget = Pick<
  NavigationEngine,
  "announceStatus" | "repeatLastInstruction" | "restart" | "findObject" | "countObjects" | "describeVisible"
>;

/**
 * The spoken command menu. It starts open; "exit" closes it and transcripts are
 * ignored until `openMenu()`.
 */
export class VoiceCommandRouter {
  private engine: CommandTarget;
  private speech: SpeechSink;
  private open = true;

  constructor(engine: CommandTarget, speech: SpeechSink) {
    this.engine = engine;
    this.speech = speech;
  }

  isOpen(): boolean {
    return this.open;
  }

  openMenu(): void {
    this.open = true;
    this.speech.announce(MENU_OPEN_PHRASE);
  }

  /** Returns the command acted on, or null while the menu is closed. */
  handle(transcript: string): VoiceCommand | null {
    if (!this.open) {
      return null;
    }

    const command = parseVoiceCommand(transcript);
    switch (command.type) {
      case "nearest":
      case "farthest":
      case "random":
        this.engine.findObject(command.type, command.target);
        break;
      case "count":
        this.engine.countObjects(command.target);
        break;
      case "describeVisible":
        this.engine.describeVisible();
        break;
      case "status":
        this.engine.announceStatus();
        break;
      case "repeat":
        this.engine.repeatLastInstruction();
        break;
      case "restart":
        this.engine.restart();
        break;
      case "help":
        this.speech.announce(HELP_PHRASE);
        break;
      case "exit":
        this.open = false;
        this.speech.announce(MENU_EXIT_PHRASE);
        break;
      case "unknown":
        this.speech.announce(UNRECOGNIZED_COMMAND_PHRASE);
        break;
    }
    return command;
  }
}
