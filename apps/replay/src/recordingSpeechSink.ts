import type { NavigationLogger, SpeechSink } from "@corridor-guide/nav-core";

export type TranscriptLine = {
  at: number;
  text: string;
};

/** Stands in for text-to-speech during a replay, stamping each utterance with the virtual clock. */
export class RecordingSpeechSink implements SpeechSink {
  readonly lines: TranscriptLine[] = [];
  private clock: () => number;
  private logger: NavigationLogger;

  constructor(clock: () => number, logger: NavigationLogger) {
    this.clock = clock;
    this.logger = logger;
  }

  announce(text: string): void {
    const line = { at: this.clock(), text };
    this.lines.push(line);
    this.logger.debug(`[Replay] speak @${line.at}ms: ${text}`);
  }
}

export function formatTranscriptLine(line: TranscriptLine): string {
  return `${(line.at / 1000).toFixed(2).padStart(7)}s  ${line.text}`;
}
