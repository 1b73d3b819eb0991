/** Text-to-speech output. A new utterance supersedes whatever is still playing. */
export interface SpeechSink {
  announce(text: string): void;
}

export type TimerHandle = {
  cancel(): void;
};

export interface TimerService {
  scheduleAfter(delayMs: number, callback: () => void): TimerHandle;
}

export type NavigationLogger = Pick<Console, "debug" | "info" | "warn" | "error">;
