/**
 * Single-consumer queue. Messages are handled one at a time in arrival order;
 * anything posted while a message is being handled (including from inside the
 * handler) waits its turn instead of running re-entrantly.
 */
export class SerialMailbox<T> {
  private queue: T[] = [];
  private draining = false;
  private handler: (message: T) => void;
  private onError: (error: unknown, message: T) => void;

  constructor(handler: (message: T) => void, onError: (error: unknown, message: T) => void) {
    this.handler = handler;
    this.onError = onError;
  }

  post(message: T): void {
    this.queue.push(message);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      while (this.queue.length > 0) {
        const [next] = this.queue.splice(0, 1);
        if (next === undefined) break;
        try {
          this.handler(next);
        } catch (error) {
          this.onError(error, next);
        }
      }
    } finally {
      this.draining = false;
    }
  }

  get size(): number {
    return this.queue.length;
  }
}
