import type { TimerHandle, TimerService } from "./ports";

export class SystemTimerService implements TimerService {
  scheduleAfter(delayMs: number, callback: () => void): TimerHandle {
    const timeout = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(timeout)
    };
  }
}

type PendingTimer = {
  id: number;
  dueAt: number;
  callback: () => void;
};

/**
 * Virtual clock for replays and tests. Time only moves when `advanceBy` or
 * `advanceTo` is called; due callbacks run in due-time order, ties in
 * scheduling order.
 */
export class ManualTimerService implements TimerService {
  private currentTime: number;
  private nextId = 1;
  private pending: PendingTimer[] = [];

  constructor(startAt = 0) {
    this.currentTime = startAt;
  }

  now(): number {
    return this.currentTime;
  }

  scheduleAfter(delayMs: number, callback: () => void): TimerHandle {
    const timer: PendingTimer = {
      id: this.nextId++,
      dueAt: this.currentTime + Math.max(0, delayMs),
      callback
    };
    this.pending.push(timer);
    return {
      cancel: () => {
        this.pending = this.pending.filter((entry) => entry.id !== timer.id);
      }
    };
  }

  advanceBy(ms: number): void {
    this.advanceTo(this.currentTime + ms);
  }

  advanceTo(time: number): void {
    if (time < this.currentTime) {
      return;
    }

    let next = this.nextDue(time);
    while (next) {
      const due = next;
      this.pending = this.pending.filter((entry) => entry.id !== due.id);
      this.currentTime = due.dueAt;
      due.callback();
      next = this.nextDue(time);
    }
    this.currentTime = time;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  private nextDue(limit: number): PendingTimer | undefined {
    let earliest: PendingTimer | undefined;
    for (const entry of this.pending) {
      if (entry.dueAt > limit) continue;
      if (!earliest || entry.dueAt < earliest.dueAt || (entry.dueAt === earliest.dueAt && entry.id < earliest.id)) {
        earliest = entry;
      }
    }
    return earliest;
  }
}
