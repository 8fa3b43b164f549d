import type { TimerSnapshot } from "../types.js";

export interface SessionTickerOptions {
  intervalMs?: number;
  onTick: (now: Date) => TimerSnapshot | Promise<TimerSnapshot>;
}

const DEFAULT_INTERVAL_MS = 1000;

/**
 * Drives periodic reconciliation while a session runs. Stops itself once a
 * tick reports the session is no longer running.
 */
export class SessionTicker {
  private readonly intervalMs: number;
  private readonly onTick: SessionTickerOptions["onTick"];
  private interval: NodeJS.Timeout | null = null;

  constructor(options: SessionTickerOptions) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.onTick = options.onTick;
  }

  get active(): boolean {
    return this.interval !== null;
  }

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => {
      Promise.resolve(this.onTick(new Date()))
        .then(snapshot => {
          if (snapshot.phase !== "running") {
            this.stop();
          }
        })
        .catch(error => {
          console.error("Session tick failed", error);
          this.stop();
        });
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.interval) {
      return;
    }
    clearInterval(this.interval);
    this.interval = null;
  }
}
