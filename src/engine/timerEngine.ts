import { EventEmitter } from "events";
import { addSeconds, differenceInMilliseconds, formatISO } from "date-fns";
import { NotificationIds, cancelIntent, scheduleIntent, type NotificationIntent } from "../reminders/notifications.js";
import type { Interval, IntervalPlan, TimerPhase, TimerSnapshot, WorkoutSummary } from "../types.js";

interface TimerSession {
  plan: IntervalPlan;
  currentIndex: number;
  running: boolean;
  finished: boolean;
  timeRemaining: number;
  intervalEndAt?: Date;
  sessionStartedAt?: Date;
}

type TimerEngineEvents = {
  finished: (summary: WorkoutSummary) => void;
  alarm: () => void;
  notification: (intent: NotificationIntent) => void;
};

export interface ReconcileOptions {
  /** Set to false when catching up after a resume so stale boundaries stay quiet. */
  playAlarm?: boolean;
}

function secondsBetween(later: Date, earlier: Date): number {
  return differenceInMilliseconds(later, earlier) / 1000;
}

export class TimerEngine {
  private readonly emitter = new EventEmitter();
  private session: TimerSession;

  constructor(plan: IntervalPlan) {
    this.session = TimerEngine.freshSession(plan);
  }

  on<T extends keyof TimerEngineEvents>(event: T, listener: TimerEngineEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  get plan(): IntervalPlan {
    return this.session.plan;
  }

  get phase(): TimerPhase {
    const { finished, running, sessionStartedAt } = this.session;
    if (finished) {
      return "finished";
    }
    if (running) {
      return "running";
    }
    return sessionStartedAt ? "paused" : "idle";
  }

  snapshot(): TimerSnapshot {
    const { plan, currentIndex, timeRemaining, intervalEndAt, sessionStartedAt } = this.session;
    const passed = plan.slice(0, currentIndex + 1);
    return {
      phase: this.phase,
      currentIndex,
      interval: plan[currentIndex],
      nextInterval: plan[currentIndex + 1],
      timeRemaining,
      intervalEndAt: intervalEndAt ? formatISO(intervalEndAt) : undefined,
      sessionStartedAt: sessionStartedAt ? formatISO(sessionStartedAt) : undefined,
      highIntensityCount: passed.filter(interval => interval.kind === "highIntensity").length,
      restCount: passed.filter(interval => interval.kind === "rest").length,
      totalIntervals: plan.length
    };
  }

  start(now = new Date()): TimerSnapshot {
    const session = this.session;
    if (session.running || session.finished) {
      return this.snapshot();
    }

    session.running = true;
    if (!session.intervalEndAt) {
      session.intervalEndAt = addSeconds(now, session.timeRemaining);
    }
    if (!session.sessionStartedAt) {
      session.sessionStartedAt = now;
    }

    this.reconcile(now);
    if (session.running) {
      this.scheduleNextIntervalNotification();
    }
    return this.snapshot();
  }

  /** Pauses a running session, or resumes a paused one. */
  pause(now = new Date()): TimerSnapshot {
    if (!this.session.running) {
      return this.start(now);
    }

    this.reconcile(now);
    const session = this.session;
    if (!session.running) {
      return this.snapshot();
    }

    session.timeRemaining = session.intervalEndAt ? Math.max(secondsBetween(session.intervalEndAt, now), 0) : session.timeRemaining;
    session.running = false;
    session.intervalEndAt = undefined;
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
    return this.snapshot();
  }

  skip(now = new Date()): TimerSnapshot {
    const session = this.session;
    if (session.finished) {
      return this.snapshot();
    }

    this.emitter.emit("alarm");
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));

    const next = session.plan[session.currentIndex + 1];
    if (!next) {
      this.finish(now);
      return this.snapshot();
    }

    session.currentIndex += 1;
    session.timeRemaining = next.duration;
    session.intervalEndAt = session.running ? addSeconds(now, next.duration) : undefined;
    if (session.running) {
      this.scheduleNextIntervalNotification();
    }
    return this.snapshot();
  }

  /**
   * Brings the session up to date with `now`, crossing as many interval
   * boundaries as have elapsed. Calling it again with the same `now` changes
   * nothing.
   */
  reconcile(now = new Date(), options: ReconcileOptions = {}): TimerSnapshot {
    const session = this.session;
    if (!session.running || session.finished) {
      return this.snapshot();
    }

    const current = session.plan[session.currentIndex];
    if (!current || !session.intervalEndAt) {
      console.error("TimerEngine stopped a session without a valid current interval", {
        currentIndex: session.currentIndex,
        planLength: session.plan.length
      });
      session.running = false;
      session.intervalEndAt = undefined;
      session.timeRemaining = 0;
      this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
      return this.snapshot();
    }

    if (now < session.intervalEndAt) {
      session.timeRemaining = secondsBetween(session.intervalEndAt, now);
      return this.snapshot();
    }

    let cursorIndex = session.currentIndex;
    let cursorEnd = session.intervalEndAt;
    let exhausted = false;
    while (now >= cursorEnd) {
      const next: Interval | undefined = session.plan[cursorIndex + 1];
      if (!next) {
        exhausted = true;
        break;
      }
      cursorIndex += 1;
      cursorEnd = addSeconds(cursorEnd, next.duration);
    }

    if (options.playAlarm ?? true) {
      this.emitter.emit("alarm");
    }

    if (exhausted) {
      this.finish(cursorEnd);
      return this.snapshot();
    }

    session.currentIndex = cursorIndex;
    session.intervalEndAt = cursorEnd;
    session.timeRemaining = secondsBetween(cursorEnd, now);
    this.scheduleNextIntervalNotification();
    return this.snapshot();
  }

  tick(now = new Date()): TimerSnapshot {
    return this.reconcile(now);
  }

  reset(): TimerSnapshot {
    this.session = TimerEngine.freshSession(this.session.plan);
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
    return this.snapshot();
  }

  replacePlan(plan: IntervalPlan): TimerSnapshot {
    this.session = TimerEngine.freshSession(plan);
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
    return this.snapshot();
  }

  /** Ends the session. Only a session that was actually started reports a summary. */
  private finish(finishedAt: Date): void {
    const session = this.session;
    const startedAt = session.sessionStartedAt;
    session.running = false;
    session.finished = true;
    session.intervalEndAt = undefined;
    session.sessionStartedAt = undefined;
    session.timeRemaining = 0;
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
    if (!startedAt) {
      return;
    }
    this.emitter.emit("finished", {
      startedAt: formatISO(startedAt),
      finishedAt: formatISO(finishedAt)
    });
  }

  private scheduleNextIntervalNotification(): void {
    const { plan, currentIndex, timeRemaining } = this.session;
    const next = plan[currentIndex + 1];
    this.emitter.emit("notification", cancelIntent(NotificationIds.nextInterval));
    if (!next) {
      return;
    }
    this.emitter.emit(
      "notification",
      scheduleIntent({
        id: NotificationIds.nextInterval,
        title: "Interval",
        body: `Next interval: ${next.name} is starting.`,
        trigger: { type: "elapsed", seconds: timeRemaining },
        repeats: false
      })
    );
  }

  private static freshSession(plan: IntervalPlan): TimerSession {
    return {
      plan,
      currentIndex: 0,
      running: false,
      finished: false,
      timeRemaining: plan[0]?.duration ?? 0
    };
  }
}
