import type { PlanSummary } from "../plan/intervalPlan.js";
import type { NotificationRequest } from "../reminders/notifications.js";
import { SECONDS_PER_DAY, reminderWeekdayTitle } from "../reminders/reminderScheduler.js";
import type { TimerSnapshot, WorkoutLogEntry, WorkoutSummary } from "../types.js";
import type { WorkoutState } from "../workoutController.js";

export interface InlineCard {
  surface: "inline_card";
  heading: string;
  body: string;
  badge?: string;
  cta?: {
    label: string;
    action: "start_workout" | "pause_workout" | "resume_workout" | "log_workout";
  };
  accessibilityLabel: string;
}

export interface LogRow {
  id: string;
  title: string;
  subtitle: string;
}

export type WorkoutStructuredContent = {
  inlineCard: InlineCard;
  timer: TimerSnapshot;
  plan: PlanSummary;
  summary?: WorkoutSummary;
  log?: LogRow[];
  reminders?: string[];
};

/** Seconds as mm:ss, rounding up so a countdown never shows 00:00 early. */
export function formatClock(seconds: number): string {
  const total = Math.max(Math.ceil(seconds), 0);
  const minutes = Math.floor(total / 60);
  const rest = total % 60;
  return `${String(minutes).padStart(2, "0")}:${String(rest).padStart(2, "0")}`;
}

export function formatDuration(seconds: number): string {
  const total = Math.max(Math.round(seconds), 0);
  const minutes = Math.floor(total / 60);
  const rest = total % 60;
  if (minutes > 0 && rest > 0) {
    return `${minutes}m ${rest}s`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes === 1 ? "" : "s"}`;
  }
  return `${rest} second${rest === 1 ? "" : "s"}`;
}

function statusCopy(timer: TimerSnapshot): string {
  const name = timer.interval?.name ?? "Workout";
  switch (timer.phase) {
    case "running":
      return `${name}: ${formatClock(timer.timeRemaining)} remaining`;
    case "paused":
      return `${name} paused with ${formatClock(timer.timeRemaining)} left`;
    case "finished":
      return "Workout complete. Log it to start a fresh session.";
    case "idle":
    default:
      return `Ready: ${timer.totalIntervals} intervals, starting with ${name}`;
  }
}

export function buildInlineCard(timer: TimerSnapshot): InlineCard {
  const progress = `Interval ${Math.min(timer.currentIndex + 1, timer.totalIntervals)} of ${timer.totalIntervals}`;
  return {
    surface: "inline_card",
    heading: timer.phase === "finished" ? "Workout complete" : progress,
    body: statusCopy(timer),
    badge: timer.interval?.kind === "highIntensity" ? `High ${timer.highIntensityCount}` : timer.interval?.kind === "rest" ? `Rest ${timer.restCount}` : undefined,
    cta: timer.phase === "running"
      ? { label: "Pause", action: "pause_workout" }
      : timer.phase === "paused"
        ? { label: "Resume", action: "resume_workout" }
        : timer.phase === "finished"
          ? { label: "Log workout", action: "log_workout" }
          : { label: "Start", action: "start_workout" },
    accessibilityLabel: `${progress}, ${statusCopy(timer)}`
  };
}

export function buildLogRow(entry: WorkoutLogEntry): LogRow {
  return {
    id: entry.id,
    title: entry.workoutType,
    subtitle: entry.notes ? `${entry.completedAt} · ${entry.notes}` : entry.completedAt
  };
}

export function describeReminder(request: NotificationRequest): string {
  const { trigger } = request;
  if (trigger.type === "elapsed") {
    const days = trigger.seconds / SECONDS_PER_DAY;
    const every = Number.isInteger(days) ? `${days} day${days === 1 ? "" : "s"}` : formatDuration(trigger.seconds);
    return `${request.title}: every ${every}`;
  }
  if (trigger.date) {
    return `${request.title}: ${trigger.date} at ${String(trigger.hour).padStart(2, "0")}:00`;
  }
  return `${request.title}: ${reminderWeekdayTitle(trigger.weekday ?? 0)}s at ${String(trigger.hour).padStart(2, "0")}:00`;
}

export function buildWorkoutStructuredContent(input: {
  state: WorkoutState;
  entries?: readonly WorkoutLogEntry[];
  reminders?: readonly NotificationRequest[];
}): WorkoutStructuredContent {
  const { state, entries = [], reminders = [] } = input;
  return {
    inlineCard: buildInlineCard(state.timer),
    timer: state.timer,
    plan: state.plan,
    summary: state.pendingSummary ?? undefined,
    log: entries.length > 0 ? entries.slice(0, 8).map(entry => buildLogRow(entry)) : undefined,
    reminders: reminders.length > 0 ? reminders.map(request => describeReminder(request)) : undefined
  };
}
