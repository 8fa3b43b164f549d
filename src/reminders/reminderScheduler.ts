import { addDays, format, getDay, isSameDay, isValid, parseISO, set, startOfDay } from "date-fns";
import { NotificationIds, type NotificationId, type NotificationRequest } from "./notifications.js";
import type { PermissionState, ReminderConfig, WorkoutLogEntry } from "../types.js";

export const REMINDER_HOUR = 9;
export const SECONDS_PER_DAY = 86_400;
export const MIN_REMINDER_DAYS = 1;
export const MAX_REMINDER_DAYS = 30;

export const WEEKDAY_TITLES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export function isValidWeekday(weekday: number): boolean {
  return Number.isInteger(weekday) && weekday >= 1 && weekday <= 7;
}

/** 1 = Sunday ... 7 = Saturday. */
export function weekdayOf(date: Date): number {
  return getDay(date) + 1;
}

export function reminderWeekdayTitle(weekday: number): string {
  return WEEKDAY_TITLES[weekday - 1] ?? "Unset";
}

export function resolveWeekday(weekday: number, now: Date): number {
  return isValidWeekday(weekday) ? weekday : weekdayOf(now);
}

export function followUpMoment(scheduledDate: Date): Date {
  return set(addDays(startOfDay(scheduledDate), 1), { hours: REMINDER_HOUR, minutes: 0, seconds: 0, milliseconds: 0 });
}

/**
 * The weekly workout day a follow-up could still be sent for: the earliest
 * matching day from yesterday on whose follow-up moment is still ahead.
 */
export function scheduledWorkoutDate(weekday: number, now: Date): Date {
  const yesterday = addDays(startOfDay(now), -1);
  const offset = (weekday - weekdayOf(yesterday) + 7) % 7;
  const candidate = addDays(yesterday, offset);
  return followUpMoment(candidate) > now ? candidate : addDays(candidate, 7);
}

export interface ReminderDecisionInput {
  config: ReminderConfig;
  permission: PermissionState;
  now: Date;
  log: readonly WorkoutLogEntry[];
}

export interface ReminderDecision {
  /** The config after weekday resolution and any forced disable. */
  config: ReminderConfig;
  cancel: NotificationId[];
  schedule: NotificationRequest[];
  forceDisabled: boolean;
}

function loggedOn(log: readonly WorkoutLogEntry[], day: Date): boolean {
  return log.some(entry => {
    const completedAt = parseISO(entry.completedAt);
    return isValid(completedAt) && isSameDay(completedAt, day);
  });
}

function everyXDaysRequest(days: number): NotificationRequest {
  return {
    id: NotificationIds.workoutReminder,
    title: "Time to train",
    body: days === 1 ? "Your daily interval session is waiting." : `It's been ${days} days. Time for your next interval session.`,
    trigger: { type: "elapsed", seconds: days * SECONDS_PER_DAY },
    repeats: true
  };
}

function weeklyRequest(weekday: number): NotificationRequest {
  return {
    id: NotificationIds.workoutReminder,
    title: "Time to train",
    body: `It's ${reminderWeekdayTitle(weekday)}. Your interval session is on today.`,
    trigger: { type: "calendar", weekday, hour: REMINDER_HOUR, minute: 0 },
    repeats: true
  };
}

function followUpRequest(weekday: number, scheduledDate: Date): NotificationRequest {
  return {
    id: NotificationIds.missedWorkoutFollowUp,
    title: "Missed your workout?",
    body: `No session was logged on ${reminderWeekdayTitle(weekday)}. Today works too.`,
    trigger: { type: "calendar", date: format(followUpMoment(scheduledDate), "yyyy-MM-dd"), hour: REMINDER_HOUR, minute: 0 },
    repeats: false
  };
}

/**
 * Computes which reminders should exist. Every decision cancels the standing
 * reminder before rescheduling it, so only one recurring reminder is ever
 * outstanding and changing the mode or its parameters is idempotent.
 */
export function decideReminders(input: ReminderDecisionInput): ReminderDecision {
  const { permission, now, log } = input;
  const config: ReminderConfig =
    input.config.mode === "weeklyWeekday"
      ? { ...input.config, weekday: resolveWeekday(input.config.weekday, now) }
      : { ...input.config };

  if (!config.enabled || permission !== "granted") {
    const forceDisabled = config.enabled && (permission === "denied" || permission === "unavailable");
    return {
      config: forceDisabled ? { ...config, enabled: false } : config,
      cancel: [NotificationIds.workoutReminder, NotificationIds.missedWorkoutFollowUp],
      schedule: [],
      forceDisabled
    };
  }

  if (config.mode === "everyXDays") {
    return {
      config,
      cancel: [NotificationIds.missedWorkoutFollowUp, NotificationIds.workoutReminder],
      schedule: [everyXDaysRequest(config.everyXDays)],
      forceDisabled: false
    };
  }

  const scheduledDate = scheduledWorkoutDate(config.weekday, now);
  const schedule = [weeklyRequest(config.weekday)];
  if (!loggedOn(log, scheduledDate)) {
    schedule.push(followUpRequest(config.weekday, scheduledDate));
  }

  return {
    config,
    cancel: [NotificationIds.workoutReminder, NotificationIds.missedWorkoutFollowUp],
    schedule,
    forceDisabled: false
  };
}
