import { z } from "zod";
import { DEFAULT_AGE, MAX_SUPPORTED_AGE, MIN_SUPPORTED_AGE } from "../guidance/heartRate.js";
import { MAX_REMINDER_DAYS, MIN_REMINDER_DAYS } from "../reminders/reminderScheduler.js";
import type { KeyValueStore } from "../state/keyValueStore.js";
import type { PlanParameters, ReminderConfig, ReminderMode } from "../types.js";

export interface WorkoutSettings {
  numberOfIntervals: number;
  warmupDuration: number;
  highIntensityDuration: number;
  restDuration: number;
  alarmEnabled: boolean;
  preventSleep: boolean;
  userAge: number;
  notificationsEnabled: boolean;
  notificationPermissionRequested: boolean;
  workoutRemindersEnabled: boolean;
  workoutReminderDays: number;
  workoutReminderMode: ReminderMode;
  /** 0 until a day is picked; 1 = Sunday ... 7 = Saturday. */
  workoutReminderWeekday: number;
  healthEnabled: boolean;
  healthPermissionRequested: boolean;
  hasCompletedOnboarding: boolean;
}

export type SettingKey = keyof WorkoutSettings;

export const DEFAULT_SETTINGS: Readonly<WorkoutSettings> = Object.freeze({
  numberOfIntervals: 4,
  warmupDuration: 5 * 60,
  highIntensityDuration: 4 * 60,
  restDuration: 3 * 60,
  alarmEnabled: true,
  preventSleep: true,
  userAge: DEFAULT_AGE,
  notificationsEnabled: false,
  notificationPermissionRequested: false,
  workoutRemindersEnabled: false,
  workoutReminderDays: 3,
  workoutReminderMode: "everyXDays",
  workoutReminderWeekday: 0,
  healthEnabled: false,
  healthPermissionRequested: false,
  hasCompletedOnboarding: false
});

export const SETTING_LIMITS = {
  numberOfIntervals: { min: 1, max: 20 },
  warmupDuration: { min: 0, max: 3600 },
  highIntensityDuration: { min: 1, max: 3600 },
  restDuration: { min: 0, max: 3600 },
  userAge: { min: MIN_SUPPORTED_AGE, max: MAX_SUPPORTED_AGE },
  workoutReminderDays: { min: MIN_REMINDER_DAYS, max: MAX_REMINDER_DAYS },
  workoutReminderWeekday: { min: 0, max: 7 }
} as const;

type NumericSettingKey = keyof typeof SETTING_LIMITS;

const PLAN_KEYS: readonly SettingKey[] = ["numberOfIntervals", "warmupDuration", "highIntensityDuration", "restDuration"];
const REMINDER_KEYS: readonly SettingKey[] = [
  "workoutRemindersEnabled",
  "workoutReminderDays",
  "workoutReminderMode",
  "workoutReminderWeekday"
];

function storedNumber(fallback: number) {
  return z.coerce.number().finite().catch(fallback);
}

function storedBoolean(fallback: boolean) {
  return z
    .enum(["true", "false"])
    .transform(value => value === "true")
    .catch(fallback);
}

const storedSettingsSchema = z.object({
  numberOfIntervals: storedNumber(DEFAULT_SETTINGS.numberOfIntervals),
  warmupDuration: storedNumber(DEFAULT_SETTINGS.warmupDuration),
  highIntensityDuration: storedNumber(DEFAULT_SETTINGS.highIntensityDuration),
  restDuration: storedNumber(DEFAULT_SETTINGS.restDuration),
  alarmEnabled: storedBoolean(DEFAULT_SETTINGS.alarmEnabled),
  preventSleep: storedBoolean(DEFAULT_SETTINGS.preventSleep),
  userAge: storedNumber(DEFAULT_SETTINGS.userAge),
  notificationsEnabled: storedBoolean(DEFAULT_SETTINGS.notificationsEnabled),
  notificationPermissionRequested: storedBoolean(DEFAULT_SETTINGS.notificationPermissionRequested),
  workoutRemindersEnabled: storedBoolean(DEFAULT_SETTINGS.workoutRemindersEnabled),
  workoutReminderDays: storedNumber(DEFAULT_SETTINGS.workoutReminderDays),
  workoutReminderMode: z.enum(["everyXDays", "weeklyWeekday"]).catch(DEFAULT_SETTINGS.workoutReminderMode),
  workoutReminderWeekday: storedNumber(DEFAULT_SETTINGS.workoutReminderWeekday),
  healthEnabled: storedBoolean(DEFAULT_SETTINGS.healthEnabled),
  healthPermissionRequested: storedBoolean(DEFAULT_SETTINGS.healthPermissionRequested),
  hasCompletedOnboarding: storedBoolean(DEFAULT_SETTINGS.hasCompletedOnboarding)
});

export const SETTING_KEYS: readonly SettingKey[] = storedSettingsSchema.keyof().options;

function clampNumber(key: NumericSettingKey, value: number): number {
  const { min, max } = SETTING_LIMITS[key];
  if (!Number.isFinite(value)) {
    return DEFAULT_SETTINGS[key];
  }
  return Math.min(Math.max(value, min), max);
}

function clampInteger(key: NumericSettingKey, value: number): number {
  return clampNumber(key, Number.isFinite(value) ? Math.round(value) : value);
}

/**
 * Pulls every numeric setting into its allowed range. Applied on every write
 * and every load; clamping an already clamped value returns it unchanged.
 */
export function clampSettings(settings: WorkoutSettings): WorkoutSettings {
  return {
    ...settings,
    numberOfIntervals: clampInteger("numberOfIntervals", settings.numberOfIntervals),
    warmupDuration: clampNumber("warmupDuration", settings.warmupDuration),
    highIntensityDuration: clampNumber("highIntensityDuration", settings.highIntensityDuration),
    restDuration: clampNumber("restDuration", settings.restDuration),
    userAge: clampInteger("userAge", settings.userAge),
    workoutReminderDays: clampInteger("workoutReminderDays", settings.workoutReminderDays),
    workoutReminderWeekday: clampInteger("workoutReminderWeekday", settings.workoutReminderWeekday)
  };
}

export function applySettingsPatch(current: WorkoutSettings, patch: Partial<WorkoutSettings>): WorkoutSettings {
  const merged: WorkoutSettings = { ...current };
  for (const key of SETTING_KEYS) {
    if (patch[key] !== undefined) {
      Object.assign(merged, { [key]: patch[key] });
    }
  }
  return clampSettings(merged);
}

export function changedSettingKeys(before: WorkoutSettings, after: WorkoutSettings): SettingKey[] {
  return SETTING_KEYS.filter(key => before[key] !== after[key]);
}

export function touchesPlan(keys: readonly SettingKey[]): boolean {
  return keys.some(key => PLAN_KEYS.includes(key));
}

export function touchesReminders(keys: readonly SettingKey[]): boolean {
  return keys.some(key => REMINDER_KEYS.includes(key));
}

export function planParameters(settings: WorkoutSettings): PlanParameters {
  return {
    warmupDuration: settings.warmupDuration,
    highIntensityDuration: settings.highIntensityDuration,
    restDuration: settings.restDuration,
    repeatCount: settings.numberOfIntervals
  };
}

export function reminderConfig(settings: WorkoutSettings): ReminderConfig {
  return {
    mode: settings.workoutReminderMode,
    everyXDays: settings.workoutReminderDays,
    weekday: settings.workoutReminderWeekday,
    enabled: settings.workoutRemindersEnabled
  };
}

export async function loadSettings(store: KeyValueStore): Promise<WorkoutSettings> {
  const stored: Record<string, string | undefined> = {};
  for (const key of SETTING_KEYS) {
    stored[key] = await store.get(key);
  }
  return clampSettings(storedSettingsSchema.parse(stored));
}

export async function saveSettings(
  store: KeyValueStore,
  settings: WorkoutSettings,
  keys: readonly SettingKey[] = SETTING_KEYS
): Promise<void> {
  for (const key of keys) {
    await store.set(key, String(settings[key]));
  }
}
