export type IntervalKind = "warmup" | "highIntensity" | "rest";

export interface Interval {
  readonly name: string;
  readonly duration: number;
  readonly kind: IntervalKind;
}

export type IntervalPlan = readonly Interval[];

export interface PlanParameters {
  warmupDuration: number;
  highIntensityDuration: number;
  restDuration: number;
  repeatCount: number;
}

export type TimerPhase = "idle" | "running" | "paused" | "finished";

export interface TimerSnapshot {
  phase: TimerPhase;
  currentIndex: number;
  interval?: Interval;
  nextInterval?: Interval;
  timeRemaining: number;
  intervalEndAt?: string;
  sessionStartedAt?: string;
  highIntensityCount: number;
  restCount: number;
  totalIntervals: number;
}

export interface WorkoutSummary {
  startedAt: string;
  finishedAt: string;
}

export type ReminderMode = "everyXDays" | "weeklyWeekday";

export interface ReminderConfig {
  mode: ReminderMode;
  everyXDays: number;
  weekday: number;
  enabled: boolean;
}

export type PermissionState = "granted" | "denied" | "unknown" | "unavailable";

export const WORKOUT_TYPES = [
  "Norwegian 4x4",
  "Run",
  "Cycle",
  "Row",
  "Swim",
  "Walk",
  "Hike",
  "Elliptical",
  "Stair Climber",
  "Cross Training",
  "Other"
] as const;

export type WorkoutType = (typeof WORKOUT_TYPES)[number];

export const DEFAULT_WORKOUT_TYPE: WorkoutType = "Norwegian 4x4";

export interface WorkoutLogEntry {
  id: string;
  completedAt: string;
  workoutType: WorkoutType;
  notes: string;
}
