import { z } from "zod";
import type { HeartRateGuidance } from "../guidance/heartRate.js";
import { protocolGuide } from "../guidance/protocolGuide.js";
import { OnboardingFlow, type OnboardingStep } from "../onboarding/onboardingFlow.js";
import { NotificationIds, type NotificationRequest } from "../reminders/notifications.js";
import { reminderWeekdayTitle } from "../reminders/reminderScheduler.js";
import type { TrendSample } from "../services/healthService.js";
import { DEFAULT_WORKOUT_TYPE, WORKOUT_TYPES, type WorkoutLogEntry } from "../types.js";
import { formatClock } from "../ui/builders.js";
import type { WorkoutController, WorkoutState } from "../workoutController.js";

export const timerActionShape = {
  action: z
    .enum(["start", "pause", "resume", "skip", "reset", "status", "sync"])
    .default("status")
    .describe("sync catches the timer up after the client was away, without replaying alarms.")
};

export const timerActionInput = z.object(timerActionShape);

// Numbers are not range-checked here; out-of-range values are clamped when stored.
export const settingsShape = {
  numberOfIntervals: z.number().finite().optional(),
  warmupDuration: z.number().finite().optional().describe("Seconds; 0 skips the warmup."),
  highIntensityDuration: z.number().finite().optional().describe("Seconds."),
  restDuration: z.number().finite().optional().describe("Seconds."),
  alarmEnabled: z.boolean().optional(),
  preventSleep: z.boolean().optional(),
  userAge: z.number().finite().optional(),
  notificationsEnabled: z.boolean().optional(),
  workoutRemindersEnabled: z.boolean().optional(),
  workoutReminderMode: z.enum(["everyXDays", "weeklyWeekday"]).optional(),
  workoutReminderDays: z.number().finite().optional(),
  workoutReminderWeekday: z.number().finite().optional().describe("1 = Sunday ... 7 = Saturday."),
  healthEnabled: z.boolean().optional(),
  resetToDefaults: z.boolean().optional()
};

export const settingsInput = z.object(settingsShape);

export const logWorkoutShape = {
  action: z.enum(["save", "list"]).default("list"),
  workoutType: z.enum(WORKOUT_TYPES).default(DEFAULT_WORKOUT_TYPE),
  notes: z.string().max(500).optional()
};

export const logWorkoutInput = z.object(logWorkoutShape);

export const onboardingShape = {
  action: z.enum(["status", "next", "back", "complete", "restart"]).default("status")
};

export const onboardingInput = z.object(onboardingShape);

export interface WorkoutToolResult {
  message: string;
  state: WorkoutState;
  entry?: WorkoutLogEntry;
  entries?: readonly WorkoutLogEntry[];
}

export interface GuidanceResult {
  message: string;
  heartRate: HeartRateGuidance;
  vo2Max: readonly TrendSample[];
  guide: string[];
}

export interface OnboardingResult {
  message: string;
  step: OnboardingStep;
  progress: string;
  completed: boolean;
}

export class WorkoutToolset {
  private readonly onboarding = new OnboardingFlow();

  constructor(
    private readonly controller: WorkoutController,
    private readonly pendingReminders: () => readonly NotificationRequest[] = () => []
  ) {}

  reminders(): readonly NotificationRequest[] {
    return this.pendingReminders().filter(request => request.id !== NotificationIds.nextInterval);
  }

  entries(): readonly WorkoutLogEntry[] {
    return this.controller.entries();
  }

  async timer(input: z.input<typeof timerActionInput>, now = new Date()): Promise<WorkoutToolResult> {
    const { action } = timerActionInput.parse(input);
    const phase = this.controller.engine.phase;

    switch (action) {
      case "start": {
        const timer = await this.controller.start(now);
        return this.result(timer.phase === "running" ? `Started ${timer.interval?.name ?? "the workout"}.` : "The workout is not startable right now.");
      }
      case "pause": {
        const timer = await this.controller.pause(now);
        return this.result(
          timer.phase === "paused"
            ? `Paused with ${formatClock(timer.timeRemaining)} left.`
            : `Resumed. ${formatClock(timer.timeRemaining)} remaining.`
        );
      }
      case "resume": {
        if (phase !== "paused" && phase !== "idle") {
          return this.result("Nothing to resume.");
        }
        const timer = await this.controller.start(now);
        return this.result(`Resumed. ${formatClock(timer.timeRemaining)} remaining.`);
      }
      case "skip": {
        const timer = await this.controller.skip(now);
        return this.result(timer.phase === "finished" ? "Skipped the last interval. Workout complete." : `Skipped to ${timer.interval?.name ?? "the next interval"}.`);
      }
      case "reset": {
        await this.controller.reset();
        return this.result("Workout reset.");
      }
      case "sync": {
        const timer = await this.controller.resume(now);
        return this.result(`Caught up. Now in ${timer.interval?.name ?? "the workout"} (${timer.phase}).`);
      }
      case "status":
      default: {
        await this.controller.tick(now);
        return this.result("Here is the current workout.");
      }
    }
  }

  async updateSettings(input: z.input<typeof settingsInput>, now = new Date()): Promise<WorkoutToolResult> {
    const { resetToDefaults, ...patch } = settingsInput.parse(input);
    const settings = resetToDefaults
      ? await this.controller.resetSettingsToDefaults(now)
      : await this.controller.updateSettings(patch, now);

    const reminder = !settings.workoutRemindersEnabled
      ? "Reminders are off."
      : settings.workoutReminderMode === "everyXDays"
        ? `Reminders every ${settings.workoutReminderDays} day(s).`
        : `Reminders every ${reminderWeekdayTitle(settings.workoutReminderWeekday)}.`;
    return this.result(`Settings saved. ${settings.numberOfIntervals} intervals. ${reminder}`);
  }

  async logWorkout(input: z.input<typeof logWorkoutInput>, now = new Date()): Promise<WorkoutToolResult> {
    const parsed = logWorkoutInput.parse(input);
    if (parsed.action === "list") {
      const entries = this.controller.entries();
      return {
        ...this.result(entries.length === 0 ? "No workouts logged yet." : `${entries.length} workout(s) logged.`),
        entries
      };
    }

    const entry = await this.controller.saveWorkoutLogEntryAndResetSession(
      { workoutType: parsed.workoutType, notes: parsed.notes },
      now
    );
    return {
      ...this.result(`Logged ${entry.workoutType}.`),
      entry,
      entries: this.controller.entries()
    };
  }

  async refreshPermissions(now = new Date()): Promise<WorkoutToolResult> {
    const state = await this.controller.refreshPermissions(now);
    return {
      message: `Notifications: ${state.permissions.notifications}. Health: ${state.permissions.health}.`,
      state
    };
  }

  async guidance(): Promise<GuidanceResult> {
    const vo2Max = await this.controller.refreshVo2Max();
    const heartRate = this.controller.heartRate();
    return {
      message: `Max heart rate ${heartRate.maximumHeartRate} BPM. High intensity ${heartRate.highIntensityTarget.lower}-${heartRate.highIntensityTarget.upper} BPM, recovery ${heartRate.recoveryTarget.lower}-${heartRate.recoveryTarget.upper} BPM.`,
      heartRate,
      vo2Max,
      guide: protocolGuide(heartRate)
    };
  }

  async onboardingStep(input: z.input<typeof onboardingInput>): Promise<OnboardingResult> {
    const { action } = onboardingInput.parse(input);
    switch (action) {
      case "next":
        this.onboarding.next();
        break;
      case "back":
        this.onboarding.back();
        break;
      case "complete":
        await this.controller.completeOnboarding();
        break;
      case "restart":
        this.onboarding.goTo("welcome");
        await this.controller.updateSettings({ hasCompletedOnboarding: false });
        break;
      case "status":
      default:
        break;
    }

    const completed = this.controller.getSettings().hasCompletedOnboarding;
    return {
      message: completed ? "Onboarding complete." : `${this.onboarding.title} (${this.onboarding.progressText})`,
      step: this.onboarding.currentStep,
      progress: this.onboarding.progressText,
      completed
    };
  }

  private result(message: string): WorkoutToolResult {
    return { message, state: this.controller.state() };
  }
}
