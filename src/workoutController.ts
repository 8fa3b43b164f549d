import { parseISO } from "date-fns";
import { TimerEngine } from "./engine/timerEngine.js";
import { SessionTicker } from "./engine/ticker.js";
import { heartRateGuidance, type HeartRateGuidance } from "./guidance/heartRate.js";
import { WorkoutLog } from "./log/workoutLog.js";
import { PermissionGate } from "./permissions/permissionGate.js";
import { buildIntervalPlan, describePlan, type PlanSummary } from "./plan/intervalPlan.js";
import { NotificationDispatcher } from "./reminders/notificationDispatcher.js";
import type { NotificationIntent } from "./reminders/notifications.js";
import { decideReminders, type ReminderDecision } from "./reminders/reminderScheduler.js";
import { INTERVAL_ALARM_SOUND, type AlarmPlayer } from "./services/alarmPlayer.js";
import { VO2_MAX_SAMPLE_LIMIT, type HealthDataService, type TrendSample } from "./services/healthService.js";
import type { NotificationService } from "./services/notificationService.js";
import {
  DEFAULT_SETTINGS,
  applySettingsPatch,
  changedSettingKeys,
  loadSettings,
  planParameters,
  reminderConfig,
  saveSettings,
  touchesPlan,
  touchesReminders,
  type SettingKey,
  type WorkoutSettings
} from "./settings/settings.js";
import type { KeyValueStore } from "./state/keyValueStore.js";
import {
  DEFAULT_WORKOUT_TYPE,
  type PermissionState,
  type TimerSnapshot,
  type WorkoutLogEntry,
  type WorkoutSummary,
  type WorkoutType
} from "./types.js";

export interface WorkoutControllerOptions {
  store: KeyValueStore;
  notifications: NotificationService;
  alarm: AlarmPlayer;
  health?: HealthDataService;
  /** Starts a ticker that reconciles the session while it runs. */
  tickIntervalMs?: number;
}

export interface WorkoutState {
  timer: TimerSnapshot;
  plan: PlanSummary;
  settings: WorkoutSettings;
  permissions: {
    notifications: PermissionState;
    health: PermissionState;
  };
  pendingSummary: WorkoutSummary | null;
}

const RESETTABLE_KEYS: readonly SettingKey[] = [
  "numberOfIntervals",
  "warmupDuration",
  "highIntensityDuration",
  "restDuration",
  "alarmEnabled",
  "preventSleep",
  "notificationsEnabled"
];

export class WorkoutController {
  readonly engine: TimerEngine;
  readonly log: WorkoutLog;
  readonly permissions = new PermissionGate();
  private readonly dispatcher: NotificationDispatcher;
  private readonly ticker: SessionTicker | null;
  private settings: WorkoutSettings;
  private pendingSummary: WorkoutSummary | null = null;
  private finishedSinceFlush: WorkoutSummary[] = [];
  private outbox: NotificationIntent[] = [];
  private vo2MaxSamples: TrendSample[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(private readonly options: WorkoutControllerOptions, settings: WorkoutSettings) {
    this.settings = settings;
    this.log = new WorkoutLog(options.store);
    this.dispatcher = new NotificationDispatcher(options.notifications);
    this.engine = new TimerEngine(buildIntervalPlan(planParameters(settings)));
    this.ticker = options.tickIntervalMs
      ? new SessionTicker({ intervalMs: options.tickIntervalMs, onTick: now => this.tick(now) })
      : null;

    this.engine.on("notification", intent => {
      this.outbox.push(intent);
    });
    this.engine.on("alarm", () => this.playAlarm());
    this.engine.on("finished", summary => {
      this.pendingSummary = summary;
      this.finishedSinceFlush.push(summary);
    });
  }

  static async create(options: WorkoutControllerOptions, now = new Date()): Promise<WorkoutController> {
    const controller = new WorkoutController(options, await loadSettings(options.store));
    await controller.log.load();
    await controller.permissions.refreshNotifications(options.notifications);
    if (controller.settings.healthEnabled) {
      await controller.permissions.requestHealth(options.health);
    }
    await controller.rescheduleReminders(now);
    return controller;
  }

  getSettings(): WorkoutSettings {
    return { ...this.settings };
  }

  state(): WorkoutState {
    return {
      timer: this.engine.snapshot(),
      plan: describePlan(this.engine.plan),
      settings: this.getSettings(),
      permissions: {
        notifications: this.permissions.state("notifications"),
        health: this.permissions.state("health")
      },
      pendingSummary: this.pendingSummary
    };
  }

  heartRate(): HeartRateGuidance {
    return heartRateGuidance(this.settings.userAge);
  }

  entries(): readonly WorkoutLogEntry[] {
    return this.log.entries();
  }

  start(now = new Date()): Promise<TimerSnapshot> {
    return this.run(() => this.engine.start(now));
  }

  /** Pauses a running session, or resumes a paused one. */
  pause(now = new Date()): Promise<TimerSnapshot> {
    return this.run(() => this.engine.pause(now));
  }

  skip(now = new Date()): Promise<TimerSnapshot> {
    return this.run(() => this.engine.skip(now));
  }

  reset(): Promise<TimerSnapshot> {
    return this.run(() => {
      this.pendingSummary = null;
      return this.engine.reset();
    });
  }

  tick(now = new Date()): Promise<TimerSnapshot> {
    return this.run(() => this.engine.reconcile(now));
  }

  /** Catches up after the host was suspended without replaying stale alarms. */
  resume(now = new Date()): Promise<TimerSnapshot> {
    return this.run(() => this.engine.reconcile(now, { playAlarm: false }));
  }

  updateSettings(patch: Partial<WorkoutSettings>, now = new Date()): Promise<WorkoutSettings> {
    return this.run(async () => {
      const before = this.settings;
      this.settings = applySettingsPatch(before, patch);
      const changed = changedSettingKeys(before, this.settings);
      await this.persistSettings(changed);

      if (touchesPlan(changed)) {
        this.pendingSummary = null;
        this.engine.replacePlan(buildIntervalPlan(planParameters(this.settings)));
      }

      if (changed.includes("notificationsEnabled") && this.settings.notificationsEnabled) {
        await this.ensureNotificationPermission();
        if (!this.permissions.allows("notifications")) {
          const state = this.permissions.state("notifications");
          if (state === "denied" || state === "unavailable") {
            await this.writeSettings({ notificationsEnabled: false });
          }
        }
      }

      if (changed.includes("workoutRemindersEnabled") && this.settings.workoutRemindersEnabled) {
        await this.ensureNotificationPermission();
      }

      if (changed.includes("healthEnabled") && this.settings.healthEnabled) {
        await this.enableHealth();
      }

      if (touchesReminders(changed) || changed.includes("notificationsEnabled")) {
        await this.rescheduleReminders(now);
      }
      return this.getSettings();
    });
  }

  resetSettingsToDefaults(now = new Date()): Promise<WorkoutSettings> {
    const defaults: Partial<WorkoutSettings> = {};
    for (const key of RESETTABLE_KEYS) {
      Object.assign(defaults, { [key]: DEFAULT_SETTINGS[key] });
    }
    return this.updateSettings(defaults, now);
  }

  /** Records the finished session in the log and returns to a fresh session. */
  saveWorkoutLogEntryAndResetSession(
    input: { workoutType?: WorkoutType; notes?: string },
    now = new Date()
  ): Promise<WorkoutLogEntry> {
    return this.run(async () => {
      const entry = await this.log.append({
        workoutType: input.workoutType ?? DEFAULT_WORKOUT_TYPE,
        notes: input.notes,
        completedAt: now
      });
      this.pendingSummary = null;
      this.engine.reset();
      await this.rescheduleReminders(now);
      return entry;
    });
  }

  refreshPermissions(now = new Date()): Promise<WorkoutState> {
    return this.run(async () => {
      const state = await this.permissions.refreshNotifications(this.options.notifications);
      if ((state === "denied" || state === "unavailable") && this.settings.notificationsEnabled) {
        await this.writeSettings({ notificationsEnabled: false });
      }
      await this.rescheduleReminders(now);
      return this.state();
    });
  }

  refreshVo2Max(): Promise<readonly TrendSample[]> {
    return this.run(async () => {
      const health = this.options.health;
      if (!health || !this.settings.healthEnabled || !this.permissions.allows("health")) {
        return this.vo2MaxSamples;
      }
      try {
        this.vo2MaxSamples = await health.queryTrendSamples("vo2Max", VO2_MAX_SAMPLE_LIMIT);
      } catch (error) {
        console.error("Failed to read VO2 max samples", error);
      }
      return this.vo2MaxSamples;
    });
  }

  completeOnboarding(): Promise<WorkoutSettings> {
    return this.updateSettings({ hasCompletedOnboarding: true });
  }

  dispose(): void {
    this.ticker?.stop();
  }

  private run<T>(operation: () => T | Promise<T>): Promise<T> {
    const result = this.queue.then(async () => {
      const value = await operation();
      await this.flush();
      return value;
    });
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async flush(): Promise<void> {
    const intents = this.outbox;
    this.outbox = [];
    const allowed = this.settings.notificationsEnabled && this.permissions.allows("notifications");
    await this.dispatcher.apply(intents.filter(intent => intent.action === "cancel" || allowed));

    const finished = this.finishedSinceFlush;
    this.finishedSinceFlush = [];
    for (const summary of finished) {
      await this.syncFinishedWorkout(summary);
    }
    const last = finished.at(-1);
    if (last) {
      await this.rescheduleReminders(parseISO(last.finishedAt));
    }

    if (this.engine.phase === "running") {
      this.ticker?.start();
    } else {
      this.ticker?.stop();
    }
  }

  private async rescheduleReminders(now: Date): Promise<ReminderDecision> {
    const decision = decideReminders({
      config: reminderConfig(this.settings),
      permission: this.permissions.state("notifications"),
      now,
      log: this.log.entries()
    });
    await this.dispatcher.applyDecision(decision);

    const patch: Partial<WorkoutSettings> = {};
    if (decision.config.weekday !== this.settings.workoutReminderWeekday) {
      patch.workoutReminderWeekday = decision.config.weekday;
    }
    if (decision.forceDisabled) {
      patch.workoutRemindersEnabled = false;
    }
    await this.writeSettings(patch);
    return decision;
  }

  private async ensureNotificationPermission(): Promise<void> {
    const notifications = this.options.notifications;
    const state = await this.permissions.refreshNotifications(notifications);
    if (state !== "unknown") {
      return;
    }
    await this.permissions.requestNotifications(notifications);
    await this.writeSettings({ notificationPermissionRequested: true });
  }

  private async enableHealth(): Promise<void> {
    const state = await this.permissions.requestHealth(this.options.health);
    const patch: Partial<WorkoutSettings> = { healthPermissionRequested: true };
    if (state === "denied" || state === "unavailable") {
      patch.healthEnabled = false;
    }
    await this.writeSettings(patch);
  }

  private async syncFinishedWorkout(summary: WorkoutSummary): Promise<void> {
    const health = this.options.health;
    if (!health || !this.settings.healthEnabled || !this.permissions.allows("health")) {
      return;
    }
    try {
      const saved = await health.writeWorkout(DEFAULT_WORKOUT_TYPE, parseISO(summary.startedAt), parseISO(summary.finishedAt));
      if (!saved) {
        console.warn("Health store declined the finished workout", summary);
      }
    } catch (error) {
      console.error("Failed to write the finished workout to the health store", error);
    }
  }

  private async writeSettings(patch: Partial<WorkoutSettings>): Promise<void> {
    const before = this.settings;
    this.settings = applySettingsPatch(before, patch);
    await this.persistSettings(changedSettingKeys(before, this.settings));
  }

  private async persistSettings(keys: readonly SettingKey[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    try {
      await saveSettings(this.options.store, this.settings, keys);
    } catch (error) {
      console.error("Failed to persist settings", error);
    }
  }

  private playAlarm(): void {
    if (!this.settings.alarmEnabled) {
      return;
    }
    try {
      this.options.alarm.play(INTERVAL_ALARM_SOUND);
    } catch (error) {
      console.error("Failed to play the interval alarm", error);
    }
  }
}
