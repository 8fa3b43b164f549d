import { test } from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_SETTINGS,
  applySettingsPatch,
  changedSettingKeys,
  clampSettings,
  loadSettings,
  reminderConfig,
  saveSettings,
  touchesPlan,
  touchesReminders
} from "../src/settings/settings.js";
import { MemoryKeyValueStore } from "../src/state/keyValueStore.js";

test("loadSettings falls back to defaults for an empty store", async () => {
  const settings = await loadSettings(new MemoryKeyValueStore());

  assert.deepEqual(settings, DEFAULT_SETTINGS);
});

test("loadSettings ignores unreadable values and clamps out-of-range ones", async () => {
  const store = new MemoryKeyValueStore({
    numberOfIntervals: "0",
    warmupDuration: "abc",
    alarmEnabled: "yes",
    workoutReminderDays: "45",
    workoutReminderMode: "monthly",
    workoutReminderWeekday: "3"
  });

  const settings = await loadSettings(store);

  assert.equal(settings.numberOfIntervals, 1);
  assert.equal(settings.warmupDuration, DEFAULT_SETTINGS.warmupDuration);
  assert.equal(settings.alarmEnabled, true);
  assert.equal(settings.workoutReminderDays, 30);
  assert.equal(settings.workoutReminderMode, "everyXDays");
  assert.equal(settings.workoutReminderWeekday, 3);
});

test("saved settings load back unchanged", async () => {
  const store = new MemoryKeyValueStore();
  const settings = applySettingsPatch(DEFAULT_SETTINGS, {
    numberOfIntervals: 6,
    restDuration: 90,
    notificationsEnabled: true,
    workoutReminderMode: "weeklyWeekday",
    workoutReminderWeekday: 5
  });

  await saveSettings(store, settings);

  assert.equal(await store.get("numberOfIntervals"), "6");
  assert.equal(await store.get("notificationsEnabled"), "true");
  assert.deepEqual(await loadSettings(store), settings);
});

test("clampSettings keeps every value in range and is idempotent", () => {
  const clamped = clampSettings({
    ...DEFAULT_SETTINGS,
    numberOfIntervals: 25.4,
    highIntensityDuration: -10,
    userAge: 7,
    workoutReminderDays: 0,
    workoutReminderWeekday: 9
  });

  assert.equal(clamped.numberOfIntervals, 20);
  assert.equal(clamped.highIntensityDuration, 1);
  assert.equal(clamped.userAge, 13);
  assert.equal(clamped.workoutReminderDays, 1);
  assert.equal(clamped.workoutReminderWeekday, 7);
  assert.deepEqual(clampSettings(clamped), clamped);
});

test("applySettingsPatch skips undefined fields and reports what changed", () => {
  const next = applySettingsPatch(DEFAULT_SETTINGS, { numberOfIntervals: 3, restDuration: undefined, workoutRemindersEnabled: true });

  assert.equal(next.restDuration, DEFAULT_SETTINGS.restDuration);
  const changed = changedSettingKeys(DEFAULT_SETTINGS, next);
  assert.deepEqual(changed, ["numberOfIntervals", "workoutRemindersEnabled"]);
  assert.equal(touchesPlan(changed), true);
  assert.equal(touchesReminders(changed), true);
  assert.equal(touchesPlan(["alarmEnabled"]), false);
});

test("reminderConfig maps the reminder settings", () => {
  const settings = applySettingsPatch(DEFAULT_SETTINGS, { workoutRemindersEnabled: true, workoutReminderDays: 4 });

  assert.deepEqual(reminderConfig(settings), { mode: "everyXDays", everyXDays: 4, weekday: 0, enabled: true });
});
