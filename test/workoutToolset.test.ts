import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { addSeconds } from "date-fns";
import { WORKOUT_LOG_KEY } from "../src/log/workoutLog.js";
import { ConsoleAlarmPlayer } from "../src/services/alarmPlayer.js";
import { InMemoryNotificationCenter } from "../src/services/notificationService.js";
import { FileKeyValueStore } from "../src/state/keyValueStore.js";
import { WorkoutToolset, logWorkoutInput } from "../src/tools/workoutTool.js";
import { WorkoutController } from "../src/workoutController.js";

const T0 = new Date(2026, 9, 13, 18, 0);

async function createToolset() {
  const dir = await mkdtemp(join(tmpdir(), "interval-workout-test-"));
  const filePath = join(dir, "settings.json");
  const notifications = new InMemoryNotificationCenter({ permission: "granted" });
  const controller = await WorkoutController.create(
    { store: new FileKeyValueStore(filePath), notifications, alarm: new ConsoleAlarmPlayer() },
    T0
  );
  const toolset = new WorkoutToolset(controller, () => notifications.pending());

  async function cleanup() {
    await rm(dir, { recursive: true, force: true });
  }

  return { toolset, storagePath: filePath, cleanup };
}

test("updateSettings persists the new plan to disk", async t => {
  const { toolset, storagePath, cleanup } = await createToolset();
  t.after(cleanup);

  const result = await toolset.updateSettings({ numberOfIntervals: 6 }, T0);

  assert.equal(result.message, "Settings saved. 6 intervals. Reminders are off.");
  assert.equal(result.state.timer.totalIntervals, 12);
  const persisted = JSON.parse(await readFile(storagePath, "utf-8"));
  assert.equal(persisted.numberOfIntervals, "6");
});

test("start and pause report the remaining time", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  const started = await toolset.timer({ action: "start" }, T0);
  assert.equal(started.message, "Started Warm Up.");
  assert.equal(started.state.timer.phase, "running");
  assert.equal(started.state.plan.totalSeconds, 300 + 4 * 240 + 3 * 180);

  const paused = await toolset.timer({ action: "pause" }, addSeconds(T0, 65));
  assert.equal(paused.message, "Paused with 03:55 left.");
  assert.equal(paused.state.timer.phase, "paused");

  const resumed = await toolset.timer({ action: "resume" }, addSeconds(T0, 600));
  assert.equal(resumed.message, "Resumed. 03:55 remaining.");
});

test("logWorkout saves the entry, persists it and resets the session", async t => {
  const { toolset, storagePath, cleanup } = await createToolset();
  t.after(cleanup);
  await toolset.timer({ action: "start" }, T0);

  const saved = await toolset.logWorkout({ action: "save", workoutType: "Row", notes: "  steady  " }, addSeconds(T0, 30));

  assert.equal(saved.message, "Logged Row.");
  assert.equal(saved.entry?.notes, "steady");
  assert.equal(saved.state.timer.phase, "idle");

  const persisted = JSON.parse(await readFile(storagePath, "utf-8"));
  const stored = JSON.parse(persisted[WORKOUT_LOG_KEY]);
  assert.equal(stored.length, 1);
  assert.equal(stored[0].workoutType, "Row");

  const listed = await toolset.logWorkout({ action: "list" }, T0);
  assert.equal(listed.message, "1 workout(s) logged.");
});

test("reminders leave out the next interval notification", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);
  await toolset.updateSettings({ notificationsEnabled: true, workoutRemindersEnabled: true }, T0);
  await toolset.timer({ action: "start" }, T0);

  assert.deepEqual(
    toolset.reminders().map(request => request.id),
    ["workout-reminder"]
  );
});

test("guidance describes the heart rate zones for the stored age", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  const result = await toolset.guidance();

  assert.equal(result.message, "Max heart rate 180 BPM. High intensity 153-171 BPM, recovery 108-126 BPM.");
  assert.deepEqual(result.vo2Max, []);
  assert.equal(result.guide.length, 7);
  assert.equal(result.guide[5], "With a monitor: your estimated maximum is 220 - 40 = 180 BPM.");
  assert.equal(
    result.guide[6],
    "Hold 153-171 BPM during the hard intervals and let it drop to 108-126 BPM while recovering."
  );
});

test("onboarding steps forward and completes", async t => {
  const { toolset, cleanup } = await createToolset();
  t.after(cleanup);

  const first = await toolset.onboardingStep({});
  assert.equal(first.step, "welcome");
  assert.equal(first.progress, "1 of 6");

  const second = await toolset.onboardingStep({ action: "next" });
  assert.equal(second.message, "Train with purpose (2 of 6)");

  const done = await toolset.onboardingStep({ action: "complete" });
  assert.equal(done.completed, true);
  assert.equal(done.message, "Onboarding complete.");
});

test("logWorkout rejects unknown workout types", () => {
  const invalid = logWorkoutInput.safeParse({ action: "save", workoutType: "SkiErg" });
  assert.ok(!invalid.success);
});
