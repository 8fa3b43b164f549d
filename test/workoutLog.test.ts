import { test } from "node:test";
import assert from "node:assert/strict";
import { WORKOUT_LOG_KEY, WorkoutLog, decodeWorkoutLog } from "../src/log/workoutLog.js";
import { MemoryKeyValueStore, type KeyValueStore } from "../src/state/keyValueStore.js";
import { WORKOUT_TYPES } from "../src/types.js";

async function storedBlob(store: KeyValueStore): Promise<unknown> {
  const raw = await store.get(WORKOUT_LOG_KEY);
  assert.ok(raw !== undefined, "expected a stored workout log");
  return JSON.parse(raw);
}

test("the oldest timestamp-only shape loads with default type and empty notes", async () => {
  const store = new MemoryKeyValueStore({ [WORKOUT_LOG_KEY]: '[{"completedAt":"2026-02-18T10:00:00Z"}]' });
  const log = new WorkoutLog(store);

  const entries = await log.load();

  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.workoutType, "Norwegian 4x4");
  assert.equal(entries[0]?.notes, "");
  assert.equal(entries[0]?.completedAt, "2026-02-18T10:00:00Z");
});

test("a legacy entry with an unknown type falls back to the default and trims notes", async () => {
  const store = new MemoryKeyValueStore({
    [WORKOUT_LOG_KEY]: '[{"completedAt":"2026-02-18T10:00:00Z","workoutType":"SkiErg","notes":"  hard effort  "}]'
  });
  const log = new WorkoutLog(store);

  const entries = await log.load();

  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.workoutType, "Norwegian 4x4");
  assert.equal(entries[0]?.notes, "hard effort");
});

test("a legacy entry with a known type keeps it", () => {
  const decoded = decodeWorkoutLog('[{"completedAt":"2026-02-18T10:00:00Z","workoutType":"Cycle"}]');

  assert.equal(decoded.migrated, true);
  assert.equal(decoded.entries[0]?.workoutType, "Cycle");
  assert.equal(decoded.entries[0]?.notes, "");
});

test("migrated legacy data is written back in the current shape", async () => {
  const store = new MemoryKeyValueStore({ [WORKOUT_LOG_KEY]: '[{"completedAt":"2026-02-18T10:00:00Z"}]' });
  const log = new WorkoutLog(store);
  const [entry] = await log.load();

  assert.deepEqual(await storedBlob(store), [entry]);
  assert.equal(decodeWorkoutLog(await store.get(WORKOUT_LOG_KEY)).migrated, false);
});

test("an unreadable blob becomes an empty log and is left as it was", async () => {
  for (const raw of ["not json", '{"completedAt":"2026-02-18T10:00:00Z"}', '[{"completedAt":"yesterday"}]']) {
    const store = new MemoryKeyValueStore({ [WORKOUT_LOG_KEY]: raw });
    const log = new WorkoutLog(store);

    assert.deepEqual(await log.load(), []);
    assert.equal(await store.get(WORKOUT_LOG_KEY), raw);
  }
});

test("nothing stored yields an empty log", () => {
  assert.deepEqual(decodeWorkoutLog(undefined), { entries: [], migrated: false });
});

test("legacy entries are ordered newest first", () => {
  const decoded = decodeWorkoutLog('[{"completedAt":"2026-01-05T10:00:00Z"},{"completedAt":"2026-02-18T10:00:00Z"}]');

  assert.deepEqual(
    decoded.entries.map(entry => entry.completedAt),
    ["2026-02-18T10:00:00Z", "2026-01-05T10:00:00Z"]
  );
});

test("append prepends, trims notes and persists the whole log", async () => {
  const store = new MemoryKeyValueStore();
  const log = new WorkoutLog(store);
  await log.load();

  const first = await log.append({ workoutType: "Run", notes: "easy", completedAt: new Date(2026, 1, 1, 9, 0) });
  const second = await log.append({ workoutType: "Cycle", notes: "  Felt strong ", completedAt: new Date(2026, 1, 3, 9, 0) });

  assert.equal(second.notes, "Felt strong");
  assert.deepEqual(log.entries(), [second, first]);
  assert.deepEqual(await storedBlob(store), [second, first]);

  const reloaded = new WorkoutLog(store);
  assert.deepEqual(await reloaded.load(), [second, first]);
});

test("ids of any form are kept as they were stored", async () => {
  const raw = JSON.stringify([
    { id: "legacy-7", completedAt: "2026-02-18T10:00:00Z", workoutType: "Run", notes: "" },
    { id: "00000000-0000-4000-8000-000000000003", completedAt: "2026-02-17T10:00:00Z", workoutType: "Swim", notes: "" }
  ]);
  const store = new MemoryKeyValueStore({ [WORKOUT_LOG_KEY]: raw });
  const log = new WorkoutLog(store);

  const entries = await log.load();

  assert.deepEqual(
    entries.map(entry => entry.id),
    ["legacy-7", "00000000-0000-4000-8000-000000000003"]
  );
  assert.equal(await store.get(WORKOUT_LOG_KEY), raw);
});

test("each entry of a mixed blob is decoded from its own shape", async () => {
  const store = new MemoryKeyValueStore({
    [WORKOUT_LOG_KEY]: JSON.stringify([
      { completedAt: "2026-02-18T10:00:00Z", workoutType: "Run", notes: " tempo " },
      { completedAt: "2026-02-10T10:00:00Z" },
      { id: "00000000-0000-4000-8000-000000000004", completedAt: "2026-02-20T10:00:00Z", workoutType: "Hike", notes: "ridge" }
    ])
  });
  const log = new WorkoutLog(store);

  const entries = await log.load();

  assert.deepEqual(
    entries.map(entry => [entry.completedAt, entry.workoutType, entry.notes]),
    [
      ["2026-02-20T10:00:00Z", "Hike", "ridge"],
      ["2026-02-18T10:00:00Z", "Run", "tempo"],
      ["2026-02-10T10:00:00Z", "Norwegian 4x4", ""]
    ]
  );
  assert.equal(entries[0]?.id, "00000000-0000-4000-8000-000000000004");
  assert.deepEqual(await storedBlob(store), entries);
});

test("a failed write still keeps the entry in memory", async () => {
  const failing: KeyValueStore = {
    get: async () => undefined,
    set: async () => {
      throw new Error("disk full");
    }
  };
  const log = new WorkoutLog(failing);

  const entry = await log.append({ workoutType: "Swim" });

  assert.deepEqual(log.entries(), [entry]);
});

test("workout types include the catch-all option", () => {
  assert.equal(WORKOUT_TYPES.length, 11);
  assert.ok(WORKOUT_TYPES.includes("Other"));
});
