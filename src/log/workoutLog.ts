import { formatISO, isValid, parseISO } from "date-fns";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import type { KeyValueStore } from "../state/keyValueStore.js";
import { DEFAULT_WORKOUT_TYPE, WORKOUT_TYPES, type WorkoutLogEntry, type WorkoutType } from "../types.js";

export const WORKOUT_LOG_KEY = "workoutLogEntriesData";

const isoTimestamp = z.string().refine(value => isValid(parseISO(value)), {
  message: "Expected an ISO-8601 timestamp."
});

const currentEntrySchema = z.object({
  id: z.string().min(1),
  completedAt: isoTimestamp,
  workoutType: z.enum(WORKOUT_TYPES),
  notes: z.string()
});

/** Entries written before the type list was fixed; the type was free text. */
const namedEntrySchema = z.object({
  id: z.string().min(1).optional(),
  completedAt: isoTimestamp,
  workoutType: z.string(),
  notes: z.string().optional()
});

/** The first stored shape: a completion time and nothing else. */
const timestampEntrySchema = z.object({
  completedAt: isoTimestamp
});

export type StoredLogSchema = "current" | "named" | "timestamp";

interface DecodedEntry {
  entry: WorkoutLogEntry;
  schema: StoredLogSchema;
}

function toWorkoutType(value: string): WorkoutType {
  return WORKOUT_TYPES.find(type => type === value) ?? DEFAULT_WORKOUT_TYPE;
}

// Each entry is matched on its own, newest shape first, so one legacy entry
// never changes how its neighbours decode.
const storedEntrySchema = z.union([
  currentEntrySchema.transform((entry): DecodedEntry => ({
    entry: { ...entry, notes: entry.notes.trim() },
    schema: "current"
  })),
  namedEntrySchema.transform((entry): DecodedEntry => ({
    entry: {
      id: entry.id ?? uuid(),
      completedAt: entry.completedAt,
      workoutType: toWorkoutType(entry.workoutType),
      notes: (entry.notes ?? "").trim()
    },
    schema: "named"
  })),
  timestampEntrySchema.transform((entry): DecodedEntry => ({
    entry: { id: uuid(), completedAt: entry.completedAt, workoutType: DEFAULT_WORKOUT_TYPE, notes: "" },
    schema: "timestamp"
  }))
]);

export interface DecodedWorkoutLog {
  entries: WorkoutLogEntry[];
  /** True when at least one entry was read from an older shape. */
  migrated: boolean;
}

function newestFirst(entries: WorkoutLogEntry[]): WorkoutLogEntry[] {
  return [...entries].sort((a, b) => parseISO(b.completedAt).getTime() - parseISO(a.completedAt).getTime());
}

function parseBlob(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.warn("Workout log blob is not valid JSON; starting with an empty log", error);
    return undefined;
  }
}

/**
 * Decodes a stored log. A blob with any entry that matches no known shape is
 * treated as unreadable.
 */
export function decodeWorkoutLog(raw: string | undefined): DecodedWorkoutLog {
  if (raw === undefined || raw.trim() === "") {
    return { entries: [], migrated: false };
  }

  const parsed = parseBlob(raw);
  if (parsed === undefined) {
    return { entries: [], migrated: false };
  }

  const decoded = z.array(storedEntrySchema).safeParse(parsed);
  if (!decoded.success) {
    console.warn("Workout log blob matches no known schema; starting with an empty log");
    return { entries: [], migrated: false };
  }

  return {
    entries: newestFirst(decoded.data.map(item => item.entry)),
    migrated: decoded.data.some(item => item.schema !== "current")
  };
}

export interface NewWorkoutLogEntry {
  workoutType: WorkoutType;
  notes?: string;
  completedAt?: Date;
}

export class WorkoutLog {
  private items: WorkoutLogEntry[] = [];

  constructor(private readonly store: KeyValueStore) {}

  entries(): readonly WorkoutLogEntry[] {
    return this.items;
  }

  async load(): Promise<readonly WorkoutLogEntry[]> {
    let raw: string | undefined;
    try {
      raw = await this.store.get(WORKOUT_LOG_KEY);
    } catch (error) {
      console.error("Failed to read the workout log", error);
      raw = undefined;
    }

    const decoded = decodeWorkoutLog(raw);
    this.items = decoded.entries;
    if (decoded.migrated) {
      await this.persist();
    }
    return this.items;
  }

  async append(input: NewWorkoutLogEntry): Promise<WorkoutLogEntry> {
    const entry: WorkoutLogEntry = {
      id: uuid(),
      completedAt: formatISO(input.completedAt ?? new Date()),
      workoutType: input.workoutType,
      notes: (input.notes ?? "").trim()
    };
    this.items = [entry, ...this.items];
    await this.persist();
    return entry;
  }

  private async persist(): Promise<void> {
    try {
      await this.store.set(WORKOUT_LOG_KEY, JSON.stringify(this.items));
    } catch (error) {
      console.error("Failed to persist the workout log", error);
    }
  }
}
