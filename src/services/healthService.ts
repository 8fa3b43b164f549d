import type { WorkoutType } from "../types.js";

export type HealthMetric = "vo2Max" | "heartRate" | "workout";

export interface TrendSample {
  timestamp: string;
  value: number;
}

export interface HealthDataService {
  requestAuthorization(readTypes: HealthMetric[], writeTypes: HealthMetric[]): Promise<boolean>;
  queryTrendSamples(metric: HealthMetric, limit: number): Promise<TrendSample[]>;
  writeWorkout(type: WorkoutType, start: Date, end: Date): Promise<boolean>;
}

export const HEALTH_READ_TYPES: HealthMetric[] = ["vo2Max", "heartRate"];
export const HEALTH_WRITE_TYPES: HealthMetric[] = ["workout"];
export const VO2_MAX_SAMPLE_LIMIT = 30;
