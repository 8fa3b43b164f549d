import type { Interval, IntervalKind, IntervalPlan, PlanParameters } from "../types.js";

export const MIN_HIGH_INTENSITY_SECONDS = 1;

const INTERVAL_NAMES: Record<IntervalKind, string> = {
  warmup: "Warm Up",
  highIntensity: "High Intensity",
  rest: "Rest"
};

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function makeInterval(kind: IntervalKind, duration: number): Interval {
  return Object.freeze({ name: INTERVAL_NAMES[kind], duration, kind });
}

/**
 * Builds the ordered interval sequence for one session.
 *
 * Out-of-range parameters are clamped rather than rejected: the repeat count
 * is at least 1, warmup and rest are at least 0 and high intensity is at least
 * {@link MIN_HIGH_INTENSITY_SECONDS}. A zero warmup produces no warmup interval;
 * a zero rest still produces its rest interval, which the engine passes straight
 * through.
 */
export function buildIntervalPlan(parameters: PlanParameters): IntervalPlan {
  const repeatCount = Number.isFinite(parameters.repeatCount) ? Math.max(Math.floor(parameters.repeatCount), 1) : 1;
  const warmup = nonNegative(parameters.warmupDuration);
  const rest = nonNegative(parameters.restDuration);
  const highIntensity = Math.max(nonNegative(parameters.highIntensityDuration), MIN_HIGH_INTENSITY_SECONDS);

  const intervals: Interval[] = [];
  if (warmup > 0) {
    intervals.push(makeInterval("warmup", warmup));
  }

  for (let round = 1; round <= repeatCount; round += 1) {
    intervals.push(makeInterval("highIntensity", highIntensity));
    if (round < repeatCount) {
      intervals.push(makeInterval("rest", rest));
    }
  }

  return Object.freeze(intervals);
}

export interface PlanSummary {
  totalSeconds: number;
  counts: Record<IntervalKind, number>;
}

export function describePlan(plan: IntervalPlan): PlanSummary {
  const counts: Record<IntervalKind, number> = { warmup: 0, highIntensity: 0, rest: 0 };
  let totalSeconds = 0;
  for (const interval of plan) {
    counts[interval.kind] += 1;
    totalSeconds += interval.duration;
  }
  return { totalSeconds, counts };
}
