export const MIN_SUPPORTED_AGE = 13;
export const MAX_SUPPORTED_AGE = 100;
export const DEFAULT_AGE = 40;

export interface HeartRateRange {
  lower: number;
  upper: number;
}

export interface HeartRateGuidance {
  age: number;
  maximumHeartRate: number;
  highIntensityTarget: HeartRateRange;
  recoveryTarget: HeartRateRange;
}

function range(maximum: number, lowerShare: number, upperShare: number): HeartRateRange {
  return {
    lower: Math.round(maximum * lowerShare),
    upper: Math.round(maximum * upperShare)
  };
}

// Max heart rate by the 220 - age estimate. High-intensity intervals aim for
// 85-95% of it, recovery for 60-70%.
export function heartRateGuidance(age: number): HeartRateGuidance {
  const clampedAge = Number.isFinite(age) ? Math.min(Math.max(Math.round(age), MIN_SUPPORTED_AGE), MAX_SUPPORTED_AGE) : DEFAULT_AGE;
  const maximumHeartRate = 220 - clampedAge;
  return {
    age: clampedAge,
    maximumHeartRate,
    highIntensityTarget: range(maximumHeartRate, 0.85, 0.95),
    recoveryTarget: range(maximumHeartRate, 0.6, 0.7)
  };
}
