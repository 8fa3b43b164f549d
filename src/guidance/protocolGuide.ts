import type { HeartRateGuidance } from "./heartRate.js";

export const PROTOCOL_GUIDE: readonly string[] = [
  "The Norwegian 4x4 is a high intensity interval protocol for raising VO2 max.",
  "Warm up for 5 minutes, then do 4 rounds of 4 minutes hard and 3 minutes of easy recovery.",
  "Any cardio works. Stationary equipment such as a treadmill, bike or rower makes a steady effort easier to hold.",
  "Beginners can start with brisk walking and build intensity over the weeks.",
  "Without a heart rate monitor, go as hard as you can sustain for 4 minutes; you should be unable to talk."
];

/** The static guide followed by the heart rate zones for the configured age. */
export function protocolGuide(heartRate: HeartRateGuidance): string[] {
  const { maximumHeartRate, highIntensityTarget, recoveryTarget } = heartRate;
  return [
    ...PROTOCOL_GUIDE,
    `With a monitor: your estimated maximum is 220 - ${heartRate.age} = ${maximumHeartRate} BPM.`,
    `Hold ${highIntensityTarget.lower}-${highIntensityTarget.upper} BPM during the hard intervals and let it drop to ${recoveryTarget.lower}-${recoveryTarget.upper} BPM while recovering.`
  ];
}
