export const INTERVAL_ALARM_SOUND = "alarm";

export interface AlarmPlayer {
  play(soundId: string): void;
}

export class ConsoleAlarmPlayer implements AlarmPlayer {
  play(soundId: string): void {
    console.log(`Alarm: ${soundId}`);
  }
}
