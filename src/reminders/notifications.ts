export const NotificationIds = {
  nextInterval: "next-interval",
  workoutReminder: "workout-reminder",
  missedWorkoutFollowUp: "missed-workout-follow-up"
} as const;

export type NotificationId = (typeof NotificationIds)[keyof typeof NotificationIds];

export type NotificationTrigger =
  | { type: "elapsed"; seconds: number }
  | {
    type: "calendar";
    /** 1 = Sunday ... 7 = Saturday; matches every week when set. */
    weekday?: number;
    /** yyyy-MM-dd; a single calendar day when set. */
    date?: string;
    hour: number;
    minute: number;
  };

export interface NotificationRequest {
  id: NotificationId;
  title: string;
  body: string;
  trigger: NotificationTrigger;
  repeats: boolean;
}

export type NotificationIntent =
  | { action: "schedule"; request: NotificationRequest }
  | { action: "cancel"; id: NotificationId };

export function cancelIntent(id: NotificationId): NotificationIntent {
  return { action: "cancel", id };
}

export function scheduleIntent(request: NotificationRequest): NotificationIntent {
  return { action: "schedule", request };
}
