import type { NotificationId, NotificationRequest } from "../reminders/notifications.js";

export type NotificationPermission = "granted" | "denied" | "notDetermined";

export interface NotificationService {
  schedule(request: NotificationRequest): Promise<void>;
  cancel(id: NotificationId): Promise<void>;
  queryPermission(): Promise<NotificationPermission>;
  requestPermission(): Promise<"granted" | "denied">;
}

interface NotificationCenterOptions {
  permission?: NotificationPermission;
  /** Answer given to a permission prompt while the permission is undetermined. */
  promptAnswer?: "granted" | "denied";
}

/**
 * Keeps pending notification requests in memory, keyed by id. Scheduling an
 * id that is already pending replaces it; cancelling an absent id does nothing.
 */
export class InMemoryNotificationCenter implements NotificationService {
  private readonly pendingRequests = new Map<NotificationId, NotificationRequest>();
  private permission: NotificationPermission;
  private readonly promptAnswer: "granted" | "denied";

  constructor(options: NotificationCenterOptions = {}) {
    this.permission = options.permission ?? "notDetermined";
    this.promptAnswer = options.promptAnswer ?? "granted";
  }

  async schedule(request: NotificationRequest): Promise<void> {
    if (this.permission !== "granted") {
      throw new Error(`Cannot schedule ${request.id} without notification permission.`);
    }
    this.pendingRequests.set(request.id, request);
  }

  async cancel(id: NotificationId): Promise<void> {
    this.pendingRequests.delete(id);
  }

  async queryPermission(): Promise<NotificationPermission> {
    return this.permission;
  }

  async requestPermission(): Promise<"granted" | "denied"> {
    if (this.permission === "notDetermined") {
      this.permission = this.promptAnswer;
    }
    return this.permission === "granted" ? "granted" : "denied";
  }

  setPermission(permission: NotificationPermission): void {
    this.permission = permission;
    if (permission !== "granted") {
      this.pendingRequests.clear();
    }
  }

  pending(): NotificationRequest[] {
    return [...this.pendingRequests.values()];
  }

  find(id: NotificationId): NotificationRequest | undefined {
    return this.pendingRequests.get(id);
  }
}
