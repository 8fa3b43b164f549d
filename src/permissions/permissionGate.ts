import { HEALTH_READ_TYPES, HEALTH_WRITE_TYPES, type HealthDataService } from "../services/healthService.js";
import type { NotificationPermission, NotificationService } from "../services/notificationService.js";
import type { PermissionState } from "../types.js";

export type Capability = "notifications" | "health";

export function fromNotificationPermission(permission: NotificationPermission): PermissionState {
  return permission === "notDetermined" ? "unknown" : permission;
}

export class PermissionGate {
  private readonly states: Record<Capability, PermissionState>;

  constructor(initial: Partial<Record<Capability, PermissionState>> = {}) {
    this.states = {
      notifications: initial.notifications ?? "unknown",
      health: initial.health ?? "unknown"
    };
  }

  state(capability: Capability): PermissionState {
    return this.states[capability];
  }

  allows(capability: Capability): boolean {
    return this.states[capability] === "granted";
  }

  update(capability: Capability, state: PermissionState): void {
    this.states[capability] = state;
  }

  async refreshNotifications(service: NotificationService): Promise<PermissionState> {
    try {
      this.update("notifications", fromNotificationPermission(await service.queryPermission()));
    } catch (error) {
      console.error("Failed to query notification permission", error);
      this.update("notifications", "unknown");
    }
    return this.states.notifications;
  }

  async requestNotifications(service: NotificationService): Promise<PermissionState> {
    try {
      this.update("notifications", await service.requestPermission());
    } catch (error) {
      console.error("Failed to request notification permission", error);
      this.update("notifications", "unknown");
    }
    return this.states.notifications;
  }

  async requestHealth(service: HealthDataService | undefined): Promise<PermissionState> {
    if (!service) {
      this.update("health", "unavailable");
      return this.states.health;
    }
    try {
      const granted = await service.requestAuthorization(HEALTH_READ_TYPES, HEALTH_WRITE_TYPES);
      this.update("health", granted ? "granted" : "denied");
    } catch (error) {
      console.error("Failed to request health authorization", error);
      this.update("health", "unknown");
    }
    return this.states.health;
  }
}
