import type { NotificationService } from "../services/notificationService.js";
import type { NotificationId, NotificationIntent, NotificationRequest } from "./notifications.js";

/**
 * Forwards intents to the notification service. A failed call is logged and
 * the remaining intents still go out.
 */
export class NotificationDispatcher {
  constructor(private readonly service: NotificationService) {}

  async apply(intents: readonly NotificationIntent[]): Promise<void> {
    for (const intent of intents) {
      if (intent.action === "cancel") {
        await this.cancel(intent.id);
      } else {
        await this.schedule(intent.request);
      }
    }
  }

  async applyDecision(decision: { cancel: readonly NotificationId[]; schedule: readonly NotificationRequest[] }): Promise<void> {
    for (const id of decision.cancel) {
      await this.cancel(id);
    }
    for (const request of decision.schedule) {
      await this.schedule(request);
    }
  }

  private async cancel(id: NotificationId): Promise<void> {
    try {
      await this.service.cancel(id);
    } catch (error) {
      console.error(`Failed to cancel notification ${id}`, error);
    }
  }

  private async schedule(request: NotificationRequest): Promise<void> {
    try {
      await this.service.schedule(request);
    } catch (error) {
      console.error(`Failed to schedule notification ${request.id}`, error);
    }
  }
}
