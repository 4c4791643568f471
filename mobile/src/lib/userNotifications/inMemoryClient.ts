import { createAsyncQueue } from "../asyncQueue";
import type {
  AuthorizationStatus,
  DelegateEvent,
  NotificationRequest,
  UserNotificationClient,
} from "./client";

export interface InMemoryUserNotificationClient extends UserNotificationClient {
  readonly pending: ReadonlyMap<string, NotificationRequest>;
  readonly delivered: ReadonlyMap<string, NotificationRequest>;
  /** Raise a delegate callback as the platform would */
  emit(event: DelegateEvent): void;
}

/**
 * Notification center kept in process memory. Immediate requests are
 * delivered on add; interval requests stay pending.
 */
export function createInMemoryUserNotificationClient(
  options: { authorizationStatus?: AuthorizationStatus; grantOnRequest?: boolean } = {}
): InMemoryUserNotificationClient {
  let authorizationStatus = options.authorizationStatus ?? "notDetermined";
  const grantOnRequest = options.grantOnRequest ?? true;
  const pending = new Map<string, NotificationRequest>();
  const delivered = new Map<string, NotificationRequest>();
  const events = createAsyncQueue<DelegateEvent>();

  return {
    pending,
    delivered,
    emit: (event) => events.push(event),

    async add(request) {
      if (request.trigger.type === "immediate") {
        delivered.set(request.identifier, request);
      } else {
        pending.set(request.identifier, request);
      }
    },
    delegate: () => events,
    async getNotificationSettings() {
      return { authorizationStatus };
    },
    async removeDeliveredNotifications(identifiers) {
      for (const id of identifiers) delivered.delete(id);
    },
    async removePendingNotificationRequests(identifiers) {
      for (const id of identifiers) pending.delete(id);
    },
    async requestAuthorization(requested) {
      if (authorizationStatus === "notDetermined") {
        if (!grantOnRequest) authorizationStatus = "denied";
        else authorizationStatus = requested.includes("provisional") ? "provisional" : "authorized";
      }
      return authorizationStatus === "authorized" || authorizationStatus === "provisional";
    },
  };
}
