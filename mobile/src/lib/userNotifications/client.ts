/**
 * User Notification Client
 *
 * Port over the platform's local/push notification center: scheduling,
 * removal, authorization and the delegate callbacks it raises.
 */

export type AuthorizationStatus = "notDetermined" | "denied" | "authorized" | "provisional" | "ephemeral";

export type AuthorizationOption = "alert" | "badge" | "sound" | "provisional";

export type PresentationOption = "banner" | "list" | "sound" | "badge";

export interface NotificationSettings {
  authorizationStatus: AuthorizationStatus;
}

export interface NotificationContent {
  title: string | null;
  body: string | null;
  userInfo: Record<string, string>;
}

/** A request to deliver content, immediately or after a delay */
export interface NotificationRequest {
  identifier: string;
  content: NotificationContent;
  trigger: { type: "immediate" } | { type: "timeInterval"; seconds: number; repeats: boolean };
}

export interface Notification {
  date: Date;
  request: NotificationRequest;
}

export interface NotificationResponse {
  notification: Notification;
}

export type DelegateEvent =
  | { type: "didReceiveResponse"; response: NotificationResponse; completionHandler: () => void }
  | { type: "openSettingsForNotification"; notification: Notification | null }
  | {
      type: "willPresentNotification";
      notification: Notification;
      completionHandler: (options: PresentationOption[]) => void;
    };

export interface UserNotificationClient {
  add(request: NotificationRequest): Promise<void>;
  delegate(): AsyncIterable<DelegateEvent>;
  getNotificationSettings(): Promise<NotificationSettings>;
  removeDeliveredNotifications(identifiers: string[]): Promise<void>;
  removePendingNotificationRequests(identifiers: string[]): Promise<void>;
  requestAuthorization(options: AuthorizationOption[]): Promise<boolean>;
}

function userInfoEqual(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => key in b && a[key] === b[key]);
}

function triggersEqual(a: NotificationRequest["trigger"], b: NotificationRequest["trigger"]): boolean {
  if (a.type === "immediate" || b.type === "immediate") return a.type === b.type;
  return a.seconds === b.seconds && a.repeats === b.repeats;
}

function requestsEqual(a: NotificationRequest, b: NotificationRequest): boolean {
  return (
    a.identifier === b.identifier &&
    a.content.title === b.content.title &&
    a.content.body === b.content.body &&
    userInfoEqual(a.content.userInfo, b.content.userInfo) &&
    triggersEqual(a.trigger, b.trigger)
  );
}

function notificationsEqual(a: Notification | null, b: Notification | null): boolean {
  if (a === null || b === null) return a === b;
  return a.date.getTime() === b.date.getTime() && requestsEqual(a.request, b.request);
}

/** Compare delegate events by content. Completion handlers are never compared. */
export function delegateEventsEqual(a: DelegateEvent, b: DelegateEvent): boolean {
  switch (a.type) {
    case "didReceiveResponse":
      return (
        b.type === "didReceiveResponse" &&
        notificationsEqual(a.response.notification, b.response.notification)
      );
    case "openSettingsForNotification":
      return b.type === "openSettingsForNotification" && notificationsEqual(a.notification, b.notification);
    case "willPresentNotification":
      return b.type === "willPresentNotification" && notificationsEqual(a.notification, b.notification);
  }
}

/** Whether the player has already answered the permission prompt */
export function isAuthorizationDetermined(settings: NotificationSettings | null): boolean {
  if (!settings) return true;
  return settings.authorizationStatus !== "notDetermined" && settings.authorizationStatus !== "provisional";
}

let bannerSequence = 0;

/** Present a match-service banner as an immediate local notification */
export function bannerFromUserNotifications(
  client: UserNotificationClient
): (request: { title: string | null; message: string | null }) => Promise<void> {
  return (request) => {
    bannerSequence += 1;
    return client.add({
      identifier: `turn-banner-${bannerSequence}`,
      content: { title: request.title, body: request.message, userInfo: {} },
      trigger: { type: "immediate" },
    });
  };
}
