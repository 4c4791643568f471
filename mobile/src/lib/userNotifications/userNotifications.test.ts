import { describe, it, expect, vi } from "vitest";
import {
  bannerFromUserNotifications,
  delegateEventsEqual,
  isAuthorizationDetermined,
  type Notification,
} from "./client";
import { createInMemoryUserNotificationClient } from "./inMemoryClient";

const notification: Notification = {
  date: new Date("2026-03-14T12:00:00.000Z"),
  request: {
    identifier: "daily-reminder",
    content: { title: "Daily challenge", body: "A new daily is ready", userInfo: {} },
    trigger: { type: "timeInterval", seconds: 3600, repeats: false },
  },
};

describe("delegateEventsEqual", () => {
  it("ignores completion handlers", () => {
    expect(
      delegateEventsEqual(
        { type: "willPresentNotification", notification, completionHandler: vi.fn() },
        { type: "willPresentNotification", notification, completionHandler: vi.fn() }
      )
    ).toBe(true);
    expect(
      delegateEventsEqual(
        { type: "didReceiveResponse", response: { notification }, completionHandler: () => {} },
        { type: "didReceiveResponse", response: { notification }, completionHandler: () => {} }
      )
    ).toBe(true);
  });

  it("compares the notification content", () => {
    const later = { ...notification, date: new Date("2026-03-14T13:00:00.000Z") };
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification },
        { type: "openSettingsForNotification", notification: later }
      )
    ).toBe(false);
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification: null },
        { type: "openSettingsForNotification", notification: null }
      )
    ).toBe(true);
  });

  it("ignores key order in user info", () => {
    const a: Notification = {
      ...notification,
      request: { ...notification.request, content: { title: "Daily", body: null, userInfo: { a: "1", b: "2" } } },
    };
    const b: Notification = {
      ...notification,
      request: { ...notification.request, content: { title: "Daily", body: null, userInfo: { b: "2", a: "1" } } },
    };
    const c: Notification = {
      ...notification,
      request: { ...notification.request, content: { title: "Daily", body: null, userInfo: { a: "1", b: "3" } } },
    };
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification: a },
        { type: "openSettingsForNotification", notification: b }
      )
    ).toBe(true);
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification: a },
        { type: "openSettingsForNotification", notification: c }
      )
    ).toBe(false);
  });

  it("compares triggers", () => {
    const repeating: Notification = {
      ...notification,
      request: { ...notification.request, trigger: { type: "timeInterval", seconds: 3600, repeats: true } },
    };
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification },
        { type: "openSettingsForNotification", notification: repeating }
      )
    ).toBe(false);
  });

  it("never matches different event kinds", () => {
    expect(
      delegateEventsEqual(
        { type: "openSettingsForNotification", notification },
        { type: "willPresentNotification", notification, completionHandler: () => {} }
      )
    ).toBe(false);
  });
});

describe("isAuthorizationDetermined", () => {
  it("treats settings that have not loaded yet as determined", () => {
    expect(isAuthorizationDetermined(null)).toBe(true);
  });

  it("treats undetermined and provisional settings as undetermined", () => {
    expect(isAuthorizationDetermined({ authorizationStatus: "notDetermined" })).toBe(false);
    expect(isAuthorizationDetermined({ authorizationStatus: "provisional" })).toBe(false);
    expect(isAuthorizationDetermined({ authorizationStatus: "denied" })).toBe(true);
    expect(isAuthorizationDetermined({ authorizationStatus: "authorized" })).toBe(true);
  });
});

describe("createInMemoryUserNotificationClient", () => {
  it("delivers immediate requests and keeps scheduled ones pending", async () => {
    const client = createInMemoryUserNotificationClient();
    await client.add(notification.request);
    await client.add({ ...notification.request, identifier: "now", trigger: { type: "immediate" } });

    expect([...client.pending.keys()]).toEqual(["daily-reminder"]);
    expect([...client.delivered.keys()]).toEqual(["now"]);

    await client.removePendingNotificationRequests(["daily-reminder"]);
    await client.removeDeliveredNotifications(["now"]);
    expect(client.pending.size).toBe(0);
    expect(client.delivered.size).toBe(0);
  });

  it("grants authorization once and remembers the answer", async () => {
    const client = createInMemoryUserNotificationClient();
    expect(await client.getNotificationSettings()).toEqual({ authorizationStatus: "notDetermined" });
    expect(await client.requestAuthorization(["alert", "sound"])).toBe(true);
    expect(await client.getNotificationSettings()).toEqual({ authorizationStatus: "authorized" });
  });

  it("records a denial", async () => {
    const client = createInMemoryUserNotificationClient({ grantOnRequest: false });
    expect(await client.requestAuthorization(["alert"])).toBe(false);
    expect(await client.getNotificationSettings()).toEqual({ authorizationStatus: "denied" });
  });

  it("streams delegate events", async () => {
    const client = createInMemoryUserNotificationClient();
    client.emit({ type: "openSettingsForNotification", notification: null });

    const iterator = client.delegate()[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({
      done: false,
      value: { type: "openSettingsForNotification", notification: null },
    });
  });
});

describe("bannerFromUserNotifications", () => {
  it("posts the banner as an immediate notification", async () => {
    const client = createInMemoryUserNotificationClient();
    await bannerFromUserNotifications(client)({ title: "Blob Jr played their turn", message: null });

    const [request] = [...client.delivered.values()];
    expect(request.content).toEqual({ title: "Blob Jr played their turn", body: null, userInfo: {} });
    expect(request.trigger).toEqual({ type: "immediate" });
    expect(request.identifier).toMatch(/^turn-banner-\d+$/);
  });
});
