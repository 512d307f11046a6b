import { beforeEach, describe, expect, it } from "vitest";
import { EnforcementEngine } from "../src/services/enforcement.js";
import { SubscriptionService } from "../src/services/subscriptions.js";
import { FakeMessenger, MemoryStore, seedActiveUser, silentLogger } from "./fakes.js";

const now = new Date("2025-03-03T10:00:00Z");

describe("SubscriptionService", () => {
  let store: MemoryStore;
  let messenger: FakeMessenger;
  let subscriptions: SubscriptionService;

  beforeEach(() => {
    store = new MemoryStore();
    messenger = new FakeMessenger();
    const enforcement = new EnforcementEngine(store, messenger, silentLogger, { groupId: -100, graceMinutes: 30 });
    subscriptions = new SubscriptionService(store, messenger, enforcement, silentLogger, { renewalReminderDays: 3, referenceOffsetHours: 3 });
  });

  it("reminds each expiring subscriber once per period", async () => {
    const soon = await seedActiveUser(store, 601, { is_premium: true, subscription_until: "2025-03-05T10:00:00.000Z" });
    await seedActiveUser(store, 602, { is_premium: true, subscription_until: "2025-03-13T10:00:00.000Z" });
    await seedActiveUser(store, 603, { is_premium: true, subscription_until: "2025-03-04T08:00:00.000Z" });
    messenger.unreachable.add(603);

    const first = await subscriptions.sendRenewalReminders(now);
    expect(first).toEqual({ candidates: 2, sent: 1, failed: 1, errors: [] });
    expect(messenger.sent).toEqual([
      {
        userId: 601,
        text:
          "Напоминание: подписка заканчивается через 2 дня, 5 марта 2025 года.\n\n" +
          "Чтобы не потерять доступ к группе и ритуалам, продли участие: /pay",
        buttons: null,
        options: { parseMode: "HTML" }
      }
    ]);
    expect((await store.getUser(soon.id))?.renewal_reminder_sent_at).toBe("2025-03-03T10:00:00.000Z");

    const second = await subscriptions.sendRenewalReminders(new Date("2025-03-03T12:00:00Z"));
    expect(second).toEqual({ candidates: 1, sent: 0, failed: 1, errors: [] });
  });

  it("re-arms the reminder after a renewal", async () => {
    const user = await seedActiveUser(store, 604, {
      is_premium: true,
      subscription_until: "2025-04-02T10:00:00.000Z",
      renewal_reminder_sent_at: "2025-03-01T10:00:00.000Z"
    });
    expect(subscriptions.needsRenewalReminder(user, new Date("2025-03-31T10:00:00Z"))).toBe(true);
    expect(subscriptions.needsRenewalReminder(user, new Date("2025-03-20T10:00:00Z"))).toBe(false);
  });

  it("grants access to a removed user and brings them back", async () => {
    const user = await seedActiveUser(store, 605, {
      status: "pending",
      subscription_until: "2025-02-01T00:00:00.000Z",
      is_in_group: false,
      kicked_at: "2025-02-02T00:00:00.000Z"
    });
    const granted = await subscriptions.grantAccess(user.id, { days: 30 }, now);
    expect(granted.restored).toBe(true);
    expect(messenger.restored).toEqual([605]);
    expect(granted.user).toMatchObject({
      status: "active",
      is_premium: true,
      subscription_until: "2025-04-02T10:00:00.000Z",
      is_in_group: true,
      kicked_at: null
    });
    expect(granted.payment).toMatchObject({
      user_id: user.id,
      provider: "manual",
      amount: 0,
      currency: "RUB",
      status: "paid",
      subscription_end: "2025-04-02T10:00:00.000Z"
    });
  });

  it("extends an active subscription from its current end", async () => {
    const user = await seedActiveUser(store, 606, { is_premium: true, subscription_until: "2025-03-10T00:00:00.000Z" });
    const granted = await subscriptions.grantAccess(user.id, { days: 7, amount: 990 }, now);
    expect(granted.user.subscription_until).toBe("2025-03-17T00:00:00.000Z");
    expect(granted.restored).toBe(false);
    expect(messenger.restored).toEqual([]);
  });

  it("rejects bad grants", async () => {
    const user = await seedActiveUser(store, 607);
    const banned = await seedActiveUser(store, 608, { status: "banned" });
    await expect(subscriptions.grantAccess(user.id, { days: 0 }, now)).rejects.toMatchObject({ error: "invalid_days" });
    await expect(subscriptions.grantAccess(banned.id, { days: 30 }, now)).rejects.toMatchObject({ error: "user_banned", statusCode: 409 });
    await expect(subscriptions.grantAccess("missing", { days: 30 }, now)).rejects.toMatchObject({ error: "user_not_found" });
  });
});
