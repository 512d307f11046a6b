import { describe, expect, it } from "vitest";
import { getRitualStats, getSubscriptionHealth, getUserRitualOverview } from "../src/services/stats.js";
import { MemoryStore, ritualFixture, seedActiveUser } from "./fakes.js";

describe("stats", () => {
  it("aggregates ritual counters into rates", async () => {
    const store = new MemoryStore();
    const ritual = await store.insertRitual(ritualFixture());
    const a = await seedActiveUser(store, 701);
    const b = await seedActiveUser(store, 702);
    const sa = await store.insertUserRitual({ user_id: a.id, ritual_id: ritual.id, timezone_offset_hours: 3 });
    const sb = await store.insertUserRitual({ user_id: b.id, ritual_id: ritual.id, timezone_offset_hours: 3 });
    await store.updateUserRitual(sa.id, { total_sent: 2, total_responses: 1, total_completed: 1, last_sent_at: "2025-03-03T03:30:00.000Z" }, 0);
    await store.updateUserRitual(
      sb.id,
      { total_sent: 2, total_responses: 1, total_skipped: 1, is_enabled: false, last_sent_at: "2025-03-02T03:30:00.000Z" },
      0
    );

    expect(await getRitualStats(store, ritual.id)).toEqual({
      ritual_id: ritual.id,
      name: "Утро",
      kind: "MORNING",
      participants: 2,
      active_participants: 1,
      total_sent: 4,
      total_responses: 2,
      total_completed: 1,
      total_skipped: 1,
      total_missed: 0,
      response_rate: 50,
      completion_rate: 50,
      last_sent_at: "2025-03-03T03:30:00.000Z"
    });

    expect(await getUserRitualOverview(store, a.id)).toEqual([
      {
        ritual_id: ritual.id,
        name: "Утро",
        kind: "MORNING",
        send_time: "06:30",
        active: true,
        enabled: true,
        total_sent: 2,
        total_responses: 1,
        total_completed: 1,
        total_missed: 0
      }
    ]);
  });

  it("summarizes subscription health", async () => {
    const store = new MemoryStore();
    await seedActiveUser(store, 711, { is_premium: true, subscription_until: "2025-03-05T10:00:00.000Z" });
    await seedActiveUser(store, 712, { status: "pending", payment_warning_sent_at: "2025-03-03T09:50:00.000Z" });
    await seedActiveUser(store, 713, { status: "banned", is_in_group: false });

    expect(await getSubscriptionHealth(store, new Date("2025-03-03T10:00:00Z"), 3)).toEqual({
      total_users: 3,
      by_status: { pending: 1, active: 1, banned: 1 },
      in_group: 2,
      compliant: 1,
      expiring_soon: 1,
      non_compliant_in_group: 1,
      in_grace: 1
    });
  });
});
