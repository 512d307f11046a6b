import { describe, expect, it } from "vitest";
import type { DbRitual, DbUserRitual } from "@ritualclub/shared";
import { shouldSend } from "../src/services/ritualSchedule.js";
import { ritualFixture } from "./fakes.js";

function ritual(overrides: Partial<DbRitual> = {}): DbRitual {
  return { ...ritualFixture(), id: "r1", created_at: "2025-01-01T00:00:00.000Z", ...overrides };
}

function state(overrides: Partial<DbUserRitual> = {}): DbUserRitual {
  return {
    id: "ur1",
    user_id: "u1",
    ritual_id: "r1",
    last_sent_at: null,
    last_attempt_at: null,
    timezone_offset_hours: 3,
    is_enabled: true,
    total_sent: 0,
    total_responses: 0,
    total_completed: 0,
    total_skipped: 0,
    total_missed: 0,
    last_missed_at: null,
    version: 0,
    created_at: "2025-01-01T00:00:00.000Z",
    ...overrides
  };
}

const opts = { catchUpMinutes: 30 };

describe("shouldSend", () => {
  it("sends a 06:30 morning ritual at 06:30 local time", () => {
    const d = shouldSend(ritual(), state(), new Date("2025-03-03T03:30:00Z"), opts);
    expect(d).toEqual({ send: true, dueAt: new Date("2025-03-03T03:30:00Z") });
  });

  it("does not send before the scheduled minute", () => {
    const d = shouldSend(ritual(), state(), new Date("2025-03-03T03:29:00Z"), opts);
    expect(d.send).toBe(false);
    expect(d.send === false && d.reason).toBe("outside_window");
  });

  it("delivers late within the catch-up window only", () => {
    expect(shouldSend(ritual(), state(), new Date("2025-03-03T03:59:00Z"), opts).send).toBe(true);
    const late = shouldSend(ritual(), state(), new Date("2025-03-03T04:00:00Z"), opts);
    expect(late.send === false && late.reason).toBe("outside_window");
  });

  it("skips a ritual already sent in the current local day", () => {
    const s = state({ last_sent_at: "2025-03-03T03:30:00.000Z" });
    const d = shouldSend(ritual(), s, new Date("2025-03-03T03:31:00Z"), opts);
    expect(d.send === false && d.reason).toBe("already_sent");
    const yesterday = state({ last_sent_at: "2025-03-02T03:30:00.000Z" });
    expect(shouldSend(ritual(), yesterday, new Date("2025-03-03T03:31:00Z"), opts).send).toBe(true);
  });

  it("holds back a pair whose delivery failed earlier in the period", () => {
    const failed = state({ last_attempt_at: "2025-03-03T03:30:00.000Z" });
    const d = shouldSend(ritual(), failed, new Date("2025-03-03T03:31:00Z"), opts);
    expect(d.send === false && d.reason).toBe("already_attempted");
    const yesterday = state({ last_attempt_at: "2025-03-02T03:30:00.000Z" });
    expect(shouldSend(ritual(), yesterday, new Date("2025-03-03T03:30:00Z"), opts).send).toBe(true);
  });

  it("sends at most once across a day of minute ticks", () => {
    let s = state();
    const sentAt: string[] = [];
    const start = Date.parse("2025-03-03T00:00:00Z");
    for (let i = 0; i < 24 * 60; i++) {
      const now = new Date(start + i * 60000);
      if (shouldSend(ritual(), s, now, opts).send) {
        sentAt.push(now.toISOString());
        s = { ...s, last_sent_at: now.toISOString() };
      }
    }
    expect(sentAt).toEqual(["2025-03-03T03:30:00.000Z"]);
  });

  it("never carries a late delivery past local midnight", () => {
    const r = ritual({ send_hour: 23, send_minute: 50 });
    const s = state({ timezone_offset_hours: 0 });
    expect(shouldSend(r, s, new Date("2025-03-03T23:55:00Z"), opts).send).toBe(true);
    const d = shouldSend(r, s, new Date("2025-03-04T00:05:00Z"), opts);
    expect(d.send === false && d.reason).toBe("outside_window");
  });

  it("gates weekly rituals on the weekday", () => {
    const friday = ritual({ kind: "FRIDAY_CYCLE", cadence: "WEEKLY", weekday: 4, send_hour: 17, send_minute: 0 });
    expect(shouldSend(friday, state(), new Date("2025-03-03T14:00:00Z"), opts).send).toBe(false);
    expect(shouldSend(friday, state(), new Date("2025-03-07T14:00:00Z"), opts).send).toBe(true);
  });

  it("uses the user's own offset", () => {
    const d = shouldSend(ritual(), state({ timezone_offset_hours: -5 }), new Date("2025-03-03T11:30:00Z"), opts);
    expect(d).toEqual({ send: true, dueAt: new Date("2025-03-03T11:30:00Z") });
  });

  it("never sends disabled or inactive rituals", () => {
    const now = new Date("2025-03-03T03:30:00Z");
    expect(shouldSend(ritual(), state({ is_enabled: false }), now, opts)).toEqual({ send: false, reason: "disabled", dueAt: null });
    expect(shouldSend(ritual({ is_active: false }), state(), now, opts)).toEqual({ send: false, reason: "disabled", dueAt: null });
  });
});
