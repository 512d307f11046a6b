import type { DbRitual, DbUserRitual } from "@ritualclub/shared";
import { DAY_MS, MINUTE_MS, lastOccurrenceAt, localDayStart } from "../utils/time.js";

export type SendDecision =
  | { send: true; dueAt: Date }
  | { send: false; reason: "disabled" | "outside_window" | "already_sent" | "already_attempted"; dueAt: Date | null };

export type ScheduleOptions = {
  // How long after the scheduled minute a tick may still deliver it. 1 means exact-minute matching.
  catchUpMinutes: number;
};

// Most recent scheduled instant of the ritual for a user at the given offset. MONTHLY fires on the 1st.
export function ritualDueAt(ritual: DbRitual, offsetHours: number, now: Date): Date {
  return lastOccurrenceAt(
    {
      hour: ritual.send_hour,
      minute: ritual.send_minute,
      weekday: ritual.cadence === "WEEKLY" ? ritual.weekday : null,
      monthDay: ritual.cadence === "MONTHLY" ? 1 : null
    },
    offsetHours,
    now
  );
}

function inPeriod(stamp: string | null, periodStart: Date): boolean {
  if (!stamp) return false;
  const ms = Date.parse(stamp);
  return Number.isFinite(ms) && ms >= periodStart.getTime();
}

export function shouldSend(ritual: DbRitual, state: DbUserRitual, now: Date, opts: ScheduleOptions): SendDecision {
  if (!ritual.is_active || !state.is_enabled) return { send: false, reason: "disabled", dueAt: null };

  const dueAt = ritualDueAt(ritual, state.timezone_offset_hours, now);
  const periodStart = localDayStart(dueAt, state.timezone_offset_hours);
  const lateBy = now.getTime() - dueAt.getTime();
  // Late delivery never spills into the next local day, so one period maps to one calendar day.
  if (lateBy >= opts.catchUpMinutes * MINUTE_MS || now.getTime() >= periodStart.getTime() + DAY_MS) {
    return { send: false, reason: "outside_window", dueAt };
  }

  if (inPeriod(state.last_sent_at, periodStart)) return { send: false, reason: "already_sent", dueAt };
  // A failed delivery waits for the next period.
  if (inPeriod(state.last_attempt_at, periodStart)) return { send: false, reason: "already_attempted", dueAt };
  return { send: true, dueAt };
}
