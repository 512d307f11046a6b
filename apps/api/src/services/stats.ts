import type { DbRitualResponse, RitualKind } from "@ritualclub/shared";
import { notFound } from "../errors.js";
import type { Store } from "../store/types.js";
import { DAY_MS, fmtHHMM } from "../utils/time.js";
import { isCompliant } from "./enforcement.js";

export type RitualStats = {
  ritual_id: string;
  name: string;
  kind: RitualKind;
  participants: number;
  active_participants: number;
  total_sent: number;
  total_responses: number;
  total_completed: number;
  total_skipped: number;
  total_missed: number;
  response_rate: number;
  completion_rate: number;
  last_sent_at: string | null;
};

export type SubscriptionHealth = {
  total_users: number;
  by_status: { pending: number; active: number; banned: number };
  in_group: number;
  compliant: number;
  expiring_soon: number;
  non_compliant_in_group: number;
  in_grace: number;
};

function pct(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}

export async function getRitualStats(store: Store, ritualId: string): Promise<RitualStats> {
  const ritual = await store.getRitual(ritualId);
  if (!ritual) throw notFound("ritual");
  const states = await store.listUserRituals({ ritualId });
  const totals = { sent: 0, responses: 0, completed: 0, skipped: 0, missed: 0 };
  let lastSentMs = -Infinity;
  let lastSentAt: string | null = null;
  for (const s of states) {
    totals.sent += s.total_sent;
    totals.responses += s.total_responses;
    totals.completed += s.total_completed;
    totals.skipped += s.total_skipped;
    totals.missed += s.total_missed;
    const ms = s.last_sent_at ? Date.parse(s.last_sent_at) : NaN;
    if (Number.isFinite(ms) && ms > lastSentMs) {
      lastSentMs = ms;
      lastSentAt = s.last_sent_at;
    }
  }
  return {
    ritual_id: ritual.id,
    name: ritual.name,
    kind: ritual.kind,
    participants: states.length,
    active_participants: states.filter((s) => s.is_enabled).length,
    total_sent: totals.sent,
    total_responses: totals.responses,
    total_completed: totals.completed,
    total_skipped: totals.skipped,
    total_missed: totals.missed,
    response_rate: pct(totals.responses, totals.sent),
    completion_rate: pct(totals.completed, totals.responses),
    last_sent_at: lastSentAt
  };
}

export async function getSubscriptionHealth(store: Store, now: Date, expiringWithinDays: number): Promise<SubscriptionHealth> {
  const users = await store.listUsers();
  const horizonMs = now.getTime() + expiringWithinDays * DAY_MS;
  const health: SubscriptionHealth = {
    total_users: users.length,
    by_status: { pending: 0, active: 0, banned: 0 },
    in_group: 0,
    compliant: 0,
    expiring_soon: 0,
    non_compliant_in_group: 0,
    in_grace: 0
  };
  for (const u of users) {
    health.by_status[u.status] += 1;
    const compliant = isCompliant(u, now);
    if (u.is_in_group) health.in_group += 1;
    if (compliant) {
      health.compliant += 1;
      const untilMs = u.subscription_until ? Date.parse(u.subscription_until) : NaN;
      if (Number.isFinite(untilMs) && untilMs <= horizonMs) health.expiring_soon += 1;
    } else if (u.is_in_group) {
      health.non_compliant_in_group += 1;
    }
    if (u.payment_warning_sent_at) health.in_grace += 1;
  }
  return health;
}

export async function getUserRitualOverview(store: Store, userId: string) {
  const [states, rituals] = await Promise.all([store.listUserRituals({ userId }), store.listRituals()]);
  const byId = new Map(rituals.map((r) => [r.id, r]));
  return states.flatMap((s) => {
    const r = byId.get(s.ritual_id);
    if (!r) return [];
    return [
      {
        ritual_id: r.id,
        name: r.name,
        kind: r.kind,
        send_time: fmtHHMM(r.send_hour, r.send_minute),
        active: r.is_active,
        enabled: s.is_enabled,
        total_sent: s.total_sent,
        total_responses: s.total_responses,
        total_completed: s.total_completed,
        total_missed: s.total_missed
      }
    ];
  });
}

export type RitualResponseEntry = DbRitualResponse & { user_id: string | null };

// Newest answers to one ritual, with the answering user.
export async function getRitualResponseHistory(store: Store, ritualId: string, limit: number): Promise<RitualResponseEntry[]> {
  const ritual = await store.getRitual(ritualId);
  if (!ritual) throw notFound("ritual");
  const [responses, states] = await Promise.all([store.listRitualResponses({ ritualId, limit }), store.listUserRituals({ ritualId })]);
  const owners = new Map(states.map((s) => [s.id, s.user_id]));
  return responses.map((r) => ({ ...r, user_id: owners.get(r.user_ritual_id) ?? null }));
}
