import type { DbRitualResponse, DbUser } from "@ritualclub/shared";
import type { Store } from "../store/types.js";
import { HOUR_MS, localDate, parseIsoDate, weekStartOf } from "../utils/time.js";

export type WeeklyGoal = {
  ritual_id: string;
  week_start: string;
  text: string;
  set_at: string;
};

const GOAL_LOOKBACK = 20;

// A goal is a free-text answer to a WEEKLY_GOALS ritual. The newest one given during the user's local week is current.
export async function getCurrentWeeklyGoal(store: Store, user: DbUser, now: Date): Promise<WeeklyGoal | null> {
  const offset = user.timezone_offset_hours;
  const weekStart = weekStartOf(localDate(now, offset));
  const monday = parseIsoDate(weekStart);
  if (!monday) return null;
  const weekStartMs = monday.getTime() - offset * HOUR_MS;

  const rituals = await store.listRituals({ kind: "WEEKLY_GOALS" });
  let best: { response: DbRitualResponse; text: string; at: number } | null = null;
  for (const ritual of rituals) {
    const state = await store.findUserRitual(user.id, ritual.id);
    if (!state) continue;
    const responses = await store.listRitualResponses({ userRitualId: state.id, limit: GOAL_LOOKBACK });
    for (const response of responses) {
      const at = Date.parse(response.responded_at);
      if (!response.response_text || !(at >= weekStartMs)) continue;
      if (!best || at > best.at) best = { response, text: response.response_text, at };
      break;
    }
  }
  if (!best) return null;
  return { ritual_id: best.response.ritual_id, week_start: weekStart, text: best.text, set_at: best.response.responded_at };
}
