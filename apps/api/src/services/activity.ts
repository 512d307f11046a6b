import type { Logger } from "pino";
import type { ActivityPeriod, ActivityType, DbChatActivity, DbUserActivity, DbWeeklyReport, Messenger, WeeklyReportEntry } from "@ritualclub/shared";
import { errorMessage } from "../errors.js";
import type { Store, UserActivityUpsert } from "../store/types.js";
import { addDays, getLocalParts, localDate, weekStartOf, weekdayOf } from "../utils/time.js";
import { renderWeeklyReport } from "./render.js";
import { displayName, upsertTelegramUser, type TelegramProfile } from "./users.js";

// Engagement weights per activity type; unlisted types count 1.
export const TYPE_WEIGHTS: Readonly<Record<string, number>> = {
  message: 1,
  photo: 2,
  video: 3,
  voice: 3,
  document: 2,
  poll: 5,
  reply: 2
};

export function activityScore(messages: number, totalCharacters: number, repliesSent: number, countsByType: Record<string, number>): number {
  let score = messages + Math.floor(totalCharacters / 100) + repliesSent * 2;
  for (const [type, count] of Object.entries(countsByType)) {
    score += count * (Object.hasOwn(TYPE_WEIGHTS, type) ? TYPE_WEIGHTS[type] : 1);
  }
  return Math.max(0, score);
}

// Weekly reports go out Monday at this local hour.
export const WEEKLY_REPORT_PUBLISH_HOUR = 12;

// Monday of the week a report run covers: the running week, or the one just closed while its report is still unpublished.
export function reportWeekStart(now: Date, offsetHours: number): string {
  const p = getLocalParts(now, offsetHours);
  const monday = weekStartOf(localDate(now, offsetHours));
  return p.weekday === 0 && p.hour < WEEKLY_REPORT_PUBLISH_HOUR ? addDays(monday, -7) : monday;
}

export type ActivitySummaryFields = Omit<UserActivityUpsert, "user_id" | "period_type" | "period_date" | "period_rank">;

export function summarizeActivities(events: DbChatActivity[]): ActivitySummaryFields {
  const countsByType: Record<string, number> = {};
  const byHour = new Map<number, number>();
  let characters = 0;
  let replies = 0;
  let forwards = 0;
  for (const e of events) {
    countsByType[e.activity_type] = (countsByType[e.activity_type] ?? 0) + 1;
    byHour.set(e.activity_hour, (byHour.get(e.activity_hour) ?? 0) + 1);
    characters += e.message_length;
    if (e.is_reply) replies += 1;
    if (e.is_forward) forwards += 1;
  }
  let mostActiveHour: number | null = null;
  let best = 0;
  for (const [hour, count] of byHour) {
    if (count > best || (count === best && mostActiveHour !== null && hour < mostActiveHour)) {
      best = count;
      mostActiveHour = hour;
    }
  }
  const total = events.length;
  const textMessages = countsByType.message ?? 0;
  return {
    total_messages: total,
    text_messages: textMessages,
    media_messages: total - textMessages,
    total_characters: characters,
    average_message_length: total > 0 ? Math.round((characters / total) * 10) / 10 : 0,
    replies_sent: replies,
    forwards_sent: forwards,
    most_active_hour: mostActiveHour,
    counts_by_type: countsByType,
    activity_score: activityScore(total, characters, replies, countsByType)
  };
}

export type RankedActivity = Pick<DbUserActivity, "user_id" | "activity_score" | "total_messages">;

// Top 3 by score, then up to 3 light participants (under 10 messages) from outside the top.
export function selectWeeklyHighlights<T extends RankedActivity>(rows: T[]): { top: T[]; connecting: T[] } {
  const ranked = rows
    .filter((r) => r.activity_score > 0)
    .sort((a, b) => b.activity_score - a.activity_score || b.total_messages - a.total_messages || a.user_id.localeCompare(b.user_id));
  const top = ranked.slice(0, 3);
  const connecting = ranked
    .slice(3)
    .filter((r) => r.total_messages > 0 && r.total_messages < 10)
    .slice(0, 3);
  return { top, connecting };
}

export type ActivityEventInput = TelegramProfile & {
  chat_id: number;
  message_id: number;
  activity_type: ActivityType;
  message_length: number;
  is_reply: boolean;
  is_forward: boolean;
};

export class ActivityAggregator {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly messenger: Messenger,
    logger: Logger,
    private readonly opts: { referenceOffsetHours: number; groupId: number | null }
  ) {
    this.log = logger.child({ component: "activity" });
  }

  async recordActivity(input: ActivityEventInput, at: Date): Promise<DbChatActivity> {
    const { user } = await upsertTelegramUser(
      this.store,
      { telegram_user_id: input.telegram_user_id, username: input.username, first_name: input.first_name },
      this.opts.referenceOffsetHours
    );
    const local = getLocalParts(at, this.opts.referenceOffsetHours);
    return this.store.insertChatActivity({
      user_id: user.id,
      chat_id: input.chat_id,
      message_id: input.message_id,
      activity_type: input.activity_type,
      message_length: Math.max(0, Math.floor(input.message_length)),
      activity_date: localDate(at, this.opts.referenceOffsetHours),
      activity_hour: local.hour,
      is_reply: input.is_reply,
      is_forward: input.is_forward
    });
  }

  private async rebuild(period: ActivityPeriod, periodDate: string, fromDate: string, toDate: string): Promise<DbUserActivity[]> {
    const events = await this.store.listChatActivities({ fromDate, toDate });
    const byUser = new Map<string, DbChatActivity[]>();
    for (const e of events) {
      const list = byUser.get(e.user_id);
      if (list) list.push(e);
      else byUser.set(e.user_id, [e]);
    }
    const summaries = Array.from(byUser, ([userId, list]) => ({ user_id: userId, ...summarizeActivities(list) }));
    summaries.sort((a, b) => b.activity_score - a.activity_score || a.user_id.localeCompare(b.user_id));
    const saved: DbUserActivity[] = [];
    for (const [i, s] of summaries.entries()) {
      saved.push(await this.store.upsertUserActivity({ ...s, period_type: period, period_date: periodDate, period_rank: i + 1 }));
    }
    return saved;
  }

  rebuildDailySummaries(date: string): Promise<DbUserActivity[]> {
    return this.rebuild("DAILY", date, date, date);
  }

  rebuildWeeklySummaries(weekStart: string): Promise<DbUserActivity[]> {
    return this.rebuild("WEEKLY", weekStart, weekStart, addDays(weekStart, 6));
  }

  // Recomputes the day; a Sunday also closes its week.
  async processDailyActivity(date: string): Promise<{ date: string; users: number; weekly_users: number | null }> {
    const daily = await this.rebuildDailySummaries(date);
    let weekly: number | null = null;
    if (weekdayOf(date) === 6) {
      weekly = (await this.rebuildWeeklySummaries(weekStartOf(date))).length;
    }
    this.log.info({ date, users: daily.length, weekly_users: weekly }, "daily activity processed");
    return { date, users: daily.length, weekly_users: weekly };
  }

  // One report per week; reruns return the stored one.
  async generateWeeklyReport(weekStart: string): Promise<DbWeeklyReport> {
    const existing = await this.store.getWeeklyReport(weekStart);
    if (existing) return existing;

    const weekEnd = addDays(weekStart, 6);
    const summaries = await this.rebuildWeeklySummaries(weekStart);
    const { top, connecting } = selectWeeklyHighlights(summaries);
    const users = await this.store.listUsersByIds([...top, ...connecting].map((s) => s.user_id));
    const names = new Map(users.map((u) => [u.id, displayName(u)]));
    const toEntry = (s: DbUserActivity): WeeklyReportEntry => ({
      user_id: s.user_id,
      display_name: names.get(s.user_id) ?? "Участник",
      activity_score: s.activity_score,
      total_messages: s.total_messages
    });

    const members = await this.store.listUsers({ inGroup: true });
    const active = summaries.filter((s) => s.total_messages > 0).length;
    const total = Math.max(members.length, active);
    const topEntries = top.map(toEntry);
    const connectingEntries = connecting.map(toEntry);
    const report = await this.store.insertWeeklyReport({
      week_start: weekStart,
      week_end: weekEnd,
      top_users: topEntries,
      connecting_users: connectingEntries,
      total_participants: total,
      active_participants: active,
      activity_percentage: total > 0 ? Math.round((active / total) * 1000) / 10 : 0,
      report_message: renderWeeklyReport({
        weekStart,
        weekEnd,
        top: topEntries,
        connecting: connectingEntries,
        totalParticipants: total,
        activeParticipants: active
      })
    });
    this.log.info({ week_start: weekStart, top: topEntries.length, connecting: connectingEntries.length }, "weekly report generated");
    return report;
  }

  async publishWeeklyReports(now: Date): Promise<{ published: number; failed: number; errors: string[] }> {
    const result: { published: number; failed: number; errors: string[] } = { published: 0, failed: 0, errors: [] };
    if (this.opts.groupId === null) {
      this.log.warn("GROUP_CHAT_ID is not configured, weekly reports not published");
      return result;
    }
    const since = addDays(localDate(now, this.opts.referenceOffsetHours), -14);
    const reports = await this.store.listUnpublishedWeeklyReports(since);
    for (const report of reports) {
      try {
        const ok = await this.messenger.sendToGroup(this.opts.groupId, report.report_message, { parseMode: "HTML" });
        if (!ok) {
          result.failed += 1;
          continue;
        }
        await this.store.markWeeklyReportPublished(report.id, now.toISOString());
        result.published += 1;
      } catch (e) {
        result.failed += 1;
        result.errors.push(`${report.week_start}: ${errorMessage(e)}`);
      }
    }
    return result;
  }

  async getActivityStatsForDate(date: string): Promise<{ date: string; messages: number; active_users: number; by_type: Record<string, number> }> {
    const events = await this.store.listChatActivities({ fromDate: date, toDate: date });
    const byType: Record<string, number> = {};
    for (const e of events) byType[e.activity_type] = (byType[e.activity_type] ?? 0) + 1;
    return { date, messages: events.length, active_users: new Set(events.map((e) => e.user_id)).size, by_type: byType };
  }

  async getTopActiveUsers(
    days: number,
    limit: number,
    now: Date
  ): Promise<Array<{ user_id: string; display_name: string; activity_count: number }>> {
    const today = localDate(now, this.opts.referenceOffsetHours);
    const events = await this.store.listChatActivities({ fromDate: addDays(today, -(days - 1)), toDate: today });
    const counts = new Map<string, number>();
    for (const e of events) counts.set(e.user_id, (counts.get(e.user_id) ?? 0) + 1);
    const ranked = Array.from(counts, ([user_id, activity_count]) => ({ user_id, activity_count }))
      .sort((a, b) => b.activity_count - a.activity_count || a.user_id.localeCompare(b.user_id))
      .slice(0, limit);
    const users = await this.store.listUsersByIds(ranked.map((r) => r.user_id));
    const names = new Map(users.map((u) => [u.id, displayName(u)]));
    return ranked.map((r) => ({ ...r, display_name: names.get(r.user_id) ?? "Участник" }));
  }
}
