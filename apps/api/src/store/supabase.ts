import type { SupabaseClient } from "@supabase/supabase-js";
import type { z } from "zod";
import type {
  ActivityPeriod,
  DbChatActivity,
  DbPayment,
  DbRitual,
  DbRitualResponse,
  DbUser,
  DbUserActivity,
  DbUserRitual,
  DbWeeklyReport,
  RitualKind
} from "@ritualclub/shared";
import { StoreError } from "../errors.js";
import {
  chatActivityRow,
  dispatchCandidateRow,
  paymentRow,
  ritualResponseRow,
  ritualRow,
  userActivityRow,
  userRitualRow,
  userRow,
  weeklyReportRow
} from "./rows.js";
import type {
  DispatchCandidate,
  NewChatActivity,
  NewPayment,
  NewRitual,
  NewRitualResponse,
  NewUser,
  NewUserRitual,
  NewWeeklyReport,
  RitualFilter,
  RitualPatch,
  RitualResponseFilter,
  Store,
  UserActivityUpsert,
  UserFilter,
  UserPatch,
  UserRitualFilter,
  UserRitualPatch
} from "./types.js";

type QueryResult = { data: unknown; error: { message: string; details?: string | null } | null };

function parseRow<T>(schema: z.ZodType<T>, step: string, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new StoreError(step, { message: `malformed row: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}` });
  }
  return parsed.data;
}

function one<T>(schema: z.ZodType<T>, step: string, res: QueryResult): T {
  if (res.error) throw new StoreError(step, res.error);
  return parseRow(schema, step, res.data);
}

function maybe<T>(schema: z.ZodType<T>, step: string, res: QueryResult): T | null {
  if (res.error) throw new StoreError(step, res.error);
  if (res.data === null || res.data === undefined) return null;
  return parseRow(schema, step, res.data);
}

function many<T>(schema: z.ZodType<T>, step: string, res: QueryResult): T[] {
  if (res.error) throw new StoreError(step, res.error);
  const rows = Array.isArray(res.data) ? res.data : [];
  return rows.map((r) => parseRow(schema, step, r));
}

export class SupabaseStore implements Store {
  constructor(private readonly sb: SupabaseClient) {}

  async getUser(id: string): Promise<DbUser | null> {
    return maybe(userRow, "get_user", await this.sb.from("users").select("*").eq("id", id).maybeSingle());
  }

  async getUserByTelegramId(telegramUserId: number): Promise<DbUser | null> {
    const res = await this.sb.from("users").select("*").eq("telegram_user_id", telegramUserId).maybeSingle();
    return maybe(userRow, "get_user_by_telegram_id", res);
  }

  async listUsers(filter: UserFilter = {}): Promise<DbUser[]> {
    let q = this.sb.from("users").select("*");
    if (filter.statuses) q = q.in("status", filter.statuses);
    if (filter.inGroup !== undefined) q = q.eq("is_in_group", filter.inGroup);
    if (filter.subscriptionEndsBefore) q = q.lt("subscription_until", filter.subscriptionEndsBefore);
    return many(userRow, "list_users", await q.order("created_at", { ascending: true }));
  }

  async listUsersByIds(ids: string[]): Promise<DbUser[]> {
    if (ids.length === 0) return [];
    return many(userRow, "list_users_by_ids", await this.sb.from("users").select("*").in("id", ids));
  }

  async insertUser(user: NewUser): Promise<DbUser> {
    return one(userRow, "insert_user", await this.sb.from("users").insert([user]).select("*").single());
  }

  async updateUser(id: string, patch: UserPatch): Promise<DbUser> {
    return one(userRow, "update_user", await this.sb.from("users").update(patch).eq("id", id).select("*").single());
  }

  async listRituals(filter: RitualFilter = {}): Promise<DbRitual[]> {
    let q = this.sb.from("rituals").select("*");
    if (filter.kind) q = q.eq("kind", filter.kind);
    if (filter.activeOnly) q = q.eq("is_active", true);
    return many(ritualRow, "list_rituals", await q.order("sort_order", { ascending: true }));
  }

  async getRitual(id: string): Promise<DbRitual | null> {
    return maybe(ritualRow, "get_ritual", await this.sb.from("rituals").select("*").eq("id", id).maybeSingle());
  }

  async findRitual(kind: RitualKind, title: string): Promise<DbRitual | null> {
    const res = await this.sb.from("rituals").select("*").eq("kind", kind).eq("message_title", title).limit(1);
    return many(ritualRow, "find_ritual", res)[0] ?? null;
  }

  async insertRitual(ritual: NewRitual): Promise<DbRitual> {
    return one(ritualRow, "insert_ritual", await this.sb.from("rituals").insert([ritual]).select("*").single());
  }

  async updateRitual(id: string, patch: RitualPatch): Promise<DbRitual> {
    return one(ritualRow, "update_ritual", await this.sb.from("rituals").update(patch).eq("id", id).select("*").single());
  }

  async listDispatchCandidates(ritualId: string, opts: { subscriptionActiveAt: string | null }): Promise<DispatchCandidate[]> {
    let q = this.sb
      .from("user_rituals")
      .select("*, users!inner(*)")
      .eq("ritual_id", ritualId)
      .eq("is_enabled", true)
      .eq("users.status", "active");
    if (opts.subscriptionActiveAt) q = q.gt("users.subscription_until", opts.subscriptionActiveAt);
    const rows = many(dispatchCandidateRow, "list_dispatch_candidates", await q);
    return rows.map(({ users, ...state }) => ({ state, user: users }));
  }

  async getUserRitual(id: string): Promise<DbUserRitual | null> {
    return maybe(userRitualRow, "get_user_ritual", await this.sb.from("user_rituals").select("*").eq("id", id).maybeSingle());
  }

  async findUserRitual(userId: string, ritualId: string): Promise<DbUserRitual | null> {
    const res = await this.sb.from("user_rituals").select("*").eq("user_id", userId).eq("ritual_id", ritualId).maybeSingle();
    return maybe(userRitualRow, "find_user_ritual", res);
  }

  async listUserRituals(filter: UserRitualFilter): Promise<DbUserRitual[]> {
    let q = this.sb.from("user_rituals").select("*");
    if (filter.userId) q = q.eq("user_id", filter.userId);
    if (filter.ritualId) q = q.eq("ritual_id", filter.ritualId);
    if (filter.sentBefore) q = q.lt("last_sent_at", filter.sentBefore);
    return many(userRitualRow, "list_user_rituals", await q);
  }

  async insertUserRitual(row: NewUserRitual): Promise<DbUserRitual> {
    const res = await this.sb.from("user_rituals").insert([row]).select("*").single();
    return one(userRitualRow, "insert_user_ritual", res);
  }

  async updateUserRitual(id: string, patch: UserRitualPatch, expectedVersion: number): Promise<DbUserRitual | null> {
    const res = await this.sb
      .from("user_rituals")
      .update({ ...patch, version: expectedVersion + 1 })
      .eq("id", id)
      .eq("version", expectedVersion)
      .select("*")
      .maybeSingle();
    return maybe(userRitualRow, "update_user_ritual", res);
  }

  async insertRitualResponse(row: NewRitualResponse): Promise<DbRitualResponse> {
    const res = await this.sb.from("ritual_responses").insert([row]).select("*").single();
    return one(ritualResponseRow, "insert_ritual_response", res);
  }

  async listRitualResponses(filter: RitualResponseFilter): Promise<DbRitualResponse[]> {
    let q = this.sb.from("ritual_responses").select("*");
    if (filter.userRitualId) q = q.eq("user_ritual_id", filter.userRitualId);
    if (filter.ritualId) q = q.eq("ritual_id", filter.ritualId);
    const ordered = q.order("responded_at", { ascending: false });
    return many(ritualResponseRow, "list_ritual_responses", await (filter.limit ? ordered.limit(filter.limit) : ordered));
  }

  async insertChatActivity(row: NewChatActivity): Promise<DbChatActivity> {
    const res = await this.sb.from("chat_activities").insert([row]).select("*").single();
    return one(chatActivityRow, "insert_chat_activity", res);
  }

  async listChatActivities(range: { fromDate: string; toDate: string }): Promise<DbChatActivity[]> {
    const res = await this.sb
      .from("chat_activities")
      .select("*")
      .gte("activity_date", range.fromDate)
      .lte("activity_date", range.toDate)
      .order("created_at", { ascending: true });
    return many(chatActivityRow, "list_chat_activities", res);
  }

  async upsertUserActivity(row: UserActivityUpsert): Promise<DbUserActivity> {
    const res = await this.sb
      .from("user_activities")
      .upsert([{ ...row, updated_at: new Date().toISOString() }], { onConflict: "user_id,period_type,period_date" })
      .select("*")
      .single();
    return one(userActivityRow, "upsert_user_activity", res);
  }

  async listUserActivities(filter: { periodType: ActivityPeriod; fromDate: string; toDate: string }): Promise<DbUserActivity[]> {
    const res = await this.sb
      .from("user_activities")
      .select("*")
      .eq("period_type", filter.periodType)
      .gte("period_date", filter.fromDate)
      .lte("period_date", filter.toDate);
    return many(userActivityRow, "list_user_activities", res);
  }

  async getWeeklyReport(weekStart: string): Promise<DbWeeklyReport | null> {
    const res = await this.sb.from("weekly_reports").select("*").eq("week_start", weekStart).maybeSingle();
    return maybe(weeklyReportRow, "get_weekly_report", res);
  }

  async insertWeeklyReport(row: NewWeeklyReport): Promise<DbWeeklyReport> {
    const res = await this.sb.from("weekly_reports").insert([row]).select("*").single();
    return one(weeklyReportRow, "insert_weekly_report", res);
  }

  async listUnpublishedWeeklyReports(sinceWeekStart: string): Promise<DbWeeklyReport[]> {
    const res = await this.sb
      .from("weekly_reports")
      .select("*")
      .eq("is_published", false)
      .gte("week_start", sinceWeekStart)
      .order("week_start", { ascending: false });
    return many(weeklyReportRow, "list_unpublished_weekly_reports", res);
  }

  async markWeeklyReportPublished(id: string, publishedAt: string): Promise<void> {
    const res = await this.sb.from("weekly_reports").update({ is_published: true, published_at: publishedAt }).eq("id", id);
    if (res.error) throw new StoreError("mark_weekly_report_published", res.error);
  }

  async insertPayment(row: NewPayment): Promise<DbPayment> {
    return one(paymentRow, "insert_payment", await this.sb.from("payments").insert([row]).select("*").single());
  }
}
