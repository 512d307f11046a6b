import type {
  DbChatActivity,
  DbPayment,
  DbRitual,
  DbRitualResponse,
  DbUser,
  DbUserActivity,
  DbUserRitual,
  DbWeeklyReport,
  MessageButton,
  Messenger,
  RitualKind,
  SendOptions,
  ActivityPeriod
} from "@ritualclub/shared";
import { StoreError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
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
} from "../src/store/types.js";

export const silentLogger = createLogger("test", "silent");

type StoreMethod = keyof Store;

// In-process Store with the same filtering, uniqueness and CAS rules as the Postgres tables.
export class MemoryStore implements Store {
  users: DbUser[] = [];
  rituals: DbRitual[] = [];
  userRituals: DbUserRitual[] = [];
  responses: DbRitualResponse[] = [];
  chatActivities: DbChatActivity[] = [];
  userActivities: DbUserActivity[] = [];
  weeklyReports: DbWeeklyReport[] = [];
  payments: DbPayment[] = [];
  // Methods listed here throw StoreError.
  failing = new Set<StoreMethod>();
  // Called before a CAS update is applied; lets tests simulate a concurrent writer.
  beforeUserRitualUpdate: ((id: string) => void) | null = null;

  private seq = 0;

  private nextId(prefix: string): string {
    this.seq += 1;
    return `${prefix}-${this.seq}`;
  }

  private check(method: StoreMethod) {
    if (this.failing.has(method)) throw new StoreError(method, { message: "backend unavailable" });
  }

  async getUser(id: string): Promise<DbUser | null> {
    this.check("getUser");
    return this.users.find((u) => u.id === id) ?? null;
  }

  async getUserByTelegramId(telegramUserId: number): Promise<DbUser | null> {
    this.check("getUserByTelegramId");
    return this.users.find((u) => u.telegram_user_id === telegramUserId) ?? null;
  }

  async listUsers(filter: UserFilter = {}): Promise<DbUser[]> {
    this.check("listUsers");
    return this.users.filter((u) => {
      if (filter.statuses && !filter.statuses.includes(u.status)) return false;
      if (filter.inGroup !== undefined && u.is_in_group !== filter.inGroup) return false;
      if (filter.subscriptionEndsBefore) {
        if (!u.subscription_until) return false;
        if (Date.parse(u.subscription_until) >= Date.parse(filter.subscriptionEndsBefore)) return false;
      }
      return true;
    });
  }

  async listUsersByIds(ids: string[]): Promise<DbUser[]> {
    this.check("listUsersByIds");
    return this.users.filter((u) => ids.includes(u.id));
  }

  async insertUser(user: NewUser): Promise<DbUser> {
    this.check("insertUser");
    if (this.users.some((u) => u.telegram_user_id === user.telegram_user_id)) {
      throw new StoreError("insertUser", { message: "duplicate telegram_user_id" });
    }
    const row: DbUser = {
      id: this.nextId("user"),
      status: "pending",
      is_premium: false,
      subscription_until: null,
      is_in_group: false,
      joined_group_at: null,
      timezone_offset_hours: 3,
      payment_warning_sent_at: null,
      kicked_at: null,
      renewal_reminder_sent_at: null,
      created_at: new Date().toISOString(),
      ...user
    };
    this.users.push(row);
    return { ...row };
  }

  async updateUser(id: string, patch: UserPatch): Promise<DbUser> {
    this.check("updateUser");
    const idx = this.users.findIndex((u) => u.id === id);
    const current = this.users[idx];
    if (idx < 0 || !current) throw new StoreError("updateUser", { message: "no rows" });
    const next = { ...current, ...patch };
    this.users[idx] = next;
    return { ...next };
  }

  async listRituals(filter: RitualFilter = {}): Promise<DbRitual[]> {
    this.check("listRituals");
    return this.rituals
      .filter((r) => (!filter.kind || r.kind === filter.kind) && (!filter.activeOnly || r.is_active))
      .sort((a, b) => a.sort_order - b.sort_order);
  }

  async getRitual(id: string): Promise<DbRitual | null> {
    this.check("getRitual");
    return this.rituals.find((r) => r.id === id) ?? null;
  }

  async findRitual(kind: RitualKind, title: string): Promise<DbRitual | null> {
    this.check("findRitual");
    return this.rituals.find((r) => r.kind === kind && r.message_title === title) ?? null;
  }

  async insertRitual(ritual: NewRitual): Promise<DbRitual> {
    this.check("insertRitual");
    const row: DbRitual = { ...ritual, id: this.nextId("ritual"), created_at: new Date().toISOString() };
    this.rituals.push(row);
    return { ...row };
  }

  async updateRitual(id: string, patch: RitualPatch): Promise<DbRitual> {
    this.check("updateRitual");
    const idx = this.rituals.findIndex((r) => r.id === id);
    const current = this.rituals[idx];
    if (idx < 0 || !current) throw new StoreError("updateRitual", { message: "no rows" });
    const next = { ...current, ...patch };
    this.rituals[idx] = next;
    return { ...next };
  }

  async listDispatchCandidates(ritualId: string, opts: { subscriptionActiveAt: string | null }): Promise<DispatchCandidate[]> {
    this.check("listDispatchCandidates");
    const out: DispatchCandidate[] = [];
    for (const state of this.userRituals) {
      if (state.ritual_id !== ritualId || !state.is_enabled) continue;
      const user = this.users.find((u) => u.id === state.user_id);
      if (!user || user.status !== "active") continue;
      if (opts.subscriptionActiveAt) {
        if (!user.subscription_until || Date.parse(user.subscription_until) <= Date.parse(opts.subscriptionActiveAt)) continue;
      }
      out.push({ state: { ...state }, user: { ...user } });
    }
    return out;
  }

  async getUserRitual(id: string): Promise<DbUserRitual | null> {
    this.check("getUserRitual");
    const row = this.userRituals.find((s) => s.id === id);
    return row ? { ...row } : null;
  }

  async findUserRitual(userId: string, ritualId: string): Promise<DbUserRitual | null> {
    this.check("findUserRitual");
    const row = this.userRituals.find((s) => s.user_id === userId && s.ritual_id === ritualId);
    return row ? { ...row } : null;
  }

  async listUserRituals(filter: UserRitualFilter): Promise<DbUserRitual[]> {
    this.check("listUserRituals");
    const before = filter.sentBefore ? Date.parse(filter.sentBefore) : null;
    return this.userRituals
      .filter((s) => (!filter.userId || s.user_id === filter.userId) && (!filter.ritualId || s.ritual_id === filter.ritualId))
      .filter((s) => before === null || (s.last_sent_at !== null && Date.parse(s.last_sent_at) < before))
      .map((s) => ({ ...s }));
  }

  async insertUserRitual(row: NewUserRitual): Promise<DbUserRitual> {
    this.check("insertUserRitual");
    if (this.userRituals.some((s) => s.user_id === row.user_id && s.ritual_id === row.ritual_id)) {
      throw new StoreError("insertUserRitual", { message: "duplicate user_id, ritual_id" });
    }
    const state: DbUserRitual = {
      id: this.nextId("ur"),
      user_id: row.user_id,
      ritual_id: row.ritual_id,
      last_sent_at: null,
      last_attempt_at: null,
      timezone_offset_hours: row.timezone_offset_hours,
      is_enabled: row.is_enabled ?? true,
      total_sent: 0,
      total_responses: 0,
      total_completed: 0,
      total_skipped: 0,
      total_missed: 0,
      last_missed_at: null,
      version: 0,
      created_at: new Date().toISOString()
    };
    this.userRituals.push(state);
    return { ...state };
  }

  async updateUserRitual(id: string, patch: UserRitualPatch, expectedVersion: number): Promise<DbUserRitual | null> {
    this.check("updateUserRitual");
    this.beforeUserRitualUpdate?.(id);
    const idx = this.userRituals.findIndex((s) => s.id === id);
    const current = this.userRituals[idx];
    if (idx < 0 || !current || current.version !== expectedVersion) return null;
    const next = { ...current, ...patch, version: expectedVersion + 1 };
    if (next.total_responses + next.total_missed > next.total_sent || next.total_completed + next.total_skipped > next.total_responses) {
      throw new StoreError("updateUserRitual", { message: "violates check constraint user_rituals_counters" });
    }
    this.userRituals[idx] = next;
    return { ...next };
  }

  async insertRitualResponse(row: NewRitualResponse): Promise<DbRitualResponse> {
    this.check("insertRitualResponse");
    const saved: DbRitualResponse = { ...row, id: this.nextId("resp") };
    this.responses.push(saved);
    return { ...saved };
  }

  async listRitualResponses(filter: RitualResponseFilter): Promise<DbRitualResponse[]> {
    this.check("listRitualResponses");
    const rows = this.responses
      .filter((r) => (!filter.userRitualId || r.user_ritual_id === filter.userRitualId) && (!filter.ritualId || r.ritual_id === filter.ritualId))
      .sort((a, b) => Date.parse(b.responded_at) - Date.parse(a.responded_at))
      .map((r) => ({ ...r }));
    return filter.limit ? rows.slice(0, filter.limit) : rows;
  }

  async insertChatActivity(row: NewChatActivity): Promise<DbChatActivity> {
    this.check("insertChatActivity");
    const saved: DbChatActivity = { ...row, id: this.nextId("act"), created_at: new Date().toISOString() };
    this.chatActivities.push(saved);
    return { ...saved };
  }

  async listChatActivities(range: { fromDate: string; toDate: string }): Promise<DbChatActivity[]> {
    this.check("listChatActivities");
    return this.chatActivities.filter((a) => a.activity_date >= range.fromDate && a.activity_date <= range.toDate);
  }

  async upsertUserActivity(row: UserActivityUpsert): Promise<DbUserActivity> {
    this.check("upsertUserActivity");
    const idx = this.userActivities.findIndex(
      (a) => a.user_id === row.user_id && a.period_type === row.period_type && a.period_date === row.period_date
    );
    const existing = this.userActivities[idx];
    const saved: DbUserActivity = { ...row, id: existing ? existing.id : this.nextId("ua"), updated_at: new Date().toISOString() };
    if (existing) this.userActivities[idx] = saved;
    else this.userActivities.push(saved);
    return { ...saved };
  }

  async listUserActivities(filter: { periodType: ActivityPeriod; fromDate: string; toDate: string }): Promise<DbUserActivity[]> {
    this.check("listUserActivities");
    return this.userActivities.filter(
      (a) => a.period_type === filter.periodType && a.period_date >= filter.fromDate && a.period_date <= filter.toDate
    );
  }

  async getWeeklyReport(weekStart: string): Promise<DbWeeklyReport | null> {
    this.check("getWeeklyReport");
    return this.weeklyReports.find((r) => r.week_start === weekStart) ?? null;
  }

  async insertWeeklyReport(row: NewWeeklyReport): Promise<DbWeeklyReport> {
    this.check("insertWeeklyReport");
    if (this.weeklyReports.some((r) => r.week_start === row.week_start)) {
      throw new StoreError("insertWeeklyReport", { message: "duplicate week_start" });
    }
    const saved: DbWeeklyReport = {
      ...row,
      id: this.nextId("report"),
      is_published: false,
      published_at: null,
      created_at: new Date().toISOString()
    };
    this.weeklyReports.push(saved);
    return { ...saved };
  }

  async listUnpublishedWeeklyReports(sinceWeekStart: string): Promise<DbWeeklyReport[]> {
    this.check("listUnpublishedWeeklyReports");
    return this.weeklyReports
      .filter((r) => !r.is_published && r.week_start >= sinceWeekStart)
      .sort((a, b) => b.week_start.localeCompare(a.week_start));
  }

  async markWeeklyReportPublished(id: string, publishedAt: string): Promise<void> {
    this.check("markWeeklyReportPublished");
    const report = this.weeklyReports.find((r) => r.id === id);
    if (report) {
      report.is_published = true;
      report.published_at = publishedAt;
    }
  }

  async insertPayment(row: NewPayment): Promise<DbPayment> {
    this.check("insertPayment");
    const saved: DbPayment = { ...row, id: this.nextId("pay"), created_at: new Date().toISOString() };
    this.payments.push(saved);
    return { ...saved };
  }
}

export type SentMessage = { userId: number; text: string; buttons: MessageButton[] | null; options?: SendOptions };

// Records every call; delivery fails for user ids in `unreachable` and group calls follow the flags below.
export class FakeMessenger implements Messenger {
  sent: SentMessage[] = [];
  groupPosts: string[] = [];
  removed: number[] = [];
  restored: number[] = [];
  unreachable = new Set<number>();
  channelMembers = new Set<number>();
  // user id -> membership answer; missing means member
  groupMembership = new Map<number, boolean | null>();
  removeSucceeds = true;
  restoreSucceeds = true;
  groupPostSucceeds = true;

  async sendMessage(userId: number, text: string, options?: SendOptions): Promise<boolean> {
    if (this.unreachable.has(userId)) return false;
    this.sent.push({ userId, text, buttons: null, options });
    return true;
  }

  async sendWithButtons(userId: number, text: string, buttons: MessageButton[], options?: SendOptions): Promise<boolean> {
    if (this.unreachable.has(userId)) return false;
    this.sent.push({ userId, text, buttons, options });
    return true;
  }

  async checkChannelMembership(userId: number): Promise<boolean> {
    return this.channelMembers.has(userId);
  }

  async isGroupMember(_groupId: number, userId: number): Promise<boolean | null> {
    const known = this.groupMembership.get(userId);
    return known === undefined ? true : known;
  }

  async removeFromGroup(_groupId: number, userId: number): Promise<boolean> {
    if (!this.removeSucceeds) return false;
    this.removed.push(userId);
    return true;
  }

  async restoreToGroup(_groupId: number, userId: number): Promise<boolean> {
    if (!this.restoreSucceeds) return false;
    this.restored.push(userId);
    return true;
  }

  async sendToGroup(_groupId: number, text: string): Promise<boolean> {
    if (!this.groupPostSucceeds) return false;
    this.groupPosts.push(text);
    return true;
  }
}

export function ritualFixture(overrides: Partial<NewRitual> = {}): NewRitual {
  return {
    name: "Утро",
    kind: "MORNING",
    cadence: "DAILY",
    send_hour: 6,
    send_minute: 30,
    weekday: null,
    message_title: "Доброе утро!",
    message_text: "Как проснулся?",
    buttons: [
      { label: "Готов", token: "ready", outcome: "COMPLETED" },
      { label: "Сонный", token: "sleepy", outcome: "SKIPPED" }
    ],
    is_active: true,
    requires_subscription: true,
    sort_order: 10,
    ...overrides
  };
}

export async function seedActiveUser(
  store: MemoryStore,
  telegramUserId: number,
  overrides: Partial<NewUser> = {}
): Promise<DbUser> {
  return store.insertUser({
    telegram_user_id: telegramUserId,
    username: `user${telegramUserId}`,
    first_name: null,
    status: "active",
    subscription_until: "2030-01-01T00:00:00.000Z",
    is_in_group: true,
    ...overrides
  });
}
