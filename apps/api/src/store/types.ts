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
  RitualKind,
  UserStatus
} from "@ritualclub/shared";

export type NewUser = Pick<DbUser, "telegram_user_id" | "username" | "first_name"> &
  Partial<Omit<DbUser, "id" | "created_at" | "telegram_user_id" | "username" | "first_name">>;
export type UserPatch = Partial<Omit<DbUser, "id" | "created_at" | "telegram_user_id">>;
export type UserFilter = {
  statuses?: UserStatus[];
  inGroup?: boolean;
  // subscription_until strictly before this instant (expired or expiring)
  subscriptionEndsBefore?: string;
};

export type NewRitual = Omit<DbRitual, "id" | "created_at">;
export type RitualPatch = Partial<NewRitual>;
export type RitualFilter = { kind?: RitualKind; activeOnly?: boolean };

export type NewUserRitual = Pick<DbUserRitual, "user_id" | "ritual_id" | "timezone_offset_hours"> & { is_enabled?: boolean };
export type UserRitualPatch = Partial<
  Pick<
    DbUserRitual,
    | "last_sent_at"
    | "last_attempt_at"
    | "timezone_offset_hours"
    | "is_enabled"
    | "total_sent"
    | "total_responses"
    | "total_completed"
    | "total_skipped"
    | "total_missed"
    | "last_missed_at"
  >
>;
// sentBefore: last_sent_at strictly before this instant
export type UserRitualFilter = { userId?: string; ritualId?: string; sentBefore?: string };
export type RitualResponseFilter = { userRitualId?: string; ritualId?: string; limit?: number };
export type DispatchCandidate = { state: DbUserRitual; user: DbUser };

export type NewRitualResponse = Omit<DbRitualResponse, "id">;
export type NewChatActivity = Omit<DbChatActivity, "id" | "created_at">;
export type UserActivityUpsert = Omit<DbUserActivity, "id" | "updated_at">;
export type NewWeeklyReport = Omit<DbWeeklyReport, "id" | "created_at" | "is_published" | "published_at">;
export type NewPayment = Omit<DbPayment, "id" | "created_at">;

// Persistence boundary. Methods throw StoreError when the backend is unavailable.
export interface Store {
  getUser(id: string): Promise<DbUser | null>;
  getUserByTelegramId(telegramUserId: number): Promise<DbUser | null>;
  listUsers(filter?: UserFilter): Promise<DbUser[]>;
  listUsersByIds(ids: string[]): Promise<DbUser[]>;
  insertUser(user: NewUser): Promise<DbUser>;
  updateUser(id: string, patch: UserPatch): Promise<DbUser>;

  listRituals(filter?: RitualFilter): Promise<DbRitual[]>;
  getRitual(id: string): Promise<DbRitual | null>;
  findRitual(kind: RitualKind, title: string): Promise<DbRitual | null>;
  insertRitual(ritual: NewRitual): Promise<DbRitual>;
  updateRitual(id: string, patch: RitualPatch): Promise<DbRitual>;

  // Enabled states of active users; when subscriptionActiveAt is set, only users subscribed past that instant.
  listDispatchCandidates(ritualId: string, opts: { subscriptionActiveAt: string | null }): Promise<DispatchCandidate[]>;
  getUserRitual(id: string): Promise<DbUserRitual | null>;
  findUserRitual(userId: string, ritualId: string): Promise<DbUserRitual | null>;
  listUserRituals(filter: UserRitualFilter): Promise<DbUserRitual[]>;
  insertUserRitual(row: NewUserRitual): Promise<DbUserRitual>;
  // Compare-and-swap on `version`; null when another writer got there first.
  updateUserRitual(id: string, patch: UserRitualPatch, expectedVersion: number): Promise<DbUserRitual | null>;

  insertRitualResponse(row: NewRitualResponse): Promise<DbRitualResponse>;
  // Newest first.
  listRitualResponses(filter: RitualResponseFilter): Promise<DbRitualResponse[]>;

  insertChatActivity(row: NewChatActivity): Promise<DbChatActivity>;
  // Inclusive on both ends (activity_date).
  listChatActivities(range: { fromDate: string; toDate: string }): Promise<DbChatActivity[]>;
  upsertUserActivity(row: UserActivityUpsert): Promise<DbUserActivity>;
  listUserActivities(filter: { periodType: ActivityPeriod; fromDate: string; toDate: string }): Promise<DbUserActivity[]>;

  getWeeklyReport(weekStart: string): Promise<DbWeeklyReport | null>;
  insertWeeklyReport(row: NewWeeklyReport): Promise<DbWeeklyReport>;
  listUnpublishedWeeklyReports(sinceWeekStart: string): Promise<DbWeeklyReport[]>;
  markWeeklyReportPublished(id: string, publishedAt: string): Promise<void>;

  insertPayment(row: NewPayment): Promise<DbPayment>;
}
