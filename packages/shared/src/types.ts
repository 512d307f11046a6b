// Shared domain types. Row shapes mirror the tables in apps/api/sql/schema.sql.

export type UserStatus = "pending" | "active" | "banned";
export type RitualKind = "MORNING" | "EVENING" | "WEEKLY_CHALLENGE" | "WEEKLY_GOALS" | "FRIDAY_CYCLE";
export type RitualCadence = "DAILY" | "WEEKLY" | "MONTHLY";
export type OutcomeKind = "COMPLETED" | "SKIPPED" | "PARTIAL";
export type ActivityType = "message" | "photo" | "video" | "voice" | "document" | "sticker" | "poll" | "other";
export type ActivityPeriod = "DAILY" | "WEEKLY";
export type PaymentProvider = "telegram" | "manual";
export type PaymentStatus = "pending" | "paid" | "refunded" | "failed";

export const RITUAL_KINDS: readonly RitualKind[] = ["MORNING", "EVENING", "WEEKLY_CHALLENGE", "WEEKLY_GOALS", "FRIDAY_CYCLE"];
export const ACTIVITY_TYPES: readonly ActivityType[] = ["message", "photo", "video", "voice", "document", "sticker", "poll", "other"];

export interface DbUser {
  id: string;
  telegram_user_id: number;
  username: string | null;
  first_name: string | null;
  status: UserStatus;
  is_premium: boolean;
  subscription_until: string | null;
  is_in_group: boolean;
  joined_group_at: string | null;
  timezone_offset_hours: number;
  payment_warning_sent_at: string | null;
  kicked_at: string | null;
  renewal_reminder_sent_at: string | null;
  created_at: string;
}

export interface RitualButton {
  label: string;
  token: string;
  outcome: OutcomeKind;
}

export interface DbRitual {
  id: string;
  name: string;
  kind: RitualKind;
  cadence: RitualCadence;
  send_hour: number;
  send_minute: number;
  // 0 = Monday .. 6 = Sunday; set only for WEEKLY
  weekday: number | null;
  message_title: string;
  message_text: string;
  buttons: RitualButton[];
  is_active: boolean;
  requires_subscription: boolean;
  sort_order: number;
  created_at: string;
}

export interface DbUserRitual {
  id: string;
  user_id: string;
  ritual_id: string;
  last_sent_at: string | null;
  // last failed delivery; a pair is attempted at most once per period
  last_attempt_at: string | null;
  timezone_offset_hours: number;
  is_enabled: boolean;
  total_sent: number;
  total_responses: number;
  total_completed: number;
  total_skipped: number;
  // prompts closed without an answer
  total_missed: number;
  last_missed_at: string | null;
  version: number;
  created_at: string;
}

export interface DbRitualResponse {
  id: string;
  user_ritual_id: string;
  ritual_id: string;
  outcome: OutcomeKind;
  response_text: string | null;
  token: string | null;
  sent_at: string | null;
  responded_at: string;
}

export interface DbChatActivity {
  id: string;
  user_id: string;
  chat_id: number;
  message_id: number;
  activity_type: ActivityType;
  message_length: number;
  activity_date: string;
  activity_hour: number;
  is_reply: boolean;
  is_forward: boolean;
  created_at: string;
}

export interface DbUserActivity {
  id: string;
  user_id: string;
  period_type: ActivityPeriod;
  period_date: string;
  total_messages: number;
  text_messages: number;
  media_messages: number;
  total_characters: number;
  average_message_length: number;
  replies_sent: number;
  forwards_sent: number;
  most_active_hour: number | null;
  counts_by_type: Record<string, number>;
  activity_score: number;
  period_rank: number | null;
  updated_at: string;
}

export interface WeeklyReportEntry {
  user_id: string;
  display_name: string;
  activity_score: number;
  total_messages: number;
}

export interface DbWeeklyReport {
  id: string;
  week_start: string;
  week_end: string;
  top_users: WeeklyReportEntry[];
  connecting_users: WeeklyReportEntry[];
  total_participants: number;
  active_participants: number;
  activity_percentage: number;
  report_message: string;
  is_published: boolean;
  published_at: string | null;
  created_at: string;
}

export interface DbPayment {
  id: string;
  user_id: string;
  provider: PaymentProvider;
  amount: number;
  currency: string;
  status: PaymentStatus;
  subscription_end: string | null;
  created_at: string;
}
