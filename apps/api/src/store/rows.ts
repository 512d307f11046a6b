import { z } from "zod";
import type {
  DbChatActivity,
  DbPayment,
  DbRitual,
  DbRitualResponse,
  DbUser,
  DbUserActivity,
  DbUserRitual,
  DbWeeklyReport
} from "@ritualclub/shared";

// Row validation for data coming back from PostgREST.

const ts = z.string();
const outcome = z.enum(["COMPLETED", "SKIPPED", "PARTIAL"]);

export const userObject = z.object({
  id: z.string(),
  telegram_user_id: z.number(),
  username: z.string().nullable(),
  first_name: z.string().nullable(),
  status: z.enum(["pending", "active", "banned"]),
  is_premium: z.boolean(),
  subscription_until: ts.nullable(),
  is_in_group: z.boolean(),
  joined_group_at: ts.nullable(),
  timezone_offset_hours: z.number().int(),
  payment_warning_sent_at: ts.nullable(),
  kicked_at: ts.nullable(),
  renewal_reminder_sent_at: ts.nullable(),
  created_at: ts
});

export const ritualButtonSchema = z.object({
  label: z.string().min(1).max(64),
  token: z.string().regex(/^[a-z0-9_]{1,20}$/),
  outcome
});

export const ritualObject = z.object({
  id: z.string(),
  name: z.string(),
  kind: z.enum(["MORNING", "EVENING", "WEEKLY_CHALLENGE", "WEEKLY_GOALS", "FRIDAY_CYCLE"]),
  cadence: z.enum(["DAILY", "WEEKLY", "MONTHLY"]),
  send_hour: z.number().int(),
  send_minute: z.number().int(),
  weekday: z.number().int().nullable(),
  message_title: z.string(),
  message_text: z.string(),
  buttons: z.array(ritualButtonSchema),
  is_active: z.boolean(),
  requires_subscription: z.boolean(),
  sort_order: z.number().int(),
  created_at: ts
});

export const userRitualObject = z.object({
  id: z.string(),
  user_id: z.string(),
  ritual_id: z.string(),
  last_sent_at: ts.nullable(),
  last_attempt_at: ts.nullable(),
  timezone_offset_hours: z.number().int(),
  is_enabled: z.boolean(),
  total_sent: z.number().int(),
  total_responses: z.number().int(),
  total_completed: z.number().int(),
  total_skipped: z.number().int(),
  total_missed: z.number().int(),
  last_missed_at: ts.nullable(),
  version: z.number().int(),
  created_at: ts
});

const reportEntry = z.object({
  user_id: z.string(),
  display_name: z.string(),
  activity_score: z.number(),
  total_messages: z.number()
});

export const userRow: z.ZodType<DbUser> = userObject;
export const ritualRow: z.ZodType<DbRitual> = ritualObject;
export const userRitualRow: z.ZodType<DbUserRitual> = userRitualObject;

export const dispatchCandidateRow = userRitualObject.extend({ users: userObject });

export const ritualResponseRow: z.ZodType<DbRitualResponse> = z.object({
  id: z.string(),
  user_ritual_id: z.string(),
  ritual_id: z.string(),
  outcome,
  response_text: z.string().nullable(),
  token: z.string().nullable(),
  sent_at: ts.nullable(),
  responded_at: ts
});

export const chatActivityRow: z.ZodType<DbChatActivity> = z.object({
  id: z.string(),
  user_id: z.string(),
  chat_id: z.number(),
  message_id: z.number(),
  activity_type: z.enum(["message", "photo", "video", "voice", "document", "sticker", "poll", "other"]),
  message_length: z.number().int(),
  activity_date: z.string(),
  activity_hour: z.number().int(),
  is_reply: z.boolean(),
  is_forward: z.boolean(),
  created_at: ts
});

export const userActivityRow: z.ZodType<DbUserActivity> = z.object({
  id: z.string(),
  user_id: z.string(),
  period_type: z.enum(["DAILY", "WEEKLY"]),
  period_date: z.string(),
  total_messages: z.number().int(),
  text_messages: z.number().int(),
  media_messages: z.number().int(),
  total_characters: z.number().int(),
  average_message_length: z.number(),
  replies_sent: z.number().int(),
  forwards_sent: z.number().int(),
  most_active_hour: z.number().int().nullable(),
  counts_by_type: z.record(z.number()),
  activity_score: z.number(),
  period_rank: z.number().int().nullable(),
  updated_at: ts
});

export const weeklyReportRow: z.ZodType<DbWeeklyReport> = z.object({
  id: z.string(),
  week_start: z.string(),
  week_end: z.string(),
  top_users: z.array(reportEntry),
  connecting_users: z.array(reportEntry),
  total_participants: z.number().int(),
  active_participants: z.number().int(),
  activity_percentage: z.number(),
  report_message: z.string(),
  is_published: z.boolean(),
  published_at: ts.nullable(),
  created_at: ts
});

export const paymentRow: z.ZodType<DbPayment> = z.object({
  id: z.string(),
  user_id: z.string(),
  provider: z.enum(["telegram", "manual"]),
  amount: z.number(),
  currency: z.string(),
  status: z.enum(["pending", "paid", "refunded", "failed"]),
  subscription_end: ts.nullable(),
  created_at: ts
});
