import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ACTIVITY_TYPES, decodeRitualCallback, parseUtcOffsetHours } from "@ritualclub/shared";
import type { ActivityType, DbUser } from "@ritualclub/shared";
import type { AppContext } from "../context.js";
import { AppError } from "../errors.js";
import { getCurrentWeeklyGoal } from "../services/goals.js";
import { getUserRitualOverview } from "../services/stats.js";
import { upsertTelegramUser } from "../services/users.js";
import { parseWith, telegramUserId } from "./validation.js";

const profileSchema = z.object({
  telegram_user_id: telegramUserId,
  username: z.string().nullish().transform((v) => v ?? null),
  first_name: z.string().nullish().transform((v) => v ?? null)
});

const activityType = z.custom<ActivityType>((v) => typeof v === "string" && (ACTIVITY_TYPES as readonly string[]).includes(v));

// --- Bot-facing endpoints (thin; bot should not touch DB directly) ---
export function registerBotRoutes(app: FastifyInstance, ctx: AppContext) {
  const { store, catalog, responses, enforcement, activity, messenger, settings } = ctx;

  async function requireUser(tgId: number): Promise<DbUser> {
    const user = await store.getUserByTelegramId(tgId);
    if (!user) throw new AppError("user_not_found", "Сначала /start", 404);
    return user;
  }

  app.post("/bot/upsert-user", async (req) => {
    const body = parseWith(profileSchema, req.body);
    const { user, created } = await upsertTelegramUser(store, body, settings.referenceOffsetHours);
    const registered = await catalog.registerUserForAllRituals(user.id, user.timezone_offset_hours);
    const channel_member = await messenger.checkChannelMembership(user.telegram_user_id);
    return { ok: true, user, created, registered: registered.length, channel_member };
  });

  app.post("/bot/set-timezone", async (req) => {
    const body = parseWith(z.object({ telegram_user_id: telegramUserId, timezone: z.string() }), req.body);
    const offset = parseUtcOffsetHours(body.timezone);
    if (offset === null) throw new AppError("invalid_timezone", "Формат: GMT+3 или GMT-5 (целые часы)");
    const user = await requireUser(body.telegram_user_id);
    await catalog.setUserTimezone(user.id, offset);
    return { ok: true, timezone_offset_hours: offset };
  });

  app.get("/bot/me/:telegramUserId", async (req) => {
    const params = parseWith(z.object({ telegramUserId }), req.params);
    const user = await store.getUserByTelegramId(params.telegramUserId);
    if (!user) return { ok: true, user: null };
    const [rituals, weekly_goal] = await Promise.all([getUserRitualOverview(store, user.id), getCurrentWeeklyGoal(store, user, new Date())]);
    return { ok: true, user, rituals, weekly_goal };
  });

  app.post("/bot/ritual/respond", async (req) => {
    const body = parseWith(z.object({ telegram_user_id: telegramUserId, callback_data: z.string() }), req.body);
    const cb = decodeRitualCallback(body.callback_data);
    if (!cb) throw new AppError("invalid_callback", "unrecognized callback data");
    const user = await requireUser(body.telegram_user_id);
    const state = await store.getUserRitual(cb.userRitualId);
    if (!state || state.user_id !== user.id) throw new AppError("user_ritual_not_found", "ritual not found", 404);
    const recorded = await responses.recordResponse({
      userRitualId: state.id,
      ritualId: state.ritual_id,
      token: cb.token,
      respondedAt: new Date()
    });
    return { ok: true, outcome: recorded.outcome, response_id: recorded.response.id };
  });

  app.post("/bot/ritual/text", async (req) => {
    const body = parseWith(z.object({ telegram_user_id: telegramUserId, text: z.string().trim().min(1).max(4000) }), req.body);
    const user = await requireUser(body.telegram_user_id);
    const recorded = await responses.recordFreeText(user.id, body.text, new Date());
    if (!recorded) return { ok: false, error: "no_pending_ritual" };
    return { ok: true, outcome: recorded.outcome, ritual_id: recorded.state.ritual_id };
  });

  app.post("/bot/rituals/toggle", async (req) => {
    const body = parseWith(z.object({ telegram_user_id: telegramUserId, ritual_id: z.string().min(1), enabled: z.boolean() }), req.body);
    const user = await requireUser(body.telegram_user_id);
    const state = await catalog.setUserRitualEnabled(user.id, body.ritual_id, body.enabled);
    return { ok: true, enabled: state.is_enabled };
  });

  app.post("/bot/activity", async (req) => {
    const body = parseWith(
      profileSchema.extend({
        chat_id: z.number().int(),
        message_id: z.number().int(),
        activity_type: activityType,
        message_length: z.number().int().min(0).default(0),
        is_reply: z.boolean().default(false),
        is_forward: z.boolean().default(false)
      }),
      req.body
    );
    const row = await activity.recordActivity(body, new Date());
    return { ok: true, activity_id: row.id };
  });

  app.post("/bot/group/joined", async (req) => {
    const body = parseWith(profileSchema, req.body);
    const { user } = await upsertTelegramUser(store, body, settings.referenceOffsetHours);
    await enforcement.recordGroupJoin(user.telegram_user_id, new Date());
    return { ok: true };
  });

  app.post("/bot/group/left", async (req) => {
    const body = parseWith(z.object({ telegram_user_id: telegramUserId }), req.body);
    const user = await enforcement.recordGroupLeave(body.telegram_user_id);
    return { ok: true, known: user !== null };
  });
}
