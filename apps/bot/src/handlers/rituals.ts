import { InlineKeyboard, type Bot } from "grammy";
import { z } from "zod";
import type { OutcomeKind } from "@ritualclub/shared";
import { apiErrorMessage, postJson, readJson, type ApiClient } from "../apiClient.js";
import { logger } from "../logger.js";

const outcomeSchema = z.enum(["COMPLETED", "PARTIAL", "SKIPPED"]);
const respondBody = z.object({ ok: z.literal(true), outcome: outcomeSchema });
const errorCode = z.object({ ok: z.literal(false), error: z.string() });

export const ritualOverviewSchema = z.object({
  ritual_id: z.string(),
  name: z.string(),
  send_time: z.string(),
  active: z.boolean(),
  enabled: z.boolean(),
  total_sent: z.number(),
  total_responses: z.number(),
  total_completed: z.number()
});
export type RitualOverview = z.infer<typeof ritualOverviewSchema>;

const TOGGLE_PATTERN = /^tog:([^:]+):([01])$/;

export function outcomeReply(outcome: OutcomeKind): string {
  if (outcome === "COMPLETED") return "Отмечено ✅";
  if (outcome === "PARTIAL") return "Засчитано частично 👌";
  return "Ок, в следующий раз 🙌";
}

export function buildRitualsKeyboard(rituals: RitualOverview[]): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const r of rituals) {
    if (!r.active) continue;
    const mark = r.enabled ? "✅" : "⏸";
    kb.text(`${mark} ${r.name} (${r.send_time})`, `tog:${r.ritual_id}:${r.enabled ? 0 : 1}`).row();
  }
  return kb;
}

export function registerRitualHandlers(params: { bot: Bot; api: ApiClient }) {
  const { bot, api } = params;

  bot.callbackQuery(/^rit:/, async (ctx) => {
    const r = await postJson(api, "/bot/ritual/respond", {
      telegram_user_id: ctx.from.id,
      callback_data: ctx.callbackQuery.data
    });
    const body = readJson(r, respondBody);
    if (body) {
      await ctx.answerCallbackQuery({ text: outcomeReply(body.outcome) });
      await ctx.editMessageReplyMarkup().catch((e: unknown) => logger.warn({ err: e }, "keyboard removal failed"));
      return;
    }
    const code = readJson(r, errorCode)?.error;
    if (code === "already_answered") return ctx.answerCallbackQuery({ text: "Уже отмечено" });
    if (code === "prompt_expired") {
      await ctx.editMessageReplyMarkup().catch((e: unknown) => logger.warn({ err: e }, "keyboard removal failed"));
      return ctx.answerCallbackQuery({ text: "Время ответа вышло, жди следующий ритуал" });
    }
    logger.warn({ telegram_user_id: ctx.from.id, status: r.status, body: r.text }, "ritual respond failed");
    return ctx.answerCallbackQuery({ text: apiErrorMessage(r, "Не удалось отметить") });
  });

  bot.callbackQuery(TOGGLE_PATTERN, async (ctx) => {
    const m = TOGGLE_PATTERN.exec(ctx.callbackQuery.data);
    if (!m) return ctx.answerCallbackQuery();
    const enabled = m[2] === "1";
    const r = await postJson(api, "/bot/rituals/toggle", {
      telegram_user_id: ctx.from.id,
      ritual_id: m[1],
      enabled
    });
    if (!r.ok) return ctx.answerCallbackQuery({ text: apiErrorMessage(r, "Не удалось переключить") });
    await ctx.answerCallbackQuery({ text: enabled ? "Включено" : "Выключено" });
    const rituals = await fetchRituals(api, ctx.from.id);
    if (rituals) {
      await ctx
        .editMessageReplyMarkup({ reply_markup: buildRitualsKeyboard(rituals) })
        .catch((e: unknown) => logger.warn({ err: e }, "keyboard refresh failed"));
    }
  });

  bot.command("rituals", async (ctx) => {
    if (!ctx.from) return;
    const rituals = await fetchRituals(api, ctx.from.id);
    if (!rituals) return ctx.reply("Пока не вижу твоего профиля. Напиши /start");
    if (!rituals.length) return ctx.reply("Ритуалов пока нет.");
    return ctx.reply("Твои ритуалы (нажми, чтобы включить или выключить):", {
      reply_markup: buildRitualsKeyboard(rituals)
    });
  });

  // DM flow: free text answers the latest open ritual.
  bot.chatType("private").on("message:text", async (ctx) => {
    const text = ctx.message.text.trim();
    if (!text || text.startsWith("/")) return;
    const r = await postJson(api, "/bot/ritual/text", { telegram_user_id: ctx.from.id, text });
    if (readJson(r, respondBody)) return ctx.reply("Записал ✍️");
    if (readJson(r, errorCode)?.error === "no_pending_ritual") {
      return ctx.reply("Сейчас нет открытого ритуала. Ответь кнопкой под следующим сообщением или посмотри /rituals");
    }
    logger.warn({ telegram_user_id: ctx.from.id, status: r.status, body: r.text }, "ritual text failed");
    return ctx.reply(apiErrorMessage(r, "Ошибка API /ritual/text"));
  });
}

const meBody = z.object({
  ok: z.literal(true),
  user: z.object({ status: z.string(), timezone_offset_hours: z.number(), subscription_until: z.string().nullable() }).nullable(),
  rituals: z.array(ritualOverviewSchema).optional(),
  weekly_goal: z.object({ text: z.string(), week_start: z.string() }).nullish()
});

export async function fetchMe(api: ApiClient, telegramUserId: number) {
  const r = await api(`/bot/me/${telegramUserId}`, { method: "GET" });
  if (!r.ok) {
    logger.warn({ telegram_user_id: telegramUserId, status: r.status }, "me request failed");
    return null;
  }
  return readJson(r, meBody);
}

async function fetchRituals(api: ApiClient, telegramUserId: number): Promise<RitualOverview[] | null> {
  const me = await fetchMe(api, telegramUserId);
  if (!me?.user) return null;
  return me.rituals ?? [];
}
