import { Bot } from "grammy";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { fmtUtcOffset, parseUtcOffsetHours } from "@ritualclub/shared";
import { apiErrorMessage, createApiClient, postJson, readJson } from "./apiClient.js";
import { registerGroupHandlers } from "./handlers/group.js";
import { fetchMe, registerRitualHandlers } from "./handlers/rituals.js";
import { logger } from "./logger.js";

function loadEnvLocal() {
  // Dotfiles may be blocked in the workspace; env.local is read instead of .env.
  const __filename = fileURLToPath(import.meta.url);
  const envPath = path.resolve(path.dirname(__filename), "..", "env.local");
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

type Env = {
  TELEGRAM_BOT_TOKEN: string;
  API_BASE_URL: string;
};

function env(): Env {
  if (!process.env.TELEGRAM_BOT_TOKEN) throw new Error("Missing env: TELEGRAM_BOT_TOKEN");
  return {
    TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN,
    API_BASE_URL: process.env.API_BASE_URL || "http://localhost:3001"
  };
}

const upsertBody = z.object({ ok: z.literal(true), created: z.boolean(), channel_member: z.boolean() });
const timezoneBody = z.object({ ok: z.literal(true), timezone_offset_hours: z.number() });

const STATUS_LABELS: Record<string, string> = {
  pending: "ожидает оплаты",
  active: "активен",
  banned: "заблокирован"
};

export function createBot(): Bot {
  loadEnvLocal();
  const E = env();
  const bot = new Bot(E.TELEGRAM_BOT_TOKEN);
  const api = createApiClient(E.API_BASE_URL);

  bot.command("start", async (ctx) => {
    const u = ctx.from;
    if (!u) return;
    const r = await postJson(api, "/bot/upsert-user", {
      telegram_user_id: u.id,
      username: u.username ?? null,
      first_name: u.first_name
    });
    const body = readJson(r, upsertBody);
    if (!body) {
      logger.error({ telegram_user_id: u.id, status: r.status, body: r.text }, "upsert-user failed");
      return ctx.reply(apiErrorMessage(r, "Ошибка API /start"));
    }
    const channelHint = body.channel_member ? "" : "\n\nПодпишись на канал клуба, чтобы не пропускать анонсы.";
    await ctx.reply(
      "Привет! Это бот клуба ритуалов.\n\n" +
        "Каждый день я присылаю утренний и вечерний ритуал, а по неделям вызовы и цели. Отвечай кнопками или текстом.\n\n" +
        "Команды:\n/me — профиль\n/rituals — мои ритуалы\n/settz GMT+3 — часовой пояс" +
        channelHint
    );
  });

  bot.command("me", async (ctx) => {
    if (!ctx.from) return;
    const me = await fetchMe(api, ctx.from.id);
    if (!me) return ctx.reply("Ошибка API /me.");
    if (!me.user) return ctx.reply("Пока не вижу твоего профиля. Напиши /start");
    const lines = [
      "Профиль:",
      `- статус: ${STATUS_LABELS[me.user.status] ?? me.user.status}`,
      `- часовой пояс: ${fmtUtcOffset(me.user.timezone_offset_hours)}`,
      `- подписка до: ${me.user.subscription_until ? me.user.subscription_until.slice(0, 10) : "—"}`
    ];
    for (const r of me.rituals ?? []) {
      lines.push(`- ${r.name}: ${r.total_completed}/${r.total_sent}${r.enabled ? "" : " (выкл)"}`);
    }
    if (me.weekly_goal) lines.push(`Цель недели: ${me.weekly_goal.text}`);
    await ctx.reply(lines.join("\n"));
  });

  bot.command("settz", async (ctx) => {
    if (!ctx.from) return;
    const arg = ctx.match.trim();
    if (parseUtcOffsetHours(arg) === null) {
      return ctx.reply("Формат часового пояса: GMT+3 или GMT-5 (целые часы)");
    }
    const r = await postJson(api, "/bot/set-timezone", { telegram_user_id: ctx.from.id, timezone: arg });
    const body = readJson(r, timezoneBody);
    if (!body) return ctx.reply(apiErrorMessage(r, "Ошибка API /settz"));
    await ctx.reply(`Ок, часовой пояс обновлён: ${fmtUtcOffset(body.timezone_offset_hours)}`);
  });

  registerRitualHandlers({ bot, api });
  registerGroupHandlers({ bot, api });

  bot.catch((err) => {
    logger.error({ err: err.error, update_id: err.ctx.update.update_id }, "bot error");
  });

  return bot;
}

export async function startBot(bot: Bot) {
  // Long polling only: drop any webhook and refresh the command list.
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  await bot.api.setMyCommands([
    { command: "start", description: "старт" },
    { command: "me", description: "профиль" },
    { command: "rituals", description: "мои ритуалы" },
    { command: "settz", description: "часовой пояс, например GMT+3" }
  ]);
  logger.info("bot started (long polling)");
  await bot.start();
}
