import type { Bot } from "grammy";
import type { Message } from "grammy/types";
import type { ActivityType } from "@ritualclub/shared";
import { postJson, type ApiClient } from "../apiClient.js";
import { logger } from "../logger.js";

export type ActivitySource = Pick<
  Message,
  | "text"
  | "caption"
  | "photo"
  | "video"
  | "video_note"
  | "voice"
  | "audio"
  | "document"
  | "sticker"
  | "poll"
  | "reply_to_message"
  | "forward_origin"
  | "new_chat_members"
  | "left_chat_member"
  | "pinned_message"
>;

export type DetectedActivity = {
  activity_type: ActivityType;
  message_length: number;
  is_reply: boolean;
  is_forward: boolean;
};

// Classifies a group message for activity tracking; service messages and commands are not activity.
export function detectActivity(msg: ActivitySource): DetectedActivity | null {
  if (msg.new_chat_members || msg.left_chat_member || msg.pinned_message) return null;
  if (msg.text?.trimStart().startsWith("/")) return null;
  let activity_type: ActivityType = "other";
  if (msg.photo) activity_type = "photo";
  else if (msg.video || msg.video_note) activity_type = "video";
  else if (msg.voice || msg.audio) activity_type = "voice";
  else if (msg.document) activity_type = "document";
  else if (msg.sticker) activity_type = "sticker";
  else if (msg.poll) activity_type = "poll";
  else if (msg.text !== undefined) activity_type = "message";
  return {
    activity_type,
    message_length: (msg.text ?? msg.caption ?? "").length,
    is_reply: Boolean(msg.reply_to_message),
    is_forward: Boolean(msg.forward_origin)
  };
}

export function registerGroupHandlers(params: { bot: Bot; api: ApiClient }) {
  const { bot, api } = params;
  const group = bot.chatType(["group", "supergroup"]);

  bot.command("chatid", async (ctx) => {
    return ctx.reply(`chat_id: ${ctx.chat.id}`);
  });

  group.on("message:new_chat_members", async (ctx) => {
    for (const m of ctx.message.new_chat_members) {
      if (m.is_bot) continue;
      const r = await postJson(api, "/bot/group/joined", {
        telegram_user_id: m.id,
        username: m.username ?? null,
        first_name: m.first_name
      });
      if (!r.ok) logger.warn({ telegram_user_id: m.id, status: r.status }, "group join not recorded");
    }
  });

  group.on("message:left_chat_member", async (ctx) => {
    const m = ctx.message.left_chat_member;
    if (m.is_bot) return;
    const r = await postJson(api, "/bot/group/left", { telegram_user_id: m.id });
    if (!r.ok) logger.warn({ telegram_user_id: m.id, status: r.status }, "group leave not recorded");
  });

  // Group flow: bot stays silent, only counts activity.
  group.on("message", async (ctx, next) => {
    const from = ctx.from;
    const activity = detectActivity(ctx.message);
    if (!from || from.is_bot || !activity) return next();
    const r = await postJson(api, "/bot/activity", {
      telegram_user_id: from.id,
      username: from.username ?? null,
      first_name: from.first_name,
      chat_id: ctx.chat.id,
      message_id: ctx.message.message_id,
      ...activity
    });
    if (!r.ok) logger.warn({ telegram_user_id: from.id, status: r.status }, "activity not recorded");
    return next();
  });
}
