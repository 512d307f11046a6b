import { Api, GrammyError, InlineKeyboard } from "grammy";
import type { Logger } from "pino";
import type { MessageButton, Messenger, SendOptions } from "@ritualclub/shared";

export type TelegramMessengerOptions = {
  botToken: string;
  // Channel the user must be subscribed to; null disables the check.
  channelId: number | string | null;
  logger: Logger;
  api?: Api;
};

function describeError(e: unknown): { message: string; error_code?: number } {
  if (e instanceof GrammyError) return { message: e.description, error_code: e.error_code };
  if (e instanceof Error) return { message: e.message };
  return { message: String(e) };
}

export function buildInlineKeyboard(buttons: MessageButton[]): InlineKeyboard {
  const kb = new InlineKeyboard();
  buttons.forEach((b, i) => {
    if (i > 0 && i % 2 === 0) kb.row();
    kb.text(b.label, b.token);
  });
  return kb;
}

export function createTelegramMessenger(opts: TelegramMessengerOptions): Messenger {
  const api = opts.api ?? new Api(opts.botToken);
  const log = opts.logger;

  async function attempt(step: string, ctx: Record<string, unknown>, fn: () => Promise<unknown>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (e) {
      log.warn({ step, ...ctx, ...describeError(e) }, "telegram call failed");
      return false;
    }
  }

  return {
    sendMessage(userId: number, text: string, options?: SendOptions) {
      return attempt("send_message", { telegram_user_id: userId }, () =>
        api.sendMessage(userId, text, { parse_mode: options?.parseMode, link_preview_options: { is_disabled: true } })
      );
    },

    sendWithButtons(userId: number, text: string, buttons: MessageButton[], options?: SendOptions) {
      return attempt("send_with_buttons", { telegram_user_id: userId }, () =>
        api.sendMessage(userId, text, { parse_mode: options?.parseMode, reply_markup: buildInlineKeyboard(buttons) })
      );
    },

    async checkChannelMembership(userId: number) {
      if (opts.channelId === null) return true;
      try {
        const m = await api.getChatMember(opts.channelId, userId);
        if (m.status === "creator" || m.status === "administrator" || m.status === "member") return true;
        if (m.status === "restricted") return m.is_member;
        return false;
      } catch (e) {
        log.warn({ step: "check_channel", telegram_user_id: userId, ...describeError(e) }, "channel membership check failed");
        return false;
      }
    },

    async isGroupMember(groupId: number, userId: number) {
      try {
        const m = await api.getChatMember(groupId, userId);
        if (m.status === "left" || m.status === "kicked") return false;
        if (m.status === "restricted") return m.is_member;
        return true;
      } catch (e) {
        log.warn({ step: "check_group", telegram_user_id: userId, ...describeError(e) }, "group membership check failed");
        return null;
      }
    },

    removeFromGroup(groupId: number, userId: number) {
      // Short ban: the user is removed and can rejoin via invite once it expires or is lifted.
      const untilDate = Math.floor(Date.now() / 1000) + 60;
      return attempt("remove_from_group", { chat_id: groupId, telegram_user_id: userId }, () =>
        api.banChatMember(groupId, userId, { until_date: untilDate })
      );
    },

    restoreToGroup(groupId: number, userId: number) {
      return attempt("restore_to_group", { chat_id: groupId, telegram_user_id: userId }, () =>
        api.unbanChatMember(groupId, userId, { only_if_banned: true })
      );
    },

    sendToGroup(groupId: number, text: string, options?: SendOptions) {
      return attempt("send_to_group", { chat_id: groupId }, () =>
        api.sendMessage(groupId, text, { parse_mode: options?.parseMode, link_preview_options: { is_disabled: true } })
      );
    }
  };
}
