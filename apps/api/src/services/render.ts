import { encodeRitualCallback } from "@ritualclub/shared";
import type { DbRitual, MessageButton, WeeklyReportEntry } from "@ritualclub/shared";
import { DAY_MS, fmtDateRu } from "../utils/time.js";

export type RenderedMessage = {
  text: string;
  buttons: MessageButton[];
};

export function escapeHtml(s: string): string {
  return s
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

export function renderRitualMessage(ritual: DbRitual, userRitualId: string): RenderedMessage {
  const title = escapeHtml(ritual.message_title.trim());
  const body = escapeHtml(ritual.message_text.trim());
  return {
    text: body ? `<b>${title}</b>\n\n${body}` : `<b>${title}</b>`,
    buttons: ritual.buttons.map((b) => ({ label: b.label, token: encodeRitualCallback(userRitualId, b.token) }))
  };
}

export function renderPaymentWarning(graceMinutes: number): RenderedMessage {
  return {
    text:
      "⚠️ <b>Подписка не активна</b>\n\n" +
      `Через ${graceMinutes} минут я удалю тебя из группы клуба.\n` +
      "Чтобы остаться, продли участие: /pay",
    buttons: []
  };
}

export function renderRemovalNotice(): RenderedMessage {
  return {
    text:
      "Доступ к группе закрыт ⛔️\n\n" +
      "Подписка так и не продлилась, поэтому я убрал тебя из чата.\n" +
      "После оплаты верну автоматически.",
    buttons: []
  };
}

function pluralDays(n: number): string {
  const mod10 = n % 10;
  const mod100 = n % 100;
  if (mod10 === 1 && mod100 !== 11) return "день";
  if (mod10 >= 2 && mod10 <= 4 && (mod100 < 12 || mod100 > 14)) return "дня";
  return "дней";
}

export function renderRenewalReminder(until: Date, now: Date, offsetHours: number): RenderedMessage {
  const daysLeft = Math.max(0, Math.ceil((until.getTime() - now.getTime()) / DAY_MS));
  const when = daysLeft <= 1 ? "завтра" : `через ${daysLeft} ${pluralDays(daysLeft)}`;
  return {
    text:
      `Напоминание: подписка заканчивается ${when}, ${fmtDateRu(until, offsetHours)}.\n\n` +
      "Чтобы не потерять доступ к группе и ритуалам, продли участие: /pay",
    buttons: []
  };
}

function fmtDayMonth(isoDate: string): string {
  const [, m, d] = isoDate.split("-");
  return `${d}.${m}`;
}

export function renderWeeklyReport(params: {
  weekStart: string;
  weekEnd: string;
  top: WeeklyReportEntry[];
  connecting: WeeklyReportEntry[];
  totalParticipants: number;
  activeParticipants: number;
}): string {
  const { weekStart, weekEnd, top, connecting } = params;
  const lines: string[] = [];
  lines.push("📊 <b>Итоги недели</b>");
  lines.push(`📅 ${fmtDayMonth(weekStart)} – ${fmtDayMonth(weekEnd)}.${weekEnd.slice(0, 4)}`);
  lines.push("");
  if (top.length > 0) {
    lines.push("🔥 <b>Самые включённые:</b>");
    top.forEach((u, i) => lines.push(`${i + 1}. ${escapeHtml(u.display_name)} (${u.total_messages} сообщ.)`));
    lines.push("");
  }
  if (connecting.length > 0) {
    lines.push("💪 <b>Подключаемся:</b>");
    for (const u of connecting) lines.push(`• ${escapeHtml(u.display_name)}`);
    lines.push("");
  }
  lines.push(`Писали в чат: ${params.activeParticipants} из ${params.totalParticipants}`);
  return lines.join("\n");
}
