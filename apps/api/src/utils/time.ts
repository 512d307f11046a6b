// All offsets are whole hours east of UTC. Local parts are read by shifting the instant and using getUTC*.

export const MINUTE_MS = 60000;
export const HOUR_MS = 3600000;
export const DAY_MS = 86400000;

export type LocalParts = {
  year: number;
  month: number; // 1..12
  day: number;
  hour: number;
  minute: number;
  weekday: number; // 0 = Monday .. 6 = Sunday
};

export type ClockSchedule = {
  hour: number;
  minute: number;
  // 0 = Monday .. 6 = Sunday
  weekday?: number | null;
  monthDay?: number | null;
};

export function getLocalParts(date: Date, offsetHours: number): LocalParts {
  const d = new Date(date.getTime() + offsetHours * HOUR_MS);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    weekday: (d.getUTCDay() + 6) % 7
  };
}

export function fmtIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function localDate(date: Date, offsetHours: number): string {
  const p = getLocalParts(date, offsetHours);
  return fmtIsoDate(p.year, p.month, p.day);
}

// UTC instant of local midnight starting the day that contains `date`.
export function localDayStart(date: Date, offsetHours: number): Date {
  const p = getLocalParts(date, offsetHours);
  return new Date(Date.UTC(p.year, p.month - 1, p.day) - offsetHours * HOUR_MS);
}

// Most recent instant <= now at which the schedule fired, in the given offset.
export function lastOccurrenceAt(schedule: ClockSchedule, offsetHours: number, now: Date): Date {
  const shift = offsetHours * HOUR_MS;
  const localNowMs = now.getTime() + shift;
  const p = getLocalParts(now, offsetHours);
  let atMs: number;
  if (schedule.monthDay !== null && schedule.monthDay !== undefined) {
    atMs = Date.UTC(p.year, p.month - 1, schedule.monthDay, schedule.hour, schedule.minute);
    if (atMs > localNowMs) atMs = Date.UTC(p.year, p.month - 2, schedule.monthDay, schedule.hour, schedule.minute);
  } else if (schedule.weekday !== null && schedule.weekday !== undefined) {
    const back = (p.weekday - schedule.weekday + 7) % 7;
    atMs = Date.UTC(p.year, p.month - 1, p.day - back, schedule.hour, schedule.minute);
    if (atMs > localNowMs) atMs -= 7 * DAY_MS;
  } else {
    atMs = Date.UTC(p.year, p.month - 1, p.day, schedule.hour, schedule.minute);
    if (atMs > localNowMs) atMs -= DAY_MS;
  }
  return new Date(atMs - shift);
}

export function parseIsoDate(s: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return null;
  const d = new Date(`${s}T00:00:00.000Z`);
  if (!Number.isFinite(d.getTime()) || d.toISOString().slice(0, 10) !== s) return null;
  return d;
}

export function addDays(isoDate: string, days: number): string {
  const d = parseIsoDate(isoDate);
  if (!d) throw new Error(`Invalid date: ${isoDate}`);
  return new Date(d.getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

export function weekdayOf(isoDate: string): number {
  const d = parseIsoDate(isoDate);
  if (!d) throw new Error(`Invalid date: ${isoDate}`);
  return (d.getUTCDay() + 6) % 7;
}

// Monday of the week containing the date.
export function weekStartOf(isoDate: string): string {
  return addDays(isoDate, -weekdayOf(isoDate));
}

export function parseTimeHHMM(input: string): { hour: number; minute: number } | null {
  // Accept "H:MM", "HH:MM", and Postgres time strings like "HH:MM:SS"
  const m = input.trim().match(/^(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/);
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const sec = m[3] !== undefined ? Number(m[3]) : 0;
  if (hour < 0 || hour > 23) return null;
  if (minute < 0 || minute > 59) return null;
  if (sec < 0 || sec > 59) return null;
  return { hour, minute };
}

export function fmtHHMM(hour: number, minute: number): string {
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

export function fmtDateRu(date: Date, offsetHours = 0): string {
  const p = getLocalParts(date, offsetHours);
  const months = [
    "января",
    "февраля",
    "марта",
    "апреля",
    "мая",
    "июня",
    "июля",
    "августа",
    "сентября",
    "октября",
    "ноября",
    "декабря"
  ];
  return `${p.day} ${months[p.month - 1] || ""} ${p.year} года`;
}
