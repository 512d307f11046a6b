// UTC offsets are stored as whole hours (e.g. +3 for Moscow). Accepts "GMT+3", "UTC-05", "+3", "3".

export const MIN_OFFSET_HOURS = -12;
export const MAX_OFFSET_HOURS = 14;

export function parseUtcOffsetHours(input: string): number | null {
  let s = input.trim().replace(/\s+/g, "");
  if (!s) return null;
  s = s.replace(/плюс/gi, "+").replace(/минус/gi, "-");
  const m = s.match(/^(?:GMT|UTC)?([+-]?)(\d{1,2})(?::?00)?$/i);
  if (!m) return null;
  const sign = m[1] === "-" ? -1 : 1;
  const hours = sign * Number(m[2]);
  if (!isValidOffsetHours(hours)) return null;
  return hours;
}

export function isValidOffsetHours(hours: number): boolean {
  return Number.isInteger(hours) && hours >= MIN_OFFSET_HOURS && hours <= MAX_OFFSET_HOURS;
}

export function fmtUtcOffset(hours: number): string {
  const sign = hours < 0 ? "-" : "+";
  return `GMT${sign}${Math.abs(hours)}`;
}
