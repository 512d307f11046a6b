import type { OutcomeKind, RitualButton } from "./types.js";

// Closed token set shared by every default ritual. Unknown tokens fall through to the ritual's own buttons.
export const RESPONSE_TOKEN_OUTCOMES: ReadonlyMap<string, OutcomeKind> = new Map<string, OutcomeKind>([
  ["ready", "COMPLETED"],
  ["reported", "COMPLETED"],
  ["accepted", "COMPLETED"],
  ["set", "COMPLETED"],
  ["successful", "COMPLETED"],
  ["sleepy", "SKIPPED"],
  ["private", "SKIPPED"],
  ["maybe", "SKIPPED"],
  ["planning", "PARTIAL"],
  ["improving", "PARTIAL"]
]);

export const TOKEN_PATTERN = /^[a-z0-9_]{1,20}$/;

const CALLBACK_PREFIX = "rit";

export function resolveOutcome(token: string | null | undefined, buttons: RitualButton[] = []): OutcomeKind {
  if (!token) return "COMPLETED";
  const known = RESPONSE_TOKEN_OUTCOMES.get(token);
  if (known) return known;
  const own = buttons.find((b) => b.token === token);
  return own?.outcome ?? "COMPLETED";
}

// Telegram caps callback_data at 64 bytes: "rit:" + uuid(36) + ":" + token(<=20) fits.
export function encodeRitualCallback(userRitualId: string, token: string): string {
  return `${CALLBACK_PREFIX}:${userRitualId}:${token}`;
}

export function decodeRitualCallback(data: string): { userRitualId: string; token: string } | null {
  const parts = data.split(":");
  if (parts.length !== 3) return null;
  const [prefix, userRitualId, token] = parts;
  if (prefix !== CALLBACK_PREFIX || !userRitualId || !token) return null;
  if (!TOKEN_PATTERN.test(token)) return null;
  return { userRitualId, token };
}
