import type { DbUser } from "@ritualclub/shared";
import type { Store } from "../store/types.js";

export type TelegramProfile = {
  telegram_user_id: number;
  username: string | null;
  first_name: string | null;
};

export async function upsertTelegramUser(
  store: Store,
  profile: TelegramProfile,
  defaultOffsetHours: number
): Promise<{ user: DbUser; created: boolean }> {
  const existing = await store.getUserByTelegramId(profile.telegram_user_id);
  if (existing) {
    if (existing.username === profile.username && existing.first_name === profile.first_name) {
      return { user: existing, created: false };
    }
    const user = await store.updateUser(existing.id, { username: profile.username, first_name: profile.first_name });
    return { user, created: false };
  }
  const user = await store.insertUser({ ...profile, status: "pending", timezone_offset_hours: defaultOffsetHours });
  return { user, created: true };
}

export function displayName(user: Pick<DbUser, "username" | "first_name">): string {
  if (user.username) return `@${user.username}`;
  return user.first_name?.trim() || "Участник";
}
