import type { DbUserRitual } from "@ritualclub/shared";
import { AppError, notFound } from "../errors.js";
import type { Store, UserRitualPatch } from "../store/types.js";

export const MAX_STATE_UPDATE_ATTEMPTS = 3;

export type StateMutation<R> = (current: DbUserRitual) => { patch: UserRitualPatch; result: R } | { skip: true; result: R };

// Read-modify-write of one user_rituals row under optimistic locking. `mutate` is re-run against the fresh row after a conflict.
export async function mutateUserRitual<R>(
  store: Store,
  userRitualId: string,
  mutate: StateMutation<R>
): Promise<{ state: DbUserRitual; result: R }> {
  for (let attempt = 1; attempt <= MAX_STATE_UPDATE_ATTEMPTS; attempt++) {
    const current = await store.getUserRitual(userRitualId);
    if (!current) throw notFound("user_ritual");
    const step = mutate(current);
    if ("skip" in step) return { state: current, result: step.result };
    const updated = await store.updateUserRitual(current.id, step.patch, current.version);
    if (updated) return { state: updated, result: step.result };
  }
  throw new AppError("concurrent_update", `user_ritual ${userRitualId} kept changing, gave up`, 409);
}
