import type { Logger } from "pino";
import { resolveOutcome } from "@ritualclub/shared";
import type { DbRitualResponse, DbUserRitual, OutcomeKind } from "@ritualclub/shared";
import { AppError, errorMessage, notFound } from "../errors.js";
import type { Store } from "../store/types.js";
import { DAY_MS } from "../utils/time.js";
import { mutateUserRitual } from "./userRitualState.js";

export type RecordResponseInput = {
  userRitualId: string;
  ritualId: string;
  outcome?: OutcomeKind;
  token?: string | null;
  freeText?: string | null;
  respondedAt: Date;
};

export type RecordedResponse = {
  response: DbRitualResponse;
  state: DbUserRitual;
  outcome: OutcomeKind;
};

export type MissedSummary = { checked: number; marked: number; failed: number; errors: string[] };

// Free text only attaches to a prompt sent within this window. Past it the prompt counts as missed.
export const PROMPT_TTL_MS = DAY_MS;

function openPrompts(s: DbUserRitual): number {
  return s.total_sent - s.total_responses - s.total_missed;
}

function laterThan(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && Date.parse(a) > Date.parse(b);
}

function counterDelta(outcome: OutcomeKind, sign: 1 | -1) {
  return (cur: DbUserRitual) => ({
    total_responses: cur.total_responses + sign,
    total_completed: cur.total_completed + (outcome === "COMPLETED" ? sign : 0),
    total_skipped: cur.total_skipped + (outcome === "SKIPPED" ? sign : 0)
  });
}

export class ResponseRecorder {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    logger: Logger
  ) {
    this.log = logger.child({ component: "ritual_responses" });
  }

  // Attaches to the latest dispatch of the pair. Not idempotent: one call per user action.
  async recordResponse(input: RecordResponseInput): Promise<RecordedResponse> {
    const ritual = await this.store.getRitual(input.ritualId);
    if (!ritual) throw notFound("ritual");
    const outcome = input.outcome ?? resolveOutcome(input.token, ritual.buttons);

    const { state, result: sentAt } = await mutateUserRitual<string>(this.store, input.userRitualId, (cur) => {
      if (cur.ritual_id !== input.ritualId) {
        throw new AppError("ritual_mismatch", "response does not belong to this ritual", 409);
      }
      if (!cur.last_sent_at || cur.total_sent === 0) {
        throw new AppError("not_dispatched", "ritual was never sent to this user", 409);
      }
      if (openPrompts(cur) <= 0) {
        if (laterThan(cur.last_missed_at, cur.last_sent_at)) {
          throw new AppError("prompt_expired", "latest ritual prompt was closed as missed", 409);
        }
        throw new AppError("already_answered", "latest ritual prompt is already answered", 409);
      }
      return { patch: counterDelta(outcome, 1)(cur), result: cur.last_sent_at };
    });

    try {
      const response = await this.store.insertRitualResponse({
        user_ritual_id: state.id,
        ritual_id: input.ritualId,
        outcome,
        response_text: input.freeText?.trim() || null,
        token: input.token ?? null,
        sent_at: sentAt,
        responded_at: input.respondedAt.toISOString()
      });
      this.log.info({ user_ritual_id: state.id, ritual_id: input.ritualId, outcome, token: input.token ?? null }, "ritual response recorded");
      return { response, state, outcome };
    } catch (e) {
      // Keep counters equal to the log when the append fails.
      await mutateUserRitual<null>(this.store, state.id, (cur) => ({ patch: counterDelta(outcome, -1)(cur), result: null })).catch((rollbackError) =>
        this.log.error({ user_ritual_id: state.id, err: errorMessage(rollbackError) }, "counter rollback failed")
      );
      throw e;
    }
  }

  // Most recent unanswered prompt for the user, if it went out within the free-text window.
  async findPendingForUser(userId: string, now: Date): Promise<DbUserRitual | null> {
    const states = await this.store.listUserRituals({ userId });
    let best: DbUserRitual | null = null;
    let bestMs = -Infinity;
    for (const s of states) {
      if (!s.last_sent_at || openPrompts(s) <= 0) continue;
      const sentMs = Date.parse(s.last_sent_at);
      if (!Number.isFinite(sentMs) || now.getTime() - sentMs > PROMPT_TTL_MS) continue;
      if (sentMs > bestMs) {
        best = s;
        bestMs = sentMs;
      }
    }
    return best;
  }

  async recordFreeText(userId: string, text: string, now: Date): Promise<RecordedResponse | null> {
    const pending = await this.findPendingForUser(userId, now);
    if (!pending) return null;
    return this.recordResponse({
      userRitualId: pending.id,
      ritualId: pending.ritual_id,
      outcome: "COMPLETED",
      freeText: text,
      respondedAt: now
    });
  }

  // Closes prompts left unanswered past the TTL. Each pair is updated on its own; one failure does not stop the run.
  async markMissed(now: Date): Promise<MissedSummary> {
    const cutoffMs = now.getTime() - PROMPT_TTL_MS;
    const states = await this.store.listUserRituals({ sentBefore: new Date(cutoffMs).toISOString() });
    const summary: MissedSummary = { checked: 0, marked: 0, failed: 0, errors: [] };
    for (const s of states) {
      if (openPrompts(s) <= 0) continue;
      summary.checked += 1;
      try {
        const { result } = await mutateUserRitual<number>(this.store, s.id, (cur) => {
          const open = openPrompts(cur);
          // A fresh dispatch may have landed since the listing.
          if (open <= 0 || !cur.last_sent_at || !(Date.parse(cur.last_sent_at) < cutoffMs)) return { skip: true, result: 0 };
          return { patch: { total_missed: cur.total_missed + open, last_missed_at: now.toISOString() }, result: open };
        });
        summary.marked += result;
      } catch (e) {
        summary.failed += 1;
        if (summary.errors.length < 20) summary.errors.push(`${s.id}: ${errorMessage(e)}`);
        this.log.warn({ user_ritual_id: s.id, err: errorMessage(e) }, "mark missed failed");
      }
    }
    if (summary.marked > 0) this.log.info({ marked: summary.marked, checked: summary.checked }, "missed ritual prompts closed");
    return summary;
  }
}
