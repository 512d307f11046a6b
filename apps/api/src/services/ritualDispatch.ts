import type { Logger } from "pino";
import type { DbUserRitual, Messenger, RitualKind } from "@ritualclub/shared";
import { errorMessage } from "../errors.js";
import type { Store } from "../store/types.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { renderRitualMessage, type RenderedMessage } from "./render.js";
import { shouldSend } from "./ritualSchedule.js";
import { mutateUserRitual } from "./userRitualState.js";

export type DispatchCommand = {
  userRitualId: string;
  ritualId: string;
  userId: string;
  telegramUserId: number;
  kind: RitualKind;
  dueAt: string;
  message: RenderedMessage;
};

export type DispatchSummary = {
  kinds: RitualKind[];
  commands: number;
  sent: number;
  failed: number;
  errors: Array<{ user_ritual_id: string; step: string; message: string }>;
};

export type DispatcherOptions = {
  catchUpMinutes: number;
  sendConcurrency: number;
};

export class RitualDispatcher {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly messenger: Messenger,
    logger: Logger,
    private readonly opts: DispatcherOptions
  ) {
    this.log = logger.child({ component: "ritual_dispatch" });
  }

  // Pure decision pass: which (user, ritual) pairs are due right now. Store failures propagate.
  async tick(kind: RitualKind, now: Date): Promise<DispatchCommand[]> {
    const rituals = await this.store.listRituals({ kind, activeOnly: true });
    const commands: DispatchCommand[] = [];
    for (const ritual of rituals) {
      const candidates = await this.store.listDispatchCandidates(ritual.id, {
        subscriptionActiveAt: ritual.requires_subscription ? now.toISOString() : null
      });
      for (const { state, user } of candidates) {
        const decision = shouldSend(ritual, state, now, { catchUpMinutes: this.opts.catchUpMinutes });
        if (!decision.send) continue;
        commands.push({
          userRitualId: state.id,
          ritualId: ritual.id,
          userId: user.id,
          telegramUserId: user.telegram_user_id,
          kind: ritual.kind,
          dueAt: decision.dueAt.toISOString(),
          message: renderRitualMessage(ritual, state.id)
        });
      }
    }
    return commands;
  }

  // A new prompt closes any earlier one still open: replies only ever attach to the latest dispatch.
  async markSent(userRitualId: string, sentAt: Date): Promise<DbUserRitual> {
    const { state } = await mutateUserRitual<null>(this.store, userRitualId, (cur) => {
      const open = cur.total_sent - cur.total_responses - cur.total_missed;
      return {
        patch: {
          last_sent_at: sentAt.toISOString(),
          total_sent: cur.total_sent + 1,
          ...(open > 0 ? { total_missed: cur.total_missed + open, last_missed_at: sentAt.toISOString() } : {})
        },
        result: null
      };
    });
    return state;
  }

  async markAttempted(userRitualId: string, attemptedAt: Date): Promise<DbUserRitual> {
    const { state } = await mutateUserRitual<null>(this.store, userRitualId, () => ({
      patch: { last_attempt_at: attemptedAt.toISOString() },
      result: null
    }));
    return state;
  }

  private deliver(cmd: DispatchCommand): Promise<boolean> {
    const { text, buttons } = cmd.message;
    return buttons.length > 0
      ? this.messenger.sendWithButtons(cmd.telegramUserId, text, buttons, { parseMode: "HTML" })
      : this.messenger.sendMessage(cmd.telegramUserId, text, { parseMode: "HTML" });
  }

  async run(kinds: RitualKind[], now: Date): Promise<DispatchSummary> {
    const commands: DispatchCommand[] = [];
    for (const kind of kinds) commands.push(...(await this.tick(kind, now)));

    const summary: DispatchSummary = { kinds, commands: commands.length, sent: 0, failed: 0, errors: [] };
    const fail = (cmd: DispatchCommand, step: string, message: string) => {
      summary.failed += 1;
      if (summary.errors.length < 20) summary.errors.push({ user_ritual_id: cmd.userRitualId, step, message });
    };

    await runWithConcurrency(commands, this.opts.sendConcurrency, async (cmd) => {
      let refusal: string | null = null;
      try {
        if (!(await this.deliver(cmd))) refusal = "messenger refused delivery";
      } catch (e) {
        refusal = errorMessage(e);
      }
      const step = refusal === null ? "mark_sent" : "mark_attempted";
      try {
        if (refusal !== null) {
          // lastSentAt stays put; the attempt stamp holds the pair back until its next period.
          await this.markAttempted(cmd.userRitualId, now);
          fail(cmd, "send", refusal);
          return;
        }
        await this.markSent(cmd.userRitualId, now);
        summary.sent += 1;
      } catch (e) {
        this.log.error({ user_ritual_id: cmd.userRitualId, telegram_user_id: cmd.telegramUserId, step, err: errorMessage(e) }, "ritual dispatch failed");
        fail(cmd, step, errorMessage(e));
      }
    });

    if (summary.commands > 0) {
      this.log.info({ kinds, commands: summary.commands, sent: summary.sent, failed: summary.failed }, "ritual dispatch finished");
    }
    return summary;
  }
}
