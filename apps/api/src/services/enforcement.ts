import type { Logger } from "pino";
import type { DbUser, Messenger } from "@ritualclub/shared";
import { AppError, errorMessage, notFound } from "../errors.js";
import type { Store } from "../store/types.js";
import { MINUTE_MS } from "../utils/time.js";
import { renderPaymentWarning, renderRemovalNotice } from "./render.js";

export type EnforcementState = "COMPLIANT" | "WARNED" | "DEADLINE_PASSED" | "UNWARNED";

export type EnforcementOutcome =
  | "compliant"
  | "warned"
  | "warned_undelivered"
  | "in_grace"
  | "cancelled"
  | "kicked"
  | "kick_failed"
  | "left_group"
  | "skipped";

export type SweepSummary = {
  checked: number;
  outcomes: Record<EnforcementOutcome, number>;
  errors: Array<{ user_id: string; message: string }>;
};

export type EnforcementOptions = {
  groupId: number | null;
  graceMinutes: number;
};

export function isCompliant(user: DbUser, now: Date): boolean {
  if (user.status !== "active" || !user.is_premium || !user.subscription_until) return false;
  const untilMs = Date.parse(user.subscription_until);
  return Number.isFinite(untilMs) && untilMs > now.getTime();
}

function emptyOutcomes(): Record<EnforcementOutcome, number> {
  return {
    compliant: 0,
    warned: 0,
    warned_undelivered: 0,
    in_grace: 0,
    cancelled: 0,
    kicked: 0,
    kick_failed: 0,
    left_group: 0,
    skipped: 0
  };
}

// Warn -> grace -> kick, driven entirely by the persisted payment_warning_sent_at column.
export class EnforcementEngine {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly messenger: Messenger,
    logger: Logger,
    private readonly opts: EnforcementOptions
  ) {
    this.log = logger.child({ component: "enforcement" });
  }

  deadlineFor(user: DbUser): Date | null {
    if (!user.payment_warning_sent_at) return null;
    const warnedMs = Date.parse(user.payment_warning_sent_at);
    if (!Number.isFinite(warnedMs)) return null;
    return new Date(warnedMs + this.opts.graceMinutes * MINUTE_MS);
  }

  stateOf(user: DbUser, now: Date): EnforcementState {
    if (isCompliant(user, now)) return "COMPLIANT";
    const deadline = this.deadlineFor(user);
    if (!deadline) return "UNWARNED";
    return now.getTime() < deadline.getTime() ? "WARNED" : "DEADLINE_PASSED";
  }

  async sweep(now: Date): Promise<SweepSummary> {
    const summary: SweepSummary = { checked: 0, outcomes: emptyOutcomes(), errors: [] };
    if (this.opts.groupId === null) {
      this.log.warn("GROUP_CHAT_ID is not configured, enforcement sweep skipped");
      return summary;
    }
    const members = await this.store.listUsers({ statuses: ["active", "pending"], inGroup: true });
    for (const user of members) {
      summary.checked += 1;
      try {
        const outcome = await this.evaluate(user, now);
        summary.outcomes[outcome] += 1;
      } catch (e) {
        this.log.error({ user_id: user.id, telegram_user_id: user.telegram_user_id, err: errorMessage(e) }, "enforcement failed for user");
        if (summary.errors.length < 20) summary.errors.push({ user_id: user.id, message: errorMessage(e) });
      }
    }
    const acted = summary.outcomes.warned + summary.outcomes.warned_undelivered + summary.outcomes.kicked + summary.outcomes.cancelled;
    if (acted > 0 || summary.errors.length > 0) {
      this.log.info({ checked: summary.checked, ...summary.outcomes, errors: summary.errors.length }, "enforcement sweep finished");
    }
    return summary;
  }

  async evaluate(user: DbUser, now: Date): Promise<EnforcementOutcome> {
    const state = this.stateOf(user, now);
    if (state === "COMPLIANT") {
      if (!user.payment_warning_sent_at) return "compliant";
      await this.store.updateUser(user.id, { payment_warning_sent_at: null });
      this.log.info({ user_id: user.id }, "payment arrived during grace period, warning cleared");
      return "cancelled";
    }
    if (state === "WARNED") return "in_grace";
    if (state === "DEADLINE_PASSED") return this.checkDeadline(user.id, now);
    return this.warn(user, now);
  }

  private async warn(user: DbUser, now: Date): Promise<EnforcementOutcome> {
    const groupId = this.requireGroup();
    const member = await this.messenger.isGroupMember(groupId, user.telegram_user_id);
    if (member === false) {
      await this.store.updateUser(user.id, { is_in_group: false });
      return "left_group";
    }
    const warning = renderPaymentWarning(this.opts.graceMinutes);
    const delivered = await this.messenger.sendMessage(user.telegram_user_id, warning.text, { parseMode: "HTML" });
    // The grace period starts either way; the deadline does not depend on the user reading the warning.
    await this.store.updateUser(user.id, { payment_warning_sent_at: now.toISOString() });
    if (!delivered) {
      this.log.warn({ user_id: user.id, telegram_user_id: user.telegram_user_id }, "payment warning not delivered");
      return "warned_undelivered";
    }
    this.log.info({ user_id: user.id, deadline: new Date(now.getTime() + this.opts.graceMinutes * MINUTE_MS).toISOString() }, "payment warning sent");
    return "warned";
  }

  // Re-reads the user: a payment that landed after the sweep loaded its roster still cancels the kick.
  async checkDeadline(userId: string, now: Date): Promise<EnforcementOutcome> {
    const user = await this.store.getUser(userId);
    if (!user) return "skipped";
    if (isCompliant(user, now)) {
      await this.store.updateUser(user.id, { payment_warning_sent_at: null });
      return "cancelled";
    }
    if (!user.is_in_group) {
      await this.store.updateUser(user.id, { payment_warning_sent_at: null });
      return "skipped";
    }
    const removed = await this.messenger.removeFromGroup(this.requireGroup(), user.telegram_user_id);
    if (!removed) {
      this.log.warn({ user_id: user.id, telegram_user_id: user.telegram_user_id }, "kick failed, will retry on next sweep");
      return "kick_failed";
    }
    const nowIso = now.toISOString();
    await this.store.updateUser(user.id, { is_in_group: false, status: "pending", kicked_at: nowIso, payment_warning_sent_at: null });
    this.log.info({ user_id: user.id, telegram_user_id: user.telegram_user_id }, "user removed from group");
    const notice = renderRemovalNotice();
    await this.messenger.sendMessage(user.telegram_user_id, notice.text, { parseMode: "HTML" });
    return "kicked";
  }

  // Lifts the ban so the user can come back; they re-enter compliance evaluation on the next sweep.
  async restoreMember(userId: string, now: Date): Promise<DbUser> {
    const user = await this.store.getUser(userId);
    if (!user) throw notFound("user");
    const restored = await this.messenger.restoreToGroup(this.requireGroup(), user.telegram_user_id);
    if (!restored) throw new AppError("restore_failed", "could not lift the group ban", 502);
    return this.store.updateUser(user.id, {
      is_in_group: true,
      joined_group_at: now.toISOString(),
      payment_warning_sent_at: null,
      kicked_at: null
    });
  }

  async recordGroupJoin(telegramUserId: number, now: Date): Promise<DbUser | null> {
    const user = await this.store.getUserByTelegramId(telegramUserId);
    if (!user) return null;
    return this.store.updateUser(user.id, { is_in_group: true, joined_group_at: now.toISOString() });
  }

  async recordGroupLeave(telegramUserId: number): Promise<DbUser | null> {
    const user = await this.store.getUserByTelegramId(telegramUserId);
    if (!user) return null;
    return this.store.updateUser(user.id, { is_in_group: false, payment_warning_sent_at: null });
  }

  private requireGroup(): number {
    if (this.opts.groupId === null) throw new AppError("group_not_configured", "GROUP_CHAT_ID is not configured", 501);
    return this.opts.groupId;
  }
}
