import type { Logger } from "pino";
import type { DbPayment, DbUser, Messenger } from "@ritualclub/shared";
import { AppError, errorMessage, notFound } from "../errors.js";
import type { Store } from "../store/types.js";
import { DAY_MS } from "../utils/time.js";
import type { EnforcementEngine } from "./enforcement.js";
import { renderRenewalReminder } from "./render.js";

export type SubscriptionOptions = {
  renewalReminderDays: number;
  referenceOffsetHours: number;
};

export type RenewalSummary = {
  candidates: number;
  sent: number;
  failed: number;
  errors: Array<{ telegram_user_id: number; message: string }>;
};

export type GrantInput = {
  days: number;
  amount?: number;
  currency?: string;
};

export class SubscriptionService {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly messenger: Messenger,
    private readonly enforcement: EnforcementEngine,
    logger: Logger,
    private readonly opts: SubscriptionOptions
  ) {
    this.log = logger.child({ component: "subscriptions" });
  }

  // One reminder per subscription period: a newer subscription_until re-arms it.
  needsRenewalReminder(user: DbUser, now: Date): boolean {
    if (user.status !== "active" || !user.is_premium || !user.subscription_until) return false;
    const untilMs = Date.parse(user.subscription_until);
    if (!Number.isFinite(untilMs)) return false;
    const remindFromMs = untilMs - this.opts.renewalReminderDays * DAY_MS;
    if (now.getTime() < remindFromMs || now.getTime() >= untilMs) return false;
    if (user.renewal_reminder_sent_at) {
      const sentMs = Date.parse(user.renewal_reminder_sent_at);
      if (Number.isFinite(sentMs) && sentMs >= remindFromMs) return false;
    }
    return true;
  }

  async sendRenewalReminders(now: Date): Promise<RenewalSummary> {
    const horizon = new Date(now.getTime() + this.opts.renewalReminderDays * DAY_MS).toISOString();
    const users = await this.store.listUsers({ statuses: ["active"], subscriptionEndsBefore: horizon });
    const summary: RenewalSummary = { candidates: 0, sent: 0, failed: 0, errors: [] };
    for (const user of users) {
      if (!this.needsRenewalReminder(user, now) || !user.subscription_until) continue;
      summary.candidates += 1;
      try {
        const msg = renderRenewalReminder(new Date(user.subscription_until), now, this.opts.referenceOffsetHours);
        const delivered = await this.messenger.sendMessage(user.telegram_user_id, msg.text, { parseMode: "HTML" });
        if (!delivered) {
          summary.failed += 1;
          continue;
        }
        await this.store.updateUser(user.id, { renewal_reminder_sent_at: now.toISOString() });
        summary.sent += 1;
      } catch (e) {
        summary.failed += 1;
        if (summary.errors.length < 20) summary.errors.push({ telegram_user_id: user.telegram_user_id, message: errorMessage(e) });
      }
    }
    if (summary.candidates > 0) this.log.info({ ...summary, errors: summary.errors.length }, "renewal reminders finished");
    return summary;
  }

  // Manual access: extends from the later of now and the current end date.
  async grantAccess(userId: string, input: GrantInput, now: Date): Promise<{ user: DbUser; payment: DbPayment; restored: boolean }> {
    if (!Number.isInteger(input.days) || input.days < 1 || input.days > 3660) {
      throw new AppError("invalid_days", "days must be an integer in [1, 3660]");
    }
    const user = await this.store.getUser(userId);
    if (!user) throw notFound("user");
    if (user.status === "banned") throw new AppError("user_banned", "user is banned", 409);

    const currentMs = user.subscription_until ? Date.parse(user.subscription_until) : NaN;
    const baseMs = Number.isFinite(currentMs) && currentMs > now.getTime() ? currentMs : now.getTime();
    const until = new Date(baseMs + input.days * DAY_MS).toISOString();

    const payment = await this.store.insertPayment({
      user_id: user.id,
      provider: "manual",
      amount: input.amount ?? 0,
      currency: input.currency ?? "RUB",
      status: "paid",
      subscription_end: until
    });
    let updated = await this.store.updateUser(user.id, {
      status: "active",
      is_premium: true,
      subscription_until: until,
      payment_warning_sent_at: null,
      renewal_reminder_sent_at: null
    });

    let restored = false;
    if (!updated.is_in_group && updated.kicked_at) {
      updated = await this.enforcement.restoreMember(user.id, now);
      restored = true;
    }
    this.log.info({ user_id: user.id, days: input.days, subscription_until: until, restored }, "access granted");
    return { user: updated, payment, restored };
  }
}
