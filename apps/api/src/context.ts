import type { Logger } from "pino";
import type { Messenger, RitualKind } from "@ritualclub/shared";
import { Scheduler, type JobDefinition } from "./scheduler.js";
import { ActivityAggregator, WEEKLY_REPORT_PUBLISH_HOUR, reportWeekStart } from "./services/activity.js";
import { EnforcementEngine } from "./services/enforcement.js";
import { RitualCatalog } from "./services/ritualCatalog.js";
import { RitualDispatcher } from "./services/ritualDispatch.js";
import { ResponseRecorder } from "./services/ritualResponses.js";
import { SubscriptionService } from "./services/subscriptions.js";
import type { Store } from "./store/types.js";
import { addDays, localDate } from "./utils/time.js";

export type AppSettings = {
  referenceOffsetHours: number;
  catchUpMinutes: number;
  graceMinutes: number;
  sweepEveryMinutes: number;
  sendConcurrency: number;
  renewalReminderDays: number;
  groupChatId: number | null;
  adminToken: string | undefined;
  logLevel: string;
};

export type AppContext = {
  store: Store;
  messenger: Messenger;
  logger: Logger;
  settings: AppSettings;
  catalog: RitualCatalog;
  dispatcher: RitualDispatcher;
  responses: ResponseRecorder;
  enforcement: EnforcementEngine;
  subscriptions: SubscriptionService;
  activity: ActivityAggregator;
  scheduler: Scheduler;
};

export const WEEKLY_RITUAL_KINDS: RitualKind[] = ["WEEKLY_CHALLENGE", "WEEKLY_GOALS", "FRIDAY_CYCLE"];

export function buildJobs(ctx: Omit<AppContext, "scheduler">): JobDefinition[] {
  const { settings } = ctx;
  return [
    {
      id: "morning_rituals",
      name: "Morning rituals",
      trigger: { type: "interval", everyMinutes: 1 },
      run: (now) => ctx.dispatcher.run(["MORNING"], now)
    },
    {
      id: "evening_rituals",
      name: "Evening rituals",
      trigger: { type: "interval", everyMinutes: 1 },
      run: (now) => ctx.dispatcher.run(["EVENING"], now)
    },
    {
      id: "weekly_rituals",
      name: "Weekly rituals",
      trigger: { type: "interval", everyMinutes: 1 },
      run: (now) => ctx.dispatcher.run(WEEKLY_RITUAL_KINDS, now)
    },
    {
      id: "enforcement_sweep",
      name: "Subscription enforcement",
      trigger: { type: "interval", everyMinutes: settings.sweepEveryMinutes },
      run: (now) => ctx.enforcement.sweep(now)
    },
    {
      id: "renewal_reminders",
      name: "Subscription renewal reminders",
      trigger: { type: "daily", hour: 12, minute: 0 },
      run: (now) => ctx.subscriptions.sendRenewalReminders(now)
    },
    {
      id: "mark_missed_rituals",
      name: "Missed ritual prompts",
      trigger: { type: "daily", hour: 6, minute: 0 },
      run: (now) => ctx.responses.markMissed(now)
    },
    {
      id: "daily_activity",
      name: "Daily activity summaries",
      trigger: { type: "daily", hour: 2, minute: 0 },
      run: (now) => ctx.activity.processDailyActivity(addDays(localDate(now, settings.referenceOffsetHours), -1))
    },
    {
      id: "weekly_report_generate",
      name: "Weekly report generation",
      trigger: { type: "weekly", weekday: 6, hour: 23, minute: 0 },
      run: (now) => ctx.activity.generateWeeklyReport(reportWeekStart(now, settings.referenceOffsetHours))
    },
    {
      id: "weekly_report_publish",
      name: "Weekly report publication",
      trigger: { type: "weekly", weekday: 0, hour: WEEKLY_REPORT_PUBLISH_HOUR, minute: 0 },
      run: (now) => ctx.activity.publishWeeklyReports(now)
    }
  ];
}

export function createAppContext(params: {
  store: Store;
  messenger: Messenger;
  logger: Logger;
  settings: AppSettings;
  clock?: () => Date;
}): AppContext {
  const { store, messenger, logger, settings } = params;
  const catalog = new RitualCatalog(store, logger, settings.referenceOffsetHours);
  const dispatcher = new RitualDispatcher(store, messenger, logger, {
    catchUpMinutes: settings.catchUpMinutes,
    sendConcurrency: settings.sendConcurrency
  });
  const responses = new ResponseRecorder(store, logger);
  const enforcement = new EnforcementEngine(store, messenger, logger, {
    groupId: settings.groupChatId,
    graceMinutes: settings.graceMinutes
  });
  const subscriptions = new SubscriptionService(store, messenger, enforcement, logger, {
    renewalReminderDays: settings.renewalReminderDays,
    referenceOffsetHours: settings.referenceOffsetHours
  });
  const activity = new ActivityAggregator(store, messenger, logger, {
    referenceOffsetHours: settings.referenceOffsetHours,
    groupId: settings.groupChatId
  });
  const base = { store, messenger, logger, settings, catalog, dispatcher, responses, enforcement, subscriptions, activity };
  const scheduler = new Scheduler(buildJobs(base), logger, {
    referenceOffsetHours: settings.referenceOffsetHours,
    clock: params.clock
  });
  return { ...base, scheduler };
}
