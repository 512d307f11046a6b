import { createTelegramMessenger } from "@ritualclub/telegram";
import type { Messenger } from "@ritualclub/shared";
import { env, supabaseAdmin } from "./config.js";
import { createAppContext } from "./context.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { buildServer } from "./server.js";
import { SupabaseStore } from "./store/supabase.js";

const logger = createLogger("ritualclub-api", env.LOG_LEVEL);

function createMessenger(): Messenger {
  if (!env.TELEGRAM_BOT_TOKEN) throw new Error("Missing env: TELEGRAM_BOT_TOKEN");
  return createTelegramMessenger({
    botToken: env.TELEGRAM_BOT_TOKEN,
    channelId: env.CHANNEL_ID,
    logger: logger.child({ component: "telegram" })
  });
}

const ctx = createAppContext({
  store: new SupabaseStore(supabaseAdmin),
  messenger: createMessenger(),
  logger,
  settings: {
    referenceOffsetHours: env.REFERENCE_UTC_OFFSET_HOURS,
    catchUpMinutes: env.RITUAL_CATCH_UP_MINUTES,
    graceMinutes: env.ENFORCEMENT_GRACE_MINUTES,
    sweepEveryMinutes: env.ENFORCEMENT_SWEEP_MINUTES,
    sendConcurrency: env.SEND_CONCURRENCY,
    renewalReminderDays: env.RENEWAL_REMINDER_DAYS,
    groupChatId: env.GROUP_CHAT_ID,
    adminToken: env.ADMIN_DASHBOARD_TOKEN,
    logLevel: env.LOG_LEVEL
  }
});

const app = buildServer(ctx);

async function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  try {
    await ctx.scheduler.stop();
    await app.close();
    process.exit(0);
  } catch (e) {
    logger.error({ err: errorMessage(e) }, "shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

await app.listen({ port: env.PORT, host: "0.0.0.0" });
if (env.SCHEDULER_ENABLED) {
  ctx.scheduler.start();
} else {
  logger.warn("scheduler disabled by SCHEDULER_ENABLED=false");
}
