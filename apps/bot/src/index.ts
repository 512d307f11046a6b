import { createBot, startBot } from "./bot.js";
import { logger } from "./logger.js";

const bot = createBot();

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "stopping bot");
    bot.stop().catch((e: unknown) => logger.error({ err: e }, "bot stop failed"));
  });
}

await startBot(bot);
