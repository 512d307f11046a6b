import Fastify from "fastify";
import cors from "@fastify/cors";
import type { AppContext } from "./context.js";
import { AppError } from "./errors.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerBotRoutes } from "./routes/bot.js";

export function buildServer(ctx: AppContext, opts: { logRequests?: boolean } = {}) {
  const app = Fastify({
    logger: opts.logRequests === false ? false : { level: ctx.settings.logLevel }
  });

  void app.register(cors, { origin: true });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      void reply.code(err.statusCode).send({ ok: false, error: err.error, message: err.message });
      return;
    }
    if (err.statusCode && err.statusCode < 500) {
      void reply.code(err.statusCode).send({ ok: false, error: "bad_request", message: err.message });
      return;
    }
    req.log.error({ err }, "request failed");
    void reply.code(500).send({ ok: false, error: "internal_error", message: "Internal error" });
  });

  app.get("/health", async () => {
    return { ok: true, service: "ritualclub-api", ts: new Date().toISOString() };
  });

  registerAdminRoutes(app, ctx);
  registerBotRoutes(app, ctx);

  return app;
}
