import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { RITUAL_KINDS } from "@ritualclub/shared";
import type { RitualKind } from "@ritualclub/shared";
import type { AppContext } from "../context.js";
import { AppError } from "../errors.js";
import { getRitualResponseHistory, getRitualStats, getSubscriptionHealth } from "../services/stats.js";
import { parseTimeHHMM } from "../utils/time.js";
import { isoDate, parseWith, requireDashboard } from "./validation.js";

const idParams = z.object({ id: z.string().min(1) });
const ritualKind = z.custom<RitualKind>((v) => typeof v === "string" && (RITUAL_KINDS as readonly string[]).includes(v));

// Accept "send_time": "06:30" as a shorthand for send_hour/send_minute.
function expandSendTime(body: unknown): unknown {
  const parsed = z.object({ send_time: z.string() }).passthrough().safeParse(body);
  if (!parsed.success) return body;
  const { send_time, ...rest } = parsed.data;
  const t = parseTimeHHMM(send_time);
  if (!t) throw new AppError("invalid_ritual", "send_time: expected HH:MM");
  return { ...rest, send_hour: t.hour, send_minute: t.minute };
}

export function registerAdminRoutes(app: FastifyInstance, ctx: AppContext) {
  const { store, catalog, activity, subscriptions, scheduler, settings } = ctx;

  app.addHook("onRequest", async (req) => {
    if (req.url.startsWith("/admin/")) requireDashboard(req, settings.adminToken);
  });

  app.get("/admin/rituals", async (req) => {
    const q = parseWith(z.object({ kind: ritualKind.optional(), active: z.enum(["true", "false"]).optional() }).passthrough(), req.query);
    const rituals = await catalog.listRituals({ kind: q.kind, activeOnly: q.active === "true" });
    return { ok: true, rituals };
  });

  app.post("/admin/rituals", async (req, reply) => {
    const ritual = await catalog.createRitual(expandSendTime(req.body));
    reply.code(201);
    return { ok: true, ritual };
  });

  app.patch("/admin/rituals/:id", async (req) => {
    const { id } = parseWith(idParams, req.params);
    const ritual = await catalog.updateRitual(id, expandSendTime(req.body));
    return { ok: true, ritual };
  });

  app.post("/admin/rituals/seed", async () => {
    const result = await catalog.seedDefaultRituals();
    return { ok: true, ...result };
  });

  app.get("/admin/rituals/:id/stats", async (req) => {
    const { id } = parseWith(idParams, req.params);
    return { ok: true, stats: await getRitualStats(store, id) };
  });

  app.get("/admin/rituals/:id/responses", async (req) => {
    const { id } = parseWith(idParams, req.params);
    const q = parseWith(z.object({ limit: z.coerce.number().int().min(1).max(200).default(50) }).passthrough(), req.query);
    return { ok: true, responses: await getRitualResponseHistory(store, id, q.limit) };
  });

  app.get("/admin/activity/date/:date", async (req) => {
    const { date } = parseWith(z.object({ date: isoDate }), req.params);
    return { ok: true, stats: await activity.getActivityStatsForDate(date) };
  });

  app.get("/admin/activity/top", async (req) => {
    const q = parseWith(
      z
        .object({
          days: z.coerce.number().int().min(1).max(90).default(7),
          limit: z.coerce.number().int().min(1).max(100).default(10)
        })
        .passthrough(),
      req.query
    );
    return { ok: true, users: await activity.getTopActiveUsers(q.days, q.limit, new Date()) };
  });

  app.get("/admin/subscriptions/health", async () => {
    return { ok: true, health: await getSubscriptionHealth(store, new Date(), settings.renewalReminderDays) };
  });

  app.post("/admin/users/:id/grant", async (req) => {
    const { id } = parseWith(idParams, req.params);
    const body = parseWith(
      z.object({
        days: z.number().int().min(1).max(3660),
        amount: z.number().min(0).optional(),
        currency: z.string().min(3).max(3).optional()
      }),
      req.body
    );
    const result = await subscriptions.grantAccess(id, body, new Date());
    return { ok: true, ...result };
  });

  app.get("/admin/scheduler/jobs", async () => {
    return { ok: true, jobs: scheduler.getJobsStatus() };
  });

  app.post("/admin/scheduler/jobs/:id/run", async (req, reply) => {
    const { id } = parseWith(idParams, req.params);
    if (!scheduler.hasJob(id)) throw new AppError("job_not_found", `unknown job ${id}`, 404);
    const result = await scheduler.runJob(id);
    if (!result.ok) reply.code("skipped" in result ? 409 : 500);
    return { job: id, ...result };
  });
}
