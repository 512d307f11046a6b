import type { FastifyRequest } from "fastify";
import { z } from "zod";
import { AppError } from "../errors.js";

export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
    throw new AppError("invalid_request", message, 400);
  }
  return parsed.data;
}

export const telegramUserId = z.coerce.number().int().positive();
export const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

// Shared token via x-admin-token header or ?token=
export function requireDashboard(req: FastifyRequest, token: string | undefined): void {
  if (!token) throw new AppError("admin_disabled", "ADMIN_DASHBOARD_TOKEN is not configured", 401);
  const header = req.headers["x-admin-token"];
  const headerToken = Array.isArray(header) ? header[0] : header;
  const query = z.object({ token: z.string().optional() }).passthrough().safeParse(req.query);
  const qToken = query.success ? query.data.token : undefined;
  if (headerToken === token || qToken === token) return;
  throw new AppError("unauthorized", "Unauthorized", 401);
}
