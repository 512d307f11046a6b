import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Logger } from "pino";
import type { DbRitual, DbUserRitual, RitualKind } from "@ritualclub/shared";
import { isValidOffsetHours } from "@ritualclub/shared";
import { AppError, notFound } from "../errors.js";
import { ritualButtonSchema } from "../store/rows.js";
import type { NewRitual, Store } from "../store/types.js";
import { mutateUserRitual } from "./userRitualState.js";

const ritualBase = z.object({
  name: z.string().trim().min(1).max(100),
  kind: z.enum(["MORNING", "EVENING", "WEEKLY_CHALLENGE", "WEEKLY_GOALS", "FRIDAY_CYCLE"]),
  cadence: z.enum(["DAILY", "WEEKLY", "MONTHLY"]),
  send_hour: z.number().int().min(0).max(23),
  send_minute: z.number().int().min(0).max(59),
  weekday: z.number().int().min(0).max(6).nullable().default(null),
  message_title: z.string().trim().min(1).max(200),
  message_text: z.string().max(3500).default(""),
  buttons: z.array(ritualButtonSchema).min(1).max(8),
  is_active: z.boolean().default(true),
  requires_subscription: z.boolean().default(true),
  sort_order: z.number().int().default(0)
});

export const ritualInputSchema = ritualBase.superRefine((r, ctx) => {
  if (r.cadence === "WEEKLY" && r.weekday === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["weekday"], message: "weekday is required for WEEKLY rituals" });
  }
  if (r.cadence !== "WEEKLY" && r.weekday !== null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["weekday"], message: "weekday is only allowed for WEEKLY rituals" });
  }
  const tokens = new Set<string>();
  r.buttons.forEach((b, i) => {
    if (tokens.has(b.token)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["buttons", i, "token"], message: `duplicate token "${b.token}"` });
    }
    tokens.add(b.token);
  });
});

export const ritualPatchSchema = ritualBase.partial().strict();

export type RitualInput = z.input<typeof ritualInputSchema>;

function invalid(error: z.ZodError): AppError {
  const message = error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
  return new AppError("invalid_ritual", message, 400);
}

export function parseRitualInput(input: unknown): NewRitual {
  const parsed = ritualInputSchema.safeParse(input);
  if (!parsed.success) throw invalid(parsed.error);
  return parsed.data;
}

export function loadDefaultRituals(file?: string): NewRitual[] {
  const __filename = fileURLToPath(import.meta.url);
  const target = file ?? path.resolve(path.dirname(__filename), "..", "..", "data", "default-rituals.json");
  const raw: unknown = JSON.parse(fs.readFileSync(target, "utf8"));
  const parsed = z.array(ritualInputSchema).safeParse(raw);
  if (!parsed.success) throw invalid(parsed.error);
  return parsed.data;
}

export type SeedResult = { created: string[]; skipped: string[] };

export class RitualCatalog {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    logger: Logger,
    private readonly defaultOffsetHours: number
  ) {
    this.log = logger.child({ component: "ritual_catalog" });
  }

  listRituals(filter: { kind?: RitualKind; activeOnly?: boolean } = {}): Promise<DbRitual[]> {
    return this.store.listRituals(filter);
  }

  async getRitual(id: string): Promise<DbRitual> {
    const ritual = await this.store.getRitual(id);
    if (!ritual) throw notFound("ritual");
    return ritual;
  }

  async createRitual(input: unknown): Promise<DbRitual> {
    const ritual = await this.store.insertRitual(parseRitualInput(input));
    this.log.info({ ritual_id: ritual.id, kind: ritual.kind }, "ritual created");
    return ritual;
  }

  async updateRitual(id: string, patch: unknown): Promise<DbRitual> {
    const current = await this.getRitual(id);
    const parsedPatch = ritualPatchSchema.safeParse(patch);
    if (!parsedPatch.success) throw invalid(parsedPatch.error);
    const { id: _id, created_at: _createdAt, ...fields } = current;
    // Validate the merged definition so a patch cannot break the weekday/cadence pairing.
    const merged = parseRitualInput({ ...fields, ...parsedPatch.data });
    const updated = await this.store.updateRitual(id, merged);
    this.log.info({ ritual_id: id, fields: Object.keys(parsedPatch.data) }, "ritual updated");
    return updated;
  }

  // Skips definitions whose kind + title already exist.
  async seedDefaultRituals(defs: NewRitual[] = loadDefaultRituals()): Promise<SeedResult> {
    const result: SeedResult = { created: [], skipped: [] };
    for (const def of defs) {
      const existing = await this.store.findRitual(def.kind, def.message_title);
      if (existing) {
        result.skipped.push(existing.id);
        continue;
      }
      const ritual = await this.store.insertRitual(def);
      result.created.push(ritual.id);
    }
    this.log.info({ created: result.created.length, skipped: result.skipped.length }, "default rituals seeded");
    return result;
  }

  async registerUserForAllRituals(userId: string, offsetHours: number = this.defaultOffsetHours): Promise<DbUserRitual[]> {
    const [rituals, existing] = await Promise.all([
      this.store.listRituals({ activeOnly: true }),
      this.store.listUserRituals({ userId })
    ]);
    const have = new Set(existing.map((r) => r.ritual_id));
    const created: DbUserRitual[] = [];
    for (const ritual of rituals) {
      if (have.has(ritual.id)) continue;
      created.push(await this.store.insertUserRitual({ user_id: userId, ritual_id: ritual.id, timezone_offset_hours: offsetHours }));
    }
    if (created.length > 0) this.log.info({ user_id: userId, registered: created.length }, "user registered for rituals");
    return created;
  }

  async setUserTimezone(userId: string, offsetHours: number): Promise<void> {
    if (!isValidOffsetHours(offsetHours)) throw new AppError("invalid_timezone", "offset must be a whole hour in [-12, 14]");
    await this.store.updateUser(userId, { timezone_offset_hours: offsetHours });
    const states = await this.store.listUserRituals({ userId });
    for (const s of states) {
      await mutateUserRitual<null>(this.store, s.id, (cur) =>
        cur.timezone_offset_hours === offsetHours
          ? { skip: true, result: null }
          : { patch: { timezone_offset_hours: offsetHours }, result: null }
      );
    }
  }

  async setUserRitualEnabled(userId: string, ritualId: string, enabled: boolean): Promise<DbUserRitual> {
    const state = await this.store.findUserRitual(userId, ritualId);
    if (!state) throw notFound("user_ritual");
    const { state: updated } = await mutateUserRitual<null>(this.store, state.id, (cur) =>
      cur.is_enabled === enabled ? { skip: true, result: null } : { patch: { is_enabled: enabled }, result: null }
    );
    return updated;
  }
}
