import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient } from "@supabase/supabase-js";
import { isValidOffsetHours } from "@ritualclub/shared";

function loadEnvLocal() {
  // env.local next to the app; variables already present in the environment win.
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const envPath = path.resolve(__dirname, "..", "env.local");
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (process.env[key] === undefined && value !== "") {
      process.env[key] = value;
    }
  }
}

loadEnvLocal();

export type Env = {
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  PORT: number;
  LOG_LEVEL: string;
  TELEGRAM_BOT_TOKEN?: string | undefined;
  GROUP_CHAT_ID: number | null; // negative -100... id of the members' group
  CHANNEL_ID: string | null; // @channel or numeric id; null disables the channel gate
  ADMIN_DASHBOARD_TOKEN?: string | undefined;
  REFERENCE_UTC_OFFSET_HOURS: number; // offset rituals' send times are written in
  RITUAL_CATCH_UP_MINUTES: number;
  ENFORCEMENT_GRACE_MINUTES: number;
  ENFORCEMENT_SWEEP_MINUTES: number;
  SEND_CONCURRENCY: number;
  RENEWAL_REMINDER_DAYS: number;
  SCHEDULER_ENABLED: boolean;
};

function intEnv(key: string, fallback: number, min: number, max: number): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`Invalid env: ${key} must be an integer in [${min}, ${max}], got "${raw}"`);
  }
  return n;
}

function chatIdEnv(key: string): number | null {
  const raw = process.env[key]?.trim();
  if (!raw) return null;
  if (!/^-?\d+$/.test(raw)) throw new Error(`Invalid env: ${key} must be a numeric chat id`);
  return Number(raw);
}

export function getEnv(): Env {
  const required = ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY"] as const;
  const values: Record<(typeof required)[number], string> = { SUPABASE_URL: "", SUPABASE_SERVICE_ROLE_KEY: "" };
  for (const k of required) {
    const v = process.env[k]?.trim();
    if (!v) throw new Error(`Missing env: ${k}`);
    values[k] = v;
  }
  const referenceOffset = intEnv("REFERENCE_UTC_OFFSET_HOURS", 3, -12, 14);
  if (!isValidOffsetHours(referenceOffset)) throw new Error("Invalid env: REFERENCE_UTC_OFFSET_HOURS");
  return {
    SUPABASE_URL: values.SUPABASE_URL,
    SUPABASE_SERVICE_ROLE_KEY: values.SUPABASE_SERVICE_ROLE_KEY,
    PORT: intEnv("PORT", 3001, 1, 65535),
    LOG_LEVEL: process.env.LOG_LEVEL?.trim() || "info",
    TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN?.trim() || undefined,
    GROUP_CHAT_ID: chatIdEnv("GROUP_CHAT_ID"),
    CHANNEL_ID: process.env.CHANNEL_ID?.trim() || null,
    ADMIN_DASHBOARD_TOKEN: process.env.ADMIN_DASHBOARD_TOKEN?.trim() || undefined,
    REFERENCE_UTC_OFFSET_HOURS: referenceOffset,
    RITUAL_CATCH_UP_MINUTES: intEnv("RITUAL_CATCH_UP_MINUTES", 30, 1, 720),
    ENFORCEMENT_GRACE_MINUTES: intEnv("ENFORCEMENT_GRACE_MINUTES", 30, 1, 1440),
    ENFORCEMENT_SWEEP_MINUTES: intEnv("ENFORCEMENT_SWEEP_MINUTES", 1, 1, 60),
    SEND_CONCURRENCY: intEnv("SEND_CONCURRENCY", 5, 1, 30),
    RENEWAL_REMINDER_DAYS: intEnv("RENEWAL_REMINDER_DAYS", 3, 1, 30),
    SCHEDULER_ENABLED: (process.env.SCHEDULER_ENABLED?.trim() || "true").toLowerCase() !== "false"
  };
}

export const env = getEnv();

export const supabaseAdmin = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
  auth: { persistSession: false }
});
