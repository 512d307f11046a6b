import { describe, expect, it, vi } from "vitest";
import { Scheduler, type JobDefinition } from "../src/scheduler.js";
import { silentLogger } from "./fakes.js";

const opts = { referenceOffsetHours: 3, clockCatchUpMinutes: 60 };

function job(id: string, trigger: JobDefinition["trigger"], run: JobDefinition["run"] = async () => "done"): JobDefinition {
  return { id, name: id, trigger, run };
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Scheduler", () => {
  it("runs interval jobs once per interval", async () => {
    const run = vi.fn(async () => "ok");
    const s = new Scheduler([job("tick", { type: "interval", everyMinutes: 1 }, run)], silentLogger, opts);
    const t0 = Date.parse("2025-03-03T10:00:00Z");
    expect(await s.tick(new Date(t0))).toEqual(["tick"]);
    expect(await s.tick(new Date(t0 + 30000))).toEqual([]);
    expect(await s.tick(new Date(t0 + 59500))).toEqual(["tick"]);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("never overlaps a job with itself", async () => {
    const gate = deferred();
    const s = new Scheduler([job("slow", { type: "interval", everyMinutes: 1 }, () => gate.promise)], silentLogger, opts);
    const now = new Date("2025-03-03T10:00:00Z");
    const first = s.runJob("slow", now);
    expect(await s.runJob("slow", now)).toEqual({ ok: false, skipped: "already_running" });
    expect(await s.tick(new Date("2025-03-03T10:05:00Z"))).toEqual([]);
    gate.resolve();
    expect(await first).toEqual({ ok: true, result: undefined });
  });

  it("runs a daily job once at its reference-time slot", async () => {
    const run = vi.fn(async () => 1);
    const s = new Scheduler([job("noon", { type: "daily", hour: 12, minute: 0 }, run)], silentLogger, opts);
    expect(s.isDue("noon", new Date("2025-03-03T08:59:00Z"))).toBe(false);
    expect(await s.tick(new Date("2025-03-03T09:00:00Z"))).toEqual(["noon"]);
    expect(await s.tick(new Date("2025-03-03T09:01:00Z"))).toEqual([]);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("retries a failed clock job inside the catch-up window", async () => {
    const run = vi.fn(async () => {
      throw new Error("store down");
    });
    const s = new Scheduler([job("noon", { type: "daily", hour: 12, minute: 0 }, run)], silentLogger, opts);
    await s.tick(new Date("2025-03-03T09:00:00Z"));
    expect(s.getJobsStatus()[0]).toMatchObject({ runs: 1, last_error: "store down", last_succeeded_at: null, trigger: "daily at 12:00" });
    expect(await s.tick(new Date("2025-03-03T09:01:00Z"))).toEqual(["noon"]);
    expect(await s.tick(new Date("2025-03-03T10:00:00Z"))).toEqual([]);
  });

  it("gates weekly jobs on the reference weekday", () => {
    const s = new Scheduler([job("sunday", { type: "weekly", weekday: 6, hour: 23, minute: 0 })], silentLogger, opts);
    expect(s.isDue("sunday", new Date("2025-03-08T20:00:00Z"))).toBe(false);
    expect(s.isDue("sunday", new Date("2025-03-09T20:00:00Z"))).toBe(true);
  });

  it("rejects duplicate job ids and unknown jobs", async () => {
    expect(() => new Scheduler([job("a", { type: "interval", everyMinutes: 1 }), job("a", { type: "interval", everyMinutes: 5 })], silentLogger, opts)).toThrow(
      "Duplicate job id: a"
    );
    const s = new Scheduler([], silentLogger, opts);
    expect(s.hasJob("a")).toBe(false);
    await expect(s.runJob("a")).rejects.toThrow("Unknown job: a");
  });

  it("waits for running jobs on stop", async () => {
    const gate = deferred();
    const s = new Scheduler([job("slow", { type: "interval", everyMinutes: 1 }, () => gate.promise)], silentLogger, opts);
    const run = s.runJob("slow", new Date("2025-03-03T10:00:00Z"));
    let stopped = false;
    const stopping = s.stop().then(() => {
      stopped = true;
    });
    await new Promise((r) => setTimeout(r, 20));
    expect(stopped).toBe(false);
    gate.resolve();
    await run;
    await stopping;
    expect(stopped).toBe(true);
  });
});
