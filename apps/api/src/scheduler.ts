import type { Logger } from "pino";
import { errorMessage } from "./errors.js";
import { MINUTE_MS, lastOccurrenceAt } from "./utils/time.js";

export type JobTrigger =
  | { type: "interval"; everyMinutes: number }
  | { type: "daily"; hour: number; minute: number }
  // weekday: 0 = Monday .. 6 = Sunday
  | { type: "weekly"; weekday: number; hour: number; minute: number };

export type JobDefinition = {
  id: string;
  name: string;
  trigger: JobTrigger;
  run: (now: Date) => Promise<unknown>;
};

export type JobStatus = {
  id: string;
  name: string;
  trigger: string;
  running: boolean;
  runs: number;
  last_started_at: string | null;
  last_finished_at: string | null;
  last_succeeded_at: string | null;
  last_error: string | null;
  last_result: unknown;
};

export type JobRunResult = { ok: true; result: unknown } | { ok: false; error: string } | { ok: false; skipped: "already_running" };

export type SchedulerOptions = {
  referenceOffsetHours: number;
  // Clock jobs missed by up to this many minutes still run (and retry on failure inside the window).
  clockCatchUpMinutes?: number;
  tickMs?: number;
  clock?: () => Date;
};

type JobState = {
  def: JobDefinition;
  running: boolean;
  runs: number;
  lastStartedAt: Date | null;
  lastFinishedAt: Date | null;
  lastSucceededAt: Date | null;
  lastError: string | null;
  lastResult: unknown;
};

// Ticks never wait for a full minute boundary; allow for timer drift.
const INTERVAL_SLACK_MS = 1000;

function describeTrigger(t: JobTrigger): string {
  const hhmm = (h: number, m: number) => `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
  if (t.type === "interval") return `every ${t.everyMinutes} min`;
  if (t.type === "daily") return `daily at ${hhmm(t.hour, t.minute)}`;
  return `weekly on day ${t.weekday} at ${hhmm(t.hour, t.minute)}`;
}

export class Scheduler {
  private readonly jobs = new Map<string, JobState>();
  private readonly log: Logger;
  private readonly clock: () => Date;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    jobs: JobDefinition[],
    logger: Logger,
    private readonly opts: SchedulerOptions
  ) {
    this.log = logger.child({ component: "scheduler" });
    this.clock = opts.clock ?? (() => new Date());
    for (const def of jobs) {
      if (this.jobs.has(def.id)) throw new Error(`Duplicate job id: ${def.id}`);
      this.jobs.set(def.id, {
        def,
        running: false,
        runs: 0,
        lastStartedAt: null,
        lastFinishedAt: null,
        lastSucceededAt: null,
        lastError: null,
        lastResult: null
      });
    }
  }

  start(): void {
    if (this.timer) return;
    const tickMs = this.opts.tickMs ?? MINUTE_MS;
    this.timer = setInterval(() => {
      this.tick(this.clock()).catch((e) => this.log.error({ err: errorMessage(e) }, "scheduler tick failed"));
    }, tickMs);
    this.log.info({ jobs: Array.from(this.jobs.keys()), tick_ms: tickMs }, "scheduler started");
  }

  // Resolves once in-flight job runs have settled.
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    while (Array.from(this.jobs.values()).some((j) => j.running)) {
      await new Promise((resolve) => setTimeout(resolve, 50));
    }
    this.log.info("scheduler stopped");
  }

  isDue(id: string, now: Date): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    const t = job.def.trigger;
    if (t.type === "interval") {
      if (!job.lastStartedAt) return true;
      return now.getTime() - job.lastStartedAt.getTime() >= t.everyMinutes * MINUTE_MS - INTERVAL_SLACK_MS;
    }
    const occurrence = lastOccurrenceAt(
      { hour: t.hour, minute: t.minute, weekday: t.type === "weekly" ? t.weekday : null },
      this.opts.referenceOffsetHours,
      now
    );
    const catchUpMs = (this.opts.clockCatchUpMinutes ?? 60) * MINUTE_MS;
    if (now.getTime() - occurrence.getTime() >= catchUpMs) return false;
    return !job.lastSucceededAt || job.lastSucceededAt.getTime() < occurrence.getTime();
  }

  // Starts every due job that is not already running, then waits for those runs.
  async tick(now: Date): Promise<string[]> {
    const started: Array<Promise<JobRunResult>> = [];
    const ids: string[] = [];
    for (const [id, job] of this.jobs) {
      if (job.running || !this.isDue(id, now)) continue;
      ids.push(id);
      started.push(this.runJob(id, now));
    }
    await Promise.all(started);
    return ids;
  }

  async runJob(id: string, now: Date = this.clock()): Promise<JobRunResult> {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`Unknown job: ${id}`);
    if (job.running) {
      this.log.warn({ job: id }, "job still running, skipped");
      return { ok: false, skipped: "already_running" };
    }
    job.running = true;
    job.runs += 1;
    job.lastStartedAt = now;
    try {
      const result = await job.def.run(now);
      job.lastResult = result;
      job.lastError = null;
      job.lastSucceededAt = now;
      return { ok: true, result };
    } catch (e) {
      job.lastError = errorMessage(e);
      this.log.error({ job: id, err: job.lastError }, "job failed");
      return { ok: false, error: job.lastError };
    } finally {
      job.running = false;
      job.lastFinishedAt = this.clock();
    }
  }

  hasJob(id: string): boolean {
    return this.jobs.has(id);
  }

  getJobsStatus(): JobStatus[] {
    return Array.from(this.jobs.values(), (j) => ({
      id: j.def.id,
      name: j.def.name,
      trigger: describeTrigger(j.def.trigger),
      running: j.running,
      runs: j.runs,
      last_started_at: j.lastStartedAt?.toISOString() ?? null,
      last_finished_at: j.lastFinishedAt?.toISOString() ?? null,
      last_succeeded_at: j.lastSucceededAt?.toISOString() ?? null,
      last_error: j.lastError,
      last_result: j.lastResult
    }));
  }
}
