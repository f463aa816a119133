import { LRUCache } from "lru-cache";
import type { JobProgress, JobSnapshot } from "@docindex/types";
import { CancelledError, ConflictError } from "@docindex/errors";
import type { Logger } from "@docindex/logger";

export interface JobContext {
  signal: AbortSignal;
  reportProgress(progress: JobProgress): void;
}

export type JobTask<TResult> = (context: JobContext) => Promise<TResult>;

export interface JobSupervisorOptions {
  logger: Logger;
  /** Settled jobs kept for `get` and `list`. */
  historySize?: number;
  now?: () => Date;
}

interface RunningJob<TResult> {
  controller: AbortController;
  snapshot: JobSnapshot<TResult>;
  done: Promise<void>;
}

function copy<TResult>(snapshot: JobSnapshot<TResult>): JobSnapshot<TResult> {
  return { ...snapshot, progress: { ...snapshot.progress } };
}

/**
 * Owns background jobs keyed by id. Each job gets its own AbortController;
 * a job leaves the live set when it settles and its final snapshot moves
 * into a bounded history.
 */
export class JobSupervisor<TResult> {
  private readonly running = new Map<string, RunningJob<TResult>>();
  private readonly history: LRUCache<string, JobSnapshot<TResult>>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: JobSupervisorOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.history = new LRUCache<string, JobSnapshot<TResult>>({ max: options.historySize ?? 100 });
  }

  start(jobId: string, task: JobTask<TResult>): JobSnapshot<TResult> {
    if (this.running.has(jobId)) {
      throw new ConflictError(`Job ${jobId} is already running`);
    }

    const job: RunningJob<TResult> = {
      controller: new AbortController(),
      snapshot: {
        id: jobId,
        status: "running",
        startedAt: this.now(),
        progress: { completed: 0, total: 0 },
      },
      done: Promise.resolve(),
    };
    this.history.delete(jobId);
    this.running.set(jobId, job);
    job.done = this.execute(job, task);

    this.logger.info({ jobId }, "Job started");
    return copy(job.snapshot);
  }

  /** Request cancellation. Returns false when no such job is running. */
  cancel(jobId: string): boolean {
    const job = this.running.get(jobId);
    if (!job) {
      return false;
    }
    job.controller.abort();
    this.logger.info({ jobId }, "Job cancellation requested");
    return true;
  }

  get(jobId: string): JobSnapshot<TResult> | undefined {
    const job = this.running.get(jobId);
    if (job) {
      return copy(job.snapshot);
    }
    const settled = this.history.get(jobId);
    return settled ? copy(settled) : undefined;
  }

  list(): JobSnapshot<TResult>[] {
    const live = [...this.running.values()].map((job) => copy(job.snapshot));
    const settled = [...this.history.values()].map((snapshot) => copy(snapshot));
    return [...live, ...settled];
  }

  /** Resolve once the job settles; immediately for unknown or settled jobs. */
  async wait(jobId: string): Promise<JobSnapshot<TResult> | undefined> {
    const job = this.running.get(jobId);
    if (job) {
      await job.done;
    }
    return this.get(jobId);
  }

  async shutdown(): Promise<void> {
    const jobs = [...this.running.values()];
    for (const job of jobs) {
      job.controller.abort();
    }
    await Promise.all(jobs.map((job) => job.done));
    if (jobs.length > 0) {
      this.logger.info({ cancelled: jobs.length }, "Job supervisor shut down");
    }
  }

  private async execute(job: RunningJob<TResult>, task: JobTask<TResult>): Promise<void> {
    const { snapshot, controller } = job;
    try {
      const result = await task({
        signal: controller.signal,
        reportProgress: (progress) => {
          snapshot.progress = { ...progress };
        },
      });
      snapshot.status = "completed";
      snapshot.result = result;
      this.logger.info({ jobId: snapshot.id }, "Job completed");
    } catch (error: unknown) {
      if (error instanceof CancelledError || controller.signal.aborted) {
        snapshot.status = "cancelled";
        this.logger.info({ jobId: snapshot.id }, "Job cancelled");
      } else {
        snapshot.status = "failed";
        snapshot.error = error instanceof Error ? error.message : String(error);
        this.logger.error({ err: error, jobId: snapshot.id }, "Job failed");
      }
    } finally {
      snapshot.finishedAt = this.now();
      this.running.delete(snapshot.id);
      this.history.set(snapshot.id, snapshot);
    }
  }
}
