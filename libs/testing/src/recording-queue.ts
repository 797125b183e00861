import { QueueMessage } from '@weatherscape/queue-jobs';

export interface RecordedJob<T> {
  id: string;
  name: string;
  data: T;
  opts: RecordedJobOptions;
}

export interface RecordedJobOptions {
  jobId?: string;
  [option: string]: unknown;
}

export interface RecordedScheduler {
  id: string;
  repeat: Record<string, unknown>;
  template: Record<string, unknown>;
}

/**
 * Stand-in for a BullMQ queue. Jobs added with an id that was already seen
 * are dropped, as BullMQ does while the earlier job is retained.
 */
export class RecordingQueue<T = unknown> {
  readonly added: RecordedJob<T>[] = [];
  readonly schedulers: RecordedScheduler[] = [];
  private pending: RecordedJob<T>[] = [];
  private nextId = 1;
  private failAfter: number | null = null;
  private failure: Error = new Error('queue unavailable');

  constructor(readonly name: string) {}

  async add(name: string, data: T, opts: RecordedJobOptions = {}): Promise<RecordedJob<T>> {
    if (this.failAfter !== null && this.added.length >= this.failAfter) {
      throw this.failure;
    }

    const existing = opts.jobId !== undefined ? this.added.find((job) => job.id === opts.jobId) : undefined;
    if (existing) return existing;

    const id = opts.jobId ?? String(this.nextId++);
    const job: RecordedJob<T> = { id, name, data: structuredClone(data), opts };
    this.added.push(job);
    this.pending.push(job);
    return job;
  }

  async upsertJobScheduler(
    id: string,
    repeat: Record<string, unknown>,
    template: Record<string, unknown> = {},
  ): Promise<void> {
    const index = this.schedulers.findIndex((scheduler) => scheduler.id === id);
    const scheduler = { id, repeat, template };
    if (index >= 0) {
      this.schedulers[index] = scheduler;
    } else {
      this.schedulers.push(scheduler);
    }
  }

  /** Makes every `add` fail once `count` jobs have been accepted. */
  failAfterJobs(count: number | null, error?: Error): void {
    this.failAfter = count;
    if (error) this.failure = error;
  }

  /** Hands the pending jobs to a consumer as fresh deliveries. */
  drain(): QueueMessage[] {
    const jobs = this.pending;
    this.pending = [];
    return jobs.map((job) => {
      const body: unknown = JSON.parse(JSON.stringify(job.data));
      return new QueueMessage(job.id, body);
    });
  }

  get pendingCount(): number {
    return this.pending.length;
  }
}
