import { Queue, Worker, type Job } from 'bullmq';
import type { Logger } from '@threadcast/shared';
import type { JobData, JobName } from './jobs.js';

/** Narration queue manager using BullMQ + Redis.
 * One worker per process; each job narrates one thread start to finish. */

export interface QueueManagerOptions {
  redisUrl: string;
  concurrency?: number;
}

export interface JobStatus {
  id: string;
  name: string;
  state: 'completed' | 'failed' | 'active' | 'waiting';
  progress: number;
  attempts: number;
  timestamp: number;
  finishedOn?: number;
  failedReason?: string;
  data: JobData;
}

export type JobProcessor = (job: Job<JobData>) => Promise<unknown>;

export interface RedisConnection {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

const QUEUE_NAME = 'threadcast-narration';

export class QueueManager {
  private queue: Queue<JobData>;
  private worker: Worker<JobData> | null = null;
  private processors = new Map<string, JobProcessor>();
  private connection: RedisConnection;

  constructor(
    private options: QueueManagerOptions,
    private logger: Logger,
  ) {
    this.connection = parseRedisUrl(options.redisUrl);
    this.queue = new Queue<JobData>(QUEUE_NAME, { connection: this.connection });
  }

  /** Add a job to the queue */
  async addJob(
    name: JobName,
    data: JobData,
    options?: { delay?: number; priority?: number },
  ): Promise<string> {
    const job = await this.queue.add(name, data, {
      delay: options?.delay,
      priority: options?.priority,
      attempts: 3,
      backoff: { type: 'exponential', delay: 5000 },
    });

    if (!job.id) {
      throw new Error(`Queue returned no id for ${name} job`);
    }
    this.logger.info({ jobId: job.id, name }, 'Job added to queue');
    return job.id;
  }

  /** Register a processor for a job type. The worker starts with the first registration. */
  registerProcessor(name: JobName, processor: JobProcessor): void {
    this.processors.set(name, processor);
    if (this.worker) return;

    const worker = new Worker<JobData>(
      QUEUE_NAME,
      async (job) => {
        const handler = this.processors.get(job.name);
        if (!handler) {
          throw new Error(`No processor registered for ${job.name}`);
        }
        this.logger.info({ jobId: job.id, name: job.name }, 'Processing job');
        return handler(job);
      },
      {
        connection: this.connection,
        concurrency: this.options.concurrency ?? 1,
      },
    );

    worker.on('completed', (job) => {
      this.logger.info({ jobId: job.id, name: job.name }, 'Job completed');
    });

    worker.on('failed', (job, err) => {
      this.logger.error({ jobId: job?.id, name: job?.name, err: err.message }, 'Job failed');
    });

    this.worker = worker;
  }

  /** Get queue health stats */
  async getHealth(): Promise<{
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    delayed: number;
  }> {
    const [waiting, active, completed, failed, delayed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
      this.queue.getDelayedCount(),
    ]);

    return { waiting, active, completed, failed, delayed };
  }

  /** Get recent job history, newest first */
  async getJobHistory(limit = 20): Promise<JobStatus[]> {
    const [completed, failed, active, waiting] = await Promise.all([
      this.queue.getCompleted(0, limit),
      this.queue.getFailed(0, limit),
      this.queue.getActive(0, limit),
      this.queue.getWaiting(0, limit),
    ]);

    const allJobs = [...completed, ...failed, ...active, ...waiting];
    allJobs.sort((a, b) => (b.timestamp ?? 0) - (a.timestamp ?? 0));

    return allJobs.slice(0, limit).map((job) => ({
      id: job.id ?? '',
      name: job.name,
      state: jobState(job),
      progress: typeof job.progress === 'number' ? job.progress : 0,
      attempts: job.attemptsMade,
      timestamp: job.timestamp ?? 0,
      finishedOn: job.finishedOn ?? undefined,
      failedReason: job.failedReason || undefined,
      data: job.data,
    }));
  }

  /** Close the worker, then the queue */
  async shutdown(): Promise<void> {
    if (this.worker) await this.worker.close();
    await this.queue.close();
    this.logger.info('Queue manager shut down');
  }
}

function jobState(job: Job<JobData>): JobStatus['state'] {
  if (job.finishedOn) return job.failedReason ? 'failed' : 'completed';
  return job.processedOn ? 'active' : 'waiting';
}

export function parseRedisUrl(url: string): RedisConnection {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };
}
