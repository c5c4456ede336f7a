import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { ScanCadence, ScanConfig } from "../../core/entities/scan";
import type { ScanQueuePort } from "../../core/ports/outboundPorts";
import { SCAN_QUEUE_NAME, schedulerIdFor } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

export type CadenceSchedule = {
  config: ScanConfig;
  pattern: string;
};

/**
 * Scans run once per firing; deferred tickers wait for the next cron trigger.
 */
export const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: 100,
  removeOnFail: 500,
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  const db = Number.parseInt(parsed.pathname.replace("/", "").trim(), 10);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number.isFinite(db) ? db : 0,
  };
};

/**
 * Wraps BullMQ so application code depends on scan intent rather than queue vendor details.
 */
export class BullMqScanQueue implements ScanQueuePort {
  private readonly queue: Queue<ScanConfig>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<ScanConfig>(SCAN_QUEUE_NAME, {
      connection,
      defaultJobOptions,
    });
  }

  async enqueueScan(config: ScanConfig): Promise<void> {
    await this.queue.add(schedulerIdFor(config.cadence), config);
  }

  /**
   * Upserts one cron-driven job scheduler per cadence; re-running replaces patterns in place.
   */
  async registerSchedulers(
    schedules: CadenceSchedule[],
    timezone: string,
  ): Promise<ScanCadence[]> {
    for (const { config, pattern } of schedules) {
      const id = schedulerIdFor(config.cadence);
      await this.queue.upsertJobScheduler(
        id,
        { pattern, tz: timezone },
        { name: id, data: config },
      );
    }

    return schedules.map((schedule) => schedule.config.cadence);
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * One scan at a time per worker process.
 */
export const createScanWorker = <TResult>(
  connection: RedisOptions,
  processor: (data: unknown) => Promise<TResult>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency: 1,
  };

  return new Worker<unknown, TResult>(
    SCAN_QUEUE_NAME,
    async (job) => processor(job.data),
    options,
  );
};
