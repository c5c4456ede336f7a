import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { toErrorDetails } from "../core/entities/appError";
import {
  createScanWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      storeDriver: env.STORE_DRIVER,
      marketDataProvider: env.MARKET_DATA_PROVIDER,
      finnhubApiKeyConfigured: env.FINNHUB_API_KEY.trim().length > 0,
      filingsProvider: env.FILINGS_PROVIDER,
      classifierProvider: env.CLASSIFIER_PROVIDER,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createScanWorker(redisConfigFromUrl(env.REDIS_URL), (data) =>
    runtime.scheduler.run(data),
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info({ jobId: job.id, name: job.name }, "Scan job started");
  });

  worker.on("completed", (job, report) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        cadence: report.cadence,
        durationMs,
        processed: report.processed,
        skipped: report.skipped,
        failed: report.failed,
        deferred: report.deferred,
        callsUsed: report.callsUsed,
        promoted: report.promoted,
        demoted: report.demoted,
      },
      "Scan job completed",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        name: job?.name,
        durationMs,
        error: toErrorDetails(error),
      },
      "Scan job failed",
    );
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];
  signals.forEach((signal) =>
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    }),
  );

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
