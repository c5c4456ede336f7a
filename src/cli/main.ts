import { Command, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import {
  createRuntime,
  createScanQueue,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import type { BootstrapReport } from "../application/services/universeBootstrapService";
import { formatSummary } from "../application/services/universeReport";
import type { CurationFailure } from "../core/entities/appError";
import {
  universeCategories,
  type CandidateEntry,
  type UniverseQuery,
} from "../core/entities/candidate";
import {
  scanCadences,
  type ScanCadence,
  type ScanConfig,
  type ScanReport,
} from "../core/entities/scan";
import type { CadenceSchedule } from "../infra/queue/bullMqQueue";
import { readUniverseCsv } from "../infra/files/csvUniverseSource";
import { cadenceDefaults, env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const cadenceSchema = z.enum(scanCadences);
const categorySchema = z.enum(universeCategories);

const parseInteger =
  (label: string) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }
    return parsed;
  };

const describeFailure = (failure: CurationFailure): string =>
  failure.kind === "budget_exceeded"
    ? `call budget exhausted (${failure.used}/${failure.ceiling})`
    : failure.reason;

const configFor = (cadence: ScanCadence): ScanConfig => {
  const defaults = cadenceDefaults(cadence);
  return {
    cadence,
    batchSize: defaults.batchSize,
    scoreFloorForInclusion: defaults.scoreFloorForInclusion,
    callBudget: defaults.callBudget,
  };
};

/**
 * Formats a scan report into a compact terminal summary for manual runs.
 */
export const formatScanReport = (report: ScanReport): string => {
  const seconds =
    (report.finishedAt.getTime() - report.startedAt.getTime()) / 1_000;
  const lines = [
    `${report.cadence} scan finished in ${seconds.toFixed(1)}s`,
    `selected=${report.selected} processed=${report.processed} skipped=${report.skipped} failed=${report.failed} deferred=${report.deferred}`,
    `calls=${report.callsUsed}/${report.callBudget}${report.budgetExhausted ? " (budget exhausted)" : ""}`,
  ];

  if (report.focusCategory) {
    lines.push(`focus category: ${report.focusCategory}`);
  }
  if (report.progressiveCursor) {
    const { from, to, total } = report.progressiveCursor;
    lines.push(`progressive cursor: ${from} -> ${to} of ${total}`);
  }

  lines.push(`promoted: ${report.promoted.join(", ") || "none"}`);
  lines.push(`demoted: ${report.demoted.join(", ") || "none"}`);
  lines.push(`deactivated: ${report.deactivated.join(", ") || "none"}`);

  report.outcomes.forEach((outcome) => {
    if (outcome.status !== "scored") {
      lines.push(
        `- ${outcome.ticker} ${outcome.status}: ${describeFailure(outcome.failure)}`,
      );
    }
  });

  if (report.summary) {
    lines.push("");
    lines.push(formatSummary(report.summary.current, report.summary.delta));
  }

  return lines.join("\n");
};

export const formatBootstrapReport = (report: BootstrapReport): string => {
  const lines = [
    `accepted=${report.accepted} inserted=${report.inserted} updated=${report.updated} rejected=${report.rejected.length}`,
  ];
  report.rejected.forEach((rejection) => {
    lines.push(`- line ${rejection.line}: ${rejection.reason}`);
  });
  return lines.join("\n");
};

export const formatUniverseTable = (entries: CandidateEntry[]): string => {
  if (entries.length === 0) {
    return "No matching entries.";
  }

  return entries
    .map((entry) =>
      [
        entry.ticker.padEnd(8),
        String(entry.score).padStart(3),
        entry.category.padEnd(17),
        entry.isActive ? "active  " : "inactive",
        entry.lastScanned ? entry.lastScanned.toISOString() : "never scanned",
      ].join("  "),
    )
    .join("\n");
};

/**
 * Runs one command against a fresh runtime and always releases its connections.
 */
const withRuntime = async (
  work: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await work(runtime);
  } finally {
    await runtime.close();
  }
};

const withQueue = async (
  work: (queue: ReturnType<typeof createScanQueue>) => Promise<void>,
): Promise<void> => {
  const queue = createScanQueue();
  try {
    await work(queue);
  } finally {
    await queue.close();
  }
};

const cadenceOption = () =>
  new Option("--cadence <cadence>", "Scan cadence")
    .choices(scanCadences)
    .makeOptionMandatory();

/**
 * Defines a single command surface so manual runs and scheduled jobs share the same services.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("ai-universe-curator").description("AI trading universe curator");

  cli
    .command("bootstrap")
    .description("Load or refresh the universe from a constituents CSV")
    .requiredOption("--file <path>", "CSV with Ticker/Symbol, Name, Sector")
    .action(async (opts: { file: string }) => {
      const table = await readUniverseCsv(opts.file);
      await withRuntime(async (runtime) => {
        const report = await runtime.bootstrap.ingest(table);
        console.log(formatBootstrapReport(report));
      });
    });

  cli
    .command("scan")
    .description("Run one scan pass in this process")
    .addOption(cadenceOption())
    .option("--batch-size <n>", "Tickers to select", parseInteger("batch size"))
    .option("--floor <score>", "Minimum score for inclusion", parseInteger("floor"))
    .option("--budget <calls>", "External call ceiling", parseInteger("budget"))
    .action(
      async (opts: {
        cadence: string;
        batchSize?: number;
        floor?: number;
        budget?: number;
      }) => {
        const defaults = configFor(cadenceSchema.parse(opts.cadence));
        await withRuntime(async (runtime) => {
          const report = await runtime.scheduler.run({
            ...defaults,
            batchSize: opts.batchSize ?? defaults.batchSize,
            scoreFloorForInclusion: opts.floor ?? defaults.scoreFloorForInclusion,
            callBudget: opts.budget ?? defaults.callBudget,
          });
          console.log(formatScanReport(report));
        });
      },
    );

  cli
    .command("enqueue")
    .description("Queue one scan for the worker")
    .addOption(cadenceOption())
    .action(async (opts: { cadence: string }) => {
      const config = configFor(cadenceSchema.parse(opts.cadence));
      await withQueue(async (queue) => {
        await queue.enqueueScan(config);
      });
      logger.info({ config }, "Enqueued scan");
    });

  cli
    .command("schedule")
    .description("Register the daily, weekly and monthly cron schedulers")
    .action(async () => {
      const schedules: CadenceSchedule[] = scanCadences.map((cadence) => ({
        config: configFor(cadence),
        pattern: cadenceDefaults(cadence).cron,
      }));

      await withQueue(async (queue) => {
        const registered = await queue.registerSchedulers(
          schedules,
          env.SCHEDULER_TIMEZONE,
        );
        logger.info(
          {
            registered,
            timezone: env.SCHEDULER_TIMEZONE,
            patterns: schedules.map((schedule) => schedule.pattern),
          },
          "Scan schedulers registered",
        );
      });
    });

  cli
    .command("universe")
    .description("List universe entries, highest score first")
    .option("--active", "Only active entries")
    .option("--inactive", "Only inactive entries")
    .option("--min-score <score>", "Minimum score", parseInteger("min score"))
    .addOption(
      new Option("--category <category>", "Category").choices(
        universeCategories,
      ),
    )
    .option("--limit <n>", "Maximum rows", parseInteger("limit"), 50)
    .action(
      async (opts: {
        active?: boolean;
        inactive?: boolean;
        minScore?: number;
        category?: string;
        limit: number;
      }) => {
        if (opts.active && opts.inactive) {
          throw new InvalidArgumentError(
            "--active and --inactive cannot be combined.",
          );
        }

        const filters: UniverseQuery = {
          isActive: opts.active ? true : opts.inactive ? false : undefined,
          minScore: opts.minScore,
          category:
            opts.category === undefined
              ? undefined
              : categorySchema.parse(opts.category),
          limit: opts.limit,
        };

        await withRuntime(async (runtime) => {
          console.log(formatUniverseTable(await runtime.store.query(filters)));
        });
      },
    );

  const pinCommand = (name: string, pinned: boolean) =>
    cli
      .command(name)
      .description(
        pinned
          ? "Protect a watchlist row from demotion"
          : "Allow a watchlist row to be demoted again",
      )
      .requiredOption("--ticker <ticker>", "Ticker symbol")
      .action(async (opts: { ticker: string }) => {
        const ticker = opts.ticker.trim().toUpperCase();
        await withRuntime(async (runtime) => {
          const updated = await runtime.watchlist.setPinned(ticker, pinned);
          if (!updated) {
            logger.warn({ ticker }, "Ticker is not on the watchlist");
            process.exitCode = 1;
            return;
          }
          logger.info({ ticker, pinned }, "Watchlist pin updated");
        });
      });

  pinCommand("pin", true);
  pinCommand("unpin", false);

  cli
    .command("status")
    .description("Report universe, watchlist and queue state")
    .option("--journal <n>", "Recent journal entries to show", parseInteger("journal"), 10)
    .action(async (opts: { journal: number }) => {
      await withRuntime(async (runtime) => {
        const [total, active, watchlist, journal] = await Promise.all([
          runtime.store.count(),
          runtime.store.query({ isActive: true }),
          runtime.watchlist.list(),
          runtime.decisionLog.listRecent(opts.journal),
        ]);

        await withQueue(async (queue) => {
          logger.info(
            {
              storeDriver: env.STORE_DRIVER,
              marketDataProvider: env.MARKET_DATA_PROVIDER,
              filingsProvider: env.FILINGS_PROVIDER,
              classifierProvider: env.CLASSIFIER_PROVIDER,
              universe: { total, active: active.length },
              watchlist: watchlist.map((entry) => ({
                ticker: entry.ticker,
                score: entry.score,
                status: entry.status,
                pinned: entry.pinned,
              })),
              journal: journal.map(
                (record) =>
                  `${record.createdAt.toISOString()} [${record.category}] ${record.content}`,
              ),
              queueCounts: await queue.getQueueCounts(),
            },
            "Runtime status",
          );
        });
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
