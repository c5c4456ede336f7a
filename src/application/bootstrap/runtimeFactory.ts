import { Adjudicator } from "../services/adjudicator";
import { CurationPipeline } from "../services/curationPipeline";
import { DecisionJournal } from "../services/decisionJournal";
import { EvidenceGatherer } from "../services/evidenceGatherer";
import { LexicalScorer } from "../services/lexicalScorer";
import { PromotionEngine } from "../services/promotionEngine";
import { ScanScheduler } from "../services/scanScheduler";
import { UniverseBootstrapService } from "../services/universeBootstrapService";
import { UniverseStore } from "../services/universeStore";
import {
  adjudicationPolicy,
  callBudgetFor,
  env,
  promotionThresholds,
} from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import {
  InMemoryDecisionLogRepository,
  InMemorySchedulerStateRepository,
  InMemoryUniverseRepository,
  InMemoryWatchlistRepository,
} from "../../infra/db/inMemoryRepositories";
import {
  PostgresDecisionLogRepository,
  PostgresSchedulerStateRepository,
  PostgresUniverseRepository,
  PostgresWatchlistRepository,
} from "../../infra/db/repositories";
import { OllamaClassifier } from "../../infra/llm/ollamaClassifier";
import { FinnhubMarketDataProvider } from "../../infra/providers/finnhub/finnhubMarketDataProvider";
import { MockClassifier } from "../../infra/providers/mocks/mockClassifier";
import { MockMarketDataProvider } from "../../infra/providers/mocks/mockMarketDataProvider";
import { SecEdgarMentionsProvider } from "../../infra/providers/sec/secEdgarMentionsProvider";
import {
  BullMqScanQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import {
  SystemClock,
  TimerSleep,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import type {
  ClassifierPort,
  FilingMentionsProviderPort,
  MarketDataProviderPort,
} from "../../core/ports/inboundPorts";
import type {
  DecisionLogRepositoryPort,
  SchedulerStateRepositoryPort,
  UniverseRepositoryPort,
  WatchlistRepositoryPort,
} from "../../core/ports/outboundPorts";

type Repositories = {
  universe: UniverseRepositoryPort;
  watchlist: WatchlistRepositoryPort;
  decisionLog: DecisionLogRepositoryPort;
  state: SchedulerStateRepositoryPort;
  close: () => Promise<void>;
};

/**
 * The memory driver keeps everything process-local, so it only suits one-shot CLI runs and demos.
 */
const createRepositories = (): Repositories => {
  if (env.STORE_DRIVER === "memory") {
    return {
      universe: new InMemoryUniverseRepository(),
      watchlist: new InMemoryWatchlistRepository(),
      decisionLog: new InMemoryDecisionLogRepository(),
      state: new InMemorySchedulerStateRepository(),
      close: async () => {},
    };
  }

  const { db, sql } = createDb(env.POSTGRES_URL);
  return {
    universe: new PostgresUniverseRepository(db),
    watchlist: new PostgresWatchlistRepository(db),
    decisionLog: new PostgresDecisionLogRepository(db),
    state: new PostgresSchedulerStateRepository(db),
    close: () => sql.end(),
  };
};

const createMarketDataProvider = (): MarketDataProviderPort => {
  if (env.MARKET_DATA_PROVIDER === "finnhub") {
    return new FinnhubMarketDataProvider(
      env.FINNHUB_BASE_URL,
      env.FINNHUB_API_KEY,
      env.FINNHUB_TIMEOUT_MS,
    );
  }

  return new MockMarketDataProvider();
};

const createFilingMentionsProvider = (): FilingMentionsProviderPort | null => {
  if (env.FILINGS_PROVIDER === "sec-edgar") {
    return new SecEdgarMentionsProvider(
      env.SEC_EDGAR_SEARCH_URL,
      env.SEC_EDGAR_USER_AGENT,
      env.SEC_EDGAR_TIMEOUT_MS,
    );
  }

  return null;
};

const createClassifier = (): ClassifierPort => {
  if (env.CLASSIFIER_PROVIDER === "ollama") {
    return new OllamaClassifier(
      env.OLLAMA_BASE_URL,
      env.OLLAMA_CHAT_MODEL,
      env.OLLAMA_CHAT_TIMEOUT_MS,
    );
  }

  return new MockClassifier();
};

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = async () => {
  const repositories = createRepositories();

  const clock = new SystemClock();
  const sleeper = new TimerSleep();
  const ids = new UuidIdGenerator();

  const journal = new DecisionJournal(repositories.decisionLog, ids, clock);
  const store = new UniverseStore(repositories.universe, clock);
  const promotion = new PromotionEngine(
    repositories.watchlist,
    store,
    clock,
    promotionThresholds(),
  );

  const pipeline = new CurationPipeline({
    gatherer: new EvidenceGatherer(
      createMarketDataProvider(),
      clock,
      createFilingMentionsProvider(),
    ),
    scorer: new LexicalScorer(),
    adjudicator: new Adjudicator(createClassifier(), adjudicationPolicy()),
    store,
    promotion,
    journal,
    clock,
  });

  const scheduler = new ScanScheduler({
    store,
    watchlist: repositories.watchlist,
    state: repositories.state,
    pipeline,
    journal,
    clock,
    sleeper,
    settings: {
      minCallIntervalMs: env.SCAN_MIN_CALL_INTERVAL_MS,
      staleAfterDays: env.SCAN_STALE_AFTER_DAYS,
      defaultCallBudget: callBudgetFor,
    },
  });

  return {
    store,
    watchlist: repositories.watchlist,
    decisionLog: repositories.decisionLog,
    scheduler,
    bootstrap: new UniverseBootstrapService(store, journal),
    close: repositories.close,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;

/**
 * Opens a Redis connection, so only commands that touch the queue should call this.
 */
export const createScanQueue = () =>
  new BullMqScanQueue(redisConfigFromUrl(env.REDIS_URL));
