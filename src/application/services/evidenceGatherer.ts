import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  EvidenceUnavailable,
} from "../../core/entities/appError";
import type { Evidence } from "../../core/entities/scan";
import type {
  CompanyProfile,
  FilingMentionsProviderPort,
  MarketDataProviderPort,
} from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { daysBefore } from "../../shared/time/dateUtils";
import { logger } from "../../shared/logger/logger";

export type GatherOptions = {
  lookbackDays: number;
  includeFilings: boolean;
  /** Filing search window; defaults to a year, the span of an annual report. */
  filingsLookbackDays?: number;
  /** Known name from the universe row; improves filing search when the profile lacks one. */
  companyName?: string | null;
};

const FILINGS_LOOKBACK_DAYS = 365;

/**
 * Collects the text corpus the lexical scorer consumes. Failures are reported, never retried in-pass.
 */
export class EvidenceGatherer {
  constructor(
    private readonly marketData: MarketDataProviderPort,
    private readonly clock: ClockPort,
    private readonly filingMentions: FilingMentionsProviderPort | null = null,
  ) {}

  async gather(
    ticker: string,
    options: GatherOptions,
  ): Promise<Result<Evidence, EvidenceUnavailable>> {
    const symbol = ticker.toUpperCase();
    const now = this.clock.now();

    const fetched = await this.fetchProfileAndNews(
      symbol,
      options.lookbackDays,
      now,
    );
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const { profile, headlines } = fetched.value;
    const companyName = profile.name ?? options.companyName ?? null;

    return ok({
      ticker: symbol,
      companyName,
      sector: profile.sector,
      description: profile.description,
      headlines,
      filingSnippets: options.includeFilings
        ? await this.fetchFilingSnippets(
            symbol,
            companyName,
            daysBefore(now, options.filingsLookbackDays ?? FILINGS_LOOKBACK_DAYS),
            now,
          )
        : [],
    });
  }

  private async fetchProfileAndNews(
    ticker: string,
    lookbackDays: number,
    now: Date,
  ): Promise<
    Result<{ profile: CompanyProfile; headlines: string[] }, EvidenceUnavailable>
  > {
    try {
      const [profileResult, newsResult] = await Promise.all([
        this.marketData.getProfile(ticker),
        this.marketData.getRecentNews({ ticker, days: lookbackDays, asOf: now }),
      ]);

      if (profileResult.isErr()) {
        return err(this.unavailable(ticker, "profile", profileResult.error));
      }

      if (newsResult.isErr()) {
        return err(this.unavailable(ticker, "news", newsResult.error));
      }

      return ok({
        profile: profileResult.value,
        headlines: newsResult.value.map((item) => item.headline),
      });
    } catch (error) {
      return err({
        kind: "evidence_unavailable",
        ticker,
        reason:
          error instanceof Error ? error.message : "Market data call failed.",
      });
    }
  }

  /**
   * Filing snippets are supplementary; a failed lookup drops them without failing the gather.
   */
  private async fetchFilingSnippets(
    ticker: string,
    companyName: string | null,
    from: Date,
    now: Date,
  ): Promise<string[]> {
    if (!this.filingMentions) {
      return [];
    }

    const result = await this.filingMentions.fetchMentions({
      ticker,
      companyName,
      from,
      to: now,
    });

    if (result.isErr()) {
      logger.warn(
        {
          ticker,
          provider: result.error.provider,
          code: result.error.code,
          reason: result.error.message,
        },
        "Filing mentions unavailable; continuing without them",
      );
      return [];
    }

    return result.value.snippets;
  }

  private unavailable(
    ticker: string,
    call: "profile" | "news",
    boundary: AppBoundaryError,
  ): EvidenceUnavailable {
    return {
      kind: "evidence_unavailable",
      ticker,
      reason: `${call} ${boundary.code}: ${boundary.message}`,
      boundary,
    };
  }
}
