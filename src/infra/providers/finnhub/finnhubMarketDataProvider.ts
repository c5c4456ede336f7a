import type {
  CompanyProfile,
  MarketDataProviderPort,
  RecentNewsRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { NewsHeadline } from "../../../core/entities/scan";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  HttpJsonClient,
  toBoundaryCode,
  type HttpClientError,
} from "../../http/httpJsonClient";
import { daysBefore, toIsoDate } from "../../../shared/time/dateUtils";

const profileSchema = z
  .object({
    ticker: z.string().optional(),
    name: z.string().optional(),
    finnhubIndustry: z.string().optional(),
    description: z.string().optional(),
    weburl: z.string().optional(),
  })
  .passthrough();

const newsItemSchema = z
  .object({
    headline: z.string().optional(),
    datetime: z.number().optional(),
  })
  .passthrough();

const MAX_HEADLINES = 10;

/**
 * Reads company profiles and company news from Finnhub for evidence gathering.
 */
export class FinnhubMarketDataProvider implements MarketDataProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FINNHUB_API_KEY is required when MARKET_DATA_PROVIDER is set to finnhub.",
      );
    }
  }

  /**
   * Finnhub answers unknown symbols with `{}`, which is surfaced as not_found.
   */
  async getProfile(
    ticker: string,
  ): Promise<Result<CompanyProfile, AppBoundaryError>> {
    const symbol = ticker.toUpperCase();
    const payloadResult = await this.get("/api/v1/stock/profile2", {
      symbol,
    });

    if (payloadResult.isErr()) {
      return err(this.fromHttpError(payloadResult.error, symbol));
    }

    const parsed = profileSchema.safeParse(payloadResult.value);
    if (!parsed.success) {
      return err(
        this.boundaryError(
          "malformed_response",
          "Finnhub profile response did not match the expected shape.",
          symbol,
          parsed.error,
        ),
      );
    }

    const profile = parsed.data;
    const name = profile.name?.trim() || null;
    if (!name && !profile.ticker) {
      return err(
        this.boundaryError(
          "not_found",
          `Finnhub has no profile for ${symbol}.`,
          symbol,
        ),
      );
    }

    const sector = profile.finnhubIndustry?.trim() || null;

    return ok({
      ticker: symbol,
      name,
      sector,
      description: [name, sector, profile.description?.trim()]
        .filter((part): part is string => Boolean(part))
        .join(". "),
    });
  }

  /**
   * Returns the most recent headlines inside the look-back window, newest first.
   */
  async getRecentNews(
    request: RecentNewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>> {
    const symbol = request.ticker.toUpperCase();
    const from = daysBefore(request.asOf, request.days);
    const payloadResult = await this.get("/api/v1/company-news", {
      symbol,
      from: toIsoDate(from),
      to: toIsoDate(request.asOf),
    });

    if (payloadResult.isErr()) {
      return err(this.fromHttpError(payloadResult.error, symbol));
    }

    const parsed = z.array(z.unknown()).safeParse(payloadResult.value);
    if (!parsed.success) {
      return err(
        this.boundaryError(
          "malformed_response",
          "Finnhub news response was not an array.",
          symbol,
          parsed.error,
        ),
      );
    }

    return ok(
      parsed.data
        .map((raw) => this.toHeadline(raw))
        .filter((item): item is NewsHeadline => item !== null)
        .filter((item) => item.publishedAt.getTime() >= from.getTime())
        .sort(
          (left, right) =>
            right.publishedAt.getTime() - left.publishedAt.getTime(),
        )
        .slice(0, MAX_HEADLINES),
    );
  }

  private get(path: string, query: Record<string, string>) {
    return this.httpClient.requestJson({
      url: new URL(path, this.baseUrl).toString(),
      method: "GET",
      query: { ...query, token: this.apiKey },
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 250,
    });
  }

  private toHeadline(raw: unknown): NewsHeadline | null {
    const parsed = newsItemSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }

    const headline = parsed.data.headline?.trim();
    if (!headline || typeof parsed.data.datetime !== "number") {
      return null;
    }

    return {
      headline,
      publishedAt: new Date(parsed.data.datetime * 1000),
    };
  }

  private fromHttpError(
    failure: HttpClientError,
    symbol: string,
  ): AppBoundaryError {
    return {
      source: "market-data",
      code: toBoundaryCode(failure),
      provider: "finnhub",
      message: failure.message,
      retryable: failure.retryable || failure.httpStatus === 429,
      httpStatus: failure.httpStatus,
      cause: failure.cause ?? { symbol },
    };
  }

  private boundaryError(
    code: AppBoundaryError["code"],
    message: string,
    symbol: string,
    cause?: unknown,
  ): AppBoundaryError {
    return {
      source: "market-data",
      code,
      provider: "finnhub",
      message,
      retryable: false,
      cause: cause ?? { symbol },
    };
  }
}
