import type {
  FilingMentions,
  FilingMentionsProviderPort,
  FilingMentionsRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient, toBoundaryCode } from "../../http/httpJsonClient";
import { toIsoDate } from "../../../shared/time/dateUtils";

const searchResponseSchema = z.object({
  hits: z.object({
    total: z.object({ value: z.number() }).optional(),
    hits: z.array(
      z
        .object({
          highlight: z
            .object({ file_contents: z.array(z.string()).optional() })
            .optional(),
        })
        .passthrough(),
    ),
  }),
});

const MAX_SNIPPETS = 5;
const AI_MENTION_QUERY = '"artificial intelligence" OR "machine learning"';

const stripMarkup = (value: string): string =>
  value
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();

/**
 * Counts AI mentions in annual reports through SEC EDGAR full-text search.
 */
export class SecEdgarMentionsProvider implements FilingMentionsProviderPort {
  constructor(
    private readonly searchUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when FILINGS_PROVIDER is set to sec-edgar.",
      );
    }
  }

  async fetchMentions(
    request: FilingMentionsRequest,
  ): Promise<Result<FilingMentions, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: this.searchUrl,
      method: "GET",
      query: {
        q: AI_MENTION_QUERY,
        forms: "10-K",
        dateRange: "custom",
        startdt: toIsoDate(request.from),
        enddt: toIsoDate(request.to),
        entityName: request.companyName ?? request.ticker.toUpperCase(),
      },
      headers: { "user-agent": this.userAgent },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err({
        source: "filings",
        code: toBoundaryCode(response.error),
        provider: "sec-edgar",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = searchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "filings",
        code: "malformed_response",
        provider: "sec-edgar",
        message: "SEC full-text search response did not match the expected shape.",
        retryable: false,
        cause: parsed.error,
      });
    }

    const snippets = parsed.data.hits.hits
      .flatMap((hit) => hit.highlight?.file_contents ?? [])
      .map(stripMarkup)
      .filter(Boolean)
      .slice(0, MAX_SNIPPETS);

    return ok({
      count: parsed.data.hits.total?.value ?? parsed.data.hits.hits.length,
      snippets,
    });
  }
}
