import type {
  CompanyProfile,
  MarketDataProviderPort,
  RecentNewsRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { NewsHeadline } from "../../../core/entities/scan";
import { ok, type Result } from "neverthrow";

const HOUR_MS = 60 * 60 * 1000;

const knownProfiles: Record<string, { name: string; sector: string; text: string }> = {
  NVDA: {
    name: "NVIDIA Corp",
    sector: "Semiconductors",
    text: "Designs AI chips and AI accelerator systems for deep learning and GPU inference.",
  },
  MSFT: {
    name: "Microsoft Corp",
    sector: "Technology",
    text: "Cloud AI services, generative AI copilots and an OpenAI partnership.",
  },
  EQIX: {
    name: "Equinix Inc",
    sector: "Real Estate",
    text: "Data center and interconnection platform.",
  },
};

/**
 * Supplies repeatable profiles and headlines so the scan pipeline can run without vendor keys.
 */
export class MockMarketDataProvider implements MarketDataProviderPort {
  async getProfile(
    ticker: string,
  ): Promise<Result<CompanyProfile, AppBoundaryError>> {
    const symbol = ticker.toUpperCase();
    const known = knownProfiles[symbol];

    return ok({
      ticker: symbol,
      name: known?.name ?? `${symbol} Holdings`,
      sector: known?.sector ?? null,
      description: known?.text ?? `${symbol} operates a diversified business.`,
    });
  }

  async getRecentNews(
    request: RecentNewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>> {
    const symbol = request.ticker.toUpperCase();
    const headlines = knownProfiles[symbol]
      ? [
          `${symbol} expands machine learning roadmap`,
          `${symbol} quarterly update`,
        ]
      : [`${symbol} quarterly update`];

    return ok(
      headlines.map((headline, index) => ({
        headline,
        publishedAt: new Date(request.asOf.getTime() - (index + 1) * HOUR_MS),
      })),
    );
  }
}
