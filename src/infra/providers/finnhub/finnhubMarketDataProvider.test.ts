import { afterEach, describe, expect, it } from "vitest";
import { FinnhubMarketDataProvider } from "./finnhubMarketDataProvider";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const asOf = new Date("2026-10-19T12:00:00.000Z");

describe("FinnhubMarketDataProvider", () => {
  it("maps profile payloads into a description corpus", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify({
          ticker: "NVDA",
          name: "NVIDIA Corp",
          finnhubIndustry: "Semiconductors",
          weburl: "https://www.nvidia.com/",
        }),
        { status: 200 },
      );
    });

    const provider = new FinnhubMarketDataProvider(
      "https://finnhub.io",
      "test-key",
      5_000,
    );
    const profile = await provider.getProfile("nvda");

    expect(requestedUrl).toBe(
      "https://finnhub.io/api/v1/stock/profile2?symbol=NVDA&token=test-key",
    );
    if (profile.isErr()) {
      throw new Error(profile.error.message);
    }
    expect(profile.value).toEqual({
      ticker: "NVDA",
      name: "NVIDIA Corp",
      sector: "Semiconductors",
      description: "NVIDIA Corp. Semiconductors",
    });
  });

  it("treats an empty profile as not_found", async () => {
    setFetch(async () => new Response("{}", { status: 200 }));

    const provider = new FinnhubMarketDataProvider(
      "https://finnhub.io",
      "test-key",
    );
    const profile = await provider.getProfile("ZZZZ");

    if (profile.isOk()) {
      throw new Error("expected not_found");
    }
    expect(profile.error.code).toBe("not_found");
    expect(profile.error.source).toBe("market-data");
  });

  it("maps 429 responses to retryable rate_limited errors", async () => {
    setFetch(async () => new Response("limit", { status: 429 }));

    const provider = new FinnhubMarketDataProvider(
      "https://finnhub.io",
      "test-key",
    );
    const profile = await provider.getProfile("AMD");

    if (profile.isOk()) {
      throw new Error("expected rate limit");
    }
    expect(profile.error.code).toBe("rate_limited");
    expect(profile.error.retryable).toBe(true);
    expect(profile.error.httpStatus).toBe(429);
  });

  it("keeps headlines inside the window, newest first", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify([
          {
            headline: "Older story",
            datetime: Date.parse("2026-10-13T10:00:00.000Z") / 1000,
          },
          {
            headline: "Outside window",
            datetime: Date.parse("2026-10-01T10:00:00.000Z") / 1000,
          },
          { headline: "  Newest story  ", datetime: Date.parse("2026-10-18T10:00:00.000Z") / 1000 },
          { headline: "", datetime: Date.parse("2026-10-18T11:00:00.000Z") / 1000 },
          { summary: "no headline" },
        ]),
        { status: 200 },
      );
    });

    const provider = new FinnhubMarketDataProvider(
      "https://finnhub.io",
      "test-key",
    );
    const news = await provider.getRecentNews({
      ticker: "amd",
      days: 7,
      asOf,
    });

    expect(requestedUrl).toBe(
      "https://finnhub.io/api/v1/company-news?symbol=AMD&from=2026-10-12&to=2026-10-19&token=test-key",
    );
    if (news.isErr()) {
      throw new Error(news.error.message);
    }
    expect(news.value).toEqual([
      {
        headline: "Newest story",
        publishedAt: new Date("2026-10-18T10:00:00.000Z"),
      },
      {
        headline: "Older story",
        publishedAt: new Date("2026-10-13T10:00:00.000Z"),
      },
    ]);
  });

  it("rejects non-array news payloads as malformed", async () => {
    setFetch(
      async () =>
        new Response(JSON.stringify({ error: "bad" }), { status: 200 }),
    );

    const provider = new FinnhubMarketDataProvider(
      "https://finnhub.io",
      "test-key",
    );
    const news = await provider.getRecentNews({ ticker: "AMD", days: 7, asOf });

    if (news.isOk()) {
      throw new Error("expected malformed response");
    }
    expect(news.error.code).toBe("malformed_response");
  });

  it("requires an api key", () => {
    expect(
      () => new FinnhubMarketDataProvider("https://finnhub.io", "  "),
    ).toThrow("FINNHUB_API_KEY is required");
  });
});
