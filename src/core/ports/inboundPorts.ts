import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { UniverseCategory } from "../entities/candidate";
import type { NewsHeadline } from "../entities/scan";

export type CompanyProfile = {
  ticker: string;
  name: string | null;
  sector: string | null;
  description: string;
};

export type RecentNewsRequest = {
  ticker: string;
  days: number;
  asOf: Date;
};

export type FilingMentionsRequest = {
  ticker: string;
  companyName: string | null;
  from: Date;
  to: Date;
};

export type FilingMentions = {
  count: number;
  snippets: string[];
};

export type ClassificationRequest = {
  ticker: string;
  companyName: string | null;
  sector: string | null;
  stage1Score: number;
  stage1Category: UniverseCategory;
  minScore: number;
  maxScore: number;
  evidenceLines: string[];
};

export interface MarketDataProviderPort {
  getProfile(ticker: string): Promise<Result<CompanyProfile, AppBoundaryError>>;
  getRecentNews(
    request: RecentNewsRequest,
  ): Promise<Result<NewsHeadline[], AppBoundaryError>>;
}

export interface FilingMentionsProviderPort {
  fetchMentions(
    request: FilingMentionsRequest,
  ): Promise<Result<FilingMentions, AppBoundaryError>>;
}

/**
 * Returns the classifier's parsed JSON verdict; callers must validate it before use.
 */
export interface ClassifierPort {
  classify(
    request: ClassificationRequest,
  ): Promise<Result<unknown, AppBoundaryError>>;
}
