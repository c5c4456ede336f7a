/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "not_found"
  | "auth_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "market-data" | "filings" | "classifier";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Evidence could not be fetched for this pass; the ticker is retried on the next cadence.
 */
export type EvidenceUnavailable = {
  kind: "evidence_unavailable";
  ticker: string;
  reason: string;
  boundary?: AppBoundaryError;
};

/**
 * The classifier was unusable for an in-band score; stage-1 values were kept.
 */
export type AdjudicationDegraded = {
  kind: "adjudication_degraded";
  ticker: string;
  reason: string;
  boundary?: AppBoundaryError;
};

export type BudgetExceeded = {
  kind: "budget_exceeded";
  ticker: string;
  ceiling: number;
  used: number;
};

export type StoreWriteFailure = {
  kind: "store_write_failure";
  ticker: string;
  reason: string;
  cause?: unknown;
};

export type CurationFailure =
  | EvidenceUnavailable
  | AdjudicationDegraded
  | BudgetExceeded
  | StoreWriteFailure;

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
