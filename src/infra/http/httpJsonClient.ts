import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryErrorCode } from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Transport-level retries only; rate-limited responses are never retried in-pass. */
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Maps transport failures onto boundary codes shared by every adapter.
 */
export const toBoundaryCode = (error: HttpClientError): AppBoundaryErrorCode => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 404) {
    return "not_found";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  switch (error.code) {
    case "timeout":
      return "timeout";
    case "invalid_json":
      return "invalid_json";
    case "transport_error":
      return "transport_error";
    case "non_success_status":
      return "provider_error";
  }
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/status parsing policy.
 * Payloads are returned as `unknown`; adapters own their response schemas.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let lastFailure: HttpClientError = {
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      lastFailure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!lastFailure.retryable || !hasAttemptsLeft) {
        return err(lastFailure);
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err(lastFailure);
  }

  private buildUrl(request: HttpJsonRequest): string {
    if (!request.query) {
      return request.url;
    }

    const url = new URL(request.url);
    Object.entries(request.query).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });
    return url.toString();
  }

  private async performRequest(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(this.buildUrl(request), {
        method: request.method,
        headers: { accept: "application/json", ...request.headers },
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: response.status >= 500,
        });
      }

      try {
        const payload: unknown = await response.json();
        return ok(payload);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: false,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
