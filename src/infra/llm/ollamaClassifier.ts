import type {
  ClassificationRequest,
  ClassifierPort,
} from "../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { aiCategories } from "../../core/entities/candidate";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient, toBoundaryCode } from "../http/httpJsonClient";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
});

/**
 * Builds the adjudication prompt; the reply contract is a single JSON object.
 */
export const buildClassificationPrompt = (
  request: ClassificationRequest,
): string =>
  [
    "Analyze this company's AI involvement.",
    "",
    `Company: ${request.companyName ?? "Unknown"} (${request.ticker})`,
    `Sector: ${request.sector ?? "Unknown"}`,
    `Keyword score: ${request.stage1Score}`,
    `Keyword category: ${request.stage1Category}`,
    "Evidence:",
    ...(request.evidenceLines.length > 0
      ? request.evidenceLines.map((line) => `- ${line}`)
      : ["- none"]),
    "",
    "Questions:",
    "1. Is AI genuinely central to this business?",
    `2. Primary AI category, one of: ${aiCategories.join(", ")}.`,
    `3. Adjust the score so it stays between ${request.minScore} and ${request.maxScore}.`,
    "4. One sentence of reasoning.",
    "",
    "Reply with JSON only:",
    '{"isGenuine": boolean, "category": string, "confidence": integer 0-100, "adjustment": integer, "reasoning": string}',
  ].join("\n");

/**
 * Encapsulates chat-model access so adjudication stays portable across LLM providers.
 */
export class OllamaClassifier implements ClassifierPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async classify(
    request: ClassificationRequest,
  ): Promise<Result<unknown, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        format: "json",
        options: { temperature: 0 },
        messages: [
          { role: "user", content: buildClassificationPrompt(request) },
        ],
      },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err({
        source: "classifier",
        code: toBoundaryCode(response.error),
        provider: "ollama",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = chatResponseSchema.safeParse(response.value);
    const content = parsed.success
      ? parsed.data.message?.content.trim()
      : undefined;
    if (!content) {
      return err({
        source: "classifier",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    try {
      const verdict: unknown = JSON.parse(content);
      return ok(verdict);
    } catch (parseError) {
      return err({
        source: "classifier",
        code: "invalid_json",
        provider: "ollama",
        message: "Ollama verdict was not valid JSON.",
        retryable: false,
        cause: parseError,
      });
    }
  }
}
