import { afterEach, describe, expect, it } from "vitest";
import type { ClassificationRequest } from "../../core/ports/inboundPorts";
import {
  buildClassificationPrompt,
  OllamaClassifier,
} from "./ollamaClassifier";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const request: ClassificationRequest = {
  ticker: "SMCI",
  companyName: "Super Micro Computer",
  sector: "Technology",
  stage1Score: 45,
  stage1Category: "ai_infrastructure",
  minScore: 25,
  maxScore: 65,
  evidenceLines: ["Profile: servers for data center AI workloads"],
};

describe("OllamaClassifier", () => {
  it("returns the parsed JSON verdict without validating it", async () => {
    let sentBody: unknown;
    setFetch(async (_input, init) => {
      sentBody = JSON.parse(String(init?.body));
      return new Response(
        JSON.stringify({
          message: {
            content:
              '{"isGenuine": true, "category": "ai_infrastructure", "confidence": 80, "adjustment": 99}',
          },
        }),
        { status: 200 },
      );
    });

    const classifier = new OllamaClassifier(
      "http://ollama.test",
      "test-model",
    );
    const result = await classifier.classify(request);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      isGenuine: true,
      category: "ai_infrastructure",
      confidence: 80,
      adjustment: 99,
    });
    expect(sentBody).toMatchObject({
      model: "test-model",
      stream: false,
      format: "json",
    });
  });

  it("maps non-JSON content to invalid_json", async () => {
    setFetch(
      async () =>
        new Response(
          JSON.stringify({ message: { content: "Sure! Here is my answer" } }),
          { status: 200 },
        ),
    );

    const result = await new OllamaClassifier(
      "http://ollama.test",
      "test-model",
    ).classify(request);

    if (result.isOk()) {
      throw new Error("expected invalid_json");
    }
    expect(result.error.code).toBe("invalid_json");
    expect(result.error.source).toBe("classifier");
  });

  it("maps empty message content to malformed_response", async () => {
    setFetch(async () => new Response(JSON.stringify({}), { status: 200 }));

    const result = await new OllamaClassifier(
      "http://ollama.test",
      "test-model",
    ).classify(request);

    if (result.isOk()) {
      throw new Error("expected malformed_response");
    }
    expect(result.error.code).toBe("malformed_response");
  });

  it("maps server failures to provider_error", async () => {
    setFetch(async () => new Response("down", { status: 500 }));

    const result = await new OllamaClassifier(
      "http://ollama.test",
      "test-model",
    ).classify(request);

    if (result.isOk()) {
      throw new Error("expected provider_error");
    }
    expect(result.error.code).toBe("provider_error");
    expect(result.error.httpStatus).toBe(500);
  });

  it("states the allowed score window in the prompt", () => {
    const prompt = buildClassificationPrompt(request);

    expect(prompt).toContain(
      "3. Adjust the score so it stays between 25 and 65.",
    );
    expect(prompt).toContain("- Profile: servers for data center AI workloads");
  });
});
