import type {
  ClassificationRequest,
  ClassifierPort,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { ok, type Result } from "neverthrow";

/**
 * Agrees with stage 1 without adjustment so local runs exercise the adjudication path offline.
 */
export class MockClassifier implements ClassifierPort {
  async classify(
    request: ClassificationRequest,
  ): Promise<Result<unknown, AppBoundaryError>> {
    return ok({
      isGenuine: request.stage1Score >= 50,
      category: request.stage1Category,
      confidence: 50,
      adjustment: 0,
      reasoning: "Mock classifier keeps the keyword verdict.",
    });
  }
}
