import { toErrorDetails } from "../../core/entities/appError";
import type { DecisionCategory } from "../../core/entities/decisionLog";
import type {
  ClockPort,
  DecisionLogRepositoryPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export const CURATOR_ACTOR = "curator";

/**
 * Append-only audit sink. A failed append is logged and never reaches the caller,
 * so a broken log cannot abort a scan.
 */
export class DecisionJournal {
  constructor(
    private readonly repository: DecisionLogRepositoryPort,
    private readonly ids: IdGeneratorPort,
    private readonly clock: ClockPort,
    private readonly actor = CURATOR_ACTOR,
  ) {}

  async record(category: DecisionCategory, content: string): Promise<void> {
    try {
      await this.repository.append({
        id: this.ids.next(),
        actor: this.actor,
        category,
        content,
        createdAt: this.clock.now(),
      });
    } catch (error) {
      logger.error(
        { category, content, error: toErrorDetails(error) },
        "Decision log append failed",
      );
    }
  }
}
