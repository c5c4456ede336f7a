import type { BudgetExceeded } from "../../core/entities/appError";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";

/**
 * Per-invocation ceiling on external calls, paced by a minimum interval between calls.
 * One unit covers one collaborator operation (an evidence gather or an adjudication).
 */
export class CallBudget {
  private used = 0;
  private lastCallAt: number | null = null;

  constructor(
    readonly ceiling: number,
    private readonly minIntervalMs: number,
    private readonly clock: ClockPort,
    private readonly sleeper: SleepPort,
  ) {
    if (!Number.isInteger(ceiling) || ceiling <= 0) {
      throw new Error(`Call budget must be a positive integer, got ${ceiling}.`);
    }
  }

  get callsUsed(): number {
    return this.used;
  }

  get remaining(): number {
    return this.ceiling - this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.ceiling;
  }

  /**
   * Reserves one unit, waiting out the pacing interval first. Returns false once the ceiling is hit.
   */
  async reserve(): Promise<boolean> {
    if (this.exhausted) {
      return false;
    }

    if (this.lastCallAt !== null && this.minIntervalMs > 0) {
      const elapsed = this.clock.now().getTime() - this.lastCallAt;
      if (elapsed < this.minIntervalMs) {
        await this.sleeper.sleep(this.minIntervalMs - elapsed);
      }
    }

    this.used += 1;
    this.lastCallAt = this.clock.now().getTime();
    return true;
  }

  exceededFor(ticker: string): BudgetExceeded {
    return {
      kind: "budget_exceeded",
      ticker,
      ceiling: this.ceiling,
      used: this.used,
    };
  }
}
