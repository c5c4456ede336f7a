import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import type {
  ClockPort,
  IdGeneratorPort,
  SleepPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class TimerSleep implements SleepPort {
  async sleep(ms: number): Promise<void> {
    if (ms > 0) {
      await delay(ms);
    }
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
