import type { ScanCadence } from "../../core/entities/scan";

/**
 * Uses hyphen-only names because BullMQ uses colon as an internal Redis key separator.
 */
export const SCAN_QUEUE_NAME = "curation-scan";

export const schedulerIdFor = (cadence: ScanCadence): string =>
  `${SCAN_QUEUE_NAME}-${cadence}`;
