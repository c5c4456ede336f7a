import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type {
  UniverseSourceRow,
  UniverseSourceTable,
} from "../../core/entities/candidate";

const recordsSchema = z.array(
  z.object({
    info: z.object({ lines: z.number().int() }),
    record: z.record(z.string(), z.string()),
  }),
);

const lineSchema = z.number().int().positive();

/**
 * Header-keyed rows from a constituents table. Cells are trimmed; short rows keep only
 * the columns they have. A record the parser cannot read is skipped and reported once
 * under the line it starts on; the remaining records still parse.
 */
export const parseUniverseCsv = (text: string): UniverseSourceTable => {
  const malformed = new Map<number, string>();

  const parsed = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    info: true,
    skip_records_with_error: true,
    on_skip: (error) => {
      const line = lineSchema.safeParse(error?.lines);
      const key = line.success ? line.data : 0;
      if (!malformed.has(key)) {
        malformed.set(key, `malformed row: ${error?.code ?? "unreadable"}`);
      }
      return undefined;
    },
  });

  const rows: UniverseSourceRow[] = recordsSchema
    .parse(parsed)
    .map(({ info, record }) => ({ line: info.lines, cells: record }));

  return {
    rows,
    malformed: [...malformed].map(([line, reason]) => ({ line, reason })),
  };
};

export const readUniverseCsv = async (
  path: string,
): Promise<UniverseSourceTable> =>
  parseUniverseCsv(await readFile(path, "utf8"));
