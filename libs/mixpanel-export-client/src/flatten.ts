import { z } from 'zod';
import type {
  EventRow,
  EventTable,
  ExportRecord,
  FlattenOptions,
  InvalidLinePolicy,
  ParsedExport,
  PropertyValue,
  TableRow,
} from './types';
import { ExportParseError, InvalidTimestampError, MissingColumnError } from './types';

export const TIME_COLUMN = 'time';
export const EVENT_COLUMN = 'event';

const PLATFORM_PREFIXES = ['$', 'mp_'] as const;

const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(propertyValueSchema),
    z.record(propertyValueSchema),
  ]),
);

// z.record skips a `__proto__` key, so such a property never becomes a column.
export const exportRecordSchema: z.ZodType<ExportRecord> = z.object({
  event: z.string(),
  properties: z.record(propertyValueSchema),
});

/**
 * Properties Mixpanel attaches on its own (OS, library, region, ...).
 */
export function isPlatformField(key: string): boolean {
  return PLATFORM_PREFIXES.some((prefix) => key.startsWith(prefix));
}

/**
 * Parse newline-delimited export records into rows.
 *
 * Blank lines are ignored. Other lines that are not JSON export records are
 * counted and dropped, or raise `ExportParseError` under the `throw` policy.
 */
export function parseExportLines(raw: string, policy: InvalidLinePolicy = 'skip'): ParsedExport {
  const rows: EventRow[] = [];
  const keys = new Set<string>();
  let droppedLines = 0;

  const lines = raw.split('\n');
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (!line.trim()) {
      continue;
    }

    const record = parseRecord(line);
    if (!record.success) {
      if (policy === 'throw') {
        throw new ExportParseError(index + 1, { cause: record.error });
      }
      droppedLines += 1;
      continue;
    }

    const row: EventRow = { ...record.data.properties, [EVENT_COLUMN]: record.data.event };
    for (const key of Object.keys(row)) {
      keys.add(key);
    }
    rows.push(row);
  }

  return { rows, keys: [...keys], droppedLines };
}

function parseRecord(
  line: string,
): { success: true; data: ExportRecord } | { success: false; error: unknown } {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    return { success: false, error };
  }
  return exportRecordSchema.safeParse(json);
}

/**
 * Resolve the output columns.
 *
 * Without an explicit list every seen key is used, minus platform fields when
 * `excludeMp` is set. An explicit list always ends up containing `time`.
 */
export function resolveColumns(
  keys: readonly string[],
  columns?: readonly string[],
  excludeMp = false,
): string[] {
  if (!columns) {
    return excludeMp ? keys.filter((key) => !isPlatformField(key)) : [...keys];
  }
  return columns.includes(TIME_COLUMN) ? [...columns] : [...columns, TIME_COLUMN];
}

/**
 * Replace unix seconds in the `time` column with `Date` values, in place.
 */
export function convertTimeColumn(rows: TableRow[], columns: readonly string[]): void {
  if (!columns.includes(TIME_COLUMN)) {
    throw new MissingColumnError(TIME_COLUMN);
  }

  for (const row of rows) {
    const value = row[TIME_COLUMN];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidTimestampError(value);
    }
    row[TIME_COLUMN] = new Date(value * 1000);
  }
}

/**
 * Turn a raw export body into an event table with `time` as `Date` values.
 *
 * @throws MissingColumnError when no column list is given and no record
 * carries `time`, which includes a body with no valid records at all.
 */
export function flattenExport(raw: string, options: FlattenOptions = {}): EventTable {
  const parsed = parseExportLines(raw, options.invalidLines);
  const columns = resolveColumns(parsed.keys, options.columns, options.excludeMp);

  const rows = parsed.rows.map((source) => {
    const row: TableRow = {};
    for (const column of columns) {
      row[column] = source[column];
    }
    return row;
  });

  convertTimeColumn(rows, columns);

  options.logger?.debug?.('[flattenExport] Flattened export body', {
    rows: rows.length,
    columns: columns.length,
    droppedLines: parsed.droppedLines,
  });

  return { columns, rows, droppedLines: parsed.droppedLines };
}
