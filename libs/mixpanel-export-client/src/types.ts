/**
 * Mixpanel Export Client Types
 *
 * Type definitions for signed requests, export records and the flattened
 * event table.
 */

// ============================================================================
// Core Client Configuration
// ============================================================================

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export class MixpanelRequestError extends ApiRequestError {
  constructor(message: string, status: number, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'MixpanelRequestError';
  }
}

export interface Logger {
  debug?(msg: string, meta?: unknown): void;
  info?(msg: string, meta?: unknown): void;
  warn?(msg: string, meta?: unknown): void;
  error?(msg: string, meta?: unknown): void;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

export interface MixpanelClientConfig extends Credentials {
  /** Standard API base. Default: https://mixpanel.com/api */
  baseUrl?: string;
  /** Raw data export base. Default: https://data.mixpanel.com/api */
  dataBaseUrl?: string;
  /** Lifetime granted to each signed request. Default: 600 */
  signatureTtlSeconds?: number;
  /** Client-side abort after this many ms. Unset means no timeout. */
  timeoutMs?: number;
  logger?: Logger;
  transport?: HttpTransport;
}

// ============================================================================
// Request Types
// ============================================================================

export type QueryParamValue = string | number | readonly string[] | undefined;

export type QueryParams = Record<string, QueryParamValue>;

/** Parameters after signing: every value serialized, `sig` included. */
export type SignedParams = Record<string, string>;

export type ResponseFormat = 'json' | 'csv';

export interface SignOptions {
  format?: ResponseFormat;
  ttlSeconds?: number;
  /** Current unix time in seconds. Defaults to the system clock. */
  nowSeconds?: number;
}

export interface RequestOptions {
  format?: ResponseFormat;
  /** Target the raw data export base instead of the standard API. */
  dataApi?: boolean;
}

export type EventSelector =
  | { kind: 'single'; name: string }
  | { kind: 'list'; names: readonly string[] };

export interface EventNamesParams {
  /** general, unique or average. Default: general */
  type?: 'general' | 'unique' | 'average';
  limit?: number;
}

// ============================================================================
// Export Records and Tables
// ============================================================================

export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

export interface ExportRecord {
  event: string;
  properties: Record<string, PropertyValue>;
}

/** One export record flattened: its properties plus the `event` name. */
export type EventRow = Record<string, PropertyValue>;

export type TableCell = PropertyValue | Date | undefined;

export type TableRow = Record<string, TableCell>;

export interface EventTable {
  columns: string[];
  rows: TableRow[];
  /** Non-blank lines that were not valid export records. */
  droppedLines: number;
}

export type InvalidLinePolicy = 'skip' | 'throw';

export interface FlattenOptions {
  columns?: readonly string[];
  /** Drop `$` and `mp_` keys when no explicit column list is given. */
  excludeMp?: boolean;
  invalidLines?: InvalidLinePolicy;
  logger?: Logger;
}

export interface ParsedExport {
  rows: EventRow[];
  /** Union of row keys, in first-seen order. */
  keys: string[];
  droppedLines: number;
}

export interface ReadEventsOptions {
  /** All events when unset. */
  events?: EventSelector;
  /** Default: 2011-07-10 */
  start?: string | Date;
  /** Default: yesterday */
  end?: string | Date;
  /** Segmentation expression. */
  where?: string;
  bucket?: string;
  columns?: readonly string[];
  /** Default: true */
  excludeMp?: boolean;
  invalidLines?: InvalidLinePolicy;
}

export interface DateRange {
  from_date: string;
  to_date: string;
}

// ============================================================================
// Flattening Errors
// ============================================================================

export class MissingColumnError extends Error {
  constructor(public readonly column: string) {
    super(`Column "${column}" is missing from the export table`);
    this.name = 'MissingColumnError';
  }
}

export class InvalidTimestampError extends Error {
  constructor(public readonly value: unknown) {
    super(
      `Expected unix seconds in "time", got ${
        typeof value === 'number' ? String(value) : JSON.stringify(value)
      }`,
    );
    this.name = 'InvalidTimestampError';
  }
}

export class ExportParseError extends Error {
  constructor(
    public readonly lineNumber: number,
    options?: { cause?: unknown },
  ) {
    super(`Line ${lineNumber} is not a valid export record`, options);
    this.name = 'ExportParseError';
  }
}
