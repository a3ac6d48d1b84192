import { z } from 'zod';
import type {
  DateRange,
  EventNamesParams,
  EventSelector,
  EventTable,
  HttpTransport,
  Logger,
  MixpanelClientConfig,
  QueryParams,
  ReadEventsOptions,
  RequestOptions,
  ResponseFormat,
} from './types';
import { MixpanelRequestError } from './types';
import { buildRequestUrl, encodeQuery, signParams } from './signing';
import { flattenExport } from './flatten';

const DEFAULT_BASE_URL = 'https://mixpanel.com/api';
const DEFAULT_DATA_BASE_URL = 'https://data.mixpanel.com/api';
const DEFAULT_SIGNATURE_TTL_SECONDS = 600;

/** Earliest `from_date` the export API accepts. */
export const EARLIEST_EXPORT_DATE = '2011-07-10';

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

const eventNamesSchema = z.array(z.string());

/**
 * Mixpanel Data Export API Client
 *
 * Signs every request with the project's API key and secret and reads the
 * raw data export into an event table. Each call is one GET; nothing is
 * retried.
 */
export class MixpanelClient {
  private readonly baseUrl: string;
  private readonly dataBaseUrl: string;
  private readonly signatureTtlSeconds: number;
  private readonly timeoutMs?: number;
  private readonly logger?: Logger;
  private readonly transport: HttpTransport;

  constructor(private readonly config: MixpanelClientConfig) {
    if (!config.apiKey) {
      throw new Error('apiKey is required');
    }
    if (!config.apiSecret) {
      throw new Error('apiSecret is required');
    }

    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.dataBaseUrl = config.dataBaseUrl ?? DEFAULT_DATA_BASE_URL;
    this.signatureTtlSeconds = config.signatureTtlSeconds ?? DEFAULT_SIGNATURE_TTL_SECONDS;
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
  }

  // ==========================================================================
  // Raw Data Export
  // ==========================================================================

  /**
   * Download raw events and flatten them into a table.
   *
   * Dates default to the earliest exportable day through yesterday.
   *
   * @example
   * ```typescript
   * const table = await client.readEvents({
   *   events: singleEvent('Signup'),
   *   start: '2024-01-01',
   *   columns: ['country'],
   * });
   * ```
   */
  async readEvents(options: ReadEventsOptions = {}): Promise<EventTable> {
    const range = defaultDateRange();
    const params: QueryParams = {
      from_date: options.start !== undefined ? formatExportDate(options.start) : range.from_date,
      to_date: options.end !== undefined ? formatExportDate(options.end) : range.to_date,
      event: options.events ? resolveEventNames(options.events) : undefined,
      where: options.where,
      bucket: options.bucket,
    };

    const body = await this.requestExport(['export'], params);

    return flattenExport(body, {
      columns: options.columns,
      excludeMp: options.excludeMp ?? true,
      invalidLines: options.invalidLines,
      logger: this.logger,
    });
  }

  /**
   * Names of events recently sent to the project.
   */
  async getEventNames(params: EventNamesParams = {}): Promise<string[]> {
    return this.requestJson(
      ['events', 'names'],
      { type: params.type ?? 'general', limit: params.limit },
      eventNamesSchema,
    );
  }

  // ==========================================================================
  // Signed Requests
  // ==========================================================================

  /**
   * Issue a signed GET.
   *
   * @param methods - Method path segments, e.g. `['events', 'properties']`
   * @returns The body text for the export API, decoded JSON otherwise
   */
  async request(
    methods: readonly string[],
    params: QueryParams,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const body = await this.send(methods, params, options);
    if (options.dataApi) {
      return body;
    }
    return JSON.parse(body);
  }

  /**
   * Issue a signed GET against the raw data export base and return the
   * newline-delimited body as is.
   */
  async requestExport(
    methods: readonly string[],
    params: QueryParams,
    format: ResponseFormat = 'json',
  ): Promise<string> {
    return this.send(methods, params, { format, dataApi: true });
  }

  /**
   * Issue a signed GET against the standard API and validate the decoded
   * document.
   */
  async requestJson<T extends z.ZodTypeAny>(
    methods: readonly string[],
    params: QueryParams,
    schema: T,
    format: ResponseFormat = 'json',
  ): Promise<z.infer<T>> {
    const body = await this.send(methods, params, { format, dataApi: false });
    return schema.parse(JSON.parse(body));
  }

  private async send(
    methods: readonly string[],
    params: QueryParams,
    options: RequestOptions,
  ): Promise<string> {
    const signed = signParams(params, this.config, {
      format: options.format,
      ttlSeconds: this.signatureTtlSeconds,
    });
    const baseUrl = options.dataApi ? this.dataBaseUrl : this.baseUrl;
    const url = buildRequestUrl(baseUrl, methods, encodeQuery(signed));
    const endpoint = methods.join('/');

    this.logger?.debug?.(`[MixpanelClient] GET ${endpoint}`, {
      dataApi: Boolean(options.dataApi),
    });

    const response = await this.executeHttp(url, { method: 'GET' });

    this.logger?.debug?.(`[MixpanelClient] ${endpoint} responded with status ${response.status}`);

    if (!response.ok) {
      const body = await safeReadBody(response);
      throw new MixpanelRequestError(
        `Mixpanel request failed with status ${response.status}`,
        response.status,
        body,
      );
    }

    return response.text();
  }

  private async executeHttp(url: string, init: RequestInit): Promise<Response> {
    if (!this.timeoutMs || this.timeoutMs <= 0) {
      return this.transport(url, init);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.transport(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function singleEvent(name: string): EventSelector {
  return { kind: 'single', name };
}

export function eventList(names: readonly string[]): EventSelector {
  return { kind: 'list', names };
}

export function resolveEventNames(selector: EventSelector): string[] {
  switch (selector.kind) {
    case 'single':
      return [selector.name];
    case 'list':
      return [...selector.names];
  }
}

/**
 * Format a date as `YYYY-MM-DD`.
 *
 * ISO strings keep their own calendar day, whatever offset they carry.
 * `Date` objects and other strings use local calendar fields.
 */
export function formatExportDate(value: string | Date): string {
  if (typeof value === 'string') {
    const iso = ISO_DATE_PREFIX.exec(value);
    if (iso) {
      const [, year, month, day] = iso;
      const valid =
        isCalendarDate(Number(year), Number(month), Number(day)) && !Number.isNaN(Date.parse(value));
      if (!valid) {
        throw new RangeError(`Invalid export date: ${value}`);
      }
      return `${year}-${month}-${day}`;
    }
  }

  const date = typeof value === 'string' ? new Date(value) : value;
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid export date: ${String(value)}`);
  }

  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

/**
 * The widest range the export API allows: its earliest date through
 * yesterday. Today's events cannot be exported yet.
 */
export function defaultDateRange(now: Date = new Date()): DateRange {
  const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  return {
    from_date: EARLIEST_EXPORT_DATE,
    to_date: formatExportDate(yesterday),
  };
}

async function safeReadBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch (err) {
    return undefined;
  }
}

/**
 * Factory function to create a Mixpanel client from environment variables
 *
 * @param configOverrides - Applied after the environment
 */
export function createMixpanelClientFromEnv(
  configOverrides?: Partial<MixpanelClientConfig>,
): MixpanelClient {
  const apiKey = process.env.MIXPANEL_API_KEY;
  const apiSecret = process.env.MIXPANEL_API_SECRET;

  if (!apiKey) {
    throw new Error('MIXPANEL_API_KEY environment variable is required');
  }
  if (!apiSecret) {
    throw new Error('MIXPANEL_API_SECRET environment variable is required');
  }

  const baseUrl = process.env.MIXPANEL_API_BASE ?? DEFAULT_BASE_URL;
  const dataBaseUrl = process.env.MIXPANEL_DATA_API_BASE ?? DEFAULT_DATA_BASE_URL;
  const signatureTtlSeconds = parseNumberOrDefault(
    process.env.MIXPANEL_SIGNATURE_TTL_SECONDS,
    DEFAULT_SIGNATURE_TTL_SECONDS,
  );
  const timeoutMs = parseNumberOrDefault(process.env.MIXPANEL_TIMEOUT_MS, undefined);

  return new MixpanelClient({
    apiKey,
    apiSecret,
    baseUrl,
    dataBaseUrl,
    signatureTtlSeconds,
    timeoutMs,
    ...configOverrides,
  });
}

function parseNumberOrDefault<T extends number | undefined>(
  value: string | undefined,
  fallback: T,
): number | T {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
