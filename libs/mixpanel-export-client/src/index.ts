/**
 * mixpanel-export-client
 *
 * Mixpanel Data Export API Client Library
 *
 * Reads raw events from Mixpanel's data export API into a table of flattened
 * rows, with `time` converted to `Date` values.
 *
 * ## Architecture
 *
 * - **Signing**: MD5 signature over sorted parameters and the API secret
 * - **Client**: signed GETs against the standard and export bases
 * - **Flattening**: newline-delimited records into an event table
 *
 * ## Usage
 *
 * ```typescript
 * import { createMixpanelClientFromEnv, eventList } from 'mixpanel-export-client';
 *
 * // Create client (reads from env vars)
 * const client = createMixpanelClientFromEnv();
 *
 * // Signups and purchases since March, Mixpanel's own properties left out
 * const table = await client.readEvents({
 *   events: eventList(['Signup', 'Purchase']),
 *   start: '2024-03-01',
 * });
 *
 * // Any other API method, as decoded JSON
 * const names = await client.getEventNames({ limit: 50 });
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `MIXPANEL_API_KEY` - Project API key
 * - `MIXPANEL_API_SECRET` - Project API secret
 *
 * Optional:
 * - `MIXPANEL_API_BASE` - Standard API base (default: https://mixpanel.com/api)
 * - `MIXPANEL_DATA_API_BASE` - Export base (default: https://data.mixpanel.com/api)
 * - `MIXPANEL_SIGNATURE_TTL_SECONDS` - Signed request lifetime (default: 600)
 * - `MIXPANEL_TIMEOUT_MS` - Client-side timeout (default: none)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export {
  MixpanelClient,
  createMixpanelClientFromEnv,
  singleEvent,
  eventList,
  resolveEventNames,
  formatExportDate,
  defaultDateRange,
  EARLIEST_EXPORT_DATE,
} from './mixpanelClient';

export {
  API_VERSION,
  serializeParams,
  computeSignature,
  signParams,
  encodeQuery,
  buildRequestUrl,
} from './signing';

export {
  TIME_COLUMN,
  EVENT_COLUMN,
  exportRecordSchema,
  isPlatformField,
  parseExportLines,
  resolveColumns,
  convertTimeColumn,
  flattenExport,
} from './flatten';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Core config
  MixpanelClientConfig,
  Credentials,
  Logger,
  HttpTransport,
  // Requests
  QueryParamValue,
  QueryParams,
  SignedParams,
  SignOptions,
  RequestOptions,
  ResponseFormat,
  EventSelector,
  EventNamesParams,
  ReadEventsOptions,
  DateRange,
  // Export records and tables
  PropertyValue,
  ExportRecord,
  EventRow,
  TableCell,
  TableRow,
  EventTable,
  InvalidLinePolicy,
  FlattenOptions,
  ParsedExport,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  ApiRequestError,
  MixpanelRequestError,
  MissingColumnError,
  InvalidTimestampError,
  ExportParseError,
} from './types';
