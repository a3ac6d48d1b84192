import { createHash } from 'crypto';
import type { Credentials, QueryParams, SignedParams, SignOptions } from './types';

export const API_VERSION = '2.0';

const DEFAULT_SIGNATURE_TTL_SECONDS = 600;
const SIGNATURE_PARAM = 'sig';

/**
 * Serialize query parameters for signing and encoding.
 *
 * Lists become JSON text and numbers decimal text; `undefined` entries are
 * dropped.
 */
export function serializeParams(params: QueryParams): SignedParams {
  const serialized: SignedParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === 'string') {
      serialized[key] = value;
    } else if (typeof value === 'number') {
      serialized[key] = String(value);
    } else {
      serialized[key] = JSON.stringify(value);
    }
  }
  return serialized;
}

/**
 * Compute the request signature: the MD5 hex digest of every `key=value`
 * pair in sorted key order, followed by the API secret.
 *
 * Any `sig` already present is left out of the digest.
 */
export function computeSignature(params: QueryParams, apiSecret: string): string {
  const serialized = serializeParams(params);
  // Code unit order, not locale order: the server sorts the same way.
  const keys = Object.keys(serialized)
    .filter((key) => key !== SIGNATURE_PARAM)
    .sort();

  const hash = createHash('md5');
  for (const key of keys) {
    hash.update(`${key}=${serialized[key]}`, 'utf8');
  }
  hash.update(apiSecret, 'utf8');
  return hash.digest('hex');
}

/**
 * Return a signed copy of `params` with `api_key`, `expire`, `format` and
 * `sig` set. The input is not modified.
 */
export function signParams(
  params: QueryParams,
  credentials: Credentials,
  options: SignOptions = {},
): SignedParams {
  const nowSeconds = options.nowSeconds ?? Math.floor(Date.now() / 1000);
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_SIGNATURE_TTL_SECONDS;

  const { [SIGNATURE_PARAM]: _previous, ...rest } = serializeParams(params);
  const unsigned: SignedParams = {
    ...rest,
    api_key: credentials.apiKey,
    expire: String(nowSeconds + ttlSeconds),
    format: options.format ?? 'json',
  };

  return {
    ...unsigned,
    [SIGNATURE_PARAM]: computeSignature(unsigned, credentials.apiSecret),
  };
}

export function encodeQuery(params: SignedParams): string {
  return new URLSearchParams(Object.entries(params)).toString();
}

/**
 * Build `<base>/2.0/<method>/<method>/?<query>`.
 *
 * @param methods - Method path, e.g. `['events', 'properties', 'values']`
 */
export function buildRequestUrl(baseUrl: string, methods: readonly string[], query: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  const path = [API_VERSION, ...methods.map((method) => encodeURIComponent(method))].join('/');
  return `${base}/${path}/?${query}`;
}
