/**
 * Publisher HTTP client: URL construction, timed GET with a browser
 * User-Agent, and the "is there any data" size check.
 *
 * Every failure surfaces as FetchUnavailableError so the day orchestrator can
 * drop the source for that date and carry on. No retries: a missing source is
 * picked up again on the next run for the same date.
 */

import { PUBLISHER_MIN_PAYLOAD_BYTES, PUBLISHER_TIMEOUT_MS, PUBLISHER_USER_AGENT } from '../config.js';
import { toCompactDate, toRocDate } from '../lib/dateUtils.js';
import { FetchUnavailableError, isAbortError } from '../lib/errors.js';
import type { SourceDefinition } from '../data/publishers.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('publisher');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PublisherRequest {
  url: string;
  params: Record<string, string>;
  /** Human-readable label for logs, e.g. `TWSE 外資 2024-05-02`. */
  label: string;
}

export interface PublisherFetchOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  minPayloadBytes?: number;
  userAgent?: string;
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildPublisherUrl(baseUrl: string, params: Record<string, string | undefined | null> = {}): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

export function formatDateParam(source: SourceDefinition, dateKey: string): string {
  return source.dateFormat === 'roc' ? toRocDate(dateKey) : toCompactDate(dateKey);
}

export function buildSourceRequest(source: SourceDefinition, dateKey: string): PublisherRequest {
  return {
    url: source.url,
    params: { ...source.params, [source.dateParam]: formatDateParam(source, dateKey) },
    label: `${source.label} ${dateKey}`,
  };
}

// ---------------------------------------------------------------------------
// Fetch
// ---------------------------------------------------------------------------

/** True when the body is large enough to hold real trading rows. */
export function hasPublishedData(bytes: Uint8Array, minPayloadBytes: number = PUBLISHER_MIN_PAYLOAD_BYTES): boolean {
  return bytes.byteLength >= Math.max(0, minPayloadBytes);
}

export async function fetchPublisherCsv(request: PublisherRequest, options: PublisherFetchOptions = {}): Promise<Uint8Array> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = Math.max(1, options.timeoutMs ?? PUBLISHER_TIMEOUT_MS);
  const minPayloadBytes = options.minPayloadBytes ?? PUBLISHER_MIN_PAYLOAD_BYTES;
  const url = buildPublisherUrl(request.url, request.params);

  log.info({ url }, `downloading ${request.label}`);
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  let bytes: Uint8Array;
  try {
    const resp = await fetchImpl(url, {
      signal: controller.signal,
      headers: { 'User-Agent': options.userAgent ?? PUBLISHER_USER_AGENT },
    });
    if (!resp.ok) {
      throw new FetchUnavailableError(request.label, 'http-status', `HTTP ${resp.status}`, resp.status);
    }
    bytes = new Uint8Array(await resp.arrayBuffer());
  } catch (err: unknown) {
    if (err instanceof FetchUnavailableError) throw err;
    if (timedOut || isAbortError(err)) {
      throw new FetchUnavailableError(request.label, 'timeout', `no response within ${timeoutMs}ms`);
    }
    throw new FetchUnavailableError(request.label, 'network', err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timeout);
  }

  if (!hasPublishedData(bytes, minPayloadBytes)) {
    throw new FetchUnavailableError(request.label, 'undersized', `${bytes.byteLength} bytes, likely no trading data`);
  }
  return bytes;
}

/** Binds fetch options once; the day orchestrator calls it per source. */
export function createSourceFetcher(options: PublisherFetchOptions = {}) {
  return (source: SourceDefinition, dateKey: string): Promise<Uint8Array> =>
    fetchPublisherCsv(buildSourceRequest(source, dateKey), options);
}
