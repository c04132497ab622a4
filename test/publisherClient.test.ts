import test from 'node:test';
import assert from 'node:assert/strict';

import { TPEX_INSTITUTIONAL_SOURCE, TWSE_FOREIGN_SOURCE } from '../ingest/data/publishers.js';
import { FetchUnavailableError } from '../ingest/lib/errors.js';
import type { FetchUnavailableReason } from '../ingest/lib/errors.js';
import {
  buildPublisherUrl,
  buildSourceRequest,
  createSourceFetcher,
  fetchPublisherCsv,
  hasPublishedData,
} from '../ingest/services/publisherClient.js';
import type { FetchLike, PublisherRequest } from '../ingest/services/publisherClient.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function fakeFetch(body: string, init: ResponseInit = {}): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, requestInit) => {
    calls.push({ url, init: requestInit });
    return new Response(body, init);
  };
  return { fetchImpl, calls };
}

function isUnavailable(reason: FetchUnavailableReason) {
  return (err: unknown) => err instanceof FetchUnavailableError && err.reason === reason;
}

const REQUEST: PublisherRequest = {
  url: 'https://publisher.example.test/export',
  params: { response: 'csv', date: '20240502' },
  label: 'TEST 2024-05-02',
};

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

test('buildPublisherUrl appends non-empty params', () => {
  assert.equal(
    buildPublisherUrl('https://publisher.example.test/export', { response: 'csv', date: '20240502', skip: '', gone: null }),
    'https://publisher.example.test/export?response=csv&date=20240502',
  );
});

test('TWSE requests carry the compact date', () => {
  assert.deepEqual(buildSourceRequest(TWSE_FOREIGN_SOURCE, '2024-05-02'), {
    url: 'https://www.twse.com.tw/rwd/zh/fund/TWT38U',
    params: { response: 'csv', date: '20240502' },
    label: 'TWSE 外資 2024-05-02',
  });
});

test('TPEx requests carry the Minguo date', () => {
  const request = buildSourceRequest(TPEX_INSTITUTIONAL_SOURCE, '2024-05-02');
  assert.deepEqual(request.params, { t: 'D', o: 'csv', d: '113/05/02' });
  assert.equal(
    buildPublisherUrl(request.url, request.params),
    'https://www.tpex.org.tw/web/stock/3insti/daily_trade/3itrade_hedge_result.php?t=D&o=csv&d=113%2F05%2F02',
  );
});

// ---------------------------------------------------------------------------
// Size threshold
// ---------------------------------------------------------------------------

test('hasPublishedData compares byte length against the threshold', () => {
  assert.equal(hasPublishedData(new Uint8Array(199), 200), false);
  assert.equal(hasPublishedData(new Uint8Array(200), 200), true);
});

// ---------------------------------------------------------------------------
// fetchPublisherCsv
// ---------------------------------------------------------------------------

test('a large enough body is returned as bytes with the configured User-Agent', async () => {
  const { fetchImpl, calls } = fakeFetch('x'.repeat(200));
  const bytes = await fetchPublisherCsv(REQUEST, { fetchImpl, userAgent: 'test-agent', minPayloadBytes: 200 });

  assert.equal(bytes.byteLength, 200);
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'https://publisher.example.test/export?response=csv&date=20240502');
  assert.deepEqual(calls[0].init?.headers, { 'User-Agent': 'test-agent' });
  assert.ok(calls[0].init?.signal instanceof AbortSignal);
});

test('a body under the threshold means no data was published', async () => {
  const { fetchImpl } = fakeFetch('x'.repeat(150));
  await assert.rejects(fetchPublisherCsv(REQUEST, { fetchImpl, minPayloadBytes: 200 }), isUnavailable('undersized'));
});

test('a non-success status is reported with the status code', async () => {
  const { fetchImpl } = fakeFetch('server error', { status: 500 });
  await assert.rejects(
    fetchPublisherCsv(REQUEST, { fetchImpl }),
    (err: unknown) => isUnavailable('http-status')(err) && err instanceof FetchUnavailableError && err.httpStatus === 500,
  );
});

test('a transport failure is reported as a network error', async () => {
  const fetchImpl: FetchLike = async () => {
    throw new TypeError('fetch failed');
  };
  await assert.rejects(fetchPublisherCsv(REQUEST, { fetchImpl }), isUnavailable('network'));
});

test('a request that outlives the timeout is aborted', async () => {
  const fetchImpl: FetchLike = (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const abortError = new Error('This operation was aborted');
        abortError.name = 'AbortError';
        reject(abortError);
      });
    });
  await assert.rejects(fetchPublisherCsv(REQUEST, { fetchImpl, timeoutMs: 10 }), isUnavailable('timeout'));
});

test('createSourceFetcher builds each source request for the date', async () => {
  const { fetchImpl, calls } = fakeFetch('y'.repeat(300));
  const fetchSource = createSourceFetcher({ fetchImpl, minPayloadBytes: 200 });

  const bytes = await fetchSource(TWSE_FOREIGN_SOURCE, '2024-05-02');
  assert.equal(bytes.byteLength, 300);
  assert.equal(calls[0].url, 'https://www.twse.com.tw/rwd/zh/fund/TWT38U?response=csv&date=20240502');
});
