import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { readCsvDocument, serializeCsvDocument } from '../ingest/lib/csvText.js';
import { PersistenceError } from '../ingest/lib/errors.js';
import {
  appendToHistory,
  mergeHistoryRows,
  resolveSecurityPaths,
  snapshotExists,
  toDailyRecord,
  writeSnapshot,
} from '../ingest/services/historyStore.js';
import type { MergedRow } from '../ingest/services/tableMerger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'insti-history-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

const FIELDS = ['外資_買進股數', '外資_賣出股數'];

function recordFor(dateKey: string, buy: number): ReturnType<typeof toDailyRecord> {
  const row: MergedRow = { securityId: '2330', securityName: '台積電', shares: { 外資_買進股數: buy, 外資_賣出股數: 0 } };
  return toDailyRecord([row], FIELDS, dateKey);
}

// ---------------------------------------------------------------------------
// Layout and records
// ---------------------------------------------------------------------------

test('resolveSecurityPaths places files under the market directory', () => {
  assert.deepEqual(resolveSecurityPaths('/data', 'listed', '2330', '2024-05-02'), {
    directory: path.join('/data', 'twse_raw', '2330'),
    snapshotPath: path.join('/data', 'twse_raw', '2330', '2024-05-02.csv'),
    historyPath: path.join('/data', 'twse_raw', '2330', '2330.csv'),
  });
  assert.equal(resolveSecurityPaths('/data', 'otc', '6488', '2024-05-02').directory, path.join('/data', 'tpex_raw', '6488'));
});

test('toDailyRecord orders id, name, share fields, then date', () => {
  assert.deepEqual(recordFor('2024-05-02', 12000), {
    columns: ['證券代號', '證券名稱', '外資_買進股數', '外資_賣出股數', '日期'],
    rows: [{ 證券代號: '2330', 證券名稱: '台積電', 外資_買進股數: '12000', 外資_賣出股數: '0', 日期: '2024-05-02' }],
  });
});

test('toDailyRecord keeps one record per name spelling, and the history keeps the last', () => {
  const rows: MergedRow[] = [
    { securityId: '2330', securityName: '台積電', shares: { 外資_買進股數: 10 } },
    { securityId: '2330', securityName: 'TSMC', shares: { 外資_賣出股數: 3 } },
  ];
  const record = toDailyRecord(rows, FIELDS, '2024-05-02');
  assert.deepEqual(
    record.rows.map((row) => [row['證券名稱'], row['外資_買進股數'], row['外資_賣出股數']]),
    [
      ['台積電', '10', '0'],
      ['TSMC', '0', '3'],
    ],
  );
  assert.deepEqual(mergeHistoryRows(null, record).rows, [record.rows[1]]);
});

// ---------------------------------------------------------------------------
// mergeHistoryRows
// ---------------------------------------------------------------------------

test('mergeHistoryRows sorts by date and lets the incoming row replace a same-date row', () => {
  const existing = {
    columns: ['日期', 'v'],
    rows: [
      { 日期: '2024-05-03', v: 'c' },
      { 日期: '2024-05-01', v: 'a' },
    ],
  };
  const merged = mergeHistoryRows(existing, { columns: ['日期', 'v'], rows: [{ 日期: '2024-05-01', v: 'A' }] });
  assert.deepEqual(merged.rows, [
    { 日期: '2024-05-01', v: 'A' },
    { 日期: '2024-05-03', v: 'c' },
  ]);
});

test('mergeHistoryRows appends new columns and blanks them for older rows', () => {
  const merged = mergeHistoryRows(
    { columns: ['日期', 'a'], rows: [{ 日期: '2024-05-01', a: '1' }] },
    { columns: ['日期', 'a', 'b'], rows: [{ 日期: '2024-05-02', a: '2', b: '3' }] },
  );
  assert.deepEqual(merged, {
    columns: ['日期', 'a', 'b'],
    rows: [
      { 日期: '2024-05-01', a: '1', b: '' },
      { 日期: '2024-05-02', a: '2', b: '3' },
    ],
  });
});

test('mergeHistoryRows drops rows without a date', () => {
  const merged = mergeHistoryRows(null, {
    columns: ['日期', 'a'],
    rows: [
      { 日期: '', a: 'x' },
      { 日期: '2024-05-02', a: 'y' },
    ],
  });
  assert.deepEqual(merged.rows, [{ 日期: '2024-05-02', a: 'y' }]);
});

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

test('writeSnapshot creates the file once and never replaces it', async () => {
  await withTempDir(async (dir) => {
    const { snapshotPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-02');
    assert.equal(await snapshotExists(snapshotPath), false);

    assert.equal(await writeSnapshot(snapshotPath, recordFor('2024-05-02', 1)), 'created');
    assert.equal(await snapshotExists(snapshotPath), true);
    assert.equal(await writeSnapshot(snapshotPath, recordFor('2024-05-02', 999)), 'exists');

    const text = await fs.readFile(snapshotPath, 'utf8');
    assert.equal(text, serializeCsvDocument(recordFor('2024-05-02', 1)));
  });
});

test('writeSnapshot leaves no temp files behind', async () => {
  await withTempDir(async (dir) => {
    const { directory, snapshotPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-02');
    await writeSnapshot(snapshotPath, recordFor('2024-05-02', 1));
    await writeSnapshot(snapshotPath, recordFor('2024-05-02', 2));
    assert.deepEqual(await fs.readdir(directory), ['2024-05-02.csv']);
  });
});

test('writeSnapshot wraps storage failures in PersistenceError', async () => {
  await withTempDir(async (dir) => {
    // A file where the security directory should be.
    await fs.mkdir(path.join(dir, 'twse_raw'));
    await fs.writeFile(path.join(dir, 'twse_raw', '2330'), 'x');
    const { snapshotPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-02');
    await assert.rejects(writeSnapshot(snapshotPath, recordFor('2024-05-02', 1)), PersistenceError);
  });
});

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

test('appendToHistory accumulates one row per date in date order', async () => {
  await withTempDir(async (dir) => {
    const { historyPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-02');
    assert.equal(await appendToHistory(historyPath, recordFor('2024-05-02', 2)), 1);
    assert.equal(await appendToHistory(historyPath, recordFor('2024-05-01', 1)), 2);
    assert.equal(await appendToHistory(historyPath, recordFor('2024-05-02', 22)), 2);

    const doc = readCsvDocument(await fs.readFile(historyPath, 'utf8'));
    assert.deepEqual(
      doc.rows.map((row) => [row['日期'], row['外資_買進股數']]),
      [
        ['2024-05-01', '1'],
        ['2024-05-02', '22'],
      ],
    );
  });
});

test('appending the same record again leaves the history unchanged', async () => {
  await withTempDir(async (dir) => {
    const { historyPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-02');
    await appendToHistory(historyPath, recordFor('2024-05-01', 1));
    await appendToHistory(historyPath, recordFor('2024-05-02', 2));
    const once = await fs.readFile(historyPath, 'utf8');
    await appendToHistory(historyPath, recordFor('2024-05-02', 2));
    assert.equal(await fs.readFile(historyPath, 'utf8'), once);
  });
});

test('concurrent appends to one history file all land', async () => {
  await withTempDir(async (dir) => {
    const { historyPath } = resolveSecurityPaths(dir, 'listed', '2330', '2024-05-01');
    const dates = ['2024-05-03', '2024-05-01', '2024-05-04', '2024-05-02'];
    await Promise.all(dates.map((dateKey, i) => appendToHistory(historyPath, recordFor(dateKey, i))));

    const doc = readCsvDocument(await fs.readFile(historyPath, 'utf8'));
    assert.deepEqual(
      doc.rows.map((row) => row['日期']),
      ['2024-05-01', '2024-05-02', '2024-05-03', '2024-05-04'],
    );
    assert.deepEqual((await fs.readdir(path.dirname(historyPath))).sort(), ['2330.csv']);
  });
});
