/**
 * Per-security flat-file storage.
 *
 *   <dataRoot>/<marketDir>/<securityId>/<YYYY-MM-DD>.csv   write-once snapshot
 *   <dataRoot>/<marketDir>/<securityId>/<securityId>.csv   accumulated history
 *
 * Snapshot existence is the only exactly-once guard: a date whose snapshot is
 * on disk is never re-derived. History rewrites go through a temp file and a
 * rename, and are serialised per file by an in-process mutex.
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import path from 'path';

import { DATE_COLUMN, MARKETS, SECURITY_ID_COLUMN, SECURITY_NAME_COLUMN } from '../data/publishers.js';
import type { Market } from '../data/publishers.js';
import { readCsvDocument, serializeCsvDocument } from '../lib/csvText.js';
import type { CsvDocument, CsvRecord } from '../lib/csvText.js';
import { hasErrorCode, PersistenceError } from '../lib/errors.js';
import { KeyedMutex } from '../lib/keyedMutex.js';
import { componentLogger } from '../logger.js';
import type { MergedRow } from './tableMerger.js';

export interface SecurityPaths {
  directory: string;
  snapshotPath: string;
  historyPath: string;
}

export type SnapshotWriteResult = 'created' | 'exists';

const log = componentLogger('history');
const historyLocks = new KeyedMutex();

export function resolveSecurityPaths(dataRoot: string, market: Market, securityId: string, dateKey: string): SecurityPaths {
  const directory = path.join(dataRoot, MARKETS[market].directory, securityId);
  return {
    directory,
    snapshotPath: path.join(directory, `${dateKey}.csv`),
    historyPath: path.join(directory, `${securityId}.csv`),
  };
}

/** One security's merged row for one date, in persisted column order. */
export function toDailyRecord(rows: readonly MergedRow[], fields: readonly string[], dateKey: string): CsvDocument {
  return {
    columns: [SECURITY_ID_COLUMN, SECURITY_NAME_COLUMN, ...fields, DATE_COLUMN],
    rows: rows.map((row) => {
      const record: CsvRecord = {
        [SECURITY_ID_COLUMN]: row.securityId,
        [SECURITY_NAME_COLUMN]: row.securityName,
      };
      for (const field of fields) {
        record[field] = String(row.shares[field] ?? 0);
      }
      record[DATE_COLUMN] = dateKey;
      return record;
    }),
  };
}

// ---------------------------------------------------------------------------
// Low-level file helpers
// ---------------------------------------------------------------------------

function tempPathFor(target: string): string {
  return `${target}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err: unknown) {
    if (!hasErrorCode(err, 'ENOENT')) {
      log.warn({ filePath, err }, 'could not remove temp file');
    }
  }
}

async function writeFileAtomic(target: string, content: string): Promise<void> {
  const temp = tempPathFor(target);
  try {
    await fs.writeFile(temp, content, 'utf8');
    await fs.rename(temp, target);
  } catch (err: unknown) {
    await removeQuietly(temp);
    throw err;
  }
}

async function readDocumentIfExists(filePath: string): Promise<CsvDocument | null> {
  try {
    return readCsvDocument(await fs.readFile(filePath, 'utf8'));
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return null;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export async function snapshotExists(snapshotPath: string): Promise<boolean> {
  try {
    await fs.access(snapshotPath);
    return true;
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return false;
    throw new PersistenceError(snapshotPath, err);
  }
}

/**
 * Creates the snapshot only if it is absent. The content is staged in a temp
 * file and hard-linked into place, so the snapshot either appears complete or
 * not at all, and an existing one is never replaced.
 */
export async function writeSnapshot(snapshotPath: string, record: CsvDocument): Promise<SnapshotWriteResult> {
  const temp = tempPathFor(snapshotPath);
  try {
    await fs.mkdir(path.dirname(snapshotPath), { recursive: true });
    await fs.writeFile(temp, serializeCsvDocument(record), 'utf8');
    try {
      await fs.link(temp, snapshotPath);
    } catch (err: unknown) {
      if (hasErrorCode(err, 'EEXIST')) return 'exists';
      throw err;
    }
    return 'created';
  } catch (err: unknown) {
    throw new PersistenceError(snapshotPath, err);
  } finally {
    await removeQuietly(temp);
  }
}

// ---------------------------------------------------------------------------
// History accumulation
// ---------------------------------------------------------------------------

/**
 * Appends `incoming` to `existing`, keeps the last row for each date and sorts
 * by date ascending. Columns are the existing header followed by any new ones.
 * Rows without a date cannot be placed and are dropped.
 */
export function mergeHistoryRows(existing: CsvDocument | null, incoming: CsvDocument): CsvDocument {
  const columns = existing ? [...existing.columns] : [];
  for (const column of incoming.columns) {
    if (!columns.includes(column)) columns.push(column);
  }

  const byDate = new Map<string, CsvRecord>();
  for (const row of [...(existing?.rows ?? []), ...incoming.rows]) {
    const dateKey = String(row[DATE_COLUMN] ?? '').trim();
    if (!dateKey) continue;
    byDate.delete(dateKey);
    byDate.set(dateKey, row);
  }

  const rows = [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, row]) => {
      const normalized: CsvRecord = {};
      for (const column of columns) normalized[column] = row[column] ?? '';
      return normalized;
    });
  return { columns, rows };
}

/** Read-modify-write of one security's history file; returns the row count. */
export async function appendToHistory(historyPath: string, record: CsvDocument): Promise<number> {
  return historyLocks.runExclusive(path.resolve(historyPath), async () => {
    try {
      const existing = await readDocumentIfExists(historyPath);
      const merged = mergeHistoryRows(existing, record);
      await fs.mkdir(path.dirname(historyPath), { recursive: true });
      await writeFileAtomic(historyPath, serializeCsvDocument(merged));
      return merged.rows.length;
    } catch (err: unknown) {
      throw new PersistenceError(historyPath, err);
    }
  });
}
