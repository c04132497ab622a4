import { setTimeout as delay } from 'timers/promises';

import { PUBLISHER_PACING_MS } from '../config.js';
import { MARKET_ORDER, MARKETS } from '../data/publishers.js';
import type { Market, MarketDefinition, SourceDefinition } from '../data/publishers.js';
import { describeError, isDecodeError, isFetchUnavailableError } from '../lib/errors.js';
import { decodeContent } from '../services/decoder.js';
import {
  appendToHistory,
  resolveSecurityPaths,
  snapshotExists,
  toDailyRecord,
  writeSnapshot,
} from '../services/historyStore.js';
import { parseSource } from '../services/sourceParsers.js';
import type { CanonicalTable } from '../services/sourceParsers.js';
import type { TrackedSecurity } from '../services/securityList.js';
import { findSecurityRows, mergeTables } from '../services/tableMerger.js';
import type { MergedMarketTable } from '../services/tableMerger.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('day');
const historyLog = componentLogger('history');

export type DayPhase = 'fetching' | 'decoding' | 'parsing' | 'merging' | 'persisting' | 'done';

export interface DayOrchestratorDeps {
  dataRoot: string;
  /** Returns the raw export, or throws FetchUnavailableError. */
  fetchSource: (source: SourceDefinition, dateKey: string) => Promise<Uint8Array>;
  sleep?: (ms: number) => Promise<void>;
  pacingMs?: number;
  markets?: Readonly<Record<Market, Readonly<MarketDefinition>>>;
  onPhase?: (phase: DayPhase) => void;
}

export interface DayResult {
  dateKey: string;
  outcome: 'no-data' | 'completed';
  /** Securities whose snapshot and history were written this run. */
  written: string[];
  /** Securities already captured for this date. */
  skippedExisting: string[];
  /** Securities absent from their market's table (or the table was empty). */
  missing: string[];
  failed: string[];
}

interface SourcePayload<T> {
  market: Market;
  source: SourceDefinition;
  value: T;
}

async function fetchMarketSources(
  dateKey: string,
  markets: Readonly<Record<Market, Readonly<MarketDefinition>>>,
  deps: DayOrchestratorDeps,
): Promise<Array<SourcePayload<Uint8Array>>> {
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));
  const pacingMs = Math.max(0, deps.pacingMs ?? PUBLISHER_PACING_MS);
  const payloads: Array<SourcePayload<Uint8Array>> = [];
  for (const market of MARKET_ORDER) {
    const sources = markets[market].sources;
    for (let i = 0; i < sources.length; i++) {
      // Pace successive requests to the same publisher.
      if (i > 0 && pacingMs > 0) await sleep(pacingMs);
      const source = sources[i];
      try {
        payloads.push({ market, source, value: await deps.fetchSource(source, dateKey) });
      } catch (err: unknown) {
        if (!isFetchUnavailableError(err)) throw err;
        log.warn({ dateKey, sourceKey: source.key, reason: err.reason }, err.message);
      }
    }
  }
  return payloads;
}

function decodePayloads(payloads: Array<SourcePayload<Uint8Array>>, dateKey: string): Array<SourcePayload<string>> {
  const decoded: Array<SourcePayload<string>> = [];
  for (const payload of payloads) {
    try {
      decoded.push({ ...payload, value: decodeContent(payload.value) });
    } catch (err: unknown) {
      if (!isDecodeError(err)) throw err;
      log.error({ dateKey, sourceKey: payload.source.key }, `${payload.source.label}: ${err.message}`);
    }
  }
  return decoded;
}

/**
 * Runs one target date end to end: fetch every source, decode, parse, merge
 * per market, then persist each tracked security's row.
 *
 * A security whose snapshot for the date already exists is left untouched. A
 * storage failure for one security is logged and the rest continue.
 */
export async function processDay(
  dateKey: string,
  securities: readonly TrackedSecurity[],
  deps: DayOrchestratorDeps,
): Promise<DayResult> {
  const markets = deps.markets ?? MARKETS;
  const result: DayResult = { dateKey, outcome: 'completed', written: [], skippedExisting: [], missing: [], failed: [] };
  const enterPhase = (phase: DayPhase) => {
    log.debug({ dateKey, phase }, 'phase');
    deps.onPhase?.(phase);
  };

  enterPhase('fetching');
  const payloads = await fetchMarketSources(dateKey, markets, deps);

  enterPhase('decoding');
  const texts = decodePayloads(payloads, dateKey);

  enterPhase('parsing');
  const tablesByMarket: Record<Market, CanonicalTable[]> = { listed: [], otc: [] };
  for (const { market, source, value } of texts) {
    const table = parseSource(value, source);
    if (table.rows.length > 0) tablesByMarket[market].push(table);
  }

  enterPhase('merging');
  const marketTables: Record<Market, MergedMarketTable> = {
    listed: mergeTables(tablesByMarket.listed),
    otc: mergeTables(tablesByMarket.otc),
  };
  if (MARKET_ORDER.every((market) => marketTables[market].rows.length === 0)) {
    log.warn({ dateKey }, 'no market data from any publisher');
    enterPhase('done');
    return { ...result, outcome: 'no-data' };
  }

  enterPhase('persisting');
  for (const security of securities) {
    const { securityId, market } = security;
    const table = marketTables[market];
    const rows = findSecurityRows(table, securityId);
    if (rows.length === 0) {
      result.missing.push(securityId);
      continue;
    }
    if (rows.length > 1) {
      // Sources disagreed on the name; history keeps the last row for the date.
      log.warn({ dateKey, securityId, names: rows.map((row) => row.securityName) }, 'identifier matched several names');
    }
    const paths = resolveSecurityPaths(deps.dataRoot, market, securityId, dateKey);
    try {
      if (await snapshotExists(paths.snapshotPath)) {
        log.info({ dateKey, securityId, path: paths.snapshotPath }, 'snapshot exists, skipping');
        result.skippedExisting.push(securityId);
        continue;
      }
      const record = toDailyRecord(rows, table.fields, dateKey);
      if ((await writeSnapshot(paths.snapshotPath, record)) === 'exists') {
        log.info({ dateKey, securityId, path: paths.snapshotPath }, 'snapshot appeared concurrently, skipping');
        result.skippedExisting.push(securityId);
        continue;
      }
      log.info({ dateKey, securityId, path: paths.snapshotPath }, 'saved snapshot');
      const rowCount = await appendToHistory(paths.historyPath, record);
      historyLog.info({ securityId, rowCount }, 'history updated');
      result.written.push(securityId);
    } catch (err: unknown) {
      log.error({ dateKey, securityId, err }, describeError(err));
      result.failed.push(securityId);
    }
  }

  enterPhase('done');
  return result;
}
