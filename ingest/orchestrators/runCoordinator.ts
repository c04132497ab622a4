import { RUN_CONCURRENCY } from '../config.js';
import { trailingDateKeys } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { isSettledError, mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { componentLogger } from '../logger.js';
import type { TrackedSecurity } from '../services/securityList.js';
import type { DayResult } from './dayOrchestrator.js';

const log = componentLogger('run');

export interface RunOptions {
  /** Trailing calendar days to process, today included. */
  days: number;
  securities: readonly TrackedSecurity[];
  runDay: (dateKey: string, securities: readonly TrackedSecurity[]) => Promise<DayResult>;
  concurrency?: number;
  now?: Date;
}

export interface RunSummary {
  dateKeys: string[];
  results: DayResult[];
  failedDates: Array<{ dateKey: string; message: string }>;
  written: number;
}

/**
 * Processes each target date on a bounded pool. Dates share nothing in
 * memory; one date throwing is reported and the others run to completion.
 */
export async function runCollection(options: RunOptions): Promise<RunSummary> {
  const dateKeys = trailingDateKeys(options.days, options.now);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? RUN_CONCURRENCY));
  log.info({ dates: dateKeys.length, securities: options.securities.length, concurrency }, 'collection started');

  const settled = await mapWithConcurrency(
    dateKeys,
    concurrency,
    (dateKey) => options.runDay(dateKey, options.securities),
    (result, _index, dateKey) => {
      if (isSettledError(result)) {
        log.error({ dateKey, err: result.error }, `date failed unexpectedly: ${describeError(result.error)}`);
      } else {
        log.info(
          {
            dateKey,
            outcome: result.outcome,
            written: result.written.length,
            skipped: result.skippedExisting.length,
            failed: result.failed.length,
          },
          'date settled',
        );
      }
    },
  );

  const summary: RunSummary = { dateKeys, results: [], failedDates: [], written: 0 };
  settled.forEach((result, index) => {
    if (isSettledError(result)) {
      summary.failedDates.push({ dateKey: dateKeys[index], message: describeError(result.error) });
    } else {
      summary.results.push(result);
      summary.written += result.written.length;
    }
  });
  log.info(
    { done: summary.results.length, failed: summary.failedDates.length, written: summary.written },
    'collection finished',
  );
  return summary;
}
