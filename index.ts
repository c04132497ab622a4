#!/usr/bin/env node
import logger from './ingest/logger.js';
import { parseArgs } from 'util';

import {
  DATA_ROOT,
  PUBLISHER_MIN_PAYLOAD_BYTES,
  PUBLISHER_TIMEOUT_MS,
  RUN_CONCURRENCY,
  SECURITY_LIST_PATH,
  validateStartupEnvironment,
} from './ingest/config.js';
import { isConfigurationError } from './ingest/lib/errors.js';
import { processDay } from './ingest/orchestrators/dayOrchestrator.js';
import { runCollection } from './ingest/orchestrators/runCoordinator.js';
import { createSourceFetcher } from './ingest/services/publisherClient.js';
import { loadTrackedSecurities } from './ingest/services/securityList.js';
import type { TrackedSecurity } from './ingest/services/securityList.js';

function parseDaysArg(argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      days: { type: 'string', short: 'd', default: '1' },
    },
  });
  const days = Number(values.days);
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`--days must be a positive integer (received: ${String(values.days)})`);
  }
  return days;
}

async function main(argv: string[]): Promise<number> {
  let days: number;
  try {
    days = parseDaysArg(argv);
  } catch (err: unknown) {
    logger.fatal(err instanceof Error ? err.message : String(err));
    return 1;
  }

  validateStartupEnvironment();

  let securities: TrackedSecurity[];
  try {
    securities = await loadTrackedSecurities(SECURITY_LIST_PATH);
  } catch (err: unknown) {
    if (isConfigurationError(err)) {
      logger.fatal(err.message);
      return 1;
    }
    throw err;
  }

  const fetchSource = createSourceFetcher({
    timeoutMs: PUBLISHER_TIMEOUT_MS,
    minPayloadBytes: PUBLISHER_MIN_PAYLOAD_BYTES,
  });
  const summary = await runCollection({
    days,
    securities,
    concurrency: RUN_CONCURRENCY,
    runDay: (dateKey, tracked) => processDay(dateKey, tracked, { dataRoot: DATA_ROOT, fetchSource }),
  });
  logger.info({ dates: summary.dateKeys.length, failedDates: summary.failedDates.length, written: summary.written }, 'all tasks finished');
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'collector crashed');
    process.exitCode = 1;
  });
