import 'dotenv/config';

import { componentLogger } from './logger.js';

const log = componentLogger('startup-env');

// --- Storage ---
export const DATA_ROOT = String(process.env.DATA_ROOT || './data').trim() || './data';
export const SECURITY_LIST_PATH = String(process.env.SECURITY_LIST_PATH || './stock_list.csv').trim() || './stock_list.csv';

// --- Run scheduling ---
/** Number of target dates processed in parallel. */
export const RUN_CONCURRENCY = Math.max(1, Math.floor(Number(process.env.RUN_CONCURRENCY) || 5));

// --- Publisher requests ---
export const PUBLISHER_TIMEOUT_MS = Math.max(1_000, Number(process.env.PUBLISHER_TIMEOUT_MS) || 15_000);
/** Sleep between successive requests to the same publisher. */
export const PUBLISHER_PACING_MS = Math.max(0, Number(process.env.PUBLISHER_PACING_MS ?? 500) || 0);
/** Responses shorter than this are treated as "no trading data published". */
export const PUBLISHER_MIN_PAYLOAD_BYTES = Math.max(0, Number(process.env.PUBLISHER_MIN_PAYLOAD_BYTES ?? 200) || 0);
export const PUBLISHER_USER_AGENT = String(
  process.env.PUBLISHER_USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
);

// --- Startup validation ---
export function validateStartupEnvironment() {
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  ['RUN_CONCURRENCY', 'PUBLISHER_TIMEOUT_MS'].forEach(warnIfInvalidPositiveNumber);
  ['PUBLISHER_PACING_MS', 'PUBLISHER_MIN_PAYLOAD_BYTES'].forEach(warnIfInvalidNonNegativeNumber);

  for (const warning of warnings) {
    log.warn(warning);
  }
  return warnings;
}
