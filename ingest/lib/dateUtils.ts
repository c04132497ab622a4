/**
 * Date-key helpers. A date key is a `YYYY-MM-DD` string for a Taipei
 * calendar date; all arithmetic happens on UTC midnights so it never
 * drifts across DST or host time zones.
 */

const MARKET_TIME_ZONE = 'Asia/Taipei';
const ROC_YEAR_OFFSET = 1911;
const DAY_MS = 24 * 60 * 60 * 1000;

function currentTaipeiDateString(nowUtc: Date = new Date()): string {
  return nowUtc.toLocaleDateString('en-CA', {
    timeZone: MARKET_TIME_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  // Reject rollovers such as 2024-02-30.
  return new Date(ms).toISOString().slice(0, 10) === value ? ms : NaN;
}

function isDateKey(value: string): boolean {
  return Number.isFinite(parseDateKeyToUtcMs(value));
}

function dateKeyDaysAgo(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  const shifted = new Date(baseMs - Math.max(0, Number(days) || 0) * DAY_MS);
  return shifted.toISOString().slice(0, 10);
}

/** Today plus the `days - 1` calendar days before it, newest first. */
function trailingDateKeys(days: number, nowUtc: Date = new Date()): string[] {
  const count = Math.max(0, Math.floor(Number(days) || 0));
  const today = currentTaipeiDateString(nowUtc);
  return Array.from({ length: count }, (_, i) => dateKeyDaysAgo(today, i));
}

/** `2024-05-02` → `20240502` */
function toCompactDate(dateKey: string): string {
  if (!isDateKey(dateKey)) throw new RangeError(`Invalid date key: ${dateKey}`);
  return dateKey.replace(/-/g, '');
}

/** `2024-05-02` → `113/05/02` (Minguo calendar year). */
function toRocDate(dateKey: string): string {
  if (!isDateKey(dateKey)) throw new RangeError(`Invalid date key: ${dateKey}`);
  const [year, month, day] = dateKey.split('-');
  return `${Number(year) - ROC_YEAR_OFFSET}/${month}/${day}`;
}

export {
  currentTaipeiDateString,
  parseDateKeyToUtcMs,
  isDateKey,
  dateKeyDaysAgo,
  trailingDateKeys,
  toCompactDate,
  toRocDate,
};
