import * as fs from 'fs/promises';
import { z } from 'zod';

import { marketForMembershipLabel } from '../data/publishers.js';
import type { Market } from '../data/publishers.js';
import { readCsvDocument, splitNonBlankLines } from '../lib/csvText.js';
import { ConfigurationError, hasErrorCode } from '../lib/errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('securities');

export const SECURITY_CODE_COLUMN = 'stock_code';
export const MEMBERSHIP_COLUMN = '上市上櫃';

export interface TrackedSecurity {
  securityId: string;
  market: Market;
}

const TrackedSecurityRowSchema = z
  .object({
    [SECURITY_CODE_COLUMN]: z.string().trim().min(1, 'stock_code is empty'),
    [MEMBERSHIP_COLUMN]: z.string().trim(),
  })
  .passthrough()
  .transform((row, ctx) => {
    const market = marketForMembershipLabel(row[MEMBERSHIP_COLUMN]);
    if (!market) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [MEMBERSHIP_COLUMN],
        message: `unknown market membership "${row[MEMBERSHIP_COLUMN]}"`,
      });
      return z.NEVER;
    }
    return { securityId: row[SECURITY_CODE_COLUMN], market };
  });

/**
 * Parses the tracked-security list. The header row may sit below a preamble,
 * so the first line naming both required columns is taken as the header.
 * Blank rows are ignored; a repeated code keeps its last membership.
 */
export function parseTrackedSecurities(text: string, sourceName = 'security list'): TrackedSecurity[] {
  const lines = splitNonBlankLines(text);
  const headerIndex = lines.findIndex((line) => line.includes(SECURITY_CODE_COLUMN) && line.includes(MEMBERSHIP_COLUMN));
  if (headerIndex === -1) {
    throw new ConfigurationError(
      `${sourceName} has no header line containing "${SECURITY_CODE_COLUMN}" and "${MEMBERSHIP_COLUMN}"`,
    );
  }
  log.debug({ sourceName, line: headerIndex + 1 }, 'security list header found');

  const doc = readCsvDocument(lines.slice(headerIndex).join('\n'));
  const bySecurity = new Map<string, TrackedSecurity>();
  doc.rows.forEach((row, i) => {
    if (Object.values(row).every((value) => value.trim() === '')) return;
    const parsed = TrackedSecurityRowSchema.safeParse(row);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new ConfigurationError(`${sourceName} row ${i + 1} is invalid: ${detail}`);
    }
    bySecurity.delete(parsed.data.securityId);
    bySecurity.set(parsed.data.securityId, parsed.data);
  });
  return [...bySecurity.values()];
}

export async function loadTrackedSecurities(filePath: string): Promise<TrackedSecurity[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new ConfigurationError(`Security list not found: ${filePath}`);
    }
    throw new ConfigurationError(`Security list could not be read (${filePath}): ${String(err)}`);
  }
  const securities = parseTrackedSecurities(text, filePath);
  log.info({ filePath, count: securities.length }, 'tracked securities loaded');
  return securities;
}
