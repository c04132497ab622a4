import { isShareCountField } from '../data/publishers.js';
import type { CanonicalTable } from './sourceParsers.js';

export interface MergedRow {
  securityId: string;
  securityName: string;
  shares: Record<string, number>;
}

export interface MergedMarketTable {
  fields: string[];
  rows: MergedRow[];
}

export function emptyMergedTable(): MergedMarketTable {
  return { fields: [], rows: [] };
}

function joinKey(securityId: string, securityName: string): string {
  return `${securityId}\u0000${securityName}`;
}

// A failed parse yields neither fields nor rows. A header-only export still
// names its fields, and those are zero-filled for every joined row.
function isJoinable(table: CanonicalTable): boolean {
  return table.fields.length > 0 || table.rows.length > 0;
}

/**
 * Full outer join of per-source tables on (securityId, securityName).
 *
 * Field names are already source-qualified, so columns never collide. After
 * the join every share-count field a security did not report is 0: the
 * source published no activity for it that day.
 */
export function mergeTables(tables: readonly CanonicalTable[]): MergedMarketTable {
  const usable = tables.filter(isJoinable);
  if (usable.length === 0) return emptyMergedTable();

  const fields: string[] = [];
  const rowsByKey = new Map<string, { securityId: string; securityName: string; shares: Record<string, number | null> }>();

  for (const table of usable) {
    for (const field of table.fields) {
      if (isShareCountField(field) && !fields.includes(field)) fields.push(field);
    }
    for (const row of table.rows) {
      if (row.securityId === '') continue;
      const key = joinKey(row.securityId, row.securityName);
      const existing = rowsByKey.get(key);
      if (existing) {
        Object.assign(existing.shares, row.shares);
      } else {
        rowsByKey.set(key, { securityId: row.securityId, securityName: row.securityName, shares: { ...row.shares } });
      }
    }
  }

  const rows: MergedRow[] = [];
  for (const row of rowsByKey.values()) {
    const shares: Record<string, number> = {};
    for (const field of fields) {
      shares[field] = row.shares[field] ?? 0;
    }
    rows.push({ securityId: row.securityId, securityName: row.securityName, shares });
  }
  return { fields, rows };
}

/** Every merged row for an identifier; more than one when sources spell its name differently. */
export function findSecurityRows(table: MergedMarketTable, securityId: string): MergedRow[] {
  return table.rows.filter((row) => row.securityId === securityId);
}
