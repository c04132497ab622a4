/**
 * Source parsers. Each turns one publisher's decoded CSV export into a
 * CanonicalTable.
 *
 * Three header layouts are handled, one strategy per `SourceDefinition.kind`:
 *
 *   two-level-header  group row + sub-label row; blank groups inherit leftward
 *   flat-with-suffix  single row; a column may carry a unit suffix such as `(股)`
 *   simple            single row; columns renamed 1:1
 *
 * Parsers never throw. A document without a recognisable header is an empty
 * table (no trading that day); anything unexpected is logged as a ParseError
 * and also comes back empty.
 */

import { AGGREGATE_ROW_MARKER } from '../data/publishers.js';
import type { FlatWithSuffixSource, SimpleSource, SourceDefinition, TwoLevelHeaderSource } from '../data/publishers.js';
import { cleanCell, parseCsvLine, parseCsvLines, splitNonBlankLines, toShareCount } from '../lib/csvText.js';
import { ParseError } from '../lib/errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('parser');

export interface CanonicalRow {
  securityId: string;
  securityName: string;
  shares: Record<string, number | null>;
}

export interface CanonicalTable {
  sourceKey: string;
  /** Share-count fields carried by every row, in output order. */
  fields: string[];
  rows: CanonicalRow[];
}

export function emptyTable(sourceKey: string): CanonicalTable {
  return { sourceKey, fields: [], rows: [] };
}

// ---------------------------------------------------------------------------
// Shared steps
// ---------------------------------------------------------------------------

function findHeaderLineIndex(lines: readonly string[], idLabel: string, nameLabel: string): number {
  return lines.findIndex((line) => line.includes(idLabel) && line.includes(nameLabel));
}

function isAggregateOrBlankId(securityId: string): boolean {
  return securityId === '' || securityId.includes(AGGREGATE_ROW_MARKER);
}

interface ColumnSelection {
  idIndex: number;
  nameIndex: number;
  /** Output field name → column index. */
  fieldIndexes: Array<{ field: string; index: number }>;
}

function buildRows(sourceKey: string, dataRows: readonly string[][], selection: ColumnSelection): CanonicalTable {
  const byId = new Map<string, CanonicalRow>();
  for (const cells of dataRows) {
    const securityId = cleanCell(cells[selection.idIndex]);
    if (isAggregateOrBlankId(securityId)) continue;
    const shares: Record<string, number | null> = {};
    for (const { field, index } of selection.fieldIndexes) {
      shares[field] = toShareCount(cells[index]);
    }
    if (byId.has(securityId)) {
      log.warn({ sourceKey, securityId }, 'duplicate identifier, keeping the later row');
    }
    byId.set(securityId, {
      securityId,
      securityName: cleanCell(cells[selection.nameIndex]),
      shares,
    });
  }
  return {
    sourceKey,
    fields: selection.fieldIndexes.map((f) => f.field),
    rows: [...byId.values()],
  };
}

// ---------------------------------------------------------------------------
// two-level-header
// ---------------------------------------------------------------------------

/** Fill blank group labels from the nearest non-blank label to their left. */
export function forwardFillGroups(groups: readonly string[]): string[] {
  const filled: string[] = [];
  let current = '';
  for (const raw of groups) {
    const label = cleanCell(raw);
    if (label) current = label;
    filled.push(current);
  }
  return filled;
}

function headerKey(group: string, sub: string): string {
  return `${group}\u0000${sub}`;
}

function parseTwoLevelHeader(lines: readonly string[], headerIndex: number, source: TwoLevelHeaderSource): CanonicalTable {
  if (headerIndex + 1 >= lines.length) return emptyTable(source.key);
  const groupRow = parseCsvLine(lines[headerIndex]);
  const subRow = parseCsvLine(lines[headerIndex + 1]);
  const width = Math.max(groupRow.length, subRow.length);
  const groups = forwardFillGroups(Array.from({ length: width }, (_, i) => groupRow[i] ?? ''));

  const keyToIndex = new Map<string, number>();
  for (let i = 0; i < width; i++) {
    const key = headerKey(groups[i], cleanCell(subRow[i]));
    if (!keyToIndex.has(key)) keyToIndex.set(key, i);
  }

  const idIndex = keyToIndex.get(headerKey(source.idLabel, source.idLabel));
  const nameIndex = keyToIndex.get(headerKey(source.nameLabel, source.nameLabel));
  if (idIndex === undefined || nameIndex === undefined) {
    throw new Error(`two-level header lacks (${source.idLabel}) / (${source.nameLabel}) columns`);
  }

  const fieldIndexes: ColumnSelection['fieldIndexes'] = [];
  for (const mapping of source.fields) {
    const index = keyToIndex.get(headerKey(mapping.group, mapping.sub));
    if (index === undefined) {
      log.warn({ sourceKey: source.key, group: mapping.group, sub: mapping.sub }, `no such column, ${mapping.field} omitted`);
      continue;
    }
    fieldIndexes.push({ field: mapping.field, index });
  }

  return buildRows(source.key, parseCsvLines(lines.slice(headerIndex + 2)), { idIndex, nameIndex, fieldIndexes });
}

// ---------------------------------------------------------------------------
// flat-with-suffix / simple
// ---------------------------------------------------------------------------

function singleHeaderColumns(line: string): Map<string, number> {
  const columns = new Map<string, number>();
  parseCsvLine(line).forEach((raw, index) => {
    const name = cleanCell(raw);
    if (name && !columns.has(name)) columns.set(name, index);
  });
  return columns;
}

function requireColumn(columns: Map<string, number>, name: string): number {
  const index = columns.get(name);
  if (index === undefined) throw new Error(`header lacks column ${name}`);
  return index;
}

function parseFlatWithSuffix(lines: readonly string[], headerIndex: number, source: FlatWithSuffixSource): CanonicalTable {
  const columns = singleHeaderColumns(lines[headerIndex]);
  const fieldIndexes: ColumnSelection['fieldIndexes'] = [];
  for (const mapping of source.fields) {
    const index = columns.get(mapping.column) ?? columns.get(`${mapping.column}${source.unitSuffix}`);
    if (index !== undefined) fieldIndexes.push({ field: mapping.field, index });
  }
  return buildRows(source.key, parseCsvLines(lines.slice(headerIndex + 1)), {
    idIndex: requireColumn(columns, source.idLabel),
    nameIndex: requireColumn(columns, source.nameLabel),
    fieldIndexes,
  });
}

function parseSimple(lines: readonly string[], headerIndex: number, source: SimpleSource): CanonicalTable {
  const columns = singleHeaderColumns(lines[headerIndex]);
  const fieldIndexes = source.fields.map((mapping) => ({ field: mapping.field, index: requireColumn(columns, mapping.column) }));
  return buildRows(source.key, parseCsvLines(lines.slice(headerIndex + 1)), {
    idIndex: requireColumn(columns, source.idLabel),
    nameIndex: requireColumn(columns, source.nameLabel),
    fieldIndexes,
  });
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function parseByKind(lines: readonly string[], headerIndex: number, source: SourceDefinition): CanonicalTable {
  switch (source.kind) {
    case 'two-level-header':
      return parseTwoLevelHeader(lines, headerIndex, source);
    case 'flat-with-suffix':
      return parseFlatWithSuffix(lines, headerIndex, source);
    case 'simple':
      return parseSimple(lines, headerIndex, source);
  }
}

export function parseSource(text: string, source: SourceDefinition): CanonicalTable {
  try {
    const lines = splitNonBlankLines(text);
    if (lines.length < 2) return emptyTable(source.key);
    const headerIndex = findHeaderLineIndex(lines, source.idLabel, source.nameLabel);
    if (headerIndex === -1) return emptyTable(source.key);
    return parseByKind(lines, headerIndex, source);
  } catch (err: unknown) {
    const parseError = new ParseError(source.key, err);
    log.error({ sourceKey: source.key, err: parseError }, `${source.label}: ${parseError.message}`);
    return emptyTable(source.key);
  }
}
