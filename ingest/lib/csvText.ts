import Papa from 'papaparse';

const BOM = '\uFEFF';

export type CsvRecord = Record<string, string>;

export interface CsvDocument {
  columns: string[];
  rows: CsvRecord[];
}

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(1) : text;
}

/** Non-blank lines, with CR stripped and no trimming of the content. */
export function splitNonBlankLines(text: string): string[] {
  return stripBom(String(text || ''))
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.trim() !== '');
}

export function parseCsvLine(line: string): string[] {
  const parsed = Papa.parse<string[]>(line, { delimiter: ',', skipEmptyLines: false });
  return parsed.data[0] ?? [];
}

export function parseCsvLines(lines: readonly string[]): string[][] {
  if (lines.length === 0) return [];
  const parsed = Papa.parse<string[]>(lines.join('\n'), { delimiter: ',', skipEmptyLines: 'greedy' });
  return parsed.data;
}

/**
 * Publishers wrap some cells as Excel formulas (`="0050"`) and pad them with
 * spaces; strip both.
 */
export function cleanCell(value: string | undefined): string {
  return String(value ?? '')
    .replace(/[="]/g, '')
    .trim();
}

// Plain decimal only: Number() would also take hex, binary and exponent forms.
const SHARE_COUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/** `"1,234"` → 1234. Empty, dash or otherwise non-numeric cells give null. */
export function toShareCount(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const cleaned = String(value ?? '').replace(/[,="\s]/g, '');
  if (!SHARE_COUNT_PATTERN.test(cleaned)) return null;
  const numeric = Number(cleaned);
  return Number.isFinite(numeric) ? numeric : null;
}

export function readCsvDocument(text: string): CsvDocument {
  const parsed = Papa.parse<Record<string, string | undefined>>(stripBom(text), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });
  const columns = (parsed.meta.fields ?? []).filter((field) => field !== '');
  const rows = parsed.data.map((raw) => {
    const row: CsvRecord = {};
    for (const column of columns) {
      row[column] = String(raw[column] ?? '');
    }
    return row;
  });
  return { columns, rows };
}

/** UTF-8 with BOM, `\n` line endings, trailing newline. */
export function serializeCsvDocument(doc: CsvDocument): string {
  const body = Papa.unparse(
    {
      fields: doc.columns,
      data: doc.rows.map((row) => doc.columns.map((column) => row[column] ?? '')),
    },
    { newline: '\n' },
  );
  return `${BOM}${body}\n`;
}
