/**
 * Publisher endpoints, header labels and field lookup tables.
 *
 * Frozen at module load; nothing mutates these at run time.
 */

export type Market = 'listed' | 'otc';

export type DateParamFormat = 'compact' | 'roc';

/** Output column names shared by every market table and persisted file. */
export const SECURITY_ID_COLUMN = '證券代號';
export const SECURITY_NAME_COLUMN = '證券名稱';
export const DATE_COLUMN = '日期';

/** Identifiers containing this marker are subtotal / total rows. */
export const AGGREGATE_ROW_MARKER = '計';
/** Column names containing this token hold share counts. */
export const SHARE_COUNT_TOKEN = '股數';

export function isShareCountField(name: string): boolean {
  return name.includes(SHARE_COUNT_TOKEN);
}

interface SourceBase {
  /** Stable key used in logs and error messages. */
  key: string;
  label: string;
  url: string;
  dateParam: string;
  dateFormat: DateParamFormat;
  params: Readonly<Record<string, string>>;
  /** Header line marker: both labels must appear on the same line. */
  idLabel: string;
  nameLabel: string;
}

export interface TwoLevelHeaderField {
  group: string;
  sub: string;
  field: string;
}

export interface TwoLevelHeaderSource extends SourceBase {
  kind: 'two-level-header';
  fields: readonly TwoLevelHeaderField[];
}

export interface ColumnField {
  column: string;
  field: string;
}

export interface FlatWithSuffixSource extends SourceBase {
  kind: 'flat-with-suffix';
  /** Unit marker some exports append to column names, e.g. `(股)`. */
  unitSuffix: string;
  fields: readonly ColumnField[];
}

export interface SimpleSource extends SourceBase {
  kind: 'simple';
  fields: readonly ColumnField[];
}

export type SourceDefinition = TwoLevelHeaderSource | FlatWithSuffixSource | SimpleSource;

export type SourceKind = SourceDefinition['kind'];

export interface MarketDefinition {
  market: Market;
  /** Value of the membership column in the tracked-security list. */
  membershipLabel: string;
  /** Subdirectory of the data root holding this market's securities. */
  directory: string;
  sources: readonly SourceDefinition[];
}

const TWSE_FUND_BASE = 'https://www.twse.com.tw/rwd/zh/fund';
const TWSE_PARAMS = Object.freeze({ response: 'csv' });

function twoLevelFields(group: string, prefix: string): TwoLevelHeaderField[] {
  return ['買進股數', '賣出股數', '買賣超股數'].map((sub) => ({ group, sub, field: `${prefix}_${sub}` }));
}

function freezeSource<T extends SourceDefinition>(source: T): Readonly<T> {
  for (const field of source.fields) Object.freeze(field);
  Object.freeze(source.fields);
  return Object.freeze(source);
}

export const TWSE_FOREIGN_SOURCE = freezeSource<TwoLevelHeaderSource>({
  key: 'twse-foreign',
  label: 'TWSE 外資',
  kind: 'two-level-header',
  url: `${TWSE_FUND_BASE}/TWT38U`,
  dateParam: 'date',
  dateFormat: 'compact',
  params: TWSE_PARAMS,
  idLabel: SECURITY_ID_COLUMN,
  nameLabel: SECURITY_NAME_COLUMN,
  fields: twoLevelFields('外資及陸資', '外資'),
});

export const TWSE_TRUST_SOURCE = freezeSource<SimpleSource>({
  key: 'twse-trust',
  label: 'TWSE 投信',
  kind: 'simple',
  url: `${TWSE_FUND_BASE}/TWT44U`,
  dateParam: 'date',
  dateFormat: 'compact',
  params: TWSE_PARAMS,
  idLabel: SECURITY_ID_COLUMN,
  nameLabel: SECURITY_NAME_COLUMN,
  fields: ['買進股數', '賣出股數', '買賣超股數'].map((column) => ({ column, field: `投信_${column}` })),
});

export const TWSE_DEALER_SOURCE = freezeSource<TwoLevelHeaderSource>({
  key: 'twse-dealer',
  label: 'TWSE 自營商',
  kind: 'two-level-header',
  url: `${TWSE_FUND_BASE}/TWT43U`,
  dateParam: 'date',
  dateFormat: 'compact',
  params: TWSE_PARAMS,
  idLabel: SECURITY_ID_COLUMN,
  nameLabel: SECURITY_NAME_COLUMN,
  fields: [
    ...twoLevelFields('自營商(自行買賣)', '自營商_自行買賣'),
    ...twoLevelFields('自營商(避險)', '自營商_避險'),
  ],
});

const TPEX_COLUMNS = [
  '外資及陸資買進股數',
  '外資及陸資賣出股數',
  '外資及陸資買賣超股數',
  '投信買進股數',
  '投信賣出股數',
  '投信買賣超股數',
  '自營商(自行買賣)買進股數',
  '自營商(自行買賣)賣出股數',
  '自營商(自行買賣)買賣超股數',
  '自營商(避險)買進股數',
  '自營商(避險)賣出股數',
  '自營商(避險)買賣超股數',
];

export const TPEX_INSTITUTIONAL_SOURCE = freezeSource<FlatWithSuffixSource>({
  key: 'tpex-institutional',
  label: 'TPEX 三大法人',
  kind: 'flat-with-suffix',
  url: 'https://www.tpex.org.tw/web/stock/3insti/daily_trade/3itrade_hedge_result.php',
  dateParam: 'd',
  dateFormat: 'roc',
  params: Object.freeze({ t: 'D', o: 'csv' }),
  idLabel: '代號',
  nameLabel: '名稱',
  unitSuffix: '(股)',
  fields: TPEX_COLUMNS.map((column) => ({ column, field: column })),
});

const LISTED_MARKET: MarketDefinition = {
  market: 'listed',
  membershipLabel: '上市',
  directory: 'twse_raw',
  sources: Object.freeze([TWSE_FOREIGN_SOURCE, TWSE_TRUST_SOURCE, TWSE_DEALER_SOURCE]),
};

const OTC_MARKET: MarketDefinition = {
  market: 'otc',
  membershipLabel: '上櫃',
  directory: 'tpex_raw',
  sources: Object.freeze([TPEX_INSTITUTIONAL_SOURCE]),
};

export const MARKETS: Readonly<Record<Market, Readonly<MarketDefinition>>> = Object.freeze({
  listed: Object.freeze(LISTED_MARKET),
  otc: Object.freeze(OTC_MARKET),
});

export const MARKET_ORDER: readonly Market[] = Object.freeze<Market[]>(['listed', 'otc']);

export function marketForMembershipLabel(label: string): Market | null {
  const trimmed = String(label || '').trim();
  for (const market of MARKET_ORDER) {
    if (MARKETS[market].membershipLabel === trimmed) return market;
  }
  return null;
}
