import moment from 'moment';
import { stringify } from 'csv-stringify/sync';
import { AggregateRow, SOURCE_COLUMNS, Table } from '@/types/sales';

export const EXPORT_COLUMNS = [
  SOURCE_COLUMNS.documentDate,
  SOURCE_COLUMNS.productCode,
  SOURCE_COLUMNS.productName,
  SOURCE_COLUMNS.customerClass,
  SOURCE_COLUMNS.quantity,
  SOURCE_COLUMNS.totalPriceOrig,
  SOURCE_COLUMNS.documentStatus
];

const MANY_YEARS = 'varios_años';
const MANY_MONTHS = 'varios_meses';
const MAX_LISTED_VALUES = 3;

/**
 * CSV bytes prefixed with a UTF-8 byte-order mark
 */
export function encodeCsv(rows: Table<AggregateRow>): Buffer {
  const records = rows.map(row => ({
    [SOURCE_COLUMNS.documentDate]: moment.utc(row.documentDate).format('YYYY-MM-DD'),
    [SOURCE_COLUMNS.productCode]: row.productCode,
    [SOURCE_COLUMNS.productName]: row.productName,
    [SOURCE_COLUMNS.customerClass]: row.customerClass,
    [SOURCE_COLUMNS.quantity]: row.quantity,
    [SOURCE_COLUMNS.totalPriceOrig]: row.totalPriceOrig,
    [SOURCE_COLUMNS.documentStatus]: row.documentStatus
  }));

  const text = stringify(records, {
    bom: true,
    header: true,
    columns: EXPORT_COLUMNS,
    delimiter: ','
  });
  return Buffer.from(text, 'utf8');
}

export function suggestFileName(years: Iterable<number>, months: Iterable<string>): string {
  const distinctYears = [...new Set(years)].sort((a, b) => a - b);
  const distinctMonths = [...new Set(months)].sort();

  const yearsPart = distinctYears.length <= MAX_LISTED_VALUES
    ? distinctYears.join('_')
    : MANY_YEARS;
  const monthsPart = distinctMonths.length <= MAX_LISTED_VALUES
    ? distinctMonths.map(month => month.slice(0, 3).toLowerCase()).join('_')
    : MANY_MONTHS;

  return `ventas_${yearsPart}_${monthsPart}.csv`;
}

export function ensureCsvExtension(fileName: string): string {
  return fileName.endsWith('.csv') ? fileName : `${fileName}.csv`;
}
