import _ from 'lodash';
import moment from 'moment';
import {
  RawSaleRow,
  SaleRecord,
  AggregateRow,
  ProductRollupRow,
  FilterSelection,
  FilterOptions,
  SalesSummary,
  SalesSeries,
  Table
} from '@/types/sales';
import { EmptyTableError, NormalizationError } from '@/utils/errors';
import { MonthNames } from '@/utils/months';
import { config } from '@/utils/config';

// Slash, dash and dot dates are read day first: 05/03/2024 is 5 March.
// A date that is only valid month first (03/25/2024) is read that way.
const NUMERIC_DATE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})(?:[ T]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/;

function fullYear(year: string): number {
  const value = Number(year);
  if (year.length === 4) return value;
  return value > 68 ? 1900 + value : 2000 + value;
}

function calendarDate(year: number, month: number, day: number): moment.Moment {
  return moment.utc({ year, month: month - 1, date: day });
}

export function parseDocumentDate(value: string): Date | null {
  const text = value.trim();
  const numeric = NUMERIC_DATE.exec(text);
  let parsed: moment.Moment;
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[2]);
    const year = fullYear(numeric[3]);
    parsed = calendarDate(year, second, first);
    if (!parsed.isValid() && first <= 12) {
      parsed = calendarDate(year, first, second);
    }
  } else {
    parsed = moment.utc(text, moment.ISO_8601, true);
  }
  return parsed.isValid() ? parsed.startOf('day').toDate() : null;
}

function sumOf<T>(rows: Table<T>, pick: (row: Readonly<T>) => number): number {
  return rows.reduce((sum, row) => sum + pick(row), 0);
}

export class AnalyticsService {
  constructor(private readonly monthNames: MonthNames = MonthNames.fromConfig(config.monthLocale)) {}

  /**
   * Drop zero-quantity rows and derive calendar fields from the document date
   */
  normalize(rows: Table<RawSaleRow>): SaleRecord[] {
    return rows
      .filter(row => row.quantity !== 0)
      .map(row => {
        const documentDate = parseDocumentDate(row.documentDate);
        if (!documentDate) {
          throw new NormalizationError(`Unrecognized document date "${row.documentDate}"`, {
            productCode: row.productCode,
            documentDate: row.documentDate
          });
        }
        const monthNumber = documentDate.getUTCMonth() + 1;
        return {
          ...row,
          documentDate,
          year: documentDate.getUTCFullYear(),
          monthNumber,
          monthName: this.monthNames.nameOf(monthNumber)
        };
      });
  }

  /**
   * Keep rows matching every axis of the selection. An empty product-code set means no restriction.
   */
  applyFilters(rows: Table<SaleRecord>, selection: FilterSelection): Table<SaleRecord> {
    const { years, months, productCodes, customerClasses } = selection;
    return rows.filter(row =>
      years.has(row.year) &&
      months.has(row.monthName) &&
      (productCodes.size === 0 || productCodes.has(row.productCode)) &&
      customerClasses.has(row.customerClass)
    );
  }

  /**
   * One row per product and calendar month. Descriptive fields come from the
   * first row of each group in input order.
   */
  aggregateMonthly(rows: Table<SaleRecord>): AggregateRow[] {
    const groups = _.groupBy(rows, row => JSON.stringify([row.productCode, row.year, row.monthNumber, row.monthName]));

    const aggregated = Object.values(groups).map((group): AggregateRow => {
      const first = group[0];
      return {
        productCode: first.productCode,
        year: first.year,
        monthNumber: first.monthNumber,
        monthName: first.monthName,
        documentDate: first.documentDate,
        productName: first.productName,
        customerClass: first.customerClass,
        documentStatus: first.documentStatus,
        quantity: sumOf(group, row => row.quantity),
        totalPriceOrig: sumOf(group, row => row.totalPriceOrig)
      };
    });

    return _.sortBy(
      aggregated.filter(row => row.quantity !== 0 && row.totalPriceOrig !== 0),
      ['year', 'monthNumber', 'productCode']
    );
  }

  calculateSummary(rows: Table<AggregateRow>): SalesSummary {
    if (rows.length === 0) {
      throw new EmptyTableError();
    }

    let maxRow = rows[0];
    let minRow = rows[0];
    for (const row of rows) {
      // strict comparisons keep the first row on ties
      if (row.totalPriceOrig > maxRow.totalPriceOrig) maxRow = row;
      if (row.totalPriceOrig < minRow.totalPriceOrig) minRow = row;
    }

    return {
      totalSales: sumOf(rows, row => row.totalPriceOrig),
      itemCount: rows.length,
      maxRow,
      minRow
    };
  }

  /**
   * Per-article view over the monthly aggregate, smallest quantity first
   */
  rollupByProduct(rows: Table<AggregateRow>): ProductRollupRow[] {
    const groups = _.groupBy(rows, row => row.productCode);

    const rollup = Object.values(groups).map((group): ProductRollupRow => ({
      productCode: group[0].productCode,
      productName: group[0].productName,
      customerClass: group[0].customerClass,
      quantity: sumOf(group, row => row.quantity),
      totalPriceOrig: sumOf(group, row => row.totalPriceOrig)
    }));

    return _.sortBy(
      rollup.filter(row => row.quantity > 0),
      ['quantity', 'productCode']
    );
  }

  buildSeries(rows: Table<AggregateRow>, summary: SalesSummary): SalesSeries {
    return {
      points: rows.map(row => ({
        documentDate: row.documentDate,
        totalPriceOrig: row.totalPriceOrig,
        productName: row.productName,
        productCode: row.productCode
      })),
      max: summary.maxRow.totalPriceOrig,
      min: summary.minRow.totalPriceOrig
    };
  }

  /**
   * Distinct values per filter axis; months in calendar order
   */
  getFilterOptions(rows: Table<SaleRecord>): FilterOptions {
    const months = _.sortBy(_.uniq(rows.map(row => row.monthName)), name => this.monthNames.numberOf(name));
    return {
      years: _.uniq(rows.map(row => row.year)).sort((a, b) => a - b),
      months,
      productCodes: _.uniq(rows.map(row => row.productCode)).sort(),
      customerClasses: _.uniq(rows.map(row => row.customerClass)).sort()
    };
  }
}

export const analyticsService = new AnalyticsService();
