import { AnalyticsService, analyticsService } from '@/services/analyticsService';
import { SalesSourceService, getSalesSourceService } from '@/services/salesSourceService';
import { encodeCsv, ensureCsvExtension, suggestFileName } from '@/services/exportService';
import { DataHealth, FetchMeta, FilterOptionsResult, FilterSelection, SalesReport, SaleRecord } from '@/types/sales';
import { EmptyResultError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface CsvExport {
  fileName: string;
  buffer: Buffer;
  fetch: FetchMeta;
}

interface LoadedRecords {
  records: SaleRecord[];
  fetch: FetchMeta;
}

export function formatDuration(durationMs: number): { minutes: number; seconds: number } {
  const totalSeconds = durationMs / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round((totalSeconds - minutes * 60) * 10) / 10;
  return { minutes, seconds };
}

/**
 * Runs load, normalize, filter, aggregate, summary and rollup for one selection.
 * Each call starts from the loaded table; nothing computed here is kept between calls.
 */
export class SalesReportService {
  constructor(
    private readonly source: () => SalesSourceService = getSalesSourceService,
    private readonly analytics: AnalyticsService = analyticsService,
    private readonly now: () => number = Date.now
  ) {}

  async runReport(selection: FilterSelection): Promise<SalesReport> {
    const startedAt = this.now();
    const { records, fetch } = await this.loadRecords();

    const filtered = this.analytics.applyFilters(records, selection);
    if (filtered.length === 0) {
      throw new EmptyResultError('filter');
    }

    const rows = this.analytics.aggregateMonthly(filtered);
    if (rows.length === 0) {
      throw new EmptyResultError('aggregate');
    }

    const summary = this.analytics.calculateSummary(rows);
    const productRollup = this.analytics.rollupByProduct(rows);
    const series = this.analytics.buildSeries(rows, summary);
    const durationMs = this.now() - startedAt;

    logger.info('Sales report computed', {
      filteredRows: filtered.length,
      aggregatedRows: rows.length,
      products: productRollup.length,
      durationMs
    });

    return { rows, summary, productRollup, series, durationMs, fetch };
  }

  async exportCsv(selection: FilterSelection, fileName?: string): Promise<CsvExport> {
    const { rows, fetch } = await this.runReport(selection);
    const name = fileName && fileName.trim()
      ? ensureCsvExtension(fileName.trim())
      : suggestFileName(selection.years, selection.months);
    return { fileName: name, buffer: encodeCsv(rows), fetch };
  }

  async getFilterOptions(): Promise<FilterOptionsResult> {
    const { records, fetch } = await this.loadRecords();
    return { options: this.analytics.getFilterOptions(records), fetch };
  }

  async getDataHealth(): Promise<DataHealth> {
    const { rows, meta } = await this.source().fetchSalesData();
    const normalized = this.analytics.normalize(rows);
    return {
      loadedRows: rows.length,
      normalizedRows: normalized.length,
      droppedZeroQuantityRows: rows.length - normalized.length,
      fetch: meta
    };
  }

  private async loadRecords(): Promise<LoadedRecords> {
    const { rows, meta } = await this.source().fetchSalesData();
    return { records: this.analytics.normalize(rows), fetch: meta };
  }
}

export const salesReportService = new SalesReportService();
