import { Request, Response } from 'express';
import moment from 'moment';
import { SalesReportService, salesReportService, formatDuration } from '@/services/reportService';
import { suggestFileName } from '@/services/exportService';
import { AggregateRow, ApiResponse, ErrorResponse, FetchMeta, FilterOptions, FilterSelection, SalesReport } from '@/types/sales';
import { AppError, EmptyResultError } from '@/utils/errors';
import { logger } from '@/utils/logger';

/**
 * Split `a,b` or repeated `?k=a&k=b` into a list. Undefined when the key is absent,
 * empty when its only value is blank. Empty items are kept: `,Minorista` selects
 * the blank class and `Minorista`.
 */
export function parseList(value: unknown): string[] | undefined {
  if (value === undefined) return undefined;
  const raw = Array.isArray(value) ? value.map(String) : [String(value)];
  if (raw.length === 1 && raw[0].trim() === '') return [];
  return raw
    .flatMap(item => item.split(','))
    .map(item => item.trim());
}

/**
 * Build a selection from query parameters. An absent axis selects every
 * available value; a present but empty one selects nothing. Product codes
 * are unrestricted unless listed.
 */
export function parseSelection(query: Request['query'], options: FilterOptions): FilterSelection {
  const years = parseList(query.years);
  const months = parseList(query.months);
  const productCodes = parseList(query.productCodes);
  const customerClasses = parseList(query.customerClasses);

  return {
    years: new Set(years ? years.map(year => parseInt(year, 10)) : options.years),
    months: new Set(months ?? options.months),
    productCodes: new Set((productCodes ?? []).filter(Boolean)),
    customerClasses: new Set(customerClasses ?? options.customerClasses)
  };
}

type RowDto = Omit<AggregateRow, 'documentDate'> & { documentDate: string };

interface ReportDto {
  rows: RowDto[];
  summary: { totalSales: number; itemCount: number; maxRow: RowDto; minRow: RowDto };
  productRollup: SalesReport['productRollup'];
  series: {
    points: { documentDate: string; totalPriceOrig: number; productName: string; productCode: string }[];
    max: number;
    min: number;
  };
  durationMs: number;
  duration: { minutes: number; seconds: number };
  suggestedFileName: string;
}

function toRowDto(row: Readonly<AggregateRow>): RowDto {
  return {
    ...row,
    documentDate: moment.utc(row.documentDate).format('YYYY-MM-DD')
  };
}

export class SalesController {
  constructor(private readonly reports: SalesReportService = salesReportService) {}

  /**
   * Get available filter options for every selection axis
   */
  async getFilterOptions(req: Request, res: Response) {
    try {
      logger.info('Getting filter options');
      const { options, fetch } = await this.reports.getFilterOptions();
      this.setSourceHeaders(res, fetch);
      const body: ApiResponse<FilterOptions> = { success: true, data: options };
      res.json(body);
    } catch (error) {
      this.sendError(res, error, 'FILTER_OPTIONS_ERROR', 'Failed to get filter options');
    }
  }

  /**
   * Get the monthly aggregate, summary, product rollup and chart series for a selection
   */
  async getReport(req: Request, res: Response) {
    try {
      logger.info('Getting sales report');
      const selection = await this.resolveSelection(req);
      const report = await this.reports.runReport(selection);
      this.setSourceHeaders(res, report.fetch);
      const body: ApiResponse<ReportDto> = { success: true, data: this.toReportDto(report, selection) };
      res.json(body);
    } catch (error) {
      if (error instanceof EmptyResultError) {
        const body: ApiResponse<null> = { success: true, data: null, message: error.message };
        res.json(body);
        return;
      }
      this.sendError(res, error, 'REPORT_ERROR', 'Failed to get sales report');
    }
  }

  /**
   * Download the monthly aggregate as CSV
   */
  async exportCSV(req: Request, res: Response) {
    try {
      logger.info('Exporting sales report as CSV');
      const selection = await this.resolveSelection(req);
      const fileName = typeof req.query.fileName === 'string' ? req.query.fileName : undefined;
      const { fileName: name, buffer, fetch } = await this.reports.exportCsv(selection, fileName);
      this.setSourceHeaders(res, fetch);
      res.attachment(name);
      res.type('text/csv; charset=utf-8');
      res.send(buffer);
    } catch (error) {
      if (error instanceof EmptyResultError) {
        res.status(404).json(this.errorBody(error, error.code, error.message));
        return;
      }
      this.sendError(res, error, 'EXPORT_ERROR', 'Failed to export sales report');
    }
  }

  /**
   * Get row counts and loader metadata
   */
  async getDataHealth(req: Request, res: Response) {
    try {
      logger.info('Getting data health');
      const health = await this.reports.getDataHealth();
      this.setSourceHeaders(res, health.fetch);
      res.json({ success: true, data: { ...health, status: 'healthy' } });
    } catch (error) {
      this.sendError(res, error, 'DATA_HEALTH_ERROR', 'Failed to get data health');
    }
  }

  private async resolveSelection(req: Request): Promise<FilterSelection> {
    const { options } = await this.reports.getFilterOptions();
    return parseSelection(req.query, options);
  }

  private toReportDto(report: SalesReport, selection: FilterSelection): ReportDto {
    return {
      rows: report.rows.map(toRowDto),
      summary: {
        totalSales: report.summary.totalSales,
        itemCount: report.summary.itemCount,
        maxRow: toRowDto(report.summary.maxRow),
        minRow: toRowDto(report.summary.minRow)
      },
      productRollup: report.productRollup,
      series: {
        ...report.series,
        points: report.series.points.map(point => ({
          ...point,
          documentDate: moment.utc(point.documentDate).format('YYYY-MM-DD')
        }))
      },
      durationMs: report.durationMs,
      duration: formatDuration(report.durationMs),
      suggestedFileName: suggestFileName(selection.years, selection.months)
    };
  }

  private setSourceHeaders(res: Response, meta: FetchMeta) {
    res.setHeader('x-data-source', meta.source);
    res.setHeader('x-row-count', String(meta.rowCount));
    res.setHeader('x-source-encoding', meta.encoding);
    res.setHeader('x-last-updated', meta.lastUpdated);
  }

  private errorBody(error: unknown, code: string, message: string): ErrorResponse {
    if (error instanceof AppError) {
      return {
        success: false,
        error: { code: error.code, message: error.message, stage: error.stage, details: error.details }
      };
    }
    return {
      success: false,
      error: { code, message, details: error instanceof Error ? error.message : 'Unknown error' }
    };
  }

  private sendError(res: Response, error: unknown, code: string, message: string) {
    logger.error(`${message}:`, error);
    const status = error instanceof AppError ? error.status : 500;
    res.status(status).json(this.errorBody(error, code, message));
  }
}

export const salesController = new SalesController();
