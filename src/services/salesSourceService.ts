import axios from 'axios';
import csv from 'csv-parser';
import { Readable } from 'stream';
import Joi from 'joi';
import { RawSaleRow, FetchMeta, SOURCE_COLUMNS, Table } from '@/types/sales';
import { LoadError } from '@/utils/errors';
import { Decoder, fatalDecoder, firstSuccessfulEncoding, detectDelimiter, stripBom, SOURCE_ENCODINGS } from '@/utils/encoding';
import { logger } from '@/utils/logger';
import { config } from '@/utils/config';
import { CacheService, cacheService } from '@/services/cacheService';

export type FetchBuffer = (url: string, timeoutMs: number) => Promise<Buffer>;

export interface SalesSourceOptions {
  sourceUrl?: string;
  timeoutMs?: number;
  cacheTtlSeconds?: number;
  cache?: CacheService;
  fetchBuffer?: FetchBuffer;
  decoder?: Decoder;
  encodings?: readonly string[];
}

interface LoadedTable {
  rows: Table<RawSaleRow>;
  encoding: string;
  fetchedAt: string;
}

export interface SalesTable {
  rows: Table<RawSaleRow>;
  meta: FetchMeta;
}

export type DecimalMark = ',' | '.';

/**
 * Semicolon-delimited exports write decimals with a comma and group thousands with a dot.
 */
export function decimalMarkFor(delimiter: string): DecimalMark {
  return delimiter === ';' ? ',' : '.';
}

/**
 * Force raw-download semantics on shared-file links.
 */
export function ensureDownloadParam(url: string): string {
  if (url.includes('download=1')) {
    return url;
  }
  const joiner = url.includes('?') ? '&' : '?';
  return `${url}${joiner}download=1`;
}

/**
 * Parse number safely, handling currency symbols and thousands separators
 */
export function parseNumber(value: unknown, decimalMark: DecimalMark = '.'): number {
  if (value === null || value === undefined || value === '') {
    return 0;
  }
  if (typeof value === 'number') {
    return value;
  }

  const thousandsMark = decimalMark === ',' ? '.' : ',';
  const cleaned = String(value)
    .replace(/[€£$\s]/g, '')
    .split(thousandsMark).join('')
    .replace(decimalMark, '.');
  const parsed = parseFloat(cleaned);

  return isNaN(parsed) ? 0 : parsed;
}

// Thousands groups must be exactly three digits, so `12,5` is not read as 125 under a decimal point.
const NUMBER_PATTERNS: Record<DecimalMark, RegExp> = {
  '.': /^[-+]?[€£$]?\s*(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/,
  ',': /^[-+]?[€£$]?\s*(\d{1,3}(\.\d{3})+|\d+)(,\d+)?$/
};

function buildRowSchema(decimalMark: DecimalMark): Joi.ObjectSchema {
  const numeric = Joi.string().trim().pattern(NUMBER_PATTERNS[decimalMark], `number with "${decimalMark}" decimals`);
  return Joi.object({
    [SOURCE_COLUMNS.productCode]: Joi.string().trim().required(),
    [SOURCE_COLUMNS.productName]: Joi.string().allow('').required(),
    [SOURCE_COLUMNS.customerClass]: Joi.string().allow('').required(),
    [SOURCE_COLUMNS.documentDate]: Joi.string().trim().required(),
    [SOURCE_COLUMNS.quantity]: numeric.required(),
    [SOURCE_COLUMNS.totalPriceOrig]: numeric.required(),
    [SOURCE_COLUMNS.documentStatus]: Joi.string().allow('').required()
  }).unknown(true);
}

const ROW_SCHEMAS: Record<DecimalMark, Joi.ObjectSchema> = {
  '.': buildRowSchema('.'),
  ',': buildRowSchema(',')
};

const axiosFetchBuffer: FetchBuffer = async (url, timeoutMs) => {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: timeoutMs,
    maxRedirects: 10
  });
  return Buffer.from(response.data);
};

/**
 * Parse delimited text into rows keyed by trimmed header names.
 * Rejects on malformed input (rows whose width differs from the header).
 */
export function parseDelimited(
  text: string
): Promise<{ headers: string[]; rows: Record<string, string>[]; separator: string }> {
  const separator = detectDelimiter(text);
  const rows: Record<string, string>[] = [];
  let headers: string[] = [];

  return new Promise((resolve, reject) => {
    Readable.from([text])
      .pipe(csv({
        separator,
        strict: true,
        mapHeaders: ({ header }) => stripBom(header).trim()
      }))
      .on('headers', (parsed: string[]) => {
        headers = parsed;
      })
      .on('data', (row: Record<string, string>) => {
        rows.push(row);
      })
      .on('end', () => resolve({ headers, rows, separator }))
      .on('error', (error: Error) => reject(error));
  });
}

export class SalesSourceService {
  private readonly sourceUrl: string;
  private readonly timeoutMs: number;
  private readonly cacheTtlSeconds: number;
  private readonly cache: CacheService;
  private readonly fetchBuffer: FetchBuffer;
  private readonly decoder: Decoder;
  private readonly encodings: readonly string[];

  constructor(options: SalesSourceOptions = {}) {
    this.sourceUrl = options.sourceUrl ?? config.salesSourceUrl;
    this.timeoutMs = options.timeoutMs ?? config.salesFetchTimeoutMs;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? config.salesCacheTtlSeconds;
    this.cache = options.cache ?? cacheService;
    this.fetchBuffer = options.fetchBuffer ?? axiosFetchBuffer;
    this.decoder = options.decoder ?? fatalDecoder;
    this.encodings = options.encodings ?? SOURCE_ENCODINGS;

    logger.info('Sales source service initialized', {
      sourceConfigured: Boolean(this.sourceUrl),
      timeoutMs: this.timeoutMs,
      cacheTtlSeconds: this.cacheTtlSeconds
    });
  }

  /**
   * Load the sales table, served from cache for the configured window
   */
  async fetchSalesData(): Promise<SalesTable> {
    if (!this.sourceUrl) {
      throw new LoadError('No sales source URL configured (SALES_SOURCE_URL)');
    }

    const url = ensureDownloadParam(this.sourceUrl);
    const cacheKey = `sales_table:${url}`;
    const { value, hit } = await this.cache.getOrFetch(
      cacheKey,
      this.cacheTtlSeconds,
      () => this.loadFromRemote(url)
    );

    if (hit) {
      logger.info('Returning cached sales data');
    }
    return {
      rows: value.rows,
      meta: {
        source: hit ? 'cache' : 'remote',
        rowCount: value.rows.length,
        encoding: value.encoding,
        lastUpdated: value.fetchedAt,
        expiresInSeconds: Math.max(this.cache.getTTL(cacheKey), 0)
      }
    };
  }

  /**
   * Decode and parse a downloaded payload, trying each encoding in order
   */
  async parsePayload(payload: Uint8Array): Promise<{ rows: RawSaleRow[]; encoding: string }> {
    const result = await firstSuccessfulEncoding(this.encodings, async encoding => {
      const text = this.decoder(payload, encoding);
      return parseDelimited(text);
    });

    if (!result.ok) {
      for (const failure of result.failures) {
        logger.warn(`Could not load sales data with encoding ${failure.encoding}`, { reason: failure.reason });
      }
      throw new LoadError('Sales data could not be decoded with any supported encoding', result.failures);
    }

    logger.info(`Sales data loaded with encoding: ${result.encoding}`);
    const { headers, rows, separator } = result.value;
    const decimalMark = decimalMarkFor(separator);
    const rowSchema = ROW_SCHEMAS[decimalMark];
    const missing = Object.values(SOURCE_COLUMNS).filter(column => !headers.includes(column));
    if (missing.length) {
      throw new LoadError(`Sales data is missing required columns: ${missing.join(', ')}`, { headers });
    }

    const data: RawSaleRow[] = [];
    rows.forEach((row, index) => {
      const { error } = rowSchema.validate(row, { abortEarly: false });
      if (error) {
        logger.warn('Row validation failed; skipping row', {
          line: index + 2,
          details: error.details.map(d => d.message).slice(0, 3)
        });
        return;
      }
      data.push(this.transformRow(row, decimalMark));
    });

    logger.info(`Successfully parsed ${data.length} rows from sales data`);
    return { rows: data, encoding: result.encoding };
  }

  private async loadFromRemote(url: string): Promise<LoadedTable> {
    logger.info('Fetching sales data from remote source');
    let payload: Buffer;
    try {
      payload = await this.fetchBuffer(url, this.timeoutMs);
    } catch (error) {
      throw new LoadError(`Failed to fetch sales data: ${describeFetchError(error)}`);
    }

    const { rows, encoding } = await this.parsePayload(payload);
    return {
      rows,
      encoding,
      fetchedAt: new Date().toISOString()
    };
  }

  // Filter axes are stored trimmed
  private transformRow(row: Record<string, string>, decimalMark: DecimalMark): RawSaleRow {
    return {
      productCode: row[SOURCE_COLUMNS.productCode].trim(),
      productName: row[SOURCE_COLUMNS.productName],
      customerClass: row[SOURCE_COLUMNS.customerClass].trim(),
      documentDate: row[SOURCE_COLUMNS.documentDate].trim(),
      quantity: parseNumber(row[SOURCE_COLUMNS.quantity], decimalMark),
      totalPriceOrig: parseNumber(row[SOURCE_COLUMNS.totalPriceOrig], decimalMark),
      documentStatus: row[SOURCE_COLUMNS.documentStatus]
    };
  }
}

function describeFetchError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

// Lazy initialization to ensure environment variables are loaded
let _salesSourceService: SalesSourceService | null = null;

export const getSalesSourceService = (): SalesSourceService => {
  if (!_salesSourceService) {
    _salesSourceService = new SalesSourceService();
  }
  return _salesSourceService;
};
