import { describe, expect, it, vi } from 'vitest';
import { SalesSourceService, ensureDownloadParam, parseNumber, decimalMarkFor, FetchBuffer } from '@/services/salesSourceService';
import { CacheService } from '@/services/cacheService';
import { LoadError } from '@/utils/errors';
import { HEADER, latin1Csv } from '../helpers';

const SOURCE_URL = 'https://files.example.com/share/ventas.csv';

const payload = latin1Csv([
  HEADER,
  'P1;Café molido;Minorista;05/03/2024;2;100;Contabilizado',
  'P2;Té verde;;20/03/2024;-1;"1.250,50";Anulado'
]);

function createService(fetchBuffer: FetchBuffer, clock: { now: number } = { now: 0 }) {
  return new SalesSourceService({
    sourceUrl: SOURCE_URL,
    cacheTtlSeconds: 600,
    cache: new CacheService(() => clock.now),
    fetchBuffer
  });
}

describe('ensureDownloadParam', () => {
  it('appends with ? when the URL has no query string', () => {
    expect(ensureDownloadParam('https://x.test/file.csv')).toBe('https://x.test/file.csv?download=1');
  });

  it('appends with & when the URL already has a query string', () => {
    expect(ensureDownloadParam('https://x.test/s/abc?e=4UvU')).toBe('https://x.test/s/abc?e=4UvU&download=1');
  });

  it('leaves URLs that already force the download untouched', () => {
    expect(ensureDownloadParam('https://x.test/s/abc?download=1')).toBe('https://x.test/s/abc?download=1');
  });
});

describe('parseNumber', () => {
  it('strips currency symbols, thousands separators and spaces', () => {
    expect(parseNumber('$ 1,234.50')).toBe(1234.5);
    expect(parseNumber('-7')).toBe(-7);
    expect(parseNumber('')).toBe(0);
    expect(parseNumber(12)).toBe(12);
  });

  it('reads a decimal comma with dot-grouped thousands', () => {
    expect(parseNumber('12,5', ',')).toBe(12.5);
    expect(parseNumber('€ 1.234,50', ',')).toBe(1234.5);
    expect(parseNumber('-3', ',')).toBe(-3);
  });
});

describe('decimalMarkFor', () => {
  it('uses a decimal comma only for semicolon-delimited exports', () => {
    expect(decimalMarkFor(';')).toBe(',');
    expect(decimalMarkFor(',')).toBe('.');
    expect(decimalMarkFor('\t')).toBe('.');
  });
});

describe('SalesSourceService.parsePayload', () => {
  it('parses a semicolon-delimited latin1 export into typed rows', async () => {
    const service = createService(vi.fn());
    const { rows, encoding } = await service.parsePayload(payload);

    expect(encoding).toBe('latin1');
    expect(rows).toEqual([
      {
        productCode: 'P1',
        productName: 'Café molido',
        customerClass: 'Minorista',
        documentDate: '05/03/2024',
        quantity: 2,
        totalPriceOrig: 100,
        documentStatus: 'Contabilizado'
      },
      {
        productCode: 'P2',
        productName: 'Té verde',
        customerClass: '',
        documentDate: '20/03/2024',
        quantity: -1,
        totalPriceOrig: 1250.5,
        documentStatus: 'Anulado'
      }
    ]);
  });

  it('tries encodings in order and takes the first one that decodes', async () => {
    const tried: string[] = [];
    const service = new SalesSourceService({
      sourceUrl: SOURCE_URL,
      cache: new CacheService(),
      fetchBuffer: vi.fn(),
      decoder: (bytes, encoding) => {
        tried.push(encoding);
        if (encoding !== 'cp1252') {
          throw new TypeError(`The encoded data was not valid for encoding ${encoding}`);
        }
        return new TextDecoder('windows-1252').decode(bytes);
      }
    });

    const { rows, encoding } = await service.parsePayload(payload);

    expect(encoding).toBe('cp1252');
    expect(tried).toEqual(['latin1', 'iso-8859-1', 'cp1252']);
    expect(rows[0].productName).toBe('Café molido');
  });

  it('accepts a decodable but wrong encoding', async () => {
    const utf8Payload = Buffer.from(`${HEADER}\nP1;Café;Minorista;05/03/2024;1;10;OK\n`, 'utf8');
    const { rows, encoding } = await createService(vi.fn()).parsePayload(utf8Payload);

    expect(encoding).toBe('latin1');
    expect(rows[0].productName).toBe('CafÃ©');
  });

  it('fails with LoadError when every encoding is rejected', async () => {
    const service = new SalesSourceService({
      sourceUrl: SOURCE_URL,
      cache: new CacheService(),
      fetchBuffer: vi.fn(),
      decoder: () => {
        throw new TypeError('undecodable');
      }
    });

    await expect(service.parsePayload(payload)).rejects.toThrow(LoadError);
  });

  it('moves past encodings whose text does not parse as a table', async () => {
    const malformed = latin1Csv([HEADER, 'P1;only;three']);
    const error = await createService(vi.fn()).parsePayload(malformed).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoadError);
    expect(error).toMatchObject({ code: 'LOAD_ERROR', stage: 'load' });
  });

  it('rejects an export without the required columns', async () => {
    const wrongHeader = latin1Csv(['CODIGO;NOMBRE', 'P1;Café']);

    await expect(createService(vi.fn()).parsePayload(wrongHeader))
      .rejects.toThrow('Sales data is missing required columns');
  });

  it('skips rows that fail validation', async () => {
    const withBadRow = latin1Csv([
      HEADER,
      'P1;Café;Minorista;05/03/2024;abc;100;OK',
      'P2;Té;Minorista;06/03/2024;1;20;OK'
    ]);
    const { rows } = await createService(vi.fn()).parsePayload(withBadRow);

    expect(rows.map(r => r.productCode)).toEqual(['P2']);
  });

  it('reads decimal commas in a semicolon-delimited export', async () => {
    const decimalComma = latin1Csv([HEADER, 'P1;A;Minorista;05/03/2024;12,5;99,90;OK']);
    const { rows } = await createService(vi.fn()).parsePayload(decimalComma);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ quantity: 12.5, totalPriceOrig: 99.9 });
  });

  it('skips comma-delimited rows whose numbers have no clear decimal mark', async () => {
    const commaDelimited = latin1Csv([
      HEADER.replace(/;/g, ','),
      'P1,A,Minorista,05/03/2024,"12,5",10,OK',
      'P2,B,Minorista,05/03/2024,2,"1,250.50",OK'
    ]);
    const { rows } = await createService(vi.fn()).parsePayload(commaDelimited);

    expect(rows.map(r => [r.productCode, r.quantity, r.totalPriceOrig])).toEqual([['P2', 2, 1250.5]]);
  });

  it('trims customer classes', async () => {
    const padded = latin1Csv([HEADER, 'P1;A; Minorista ;05/03/2024;1;10;OK']);
    const { rows } = await createService(vi.fn()).parsePayload(padded);

    expect(rows[0].customerClass).toBe('Minorista');
  });

  it('strips a UTF-8 byte-order mark from the first header', async () => {
    const withBom = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), payload]);
    const { rows } = await createService(vi.fn()).parsePayload(withBom);

    expect(rows[0].productCode).toBe('P1');
  });
});

describe('SalesSourceService.fetchSalesData', () => {
  it('fetches the download URL once and serves repeats from cache', async () => {
    const fetchBuffer = vi.fn<FetchBuffer>().mockResolvedValue(payload);
    const service = createService(fetchBuffer);

    const first = await service.fetchSalesData();
    expect(first.meta).toMatchObject({ source: 'remote', rowCount: 2, encoding: 'latin1', expiresInSeconds: 600 });

    const second = await service.fetchSalesData();
    expect(second.rows).toBe(first.rows);
    expect(second.meta.source).toBe('cache');
    expect(fetchBuffer).toHaveBeenCalledTimes(1);
    expect(fetchBuffer).toHaveBeenCalledWith(`${SOURCE_URL}?download=1`, 60000);
  });

  it('fetches again once the cache window has passed', async () => {
    const clock = { now: 0 };
    const fetchBuffer = vi.fn<FetchBuffer>().mockResolvedValue(payload);
    const service = createService(fetchBuffer, clock);

    await service.fetchSalesData();
    clock.now = 599_000;
    await service.fetchSalesData();
    expect(fetchBuffer).toHaveBeenCalledTimes(1);

    clock.now = 600_000;
    await service.fetchSalesData();
    expect(fetchBuffer).toHaveBeenCalledTimes(2);
  });

  it('surfaces a failed fetch once as LoadError and does not cache it', async () => {
    const fetchBuffer = vi.fn<FetchBuffer>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(payload);
    const service = createService(fetchBuffer);

    await expect(service.fetchSalesData()).rejects.toThrow('Failed to fetch sales data: socket hang up');
    expect(fetchBuffer).toHaveBeenCalledTimes(1);

    const { rows } = await service.fetchSalesData();
    expect(rows).toHaveLength(2);
    expect(fetchBuffer).toHaveBeenCalledTimes(2);
  });

  it('fails with LoadError when no source is configured', async () => {
    const service = new SalesSourceService({ sourceUrl: '', cache: new CacheService(), fetchBuffer: vi.fn() });

    await expect(service.fetchSalesData()).rejects.toThrow(LoadError);
  });
});
