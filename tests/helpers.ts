import { AggregateRow, SaleRecord } from '@/types/sales';

export const HEADER = 'CODIGO_PRODUCTO;NOMBRE_PRODUCTO;CLASE_CLIENTE;FECHA_DOCUMENTO;CANTIDAD;PRECIO_TOTAL_ORIG;ESTADO_DOCUMENTO';

export function latin1Csv(lines: string[]): Buffer {
  return Buffer.from(`${lines.join('\n')}\n`, 'latin1');
}

export function makeRecord(overrides: Partial<SaleRecord> = {}): SaleRecord {
  return {
    productCode: 'P1',
    productName: 'Café molido',
    customerClass: 'Minorista',
    documentDate: new Date(Date.UTC(2024, 2, 5)),
    quantity: 1,
    totalPriceOrig: 10,
    documentStatus: 'Contabilizado',
    year: 2024,
    monthNumber: 3,
    monthName: 'March',
    ...overrides
  };
}

export function makeAggregate(overrides: Partial<AggregateRow> = {}): AggregateRow {
  return {
    productCode: 'P1',
    year: 2024,
    monthNumber: 3,
    monthName: 'March',
    documentDate: new Date(Date.UTC(2024, 2, 5)),
    productName: 'Café molido',
    customerClass: 'Minorista',
    documentStatus: 'Contabilizado',
    quantity: 1,
    totalPriceOrig: 10,
    ...overrides
  };
}
