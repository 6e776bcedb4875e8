// Column names as they appear in the source export
export const SOURCE_COLUMNS = {
  productCode: 'CODIGO_PRODUCTO',
  productName: 'NOMBRE_PRODUCTO',
  customerClass: 'CLASE_CLIENTE',
  documentDate: 'FECHA_DOCUMENTO',
  quantity: 'CANTIDAD',
  totalPriceOrig: 'PRECIO_TOTAL_ORIG',
  documentStatus: 'ESTADO_DOCUMENTO'
} as const;

// One line item as loaded from the export, before normalization
export interface RawSaleRow {
  productCode: string;
  productName: string;
  customerClass: string;
  documentDate: string;
  quantity: number;
  totalPriceOrig: number;
  documentStatus: string;
}

export interface SaleRecord {
  productCode: string;
  productName: string;
  customerClass: string;
  documentDate: Date;
  quantity: number;
  totalPriceOrig: number;
  documentStatus: string;
  year: number;
  monthNumber: number;
  monthName: string;
}

export interface AggregateRow {
  productCode: string;
  year: number;
  monthNumber: number;
  monthName: string;
  documentDate: Date;
  productName: string;
  customerClass: string;
  documentStatus: string;
  quantity: number;
  totalPriceOrig: number;
}

export interface ProductRollupRow {
  productCode: string;
  productName: string;
  customerClass: string;
  quantity: number;
  totalPriceOrig: number;
}

export type Table<T> = ReadonlyArray<Readonly<T>>;

// Multi-select values chosen by the client
export interface FilterSelection {
  years: ReadonlySet<number>;
  months: ReadonlySet<string>;
  productCodes: ReadonlySet<string>;
  customerClasses: ReadonlySet<string>;
}

export interface SalesSummary {
  totalSales: number;
  itemCount: number;
  maxRow: Readonly<AggregateRow>;
  minRow: Readonly<AggregateRow>;
}

export interface SalesPoint {
  documentDate: Date;
  totalPriceOrig: number;
  productName: string;
  productCode: string;
}

export interface SalesSeries {
  points: SalesPoint[];
  max: number;
  min: number;
}

export interface SalesReport {
  rows: Table<AggregateRow>;
  summary: SalesSummary;
  productRollup: Table<ProductRollupRow>;
  series: SalesSeries;
  durationMs: number;
  fetch: FetchMeta;
}

export interface FilterOptions {
  years: number[];
  months: string[];
  productCodes: string[];
  customerClasses: string[];
}

export interface FetchMeta {
  source: 'remote' | 'cache';
  rowCount: number;
  encoding: string;
  lastUpdated: string;
  expiresInSeconds: number;
}

export interface FilterOptionsResult {
  options: FilterOptions;
  fetch: FetchMeta;
}

export interface DataHealth {
  loadedRows: number;
  normalizedRows: number;
  droppedZeroQuantityRows: number;
  fetch: FetchMeta;
}

// API envelope
export interface ApiResponse<T> {
  success: boolean;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    stage?: string;
    details?: unknown;
  };
}
