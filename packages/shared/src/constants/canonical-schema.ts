/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CANONICAL SCHEMA
 * Field set, defaults and export layout every source converges to
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { LineItem, LineItemNumericField, LineItemTextField } from '../types/invoice.js';

export const LINE_ITEM_TEXT_FIELDS: readonly LineItemTextField[] = [
  'sku',
  'description',
  'htsCode',
  'countryOfOrigin',
  'qtyUnit',
  'invoiceNumber',
];

export const LINE_ITEM_NUMERIC_FIELDS: readonly LineItemNumericField[] = [
  'packageCount',
  'quantity',
  'netWeightKg',
  'grossWeightKg',
  'unitPrice',
  'value',
];

export const DEFAULT_QTY_UNIT = 'EA';

/** Text values that mean "nothing here" in exported spreadsheets */
export const BLANK_TEXT_MARKERS: readonly string[] = ['N/A', 'NA', 'NAN', 'NULL', 'NONE', '-'];

// ═══════════════════════════════════════════════════════════════════════════════
// CSV EXPORT LAYOUT
// ═══════════════════════════════════════════════════════════════════════════════

export type CsvCellFormat = 'text' | 'integer' | 'decimal2';

export interface CsvColumn {
  header: string;
  field: keyof Omit<LineItem, 'sourceTag' | 'invoiceNumber'>;
  format: CsvCellFormat;
}

/** Column order and header text are part of the customs export contract */
export const CSV_COLUMNS: readonly CsvColumn[] = [
  { header: 'SKU', field: 'sku', format: 'text' },
  { header: 'DESCRIPTION', field: 'description', format: 'text' },
  { header: 'HTS', field: 'htsCode', format: 'text' },
  { header: 'COUNTRY OF ORIGIN', field: 'countryOfOrigin', format: 'text' },
  { header: 'NO. OF PACKAGE', field: 'packageCount', format: 'integer' },
  { header: 'QUANTITY', field: 'quantity', format: 'decimal2' },
  { header: 'NET WEIGHT', field: 'netWeightKg', format: 'decimal2' },
  { header: 'GROSS WEIGHT', field: 'grossWeightKg', format: 'decimal2' },
  { header: 'UNIT PRICE', field: 'unitPrice', format: 'decimal2' },
  { header: 'VALUE', field: 'value', format: 'decimal2' },
  { header: 'QTY UNIT', field: 'qtyUnit', format: 'text' },
];

export const CSV_HEADERS: readonly string[] = CSV_COLUMNS.map((column) => column.header);
