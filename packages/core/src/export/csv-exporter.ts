/**
 * CSV Exporter
 * Fixed column order and header text, `\n` line endings, standard quoting.
 */
import Papa from 'papaparse';
import { CSV_COLUMNS, type CsvCellFormat, type LineItem } from '@tariffline/shared';
import { roundMoney } from '../normalization/numbers.js';

export type ExportKind = 'processed' | 'combined_processed' | 'aggregated';

const FALLBACK_INVOICE_TOKEN = 'ALL';

function formatCell(value: string | number, format: CsvCellFormat): string {
  if (typeof value === 'string') return value;
  switch (format) {
    case 'integer':
      return String(Math.trunc(value));
    case 'decimal2':
      return roundMoney(value).toFixed(2);
    case 'text':
      return String(value);
  }
}

export function toCsv(items: readonly LineItem[]): string {
  const csv = Papa.unparse(
    {
      fields: CSV_COLUMNS.map((column) => column.header),
      data: items.map((item) => CSV_COLUMNS.map((column) => formatCell(item[column.field], column.format))),
    },
    { newline: '\n', quotes: false }
  );
  return `${csv}\n`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** yyyyMMdd_HHmmss in UTC */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** Invoice number made safe for a filename; blank becomes ALL */
export function invoiceFileToken(invoiceNumber: string | undefined): string {
  const token = (invoiceNumber ?? '')
    .trim()
    .replace(/[/\\\s]+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .replace(/\.{2,}/g, '.');
  return token || FALLBACK_INVOICE_TOKEN;
}

export function buildExportFilename(date: Date, invoiceNumber: string | undefined, kind: ExportKind): string {
  return `${formatTimestamp(date)}_${invoiceFileToken(invoiceNumber)}_${kind}.csv`;
}
