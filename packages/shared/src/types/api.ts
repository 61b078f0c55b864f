/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * API TYPES
 * Response payloads of the invoice processing HTTP surface
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { FormatKind, InvoiceSummary, LineItem, ProcessingWarning, RawRow } from './invoice.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  error: ApiErrorCode;
  message: string;
  details?: unknown;
}

export const API_ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NO_FILES: 'NO_FILES',
  NO_READABLE_FILES: 'NO_READABLE_FILES',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  NOT_FOUND: 'NOT_FOUND',
  REQUEST_ERROR: 'REQUEST_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[keyof typeof API_ERROR_CODES];

// ═══════════════════════════════════════════════════════════════════════════════
// INVOICE ROUTES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RowSample<T> {
  totalRows: number;
  sample: T[];
}

export interface ProcessResponse {
  success: true;
  summary: InvoiceSummary;
  rawData: RowSample<LineItem>;
  aggregatedData: RowSample<LineItem>;
  skippedRowCount: number;
  warnings: ProcessingWarning[];
  pairs: Array<{ pdf: string; txt: string; score: number }>;
  downloadFilename: string;
  aggregatedFilename: string;
  message: string;
}

export interface PreviewResponse {
  filename: string;
  format: FormatKind;
  columns: string[];
  sampleRows: RawRow[];
}

export interface ResolvePairsResponse {
  pairs: Array<{ pdf: string; txt: string; score: number }>;
  unmatched: string[];
}

export interface CleanupResponse {
  success: true;
  filesRemoved: number;
  sizeRemovedMb: number;
  message: string;
}
