/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INVOICE TYPES
 * Canonical line items, raw rows and derived summaries
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCES & FORMATS
// ═══════════════════════════════════════════════════════════════════════════════

export type SourceTag = 'pdf' | 'txt' | 'csv' | 'combined';

export type FormatKind = 'structured-text' | 'unstructured-text' | 'pdf-text' | 'csv';

/**
 * Source-specific field names mapped to raw string values.
 * Keys are whatever the source used; the normalizer resolves them.
 */
export type RawRow = Record<string, string>;

/** A file as handed over by the upload layer */
export interface UploadedFile {
  filename: string;
  content: Uint8Array;
  /** MIME type reported by the client, if any */
  declaredType?: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CANONICAL LINE ITEM
// ═══════════════════════════════════════════════════════════════════════════════

export interface LineItem {
  readonly sku: string;
  readonly description: string;
  readonly htsCode: string;
  readonly countryOfOrigin: string;
  readonly packageCount: number;
  readonly quantity: number;
  readonly netWeightKg: number;
  readonly grossWeightKg: number;
  readonly unitPrice: number;
  /** Always quantity × unitPrice, rounded to cents */
  readonly value: number;
  readonly qtyUnit: string;
  readonly invoiceNumber: string;
  readonly sourceTag: SourceTag;
}

export type LineItemTextField = 'sku' | 'description' | 'htsCode' | 'countryOfOrigin' | 'qtyUnit' | 'invoiceNumber';

export type LineItemNumericField =
  | 'packageCount'
  | 'quantity'
  | 'netWeightKg'
  | 'grossWeightKg'
  | 'unitPrice'
  | 'value';

export type CanonicalField = LineItemTextField | LineItemNumericField;

// ═══════════════════════════════════════════════════════════════════════════════
// PAIRING
// ═══════════════════════════════════════════════════════════════════════════════

export interface FilePair<F extends { filename: string } = UploadedFile> {
  pdf: F;
  txt: F;
  /** Filename similarity, 0-1 */
  score: number;
}

export interface PairingResult<F extends { filename: string } = UploadedFile> {
  pairs: FilePair<F>[];
  unmatched: F[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════════

export interface HtsValueEntry {
  htsCode: string;
  value: number;
}

export interface InvoiceSummary {
  invoiceNumber: string;
  generatedAt: string;
  totalLines: number;
  totalQuantity: number;
  totalNetWeight: number;
  totalGrossWeight: number;
  totalValue: number;
  uniqueHtsCodes: number;
  uniqueSkus: number;
  /** Country of origin → number of lines */
  countries: Record<string, number>;
  /** Ranked by summed value, descending */
  topHtsCodes: HtsValueEntry[];
  /** SKU → summed quantity */
  quantityBySku: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WARNINGS
// ═══════════════════════════════════════════════════════════════════════════════

export type ProcessingWarningCode =
  | 'INPUT_FORMAT'
  | 'EXTRACTION_EMPTY'
  | 'ROWS_SKIPPED'
  | 'PAIRING_UNMATCHED';

export interface ProcessingWarning {
  code: ProcessingWarningCode;
  message: string;
  filename?: string;
  count?: number;
}
