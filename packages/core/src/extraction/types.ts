/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * FIELD EXTRACTION TYPES
 * One extractor per format kind, each turning bytes into raw rows
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { FormatKind, ProcessingWarning, RawRow } from '@tariffline/shared';

export interface ExtractionInput {
  filename: string;
  content: Uint8Array;
}

export interface ExtractionResult {
  rows: RawRow[];
  /** Source column names in first-seen order */
  columns: string[];
  /** Data lines dropped because their token count did not match the header */
  skippedRows: number;
  warnings: ProcessingWarning[];
  /** Full decoded text, kept for document-level lookups such as the invoice number */
  text: string;
}

export interface FieldExtractor {
  readonly format: FormatKind;
  extract(input: ExtractionInput): Promise<ExtractionResult>;
}

/**
 * Raised when a file cannot be read as text at all.
 * Callers turn it into a per-file INPUT_FORMAT warning.
 */
export class InputFormatError extends Error {
  constructor(
    public filename: string,
    message: string
  ) {
    super(message);
    this.name = 'InputFormatError';
  }
}

export function emptyExtraction(filename: string, reason: string, text = ''): ExtractionResult {
  return {
    rows: [],
    columns: [],
    skippedRows: 0,
    warnings: [{ code: 'EXTRACTION_EMPTY', filename, message: reason }],
    text,
  };
}
