/**
 * Unstructured Extractor
 * Free-form text carries no reliable row delimiter, so every field is matched
 * independently over the whole blob and the document yields at most one row.
 */
import type { FormatKind, RawRow } from '@tariffline/shared';
import { decodeText } from './text-decoder.js';
import { emptyExtraction, InputFormatError, type ExtractionInput, type ExtractionResult, type FieldExtractor } from './types.js';
import { UNSTRUCTURED_FIELD_PATTERNS, type FieldPattern } from './unstructured.patterns.js';

export function matchFields(
  text: string,
  fieldPatterns: readonly FieldPattern[] = UNSTRUCTURED_FIELD_PATTERNS
): RawRow | null {
  const row: RawRow = {};
  for (const { field, patterns } of fieldPatterns) {
    for (const pattern of patterns) {
      const value = pattern.exec(text)?.[1]?.trim();
      if (value) {
        row[field] = value;
        break;
      }
    }
  }
  return Object.keys(row).length > 0 ? row : null;
}

/** Run the unstructured pipeline over already-decoded text */
export function extractFromText(
  filename: string,
  text: string,
  fieldPatterns: readonly FieldPattern[] = UNSTRUCTURED_FIELD_PATTERNS
): ExtractionResult {
  const row = matchFields(text, fieldPatterns);
  if (!row) {
    return emptyExtraction(filename, 'No invoice fields recognised in document text', text);
  }
  return {
    rows: [row],
    columns: Object.keys(row),
    skippedRows: 0,
    warnings: [],
    text,
  };
}

export class UnstructuredExtractor implements FieldExtractor {
  readonly format: FormatKind = 'unstructured-text';

  constructor(private readonly fieldPatterns: readonly FieldPattern[] = UNSTRUCTURED_FIELD_PATTERNS) {}

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const decoded = decodeText(input.content);
    if (!decoded) {
      throw new InputFormatError(input.filename, 'File is not readable as text');
    }
    return extractFromText(input.filename, decoded.text, this.fieldPatterns);
  }
}
