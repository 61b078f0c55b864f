/**
 * Structured Extractor
 * Delimiter-separated text (tab for .txt, comma for .csv) with a header line,
 * or tab-separated KEY=value tokens.
 */
import Papa from 'papaparse';
import type { FormatKind, RawRow } from '@tariffline/shared';
import { decodeText } from './text-decoder.js';
import {
  emptyExtraction,
  InputFormatError,
  type ExtractionInput,
  type ExtractionResult,
  type FieldExtractor,
} from './types.js';

/**
 * Comma data follows standard CSV quoting. Tab data has no quoting: every
 * line is split on the delimiter as written, so a `"` inside a field is text.
 */
function tokenize(text: string, delimiter: string): string[][] {
  if (delimiter === ',') {
    const parsed = Papa.parse<string[]>(text, {
      delimiter,
      skipEmptyLines: 'greedy',
    });
    return parsed.data;
  }
  return text
    .split(/\r\n|\n|\r/)
    .filter((line) => line.trim() !== '')
    .map((line) => line.split(delimiter));
}

function isKeyedLine(tokens: readonly string[]): boolean {
  return tokens.length > 0 && tokens.every((token) => token.includes('='));
}

export class StructuredExtractor implements FieldExtractor {
  constructor(
    readonly format: Extract<FormatKind, 'structured-text' | 'csv'>,
    private readonly delimiter: string = format === 'csv' ? ',' : '\t'
  ) {}

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const decoded = decodeText(input.content);
    if (!decoded) {
      throw new InputFormatError(input.filename, 'File is not readable as text');
    }

    const lines = tokenize(decoded.text, this.delimiter);
    const first = lines[0];
    if (!first) {
      return emptyExtraction(input.filename, 'File contains no data lines', decoded.text);
    }

    const result =
      this.format === 'structured-text' && isKeyedLine(first)
        ? this.fromKeyedLines(lines)
        : this.fromHeader(first, lines.slice(1));

    const warnings: ExtractionResult['warnings'] = [];
    if (result.rows.length === 0) {
      warnings.push({
        code: 'EXTRACTION_EMPTY',
        filename: input.filename,
        message: 'No data rows matched the header layout',
      });
    }

    return { ...result, warnings, text: decoded.text };
  }

  private fromHeader(
    header: string[],
    dataLines: string[][]
  ): Pick<ExtractionResult, 'rows' | 'columns' | 'skippedRows'> {
    const columns = header.map((token) => token.trim());
    const rows: RawRow[] = [];
    let skippedRows = 0;

    for (const tokens of dataLines) {
      if (tokens.length !== columns.length) {
        skippedRows++;
        continue;
      }
      const row: RawRow = {};
      columns.forEach((column, index) => {
        if (column && !Object.hasOwn(row, column)) {
          row[column] = (tokens[index] ?? '').trim();
        }
      });
      rows.push(row);
    }

    return { rows, columns: columns.filter(Boolean), skippedRows };
  }

  private fromKeyedLines(lines: string[][]): Pick<ExtractionResult, 'rows' | 'columns' | 'skippedRows'> {
    const columns: string[] = [];
    const rows: RawRow[] = [];
    let skippedRows = 0;

    for (const tokens of lines) {
      if (!isKeyedLine(tokens)) {
        skippedRows++;
        continue;
      }
      const row: RawRow = {};
      for (const token of tokens) {
        const separator = token.indexOf('=');
        const key = token.slice(0, separator).trim();
        if (!key || Object.hasOwn(row, key)) continue;
        row[key] = token.slice(separator + 1).trim();
        if (!columns.includes(key)) columns.push(key);
      }
      rows.push(row);
    }

    return { rows, columns, skippedRows };
  }
}
