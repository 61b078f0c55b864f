/**
 * Format Detector
 * Classifies an upload by extension, declared type and a content sample.
 * Never throws: anything it cannot place is unstructured text.
 */
import type { FormatKind } from '@tariffline/shared';
import { ENGINE_DEFAULTS } from '@tariffline/shared';
import { AliasResolver, defaultAliasResolver } from '../normalization/alias-resolver.js';
import { decodeText, splitLines } from '../extraction/text-decoder.js';

export interface DetectionInput {
  filename: string;
  declaredType?: string | null;
  content: Uint8Array;
}

export interface DetectionOptions {
  structuredMinMatchingColumns?: number;
  sampleBytes?: number;
  aliases?: AliasResolver;
}

export type StructuredLayout = 'header' | 'keyed';

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

function hasPdfMagic(content: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, index) => content[index] === byte);
}

export function detectFormat(input: DetectionInput, options: DetectionOptions = {}): FormatKind {
  const extension = fileExtension(input.filename);
  const declared = (input.declaredType || '').toLowerCase();

  if (extension === 'pdf' || declared === 'application/pdf' || hasPdfMagic(input.content)) {
    return 'pdf-text';
  }
  if (extension === 'csv' || declared === 'text/csv') {
    return 'csv';
  }

  const sample = decodeText(
    input.content.subarray(0, options.sampleBytes ?? ENGINE_DEFAULTS.DETECTION_SAMPLE_BYTES)
  );
  if (!sample) {
    return 'unstructured-text';
  }

  const layout = detectStructuredLayout(
    sample.text,
    options.structuredMinMatchingColumns ?? ENGINE_DEFAULTS.STRUCTURED_MIN_MATCHING_COLUMNS,
    options.aliases ?? defaultAliasResolver
  );
  return layout ? 'structured-text' : 'unstructured-text';
}

/**
 * Tab-delimited layout check.
 *
 * header: first line names at least `minMatchingColumns` known fields and a
 *         later line has the same token count.
 * keyed:  first line is `KEY=value` tokens with enough known keys.
 */
export function detectStructuredLayout(
  text: string,
  minMatchingColumns: number,
  aliases: AliasResolver = defaultAliasResolver
): StructuredLayout | null {
  const lines = splitLines(text);
  const first = lines[0];
  if (first === undefined || !first.includes('\t')) {
    return null;
  }

  const tokens = first.split('\t').map((token) => token.trim());

  if (tokens.every((token) => token.includes('='))) {
    const keys = tokens.map((token) => token.slice(0, token.indexOf('=')));
    return aliases.countKnown(keys) >= minMatchingColumns ? 'keyed' : null;
  }

  if (aliases.countKnown(tokens) < minMatchingColumns) {
    return null;
  }

  const hasDataLine = lines.slice(1).some((line) => line.split('\t').length === tokens.length);
  return hasDataLine ? 'header' : null;
}
