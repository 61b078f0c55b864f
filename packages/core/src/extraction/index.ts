import type { FormatKind } from '@tariffline/shared';
import { PdfExtractor, pdfjsTextReader, type PdfTextReader } from './pdf.extractor.js';
import { StructuredExtractor } from './structured.extractor.js';
import { UnstructuredExtractor } from './unstructured.extractor.js';
import type { FieldExtractor } from './types.js';

export type ExtractorSet = Readonly<Record<FormatKind, FieldExtractor>>;

/** The closed set of extractors, one per detected format */
export function createExtractors(pdfReader: PdfTextReader = pdfjsTextReader): ExtractorSet {
  return {
    'structured-text': new StructuredExtractor('structured-text'),
    csv: new StructuredExtractor('csv'),
    'unstructured-text': new UnstructuredExtractor(),
    'pdf-text': new PdfExtractor(pdfReader),
  };
}

export { StructuredExtractor } from './structured.extractor.js';
export { UnstructuredExtractor, extractFromText, matchFields } from './unstructured.extractor.js';
export { PdfExtractor, pdfjsTextReader } from './pdf.extractor.js';
export type { PdfTextReader } from './pdf.extractor.js';
export { UNSTRUCTURED_FIELD_PATTERNS } from './unstructured.patterns.js';
export type { FieldPattern } from './unstructured.patterns.js';
export { decodeText, splitLines } from './text-decoder.js';
export type { DecodedText, TextEncodingName } from './text-decoder.js';
export { InputFormatError, emptyExtraction } from './types.js';
export type { ExtractionInput, ExtractionResult, FieldExtractor } from './types.js';
