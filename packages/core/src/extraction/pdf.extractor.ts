/**
 * PDF Extractor
 * Reads the text layer of every page (pdfjs-dist, legacy Node build) and runs
 * the unstructured pipeline over it. Scanned or broken PDFs yield no rows.
 */
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { FormatKind } from '@tariffline/shared';
import { emptyExtraction, type ExtractionInput, type ExtractionResult, type FieldExtractor } from './types.js';
import { extractFromText } from './unstructured.extractor.js';
import { UNSTRUCTURED_FIELD_PATTERNS, type FieldPattern } from './unstructured.patterns.js';

export interface PdfTextReader {
  /** Text of each page, in page order */
  readPages(content: Uint8Array): Promise<string[]>;
}

export const pdfjsTextReader: PdfTextReader = {
  async readPages(content) {
    // pdfjs takes ownership of the buffer it is given
    const loadingTask = getDocument({
      data: new Uint8Array(content),
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    });
    const pdf = await loadingTask.promise.catch(async (error: unknown) => {
      await loadingTask.destroy();
      throw error;
    });

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const textContent = await page.getTextContent();
        pages.push(
          textContent.items
            .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : ' ') : ''))
            .join('')
        );
      }
      return pages;
    } finally {
      await pdf.destroy();
    }
  },
};

export class PdfExtractor implements FieldExtractor {
  readonly format: FormatKind = 'pdf-text';

  constructor(
    private readonly reader: PdfTextReader = pdfjsTextReader,
    private readonly fieldPatterns: readonly FieldPattern[] = UNSTRUCTURED_FIELD_PATTERNS
  ) {}

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    let pages: string[];
    try {
      pages = await this.reader.readPages(input.content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return emptyExtraction(input.filename, `PDF text extraction failed: ${reason}`);
    }

    const text = pages.join('\n');
    if (!text.trim()) {
      return emptyExtraction(input.filename, 'PDF has no extractable text layer');
    }

    return extractFromText(input.filename, text, this.fieldPatterns);
  }
}
