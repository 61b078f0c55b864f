import type { UploadedFile } from '@tariffline/shared';
import type { OutputSink } from '../../src/pipeline/invoice-pipeline.service.js';
import type { PdfTextReader } from '../../src/extraction/pdf.extractor.js';

const encoder = new TextEncoder();

export function textFile(filename: string, content: string, declaredType?: string): UploadedFile {
  return { filename, content: encoder.encode(content), declaredType };
}

const PDF_HEADER = '%PDF-1.4\n';

/** Bytes that start like a PDF, with the page text carried after the header */
export function pdfFile(filename: string, pageText = ''): UploadedFile {
  return { filename, content: encoder.encode(PDF_HEADER + pageText), declaredType: 'application/pdf' };
}

export function binaryFile(filename: string): UploadedFile {
  return { filename, content: new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x00, 0x00, 0x08, 0x00]) };
}

export function tsv(...lines: string[][]): string {
  return lines.map((line) => line.join('\t')).join('\n') + '\n';
}

export const TXT_HEADER = ['PART', 'PART_DESC', 'HTTS', 'C/N', 'quantity', 'AMT', 'WEIGHT', 'invoice_nbr'];

export interface MemorySink extends OutputSink {
  files: Map<string, string>;
}

export function createMemorySink(): MemorySink {
  const files = new Map<string, string>();
  return {
    files,
    async write(filename, content) {
      files.set(filename, content);
      return `/out/${filename}`;
    },
  };
}

export function fixedPdfReader(pages: string[]): PdfTextReader {
  return {
    async readPages() {
      return pages;
    },
  };
}

/** Reads back the page text that pdfFile() embedded */
export const embeddedTextPdfReader: PdfTextReader = {
  async readPages(content) {
    return [new TextDecoder().decode(content).slice(PDF_HEADER.length)];
  },
};

export function failingPdfReader(message: string): PdfTextReader {
  return {
    async readPages() {
      throw new Error(message);
    },
  };
}
