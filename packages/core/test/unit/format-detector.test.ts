import { describe, it, expect } from 'vitest';
import { detectFormat, detectStructuredLayout, fileExtension } from '../../src/detection/format-detector.js';
import { binaryFile, pdfFile, textFile, tsv, TXT_HEADER } from './fixtures.js';

describe('Format detector', () => {
  it('should classify by pdf extension, declared type and magic bytes', () => {
    expect(detectFormat(pdfFile('invoice.pdf'))).toBe('pdf-text');
    expect(detectFormat(textFile('upload', 'anything', 'application/pdf'))).toBe('pdf-text');
    expect(detectFormat(textFile('scan.bin', '%PDF-1.7\nbody'))).toBe('pdf-text');
  });

  it('should classify csv by extension or declared type', () => {
    expect(detectFormat(textFile('lines.CSV', 'a,b\n1,2\n'))).toBe('csv');
    expect(detectFormat(textFile('export', 'a,b\n1,2\n', 'text/csv'))).toBe('csv');
  });

  it('should detect a tab-delimited header of known columns', () => {
    const content = tsv(TXT_HEADER, ['SKU1', 'Widget', '8471.30', 'CN', '10', '2.50', '5.0', 'INV-1']);
    expect(detectFormat(textFile('data.txt', content))).toBe('structured-text');
  });

  it('should detect the keyed KEY=value layout', () => {
    const content = 'HTTS=8471.30\tC/N=CN\tPART=SKU1\tPART_DESC=Widget\tquantity=10\tAMT=2.50\tWEIGHT=5.0\n';
    expect(detectFormat(textFile('keyed.txt', content))).toBe('structured-text');
  });

  it('should fall back to unstructured text for free-form content', () => {
    expect(detectFormat(textFile('notes.txt', 'HTS: 8471.30\nQTY: 3\n'))).toBe('unstructured-text');
  });

  it('should honour the configured minimum of matching columns', () => {
    const content = tsv(['PART', 'FOO', 'HTTS'], ['A', 'B', 'C']);
    expect(detectFormat(textFile('two.txt', content))).toBe('unstructured-text');
    expect(detectFormat(textFile('two.txt', content), { structuredMinMatchingColumns: 2 })).toBe('structured-text');
  });

  it('should treat binary content as unstructured without throwing', () => {
    expect(detectFormat(binaryFile('archive.txt'))).toBe('unstructured-text');
  });

  it('should require a data line with the header token count', () => {
    expect(detectStructuredLayout('PART\tHTTS\tAMT\n', 3)).toBeNull();
    expect(detectStructuredLayout('PART\tHTTS\tAMT\nA\tB\n', 3)).toBeNull();
    expect(detectStructuredLayout('PART\tHTTS\tAMT\nA\tB\tC\n', 3)).toBe('header');
  });

  it('should lower-case the extension', () => {
    expect(fileExtension('Invoice.PDF')).toBe('pdf');
    expect(fileExtension('README')).toBe('');
  });
});
