import { describe, it, expect } from 'vitest';
import { StructuredExtractor } from '../../src/extraction/structured.extractor.js';
import { UnstructuredExtractor, matchFields } from '../../src/extraction/unstructured.extractor.js';
import { PdfExtractor } from '../../src/extraction/pdf.extractor.js';
import { InputFormatError } from '../../src/extraction/types.js';
import { createExtractors } from '../../src/extraction/index.js';
import { binaryFile, failingPdfReader, fixedPdfReader, pdfFile, textFile, tsv, TXT_HEADER } from './fixtures.js';

describe('StructuredExtractor', () => {
  const extractor = new StructuredExtractor('structured-text');

  it('should map header tokens to row keys and skip short lines', async () => {
    const content = tsv(
      TXT_HEADER,
      ['SKU1', 'Widget', '8471.30', 'CN', '10', '2.50', '5.0', 'INV-1'],
      ['SKU2', 'Gadget', '8517.62', 'MX', '4', '1.25', '2.0', 'INV-1'],
      ['SKU3', 'broken line']
    );

    const result = await extractor.extract(textFile('data.txt', content));

    expect(result.columns).toEqual(TXT_HEADER);
    expect(result.skippedRows).toBe(1);
    expect(result.warnings).toEqual([]);
    expect(result.rows).toHaveLength(2);
    expect(result.rows[1]).toEqual({
      PART: 'SKU2',
      PART_DESC: 'Gadget',
      HTTS: '8517.62',
      'C/N': 'MX',
      quantity: '4',
      AMT: '1.25',
      WEIGHT: '2.0',
      invoice_nbr: 'INV-1',
    });
  });

  it('should read keyed KEY=value lines', async () => {
    const content = 'HTTS=8471.30\tC/N=CN\tPART=SKU1\tPART_DESC=Widget\tquantity=10\tAMT=2.50\tWEIGHT=5.0\n';

    const result = await extractor.extract(textFile('keyed.txt', content));

    expect(result.rows).toEqual([
      {
        HTTS: '8471.30',
        'C/N': 'CN',
        PART: 'SKU1',
        PART_DESC: 'Widget',
        quantity: '10',
        AMT: '2.50',
        WEIGHT: '5.0',
      },
    ]);
    expect(result.columns).toEqual(['HTTS', 'C/N', 'PART', 'PART_DESC', 'quantity', 'AMT', 'WEIGHT']);
  });

  it('should keep quote characters in tab-separated fields as text', async () => {
    const content = tsv(
      TXT_HEADER,
      ['SKU1', '"A" GRADE STEEL', '7208.51', 'KR', '2', '100.00', '40.0', 'INV-1'],
      ['SKU2', 'Bolt 1/2"', '7318.15', 'TW', '50', '0.10', '1.0', 'INV-1'],
      ['SKU3', 'Washer', '7318.22', 'TW', '50', '0.05', '0.5', 'INV-1']
    );

    const result = await extractor.extract(textFile('steel.txt', content));

    expect(result.skippedRows).toBe(0);
    expect(result.rows.map((row) => row.PART_DESC)).toEqual(['"A" GRADE STEEL', 'Bolt 1/2"', 'Washer']);
    expect(result.rows[2]?.PART).toBe('SKU3');
  });

  it('should keep columns named like object properties', async () => {
    const content = tsv(['PART', 'HTTS', 'constructor'], ['SKU1', '8471.30', 'kept']);

    const result = await extractor.extract(textFile('odd.txt', content));

    expect(result.rows).toEqual([{ PART: 'SKU1', HTTS: '8471.30', constructor: 'kept' }]);
  });

  it('should honour csv quoting', async () => {
    const csv = new StructuredExtractor('csv');
    const content = 'SKU,DESCRIPTION,QTY\nA-1,"Widget, large",3\n';

    const result = await csv.extract(textFile('lines.csv', content));

    expect(result.rows).toEqual([{ SKU: 'A-1', DESCRIPTION: 'Widget, large', QTY: '3' }]);
  });

  it('should warn once when the header has no data rows', async () => {
    const result = await extractor.extract(textFile('empty.txt', 'PART\tHTTS\tAMT\n'));

    expect(result.rows).toEqual([]);
    expect(result.warnings).toEqual([
      { code: 'EXTRACTION_EMPTY', filename: 'empty.txt', message: 'No data rows matched the header layout' },
    ]);
  });

  it('should reject binary content', async () => {
    await expect(extractor.extract(binaryFile('archive.txt'))).rejects.toBeInstanceOf(InputFormatError);
  });
});

describe('UnstructuredExtractor', () => {
  it('should yield exactly one row from fields in any order', async () => {
    const extractor = new UnstructuredExtractor();

    const result = await extractor.extract(textFile('notes.txt', 'Shipment notes\nQTY: 3\nHTS: 8471.30\n'));

    expect(result.rows).toEqual([{ htsCode: '8471.30', quantity: '3' }]);
    expect(result.columns).toEqual(['htsCode', 'quantity']);
    expect(result.warnings).toEqual([]);
  });

  it('should pick up the invoice number formats', () => {
    expect(matchFields('Ref 074M-22005749 dated')).toEqual({ invoiceNumber: '074M-22005749' });
    expect(matchFields('Invoice No: AB-1234')).toEqual({ invoiceNumber: 'AB-1234' });
  });

  it('should return no rows and one warning when nothing matches', async () => {
    const result = await new UnstructuredExtractor().extract(textFile('memo.txt', 'Nothing useful here\n'));

    expect(result.rows).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.code).toBe('EXTRACTION_EMPTY');
  });
});

describe('PdfExtractor', () => {
  it('should run the text layer of all pages through the field patterns', async () => {
    const extractor = new PdfExtractor(fixedPdfReader(['HTS: 8471.30', 'QTY: 3']));

    const result = await extractor.extract(pdfFile('invoice.pdf'));

    expect(result.rows).toEqual([{ htsCode: '8471.30', quantity: '3' }]);
    expect(result.text).toBe('HTS: 8471.30\nQTY: 3');
  });

  it('should turn reader failures into an empty extraction', async () => {
    const extractor = new PdfExtractor(failingPdfReader('Invalid PDF structure'));

    const result = await extractor.extract(pdfFile('broken.pdf'));

    expect(result.rows).toEqual([]);
    expect(result.warnings).toEqual([
      {
        code: 'EXTRACTION_EMPTY',
        filename: 'broken.pdf',
        message: 'PDF text extraction failed: Invalid PDF structure',
      },
    ]);
  });

  it('should report a PDF without a text layer', async () => {
    const result = await new PdfExtractor(fixedPdfReader(['', '  '])).extract(pdfFile('scan.pdf'));

    expect(result.rows).toEqual([]);
    expect(result.warnings[0]?.message).toBe('PDF has no extractable text layer');
  });
});

describe('createExtractors', () => {
  it('should provide one extractor per format kind', () => {
    const extractors = createExtractors(fixedPdfReader([]));

    expect(extractors['structured-text'].format).toBe('structured-text');
    expect(extractors.csv.format).toBe('csv');
    expect(extractors['unstructured-text'].format).toBe('unstructured-text');
    expect(extractors['pdf-text'].format).toBe('pdf-text');
  });
});
