import { describe, it, expect } from 'vitest';
import {
  filenameSimilarity,
  longestCommonSubstring,
  normalizeStem,
  resolvePairs,
} from '../../src/pairing/pairing-resolver.js';

const named = (...filenames: string[]) => filenames.map((filename) => ({ filename }));

describe('Pairing resolver', () => {
  it('should normalize filename stems', () => {
    expect(normalizeStem('Invoice_100 (copy).PDF')).toBe('invoice100copy');
    expect(normalizeStem('uploads/invoice-100.txt')).toBe('invoice100');
  });

  it('should score by longest common substring', () => {
    expect(longestCommonSubstring('invoice100', 'invoice100data')).toBe(10);
    expect(longestCommonSubstring('abc', '')).toBe(0);
    expect(filenameSimilarity('invoice_100.pdf', 'invoice_100_data.txt')).toBeCloseTo(20 / 24, 10);
    expect(filenameSimilarity('invoice_100.pdf', 'invoice_200.txt')).toBeCloseTo(14 / 20, 10);
  });

  it('should choose the most similar text file', () => {
    const [pdf] = named('invoice_100.pdf');
    const txts = named('invoice_200.txt', 'invoice_100_data.txt');

    const result = resolvePairs(pdf ? [pdf] : [], txts);

    expect(result.pairs.map((pair) => pair.txt.filename)).toEqual(['invoice_100_data.txt']);
    expect(result.unmatched.map((file) => file.filename)).toEqual(['invoice_200.txt']);
  });

  it('should never assign one text file to two PDFs', () => {
    const result = resolvePairs(named('shipment_a.pdf', 'shipment_b.pdf'), named('shipment_a.txt'));

    expect(result.pairs).toHaveLength(1);
    expect(result.pairs[0]?.pdf.filename).toBe('shipment_a.pdf');
    expect(result.unmatched.map((file) => file.filename)).toEqual(['shipment_b.pdf']);
  });

  it('should leave files below the threshold unmatched', () => {
    const result = resolvePairs(named('alpha.pdf'), named('zulu.txt'));

    expect(result.pairs).toEqual([]);
    expect(result.unmatched.map((file) => file.filename)).toEqual(['alpha.pdf', 'zulu.txt']);
  });

  it('should break score ties with the lexically earliest text file', () => {
    const result = resolvePairs(named('order.pdf'), named('order_b.txt', 'order_a.txt'));

    expect(result.pairs[0]?.txt.filename).toBe('order_a.txt');
  });

  it('should reject a candidate scoring exactly the threshold', () => {
    const result = resolvePairs(named('invoice_100.pdf'), named('invoice_200.txt'), 0.7);

    expect(result.pairs).toEqual([]);
    expect(result.unmatched.map((file) => file.filename)).toEqual(['invoice_100.pdf', 'invoice_200.txt']);
  });

  it('should accept a custom threshold', () => {
    const result = resolvePairs(named('invoice_100.pdf'), named('invoice_200.txt'), 0.75);

    expect(result.pairs).toEqual([]);
  });
});
