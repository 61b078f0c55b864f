import { describe, it, expect } from 'vitest';
import { applyLineItemDefaults, normalizeRow, normalizeRows } from '../../src/normalization/normalizer.js';
import { AliasResolver } from '../../src/normalization/alias-resolver.js';

describe('normalizeRow', () => {
  it('should map the legacy text layout onto the canonical schema', () => {
    const item = normalizeRow(
      {
        HTTS: '8471.30',
        'C/N': 'CN',
        PART: 'SKU1',
        PART_DESC: 'Widget',
        quantity: '10',
        AMT: '2.50',
        WEIGHT: '5.0',
      },
      'txt'
    );

    expect(item).toEqual({
      sku: 'SKU1',
      description: 'Widget',
      htsCode: '8471.30',
      countryOfOrigin: 'CN',
      packageCount: 0,
      quantity: 10,
      netWeightKg: 5,
      grossWeightKg: 5,
      unitPrice: 2.5,
      value: 25,
      qtyUnit: 'EA',
      invoiceNumber: '',
      sourceTag: 'txt',
    });
    expect(Object.isFrozen(item)).toBe(true);
  });

  it('should recompute value instead of trusting the source', () => {
    const item = normalizeRow({ PART: 'A', QTY: '3', PRICE: '1.10', VALUE: '999' }, 'csv');

    expect(item?.value).toBe(3.3);
  });

  it('should blank out marker values', () => {
    const item = normalizeRow({ PART: 'A', 'C/N': 'N/A', DESCRIPTION: ' - ' }, 'txt');

    expect(item?.countryOfOrigin).toBe('');
    expect(item?.description).toBe('');
  });

  it('should convert pound weights and keep an explicit gross weight', () => {
    const converted = normalizeRow({ PART: 'A', WEIGHT_LB: '10' }, 'txt');
    const explicit = normalizeRow({ PART: 'A', WEIGHT: '5', 'GROSS WEIGHT': '6' }, 'txt');

    expect(converted?.netWeightKg).toBeCloseTo(4.5359237, 7);
    expect(converted?.grossWeightKg).toBeCloseTo(4.5359237, 7);
    expect(explicit?.netWeightKg).toBe(5);
    expect(explicit?.grossWeightKg).toBe(6);
  });

  it('should coerce numbers to non-negative values', () => {
    const item = normalizeRow({ HTS: '8517.62', QTY: '-4', PKGS: '3.7', PRICE: 'abc', UOM: 'kg' }, 'pdf');

    expect(item?.quantity).toBe(0);
    expect(item?.packageCount).toBe(3);
    expect(item?.unitPrice).toBe(0);
    expect(item?.value).toBe(0);
    expect(item?.qtyUnit).toBe('KG');
  });

  it('should let the first key for a field win', () => {
    expect(normalizeRow({ PART: 'A', SKU: 'B' }, 'txt')?.sku).toBe('A');
  });

  it('should leave gross weight and unit open when defaults are deferred', () => {
    const deferred = normalizeRow({ PART: 'SKU1', WEIGHT: '5' }, 'txt', undefined, true);

    expect(deferred?.grossWeightKg).toBe(0);
    expect(deferred?.qtyUnit).toBe('');
    expect(deferred && applyLineItemDefaults(deferred)).toMatchObject({ grossWeightKg: 5, qtyUnit: 'EA' });
  });

  it('should return the same item when no default applies', () => {
    const complete = normalizeRow({ PART: 'SKU1', WEIGHT: '5', UOM: 'pcs' }, 'txt');

    expect(complete && applyLineItemDefaults(complete)).toBe(complete);
  });

  it('should drop rows with neither sku nor hts code', () => {
    expect(normalizeRow({ DESCRIPTION: 'loose text', QTY: '2' }, 'txt')).toBeNull();
  });

  it('should resolve through a custom alias table', () => {
    const aliases = new AliasResolver({
      version: 2,
      fields: {
        sku: ['ARTICLE'],
        description: [],
        htsCode: [],
        countryOfOrigin: [],
        packageCount: [],
        quantity: ['MENGE'],
        netWeightKg: [],
        grossWeightKg: [],
        unitPrice: [],
        value: [],
        qtyUnit: [],
        invoiceNumber: [],
      },
      scaled: [],
    });

    const item = normalizeRow({ ARTICLE: 'X-9', MENGE: '4' }, 'csv', aliases);

    expect(aliases.version).toBe(2);
    expect(item?.sku).toBe('X-9');
    expect(item?.quantity).toBe(4);
  });
});

describe('normalizeRows', () => {
  it('should count identity failures as skipped rows', () => {
    const result = normalizeRows([{ DESCRIPTION: 'x' }, { PART: 'A' }, { HTTS: '8471.30' }], 'txt');

    expect(result.items.map((item) => item.sku || item.htsCode)).toEqual(['A', '8471.30']);
    expect(result.skippedRows).toBe(1);
  });

  it('should filter by invoice number without counting exclusions as skipped', () => {
    const result = normalizeRows(
      [
        { PART: 'A', invoice_nbr: 'inv-1' },
        { PART: 'B', invoice_nbr: 'INV-2' },
      ],
      'txt',
      { invoiceNumber: ' INV-1 ' }
    );

    expect(result.items.map((item) => item.sku)).toEqual(['A']);
    expect(result.filteredRows).toBe(1);
    expect(result.skippedRows).toBe(0);
  });
});
